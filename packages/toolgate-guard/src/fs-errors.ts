import { describeCause, fail, isNotFoundError, type ToolResult } from '@toolgate/core';

/**
 * Map a filesystem error to a ToolResult failure naming the path.
 */
export function fsFailure<T>(target: string, err: unknown, verb: 'read' | 'write' = 'read'): ToolResult<T> {
  if (isNotFoundError(err)) {
    return fail({ kind: 'not_found', path: target, message: `file not found: ${target}` });
  }
  const cause = describeCause(err);
  return fail({ kind: 'io_error', path: target, cause, message: `could not ${verb} ${target}: ${cause}` });
}

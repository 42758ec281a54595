/**
 * Structured results for tool operations.
 *
 * Every operation returns a `ToolResult`; failures are values, never thrown.
 * `renderToolError` is the text handed back to the agent.
 */

export type ToolErrorKind =
  | 'policy_denied'
  | 'quota_exceeded'
  | 'ambiguous_edit'
  | 'not_found'
  | 'io_error'
  | 'command_blocked'
  | 'timeout'
  | 'invalid_specifier'
  | 'not_configured'
  | 'invalid_arguments';

export type PolicyDenyReason = 'protected_dir' | 'explicitly_denied' | 'test_pattern' | 'not_owned';

export interface PolicyDeniedError {
  kind: 'policy_denied';
  path: string;
  reason: PolicyDenyReason;
  message: string;
  /** Sorted owned set, present when reason is 'not_owned' */
  permitted?: string[];
}

export interface QuotaExceededError {
  kind: 'quota_exceeded';
  path: string;
  cap: number;
  actual: number;
  message: string;
}

export interface AmbiguousEditError {
  kind: 'ambiguous_edit';
  path: string;
  occurrences: number;
  message: string;
}

export interface NotFoundError {
  kind: 'not_found';
  path: string;
  message: string;
}

export interface IoError {
  kind: 'io_error';
  path?: string;
  cause: string;
  message: string;
}

export interface CommandBlockedError {
  kind: 'command_blocked';
  command: string;
  ruleId: string;
  pattern: string;
  description: string;
  message: string;
}

export interface TimeoutError {
  kind: 'timeout';
  command: string;
  timeoutMs: number;
  message: string;
}

export interface InvalidSpecifierError {
  kind: 'invalid_specifier';
  specifier: string;
  message: string;
}

export interface NotConfiguredError {
  kind: 'not_configured';
  setting: string;
  message: string;
}

export interface InvalidArgumentsError {
  kind: 'invalid_arguments';
  tool: string;
  issues: string[];
  message: string;
}

export type ToolError =
  | PolicyDeniedError
  | QuotaExceededError
  | AmbiguousEditError
  | NotFoundError
  | IoError
  | CommandBlockedError
  | TimeoutError
  | InvalidSpecifierError
  | NotConfiguredError
  | InvalidArgumentsError;

export type ToolResult<T> = { ok: true; value: T } | { ok: false; error: ToolError };

export function ok<T>(value: T): ToolResult<T> {
  return { ok: true, value };
}

export function fail<T = never>(error: ToolError): ToolResult<T> {
  return { ok: false, error };
}

export function isToolError<K extends ToolErrorKind>(
  result: ToolResult<unknown>,
  kind: K,
): result is { ok: false; error: Extract<ToolError, { kind: K }> } {
  return !result.ok && result.error.kind === kind;
}

/**
 * Text rendering of a structured error. Policy denials keep the `BLOCKED:`
 * prefix, everything else reads `Error: ...`.
 */
export function renderToolError(error: ToolError): string {
  switch (error.kind) {
    case 'policy_denied':
      return `BLOCKED: ${error.message}`;
    default:
      return `Error: ${error.message}`;
  }
}

/** Map an unknown thrown value to the message of its cause. */
export function describeCause(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}

/** Node fs errors carry a `code`; ENOENT means the path is missing. */
export function isNotFoundError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

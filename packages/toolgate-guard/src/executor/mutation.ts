/**
 * @toolgate/guard - Mutation Executor
 *
 * Performs permitted writes and edits durably and records what changed.
 */

import { mkdir, open, readFile } from 'node:fs/promises';
import path from 'node:path';

import {
  describeCause,
  fail,
  isNotFoundError,
  ok,
  type SessionContext,
  type ToolResult,
} from '@toolgate/core';

import { fsFailure } from '../fs-errors.js';
import type { PathAccessGuard } from '../guards/path-access.js';
import type { WriteVerdict } from '../types.js';

import { unifiedDiff } from './diff.js';

/** Lines of a diff or code block shown by the audit renderer */
export const AUDIT_BLOCK_LINES = 60;

export type WriteAction = 'created' | 'modified';

export interface WriteOutcome {
  path: string;
  canonicalPath: string;
  action: WriteAction;
  chars: number;
}

export interface EditOutcome {
  path: string;
  canonicalPath: string;
}

export class MutationExecutor {
  constructor(
    private readonly guard: PathAccessGuard,
    private readonly context: SessionContext,
  ) {}

  async write(target: string, content: string): Promise<ToolResult<WriteOutcome>> {
    const verdict = this.authorize(target);
    if (verdict.status === 'deny') {
      return denied(target, verdict);
    }
    const file = verdict.canonicalPath;

    let previous: string | undefined;
    try {
      previous = await readFile(file, 'utf-8');
    } catch (err) {
      if (!isNotFoundError(err)) {
        this.context.logger.debug(`could not read previous content of ${file}: ${describeCause(err)}`);
      }
    }

    try {
      await mkdir(path.dirname(file), { recursive: true });
      await writeDurably(file, content);
    } catch (err) {
      return fsFailure(file, err, 'write');
    }

    const audit = this.context.audit;
    audit.emit('write', `Writing ${content.length} chars to ${file}`);
    if (previous !== undefined && previous !== content) {
      audit.emitBlock(
        'diff',
        `PATCH ${target}`,
        unifiedDiff(previous, content, `a/${target}`, `b/${target}`),
        AUDIT_BLOCK_LINES,
      );
    } else {
      audit.emitBlock('code', `NEW ${target} (${content.length} chars)`, content, AUDIT_BLOCK_LINES);
    }

    const action: WriteAction = previous !== undefined ? 'modified' : 'created';
    audit.emit('file_change', `path=${file} action=${action}`);

    return ok({ path: target, canonicalPath: file, action, chars: content.length });
  }

  /**
   * Replace the single occurrence of `oldString`. Zero or several
   * occurrences, or an empty `oldString`, leave the file untouched.
   */
  async edit(target: string, oldString: string, newString: string): Promise<ToolResult<EditOutcome>> {
    const verdict = this.authorize(target);
    if (verdict.status === 'deny') {
      return denied(target, verdict);
    }
    const file = verdict.canonicalPath;

    if (oldString === '') {
      return fail({
        kind: 'ambiguous_edit',
        path: target,
        occurrences: 0,
        message: `old_string must not be empty (editing ${target})`,
      });
    }

    let content: string;
    try {
      content = await readFile(file, 'utf-8');
    } catch (err) {
      return fsFailure(file, err);
    }

    const occurrences = content.split(oldString).length - 1;
    if (occurrences === 0) {
      return fail({
        kind: 'ambiguous_edit',
        path: target,
        occurrences,
        message: `old_string not found in ${target}`,
      });
    }
    if (occurrences > 1) {
      return fail({
        kind: 'ambiguous_edit',
        path: target,
        occurrences,
        message: `old_string found ${occurrences} times in ${target}. Provide more context to make it unique.`,
      });
    }

    const index = content.indexOf(oldString);
    const updated = content.slice(0, index) + newString + content.slice(index + oldString.length);
    try {
      await writeDurably(file, updated);
    } catch (err) {
      return fsFailure(file, err, 'write');
    }

    const audit = this.context.audit;
    audit.emitBlock(
      'diff',
      `EDIT ${target}`,
      unifiedDiff(content, updated, `a/${target}`, `b/${target}`),
      AUDIT_BLOCK_LINES,
    );
    audit.emit('file_change', `path=${file} action=edited`);

    return ok({ path: target, canonicalPath: file });
  }

  private authorize(target: string): WriteVerdict {
    const verdict = this.guard.checkWrite(target);
    this.context.recordDecision(verdict.canonicalPath, this.guard.toDecision(verdict));
    return verdict;
  }
}

function denied<T>(target: string, verdict: Extract<WriteVerdict, { status: 'deny' }>): ToolResult<T> {
  return fail({
    kind: 'policy_denied',
    path: target,
    reason: verdict.reason,
    message: verdict.message,
    permitted: verdict.permitted,
  });
}

/**
 * Write, flush to stable storage, close.
 */
async function writeDurably(file: string, content: string): Promise<void> {
  const handle = await open(file, 'w');
  try {
    await handle.writeFile(content, 'utf-8');
    await handle.sync();
  } finally {
    await handle.close();
  }
}

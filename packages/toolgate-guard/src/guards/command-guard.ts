/**
 * @toolgate/guard - Command Guard
 *
 * Classifies a shell command as allowed or blocked before it runs.
 */

import { clip, noopAuditSink, silentLogger, type AuditSink, type Logger } from '@toolgate/core';
import { parse as parseShellCommand, type ParseEntry } from 'shell-quote';

import { STATE_DIR } from '../config.js';
import type { BlocklistRule, CommandVerdict, SafeOverride } from '../types.js';

import { canonicalize, findProtectedSegment, isStrictlyInside } from './canonical.js';
import { SAFE_OVERRIDES, buildBlocklist } from './command-rules.js';
import { BaseGuard } from './types.js';

export interface CommandGuardOptions {
  rules?: BlocklistRule[];
  overrides?: readonly SafeOverride[];
  /** State directories the blocklist protects */
  protectedDirs?: readonly string[];
  audit?: AuditSink;
  logger?: Logger;
}

/**
 * CommandGuard - pattern blocklist with scoped overrides
 *
 * Order is fixed: safe overrides, then the project-scoped delete check,
 * then the blocklist. A command matching an override is allowed even if it
 * also matches a rule.
 */
export class CommandGuard extends BaseGuard {
  private readonly rules: BlocklistRule[];
  private readonly overrides: readonly SafeOverride[];
  private readonly protectedDirs: readonly string[];
  private readonly audit: AuditSink;
  private readonly logger: Logger;

  constructor(options: CommandGuardOptions = {}) {
    super();
    this.protectedDirs = options.protectedDirs ?? [STATE_DIR];
    this.rules = options.rules ?? buildBlocklist(this.protectedDirs);
    this.overrides = options.overrides ?? SAFE_OVERRIDES;
    this.audit = options.audit ?? noopAuditSink;
    this.logger = options.logger ?? silentLogger;
  }

  name(): string {
    return 'command_guard';
  }

  evaluate(command: string, workdir?: string): CommandVerdict {
    const override = this.overrides.find(o => o.pattern.test(command));
    if (override) {
      this.logger.debug(`command allowed by override ${override.id}`);
      return { status: 'allowed', override };
    }

    const scopedDelete = workdir !== undefined && this.isProjectScopedDelete(command, workdir);

    for (const rule of this.rules) {
      if (scopedDelete && rule.scopedDeleteExempt) continue;
      if (rule.pattern.test(command)) {
        this.audit.emit(
          'warning',
          `BLOCKED dangerous command: ${clip(command)}`,
          this.deny(rule.id, rule.description, rule.severity),
        );
        return { status: 'blocked', rule };
      }
    }

    return scopedDelete ? { status: 'allowed', scopedDelete } : { status: 'allowed' };
  }

  /**
   * `rm -r...` whose every target, across every `rm` in the command,
   * resolves strictly inside `workdir` and outside any protected directory.
   * Targets starting with `~` or `$`, and commands with substitutions,
   * cannot be resolved statically and fail the check.
   */
  isProjectScopedDelete(command: string, workdir: string): boolean {
    if (!/\brm\s+-[^\s]*r/.test(command) || /`|\$\(/.test(command)) {
      return false;
    }

    let tokens: ParseEntry[];
    try {
      tokens = parseShellCommand(command, key => `$${key}`);
    } catch (err) {
      this.logger.debug(`could not tokenize command: ${String(err)}`);
      return false;
    }

    const invocations = rmInvocations(tokens);
    if (invocations.length === 0 || invocations.some(targets => targets.length === 0)) {
      return false;
    }

    const root = canonicalize(workdir);
    return invocations.flat().every(target => {
      if (target.startsWith('~') || target.startsWith('$')) {
        return false;
      }
      const resolved = canonicalize(target, root);
      return isStrictlyInside(resolved, root) && findProtectedSegment(resolved, this.protectedDirs) === null;
    });
  }
}

/**
 * Target lists of each `rm` invocation in a token stream.
 */
function rmInvocations(tokens: readonly ParseEntry[]): string[][] {
  const invocations: string[][] = [];
  let targets: string[] | null = null;
  for (const token of tokens) {
    const word = tokenWord(token);
    if (word === null) {
      targets = null;
    } else if (targets === null) {
      if (word === 'rm' || word.endsWith('/rm')) {
        targets = [];
        invocations.push(targets);
      }
    } else if (!word.startsWith('-')) {
      targets.push(word);
    }
  }
  return invocations;
}

/**
 * Word text of a token, or null at a separator, redirect or comment.
 */
function tokenWord(token: ParseEntry): string | null {
  if (typeof token === 'string') {
    return token;
  }
  if ('comment' in token) {
    return null;
  }
  return token.op === 'glob' ? token.pattern : null;
}

/**
 * @toolgate/guard - Path Access Guard
 *
 * Decides whether a write or edit to a path is permitted.
 */

import path from 'node:path';

import { noopAuditSink, type AuditSink, type Decision } from '@toolgate/core';

import type { PolicyConfig, WriteVerdict } from '../types.js';

import { canonicalize, findProtectedSegment, isStrictlyInside } from './canonical.js';
import { matchTestPattern } from './test-patterns.js';
import { BaseGuard } from './types.js';

export interface PathAccessGuardOptions {
  audit?: AuditSink;
}

/**
 * PathAccessGuard - layered write permission
 *
 * Checks run in a fixed order and the first deny wins: protected state
 * directories, explicitly denied files, test-file conventions, then the
 * ownership allowlist. A symlink is judged by its target.
 */
export class PathAccessGuard extends BaseGuard {
  private readonly audit: AuditSink;

  constructor(
    private readonly policy: PolicyConfig,
    options: PathAccessGuardOptions = {},
  ) {
    super();
    this.audit = options.audit ?? noopAuditSink;
  }

  name(): string {
    return 'path_access';
  }

  canonicalize(target: string): string {
    return canonicalize(target, this.policy.root);
  }

  checkWrite(target: string): WriteVerdict {
    const policy = this.policy;
    const canonicalPath = this.canonicalize(target);

    const literal = path.resolve(policy.root, target);
    const protectedDir =
      findProtectedSegment(literal, policy.protectedDirs) ?? findProtectedSegment(canonicalPath, policy.protectedDirs);
    if (protectedDir) {
      const message =
        `Write to ${target} denied: this path is inside the ${protectedDir}/ directory, ` +
        'which holds the agent\'s internal state.';
      this.audit.emit(
        'warning',
        `BLOCKED write to internal state path: ${target}`,
        this.deny('protected_dir', message, 'critical'),
      );
      return { status: 'deny', canonicalPath, reason: 'protected_dir', message };
    }

    if (policy.deniedFiles.has(canonicalPath)) {
      return {
        status: 'deny',
        canonicalPath,
        reason: 'explicitly_denied',
        message: `Write to ${canonicalPath} denied: file is explicitly denied (read-only file for this agent).`,
      };
    }

    if (policy.denyTestPatterns) {
      const pattern = matchTestPattern(this.relativeToRoot(canonicalPath));
      if (pattern) {
        return {
          status: 'deny',
          canonicalPath,
          reason: 'test_pattern',
          message:
            `Write to ${canonicalPath} denied: matches test file pattern ${pattern}. ` +
            'Test files are read-only for this agent.',
        };
      }
    }

    if (policy.ownership.kind === 'unrestricted') {
      return { status: 'permit', canonicalPath };
    }

    if (policy.ownership.paths.has(canonicalPath)) {
      return { status: 'permit', canonicalPath };
    }

    const permitted = [...policy.ownership.paths].sort();
    return {
      status: 'deny',
      canonicalPath,
      reason: 'not_owned',
      permitted,
      message:
        `Write to ${canonicalPath} denied: this file is owned by another module. ` +
        'Do NOT attempt to modify files outside your ownership. ' +
        `Instead, write your implementation into YOUR files: ${JSON.stringify(permitted)}`,
    };
  }

  /**
   * Audit-trail decision for a verdict.
   */
  toDecision(verdict: WriteVerdict): Decision {
    if (verdict.status === 'permit') {
      return this.allow();
    }
    return this.deny(verdict.reason, verdict.message, verdict.reason === 'protected_dir' ? 'critical' : 'high');
  }

  /** Test conventions apply to the part of the path below the root. */
  private relativeToRoot(canonicalPath: string): string {
    return isStrictlyInside(canonicalPath, this.policy.root)
      ? path.relative(this.policy.root, canonicalPath)
      : canonicalPath;
  }
}

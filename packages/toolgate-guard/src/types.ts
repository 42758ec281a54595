/**
 * @toolgate/guard - Type Definitions
 *
 * Policy, quota and verdict types shared by the guards, the executors and
 * the tool surface.
 */

import type { LogLevel, PolicyDenyReason } from '@toolgate/core';

// ============================================================
// Policy
// ============================================================

/**
 * Who may be written to. `unrestricted` permits any path that survives the
 * deny checks; `restricted` permits exactly the listed canonical paths, so an
 * empty set denies every write.
 */
export type Ownership =
  | { kind: 'unrestricted' }
  | { kind: 'restricted'; paths: ReadonlySet<string> };

/**
 * Write-permission configuration for one agent-role session. Built once by
 * `createPolicyConfig` and frozen; every path in it is canonical.
 */
export interface PolicyConfig {
  /** Canonical project root */
  readonly root: string;
  readonly ownership: Ownership;
  readonly deniedFiles: ReadonlySet<string>;
  readonly denyTestPatterns: boolean;
  /** Directory names whose contents are never writable */
  readonly protectedDirs: readonly string[];
}

/**
 * Role policy as written in YAML, before canonicalization.
 */
export interface RolePolicy {
  version?: string;
  extends?: string;
  /** Absent or null means unrestricted; an empty list denies every write */
  owned_files?: string[] | null;
  denied_files?: string[];
  deny_test_patterns?: boolean;
  protected_dirs?: string[];
}

export interface PolicyLintResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

// ============================================================
// Quotas
// ============================================================

export interface QuotaConfig {
  /** Largest file `readFile` returns whole */
  readonly maxReadFileSize: number;
  /** Largest file a batch read includes */
  readonly maxBatchFileSize: number;
  /** Most paths a batch read processes */
  readonly maxBatchCount: number;
  /** Most entries a glob listing returns */
  readonly maxGlobResults: number;
  /** Largest slice a line-ranged read returns */
  readonly maxRangeBytes: number;
}

// ============================================================
// Verdicts
// ============================================================

export type BlocklistSeverity = 'high' | 'critical';

export interface BlocklistRule {
  id: string;
  pattern: RegExp;
  description: string;
  severity: BlocklistSeverity;
  /** Rule is lifted when every delete target stays inside the workdir */
  scopedDeleteExempt?: boolean;
}

export interface SafeOverride {
  id: string;
  pattern: RegExp;
  description: string;
}

export type CommandVerdict =
  | { status: 'allowed'; override?: SafeOverride; scopedDelete?: boolean }
  | { status: 'blocked'; rule: BlocklistRule };

export type WriteVerdict =
  | { status: 'permit'; canonicalPath: string }
  | {
      status: 'deny';
      canonicalPath: string;
      reason: PolicyDenyReason;
      message: string;
      /** Sorted owned set, present for `not_owned` */
      permitted?: string[];
    };

// ============================================================
// Configuration
// ============================================================

export interface ToolgateConfig {
  /** Role policy reference: a built-in name or a YAML file path */
  policy?: string;
  logLevel?: LogLevel;
  /** Whether AskUserQuestion may prompt a human */
  interactive?: boolean;
  /** Package install command prefix, e.g. `pip install` */
  installCommand?: string;
  /** Shell command timeout in milliseconds */
  commandTimeoutMs?: number;
  quotas?: Partial<QuotaConfig>;
}

export type ResolvedToolgateConfig = Required<Omit<ToolgateConfig, 'quotas'>> & {
  quotas: QuotaConfig;
};

import { STATE_DIR } from '../config.js';
import { canonicalize } from '../guards/canonical.js';
import type { Ownership, PolicyConfig, RolePolicy } from '../types.js';

export interface PolicyConfigOptions {
  /** Project root; relative paths resolve against it (default: cwd) */
  root?: string;
  /** Null or absent means unrestricted */
  ownedFiles?: readonly string[] | null;
  deniedFiles?: readonly string[];
  denyTestPatterns?: boolean;
  protectedDirs?: readonly string[];
}

/**
 * Build a frozen PolicyConfig, canonicalizing every path once.
 */
export function createPolicyConfig(options: PolicyConfigOptions = {}): PolicyConfig {
  const root = canonicalize(options.root ?? process.cwd());
  const toCanonicalSet = (paths: readonly string[]): ReadonlySet<string> =>
    new Set(paths.map(p => canonicalize(p, root)));

  const ownership: Ownership =
    options.ownedFiles === undefined || options.ownedFiles === null
      ? { kind: 'unrestricted' }
      : { kind: 'restricted', paths: toCanonicalSet(options.ownedFiles) };

  return Object.freeze({
    root,
    ownership: Object.freeze(ownership),
    deniedFiles: toCanonicalSet(options.deniedFiles ?? []),
    denyTestPatterns: options.denyTestPatterns ?? false,
    protectedDirs: Object.freeze([...(options.protectedDirs ?? [STATE_DIR])]),
  });
}

/**
 * Compile a loaded role policy against a project root.
 */
export function compilePolicy(policy: RolePolicy, root?: string): PolicyConfig {
  return createPolicyConfig({
    root,
    ownedFiles: policy.owned_files,
    deniedFiles: policy.denied_files,
    denyTestPatterns: policy.deny_test_patterns,
    protectedDirs: policy.protected_dirs,
  });
}

/**
 * Plain-object view of a PolicyConfig for display.
 */
export function describePolicyConfig(config: PolicyConfig): Record<string, unknown> {
  return {
    root: config.root,
    owned_files: config.ownership.kind === 'unrestricted' ? null : [...config.ownership.paths].sort(),
    denied_files: [...config.deniedFiles].sort(),
    deny_test_patterns: config.denyTestPatterns,
    protected_dirs: [...config.protectedDirs],
  };
}

import type { PolicyLintResult } from '../types.js';

export const POLICY_SCHEMA_VERSION = 'toolgate-v1';

const POLICY_KEYS = new Set([
  'version',
  'extends',
  'owned_files',
  'denied_files',
  'deny_test_patterns',
  'protected_dirs',
]);

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function ensureStringArray(value: unknown, field: string, errors: string[]): string[] | undefined {
  if (value === undefined) return undefined;
  if (!Array.isArray(value)) {
    errors.push(`${field} must be an array of strings`);
    return undefined;
  }
  const out: string[] = [];
  value.forEach((item: unknown, i) => {
    if (typeof item !== 'string') {
      errors.push(`${field}[${i}] must be a string`);
      return;
    }
    if (item.includes('\u0000')) {
      errors.push(`${field}[${i}] contains a null byte`);
      return;
    }
    if (item.trim() === '') {
      errors.push(`${field}[${i}] must not be empty`);
      return;
    }
    out.push(item);
  });
  return out;
}

export function validatePolicy(policy: unknown): PolicyLintResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!isPlainObject(policy)) {
    return { valid: false, errors: ['Policy must be an object'], warnings: [] };
  }

  for (const key of Object.keys(policy)) {
    if (!POLICY_KEYS.has(key)) {
      errors.push(`policy contains unknown field: ${key}`);
    }
  }

  const version = policy.version;
  if (version === undefined) {
    errors.push(`version is required (expected: ${POLICY_SCHEMA_VERSION})`);
  } else if (typeof version !== 'string') {
    errors.push('version must be a string');
  } else if (version !== POLICY_SCHEMA_VERSION) {
    errors.push(`unsupported policy version: ${version} (supported: ${POLICY_SCHEMA_VERSION})`);
  }

  if (policy.extends !== undefined && typeof policy.extends !== 'string') {
    errors.push('extends must be a string');
  }

  const owned = policy.owned_files === null ? undefined : ensureStringArray(policy.owned_files, 'owned_files', errors);
  if (owned && owned.length === 0) {
    warnings.push('owned_files is empty: every write will be denied');
  }

  const denied = ensureStringArray(policy.denied_files, 'denied_files', errors);

  if (policy.deny_test_patterns !== undefined && typeof policy.deny_test_patterns !== 'boolean') {
    errors.push('deny_test_patterns must be a boolean');
  }

  const protectedDirs = ensureStringArray(policy.protected_dirs, 'protected_dirs', errors);
  for (const dir of protectedDirs ?? []) {
    if (dir.includes('/')) {
      errors.push(`protected_dirs entries are directory names, not paths: ${dir}`);
    }
  }
  if (protectedDirs && protectedDirs.length === 0) {
    warnings.push('protected_dirs is empty: the internal state directory is writable');
  }

  if (owned && denied) {
    const overlap = owned.filter(p => denied.includes(p));
    for (const p of overlap) {
      warnings.push(`${p} is both owned and denied; the denial wins`);
    }
  }

  return { valid: errors.length === 0, errors, warnings };
}

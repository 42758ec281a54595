import { readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { load as loadYaml } from 'js-yaml';

import { resolveBuiltinPolicy } from '../config.js';
import type { RolePolicy } from '../types.js';

import { validatePolicy } from './validator.js';

const RULESETS_DIR = fileURLToPath(new URL('../../rulesets/', import.meta.url));

export class PolicyLoadError extends Error {
  readonly cause?: unknown;

  constructor(message: string, opts?: { cause?: unknown }) {
    super(message);
    this.name = 'PolicyLoadError';
    this.cause = opts?.cause;
  }
}

type PolicyRecord = Record<string, unknown>;

function isPlainObject(value: unknown): value is PolicyRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isBuiltinRef(ref: string): string | null {
  if (!ref) return null;
  if (ref.startsWith('toolgate:')) return ref;
  const candidate = `toolgate:${ref}`;
  return resolveBuiltinPolicy(candidate) ? candidate : null;
}

function deepMerge(base: PolicyRecord, overlay: PolicyRecord): PolicyRecord {
  const out: PolicyRecord = { ...base };

  for (const [key, value] of Object.entries(overlay)) {
    if (value === undefined) continue;

    const existing = out[key];
    if (isPlainObject(existing) && isPlainObject(value)) {
      out[key] = deepMerge(existing, value);
      continue;
    }

    // Arrays, scalars and null replace.
    out[key] = value;
  }

  return out;
}

/**
 * Narrow a validated record to a RolePolicy.
 */
function toRolePolicy(record: PolicyRecord): RolePolicy {
  const report = validatePolicy(record);
  if (!report.valid) {
    throw new PolicyLoadError(`Policy validation failed:\n- ${report.errors.join('\n- ')}`);
  }

  const policy: RolePolicy = {};
  if (typeof record.version === 'string') policy.version = record.version;
  if (typeof record.extends === 'string') policy.extends = record.extends;
  if (record.owned_files === null) policy.owned_files = null;
  else if (isStringArray(record.owned_files)) policy.owned_files = record.owned_files;
  if (isStringArray(record.denied_files)) policy.denied_files = record.denied_files;
  if (typeof record.deny_test_patterns === 'boolean') policy.deny_test_patterns = record.deny_test_patterns;
  if (isStringArray(record.protected_dirs)) policy.protected_dirs = record.protected_dirs;
  return policy;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(v => typeof v === 'string');
}

export function loadPolicyFromString(content: string): RolePolicy {
  return toRolePolicy(parseYamlObject(content));
}

function readPolicyFile(policyPath: string): string {
  try {
    return readFileSync(policyPath, 'utf-8');
  } catch (err) {
    throw new PolicyLoadError(`Failed to read policy file: ${policyPath}`, { cause: err });
  }
}

function resolvePolicyRef(ref: string, baseDir?: string): { id: string; content: string; baseDir?: string } {
  const builtin = isBuiltinRef(ref);
  if (builtin) {
    const fileName = resolveBuiltinPolicy(builtin);
    if (!fileName) {
      throw new PolicyLoadError(`Unknown built-in policy: ${builtin}`);
    }

    const filePath = path.join(RULESETS_DIR, fileName);
    return { id: `builtin:${builtin}`, content: readPolicyFile(filePath) };
  }

  const resolvedPath = baseDir ? path.resolve(baseDir, ref) : path.resolve(ref);
  return {
    id: `file:${resolvedPath}`,
    content: readPolicyFile(resolvedPath),
    baseDir: path.dirname(resolvedPath),
  };
}

function loadPolicyRecursive(ref: string, stack: string[], baseDir?: string): PolicyRecord {
  const resolved = resolvePolicyRef(ref, baseDir);

  if (stack.includes(resolved.id)) {
    throw new PolicyLoadError(`Circular policy extends detected: ${[...stack, resolved.id].join(' -> ')}`);
  }

  const record = parseYamlObject(resolved.content);
  const extendsRef = typeof record.extends === 'string' ? record.extends.trim() : undefined;
  if (!extendsRef) {
    return record;
  }

  // Built-in policies resolve relative extends from the working directory.
  const parent = loadPolicyRecursive(extendsRef, [...stack, resolved.id], resolved.baseDir);
  return deepMerge(parent, { ...record, extends: undefined });
}

/**
 * Load a role policy by built-in name (`toolgate:implementer`) or file
 * path, following `extends` chains. Children override their parents key by
 * key; lists replace rather than concatenate.
 */
export function loadPolicy(ref: string): RolePolicy {
  if (!ref) {
    throw new PolicyLoadError('Policy reference must be non-empty');
  }

  return toRolePolicy(loadPolicyRecursive(ref, []));
}

function parseYamlObject(content: string): PolicyRecord {
  let parsed: unknown;
  try {
    parsed = loadYaml(content);
  } catch (err) {
    throw new PolicyLoadError('Failed to parse policy YAML', { cause: err });
  }

  if (!isPlainObject(parsed)) {
    throw new PolicyLoadError('Policy must be a YAML mapping/object');
  }

  return parsed;
}

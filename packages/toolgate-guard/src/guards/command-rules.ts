import type { BlocklistRule, SafeOverride } from '../types.js';

/**
 * Destructive command shapes, matched against the full command string in
 * order. The first match blocks the command.
 */
const BASE_RULES: BlocklistRule[] = [
  {
    id: 'rm-recursive-force',
    pattern: /\brm\s+-[^\s]*r[^\s]*f/i,
    description: 'recursive forced delete (rm -rf)',
    severity: 'critical',
    scopedDeleteExempt: true,
  },
  {
    id: 'rm-force-recursive',
    pattern: /\brm\s+-[^\s]*f[^\s]*r/i,
    description: 'recursive forced delete (rm -fr)',
    severity: 'critical',
    scopedDeleteExempt: true,
  },
  {
    id: 'mkfs',
    pattern: /\bmkfs\b/i,
    description: 'filesystem creation',
    severity: 'critical',
  },
  {
    id: 'dd',
    pattern: /\bdd\s+/i,
    description: 'raw block copy (dd)',
    severity: 'critical',
  },
  {
    id: 'chmod-777',
    pattern: /\bchmod\s+777\b/i,
    description: 'world-writable permissions',
    severity: 'high',
  },
  {
    id: 'chmod-recursive-777',
    pattern: /\bchmod\s+-R\s+777\b/i,
    description: 'recursive world-writable permissions',
    severity: 'high',
  },
  {
    id: 'raw-device-write',
    pattern: />\s*\/dev\/(?:sd[a-z]|nvme\d|hd[a-z]|disk\d)/i,
    description: 'redirect onto a raw disk device',
    severity: 'critical',
  },
  {
    id: 'fork-bomb',
    pattern: /:\s*\(\s*\)\s*\{\s*:\s*\|\s*:\s*&\s*\}\s*;\s*:/,
    description: 'fork bomb',
    severity: 'critical',
  },
  {
    id: 'curl-pipe-shell',
    pattern: /\bcurl\b.*\|\s*(?:bash|sh|zsh)\b/i,
    description: 'remote script piped to a shell (curl)',
    severity: 'critical',
  },
  {
    id: 'wget-pipe-shell',
    pattern: /\bwget\b.*\|\s*(?:bash|sh|zsh)\b/i,
    description: 'remote script piped to a shell (wget)',
    severity: 'critical',
  },
];

/**
 * Scoped operations that look destructive to the blocklist but only touch
 * what `find` matched. Checked before any rule.
 */
export const SAFE_OVERRIDES: readonly SafeOverride[] = [
  {
    id: 'find-exec-rm',
    pattern: /\bfind\b\s+.+-exec\s+rm\b/,
    description: 'find ... -exec rm',
  },
  {
    id: 'find-delete',
    pattern: /\bfind\b\s+.+-delete\b/,
    description: 'find ... -delete',
  },
  {
    id: 'find-name-delete',
    pattern: /\bfind\b\s+.+-name\b.*-delete\b/,
    description: "find . -name '...' -delete",
  },
  {
    id: 'find-type-exec-rm',
    pattern: /\bfind\b\s+.+-type\s+\w\s+-exec\s+rm/,
    description: 'find ... -type x -exec rm',
  },
];

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Rules guarding one state directory against direct access and writes.
 */
export function stateDirRules(dir: string): BlocklistRule[] {
  const d = `${escapeRegExp(dir)}\\b`;
  const rule = (id: string, source: string, description: string): BlocklistRule => ({
    id: `${id}:${dir}`,
    pattern: new RegExp(source),
    description: `${description} ${dir}/`,
    severity: 'critical',
  });

  return [
    rule('state-sqlite', `\\bsqlite3\\s+.*${d}`, 'sqlite3 access to'),
    rule('state-redirect', `>+\\s*[^\\s]*${d}`, 'redirect into'),
    rule('state-tee', `\\btee\\b.*${d}`, 'tee into'),
    rule('state-mv', `\\bmv\\b.*${d}`, 'mv involving'),
    rule('state-cp', `\\bcp\\b.*${d}`, 'cp involving'),
    rule('state-rm', `\\brm\\b.*${d}`, 'rm inside'),
    rule('state-truncate', `\\btruncate\\b.*${d}`, 'truncate inside'),
    rule('state-cat-redirect', `\\bcat\\b.*>.*${d}`, 'cat redirect into'),
  ];
}

/**
 * Full ordered blocklist for a set of protected state directories.
 */
export function buildBlocklist(protectedDirs: readonly string[]): BlocklistRule[] {
  return [...BASE_RULES, ...protectedDirs.flatMap(stateDirRules)];
}

import { lstatSync, readlinkSync, realpathSync } from 'node:fs';
import path from 'node:path';

import { isNotFoundError } from '@toolgate/core';

/** Dangling links followed before giving up on a path */
const MAX_LINK_HOPS = 40;

/**
 * Canonical form of a path: symlinks resolved, `.` and `..` collapsed,
 * absolute. A path that does not exist yet is canonicalized through its
 * nearest existing ancestor, so `link/new.txt` and `target/new.txt` agree.
 * A dangling symlink resolves to the path it would create.
 *
 * Paths that cannot be resolved (a symlink loop, an unreadable parent)
 * come back absolute but unresolved; opening them fails the same way.
 */
export function canonicalize(target: string, base: string = process.cwd()): string {
  return resolveFrom(path.resolve(base, target), 0);
}

function resolveFrom(absolute: string, hops: number): string {
  const missing: string[] = [];
  let current = absolute;

  for (;;) {
    try {
      const real = realpathSync(current);
      return missing.length > 0 ? path.join(real, ...[...missing].reverse()) : real;
    } catch (err) {
      if (isNotFoundError(err)) {
        const link = readDanglingLink(current);
        if (link !== null) {
          if (hops >= MAX_LINK_HOPS) return absolute;
          return resolveFrom(path.resolve(path.dirname(current), link, ...[...missing].reverse()), hops + 1);
        }
      } else if (!isNotDirectoryError(err)) {
        return absolute;
      }
      const parent = path.dirname(current);
      if (parent === current) {
        return absolute;
      }
      missing.push(path.basename(current));
      current = parent;
    }
  }
}

function readDanglingLink(file: string): string | null {
  try {
    return lstatSync(file).isSymbolicLink() ? readlinkSync(file) : null;
  } catch {
    return null;
  }
}

/**
 * Whether `child` lies strictly inside `dir`. Both must be canonical.
 */
export function isStrictlyInside(child: string, dir: string): boolean {
  const prefix = dir.endsWith(path.sep) ? dir : dir + path.sep;
  return child.startsWith(prefix) && child.length > prefix.length;
}

/**
 * Name of the first protected directory `target` passes through, if any.
 */
export function findProtectedSegment(target: string, protectedDirs: readonly string[]): string | null {
  if (protectedDirs.length === 0) return null;
  const segments = target.split(path.sep);
  for (const segment of segments) {
    if (protectedDirs.includes(segment)) {
      return segment;
    }
  }
  return null;
}

function isNotDirectoryError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOTDIR';
}

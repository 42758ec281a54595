import path from 'node:path';

import { minimatch } from 'minimatch';

/**
 * File-name conventions that mark a test file, matched on the basename.
 */
const TEST_FILE_GLOBS = [
  'test_*',
  '*_test.*',
  '*_spec.*',
  '*.test.*',
  '*.spec.*',
  'conftest.py',
  'Test[A-Z]*.java',
];

/**
 * Directory names whose contents are tests.
 */
const TEST_DIR_NAMES = new Set(['tests', 'test', 'spec', '__tests__']);

/**
 * Returns the convention `target` matches (e.g. `test_*` or `tests/`), or
 * null. `target` is a canonical path, or a path relative to the project root.
 */
export function matchTestPattern(target: string): string | null {
  const segments = target.split(path.sep).filter(Boolean);
  const basename = segments.pop();
  if (!basename) return null;

  for (const glob of TEST_FILE_GLOBS) {
    if (minimatch(basename, glob, { dot: true })) {
      return glob;
    }
  }

  for (const dir of segments) {
    if (TEST_DIR_NAMES.has(dir)) {
      return `${dir}/`;
    }
  }

  return null;
}

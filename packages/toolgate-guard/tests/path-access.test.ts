/**
 * @toolgate/guard - Path Access Guard Tests
 */

import { mkdirSync, mkdtempSync, realpathSync, rmSync, symlinkSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { InMemoryAuditSink } from '@toolgate/core';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { PathAccessGuard } from '../src/guards/path-access.js';
import { matchTestPattern } from '../src/guards/test-patterns.js';
import { createPolicyConfig } from '../src/policy/policy-config.js';

describe('PathAccessGuard', () => {
  let root: string;

  beforeEach(() => {
    root = realpathSync(mkdtempSync(join(tmpdir(), 'toolgate-path-')));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  describe('restricted ownership', () => {
    let guard: PathAccessGuard;
    let audit: InMemoryAuditSink;

    beforeEach(() => {
      audit = new InMemoryAuditSink();
      guard = new PathAccessGuard(
        createPolicyConfig({
          root,
          ownedFiles: ['src/app.py', '.toolgate/notes.md'],
          deniedFiles: ['setup.cfg'],
          denyTestPatterns: true,
        }),
        { audit },
      );
    });

    it('should have correct name', () => {
      expect(guard.name()).toBe('path_access');
    });

    it('should permit owned files', () => {
      expect(guard.checkWrite('src/app.py')).toEqual({ status: 'permit', canonicalPath: join(root, 'src/app.py') });
    });

    it('should list the owned set when denying other files', () => {
      const verdict = guard.checkWrite('src/other.py');
      const permitted = [join(root, '.toolgate/notes.md'), join(root, 'src/app.py')];
      expect(verdict).toEqual({
        status: 'deny',
        canonicalPath: join(root, 'src/other.py'),
        reason: 'not_owned',
        permitted,
        message:
          `Write to ${join(root, 'src/other.py')} denied: this file is owned by another module. ` +
          'Do NOT attempt to modify files outside your ownership. ' +
          `Instead, write your implementation into YOUR files: ${JSON.stringify(permitted)}`,
      });
    });

    it('should deny explicitly denied files', () => {
      const verdict = guard.checkWrite('setup.cfg');
      expect(verdict.status === 'deny' && verdict.reason).toBe('explicitly_denied');
      expect(verdict.status === 'deny' && verdict.message).toBe(
        `Write to ${join(root, 'setup.cfg')} denied: file is explicitly denied (read-only file for this agent).`,
      );
    });

    it('should deny test files by name', () => {
      const verdict = guard.checkWrite('tests/test_app.py');
      expect(verdict.status === 'deny' && verdict.message).toBe(
        `Write to ${join(root, 'tests/test_app.py')} denied: matches test file pattern test_*. ` +
          'Test files are read-only for this agent.',
      );
    });

    it('should deny files under test directories', () => {
      const verdict = guard.checkWrite('tests/helpers.py');
      expect(verdict.status === 'deny' && verdict.reason).toBe('test_pattern');
      expect(verdict.status === 'deny' && verdict.message).toContain('matches test file pattern tests/.');
    });

    it('should deny the state directory even for owned files', () => {
      const verdict = guard.checkWrite('.toolgate/notes.md');
      expect(verdict).toEqual({
        status: 'deny',
        canonicalPath: join(root, '.toolgate/notes.md'),
        reason: 'protected_dir',
        message:
          "Write to .toolgate/notes.md denied: this path is inside the .toolgate/ directory, which holds the agent's internal state.",
      });
    });

    it('should audit state directory writes as warnings', () => {
      guard.checkWrite('.toolgate/state.json');

      const [record] = audit.records();
      expect(record?.kind).toBe('warning');
      expect(record?.message).toBe('BLOCKED write to internal state path: .toolgate/state.json');
      expect(record?.decision?.status).toBe('deny');
      expect(record?.decision?.reason).toBe('protected_dir');
      expect(record?.decision?.severity).toBe('critical');
    });

    it('should judge a symlink by its target', () => {
      mkdirSync(join(root, 'src'));
      writeFileSync(join(root, 'src/app.py'), '');
      symlinkSync(join(root, 'src/app.py'), join(root, 'alias.py'));

      expect(guard.checkWrite('alias.py')).toEqual({ status: 'permit', canonicalPath: join(root, 'src/app.py') });
    });

    it('should deny a symlink into the state directory', () => {
      mkdirSync(join(root, '.toolgate'));
      symlinkSync(join(root, '.toolgate'), join(root, 'state-link'));

      const verdict = guard.checkWrite('state-link/data.json');
      expect(verdict.status === 'deny' && verdict.reason).toBe('protected_dir');
      expect(verdict.canonicalPath).toBe(join(root, '.toolgate/data.json'));
    });

    it('should judge a dangling symlink by the file it would create', () => {
      mkdirSync(join(root, 'src'));
      symlinkSync(join(root, 'tests/test_app.py'), join(root, 'src/helper.py'));

      const verdict = guard.checkWrite('src/helper.py');
      expect(verdict.status === 'deny' && verdict.reason).toBe('test_pattern');
      expect(verdict.canonicalPath).toBe(join(root, 'tests/test_app.py'));
    });

    it('should follow relative dangling symlinks to denied files', () => {
      symlinkSync('setup.cfg', join(root, 'alias.cfg'));

      const verdict = guard.checkWrite('alias.cfg');
      expect(verdict.status === 'deny' && verdict.reason).toBe('explicitly_denied');
      expect(verdict.canonicalPath).toBe(join(root, 'setup.cfg'));
    });

    it('should leave a symlink loop unresolved', () => {
      symlinkSync(join(root, 'b'), join(root, 'a'));
      symlinkSync(join(root, 'a'), join(root, 'b'));

      expect(guard.checkWrite('a')).toMatchObject({ status: 'deny', reason: 'not_owned', canonicalPath: join(root, 'a') });
    });

    it('should turn verdicts into audit decisions', () => {
      expect(guard.toDecision(guard.checkWrite('src/app.py'))).toEqual({
        status: 'allow',
        guard: 'path_access',
        severity: 'low',
      });
      expect(guard.toDecision(guard.checkWrite('setup.cfg'))).toMatchObject({
        status: 'deny',
        reason: 'explicitly_denied',
        severity: 'high',
      });
    });

    it('should resolve dot segments before checking ownership', () => {
      expect(guard.checkWrite('lib/../src/app.py').status).toBe('permit');
    });
  });

  it('should deny a denied file even when it is owned', () => {
    const guard = new PathAccessGuard(
      createPolicyConfig({ root, ownedFiles: ['setup.cfg', 'src/app.py'], deniedFiles: ['setup.cfg'] }),
    );
    const verdict = guard.checkWrite('setup.cfg');

    expect(verdict.status === 'deny' && verdict.reason).toBe('explicitly_denied');
    expect(guard.checkWrite('src/app.py').status).toBe('permit');
  });

  it('should deny every write when the owned set is empty', () => {
    const guard = new PathAccessGuard(createPolicyConfig({ root, ownedFiles: [] }));
    const verdict = guard.checkWrite('a.py');

    expect(verdict.status === 'deny' && verdict.reason).toBe('not_owned');
    expect(verdict.status === 'deny' && verdict.permitted).toEqual([]);
    expect(verdict.status === 'deny' && verdict.message.endsWith('YOUR files: []')).toBe(true);
  });

  it('should permit any path when ownership is unrestricted', () => {
    const guard = new PathAccessGuard(createPolicyConfig({ root }));

    expect(guard.checkWrite('anything/here.py').status).toBe('permit');
    expect(guard.checkWrite('tests/test_app.py').status).toBe('permit');
    expect(guard.checkWrite('.toolgate/state.json').status).toBe('deny');
  });

  it('should match test conventions below the root only', () => {
    const nested = join(root, 'tests', 'project');
    mkdirSync(nested, { recursive: true });
    const guard = new PathAccessGuard(createPolicyConfig({ root: nested, denyTestPatterns: true }));

    expect(guard.checkWrite('src/app.py').status).toBe('permit');
    expect(guard.checkWrite('spec/app_spec.rb').status).toBe('deny');
  });
});

describe('matchTestPattern', () => {
  it.each([
    ['test_utils.py', 'test_*'],
    ['pkg/utils_test.go', '*_test.*'],
    ['user_spec.rb', '*_spec.*'],
    ['src/app.test.ts', '*.test.*'],
    ['src/app.spec.js', '*.spec.*'],
    ['conftest.py', 'conftest.py'],
    ['src/TestParser.java', 'Test[A-Z]*.java'],
    ['src/__tests__/helpers.js', '__tests__/'],
    ['spec/support/factories.rb', 'spec/'],
  ])('should match %s with %s', (target, pattern) => {
    expect(matchTestPattern(target)).toBe(pattern);
  });

  it.each(['src/testing.py', 'src/contest.py', 'latest.py', 'src/Tester.py'])('should not match %s', target => {
    expect(matchTestPattern(target)).toBeNull();
  });
});

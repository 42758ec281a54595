/**
 * @toolgate/guard - Session Tests
 */

import { mkdtempSync, realpathSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { InMemoryAuditSink, type Logger } from '@toolgate/core';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { ConfigError } from '../src/config.js';
import { createSession } from '../src/session.js';

function createSpyLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('createSession', () => {
  let root: string;

  beforeEach(() => {
    root = realpathSync(mkdtempSync(join(tmpdir(), 'toolgate-session-')));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('should compile the configured policy against the root', () => {
    const toolbox = createSession({ policy: 'toolgate:implementer', interactive: false }, { root, logger: createSpyLogger() });

    expect(toolbox.root).toBe(root);
    expect(toolbox.policy.denyTestPatterns).toBe(true);
    expect(toolbox.context.interactive).toBe(false);
    expect(toolbox.definitions().map(d => d.function.name)).not.toContain('AskUserQuestion');
  });

  it('should send audit events to the logger and extra sinks', async () => {
    const audit = new InMemoryAuditSink();
    const logger = createSpyLogger();
    const toolbox = createSession({ policy: 'toolgate:implementer' }, { root, logger, audit: [audit], role: 'implementer' });

    const result = await toolbox.writeFile('tests/test_app.py', 'x');

    expect(!result.ok && result.error.kind === 'policy_denied' && result.error.reason).toBe('test_pattern');
    expect(toolbox.context.role).toBe('implementer');

    await toolbox.writeFile('src/app.py', 'print(1)\n');
    expect(audit.query({ kind: 'write' })[0]?.message).toBe(`Writing 9 chars to ${join(root, 'src/app.py')}`);
    expect(logger.info).toHaveBeenCalledWith(`{write} Writing 9 chars to ${join(root, 'src/app.py')}`);
  });

  it('should pass quotas through to the toolbox', () => {
    const toolbox = createSession({ quotas: { maxBatchCount: 3 } }, { root, logger: createSpyLogger() });
    expect(toolbox.quotas.maxBatchCount).toBe(3);
  });

  it('should refuse invalid configuration', () => {
    expect(() => createSession({ commandTimeoutMs: -5 }, { root })).toThrow(ConfigError);
    expect(() => createSession({ commandTimeoutMs: -5 }, { root })).toThrow(
      'Invalid toolgate config:\n- commandTimeoutMs must be a positive integer',
    );
  });
});

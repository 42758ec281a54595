/**
 * @toolgate/guard - Toolbox Tests
 */

import { EventEmitter } from 'node:events';
import { mkdtempSync, realpathSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { PassThrough } from 'node:stream';

import { InMemoryAuditSink, createSessionContext } from '@toolgate/core';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

type MockChildProcess = EventEmitter & {
  pid: number;
  stdout: PassThrough;
  stderr: PassThrough;
  kill: (signal: string) => void;
};

const spawnMock = vi.hoisted(() => vi.fn());

vi.mock('node:child_process', () => ({
  spawn: (...args: unknown[]) => spawnMock(...args),
}));

import { createPolicyConfig } from '../src/policy/policy-config.js';
import type { Prompter } from '../src/tools/prompter.js';
import { Toolbox, type ToolboxOptions } from '../src/tools/toolbox.js';

function createMockChildProcess(): MockChildProcess {
  const child = new EventEmitter() as MockChildProcess;
  child.pid = 1234;
  child.stdout = new PassThrough();
  child.stderr = new PassThrough();
  child.kill = vi.fn();
  return child;
}

function stubPrompter(answer: string | Error, available = true): Prompter {
  return {
    isAvailable: () => available,
    ask: vi.fn(async () => {
      if (answer instanceof Error) throw answer;
      return answer;
    }),
  };
}

describe('Toolbox', () => {
  let root: string;
  let audit: InMemoryAuditSink;

  const createToolbox = (options: Partial<ToolboxOptions> = {}, interactive = false): Toolbox =>
    new Toolbox({
      policy: createPolicyConfig({ root }),
      context: createSessionContext({ audit, interactive }),
      env: { PATH: '/usr/bin' },
      ...options,
    });

  beforeEach(() => {
    spawnMock.mockReset();
    root = realpathSync(mkdtempSync(join(tmpdir(), 'toolgate-box-')));
    audit = new InMemoryAuditSink();
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  describe('installPackage', () => {
    it.each(['requests; rm -rf /', '$(whoami)', 'pkg`id`', '-e git+https://example.com/x', ''])(
      'should reject %j without spawning',
      async specifier => {
        const result = await createToolbox({ installCommand: 'pip install' }).installPackage(specifier);

        expect(result).toEqual({
          ok: false,
          error: {
            kind: 'invalid_specifier',
            specifier,
            message: `invalid package name: ${JSON.stringify(specifier)}`,
          },
        });
        expect(spawnMock).not.toHaveBeenCalled();
      },
    );

    it('should refuse when no install command is configured', async () => {
      const result = await createToolbox().installPackage('requests');

      expect(result).toEqual({
        ok: false,
        error: {
          kind: 'not_configured',
          setting: 'installCommand',
          message: 'no install command configured. Cannot install "requests".',
        },
      });
      expect(spawnMock).not.toHaveBeenCalled();
    });

    it('should run the configured install command', async () => {
      const child = createMockChildProcess();
      spawnMock.mockReturnValueOnce(child);

      const pending = createToolbox({ installCommand: 'pip install' }).installPackage('requests');
      child.emit('close', 0, null);

      expect((await pending).ok).toBe(true);
      expect(spawnMock).toHaveBeenCalledWith(
        '/bin/sh',
        ['-c', 'pip install requests'],
        expect.objectContaining({ cwd: root, detached: true }),
      );
      expect(audit.query({ kind: 'package' }).map(r => r.message)).toEqual(['requests']);
    });

    it('should accept extras and version constraints', async () => {
      const child = createMockChildProcess();
      spawnMock.mockReturnValueOnce(child);

      const pending = createToolbox({ installCommand: 'pip install' }).installPackage('requests[socks]>=2.31,<3');
      child.emit('close', 0, null);

      expect((await pending).ok).toBe(true);
      expect(spawnMock).toHaveBeenCalledTimes(1);
    });
  });

  it('should grep through an argument list', async () => {
    const child = createMockChildProcess();
    spawnMock.mockReturnValueOnce(child);

    const pending = createToolbox().grepFiles('TODO', 'src', '*.py');
    child.emit('close', 0, null);
    await pending;

    expect(spawnMock).toHaveBeenCalledWith(
      'grep',
      ['-r', '--include=*.py', '-e', 'TODO', '--', 'src'],
      expect.objectContaining({ cwd: root }),
    );
    expect(audit.query({ kind: 'grep' })[0]?.message).toBe('TODO in src');
  });

  it('should pass a dash-leading pattern as a pattern', async () => {
    const child = createMockChildProcess();
    spawnMock.mockReturnValueOnce(child);

    const pending = createToolbox().grepFiles('-f/etc/hosts');
    child.emit('close', 1, null);
    await pending;

    expect(spawnMock).toHaveBeenCalledWith(
      'grep',
      ['-r', '--include=*', '-e', '-f/etc/hosts', '--', '.'],
      expect.objectContaining({ cwd: root }),
    );
  });

  it('should resolve the Bash workdir against the root', async () => {
    const child = createMockChildProcess();
    spawnMock.mockReturnValueOnce(child);

    const pending = createToolbox().runBash('ls', 'src');
    child.emit('close', 0, null);
    await pending;

    expect(spawnMock).toHaveBeenCalledWith('/bin/sh', ['-c', 'ls'], expect.objectContaining({ cwd: join(root, 'src') }));
    expect(audit.query({ kind: 'bash' })[0]?.message).toBe('ls');
  });

  it('should audit reads', async () => {
    writeFileSync(join(root, 'a.txt'), 'alpha');

    expect(await createToolbox().readFile('a.txt')).toEqual({ ok: true, value: 'alpha' });
    expect(audit.query({ kind: 'read' })[0]?.message).toBe('a.txt');
  });

  it('should read back exactly what was written', async () => {
    const toolbox = createToolbox();
    const content = 'first line\r\nsecond line\n\u00e9t\u00e9\n\n';

    expect((await toolbox.writeFile('src/notes.txt', content)).ok).toBe(true);
    expect(await toolbox.readFile('src/notes.txt')).toEqual({ ok: true, value: content });
  });

  it('should return the same content from repeated reads', async () => {
    writeFileSync(join(root, 'b.txt'), 'one\ntwo\n');
    const toolbox = createToolbox();

    const first = await toolbox.readFile('b.txt');
    const second = await toolbox.readFile('b.txt');

    expect(first).toEqual({ ok: true, value: 'one\ntwo\n' });
    expect(second).toEqual(first);
  });

  describe('askUser', () => {
    it('should answer with the first option in non-interactive sessions', async () => {
      const prompter = stubPrompter('2');
      const toolbox = createToolbox({ prompter });

      expect(await toolbox.askUser('Proceed?', ['a', 'b'])).toEqual({ ok: true, value: 'a' });
      expect(prompter.ask).not.toHaveBeenCalled();
      expect(audit.query({ kind: 'auto' })[0]?.message).toBe('Auto: Proceed? -> a');
    });

    it('should answer yes without options', async () => {
      expect(await createToolbox({ prompter: stubPrompter('no') }).askUser('Proceed?')).toEqual({
        ok: true,
        value: 'yes',
      });
    });

    it('should map a numbered choice to its option', async () => {
      const toolbox = createToolbox({ prompter: stubPrompter('2') }, true);

      expect(await toolbox.askUser('Which?', ['a', 'b'])).toEqual({ ok: true, value: 'b' });
      expect(audit.query({ kind: 'ask' })[0]?.message).toBe('Which?');
    });

    it('should fall back to the first option on an unusable choice', async () => {
      const toolbox = createToolbox({ prompter: stubPrompter('9') }, true);
      expect(await toolbox.askUser('Which?', ['a', 'b'])).toEqual({ ok: true, value: 'a' });
    });

    it('should return a free-form answer', async () => {
      const toolbox = createToolbox({ prompter: stubPrompter('  use sqlite \n') }, true);
      expect(await toolbox.askUser('Which database?')).toEqual({ ok: true, value: 'use sqlite' });
    });

    it('should use the default when nobody is at the terminal', async () => {
      const toolbox = createToolbox({ prompter: stubPrompter('2', false) }, true);

      expect(await toolbox.askUser('Which?', ['a', 'b'])).toEqual({ ok: true, value: 'a' });
      expect(audit.query({ kind: 'auto' })[0]?.message).toBe('Auto (no tty): Which? -> a');
    });

    it('should use the default when the prompt is closed', async () => {
      const toolbox = createToolbox({ prompter: stubPrompter(new Error('closed')) }, true);
      expect(await toolbox.askUser('Which?', ['a', 'b'])).toEqual({ ok: true, value: 'a' });
    });
  });

  it('should offer AskUserQuestion to interactive sessions only', () => {
    const names = (toolbox: Toolbox): string[] => toolbox.definitions().map(d => d.function.name);

    expect(names(createToolbox({}, true))).toContain('AskUserQuestion');
    expect(names(createToolbox({}, false))).not.toContain('AskUserQuestion');
    expect(names(createToolbox({ allowedTools: ['Read', 'Glob'] }, true))).toEqual(['Read', 'Glob']);
  });
});

/**
 * @toolgate/guard - Tool Call Dispatcher Tests
 */

import { mkdtempSync, readFileSync, realpathSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { createSessionContext } from '@toolgate/core';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { createPolicyConfig } from '../src/policy/policy-config.js';
import { ToolCallRejectedError, dispatchToolCall } from '../src/tools/dispatch.js';
import { Toolbox } from '../src/tools/toolbox.js';

describe('dispatchToolCall', () => {
  let root: string;
  let toolbox: Toolbox;

  beforeEach(() => {
    root = realpathSync(mkdtempSync(join(tmpdir(), 'toolgate-dispatch-')));
    writeFileSync(join(root, 'notes.md'), 'a\nb\nc\n');
    toolbox = new Toolbox({
      policy: createPolicyConfig({ root, ownedFiles: ['notes.md', 'draft.md'] }),
      context: createSessionContext({ interactive: false }),
    });
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('should reject unknown tools', async () => {
    expect(await dispatchToolCall(toolbox, 'Delete', {})).toBe('Error: Delete: unknown tool Delete');
  });

  it('should reject tools the session does not offer', async () => {
    expect(await dispatchToolCall(toolbox, 'AskUserQuestion', { question: 'Proceed?' })).toBe(
      'Error: AskUserQuestion: tool AskUserQuestion is not available in this session',
    );
  });

  it('should report malformed arguments', async () => {
    expect(await dispatchToolCall(toolbox, 'Read', {})).toBe('Error: Read: file_path: Required');
    expect(await dispatchToolCall(toolbox, 'Read', { file_path: 'notes.md', offset: 0 })).toBe(
      'Error: Read: offset: Number must be greater than 0',
    );
  });

  it('should throw on malformed arguments in strict mode', async () => {
    await expect(dispatchToolCall(toolbox, 'Read', {}, { strict: true })).rejects.toThrow(ToolCallRejectedError);
    await expect(dispatchToolCall(toolbox, 'Read', {}, { strict: true })).rejects.toThrow('Read: file_path: Required');
  });

  it('should read a line range', async () => {
    expect(await dispatchToolCall(toolbox, 'Read', { file_path: 'notes.md', offset: 2, limit: 1 })).toBe(
      '[Lines 2-2 of 3]\nb\n',
    );
  });

  it('should write owned files', async () => {
    expect(await dispatchToolCall(toolbox, 'Write', { file_path: 'draft.md', content: 'hello' })).toBe(
      'Successfully wrote to draft.md',
    );
    expect(readFileSync(join(root, 'draft.md'), 'utf-8')).toBe('hello');
  });

  it('should prefix policy denials with BLOCKED', async () => {
    const other = join(root, 'other.md');
    const permitted = JSON.stringify([join(root, 'draft.md'), join(root, 'notes.md')]);

    expect(await dispatchToolCall(toolbox, 'Write', { file_path: 'other.md', content: 'x' })).toBe(
      `BLOCKED: Write to ${other} denied: this file is owned by another module. ` +
        'Do NOT attempt to modify files outside your ownership. ' +
        `Instead, write your implementation into YOUR files: ${permitted}`,
    );
  });

  it('should edit files', async () => {
    expect(await dispatchToolCall(toolbox, 'Edit', { file_path: 'notes.md', old_string: 'b', new_string: 'B' })).toBe(
      'Successfully edited notes.md',
    );
    expect(await dispatchToolCall(toolbox, 'Edit', { file_path: 'notes.md', old_string: 'z', new_string: 'Z' })).toBe(
      'Error: old_string not found in notes.md',
    );
  });

  it('should return batch reads as JSON', async () => {
    const rendered = await dispatchToolCall(toolbox, 'ReadFiles', { file_paths: ['notes.md'] });
    expect(JSON.parse(rendered)).toEqual({ 'notes.md': 'a\nb\nc\n' });
  });

  it('should list files', async () => {
    expect(await dispatchToolCall(toolbox, 'Glob', { pattern: '*.md' })).toBe('notes.md');
  });

  it('should render install failures', async () => {
    expect(await dispatchToolCall(toolbox, 'InstallPackage', { package_name: 'bad;name' })).toBe(
      'Error: invalid package name: "bad;name"',
    );
  });

  it('should respect the allowed tool list', async () => {
    const limited = new Toolbox({ policy: createPolicyConfig({ root }), allowedTools: ['Read'] });

    expect(await dispatchToolCall(limited, 'Write', { file_path: 'x.md', content: '' })).toBe(
      'Error: Write: tool Write is not available in this session',
    );
  });
});

/**
 * @toolgate/guard - Tool Definition Tests
 */

import { describe, expect, it } from 'vitest';

import { CORE_TOOL_DEFINITIONS, getToolDefinitions } from '../src/tools/definitions.js';

const names = (options: Parameters<typeof getToolDefinitions>[0]): string[] =>
  getToolDefinitions(options).map(d => d.function.name);

describe('getToolDefinitions', () => {
  it('should list every tool for interactive sessions', () => {
    expect(names({ interactive: true })).toEqual([
      'Read',
      'Write',
      'Edit',
      'ReadFiles',
      'Bash',
      'Glob',
      'Grep',
      'InstallPackage',
      'AskUserQuestion',
    ]);
  });

  it('should omit AskUserQuestion for non-interactive sessions', () => {
    expect(names({ interactive: false })).toHaveLength(8);
    expect(names({ interactive: false })).not.toContain('AskUserQuestion');
  });

  it('should filter by the allowed list', () => {
    expect(names({ interactive: false, allowedTools: ['Read', 'Bash', 'AskUserQuestion'] })).toEqual(['Read', 'Bash']);
  });

  it('should describe parameters as JSON schema objects', () => {
    const read = CORE_TOOL_DEFINITIONS.find(d => d.function.name === 'Read');
    expect(read?.type).toBe('function');
    expect(read?.function.parameters.required).toEqual(['file_path']);
    expect(read?.function.parameters.properties.offset?.type).toBe('integer');
  });
});

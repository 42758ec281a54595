/**
 * @toolgate/guard - Tool Call Dispatcher
 *
 * Validates function-call arguments and routes them to the Toolbox,
 * returning the text handed back to the agent.
 */

import { renderToolError, type ToolResult } from '@toolgate/core';
import { z } from 'zod';

import { renderProcessOutput } from '../executor/process.js';
import { renderBatchRead, renderGlobListing } from '../quota/read-quota.js';

import type { ToolName } from './definitions.js';
import type { Toolbox } from './toolbox.js';

export class ToolCallRejectedError extends Error {
  readonly cause?: unknown;

  constructor(
    message: string,
    readonly tool: string,
    opts?: { cause?: unknown },
  ) {
    super(message);
    this.name = 'ToolCallRejectedError';
    this.cause = opts?.cause;
  }
}

const lineNumber = z.number().int().positive();

const TOOL_ARGS = {
  Read: z.object({ file_path: z.string().min(1), offset: lineNumber.optional(), limit: lineNumber.optional() }),
  Write: z.object({ file_path: z.string().min(1), content: z.string() }),
  Edit: z.object({ file_path: z.string().min(1), old_string: z.string(), new_string: z.string() }),
  ReadFiles: z.object({ file_paths: z.array(z.string().min(1)) }),
  Bash: z.object({ command: z.string().min(1), workdir: z.string().optional() }),
  Glob: z.object({ pattern: z.string().min(1), workdir: z.string().optional() }),
  Grep: z.object({ pattern: z.string().min(1), path: z.string().optional(), include: z.string().optional() }),
  InstallPackage: z.object({ package_name: z.string() }),
  AskUserQuestion: z.object({ question: z.string().min(1), options: z.array(z.string()).optional() }),
} satisfies Record<ToolName, z.ZodTypeAny>;

function isToolName(name: string): name is ToolName {
  return Object.prototype.hasOwnProperty.call(TOOL_ARGS, name);
}

export function renderToolResult<T>(result: ToolResult<T>, render: (value: T) => string): string {
  return result.ok ? render(result.value) : renderToolError(result.error);
}

export interface DispatchOptions {
  /** Throw ToolCallRejectedError instead of returning an error text */
  strict?: boolean;
}

/**
 * Run one tool call. Unknown tools, tools outside the session's allowed
 * set and malformed arguments are rejected without side effects.
 */
export async function dispatchToolCall(
  toolbox: Toolbox,
  name: string,
  args: unknown,
  options: DispatchOptions = {},
): Promise<string> {
  const rejection = (issues: string[]): string => {
    if (options.strict) {
      throw new ToolCallRejectedError(`${name}: ${issues.join('; ')}`, name);
    }
    return renderToolError({ kind: 'invalid_arguments', tool: name, issues, message: `${name}: ${issues.join('; ')}` });
  };

  if (!isToolName(name)) {
    return rejection([`unknown tool ${name}`]);
  }
  const offered = toolbox.definitions().some(d => d.function.name === name);
  if (!offered) {
    return rejection([`tool ${name} is not available in this session`]);
  }

  switch (name) {
    case 'Read': {
      const parsed = TOOL_ARGS.Read.safeParse(args);
      if (!parsed.success) return rejection(formatIssues(parsed.error));
      const { file_path, offset, limit } = parsed.data;
      return renderToolResult(await toolbox.readFile(file_path, offset, limit), content => content);
    }
    case 'Write': {
      const parsed = TOOL_ARGS.Write.safeParse(args);
      if (!parsed.success) return rejection(formatIssues(parsed.error));
      const { file_path, content } = parsed.data;
      return renderToolResult(await toolbox.writeFile(file_path, content), out => `Successfully wrote to ${out.path}`);
    }
    case 'Edit': {
      const parsed = TOOL_ARGS.Edit.safeParse(args);
      if (!parsed.success) return rejection(formatIssues(parsed.error));
      const { file_path, old_string, new_string } = parsed.data;
      return renderToolResult(
        await toolbox.editFile(file_path, old_string, new_string),
        out => `Successfully edited ${out.path}`,
      );
    }
    case 'ReadFiles': {
      const parsed = TOOL_ARGS.ReadFiles.safeParse(args);
      if (!parsed.success) return rejection(formatIssues(parsed.error));
      return renderToolResult(await toolbox.readFiles(parsed.data.file_paths), renderBatchRead);
    }
    case 'Bash': {
      const parsed = TOOL_ARGS.Bash.safeParse(args);
      if (!parsed.success) return rejection(formatIssues(parsed.error));
      return renderToolResult(await toolbox.runBash(parsed.data.command, parsed.data.workdir), renderProcessOutput);
    }
    case 'Glob': {
      const parsed = TOOL_ARGS.Glob.safeParse(args);
      if (!parsed.success) return rejection(formatIssues(parsed.error));
      return renderToolResult(await toolbox.listFiles(parsed.data.pattern, parsed.data.workdir), renderGlobListing);
    }
    case 'Grep': {
      const parsed = TOOL_ARGS.Grep.safeParse(args);
      if (!parsed.success) return rejection(formatIssues(parsed.error));
      const { pattern, path, include } = parsed.data;
      return renderToolResult(await toolbox.grepFiles(pattern, path, include), renderProcessOutput);
    }
    case 'InstallPackage': {
      const parsed = TOOL_ARGS.InstallPackage.safeParse(args);
      if (!parsed.success) return rejection(formatIssues(parsed.error));
      return renderToolResult(await toolbox.installPackage(parsed.data.package_name), renderProcessOutput);
    }
    case 'AskUserQuestion': {
      const parsed = TOOL_ARGS.AskUserQuestion.safeParse(args);
      if (!parsed.success) return rejection(formatIssues(parsed.error));
      return renderToolResult(await toolbox.askUser(parsed.data.question, parsed.data.options), answer => answer);
    }
  }
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message));
}

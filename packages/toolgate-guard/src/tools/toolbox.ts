/**
 * @toolgate/guard - Toolbox
 *
 * The operations exposed to one agent-role session, each routed through
 * its guard before touching the host.
 */

import path from 'node:path';

import {
  clip,
  createSessionContext,
  describeCause,
  fail,
  ok,
  type SessionContext,
  type ToolResult,
} from '@toolgate/core';
import { quote } from 'shell-quote';

import { DEFAULT_GREP_TIMEOUT_MS, mergeQuotas } from '../config.js';
import { MutationExecutor, type EditOutcome, type WriteOutcome } from '../executor/mutation.js';
import { ProcessLauncher, type ProcessOutput } from '../executor/process.js';
import { CommandGuard } from '../guards/command-guard.js';
import { PathAccessGuard } from '../guards/path-access.js';
import { ReadQuota, type BatchRead, type GlobListing } from '../quota/read-quota.js';
import type { PolicyConfig, QuotaConfig } from '../types.js';

import { getToolDefinitions, type ToolDefinition } from './definitions.js';
import { createReadlinePrompter, type Prompter } from './prompter.js';

/** Package specifiers: a name, then extras and version constraints */
export const PACKAGE_SPECIFIER_RE = /^[A-Za-z0-9._-]+[A-Za-z0-9._\-[\]>=<,! ]*$/;

export interface ToolboxOptions {
  policy: PolicyConfig;
  context?: SessionContext;
  quotas?: Partial<QuotaConfig>;
  /** Package install command prefix, e.g. `pip install`; empty disables InstallPackage */
  installCommand?: string;
  commandTimeoutMs?: number;
  /** Base environment for commands (default: process.env) */
  env?: NodeJS.ProcessEnv;
  prompter?: Prompter;
  /** Tools offered to this session; all when unset */
  allowedTools?: readonly string[];
}

export class Toolbox {
  readonly context: SessionContext;
  readonly policy: PolicyConfig;
  readonly quotas: QuotaConfig;
  readonly commandGuard: CommandGuard;
  readonly pathGuard: PathAccessGuard;
  readonly allowedTools?: readonly string[];

  private readonly reader: ReadQuota;
  private readonly mutator: MutationExecutor;
  private readonly launcher: ProcessLauncher;
  private readonly installCommand: string;
  private readonly prompter: Prompter;

  constructor(options: ToolboxOptions) {
    this.policy = options.policy;
    this.context = options.context ?? createSessionContext();
    this.quotas = mergeQuotas(options.quotas);
    this.installCommand = options.installCommand?.trim() ?? '';
    this.prompter = options.prompter ?? createReadlinePrompter();
    this.allowedTools = options.allowedTools;

    const { audit, logger } = this.context;
    this.commandGuard = new CommandGuard({ protectedDirs: this.policy.protectedDirs, audit, logger });
    this.pathGuard = new PathAccessGuard(this.policy, { audit });
    this.reader = new ReadQuota(this.quotas, { root: this.policy.root, audit, logger });
    this.mutator = new MutationExecutor(this.pathGuard, this.context);
    this.launcher = new ProcessLauncher(this.commandGuard, {
      timeoutMs: options.commandTimeoutMs,
      env: options.env,
      logger,
    });
  }

  get root(): string {
    return this.policy.root;
  }

  definitions(): ToolDefinition[] {
    return getToolDefinitions({ interactive: this.context.interactive, allowedTools: this.allowedTools });
  }

  async readFile(target: string, offset?: number, limit?: number): Promise<ToolResult<string>> {
    this.context.audit.emit('read', target);
    return this.reader.readFile(target, { offset, limit });
  }

  async writeFile(target: string, content: string): Promise<ToolResult<WriteOutcome>> {
    return this.mutator.write(target, content);
  }

  async editFile(target: string, oldString: string, newString: string): Promise<ToolResult<EditOutcome>> {
    this.context.audit.emit('edit', target);
    return this.mutator.edit(target, oldString, newString);
  }

  async readFiles(paths: readonly string[]): Promise<ToolResult<BatchRead>> {
    this.context.audit.emit('read', `${paths.length} files`);
    return ok(await this.reader.readFiles(paths));
  }

  async listFiles(pattern: string, workdir?: string): Promise<ToolResult<GlobListing>> {
    this.context.audit.emit('glob', pattern);
    return this.reader.listFiles(pattern, this.resolveWorkdir(workdir));
  }

  async runBash(command: string, workdir?: string): Promise<ToolResult<ProcessOutput>> {
    this.context.audit.emit('bash', clip(command));
    return this.launcher.run(command, this.resolveWorkdir(workdir));
  }

  /**
   * `grep -r` through an argument list; the pattern never reaches a shell.
   */
  async grepFiles(pattern: string, searchPath = '.', include = '*'): Promise<ToolResult<ProcessOutput>> {
    this.context.audit.emit('grep', `${clip(pattern)} in ${searchPath}`);
    return this.launcher.runArgv(
      'grep',
      ['-r', `--include=${include}`, '-e', pattern, '--', searchPath],
      this.root,
      DEFAULT_GREP_TIMEOUT_MS,
    );
  }

  /**
   * Validate a package specifier and hand it, quoted, to the configured
   * install command. Invalid specifiers never reach a shell.
   */
  async installPackage(specifier: string): Promise<ToolResult<ProcessOutput>> {
    if (!PACKAGE_SPECIFIER_RE.test(specifier)) {
      return fail({
        kind: 'invalid_specifier',
        specifier,
        message: `invalid package name: ${JSON.stringify(specifier)}`,
      });
    }
    if (!this.installCommand) {
      return fail({
        kind: 'not_configured',
        setting: 'installCommand',
        message: `no install command configured. Cannot install ${JSON.stringify(specifier)}.`,
      });
    }

    this.context.audit.emit('package', specifier);
    return this.launcher.run(`${this.installCommand} ${quote([specifier])}`, this.root);
  }

  /**
   * Non-interactive sessions, or sessions without a human at the terminal,
   * get the default answer: the first option, or `yes`.
   */
  async askUser(question: string, options: readonly string[] = []): Promise<ToolResult<string>> {
    const fallback = options[0] ?? 'yes';
    const audit = this.context.audit;

    if (!this.context.interactive) {
      audit.emit('auto', `Auto: ${question} -> ${fallback}`);
      return ok(fallback);
    }
    if (!this.prompter.isAvailable()) {
      audit.emit('auto', `Auto (no tty): ${question} -> ${fallback}`);
      return ok(fallback);
    }

    audit.emit('ask', question);
    let answer: string;
    try {
      answer = (await this.prompter.ask(question, options)).trim();
    } catch (err) {
      this.context.logger.debug(`prompt ended without an answer: ${describeCause(err)}`);
      return ok(fallback);
    }

    if (options.length === 0) {
      return ok(answer || fallback);
    }
    const index = Number.parseInt(answer, 10) - 1;
    return ok(Number.isInteger(index) && index >= 0 && index < options.length ? options[index] ?? fallback : fallback);
  }

  private resolveWorkdir(workdir: string | undefined): string {
    return workdir ? path.resolve(this.root, workdir) : this.root;
  }
}

export function createToolbox(options: ToolboxOptions): Toolbox {
  return new Toolbox(options);
}

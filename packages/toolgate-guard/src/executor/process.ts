/**
 * @toolgate/guard - Process Launcher
 *
 * Runs permitted commands with a timeout and structured capture.
 */

import { spawn, type ChildProcess } from 'node:child_process';
import { statSync } from 'node:fs';
import path from 'node:path';

import {
  clip,
  describeCause,
  fail,
  ok,
  silentLogger,
  type Logger,
  type ToolResult,
} from '@toolgate/core';

import { DEFAULT_COMMAND_TIMEOUT_MS } from '../config.js';
import type { CommandGuard } from '../guards/command-guard.js';

export interface ProcessOutput {
  stdout: string;
  stderr: string;
  /** -1 when the process ended on a signal */
  exitCode: number;
  signal: NodeJS.Signals | null;
}

export interface ProcessLauncherOptions {
  /** Shell command timeout (default 120 s) */
  timeoutMs?: number;
  /** Base environment (default: process.env) */
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

const VENV_DIRS = ['.venv', 'venv'];

/**
 * Environment for a command run in `workdir`: when the project has a
 * virtualenv, its bin directory leads PATH and PYTHONHOME is dropped.
 */
export function activateVirtualenv(env: NodeJS.ProcessEnv, workdir: string, logger: Logger = silentLogger): NodeJS.ProcessEnv {
  for (const dir of VENV_DIRS) {
    const bin = path.join(workdir, dir, 'bin');
    if (isDirectory(bin)) {
      const out: NodeJS.ProcessEnv = { ...env };
      out.PATH = env.PATH ? `${bin}${path.delimiter}${env.PATH}` : bin;
      out.VIRTUAL_ENV = path.join(path.resolve(workdir), dir);
      delete out.PYTHONHOME;
      logger.debug(`Activated virtualenv at ${bin}`);
      return out;
    }
  }
  return env;
}

function isDirectory(target: string): boolean {
  try {
    return statSync(target).isDirectory();
  } catch {
    return false;
  }
}

export class ProcessLauncher {
  private readonly timeoutMs: number;
  private readonly env: NodeJS.ProcessEnv;
  private readonly logger: Logger;

  constructor(
    private readonly guard: CommandGuard,
    options: ProcessLauncherOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
    this.env = options.env ?? process.env;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Run `command` through `/bin/sh -c` after the command guard clears it.
   * A blocked command never spawns a process.
   */
  async run(command: string, workdir: string): Promise<ToolResult<ProcessOutput>> {
    const verdict = this.guard.evaluate(command, workdir);
    if (verdict.status === 'blocked') {
      const { rule } = verdict;
      return fail({
        kind: 'command_blocked',
        command,
        ruleId: rule.id,
        pattern: rule.pattern.source,
        description: rule.description,
        message: `command blocked by safety filter. Pattern matched: ${rule.pattern.source}`,
      });
    }

    const env = activateVirtualenv(this.env, workdir, this.logger);
    return this.spawnCaptured('/bin/sh', ['-c', command], { workdir, env, timeoutMs: this.timeoutMs, label: command });
  }

  /**
   * Run a program with an argument list; nothing is interpreted by a shell.
   */
  async runArgv(file: string, args: string[], workdir: string, timeoutMs: number): Promise<ToolResult<ProcessOutput>> {
    return this.spawnCaptured(file, args, {
      workdir,
      env: this.env,
      timeoutMs,
      label: [file, ...args].join(' '),
    });
  }

  private async spawnCaptured(
    file: string,
    args: string[],
    options: { workdir: string; env: NodeJS.ProcessEnv; timeoutMs: number; label: string },
  ): Promise<ToolResult<ProcessOutput>> {
    const { workdir, env, timeoutMs, label } = options;

    let child: ChildProcess;
    try {
      child = spawn(file, args, { cwd: workdir, env, detached: true, stdio: ['ignore', 'pipe', 'pipe'] });
    } catch (err) {
      return spawnFailure(label, err);
    }

    const stdoutChunks: string[] = [];
    const stderrChunks: string[] = [];
    child.stdout?.setEncoding('utf8');
    child.stderr?.setEncoding('utf8');
    child.stdout?.on('data', chunk => stdoutChunks.push(String(chunk)));
    child.stderr?.on('data', chunk => stderrChunks.push(String(chunk)));

    let settled = false;
    const settleOnce = (fn: () => void): void => {
      if (settled) return;
      settled = true;
      fn();
    };

    return await new Promise<ToolResult<ProcessOutput>>(resolve => {
      const timeoutId = setTimeout(() => {
        settleOnce(() => {
          this.killGroup(child);
          resolve(
            fail({
              kind: 'timeout',
              command: label,
              timeoutMs,
              message: `command timed out after ${timeoutMs / 1000}s: ${clip(label)}`,
            }),
          );
        });
      }, timeoutMs);

      timeoutId.unref?.();

      child.once('error', err => {
        settleOnce(() => {
          clearTimeout(timeoutId);
          resolve(spawnFailure(label, err));
        });
      });

      child.once('close', (code, signal) => {
        settleOnce(() => {
          clearTimeout(timeoutId);
          resolve(
            ok({
              stdout: stdoutChunks.join(''),
              stderr: stderrChunks.join(''),
              exitCode: typeof code === 'number' ? code : -1,
              signal,
            }),
          );
        });
      });
    });
  }

  /**
   * The child leads its own process group; killing `-pid` takes its
   * descendants with it.
   */
  private killGroup(child: ChildProcess): void {
    if (child.pid === undefined) return;
    try {
      process.kill(-child.pid, 'SIGKILL');
    } catch (err) {
      this.logger.debug(`process group ${child.pid} already gone: ${describeCause(err)}`);
      child.kill('SIGKILL');
    }
  }
}

function spawnFailure(label: string, err: unknown): ToolResult<ProcessOutput> {
  const cause = describeCause(err);
  return fail({
    kind: 'io_error',
    cause,
    message: `could not run command '${clip(label)}': ${cause}`,
  });
}

/**
 * The text handed back to the agent for a finished command.
 */
export function renderProcessOutput(output: ProcessOutput): string {
  return `Stdout:\n${output.stdout}\nStderr:\n${output.stderr}\nExit Code: ${output.exitCode}`;
}

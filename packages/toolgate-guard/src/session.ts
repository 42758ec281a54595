import {
  FanoutAuditSink,
  LoggerAuditSink,
  createLogger,
  createSessionContext,
  type AuditSink,
  type Logger,
} from '@toolgate/core';

import { ConfigError, mergeConfig, validateConfig } from './config.js';
import { loadPolicy } from './policy/loader.js';
import { compilePolicy } from './policy/policy-config.js';
import { Toolbox } from './tools/toolbox.js';
import type { Prompter } from './tools/prompter.js';
import type { ToolgateConfig } from './types.js';

export interface CreateSessionOptions {
  /** Project root the policy's paths are relative to (default: cwd) */
  root?: string;
  role?: string;
  sessionId?: string;
  /** Extra audit sinks; events are always logged too */
  audit?: AuditSink[];
  logger?: Logger;
  prompter?: Prompter;
  allowedTools?: readonly string[];
  env?: NodeJS.ProcessEnv;
}

/**
 * Build a Toolbox for one agent-role session from configuration: load and
 * compile the role policy, then wire logging and audit through a fresh
 * session context.
 */
export function createSession(config: ToolgateConfig = {}, options: CreateSessionOptions = {}): Toolbox {
  const errors = validateConfig(config);
  if (errors.length > 0) {
    throw new ConfigError(errors);
  }

  const resolved = mergeConfig(config);
  const logger = options.logger ?? createLogger({ level: resolved.logLevel });
  const policy = compilePolicy(loadPolicy(resolved.policy), options.root);

  const context = createSessionContext({
    sessionId: options.sessionId,
    role: options.role,
    interactive: resolved.interactive,
    logger,
    audit: new FanoutAuditSink([new LoggerAuditSink(logger), ...(options.audit ?? [])]),
  });

  logger.debug(`session ${context.sessionId} using policy ${resolved.policy}`);

  return new Toolbox({
    policy,
    context,
    quotas: resolved.quotas,
    installCommand: resolved.installCommand,
    commandTimeoutMs: resolved.commandTimeoutMs,
    env: options.env,
    prompter: options.prompter,
    allowedTools: options.allowedTools,
  });
}

/**
 * @toolgate/guard - Configuration
 *
 * Configuration handling and defaults.
 */

import { isLogLevel } from '@toolgate/core';

import type { QuotaConfig, ResolvedToolgateConfig, ToolgateConfig } from './types.js';

export const DEFAULT_QUOTAS: QuotaConfig = Object.freeze({
  maxReadFileSize: 1_048_576,
  maxBatchFileSize: 1_048_576,
  maxBatchCount: 100,
  maxGlobResults: 1_000,
  maxRangeBytes: 1_048_576,
});

export const DEFAULT_COMMAND_TIMEOUT_MS = 120_000;
export const DEFAULT_GREP_TIMEOUT_MS = 60_000;

/** Name of the agent's own state directory */
export const STATE_DIR = '.toolgate';

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: ResolvedToolgateConfig = {
  policy: 'toolgate:unrestricted',
  logLevel: 'info',
  interactive: true,
  installCommand: '',
  commandTimeoutMs: DEFAULT_COMMAND_TIMEOUT_MS,
  quotas: DEFAULT_QUOTAS,
};

/**
 * Merge user config with defaults
 */
export function mergeConfig(userConfig: ToolgateConfig = {}): ResolvedToolgateConfig {
  return {
    policy: userConfig.policy ?? DEFAULT_CONFIG.policy,
    logLevel: userConfig.logLevel ?? DEFAULT_CONFIG.logLevel,
    interactive: userConfig.interactive ?? DEFAULT_CONFIG.interactive,
    installCommand: userConfig.installCommand ?? DEFAULT_CONFIG.installCommand,
    commandTimeoutMs: userConfig.commandTimeoutMs ?? DEFAULT_CONFIG.commandTimeoutMs,
    quotas: mergeQuotas(userConfig.quotas),
  };
}

export function mergeQuotas(overrides: Partial<QuotaConfig> = {}): QuotaConfig {
  const d = DEFAULT_QUOTAS;
  return Object.freeze({
    maxReadFileSize: overrides.maxReadFileSize ?? d.maxReadFileSize,
    maxBatchFileSize: overrides.maxBatchFileSize ?? d.maxBatchFileSize,
    maxBatchCount: overrides.maxBatchCount ?? d.maxBatchCount,
    maxGlobResults: overrides.maxGlobResults ?? d.maxGlobResults,
    maxRangeBytes: overrides.maxRangeBytes ?? d.maxRangeBytes,
  });
}

export class ConfigError extends Error {
  constructor(readonly errors: string[]) {
    super(`Invalid toolgate config:\n- ${errors.join('\n- ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Validate configuration values
 */
export function validateConfig(config: ToolgateConfig): string[] {
  const errors: string[] = [];

  if (config.logLevel && !isLogLevel(config.logLevel)) {
    errors.push(`Invalid logLevel: ${config.logLevel}. Must be one of: debug, info, warn, error`);
  }

  if (config.commandTimeoutMs !== undefined && !isPositiveInteger(config.commandTimeoutMs)) {
    errors.push('commandTimeoutMs must be a positive integer');
  }

  if (config.installCommand !== undefined && /[\n\r\0]/.test(config.installCommand)) {
    errors.push('installCommand must be a single line');
  }

  for (const [key, value] of Object.entries(config.quotas ?? {})) {
    if (value !== undefined && !isPositiveInteger(value)) {
      errors.push(`quotas.${key} must be a positive integer`);
    }
  }

  return errors;
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

/**
 * Read process-wide settings from the environment. Called once at startup;
 * the result is passed down, never re-read.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ToolgateConfig {
  const config: ToolgateConfig = {};

  const level = env.TOOLGATE_LOG_LEVEL?.trim().toLowerCase();
  if (level && isLogLevel(level)) {
    config.logLevel = level;
  }

  const nonInteractive = parseFlag(env.TOOLGATE_NON_INTERACTIVE);
  if (nonInteractive !== undefined) {
    config.interactive = !nonInteractive;
  }

  const install = env.TOOLGATE_INSTALL_COMMAND?.trim();
  if (install) {
    config.installCommand = install;
  }

  const policy = env.TOOLGATE_POLICY?.trim();
  if (policy) {
    config.policy = policy;
  }

  return config;
}

function parseFlag(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off', ''].includes(normalized)) return false;
  return undefined;
}

/**
 * Resolve built-in policy name to file path
 */
export function resolveBuiltinPolicy(name: string): string | null {
  const builtinPolicies: Record<string, string> = {
    'toolgate:unrestricted': 'unrestricted.yaml',
    'toolgate:implementer': 'implementer.yaml',
    'toolgate:test-writer': 'test-writer.yaml',
    'toolgate:read-only': 'read-only.yaml',
    'toolgate:default': 'unrestricted.yaml',
  };

  return builtinPolicies[name] ?? null;
}

/**
 * Check if a policy name is a built-in policy
 */
export function isBuiltinPolicy(name: string): boolean {
  return name.startsWith('toolgate:');
}

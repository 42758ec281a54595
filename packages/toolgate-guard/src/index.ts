/**
 * @toolgate/guard
 *
 * Trust boundary between an LLM coding agent and the host: command
 * blocklist, write permissions, read quotas, durable audited mutations and
 * bounded process execution.
 */

// Types
export type {
  BlocklistRule,
  BlocklistSeverity,
  CommandVerdict,
  Ownership,
  PolicyConfig,
  PolicyLintResult,
  QuotaConfig,
  ResolvedToolgateConfig,
  RolePolicy,
  SafeOverride,
  ToolgateConfig,
  WriteVerdict,
} from './types.js';

// Config
export {
  ConfigError,
  DEFAULT_COMMAND_TIMEOUT_MS,
  DEFAULT_CONFIG,
  DEFAULT_GREP_TIMEOUT_MS,
  DEFAULT_QUOTAS,
  STATE_DIR,
  configFromEnv,
  isBuiltinPolicy,
  mergeConfig,
  mergeQuotas,
  resolveBuiltinPolicy,
  validateConfig,
} from './config.js';

// Guards
export { BaseGuard, type Guard } from './guards/types.js';
export { CommandGuard, type CommandGuardOptions } from './guards/command-guard.js';
export { SAFE_OVERRIDES, buildBlocklist, stateDirRules } from './guards/command-rules.js';
export { PathAccessGuard, type PathAccessGuardOptions } from './guards/path-access.js';
export { canonicalize, findProtectedSegment, isStrictlyInside } from './guards/canonical.js';
export { matchTestPattern } from './guards/test-patterns.js';

// Quotas
export {
  ReadQuota,
  renderBatchRead,
  renderGlobListing,
  type BatchEntry,
  type BatchRead,
  type GlobListing,
  type LineRange,
  type ReadQuotaOptions,
} from './quota/read-quota.js';

// Executors
export { computeDiffLines, unifiedDiff, type DiffLine } from './executor/diff.js';
export {
  AUDIT_BLOCK_LINES,
  MutationExecutor,
  type EditOutcome,
  type WriteAction,
  type WriteOutcome,
} from './executor/mutation.js';
export {
  ProcessLauncher,
  activateVirtualenv,
  renderProcessOutput,
  type ProcessLauncherOptions,
  type ProcessOutput,
} from './executor/process.js';

// Policy
export { PolicyLoadError, loadPolicy, loadPolicyFromString } from './policy/loader.js';
export { POLICY_SCHEMA_VERSION, validatePolicy } from './policy/validator.js';
export {
  compilePolicy,
  createPolicyConfig,
  describePolicyConfig,
  type PolicyConfigOptions,
} from './policy/policy-config.js';

// Tools
export { PACKAGE_SPECIFIER_RE, Toolbox, createToolbox, type ToolboxOptions } from './tools/toolbox.js';
export {
  ASK_USER_DEFINITION,
  CORE_TOOL_DEFINITIONS,
  getToolDefinitions,
  type ToolDefinition,
  type ToolDefinitionOptions,
  type ToolName,
} from './tools/definitions.js';
export { ToolCallRejectedError, dispatchToolCall, renderToolResult, type DispatchOptions } from './tools/dispatch.js';
export { createReadlinePrompter, type Prompter } from './tools/prompter.js';
export { createSession, type CreateSessionOptions } from './session.js';

// CLI
export { createCli } from './cli/index.js';

/**
 * @toolgate/core
 *
 * Shared decision, result, audit and session types for toolgate.
 */

export type { Decision, DecisionStatus, LogLevel, Severity } from './types.js';
export { allowDecision, createDecision, denyDecision } from './types.js';

export type {
  AmbiguousEditError,
  CommandBlockedError,
  InvalidArgumentsError,
  InvalidSpecifierError,
  IoError,
  NotConfiguredError,
  NotFoundError,
  PolicyDeniedError,
  PolicyDenyReason,
  QuotaExceededError,
  TimeoutError,
  ToolError,
  ToolErrorKind,
  ToolResult,
} from './result.js';
export { describeCause, fail, isNotFoundError, isToolError, ok, renderToolError } from './result.js';

export type { AuditKind, AuditQuery, AuditRecord, AuditSink } from './audit.js';
export {
  FanoutAuditSink,
  InMemoryAuditSink,
  LoggerAuditSink,
  noopAuditSink,
  truncateLines,
} from './audit.js';

export type { CreateLoggerOptions, Logger } from './logger.js';
export { createLogger, isLogLevel, silentLogger } from './logger.js';

export type { ContextSummary, CreateSessionContextOptions, SessionContext } from './context.js';
export { DefaultSessionContext, createSessionContext } from './context.js';

export { clip, formatBytes, groupDigits } from './format.js';
export { createId } from './id.js';

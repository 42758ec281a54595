export type Severity = 'low' | 'medium' | 'high' | 'critical';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

// ============================================================
// Decision type with status enum
// ============================================================

/**
 * Decision status for security checks.
 * - 'allow': Operation is permitted
 * - 'warn': Operation is permitted but flagged for review
 * - 'deny': Operation is blocked
 */
export type DecisionStatus = 'allow' | 'warn' | 'deny';

/**
 * Decision recorded in the audit trail for a guarded action.
 */
export interface Decision {
  /** The decision status: 'allow', 'warn', or 'deny' */
  status: DecisionStatus;
  /** Name of the guard that made this decision */
  guard?: string;
  /** Severity level of the violation */
  severity?: Severity;
  /** Human-readable message describing the decision */
  message?: string;
  /** Machine-readable reason code */
  reason?: string;
}

export function createDecision(
  status: DecisionStatus,
  options: {
    guard?: string;
    severity?: Severity;
    message?: string;
    reason?: string;
  } = {},
): Decision {
  return {
    status,
    guard: options.guard,
    severity: options.severity,
    message: options.message,
    reason: options.reason,
  };
}

export function allowDecision(options: { guard?: string; message?: string } = {}): Decision {
  return createDecision('allow', { severity: 'low', ...options });
}

export function denyDecision(options: {
  guard?: string;
  severity?: Severity;
  message?: string;
  reason?: string;
}): Decision {
  return createDecision('deny', { severity: 'high', ...options });
}

import { noopAuditSink, type AuditSink } from './audit.js';
import { createId } from './id.js';
import { silentLogger, type Logger } from './logger.js';
import type { Decision } from './types.js';

/**
 * Per-session state shared by every component serving one agent role.
 *
 * `interactive` is fixed at construction. Sessions running side by side in
 * one process each carry their own value; nothing flips it mid-operation.
 */
export interface SessionContext {
  readonly id: string;
  readonly sessionId: string;
  readonly role?: string;
  readonly interactive: boolean;
  readonly createdAt: Date;
  readonly audit: AuditSink;
  readonly logger: Logger;
  readonly metadata: Record<string, unknown>;
  checkCount: number;
  violationCount: number;
  recordDecision(subject: string, decision: Decision): void;
  getSummary(): ContextSummary;
}

export interface ContextSummary {
  contextId: string;
  sessionId: string;
  role?: string;
  interactive: boolean;
  duration: number;
  checkCount: number;
  violationCount: number;
  denied: string[];
}

export interface CreateSessionContextOptions {
  contextId?: string;
  sessionId?: string;
  role?: string;
  interactive?: boolean;
  audit?: AuditSink;
  logger?: Logger;
  metadata?: Record<string, unknown>;
}

export class DefaultSessionContext implements SessionContext {
  readonly id: string;
  readonly sessionId: string;
  readonly role?: string;
  readonly interactive: boolean;
  readonly createdAt: Date;
  readonly audit: AuditSink;
  readonly logger: Logger;
  readonly metadata: Record<string, unknown>;
  checkCount = 0;
  violationCount = 0;
  private readonly denied: string[] = [];

  constructor(options: CreateSessionContextOptions = {}) {
    this.id = options.contextId ?? createId('ctx');
    this.sessionId = options.sessionId ?? createId('sess');
    this.role = options.role;
    this.interactive = options.interactive ?? false;
    this.createdAt = new Date();
    this.audit = options.audit ?? noopAuditSink;
    this.logger = options.logger ?? silentLogger;
    this.metadata = options.metadata ?? {};
  }

  recordDecision(subject: string, decision: Decision): void {
    this.checkCount++;
    if (decision.status === 'deny') {
      this.violationCount++;
      this.denied.push(subject);
    }
  }

  getSummary(): ContextSummary {
    return {
      contextId: this.id,
      sessionId: this.sessionId,
      role: this.role,
      interactive: this.interactive,
      duration: Date.now() - this.createdAt.getTime(),
      checkCount: this.checkCount,
      violationCount: this.violationCount,
      denied: [...this.denied],
    };
  }
}

export function createSessionContext(options: CreateSessionContextOptions = {}): SessionContext {
  return new DefaultSessionContext(options);
}

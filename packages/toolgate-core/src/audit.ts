import { createId } from './id.js';
import type { Logger } from './logger.js';
import type { Decision } from './types.js';

/**
 * Fixed vocabulary of audit event kinds. The renderer decides what each
 * kind looks like; emitters only pick the kind.
 */
export type AuditKind =
  | 'read'
  | 'write'
  | 'edit'
  | 'bash'
  | 'glob'
  | 'grep'
  | 'package'
  | 'diff'
  | 'code'
  | 'warning'
  | 'file_change'
  | 'ask'
  | 'auto';

export interface AuditRecord {
  id: string;
  kind: AuditKind;
  timestamp: Date;
  /** Single-line message (emit) or block label (emitBlock) */
  message: string;
  /** Full block body; never truncated in storage */
  body?: string;
  /** Rendering hint for blocks */
  maxLines?: number;
  decision?: Decision;
}

/**
 * The two verbs the core uses to talk to the event/telemetry collaborator.
 */
export interface AuditSink {
  emit(kind: AuditKind, message: string, decision?: Decision): void;
  emitBlock(kind: AuditKind, label: string, body: string, maxLines: number): void;
}

export const noopAuditSink: AuditSink = {
  emit: () => {},
  emitBlock: () => {},
};

/**
 * Truncate a block body for display: keeps `maxLines` lines and appends a
 * `... [n more lines]` marker. `maxLines <= 0` means no limit.
 */
export function truncateLines(body: string, maxLines: number): string[] {
  const lines = body.split('\n');
  if (maxLines > 0 && lines.length > maxLines) {
    return [...lines.slice(0, maxLines), `... [${lines.length - maxLines} more lines]`];
  }
  return lines;
}

export interface AuditQuery {
  kind?: AuditKind;
  since?: Date;
  denied?: boolean;
  limit?: number;
}

export class InMemoryAuditSink implements AuditSink {
  private events: AuditRecord[] = [];
  private readonly maxEvents: number;

  constructor(maxEvents = 10_000) {
    this.maxEvents = maxEvents;
  }

  emit(kind: AuditKind, message: string, decision?: Decision): void {
    this.push({ id: createId('evt'), kind, timestamp: new Date(), message, decision });
  }

  emitBlock(kind: AuditKind, label: string, body: string, maxLines: number): void {
    this.push({ id: createId('evt'), kind, timestamp: new Date(), message: label, body, maxLines });
  }

  records(): AuditRecord[] {
    return [...this.events];
  }

  query(options: AuditQuery = {}): AuditRecord[] {
    let results = [...this.events];

    if (options.kind) {
      results = results.filter(e => e.kind === options.kind);
    }
    const since = options.since;
    if (since) {
      results = results.filter(e => e.timestamp >= since);
    }
    if (options.denied) {
      results = results.filter(e => e.decision?.status === 'deny');
    }
    if (options.limit) {
      results = results.slice(-options.limit);
    }

    return results;
  }

  export(format: 'json' | 'csv' | 'jsonl'): string {
    switch (format) {
      case 'json':
        return JSON.stringify(this.events, null, 2);
      case 'jsonl':
        return this.events.map(e => JSON.stringify(e)).join('\n');
      case 'csv': {
        const headers = ['id', 'kind', 'timestamp', 'message', 'decision'];
        const rows = this.events.map(e => [
          e.id,
          e.kind,
          e.timestamp.toISOString(),
          csvField(e.message),
          e.decision?.status ?? '',
        ]);
        return [headers.join(','), ...rows.map(r => r.join(','))].join('\n');
      }
    }
  }

  prune(olderThan: Date): number {
    const originalLength = this.events.length;
    this.events = this.events.filter(e => e.timestamp > olderThan);
    return originalLength - this.events.length;
  }

  clear(): void {
    this.events = [];
  }

  private push(record: AuditRecord): void {
    this.events.push(record);
    if (this.events.length > this.maxEvents) {
      this.events = this.events.slice(-this.maxEvents);
    }
  }
}

function csvField(value: string): string {
  if (/[",\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Renders audit events through a Logger. Warnings go to `warn`, the rest to
 * `info`; blocks are clipped to their `maxLines`.
 */
export class LoggerAuditSink implements AuditSink {
  constructor(private readonly logger: Logger) {}

  emit(kind: AuditKind, message: string): void {
    const line = `{${kind}} ${message}`;
    if (kind === 'warning') {
      this.logger.warn(line);
    } else {
      this.logger.info(line);
    }
  }

  emitBlock(kind: AuditKind, label: string, body: string, maxLines: number): void {
    const lines = truncateLines(body, maxLines);
    this.logger.info(`{${kind}} ${label}\n${lines.join('\n')}`);
  }
}

export class FanoutAuditSink implements AuditSink {
  private readonly sinks: AuditSink[];

  constructor(sinks: AuditSink[]) {
    this.sinks = sinks;
  }

  emit(kind: AuditKind, message: string, decision?: Decision): void {
    for (const sink of this.sinks) sink.emit(kind, message, decision);
  }

  emitBlock(kind: AuditKind, label: string, body: string, maxLines: number): void {
    for (const sink of this.sinks) sink.emitBlock(kind, label, body, maxLines);
  }
}

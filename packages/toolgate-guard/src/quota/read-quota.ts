/**
 * @toolgate/guard - Read Quota Enforcer
 *
 * Bounds how much data reads, batch reads and glob listings return.
 */

import { createReadStream, type Dirent } from 'node:fs';
import { lstat, readdir, readFile, stat } from 'node:fs/promises';
import path from 'node:path';

import {
  describeCause,
  fail,
  formatBytes,
  isNotFoundError,
  noopAuditSink,
  ok,
  silentLogger,
  type AuditSink,
  type Logger,
  type ToolResult,
} from '@toolgate/core';
import { Minimatch } from 'minimatch';

import { DEFAULT_QUOTAS } from '../config.js';
import { fsFailure } from '../fs-errors.js';
import type { QuotaConfig } from '../types.js';

export interface LineRange {
  /** 1-indexed first line (default 1) */
  offset?: number;
  /** Number of lines (default: to end of file) */
  limit?: number;
}

export type BatchEntry = { ok: true; content: string } | { ok: false; error: string };

export interface BatchRead {
  /** Keyed by the path string as given */
  results: Map<string, BatchEntry>;
  /** Set when paths beyond the batch cap were dropped */
  warning?: string;
}

export interface GlobListing {
  /** Sorted, relative to the working directory */
  files: string[];
  /** Matches before truncation */
  total: number;
  truncated: boolean;
}

export interface ReadQuotaOptions {
  /** Base for relative paths (default: cwd) */
  root?: string;
  audit?: AuditSink;
  logger?: Logger;
}

const GLOB_MAGIC = /[*?[\]{}]|[!+@]\(/;

export class ReadQuota {
  private readonly root: string;
  private readonly audit: AuditSink;
  private readonly logger: Logger;

  constructor(
    readonly quotas: QuotaConfig = DEFAULT_QUOTAS,
    options: ReadQuotaOptions = {},
  ) {
    this.root = options.root ?? process.cwd();
    this.audit = options.audit ?? noopAuditSink;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Whole-file reads are refused above `maxReadFileSize`. A line range is
   * streamed instead and refused once the selected lines pass
   * `maxRangeBytes`.
   */
  async readFile(target: string, range: LineRange = {}): Promise<ToolResult<string>> {
    const file = path.resolve(this.root, target);

    if (range.offset !== undefined || range.limit !== undefined) {
      return this.readRange(file, target, range);
    }

    try {
      const { size } = await stat(file);
      const cap = this.quotas.maxReadFileSize;
      if (size > cap) {
        return fail({
          kind: 'quota_exceeded',
          path: target,
          cap,
          actual: size,
          message:
            `File ${target} is too large to read at once: ${formatBytes(size)} exceeds the limit of ` +
            `${formatBytes(cap)}. Use offset and limit to read a line range.`,
        });
      }
      return ok(await readFile(file, 'utf-8'));
    } catch (err) {
      return fsFailure(target, err);
    }
  }

  private async readRange(file: string, target: string, range: LineRange): Promise<ToolResult<string>> {
    const start = Math.max(0, (range.offset ?? 1) - 1);
    const end = range.limit !== undefined && range.limit > 0 ? start + range.limit : Infinity;
    const cap = this.quotas.maxRangeBytes;

    const selected: string[] = [];
    let selectedBytes = 0;
    let total = 0;
    let exceeded = false;

    const take = (line: string): void => {
      const index = total++;
      if (exceeded || index < start || index >= end) return;
      selectedBytes += Buffer.byteLength(line);
      if (selectedBytes > cap) {
        exceeded = true;
        return;
      }
      selected.push(line);
    };

    const stream = createReadStream(file, { encoding: 'utf-8' });
    try {
      let pending = '';
      for await (const chunk of stream) {
        pending += String(chunk);
        let from = 0;
        let newline = pending.indexOf('\n', from);
        while (newline >= 0) {
          take(pending.slice(from, newline + 1));
          from = newline + 1;
          newline = pending.indexOf('\n', from);
        }
        pending = pending.slice(from);
        if (exceeded) break;
      }
      if (!exceeded && pending) {
        take(pending);
      }
    } catch (err) {
      return fsFailure(target, err);
    } finally {
      stream.destroy();
    }

    if (exceeded) {
      return fail({
        kind: 'quota_exceeded',
        path: target,
        cap,
        actual: selectedBytes,
        message:
          `Selected lines of ${target} exceed the limit of ${formatBytes(cap)} ` +
          `(${formatBytes(selectedBytes)} selected so far). Use a smaller limit.`,
      });
    }

    const last = Math.min(end, total);
    return ok(`[Lines ${start + 1}-${last} of ${total}]\n${selected.join('')}`);
  }

  /**
   * Read up to `maxBatchCount` files. Failures are recorded per path; the
   * batch itself never fails.
   */
  async readFiles(paths: readonly string[]): Promise<BatchRead> {
    const { maxBatchCount, maxBatchFileSize } = this.quotas;
    const batch: BatchRead = { results: new Map() };

    if (paths.length > maxBatchCount) {
      batch.warning =
        `ReadFiles truncated: ${paths.length} paths requested, only the first ${maxBatchCount} were read`;
      this.logger.warn(batch.warning);
      this.audit.emit('warning', batch.warning);
    }

    for (const target of paths.slice(0, maxBatchCount)) {
      const file = path.resolve(this.root, target);
      try {
        const { size } = await stat(file);
        if (size > maxBatchFileSize) {
          batch.results.set(target, {
            ok: false,
            error: `Error: file too large (${formatBytes(size)}, limit ${formatBytes(maxBatchFileSize)})`,
          });
          continue;
        }
        batch.results.set(target, { ok: true, content: await readFile(file, 'utf-8') });
      } catch (err) {
        batch.results.set(target, { ok: false, error: `Error: ${describeCause(err)}` });
      }
    }

    return batch;
  }

  /**
   * Expand a glob (with `**`) under `workdir`. Listings longer than
   * `maxGlobResults` are truncated with a warning, never refused.
   */
  async listFiles(pattern: string, workdir: string = this.root): Promise<ToolResult<GlobListing>> {
    const cwd = path.resolve(this.root, workdir);
    const segments = pattern.split('/');
    const magicAt = segments.findIndex(s => GLOB_MAGIC.test(s));

    let matches: string[];
    try {
      if (magicAt < 0) {
        matches = await this.literalMatch(path.resolve(cwd, pattern));
      } else {
        const baseSegments = segments.slice(0, magicAt);
        const base = baseSegments.length === 1 && baseSegments[0] === '' ? '/' : baseSegments.join('/');
        const baseDir = path.resolve(cwd, base || '.');
        const matcher = new Minimatch(segments.slice(magicAt).join('/'), { dot: false });
        const found: string[] = [];
        await this.walk(baseDir, '', matcher, found, true);
        matches = found.map(rel => path.join(baseDir, rel));
      }
    } catch (err) {
      return fail({
        kind: 'io_error',
        path: cwd,
        cause: describeCause(err),
        message: `Error listing files: ${describeCause(err)}`,
      });
    }

    const sorted = matches.map(abs => path.relative(cwd, abs)).sort();
    const cap = this.quotas.maxGlobResults;
    const truncated = sorted.length > cap;
    if (truncated) {
      const warning = `Glob results truncated to ${cap} of ${sorted.length} entries for pattern ${pattern}`;
      this.logger.warn(warning);
      this.audit.emit('warning', warning);
    }

    return ok({ files: truncated ? sorted.slice(0, cap) : sorted, total: sorted.length, truncated });
  }

  private async literalMatch(file: string): Promise<string[]> {
    try {
      await lstat(file);
      return [file];
    } catch (err) {
      if (isNotFoundError(err)) return [];
      throw err;
    }
  }

  private async walk(dir: string, rel: string, matcher: Minimatch, out: string[], top = false): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (err) {
      if (top && !isNotFoundError(err)) throw err;
      this.logger.debug(`glob skipped ${dir}: ${describeCause(err)}`);
      return;
    }

    for (const entry of entries) {
      const childRel = rel ? `${rel}/${entry.name}` : entry.name;
      if (matcher.match(childRel)) {
        out.push(childRel);
      }
      if (entry.isDirectory() && matcher.match(childRel, true)) {
        await this.walk(path.join(dir, entry.name), childRel, matcher, out);
      }
    }
  }
}

/**
 * JSON rendering of a batch: path to content or error string, plus
 * `__warning__` when the batch was truncated.
 */
export function renderBatchRead(batch: BatchRead): string {
  const out: Record<string, string> = {};
  for (const [target, entry] of batch.results) {
    out[target] = entry.ok ? entry.content : entry.error;
  }
  if (batch.warning) {
    out.__warning__ = batch.warning;
  }
  return JSON.stringify(out);
}

export function renderGlobListing(listing: GlobListing): string {
  const lines = [...listing.files];
  if (listing.truncated) {
    lines.push(`[truncated: showing ${listing.files.length} of ${listing.total} entries]`);
  }
  return lines.join('\n');
}

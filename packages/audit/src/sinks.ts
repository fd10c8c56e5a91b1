/**
 * Audit destinations.
 *
 * - InMemoryLogSink: queryable, process lifetime only
 * - PinoLogSink: forwards each entry to an operational logger
 * - FileLogSink: append-only file, fsync after every entry
 * - CompositeLogSink: fan-out to several sinks
 */

import { appendFileSync, closeSync, fsyncSync, mkdirSync, openSync } from "node:fs";
import { dirname } from "node:path";
import type { Logger } from "pino";
import { parseLogEntry } from "./entry.js";
import type { AuditCategory, LogSink, ParsedLogEntry } from "./types.js";

// =============================================================================
// InMemoryLogSink
// =============================================================================

export interface AuditQuery {
  readonly category?: AuditCategory | undefined;
  readonly entity?: string | undefined;
  readonly user?: string | undefined;
  readonly limit?: number | undefined;
}

export class InMemoryLogSink implements LogSink {
  private readonly _entries: ParsedLogEntry[] = [];

  append(entry: string): void {
    const parsed = parseLogEntry(entry);
    if (parsed === null) {
      throw new Error(`Not an audit entry: ${entry.slice(0, 40)}`);
    }
    this._entries.push(parsed);
  }

  /**
   * Query entries with optional filters.
   *
   * Returns newest-first.
   */
  query(filter?: AuditQuery): readonly ParsedLogEntry[] {
    let results: ParsedLogEntry[] = this._entries;

    if (filter?.category !== undefined) {
      results = results.filter((e) => e.category === filter.category);
    }
    if (filter?.entity !== undefined) {
      results = results.filter((e) => e.entity === filter.entity);
    }
    if (filter?.user !== undefined) {
      results = results.filter((e) => e.user === filter.user);
    }

    results = [...results].reverse();

    if (filter?.limit !== undefined && filter.limit > 0) {
      results = results.slice(0, filter.limit);
    }

    return results;
  }

  get size(): number {
    return this._entries.length;
  }
}

// =============================================================================
// PinoLogSink
// =============================================================================

export class PinoLogSink implements LogSink {
  constructor(private readonly logger: Logger) {}

  append(entry: string): void {
    this.logger.info({ audit: true }, entry);
  }
}

// =============================================================================
// FileLogSink
// =============================================================================

export class FileLogSink implements LogSink {
  constructor(private readonly filePath: string) {
    mkdirSync(dirname(filePath), { recursive: true });
  }

  append(entry: string): void {
    const fd = openSync(this.filePath, "a");
    try {
      appendFileSync(fd, `${entry}\n`, "utf-8");
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
  }

  get path(): string {
    return this.filePath;
  }
}

// =============================================================================
// CompositeLogSink
// =============================================================================

/**
 * Every sink is attempted. Failures are collected and rethrown together
 * once all sinks have had the entry.
 */
export class CompositeLogSink implements LogSink {
  private readonly sinks: readonly LogSink[];

  constructor(sinks: readonly LogSink[]) {
    this.sinks = [...sinks];
  }

  append(entry: string): void {
    const failures: unknown[] = [];
    for (const sink of this.sinks) {
      try {
        sink.append(entry);
      } catch (cause: unknown) {
        failures.push(cause);
      }
    }
    if (failures.length > 0) {
      throw new AggregateError(failures, `${failures.length} of ${this.sinks.length} audit sink(s) failed`);
    }
  }
}

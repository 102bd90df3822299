/**
 * Structured logging for collections.
 *
 * Entries describe collection activity: the operation, the length before
 * and after it, and the error code when it was rejected.
 *
 * @module observability/logger
 */

import type { CollectionError } from '../errors/collection-error.js';
import type { ErrorCode } from '../errors/error-codes.js';

/** Log level */
export type LogLevel = 'debug' | 'warn';

/** Structured log entry */
export interface LogEntry {
  readonly level: LogLevel;
  readonly module: string;
  readonly operation: string;
  readonly message: string;
  readonly timestamp: number;
  /** Length when the operation started; absent for lifecycle entries */
  readonly before?: number;
  /** Length after the operation, or the unchanged length when rejected */
  readonly length: number;
  /** Present on rejected operations */
  readonly code?: ErrorCode;
}

/** Logger configuration */
export interface LoggerConfig {
  /** Minimum log level (default: 'warn') */
  readonly level?: LogLevel;
  /** Module name (default: 'tidelist') */
  readonly module?: string;
  /** Custom log handler (default: console when `json` is set) */
  readonly handler?: (entry: LogEntry) => void;
  /** Write entries to the console as JSON */
  readonly json?: boolean;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  warn: 1,
};

/**
 * Logger a collection reports its activity to. Silent unless a `handler`
 * or `json` output is configured.
 *
 * @example
 * ```typescript
 * import { createLogger, createObservableCollection } from '@tidelist/collection';
 *
 * const logger = createLogger({ module: 'playlist', level: 'debug', json: true });
 * const tracks = createObservableCollection(['intro'], { logger });
 *
 * tracks.append('outro');
 * // {"level":"debug","module":"playlist","operation":"append","message":"append: 1 -> 2",...}
 * ```
 */
export class CollectionLogger {
  private readonly level: LogLevel;
  private readonly handler?: (entry: LogEntry) => void;
  private readonly json: boolean;

  readonly module: string;

  constructor(config: LoggerConfig = {}) {
    this.level = config.level ?? 'warn';
    this.module = config.module ?? 'tidelist';
    this.handler = config.handler;
    this.json = config.json ?? false;
  }

  /** Creation or disposal */
  lifecycle(operation: 'created' | 'disposed', length: number): void {
    this.write({ level: 'debug', operation, message: `${operation} with length ${length}`, length });
  }

  /** A mutation that ran to completion */
  mutated(operation: string, before: number, length: number): void {
    this.write({ level: 'debug', operation, message: `${operation}: ${before} -> ${length}`, before, length });
  }

  /** A mutation that was refused before changing anything */
  rejected(error: CollectionError, length: number): void {
    this.write({
      level: 'warn',
      operation: error.operation,
      message: error.message,
      before: length,
      length,
      code: error.code,
    });
  }

  // ── Private ──────────────────────────────────────────────────────────

  private write(fields: Omit<LogEntry, 'module' | 'timestamp'>): void {
    if (LEVEL_PRIORITY[fields.level] < LEVEL_PRIORITY[this.level]) return;

    const entry: LogEntry = { ...fields, module: this.module, timestamp: Date.now() };

    if (this.handler) {
      this.handler(entry);
      return;
    }

    if (this.json) {
      const consoleFn = entry.level === 'warn' ? console.warn : console.log;
      consoleFn(JSON.stringify(entry));
    }
  }
}

/** Factory function to create a CollectionLogger */
export function createLogger(config?: LoggerConfig): CollectionLogger {
  return new CollectionLogger(config);
}

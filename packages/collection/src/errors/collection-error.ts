/**
 * CollectionError - structured error class for observable collections
 */

import {
  type ErrorCategory,
  type ErrorCode,
  getErrorCategory,
  getErrorInfo,
} from './error-codes.js';
import type { IndexRange } from '../types.js';

/**
 * Options for creating a CollectionError
 */
export interface CollectionErrorOptions {
  /** The error code */
  code: ErrorCode;
  /** Name of the rejected operation */
  operation: string;
  /** Custom message (overrides default) */
  message?: string;
  /** Additional context information */
  context?: Record<string, unknown>;
}

/**
 * Serialized format of a CollectionError
 */
export interface SerializedCollectionError {
  name: string;
  code: ErrorCode;
  category: ErrorCategory;
  operation: string;
  message: string;
  suggestion: string;
  context: Record<string, unknown>;
}

/**
 * Base error for every failure raised by an {@link ObservableCollection}
 * or by replaying its changes.
 *
 * @example
 * ```typescript
 * try {
 *   list.removeAt(10);
 * } catch (error) {
 *   if (CollectionError.isCode(error, 'TIDE_B100')) {
 *     console.log(error.format());
 *   }
 * }
 * ```
 */
export class CollectionError extends Error {
  readonly code: ErrorCode;

  /** Error category for grouping */
  readonly category: ErrorCategory;

  /** Operation that was rejected */
  readonly operation: string;

  /** Suggestion for resolving the error */
  readonly suggestion: string;

  readonly context: Record<string, unknown>;

  constructor(options: CollectionErrorOptions) {
    const errorInfo = getErrorInfo(options.code);
    super(options.message ?? `${options.operation}: ${errorInfo.message}`);

    this.name = 'CollectionError';
    this.code = options.code;
    this.category = getErrorCategory(options.code);
    this.operation = options.operation;
    this.suggestion = errorInfo.suggestion;
    this.context = options.context ?? {};

    // Maintain proper stack trace for V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  static isCollectionError(error: unknown): error is CollectionError {
    return error instanceof CollectionError;
  }

  static isCode(error: unknown, code: ErrorCode): boolean {
    return CollectionError.isCollectionError(error) && error.code === code;
  }

  static isCategory(error: unknown, category: ErrorCategory): boolean {
    return CollectionError.isCollectionError(error) && error.category === category;
  }

  /**
   * Format the error for display
   */
  format(): string {
    const lines = [`[${this.code}] ${this.message}`];

    if (Object.keys(this.context).length > 0) {
      lines.push(`Context: ${JSON.stringify(this.context)}`);
    }

    lines.push(`Suggestion: ${this.suggestion}`);
    return lines.join('\n');
  }

  toJSON(): SerializedCollectionError {
    return {
      name: this.name,
      code: this.code,
      category: this.category,
      operation: this.operation,
      message: this.message,
      suggestion: this.suggestion,
      context: this.context,
    };
  }

  override toString(): string {
    return this.format();
  }
}

/**
 * An index addressed an element the collection does not have
 */
export class IndexOutOfBoundsError extends CollectionError {
  readonly index: number;
  readonly length: number;

  constructor(operation: string, index: number, length: number) {
    super({
      code: 'TIDE_B100',
      operation,
      message: `${operation}: index ${index} is out of bounds for length ${length}`,
      context: { index, length },
    });

    this.name = 'IndexOutOfBoundsError';
    this.index = index;
    this.length = length;
  }
}

/**
 * A range (plus the values written into it) does not fit the collection
 */
export class InvalidRangeError extends CollectionError {
  readonly range: IndexRange;
  readonly length: number;
  /** Number of values that were to be written from `range.start` */
  readonly count: number;

  constructor(operation: string, range: IndexRange, count: number, length: number) {
    super({
      code: 'TIDE_B101',
      operation,
      message: `${operation}: range ${range.start}..<${range.end} with ${count} value(s) does not fit length ${length}`,
      context: { range, count, length },
    });

    this.name = 'InvalidRangeError';
    this.range = range;
    this.length = length;
    this.count = count;
  }
}

/**
 * A clearance change whose removal indices are not `0..n-1` in order
 */
export class MalformedChangeError extends CollectionError {
  /** Position of the offending removal inside the clearance */
  readonly position: number;
  readonly index: number;

  constructor(operation: string, position: number, index: number) {
    super({
      code: 'TIDE_B102',
      operation,
      message: `${operation}: clearance removal ${position} has index ${index}, expected ${position}`,
      context: { position, index },
    });

    this.name = 'MalformedChangeError';
    this.position = position;
    this.index = index;
  }
}

/**
 * A mutation was attempted after dispose()
 */
export class CollectionDisposedError extends CollectionError {
  /** Name of the disposed collection */
  readonly collection: string;

  constructor(collection: string, operation: string) {
    super({
      code: 'TIDE_L200',
      operation,
      message: `${operation}: collection "${collection}" has been disposed`,
      context: { collection },
    });

    this.name = 'CollectionDisposedError';
    this.collection = collection;
  }
}

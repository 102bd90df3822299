/**
 * Shared types for observable collections.
 *
 * @module types
 */

import type { Observer, Unsubscribable } from 'rxjs';
import type { CollectionLogger } from './observability/logger.js';

// ── Changes ───────────────────────────────────────────────

/** An element was inserted at `index` */
export interface InsertChange<T> {
  readonly type: 'insert';
  readonly index: number;
  readonly value: T;
}

/** The element `value` was removed from `index` */
export interface RemoveChange<T> {
  readonly type: 'remove';
  readonly index: number;
  readonly value: T;
}

/**
 * Ordered edits produced by one logical operation. Each index refers to the
 * collection as left by the edits before it.
 */
export interface CompositeChange<T> {
  readonly type: 'composite';
  readonly indexing: 'sequential';
  readonly changes: readonly ChangeEvent<T>[];
}

/**
 * Removal of the first `changes.length` elements at once. Indices run
 * `0..n-1` in the order the elements had before any of them was removed.
 */
export interface ClearanceChange<T> {
  readonly type: 'composite';
  readonly indexing: 'start';
  readonly changes: readonly RemoveChange<T>[];
}

/** A single index-level edit */
export type PrimitiveChange<T> = InsertChange<T> | RemoveChange<T>;

/**
 * Description of one mutation, as published on the change stream.
 *
 * @example
 * ```typescript
 * { type: 'insert', index: 3, value: 'd' }
 * { type: 'remove', index: 0, value: 'a' }
 * { type: 'composite', indexing: 'sequential', changes: [{ type: 'insert', index: 0, value: 'a' }] }
 * { type: 'composite', indexing: 'start', changes: [{ type: 'remove', index: 0, value: 'a' }, { type: 'remove', index: 1, value: 'b' }] }
 * ```
 */
export type ChangeEvent<T> = PrimitiveChange<T> | CompositeChange<T> | ClearanceChange<T>;

// ── Ranges ────────────────────────────────────────────────

/** Half-open index range `start..<end` */
export interface IndexRange {
  readonly start: number;
  readonly end: number;
}

// ── Channels ──────────────────────────────────────────────

/** Callback or partial observer accepted by subscribe methods */
export type ChannelObserver<T> = Partial<Observer<T>> | ((value: T) => void);

/**
 * Multicast publish/subscribe primitive the collection publishes through.
 *
 * Implementations must deliver values in publish order to every current
 * subscriber, replay nothing to late subscribers, and signal completion
 * to current and late subscribers once `complete()` has been called.
 */
export interface EventChannel<T> {
  /** Whether `complete()` has been called */
  readonly closed: boolean;
  publish(value: T): void;
  subscribe(observer: ChannelObserver<T>): Unsubscribable;
  complete(): void;
}

/** Creates the two channels a collection owns */
export interface ChannelFactory<T> {
  snapshots(): EventChannel<readonly T[]>;
  changes(): EventChannel<ChangeEvent<T>>;
}

// ── Configuration ─────────────────────────────────────────

/**
 * When events are published relative to the mutation that caused them.
 *
 * - `'immediate'` publishes inline; a mutation made from inside an
 *   observer publishes before the outer mutation finishes. Observers
 *   subscribed after the one that mutated then receive the nested change
 *   before the outer one, so they do not see mutations in the order they
 *   were made. A mirror kept with `applyChange` needs `'deferred'` when
 *   observers mutate the collection.
 * - `'deferred'` queues events and publishes them, in mutation order,
 *   once the outermost mutation returns.
 */
export type EmissionMode = 'immediate' | 'deferred';

/**
 * How whole-sequence assignment is described on the change stream.
 *
 * - `'replace'` removes every previous element, then inserts every new one.
 * - `'insertions'` inserts every new element and reports no removals.
 */
export type AssignmentMode = 'replace' | 'insertions';

/** Options accepted by {@link ObservableCollection} */
export interface CollectionOptions<T> {
  /** Label used in log context and errors (default: 'collection') */
  name?: string;
  /** Logger (default: a silent logger under `tidelist:<name>`) */
  logger?: CollectionLogger;
  /** Default: 'immediate' */
  emission?: EmissionMode;
  /** Default: 'replace' */
  assignment?: AssignmentMode;
  /** Channel factory (default: RxJS subject channels) */
  channels?: ChannelFactory<T>;
}

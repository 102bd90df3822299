/**
 * Observable, mutable ordered collection.
 *
 * Owns an ordered list of elements and publishes two streams: the full
 * snapshot after every mutation, and a {@link ChangeEvent} describing each
 * mutation as index-level inserts and removes.
 *
 * @module collection/observable-collection
 */

import { Observable, type Unsubscribable } from 'rxjs';
import { clearanceChange, compositeChange, insertChange, removeChange } from '../change/change.js';
import { subjectChannels } from '../channel/subject-channel.js';
import {
  CollectionDisposedError,
  type CollectionError,
  IndexOutOfBoundsError,
  InvalidRangeError,
} from '../errors/collection-error.js';
import { type CollectionLogger, createLogger } from '../observability/logger.js';
import type {
  AssignmentMode,
  ChangeEvent,
  ChannelObserver,
  CollectionOptions,
  EmissionMode,
  EventChannel,
  IndexRange,
} from '../types.js';
import { mapWithIndex } from '../utils/map-with-index.js';
import { MutationGuard } from './mutation-guard.js';

interface ResolvedOptions {
  name: string;
  logger: CollectionLogger;
  emission: EmissionMode;
  assignment: AssignmentMode;
}

/**
 * Ordered collection that reports every mutation.
 *
 * Each mutating call publishes exactly one change event (possibly a
 * composite) followed by exactly one snapshot. Construction publishes a
 * composite of inserts for the initial elements, then the initial
 * snapshot.
 *
 * @typeParam T - Element type
 *
 * @example
 * ```typescript
 * const list = createObservableCollection([1, 2, 3]);
 *
 * list.subscribeToChanges((change) => console.log(change));
 * list.subscribeToSnapshots((items) => console.log(items));
 *
 * list.append(4);
 * // { type: 'insert', index: 3, value: 4 }
 * // [1, 2, 3, 4]
 *
 * list.dispose();
 * ```
 */
export class ObservableCollection<T> {
  private readonly options: ResolvedOptions;
  private readonly guard: MutationGuard;
  private readonly snapshotChannel: EventChannel<readonly T[]>;
  private readonly changeChannel: EventChannel<ChangeEvent<T>>;
  private elements: T[];
  private isDisposed = false;

  /** Snapshot stream as an RxJS Observable */
  readonly snapshots$: Observable<readonly T[]>;

  /** Change stream as an RxJS Observable */
  readonly changes$: Observable<ChangeEvent<T>>;

  constructor(initial: readonly T[] = [], options: CollectionOptions<T> = {}) {
    const name = options.name ?? 'collection';
    this.options = {
      name,
      logger: options.logger ?? createLogger({ module: `tidelist:${name}` }),
      emission: options.emission ?? 'immediate',
      assignment: options.assignment ?? 'replace',
    };

    const channels = options.channels ?? subjectChannels<T>();
    this.snapshotChannel = channels.snapshots();
    this.changeChannel = channels.changes();
    this.guard = new MutationGuard(this.options.emission);

    this.snapshots$ = new Observable<readonly T[]>((subscriber) =>
      this.snapshotChannel.subscribe(subscriber)
    );
    this.changes$ = new Observable<ChangeEvent<T>>((subscriber) =>
      this.changeChannel.subscribe(subscriber)
    );

    this.elements = [...initial];
    this.guard.run(() => {
      this.commit(compositeChange(mapWithIndex(this.elements, insertChange)));
    });
    this.options.logger.lifecycle('created', this.elements.length);
  }

  // ── Reads ───────────────────────────────────────────────

  get name(): string {
    return this.options.name;
  }

  /** A copy of the current elements */
  get value(): T[] {
    return [...this.elements];
  }

  /** Replace the whole sequence; see {@link assign} */
  set value(next: readonly T[]) {
    this.assign(next);
  }

  get length(): number {
    return this.elements.length;
  }

  get disposed(): boolean {
    return this.isDisposed;
  }

  /** A copy of the current elements */
  getValue(): T[] {
    return this.value;
  }

  /** Element at `index`, or `undefined` outside `0..<length` */
  at(index: number): T | undefined {
    return this.isIndex(index, this.elements.length) ? this.elements[index] : undefined;
  }

  [Symbol.iterator](): IterableIterator<T> {
    return this.value.values();
  }

  subscribeToSnapshots(observer: ChannelObserver<readonly T[]>): Unsubscribable {
    return this.snapshotChannel.subscribe(observer);
  }

  subscribeToChanges(observer: ChannelObserver<ChangeEvent<T>>): Unsubscribable {
    return this.changeChannel.subscribe(observer);
  }

  // ── Mutations ───────────────────────────────────────────

  /** Remove and return the first element; does nothing when empty */
  removeFirst(): T | undefined {
    return this.mutate('removeFirst', () => {
      if (this.elements.length === 0) return undefined;
      const [removed] = this.elements.splice(0, 1);
      this.commit(removeChange(0, removed));
      return removed;
    });
  }

  /** Remove and return the last element; does nothing when empty */
  removeLast(): T | undefined {
    return this.mutate('removeLast', () => {
      if (this.elements.length === 0) return undefined;
      const index = this.elements.length - 1;
      const [removed] = this.elements.splice(index, 1);
      this.commit(removeChange(index, removed));
      return removed;
    });
  }

  /**
   * Remove every element. Publishes a clearance whose removes carry each
   * element's pre-removal index, even when the collection is already empty.
   */
  removeAll(): T[] {
    return this.mutate('removeAll', () => {
      const removed = this.elements;
      this.elements = [];
      this.commit(clearanceChange(removed));
      return removed;
    });
  }

  /**
   * Remove and return the element at `index`.
   *
   * @throws {IndexOutOfBoundsError} unless `0 <= index < length`
   */
  removeAt(index: number): T {
    return this.mutate('removeAt', () => {
      if (!this.isIndex(index, this.elements.length)) {
        throw this.reject(new IndexOutOfBoundsError('removeAt', index, this.elements.length));
      }
      const [removed] = this.elements.splice(index, 1);
      this.commit(removeChange(index, removed));
      return removed;
    });
  }

  append(value: T): void {
    this.mutate('append', () => {
      this.elements.push(value);
      this.commit(insertChange(this.elements.length - 1, value));
    });
  }

  /** Append `values` in order as one composite of tail inserts */
  appendAll(values: readonly T[]): void {
    this.mutate('appendAll', () => {
      const base = this.elements.length;
      for (const value of values) {
        this.elements.push(value);
      }
      this.commit(compositeChange(mapWithIndex(values, (i, value) => insertChange(base + i, value))));
    });
  }

  /**
   * Insert `value` at `index`, shifting later elements right.
   *
   * @throws {IndexOutOfBoundsError} unless `0 <= index <= length`
   */
  insert(value: T, index: number): void {
    this.mutate('insert', () => {
      if (!this.isIndex(index, this.elements.length + 1)) {
        throw this.reject(new IndexOutOfBoundsError('insert', index, this.elements.length));
      }
      this.elements.splice(index, 0, value);
      this.commit(insertChange(index, value));
    });
  }

  /**
   * Overwrite `values.length` consecutive elements starting at
   * `range.start`, left to right. Each overwritten position is reported as
   * a remove of the old element followed by an insert of the new one.
   *
   * Only `values.length` positions are written: a longer range keeps its
   * tail, and more values than the range holds keep overwriting past
   * `range.end`.
   *
   * @throws {InvalidRangeError} unless `0 <= start <= end <= length` and
   * `start + values.length <= length`
   */
  replace(range: IndexRange, values: readonly T[]): void {
    this.mutate('replace', () => {
      const length = this.elements.length;
      const { start, end } = range;
      const fits =
        Number.isInteger(start) &&
        Number.isInteger(end) &&
        start >= 0 &&
        start <= end &&
        end <= length &&
        start + values.length <= length;
      if (!fits) {
        throw this.reject(new InvalidRangeError('replace', range, values.length, length));
      }

      const changes: ChangeEvent<T>[] = [];
      values.forEach((value, offset) => {
        const index = start + offset;
        changes.push(removeChange(index, this.elements[index]));
        changes.push(insertChange(index, value));
        this.elements[index] = value;
      });
      this.commit(compositeChange(changes));
    });
  }

  /**
   * Replace the whole sequence at once.
   *
   * With the default `'replace'` assignment mode the change is a composite
   * of a clearance of every previous element, then a composite of inserts
   * for every new element. With `'insertions'` only
   * the inserts are reported.
   */
  assign(next: readonly T[]): void {
    this.mutate('assign', () => {
      const previous = this.elements;
      this.elements = [...next];
      const inserts = compositeChange(mapWithIndex(this.elements, insertChange));
      this.commit(
        this.options.assignment === 'insertions'
          ? inserts
          : compositeChange([clearanceChange(previous), inserts])
      );
    });
  }

  // ── Lifecycle ───────────────────────────────────────────

  /**
   * Complete both streams. Later mutations throw
   * {@link CollectionDisposedError}; reads keep returning the last state.
   */
  dispose(): void {
    if (this.isDisposed) return;
    this.isDisposed = true;
    this.changeChannel.complete();
    this.snapshotChannel.complete();
    this.options.logger.lifecycle('disposed', this.elements.length);
  }

  // ── Private ─────────────────────────────────────────────

  private mutate<R>(operation: string, body: () => R): R {
    if (this.isDisposed) {
      throw this.reject(new CollectionDisposedError(this.options.name, operation));
    }
    const before = this.elements.length;
    const result = this.guard.run(body);
    this.options.logger.mutated(operation, before, this.elements.length);
    return result;
  }

  /** Queue the change, then a snapshot of the state it produced */
  private commit(change: ChangeEvent<T>): void {
    this.guard.emit(() => this.publish(this.changeChannel, change));
    if (this.options.emission === 'deferred') {
      const snapshot = [...this.elements];
      this.guard.emit(() => this.publish(this.snapshotChannel, snapshot));
    } else {
      this.guard.emit(() => this.publish(this.snapshotChannel, [...this.elements]));
    }
  }

  private publish<E>(channel: EventChannel<E>, event: E): void {
    if (channel.closed) return;
    channel.publish(event);
  }

  private isIndex(index: number, bound: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < bound;
  }

  private reject<E extends CollectionError>(error: E): E {
    this.options.logger.rejected(error, this.elements.length);
    return error;
  }
}

/** Factory function to create an {@link ObservableCollection} */
export function createObservableCollection<T>(
  initial: readonly T[] = [],
  options?: CollectionOptions<T>
): ObservableCollection<T> {
  return new ObservableCollection(initial, options);
}

/**
 * Constructors and accessors for {@link ChangeEvent} values.
 *
 * @module change/change
 */

import type {
  ChangeEvent,
  ClearanceChange,
  CompositeChange,
  InsertChange,
  PrimitiveChange,
  RemoveChange,
} from '../types.js';
import { mapWithIndex } from '../utils/map-with-index.js';

export function insertChange<T>(index: number, value: T): InsertChange<T> {
  return { type: 'insert', index, value };
}

export function removeChange<T>(index: number, value: T): RemoveChange<T> {
  return { type: 'remove', index, value };
}

export function compositeChange<T>(changes: readonly ChangeEvent<T>[]): CompositeChange<T> {
  return { type: 'composite', indexing: 'sequential', changes };
}

/** Removal of `removed`, which were the first elements in this order */
export function clearanceChange<T>(removed: readonly T[]): ClearanceChange<T> {
  return { type: 'composite', indexing: 'start', changes: mapWithIndex(removed, removeChange) };
}

export function isPrimitiveChange<T>(change: ChangeEvent<T>): change is PrimitiveChange<T> {
  return change.type !== 'composite';
}

/** Index of an insert or remove; `undefined` for a composite */
export function changeIndex<T>(change: ChangeEvent<T>): number | undefined {
  return isPrimitiveChange(change) ? change.index : undefined;
}

/** Element carried by an insert or remove; `undefined` for a composite */
export function changeValue<T>(change: ChangeEvent<T>): T | undefined {
  return isPrimitiveChange(change) ? change.value : undefined;
}

/**
 * Expand nested composites into primitive edits that replay one after
 * another. A clearance comes out last-index first, so every removal still
 * points at its element when applied in sequence.
 */
export function flattenChange<T>(change: ChangeEvent<T>): PrimitiveChange<T>[] {
  if (isPrimitiveChange(change)) {
    return [change];
  }
  if (change.indexing === 'start') {
    return [...change.changes].reverse();
  }
  return change.changes.flatMap((inner) => flattenChange(inner));
}

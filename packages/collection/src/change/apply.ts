/**
 * Replays change events onto a plain array, so a consumer can keep a
 * mirror of a collection up to date without taking snapshots.
 *
 * Edits inside a `'sequential'` composite apply one after another. A
 * clearance (`indexing: 'start'`) removes the first `n` elements at once.
 *
 * @module change/apply
 */

import { IndexOutOfBoundsError, MalformedChangeError } from '../errors/collection-error.js';
import type { ChangeEvent, ClearanceChange } from '../types.js';

/**
 * Return a new array with `change` applied to `elements`.
 *
 * @throws {IndexOutOfBoundsError} when an index does not fit the array
 * @throws {MalformedChangeError} when a clearance's indices are not `0..n-1`
 *
 * @example
 * ```typescript
 * let mirror = list.value;
 * list.subscribeToChanges((change) => {
 *   mirror = applyChange(mirror, change);
 * });
 * ```
 */
export function applyChange<T>(elements: readonly T[], change: ChangeEvent<T>): T[] {
  const result = [...elements];
  applyInPlace(result, change);
  return result;
}

/** Apply several changes in order */
export function applyChanges<T>(elements: readonly T[], changes: Iterable<ChangeEvent<T>>): T[] {
  const result = [...elements];
  for (const change of changes) {
    applyInPlace(result, change);
  }
  return result;
}

function applyInPlace<T>(target: T[], change: ChangeEvent<T>): void {
  switch (change.type) {
    case 'insert':
      if (!Number.isInteger(change.index) || change.index < 0 || change.index > target.length) {
        throw new IndexOutOfBoundsError('applyChange', change.index, target.length);
      }
      target.splice(change.index, 0, change.value);
      return;

    case 'remove':
      if (!Number.isInteger(change.index) || change.index < 0 || change.index >= target.length) {
        throw new IndexOutOfBoundsError('applyChange', change.index, target.length);
      }
      target.splice(change.index, 1);
      return;

    case 'composite':
      if (change.indexing === 'start') {
        clear(target, change);
        return;
      }
      for (const inner of change.changes) {
        applyInPlace(target, inner);
      }
      return;
  }
}

function clear<T>(target: T[], clearance: ClearanceChange<T>): void {
  clearance.changes.forEach((removal, position) => {
    if (removal.index !== position) {
      throw new MalformedChangeError('applyChange', position, removal.index);
    }
  });
  const count = clearance.changes.length;
  if (count > target.length) {
    throw new IndexOutOfBoundsError('applyChange', count - 1, target.length);
  }
  target.splice(0, count);
}

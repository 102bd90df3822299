import { describe, expect, it } from 'vitest';
import { applyChange } from '../change/apply.js';
import { ObservableCollection } from '../collection/observable-collection.js';
import { IndexOutOfBoundsError } from '../errors/collection-error.js';
import type { ChangeEvent, EmissionMode } from '../types.js';

type Recorded = { kind: 'change'; change: ChangeEvent<number> } | { kind: 'snapshot'; items: readonly number[] };

/**
 * Build a collection whose first change observer appends 3 whenever it sees
 * 2 inserted, then attach a recorder behind it.
 */
function setup(emission: EmissionMode): { list: ObservableCollection<number>; events: Recorded[] } {
  const list = new ObservableCollection([1], { emission });
  list.subscribeToChanges((change) => {
    if (change.type === 'insert' && change.value === 2) {
      list.append(3);
    }
  });

  const events: Recorded[] = [];
  list.subscribeToChanges((change) => events.push({ kind: 'change', change }));
  list.subscribeToSnapshots((items) => events.push({ kind: 'snapshot', items }));
  return { list, events };
}

describe('re-entrant mutations', () => {
  describe('immediate emission', () => {
    it('should run nested mutations inline without deadlocking', () => {
      const { list, events } = setup('immediate');

      list.append(2);

      expect(list.value).toEqual([1, 2, 3]);
      expect(events).toEqual([
        { kind: 'change', change: { type: 'insert', index: 2, value: 3 } },
        { kind: 'snapshot', items: [1, 2, 3] },
        { kind: 'change', change: { type: 'insert', index: 1, value: 2 } },
        { kind: 'snapshot', items: [1, 2, 3] },
      ]);
      list.dispose();
    });

    it('should hand later observers changes that do not replay in order', () => {
      const { list, events } = setup('immediate');

      list.append(2);

      const changes = events.flatMap((e) => (e.kind === 'change' ? [e.change] : []));
      expect(() => changes.reduce<number[]>((mirror, change) => applyChange(mirror, change), [1])).toThrow(
        IndexOutOfBoundsError
      );
      list.dispose();
    });
  });

  describe('deferred emission', () => {
    it('should publish nested mutations after the outer one', () => {
      const { list, events } = setup('deferred');

      list.append(2);

      expect(list.value).toEqual([1, 2, 3]);
      expect(events).toEqual([
        { kind: 'change', change: { type: 'insert', index: 1, value: 2 } },
        { kind: 'snapshot', items: [1, 2] },
        { kind: 'change', change: { type: 'insert', index: 2, value: 3 } },
        { kind: 'snapshot', items: [1, 2, 3] },
      ]);
      list.dispose();
    });

    it('should keep a replayed mirror equal to each snapshot', () => {
      const { list, events } = setup('deferred');
      let mirror = list.value;
      const mismatches: string[] = [];

      list.subscribeToChanges((change) => {
        mirror = applyChange(mirror, change);
      });
      list.subscribeToSnapshots((items) => {
        if (JSON.stringify(items) !== JSON.stringify(mirror)) {
          mismatches.push(`${JSON.stringify(items)} != ${JSON.stringify(mirror)}`);
        }
      });

      list.append(2);
      list.removeFirst();

      expect(mismatches).toEqual([]);
      expect(mirror).toEqual([2, 3]);
      expect(events).toHaveLength(6);
      list.dispose();
    });

    it('should apply state synchronously', () => {
      const list = new ObservableCollection<string>([], { emission: 'deferred' });
      const lengths: number[] = [];
      list.subscribeToChanges(() => lengths.push(list.length));

      list.appendAll(['a', 'b']);

      expect(list.value).toEqual(['a', 'b']);
      expect(lengths).toEqual([2]);
      list.dispose();
    });
  });
});

/**
 * Map `values` with the index passed first, matching the
 * `(index, value)` argument order of change constructors.
 *
 * @example
 * ```typescript
 * mapWithIndex(['a', 'b'], (i, v) => `${i}:${v}`); // ['0:a', '1:b']
 * ```
 */
export function mapWithIndex<T, R>(values: readonly T[], transform: (index: number, value: T) => R): R[] {
  return values.map((value, index) => transform(index, value));
}

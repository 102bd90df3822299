import { describe, expect, it } from 'vitest';
import { mapWithIndex } from './map-with-index.js';

describe('mapWithIndex()', () => {
  it('should pass the index before the value', () => {
    expect(mapWithIndex(['a', 'b'], (i, v) => `${i}:${v}`)).toEqual(['0:a', '1:b']);
  });

  it('should return an empty array for no values', () => {
    expect(mapWithIndex([], (i) => i)).toEqual([]);
  });
});

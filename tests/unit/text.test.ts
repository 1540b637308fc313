import { describe, expect, it } from 'vitest';
import { JSON_JOIN, joinOrdered, joinSorted, joinUnique } from '../../src/utils/text.js';

describe('joinSorted', () => {
  it('trims, dedupes and sorts with ;', () => {
    expect(joinSorted([' UKM ', 'UKJ', 'UKM', null, '  '])).toBe('UKJ;UKM');
  });

  it('returns null when nothing survives', () => {
    expect(joinSorted([null, '', '   ', undefined])).toBeNull();
  });
});

describe('joinOrdered', () => {
  it('keeps first occurrence order with |', () => {
    expect(joinOrdered(['S2', 'S1', 'S2', 'S3'])).toBe('S2|S1|S3');
  });

  it('stringifies numbers and booleans', () => {
    expect(joinOrdered([1, false, 1, true])).toBe('1|false|true');
  });

  it('does not trim values', () => {
    expect(joinOrdered(['a ', 'a'])).toBe('a |a');
  });
});

describe('joinUnique', () => {
  it('honours a custom delimiter', () => {
    expect(joinUnique(['x', 'y'], { ...JSON_JOIN, delimiter: ', ' })).toBe('x, y');
  });
});

import { describe, expect, it } from 'vitest';
import { dig, digArray, digObject, digValue, pluck } from '../../src/utils/path.js';

const doc = {
  releases: [{ buyer: { id: 'B1' }, tag: ['award'], amount: 10, flag: false, nothing: null }],
};

describe('dig', () => {
  it('walks object keys and array indexes', () => {
    expect(dig(doc, 'releases', 0, 'buyer', 'id')).toBe('B1');
  });

  it('stops at the first missing link', () => {
    expect(dig(doc, 'releases', 1, 'buyer', 'id')).toBeUndefined();
    expect(dig(doc, 'releases', 0, 'tender', 'value', 'amount')).toBeUndefined();
    expect(dig(null, 'releases')).toBeUndefined();
  });

  it('does not index strings or descend into arrays by key', () => {
    expect(dig(doc, 'releases', 0, 'buyer', 'id', 0)).toBeUndefined();
    expect(dig(doc, 'releases', 'length')).toBeUndefined();
  });
});

describe('typed wrappers', () => {
  it('default absent containers', () => {
    expect(digObject(doc, 'releases', 0, 'tender')).toEqual({});
    expect(digArray(doc, 'releases', 0, 'awards')).toEqual([]);
    expect(digArray(doc, 'releases', 0, 'buyer')).toEqual([]);
  });

  it('keep scalar types and null out structures', () => {
    expect(digValue(doc, 'releases', 0, 'amount')).toBe(10);
    expect(digValue(doc, 'releases', 0, 'flag')).toBe(false);
    expect(digValue(doc, 'releases', 0, 'nothing')).toBeNull();
    expect(digValue(doc, 'releases', 0, 'buyer')).toBeNull();
  });

  it('plucks a path from every element', () => {
    expect(pluck([{ a: { b: 'x' } }, 'junk', { a: {} }], 'a', 'b')).toEqual(['x', null, null]);
  });
});

import { describe, it, expect } from 'vitest';

import { SuppressionSet } from '../suppression.js';

const q = (localName: string) => ({
  module: 'm',
  namespace: 'urn:m',
  localName,
});

describe('SuppressionSet', () => {
  it('removes acquired positions from data paths', () => {
    const set = new SuppressionSet();
    const release = set.acquire(1);
    expect(set.dataPath([q('a'), q('b'), q('c')])).toEqual([q('a'), q('c')]);
    release();
    expect(set.size).toBe(0);
  });

  it('keeps a position until every holder released it', () => {
    const set = new SuppressionSet();
    const first = set.acquire(2);
    const second = set.acquire(2);
    first();
    expect(set.has(2)).toBe(true);
    second();
    expect(set.has(2)).toBe(false);
  });

  it('ignores a second release from the same holder', () => {
    const set = new SuppressionSet();
    const first = set.acquire(0);
    const second = set.acquire(0);
    first();
    first();
    expect(set.has(0)).toBe(true);
    second();
    expect(set.has(0)).toBe(false);
  });
});

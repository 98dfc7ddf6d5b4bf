import { describe, it, expect, beforeEach } from 'vitest';
import { SpatialIndex, cellKey } from '../../src/utils/SpatialIndex';

describe('SpatialIndex', () => {
  let index: SpatialIndex;

  beforeEach(() => {
    index = SpatialIndex.fromSize(40, 20);
  });

  it('builds bounds from the world size', () => {
    expect([index.bounds.left, index.bounds.bottom, index.bounds.right, index.bounds.top]).toEqual([-20, -10, 20, 10]);
  });

  it('returns undefined for an empty cell', () => {
    expect(index.lookup({ x: 0, y: 0 })).toBeUndefined();
  });

  it('finds an inserted particle', () => {
    index.insert({ x: 2, y: 3 }, 7);
    expect(index.lookup({ x: 2, y: 3 })).toBe(7);
    expect(index.lookup({ x: 3, y: 2 })).toBeUndefined();
  });

  it('keeps one particle per cell', () => {
    index.insert({ x: 1, y: 1 }, 1);
    index.insert({ x: 1, y: 1 }, 2);
    expect(index.lookup({ x: 1, y: 1 })).toBe(2);
    expect(index.size).toBe(1);
  });

  it('removes entries', () => {
    index.insert({ x: 1, y: 1 }, 1);
    index.remove({ x: 1, y: 1 });
    expect(index.lookup({ x: 1, y: 1 })).toBeUndefined();
    expect(index.size).toBe(0);
  });

  it('handles negative cells', () => {
    index.insert({ x: -1, y: -1 }, 42);
    index.insert({ x: -1, y: 0 }, 43);
    index.insert({ x: 0, y: -1 }, 44);
    expect(index.lookup({ x: -1, y: -1 })).toBe(42);
    expect(index.lookup({ x: -1, y: 0 })).toBe(43);
    expect(index.lookup({ x: 0, y: -1 })).toBe(44);
  });
});

describe('cellKey', () => {
  it('keeps the outermost cells of the widest world apart', () => {
    // A 65535-wide world spans cells -32768 through 32767
    expect(cellKey({ x: -32768, y: 0 })).not.toBe(cellKey({ x: 32767, y: 0 }));
    expect(cellKey({ x: 0, y: -32768 })).not.toBe(cellKey({ x: 0, y: 32767 }));
  });

  it('distinguishes mirrored cells', () => {
    expect(cellKey({ x: 0, y: -1 })).not.toBe(cellKey({ x: -1, y: 0 }));
  });
});

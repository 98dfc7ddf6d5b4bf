import { describe, it, expect } from 'vitest';
import { Bounds } from '../../src/utils/Bounds';

describe('Bounds', () => {
  const bounds = Bounds.fromSize(20, 10);

  it('is centered on the origin', () => {
    expect([bounds.left, bounds.bottom, bounds.right, bounds.top]).toEqual([-10, -5, 10, 5]);
  });

  describe('outside', () => {
    it('returns null inside', () => {
      expect(bounds.outside({ x: 0, y: 0 })).toBeNull();
    });

    it('treats edges as inside', () => {
      expect(bounds.outside({ x: 10, y: 5 })).toBeNull();
      expect(bounds.outside({ x: -10, y: -5 })).toBeNull();
    });

    it('points left past the right wall', () => {
      expect(bounds.outside({ x: 10.1, y: 0 })).toEqual({ x: -1, y: 0 });
    });

    it('points right past the left wall', () => {
      expect(bounds.outside({ x: -10.5, y: 0 })).toEqual({ x: 1, y: 0 });
    });

    it('points up below the floor', () => {
      expect(bounds.outside({ x: 0, y: -6 })).toEqual({ x: 0, y: 1 });
    });

    it('points down above the ceiling', () => {
      expect(bounds.outside({ x: 0, y: 6 })).toEqual({ x: 0, y: -1 });
    });

    it('sums both axes past a corner', () => {
      expect(bounds.outside({ x: 11, y: 6 })).toEqual({ x: -1, y: -1 });
      expect(bounds.outside({ x: -11, y: -6 })).toEqual({ x: 1, y: 1 });
    });
  });

  it('contains is the negation of outside', () => {
    expect(bounds.contains({ x: 3, y: 3 })).toBe(true);
    expect(bounds.contains({ x: 30, y: 3 })).toBe(false);
  });
});

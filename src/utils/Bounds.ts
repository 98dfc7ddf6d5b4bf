import type { Vec2 } from './MathUtils';

/**
 * Axis-aligned playable area. Edges are inclusive.
 */
export class Bounds {
  constructor(
    readonly left: number,
    readonly right: number,
    readonly bottom: number,
    readonly top: number,
  ) {}

  /** Centered on the origin, spanning width x height. */
  static fromSize(width: number, height: number): Bounds {
    return new Bounds(-width / 2, width / 2, -height / 2, height / 2);
  }

  /**
   * Inward-pointing normal when `point` lies outside, otherwise null.
   * Axes are checked independently and summed, so a point past a corner
   * yields a diagonal (non-unit) normal.
   */
  outside(point: Vec2): Vec2 | null {
    let nx = 0;
    let ny = 0;
    if (point.x < this.left) nx = 1;
    else if (point.x > this.right) nx = -1;
    if (point.y < this.bottom) ny = 1;
    else if (point.y > this.top) ny = -1;
    if (nx === 0 && ny === 0) return null;
    return { x: nx, y: ny };
  }

  contains(point: Vec2): boolean {
    return this.outside(point) === null;
  }
}

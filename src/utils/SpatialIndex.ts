import type { Cell } from './MathUtils';
import { Bounds } from './Bounds';

/**
 * Cell occupancy map: at most one particle per integer cell.
 * Holds no collision logic; Movement is its only writer.
 */
export class SpatialIndex {
  private cells = new Map<number, number>();

  constructor(readonly bounds: Bounds) {}

  static fromSize(width: number, height: number): SpatialIndex {
    return new SpatialIndex(Bounds.fromSize(width, height));
  }

  get size(): number {
    return this.cells.size;
  }

  lookup(cell: Cell): number | undefined {
    return this.cells.get(cellKey(cell));
  }

  insert(cell: Cell, eid: number): void {
    this.cells.set(cellKey(cell), eid);
  }

  remove(cell: Cell): void {
    this.cells.delete(cellKey(cell));
  }
}

/** Widest world whose cells still get distinct 16-bit coordinates in a key. */
export const MAX_WORLD_SIZE = 0xFFFF;

// Pack two 16-bit signed ints into one 32-bit number
export function cellKey(cell: Cell): number {
  return ((cell.x & 0xFFFF) << 16) | (cell.y & 0xFFFF);
}


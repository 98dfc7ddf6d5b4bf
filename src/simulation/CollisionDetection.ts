import type { Cell, Vec2 } from '../utils/MathUtils';
import { add, isZero, sameCell, worldToCell } from '../utils/MathUtils';
import type { SpatialIndex } from '../utils/SpatialIndex';
import { cellKey } from '../utils/SpatialIndex';

export type CollisionEvent =
  | { kind: 'world'; eid: number; normal: Vec2 }
  | { kind: 'pair'; a: number; b: number };

export interface Prediction {
  current: Cell;
  predicted: Cell;
  position: Vec2; // position + velocity
}

export function predict(position: Vec2, velocity: Vec2): Prediction {
  const next = add(position, velocity);
  return {
    current: worldToCell(position.x, position.y),
    predicted: worldToCell(next.x, next.y),
    position: next,
  };
}

/**
 * Whether a move needs a collision check: it leaves the current cell,
 * or it ends outside the world while staying in the edge cell.
 */
export function needsCheck(prediction: Prediction, index: SpatialIndex): boolean {
  return !sameCell(prediction.current, prediction.predicted)
    || index.bounds.outside(prediction.position) !== null;
}

/**
 * Destination cells reserved during one discovery pass, so two particles
 * heading for the same empty cell on the same tick see each other.
 */
export class CellClaims {
  private byCell = new Map<number, number>();
  private byEntity = new Map<number, number>();

  claim(eid: number, cell: Cell): void {
    this.release(eid);
    const k = cellKey(cell);
    this.byCell.set(k, eid);
    this.byEntity.set(eid, k);
  }

  release(eid: number): void {
    const k = this.byEntity.get(eid);
    if (k === undefined) return;
    this.byEntity.delete(eid);
    if (this.byCell.get(k) === eid) this.byCell.delete(k);
  }

  claimant(cell: Cell): number | undefined {
    return this.byCell.get(cellKey(cell));
  }

  get size(): number {
    return this.byCell.size;
  }

  clear(): void {
    this.byCell.clear();
    this.byEntity.clear();
  }
}

/**
 * World bounds first, then the occupant of the destination cell, then any
 * other particle that already claimed it this pass.
 */
export function detectCollision(
  eid: number,
  predictedPosition: Vec2,
  index: SpatialIndex,
  claims?: CellClaims,
): CollisionEvent | null {
  const normal = index.bounds.outside(predictedPosition);
  if (normal) return { kind: 'world', eid, normal };

  const cell = worldToCell(predictedPosition.x, predictedPosition.y);
  const occupant = index.lookup(cell);
  if (occupant !== undefined && occupant !== eid) {
    return { kind: 'pair', a: eid, b: occupant };
  }

  const claimant = claims?.claimant(cell);
  if (claimant !== undefined && claimant !== eid) {
    return { kind: 'pair', a: eid, b: claimant };
  }

  return null;
}

/**
 * Full check for a particle about to move: skips stationary particles and
 * moves that stay inside the current cell, claims the destination when free.
 */
export function checkMove(
  eid: number,
  position: Vec2,
  velocity: Vec2,
  index: SpatialIndex,
  claims?: CellClaims,
): CollisionEvent | null {
  claims?.release(eid);
  if (isZero(velocity)) return null;
  const prediction = predict(position, velocity);
  if (!needsCheck(prediction, index)) return null;
  const collision = detectCollision(eid, prediction.position, index, claims);
  if (!collision && !sameCell(prediction.current, prediction.predicted)) {
    claims?.claim(eid, prediction.predicted);
  }
  return collision;
}

/** Order-independent identity of a particle pair. */
export function pairKey(a: number, b: number): string {
  return a < b ? `${a}:${b}` : `${b}:${a}`;
}

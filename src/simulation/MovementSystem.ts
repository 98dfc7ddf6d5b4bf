import type { GameSystem } from '../core/Simulation';
import type { World } from '../core/ECS';
import { Position, Velocity, particleQuery, particleEnter, particleExit } from '../core/ECS';
import type { SpatialIndex } from '../utils/SpatialIndex';
import { sameCell, worldToCell } from '../utils/MathUtils';

/**
 * Commits velocities to positions and keeps the spatial index in step.
 * Sole writer of the index.
 */
export class MovementSystem implements GameSystem {
  constructor(private readonly index: SpatialIndex) {}

  init(world: World): void {
    const eids = particleQuery(world);
    for (let i = 0; i < eids.length; i++) {
      this.register(eids[i]);
    }
    // Already registered above; drain so update() doesn't see them again
    particleEnter(world);
  }

  update(world: World): void {
    this.syncMembership(world);

    const eids = particleQuery(world);
    for (let i = 0; i < eids.length; i++) {
      const eid = eids[i];
      const px = Position.x[eid];
      const py = Position.y[eid];
      const nx = px + Velocity.x[eid];
      const ny = py + Velocity.y[eid];
      const current = worldToCell(px, py);
      const next = worldToCell(nx, ny);

      if (!sameCell(current, next)) {
        // Another particle may have taken the cell since we entered it
        if (this.index.lookup(current) === eid) {
          this.index.remove(current);
        }
        this.index.insert(next, eid);
      }
      Position.x[eid] = nx;
      Position.y[eid] = ny;
    }
  }

  /** Index newly spawned particles, forget removed ones. */
  private syncMembership(world: World): void {
    const exited = particleExit(world);
    for (let i = 0; i < exited.length; i++) {
      const eid = exited[i];
      // Component arrays still hold the last position of a removed entity
      const cell = worldToCell(Position.x[eid], Position.y[eid]);
      if (this.index.lookup(cell) === eid) this.index.remove(cell);
    }

    const entered = particleEnter(world);
    for (let i = 0; i < entered.length; i++) {
      this.register(entered[i]);
    }
  }

  private register(eid: number): void {
    const cell = worldToCell(Position.x[eid], Position.y[eid]);
    const occupant = this.index.lookup(cell);
    if (occupant !== undefined) {
      console.warn(`[Movement] Cell (${cell.x}, ${cell.y}) already holds particle ${occupant}; particle ${eid} is not indexed`);
      return;
    }
    this.index.insert(cell, eid);
  }
}

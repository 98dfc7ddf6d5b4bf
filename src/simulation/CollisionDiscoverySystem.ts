import type { GameSystem } from '../core/Simulation';
import type { World } from '../core/ECS';
import { Position, Velocity, particleQuery } from '../core/ECS';
import type { SpatialIndex } from '../utils/SpatialIndex';
import type { Vec2 } from '../utils/MathUtils';
import type { CollisionQueue } from './CollisionQueue';
import { CellClaims, checkMove, pairKey } from './CollisionDetection';

/**
 * Fixed-interval pass: applies gravity to every particle, predicts its next
 * cell and queues a collision event when that cell is blocked.
 */
export class CollisionDiscoverySystem implements GameSystem {
  private claims = new CellClaims();
  // Canonical pair keys already emitted this pass
  private handled = new Set<string>();

  constructor(
    private readonly index: SpatialIndex,
    private readonly queue: CollisionQueue,
    private readonly gravity: Vec2,
  ) {}

  /** Claims made by the most recent pass; the resolver keeps them current. */
  getClaims(): CellClaims {
    return this.claims;
  }

  update(world: World, dt: number): void {
    this.claims.clear();
    this.handled.clear();
    const seconds = dt / 1000;

    const eids = particleQuery(world);
    for (let i = 0; i < eids.length; i++) {
      const eid = eids[i];
      Velocity.x[eid] += this.gravity.x * seconds;
      Velocity.y[eid] += this.gravity.y * seconds;

      const collision = checkMove(
        eid,
        { x: Position.x[eid], y: Position.y[eid] },
        { x: Velocity.x[eid], y: Velocity.y[eid] },
        this.index,
        this.claims,
      );
      if (!collision) continue;

      if (collision.kind === 'pair') {
        const key = pairKey(collision.a, collision.b);
        if (this.handled.has(key)) continue;
        this.handled.add(key);
      }
      this.queue.push(collision);
    }
  }
}

import type { World } from './ECS';
import { Position, Velocity, Mass, Elasticity, particleQuery, isParticle } from './ECS';
import type { Vec2 } from '../utils/MathUtils';

export interface ParticleState {
  position: Vec2;
  velocity: Vec2;
  mass: number;
  elasticity: number;
}

export type ManyResult =
  | { ok: true; particles: ParticleState[] }
  | { ok: false; missing: number[] };

/**
 * Entity-store view over the particle components of a bitECS world.
 * Reads return snapshots; writes go through the setters.
 */
export class ParticleStore {
  constructor(private readonly world: World) {}

  has(eid: number): boolean {
    return isParticle(this.world, eid);
  }

  get(eid: number): ParticleState | null {
    if (!this.has(eid)) return null;
    return {
      position: { x: Position.x[eid], y: Position.y[eid] },
      velocity: { x: Velocity.x[eid], y: Velocity.y[eid] },
      mass: Mass.value[eid],
      elasticity: Elasticity.value[eid],
    };
  }

  /** All-or-nothing fetch; reports every stale id instead of throwing. */
  getMany(eids: readonly number[]): ManyResult {
    const particles: ParticleState[] = [];
    const missing: number[] = [];
    for (const eid of eids) {
      const p = this.get(eid);
      if (p) particles.push(p);
      else missing.push(eid);
    }
    if (missing.length > 0) return { ok: false, missing };
    return { ok: true, particles };
  }

  iterate(): readonly number[] {
    return particleQuery(this.world);
  }

  getVelocity(eid: number): Vec2 {
    return { x: Velocity.x[eid], y: Velocity.y[eid] };
  }

  setVelocity(eid: number, v: Vec2): void {
    Velocity.x[eid] = v.x;
    Velocity.y[eid] = v.y;
  }
}

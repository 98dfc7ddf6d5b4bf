import type { ParticleStore, ParticleState } from '../core/ParticleStore';
import { EventBus } from '../core/EventBus';
import type { PairPolicy } from '../config/SimulationConfig';
import type { SpatialIndex } from '../utils/SpatialIndex';
import type { Vec2 } from '../utils/MathUtils';
import { add, dot, normalize, quantizeVec, scale, sub } from '../utils/MathUtils';
import type { CellClaims, CollisionEvent } from './CollisionDetection';
import { checkMove, pairKey } from './CollisionDetection';
import type { CollisionQueue } from './CollisionQueue';

type Body = Pick<ParticleState, 'velocity' | 'mass' | 'elasticity'>;
type Moving = Pick<ParticleState, 'position' | 'velocity'>;

/**
 * Post-impact velocity of `self`, using self's elasticity:
 * (e·m_o·(v_o − v_s) + m_s·v_s + m_o·v_o) / (m_s + m_o)
 */
export function calculateCollisionVelocity(self: Body, other: Body): Vec2 {
  const impulse = scale(sub(other.velocity, self.velocity), self.elasticity * other.mass);
  const momentum = add(scale(self.velocity, self.mass), scale(other.velocity, other.mass));
  return scale(add(impulse, momentum), 1 / (self.mass + other.mass));
}

/** Whether `self` is closing in on `other` along the line between them. */
export function isApproaching(self: Moving, other: Moving): boolean {
  return dot(sub(self.velocity, other.velocity), sub(other.position, self.position)) > 0;
}

/**
 * v' = v − (1+e)·(v·n̂)·n̂
 * The dot product also takes the unit normal. For a corner normal such as
 * (−1, −1) this differs from projecting with the raw normal, which would
 * scale the change by √2.
 */
export function reflectOffWall(velocity: Vec2, normal: Vec2, elasticity: number): Vec2 {
  const n = normalize(normal);
  return sub(velocity, scale(n, (1 + elasticity) * dot(velocity, n)));
}

type WorkItem =
  | { kind: 'resolve'; event: CollisionEvent }
  | { kind: 'recheck'; eid: number }
  | { kind: 'settle'; a: number; b: number };

export interface ResolverOptions {
  pairPolicy: PairPolicy;
  maxCascadeSteps: number;
}

export interface ResolveStats {
  steps: number;
  truncated: boolean;
}

/**
 * Resolves collision events and their cascades. Follow-up checks go on an
 * explicit LIFO work-list, so a cascade runs depth-first in the order a
 * recursive resolver would visit it, without growing the call stack.
 */
export class CollisionResolver {
  constructor(
    private readonly store: ParticleStore,
    private readonly index: SpatialIndex,
    private readonly options: ResolverOptions,
    private readonly claims?: CellClaims,
  ) {}

  /** Resolve every queued event. Returns the number of events handled. */
  drain(queue: CollisionQueue): number {
    const events = queue.drain();
    for (const event of events) {
      this.resolve(event);
    }
    return events.length;
  }

  resolve(event: CollisionEvent): ResolveStats {
    const work: WorkItem[] = [{ kind: 'resolve', event }];
    // Pairs that already exchanged an impulse during this event
    const settled = new Set<string>();
    let steps = 0;

    while (work.length > 0) {
      if (steps >= this.options.maxCascadeSteps) {
        console.warn(`[Collision] Cascade limit of ${this.options.maxCascadeSteps} steps reached, dropping ${work.length} pending checks`);
        EventBus.emit('cascade:limit', { steps, dropped: work.length });
        this.haltPending(work);
        return { steps, truncated: true };
      }
      const item = work.pop();
      if (!item) break;
      steps++;

      switch (item.kind) {
        case 'resolve':
          if (item.event.kind === 'pair') this.resolvePair(item.event.a, item.event.b, work, settled);
          else this.resolveWorld(item.event.eid, item.event.normal, work);
          break;
        case 'recheck':
          this.recheck(item.eid, work);
          break;
        case 'settle':
          this.settle(item.a, item.b);
          break;
      }
    }

    return { steps, truncated: false };
  }

  private resolvePair(a: number, b: number, work: WorkItem[], settled: Set<string>): void {
    const fetched = this.store.getMany([a, b]);
    if (!fetched.ok) {
      EventBus.emit('collision:skipped', { eids: fetched.missing, reason: 'stale' });
      return;
    }
    const [pa, pb] = fetched.particles;
    const key = pairKey(a, b);
    if (this.options.pairPolicy === 'symmetric') {
      if (settled.has(key) || !isApproaching(pa, pb)) {
        // A waits outside B's cell; B may still be heading for A's
        this.store.setVelocity(a, { x: 0, y: 0 });
        this.claims?.release(a);
        EventBus.emit('collision:blocked', { eid: a, by: b });
        work.push({ kind: 'recheck', eid: b });
        return;
      }
      settled.add(key);
    }
    const velocityA = quantizeVec(calculateCollisionVelocity(pa, pb));
    const velocityB = quantizeVec(calculateCollisionVelocity(pb, pa));
    this.store.setVelocity(a, velocityA);
    this.store.setVelocity(b, velocityB);
    this.claims?.release(a);
    this.claims?.release(b);
    EventBus.emit('collision:pair', { a, b, velocityA, velocityB });

    // LIFO: B's cascade always runs first
    if (this.options.pairPolicy === 'asymmetric') {
      work.push({ kind: 'settle', a, b });
    } else {
      work.push({ kind: 'recheck', eid: a });
    }
    work.push({ kind: 'recheck', eid: b });
  }

  private resolveWorld(eid: number, normal: Vec2, work: WorkItem[]): void {
    const p = this.store.get(eid);
    if (!p) {
      EventBus.emit('collision:skipped', { eids: [eid], reason: 'stale' });
      return;
    }
    const velocity = quantizeVec(reflectOffWall(p.velocity, normal, p.elasticity));
    this.store.setVelocity(eid, velocity);
    EventBus.emit('collision:world', { eid, normal, velocity });
    work.push({ kind: 'recheck', eid });
  }

  private recheck(eid: number, work: WorkItem[]): void {
    const p = this.store.get(eid);
    if (!p) {
      EventBus.emit('collision:skipped', { eids: [eid], reason: 'stale' });
      return;
    }
    const collision = checkMove(eid, p.position, p.velocity, this.index, this.claims);
    if (collision) work.push({ kind: 'resolve', event: collision });
  }

  /** Stop every particle a dropped step still refers to, so none moves unchecked. */
  private haltPending(work: WorkItem[]): void {
    const eids = new Set<number>();
    for (const item of work) {
      if (item.kind === 'recheck') eids.add(item.eid);
      else if (item.kind === 'settle') {
        eids.add(item.a);
        eids.add(item.b);
      } else if (item.event.kind === 'pair') {
        eids.add(item.event.a);
        eids.add(item.event.b);
      } else {
        eids.add(item.event.eid);
      }
    }
    for (const eid of eids) {
      if (!this.store.has(eid)) continue;
      this.store.setVelocity(eid, { x: 0, y: 0 });
      this.claims?.release(eid);
    }
    work.length = 0;
  }

  /** Second pass on A against B's post-cascade state; A is not re-checked. */
  private settle(a: number, b: number): void {
    const fetched = this.store.getMany([a, b]);
    if (!fetched.ok) {
      EventBus.emit('collision:skipped', { eids: fetched.missing, reason: 'stale' });
      return;
    }
    const [pa, pb] = fetched.particles;
    this.store.setVelocity(a, quantizeVec(calculateCollisionVelocity(pa, pb)));
    this.claims?.release(a);
  }
}

/**
 * Per-tick particle state hash for reproducibility checks.
 * FNV-1a over positions and velocities in query order. Entity ids are left
 * out: bitECS hands out ids from a cursor shared by every world, so the same
 * scenario built twice gets different ids.
 */

import { Position, Velocity, particleQuery } from './ECS';
import type { World } from './ECS';

export function computeParticleHash(world: World): number {
  let h = 0x811c9dc5; // FNV offset basis

  const eids = particleQuery(world);
  for (let i = 0; i < eids.length; i++) {
    const eid = eids[i];
    h = fnvMix(h, i);
    h = fnvMixF64(h, Position.x[eid]);
    h = fnvMixF64(h, Position.y[eid]);
    h = fnvMixF64(h, Velocity.x[eid]);
    h = fnvMixF64(h, Velocity.y[eid]);
  }

  return h >>> 0; // Ensure unsigned
}

/** FNV-1a mix step for a 32-bit integer */
function fnvMix(h: number, val: number): number {
  h ^= val & 0xff;
  h = Math.imul(h, 0x01000193);
  h ^= (val >>> 8) & 0xff;
  h = Math.imul(h, 0x01000193);
  h ^= (val >>> 16) & 0xff;
  h = Math.imul(h, 0x01000193);
  h ^= (val >>> 24) & 0xff;
  h = Math.imul(h, 0x01000193);
  return h;
}

// Reinterpret float64 bits as two u32 words
const f64Buf = new Float64Array(1);
const u32View = new Uint32Array(f64Buf.buffer);

function fnvMixF64(h: number, val: number): number {
  f64Buf[0] = val;
  return fnvMix(fnvMix(h, u32View[0]), u32View[1]);
}

/**
 * Sparse tick -> hash history. Entries older than maxAge ticks are evicted.
 */
export class SimulationHashTracker {
  private hashes = new Map<number, number>();

  constructor(private maxAge = 1000) {}

  record(tick: number, hash: number): void {
    this.hashes.set(tick, hash);
    const cutoff = tick - this.maxAge;
    for (const t of this.hashes.keys()) {
      if (t <= cutoff) this.hashes.delete(t);
      else break; // Map iterates in insertion order
    }
  }

  getHash(tick: number): number | null {
    return this.hashes.get(tick) ?? null;
  }

  verify(tick: number, remoteHash: number): 'match' | 'mismatch' | 'unavailable' {
    const local = this.getHash(tick);
    if (local === null) return 'unavailable';
    return local === remoteHash ? 'match' : 'mismatch';
  }

  get size(): number {
    return this.hashes.size;
  }
}

import { describe, it, expect } from 'vitest';
import { computeParticleHash, SimulationHashTracker } from '../../src/core/SimulationHash';
import { createParticleWorld, spawnParticle, Velocity } from '../../src/core/ECS';

describe('computeParticleHash', () => {
  it('matches for identical layouts in separate worlds', () => {
    const w1 = createParticleWorld();
    const w2 = createParticleWorld();
    for (const w of [w1, w2]) {
      spawnParticle(w, { x: 0.5, y: 0.5, vx: 1, vy: 0 });
      spawnParticle(w, { x: 2.5, y: -1.5, vx: 0, vy: -0.25 });
    }
    expect(computeParticleHash(w1)).toBe(computeParticleHash(w2));
  });

  it('changes when a velocity changes', () => {
    const world = createParticleWorld();
    const eid = spawnParticle(world, { x: 0.5, y: 0.5, vx: 1, vy: 0 });
    const before = computeParticleHash(world);
    Velocity.x[eid] = 0.99;
    expect(computeParticleHash(world)).not.toBe(before);
  });

  it('returns an unsigned 32-bit value', () => {
    const world = createParticleWorld();
    spawnParticle(world, { x: -3, y: 4 });
    const h = computeParticleHash(world);
    expect(h).toBeGreaterThanOrEqual(0);
    expect(h).toBeLessThanOrEqual(0xFFFFFFFF);
    expect(Number.isInteger(h)).toBe(true);
  });

  it('hashes an empty world to the FNV offset basis', () => {
    expect(computeParticleHash(createParticleWorld())).toBe(0x811c9dc5);
  });
});

describe('SimulationHashTracker', () => {
  it('records and retrieves hashes', () => {
    const tracker = new SimulationHashTracker(1000);
    tracker.record(10, 0xDEADBEEF);
    tracker.record(20, 0xCAFEBABE);

    expect(tracker.getHash(10)).toBe(0xDEADBEEF);
    expect(tracker.getHash(20)).toBe(0xCAFEBABE);
    expect(tracker.getHash(30)).toBeNull();
  });

  it('evicts entries older than maxAge', () => {
    const tracker = new SimulationHashTracker(100);
    tracker.record(0, 100);
    tracker.record(25, 200);
    tracker.record(50, 300);
    tracker.record(75, 400);
    tracker.record(100, 500); // 100 - 0 >= 100

    expect(tracker.getHash(0)).toBeNull();
    expect(tracker.getHash(25)).toBe(200);
    expect(tracker.getHash(100)).toBe(500);
    expect(tracker.size).toBe(4);
  });

  it('verifies remote hashes', () => {
    const tracker = new SimulationHashTracker(1000);
    tracker.record(25, 0xABCD);

    expect(tracker.verify(25, 0xABCD)).toBe('match');
    expect(tracker.verify(25, 0x1234)).toBe('mismatch');
    expect(tracker.verify(99, 0xABCD)).toBe('unavailable');
  });
});

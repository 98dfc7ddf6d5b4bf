import { beforeEach, describe, expect, it, vi } from 'vitest';

import { MovementSystem } from '../../src/simulation/MovementSystem';
import { createParticleWorld, destroyParticle, Position, spawnParticle, type World } from '../../src/core/ECS';
import { SpatialIndex } from '../../src/utils/SpatialIndex';

describe('MovementSystem', () => {
  let world: World;
  let index: SpatialIndex;
  let movement: MovementSystem;

  beforeEach(() => {
    world = createParticleWorld();
    index = SpatialIndex.fromSize(20, 20);
    movement = new MovementSystem(index);
  });

  it('registers existing particles on init', () => {
    const a = spawnParticle(world, { x: 0.5, y: 0.5 });
    const b = spawnParticle(world, { x: -3.5, y: 2.5 });
    movement.init(world);
    expect(index.lookup({ x: 0, y: 0 })).toBe(a);
    expect(index.lookup({ x: -4, y: 2 })).toBe(b);
    expect(index.size).toBe(2);
  });

  it('does not overwrite an occupied cell when registering', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const a = spawnParticle(world, { x: 0.2, y: 0.2 });
    const b = spawnParticle(world, { x: 0.8, y: 0.8 });
    movement.init(world);
    expect(index.lookup({ x: 0, y: 0 })).toBe(a);
    expect(index.size).toBe(1);
    expect(warn).toHaveBeenCalledWith(`[Movement] Cell (0, 0) already holds particle ${a}; particle ${b} is not indexed`);
    warn.mockRestore();
  });

  it('moves a particle and re-indexes it when the cell changes', () => {
    const eid = spawnParticle(world, { x: 0.5, y: 0.5, vx: 1 });
    movement.init(world);
    movement.update(world);
    expect(Position.x[eid]).toBe(1.5);
    expect(Position.y[eid]).toBe(0.5);
    expect(index.lookup({ x: 0, y: 0 })).toBeUndefined();
    expect(index.lookup({ x: 1, y: 0 })).toBe(eid);
  });

  it('keeps the index entry for a move inside the cell', () => {
    const eid = spawnParticle(world, { x: 0.5, y: 0.5, vx: 0.25 });
    movement.init(world);
    movement.update(world);
    expect(Position.x[eid]).toBe(0.75);
    expect(index.lookup({ x: 0, y: 0 })).toBe(eid);
  });

  it('leaves a cell alone that another particle has taken', () => {
    const eid = spawnParticle(world, { x: 0.5, y: 0.5, vx: 1 });
    movement.init(world);
    index.insert({ x: 0, y: 0 }, 99);
    movement.update(world);
    expect(index.lookup({ x: 0, y: 0 })).toBe(99);
    expect(index.lookup({ x: 1, y: 0 })).toBe(eid);
  });

  it('indexes particles spawned after init', () => {
    movement.init(world);
    const eid = spawnParticle(world, { x: 2.5, y: 2.5 });
    movement.update(world);
    expect(index.lookup({ x: 2, y: 2 })).toBe(eid);
  });

  it('drops removed particles from the index', () => {
    const eid = spawnParticle(world, { x: 2.5, y: 2.5 });
    movement.init(world);
    destroyParticle(world, eid);
    movement.update(world);
    expect(index.lookup({ x: 2, y: 2 })).toBeUndefined();
    expect(index.size).toBe(0);
  });
});

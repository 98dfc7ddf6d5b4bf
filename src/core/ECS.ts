import {
  createWorld,
  addEntity,
  removeEntity,
  addComponent,
  hasComponent,
  defineComponent,
  Types,
  defineQuery,
  enterQuery,
  exitQuery,
} from 'bitecs';

// bitECS world type
export type World = ReturnType<typeof createWorld>;

// --- Component Definitions ---
// f64 storage so quantized velocities and summed positions match plain JS numbers

export const Position = defineComponent({
  x: Types.f64,
  y: Types.f64,
});

export const Velocity = defineComponent({
  x: Types.f64,
  y: Types.f64,
});

export const Mass = defineComponent({
  value: Types.f64,
});

export const Elasticity = defineComponent({
  value: Types.f64, // 0 = fully inelastic, 1 = perfectly elastic
});

// --- Queries ---

export const particleQuery = defineQuery([Position, Velocity, Mass, Elasticity]);

export const particleEnter = enterQuery(particleQuery);
export const particleExit = exitQuery(particleQuery);

// --- World ---

export function createParticleWorld(): World {
  return createWorld();
}

// --- Entity helpers ---

export interface ParticleSpawn {
  x: number;
  y: number;
  vx?: number;
  vy?: number;
  mass?: number;
  elasticity?: number;
}

export const DEFAULT_MASS = 1;
export const DEFAULT_ELASTICITY = 0.5;

export function spawnParticle(w: World, spawn: ParticleSpawn): number {
  const eid = addEntity(w);
  addComponent(w, Position, eid);
  addComponent(w, Velocity, eid);
  addComponent(w, Mass, eid);
  addComponent(w, Elasticity, eid);
  // Recycled ids keep old array values, so every field is written
  Position.x[eid] = spawn.x;
  Position.y[eid] = spawn.y;
  Velocity.x[eid] = spawn.vx ?? 0;
  Velocity.y[eid] = spawn.vy ?? 0;
  Mass.value[eid] = spawn.mass ?? DEFAULT_MASS;
  Elasticity.value[eid] = spawn.elasticity ?? DEFAULT_ELASTICITY;
  return eid;
}

export function destroyParticle(w: World, eid: number): void {
  removeEntity(w, eid);
}

export function isParticle(w: World, eid: number): boolean {
  return hasComponent(w, Position, eid) && hasComponent(w, Velocity, eid);
}


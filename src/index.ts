export {
  Position, Velocity, Mass, Elasticity,
  particleQuery, createParticleWorld, spawnParticle, destroyParticle, isParticle,
  DEFAULT_MASS, DEFAULT_ELASTICITY,
} from './core/ECS';
export type { World, ParticleSpawn } from './core/ECS';
export { ParticleStore } from './core/ParticleStore';
export type { ParticleState, ManyResult } from './core/ParticleStore';
export { EventBus } from './core/EventBus';
export type { EventMap, EventName } from './core/EventBus';
export { Simulation } from './core/Simulation';
export type { GameSystem } from './core/Simulation';
export { computeParticleHash, SimulationHashTracker } from './core/SimulationHash';

export {
  DEFAULT_CONFIG, createConfig, validateConfig, parseConfigText, loadSimulationConfig,
} from './config/SimulationConfig';
export type { SimulationConfig, PairPolicy } from './config/SimulationConfig';

export { Bounds } from './utils/Bounds';
export { SpatialIndex, MAX_WORLD_SIZE } from './utils/SpatialIndex';
export { DeterministicRNG } from './utils/DeterministicRNG';
export type { Vec2, Cell } from './utils/MathUtils';

export { CollisionQueue } from './simulation/CollisionQueue';
export { CellClaims, detectCollision, checkMove, predict, pairKey } from './simulation/CollisionDetection';
export type { CollisionEvent, Prediction } from './simulation/CollisionDetection';
export { CollisionDiscoverySystem } from './simulation/CollisionDiscoverySystem';
export { CollisionResolver, calculateCollisionVelocity, reflectOffWall, isApproaching } from './simulation/CollisionResolver';
export type { ResolverOptions, ResolveStats } from './simulation/CollisionResolver';
export { MovementSystem } from './simulation/MovementSystem';
export { checkInvariants, isClean } from './simulation/Invariants';
export type { InvariantReport } from './simulation/Invariants';

import { createParticleWorld, type World } from './ECS';
import { EventBus } from './EventBus';
import { ParticleStore } from './ParticleStore';
import { createConfig, type SimulationConfig } from '../config/SimulationConfig';
import { SpatialIndex } from '../utils/SpatialIndex';
import { CollisionQueue } from '../simulation/CollisionQueue';
import { CollisionDiscoverySystem } from '../simulation/CollisionDiscoverySystem';
import { CollisionResolver } from '../simulation/CollisionResolver';
import { MovementSystem } from '../simulation/MovementSystem';

export interface GameSystem {
  init?(world: World): void;
  update(world: World, dt: number): void;
}

/**
 * Tick driver. Each fixed tick runs discovery, resolves what it found, then
 * moves; each frame drains the collision queue once more for events pushed
 * between ticks. The host calls advance() with wall-clock time.
 */
export class Simulation {
  readonly config: SimulationConfig;
  readonly index: SpatialIndex;
  readonly queue = new CollisionQueue();
  readonly store: ParticleStore;
  readonly resolver: CollisionResolver;

  private world: World;
  private systems: GameSystem[] = [];
  private extraSystems: GameSystem[] = [];
  private initialized = false;
  private paused = false;
  private tickCount = 0;
  private accumulator = 0;
  private speedMultiplier = 1.0;
  private resolvedThisTick = 0;

  constructor(config: Partial<SimulationConfig> = {}, world: World = createParticleWorld()) {
    this.config = createConfig(config);
    this.world = world;
    this.index = SpatialIndex.fromSize(this.config.worldWidth, this.config.worldHeight);
    this.store = new ParticleStore(world);

    const discovery = new CollisionDiscoverySystem(this.index, this.queue, this.config.gravity);
    this.resolver = new CollisionResolver(this.store, this.index, {
      pairPolicy: this.config.pairPolicy,
      maxCascadeSteps: this.config.maxCascadeSteps,
    }, discovery.getClaims());

    const resolution: GameSystem = {
      update: () => {
        this.resolvedThisTick = this.resolver.drain(this.queue);
      },
    };
    this.systems = [discovery, resolution, new MovementSystem(this.index)];
  }

  init(): void {
    if (this.initialized) return;
    this.initialized = true;
    for (const sys of [...this.systems, ...this.extraSystems]) {
      sys.init?.(this.world);
    }
    EventBus.emit('sim:started', {});
  }

  /** Systems added here run after movement, every tick. */
  addSystem(system: GameSystem): void {
    this.extraSystems.push(system);
    if (this.initialized) system.init?.(this.world);
  }

  pause(): void {
    this.paused = !this.paused;
    EventBus.emit('sim:paused', { paused: this.paused });
  }

  isPaused(): boolean {
    return this.paused;
  }

  setSpeed(multiplier: number): void {
    this.speedMultiplier = Math.max(0.25, Math.min(4.0, multiplier));
  }

  getSpeed(): number {
    return this.speedMultiplier;
  }

  getWorld(): World {
    return this.world;
  }

  getTickCount(): number {
    return this.tickCount;
  }

  /**
   * One frame: fold in elapsed wall time, run every fixed tick that is due,
   * then drain the queue once. Returns the number of ticks run.
   */
  advance(elapsedMs: number): number {
    this.init();
    let ticks = 0;
    if (!this.paused) {
      // Cap elapsed to prevent a spiral of catch-up ticks after a stall
      this.accumulator += Math.min(Math.max(elapsedMs, 0), this.config.maxFrameMs) * this.speedMultiplier;
      while (this.accumulator >= this.config.tickIntervalMs) {
        this.tick();
        this.accumulator -= this.config.tickIntervalMs;
        ticks++;
      }
    }
    this.resolver.drain(this.queue);
    return ticks;
  }

  /** Run exactly one fixed tick, ignoring pause and the accumulator. */
  step(): void {
    this.init();
    this.tick();
  }

  run(ticks: number): void {
    for (let i = 0; i < ticks; i++) this.step();
  }

  private tick(): void {
    this.tickCount++;
    this.resolvedThisTick = 0;

    for (const sys of this.systems) {
      sys.update(this.world, this.config.tickIntervalMs);
    }
    for (const sys of this.extraSystems) {
      sys.update(this.world, this.config.tickIntervalMs);
    }

    EventBus.emit('sim:tick', { tick: this.tickCount, events: this.resolvedThisTick });
  }
}

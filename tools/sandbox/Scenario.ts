import fs from 'node:fs';
import path from 'node:path';
import type { SimulationConfig } from '../../src/config/SimulationConfig';
import { Simulation } from '../../src/core/Simulation';
import { spawnParticle, type ParticleSpawn } from '../../src/core/ECS';
import { DeterministicRNG } from '../../src/utils/DeterministicRNG';
import { cellKey } from '../../src/utils/SpatialIndex';
import { quantize, worldToCell } from '../../src/utils/MathUtils';

export interface ScenarioDef {
  id: string;
  description: string;
  config: Partial<SimulationConfig>;
  particles: ParticleSpawn[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireNumber(obj: Record<string, unknown>, key: string, where: string): number {
  const value = obj[key];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new Error(`${where}: "${key}" must be a finite number`);
  }
  return value;
}

function optionalNumber(obj: Record<string, unknown>, key: string, where: string): number | undefined {
  return obj[key] === undefined ? undefined : requireNumber(obj, key, where);
}

function parseParticle(raw: unknown, where: string): ParticleSpawn {
  if (!isRecord(raw)) throw new Error(`${where}: expected an object`);
  const spawn: ParticleSpawn = { x: requireNumber(raw, 'x', where), y: requireNumber(raw, 'y', where) };
  const vx = optionalNumber(raw, 'vx', where);
  const vy = optionalNumber(raw, 'vy', where);
  const mass = optionalNumber(raw, 'mass', where);
  const elasticity = optionalNumber(raw, 'elasticity', where);
  if (vx !== undefined) spawn.vx = vx;
  if (vy !== undefined) spawn.vy = vy;
  if (mass !== undefined) {
    if (mass <= 0) throw new Error(`${where}: "mass" must be positive`);
    spawn.mass = mass;
  }
  if (elasticity !== undefined) {
    if (elasticity < 0 || elasticity > 1) throw new Error(`${where}: "elasticity" must be within [0, 1]`);
    spawn.elasticity = elasticity;
  }
  return spawn;
}

function parseConfigOverrides(raw: unknown, where: string): Partial<SimulationConfig> {
  if (raw === undefined) return {};
  if (!isRecord(raw)) throw new Error(`${where}: "config" must be an object`);
  const config: Partial<SimulationConfig> = {};
  const width = optionalNumber(raw, 'worldWidth', where);
  const height = optionalNumber(raw, 'worldHeight', where);
  const interval = optionalNumber(raw, 'tickIntervalMs', where);
  const steps = optionalNumber(raw, 'maxCascadeSteps', where);
  if (width !== undefined) config.worldWidth = width;
  if (height !== undefined) config.worldHeight = height;
  if (interval !== undefined) config.tickIntervalMs = interval;
  if (steps !== undefined) config.maxCascadeSteps = steps;
  const policy = raw['pairPolicy'];
  if (policy !== undefined) {
    if (policy !== 'symmetric' && policy !== 'asymmetric') {
      throw new Error(`${where}: "pairPolicy" must be "symmetric" or "asymmetric"`);
    }
    config.pairPolicy = policy;
  }
  const gravity = raw['gravity'];
  if (gravity !== undefined) {
    if (!isRecord(gravity)) throw new Error(`${where}: "gravity" must be an object`);
    config.gravity = {
      x: requireNumber(gravity, 'x', where),
      y: requireNumber(gravity, 'y', where),
    };
  }
  return config;
}

export function parseScenario(raw: unknown, source = 'scenario'): ScenarioDef {
  if (!isRecord(raw)) throw new Error(`${source}: expected a JSON object`);
  const id = raw['id'];
  if (typeof id !== 'string' || id.length === 0) throw new Error(`${source}: "id" must be a non-empty string`);
  const rawDescription = raw['description'];
  const description = typeof rawDescription === 'string' ? rawDescription : '';
  const particles = raw['particles'];
  if (!Array.isArray(particles)) throw new Error(`${source}: "particles" must be an array`);

  const parsed = particles.map((p: unknown, i) => parseParticle(p, `${source} particle[${i}]`));
  const cells = new Set<number>();
  parsed.forEach((p, i) => {
    const k = cellKey(worldToCell(p.x, p.y));
    if (cells.has(k)) throw new Error(`${source} particle[${i}]: cell already occupied`);
    cells.add(k);
  });

  return { id, description, config: parseConfigOverrides(raw['config'], source), particles: parsed };
}

export function loadScenarioFile(file: string): ScenarioDef {
  const content = fs.readFileSync(file, 'utf-8');
  const raw: unknown = JSON.parse(content);
  return parseScenario(raw, path.basename(file));
}

/**
 * Random layout: `count` particles on distinct cells, inset one cell from
 * the walls, with velocities in [-maxSpeed, maxSpeed] quantized to 0.01.
 */
export function generateScenario(seed: number, count: number, config: Partial<SimulationConfig> = {}, maxSpeed = 1): ScenarioDef {
  const width = config.worldWidth ?? 40;
  const height = config.worldHeight ?? 20;
  const rng = new DeterministicRNG(seed);

  const cells: { x: number; y: number }[] = [];
  for (let cx = Math.ceil(-width / 2) + 1; cx < Math.floor(width / 2) - 1; cx++) {
    for (let cy = Math.ceil(-height / 2) + 1; cy < Math.floor(height / 2) - 1; cy++) {
      cells.push({ x: cx, y: cy });
    }
  }
  if (count > cells.length) {
    throw new Error(`Cannot place ${count} particles in a ${width}x${height} world (max ${cells.length})`);
  }
  rng.shuffle(cells);

  const speed = () => quantize(rng.float(-maxSpeed, maxSpeed));
  const particles: ParticleSpawn[] = cells.slice(0, count).map(c => ({
    x: c.x + 0.5,
    y: c.y + 0.5,
    vx: speed(),
    vy: speed(),
    mass: rng.int(1, 4),
    elasticity: rng.int(0, 10) / 10,
  }));

  return { id: `random-${seed}`, description: `${count} random particles (seed ${seed})`, config, particles };
}

export function buildSimulation(scenario: ScenarioDef, overrides: Partial<SimulationConfig> = {}): Simulation {
  const sim = new Simulation({ ...scenario.config, ...overrides });
  const world = sim.getWorld();
  for (const p of scenario.particles) {
    spawnParticle(world, p);
  }
  sim.init();
  return sim;
}

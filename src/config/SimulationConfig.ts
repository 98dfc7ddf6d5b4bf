import type { Vec2 } from '../utils/MathUtils';
import { MAX_WORLD_SIZE } from '../utils/SpatialIndex';

export type PairPolicy = 'symmetric' | 'asymmetric';

export interface SimulationConfig {
  worldWidth: number;
  worldHeight: number;
  tickIntervalMs: number;
  gravity: Vec2; // units per second squared
  pairPolicy: PairPolicy;
  maxCascadeSteps: number; // per collision event
  maxFrameMs: number; // cap on elapsed time folded into one frame
}

export const DEFAULT_CONFIG: Readonly<SimulationConfig> = Object.freeze({
  worldWidth: 40,
  worldHeight: 20,
  tickIntervalMs: 250,
  gravity: Object.freeze({ x: 0, y: -1 }),
  pairPolicy: 'symmetric',
  maxCascadeSteps: 256,
  maxFrameMs: 1000,
});

export function createConfig(overrides: Partial<SimulationConfig> = {}): SimulationConfig {
  const config: SimulationConfig = {
    ...DEFAULT_CONFIG,
    gravity: { ...DEFAULT_CONFIG.gravity },
    ...overrides,
  };
  validateConfig(config);
  return config;
}

export function validateConfig(config: SimulationConfig): void {
  const positive: (keyof SimulationConfig)[] = ['worldWidth', 'worldHeight', 'tickIntervalMs', 'maxCascadeSteps', 'maxFrameMs'];
  for (const key of positive) {
    const value = config[key];
    if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
      throw new Error(`Invalid config: ${key} must be a positive number (got ${String(value)})`);
    }
  }
  for (const key of ['worldWidth', 'worldHeight'] as const) {
    if (config[key] > MAX_WORLD_SIZE) {
      throw new Error(`Invalid config: ${key} must be at most ${MAX_WORLD_SIZE} (got ${config[key]})`);
    }
  }
  if (!Number.isFinite(config.gravity.x) || !Number.isFinite(config.gravity.y)) {
    throw new Error('Invalid config: gravity components must be finite');
  }
  if (config.pairPolicy !== 'symmetric' && config.pairPolicy !== 'asymmetric') {
    throw new Error(`Invalid config: unknown pairPolicy "${String(config.pairPolicy)}"`);
  }
}

type Section = { name: string; entries: [string, string][] };

export function parseSections(text: string): Section[] {
  const sections: Section[] = [];
  let current: Section | null = null;

  for (const rawLine of text.split('\n')) {
    // Strip comments
    const commentIdx = rawLine.indexOf('//');
    const line = (commentIdx >= 0 ? rawLine.substring(0, commentIdx) : rawLine).trim();
    if (!line) continue;

    if (line.startsWith('[') && line.includes(']')) {
      current = { name: line.substring(1, line.indexOf(']')), entries: [] };
      sections.push(current);
      continue;
    }

    const eqIdx = line.indexOf('=');
    if (eqIdx > 0 && current) {
      current.entries.push([line.substring(0, eqIdx).trim(), line.substring(eqIdx + 1).trim()]);
    }
  }

  return sections;
}

/**
 * Build a config from the key/value pairs of a [Simulation] section.
 * Missing keys fall back to defaults.
 */
export function loadSimulationConfig(section: Record<string, string>): SimulationConfig {
  const g = (key: string, fallback: number): number => {
    const raw = section[key];
    if (raw === undefined) return fallback;
    const value = parseFloat(raw);
    if (Number.isNaN(value)) {
      throw new Error(`Invalid config: ${key}=${raw} is not a number`);
    }
    return value;
  };

  const policy = section['PairPolicy'] ?? DEFAULT_CONFIG.pairPolicy;
  if (policy !== 'symmetric' && policy !== 'asymmetric') {
    throw new Error(`Invalid config: PairPolicy=${policy} (expected symmetric or asymmetric)`);
  }

  return createConfig({
    worldWidth: g('WorldWidth', DEFAULT_CONFIG.worldWidth),
    worldHeight: g('WorldHeight', DEFAULT_CONFIG.worldHeight),
    tickIntervalMs: g('TickIntervalMs', DEFAULT_CONFIG.tickIntervalMs),
    gravity: {
      x: g('GravityX', DEFAULT_CONFIG.gravity.x),
      y: g('GravityY', DEFAULT_CONFIG.gravity.y),
    },
    pairPolicy: policy,
    maxCascadeSteps: g('MaxCascadeSteps', DEFAULT_CONFIG.maxCascadeSteps),
    maxFrameMs: g('MaxFrameMs', DEFAULT_CONFIG.maxFrameMs),
  });
}

export function parseConfigText(text: string): SimulationConfig {
  const section = parseSections(text).find(s => s.name === 'Simulation');
  return loadSimulationConfig(Object.fromEntries(section?.entries ?? []));
}

#!/usr/bin/env npx tsx
/**
 * Sandbox CLI: runs a particle scenario headless, checks the no-overlap and
 * in-bounds invariants after every tick, and optionally verifies that two
 * runs produce identical state hashes.
 *
 * Usage:
 *   npx tsx tools/sandbox/cli.ts                          # Default two-particle scenario
 *   npx tsx tools/sandbox/cli.ts --scenario head-on --trace
 *   npx tsx tools/sandbox/cli.ts --random 50 --seed 7 --ticks 200
 *   npx tsx tools/sandbox/cli.ts --check-determinism
 */

import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import type { SimulationConfig } from '../../src/config/SimulationConfig';
import { parseConfigText } from '../../src/config/SimulationConfig';
import { Position, Velocity, particleQuery } from '../../src/core/ECS';
import { EventBus } from '../../src/core/EventBus';
import { generateScenario, loadScenarioFile, type ScenarioDef } from './Scenario';
import { checkDeterminism, runScenario } from './runner';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const SCENARIOS_DIR = path.join(__dirname, 'scenarios');
const DEFAULT_CONFIG_FILE = path.join(__dirname, 'sandbox.ini');
const DEFAULT_SCENARIO = 'original-pair';

interface CliOptions {
  scenario: string;
  random: number | null;
  seed: number;
  ticks: number;
  configFile: string;
  trace: boolean;
  checkDeterminism: boolean;
  list: boolean;
}

// --- CLI argument parsing ---

function parseIntArg(flag: string, value: string | undefined): number {
  const n = value === undefined ? NaN : parseInt(value, 10);
  if (!Number.isInteger(n) || n < 0) {
    console.error(`${flag} expects a non-negative integer`);
    process.exit(1);
  }
  return n;
}

function parseArgs(): CliOptions {
  const args = process.argv.slice(2);
  const options: CliOptions = {
    scenario: DEFAULT_SCENARIO,
    random: null,
    seed: 42,
    ticks: 40,
    configFile: DEFAULT_CONFIG_FILE,
    trace: false,
    checkDeterminism: false,
    list: false,
  };

  for (let i = 0; i < args.length; i++) {
    switch (args[i]) {
      case '--scenario':
        options.scenario = args[++i] ?? DEFAULT_SCENARIO;
        break;
      case '--random':
        options.random = parseIntArg('--random', args[++i]);
        break;
      case '--seed':
        options.seed = parseIntArg('--seed', args[++i]);
        break;
      case '--ticks':
        options.ticks = parseIntArg('--ticks', args[++i]);
        break;
      case '--config':
        options.configFile = args[++i] ?? DEFAULT_CONFIG_FILE;
        break;
      case '--trace':
        options.trace = true;
        break;
      case '--check-determinism':
        options.checkDeterminism = true;
        break;
      case '--list':
        options.list = true;
        break;
      case '--help':
        printHelp();
        process.exit(0);
    }
  }

  return options;
}

function printHelp(): void {
  console.log(`
Particle Sandbox: headless grid collision runs

Usage:
  npx tsx tools/sandbox/cli.ts [options]

Options:
  --scenario <name|file>  Scenario name from tools/sandbox/scenarios or a JSON path (default: ${DEFAULT_SCENARIO})
  --random <count>        Generate <count> random particles instead of loading a scenario
  --seed <n>              Seed for --random (default: 42)
  --ticks <n>             Fixed ticks to simulate (default: 40)
  --config <file>         INI file with a [Simulation] section (default: tools/sandbox/sandbox.ini)
  --trace                 Print every particle after each tick
  --check-determinism     Run twice and compare per-tick state hashes
  --list                  List bundled scenarios
  --help                  Show this help message
`);
}

// --- Scenario resolution ---

function loadConfig(file: string): Partial<SimulationConfig> {
  if (!fs.existsSync(file)) {
    if (file !== DEFAULT_CONFIG_FILE) {
      console.error(`Config file not found: ${file}`);
      process.exit(1);
    }
    return {};
  }
  return parseConfigText(fs.readFileSync(file, 'utf-8'));
}

function resolveScenario(options: CliOptions, config: Partial<SimulationConfig>): ScenarioDef {
  if (options.random !== null) {
    return generateScenario(options.seed, options.random, config);
  }
  const file = options.scenario.endsWith('.json')
    ? path.resolve(options.scenario)
    : path.join(SCENARIOS_DIR, `${options.scenario}.json`);
  if (!fs.existsSync(file)) {
    console.error(`No scenario found matching "${options.scenario}"`);
    process.exit(1);
  }
  const scenario = loadScenarioFile(file);
  // Scenario values win over the INI file
  return { ...scenario, config: { ...config, ...scenario.config } };
}

function listScenarios(): void {
  const files = fs.readdirSync(SCENARIOS_DIR).filter(f => f.endsWith('.json')).sort();
  for (const file of files) {
    const scenario = loadScenarioFile(path.join(SCENARIOS_DIR, file));
    console.log(`  ${scenario.id.padEnd(16)} ${scenario.description}`);
  }
}

function fmt(n: number): string {
  return n.toFixed(2).padStart(7);
}

// --- Main ---

function main(): void {
  const options = parseArgs();
  if (options.list) {
    listScenarios();
    return;
  }

  const scenario = resolveScenario(options, loadConfig(options.configFile));
  console.log(`[Sandbox] ${scenario.id}: ${scenario.description} (${scenario.particles.length} particles, ${options.ticks} ticks)`);

  let collisions = 0;
  EventBus.on('collision:pair', () => { collisions++; });
  EventBus.on('collision:world', () => { collisions++; });
  EventBus.on('collision:blocked', () => { collisions++; });
  EventBus.on('cascade:limit', ({ steps }) => {
    console.warn(`[Sandbox] Cascade truncated after ${steps} steps`);
  });

  const result = runScenario(scenario, options.ticks, {
    onTick: options.trace
      ? (sim, tick) => {
          console.log(`-- tick ${tick}`);
          const eids = particleQuery(sim.getWorld());
          for (let i = 0; i < eids.length; i++) {
            const eid = eids[i];
            console.log(`  #${String(eid).padEnd(4)} pos ${fmt(Position.x[eid])} ${fmt(Position.y[eid])}  vel ${fmt(Velocity.x[eid])} ${fmt(Velocity.y[eid])}`);
          }
        }
      : undefined,
  });
  EventBus.clear();

  console.log(`[Sandbox] ${collisions} collision resolutions, final hash 0x${result.finalHash.toString(16).padStart(8, '0')}`);

  let failed = false;
  for (const v of result.violations) {
    failed = true;
    const overlaps = v.report.overlaps.map(([a, b]) => `${a}/${b}`).join(', ');
    console.error(`[Sandbox] tick ${v.tick}: overlaps [${overlaps}] out of bounds [${v.report.outOfBounds.join(', ')}]`);
  }

  if (options.checkDeterminism) {
    const mismatches = checkDeterminism(scenario, options.ticks);
    if (mismatches.length > 0) {
      failed = true;
      console.error(`[Sandbox] Determinism check failed at tick ${mismatches[0].tick} (${mismatches.length} mismatches)`);
    } else {
      console.log('[Sandbox] Determinism check passed');
    }
  }

  if (failed) process.exit(1);
  console.log('[Sandbox] Invariants held on every tick');
}

main();

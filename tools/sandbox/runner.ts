import type { Simulation } from '../../src/core/Simulation';
import { computeParticleHash, SimulationHashTracker } from '../../src/core/SimulationHash';
import { checkInvariants, isClean, type InvariantReport } from '../../src/simulation/Invariants';
import { buildSimulation, type ScenarioDef } from './Scenario';

export interface Violation {
  tick: number;
  report: InvariantReport;
}

export interface RunResult {
  ticks: number;
  violations: Violation[];
  finalHash: number;
  tracker: SimulationHashTracker;
}

export interface RunOptions {
  hashInterval?: number;
  onTick?: (sim: Simulation, tick: number) => void;
}

/** Run a scenario for a fixed number of ticks, checking invariants after each. */
export function runScenario(scenario: ScenarioDef, ticks: number, options: RunOptions = {}): RunResult {
  const hashInterval = options.hashInterval ?? 1;
  const tracker = new SimulationHashTracker(ticks + hashInterval);
  const violations: Violation[] = [];
  const sim = buildSimulation(scenario);

  sim.addSystem({
    update: (world) => {
      const tick = sim.getTickCount();
      const report = checkInvariants(world, sim.index.bounds);
      if (!isClean(report)) violations.push({ tick, report });
      if (tick % hashInterval === 0) tracker.record(tick, computeParticleHash(world));
    },
  });

  for (let t = 0; t < ticks; t++) {
    sim.step();
    options.onTick?.(sim, sim.getTickCount());
  }

  return { ticks, violations, finalHash: computeParticleHash(sim.getWorld()), tracker };
}

export interface DeterminismMismatch {
  tick: number;
  expected: number | null;
  actual: number;
}

/** Run the scenario twice and compare recorded hashes tick by tick. */
export function checkDeterminism(scenario: ScenarioDef, ticks: number, hashInterval = 1): DeterminismMismatch[] {
  const first = runScenario(scenario, ticks, { hashInterval });
  const mismatches: DeterminismMismatch[] = [];
  runScenario(scenario, ticks, {
    hashInterval,
    onTick: (sim, tick) => {
      if (tick % hashInterval !== 0) return;
      const actual = computeParticleHash(sim.getWorld());
      if (first.tracker.verify(tick, actual) !== 'match') {
        mismatches.push({ tick, expected: first.tracker.getHash(tick), actual });
      }
    },
  });
  return mismatches;
}

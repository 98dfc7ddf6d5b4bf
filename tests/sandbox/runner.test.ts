import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { beforeEach, describe, expect, it, vi } from 'vitest';

import { checkDeterminism, runScenario } from '../../tools/sandbox/runner';
import { generateScenario, loadScenarioFile } from '../../tools/sandbox/Scenario';
import { EventBus } from '../../src/core/EventBus';

const SCENARIOS_DIR = path.join(path.dirname(fileURLToPath(import.meta.url)), '..', '..', 'tools', 'sandbox', 'scenarios');

describe('runScenario', () => {
  beforeEach(() => {
    EventBus.clear();
  });

  const bundled = fs.readdirSync(SCENARIOS_DIR).filter(f => f.endsWith('.json')).sort();

  it.each(bundled)('keeps %s free of overlaps and escapes', (file) => {
    const result = runScenario(loadScenarioFile(path.join(SCENARIOS_DIR, file)), 120);
    expect(result.violations).toEqual([]);
    expect(result.ticks).toBe(120);
  });

  it('keeps random scenarios valid across seeds and sizes', () => {
    const onLimit = vi.fn();
    const written: number[] = [];
    EventBus.on('cascade:limit', onLimit);
    EventBus.on('collision:pair', ({ velocityA, velocityB }) => {
      written.push(velocityA.x, velocityA.y, velocityB.x, velocityB.y);
    });
    EventBus.on('collision:world', ({ velocity }) => {
      written.push(velocity.x, velocity.y);
    });

    const failures: string[] = [];
    for (const count of [3, 10, 20]) {
      for (let seed = 1; seed <= 30; seed++) {
        const result = runScenario(generateScenario(seed, count), 200);
        if (result.violations.length > 0) {
          failures.push(`seed ${seed}, ${count} particles: first violation at tick ${result.violations[0].tick}`);
        }
      }
    }

    expect(failures).toEqual([]);
    expect(onLimit).not.toHaveBeenCalled();
    expect(written.length).toBeGreaterThan(0);
    const offGrid = written.filter(v => Math.abs(v * 100 - Math.round(v * 100)) > 1e-9);
    expect(offGrid).toEqual([]);
  });

  it('records hashes at the requested interval', () => {
    const result = runScenario(generateScenario(2, 10), 20, { hashInterval: 5 });
    expect(result.tracker.size).toBe(4);
    expect(result.tracker.getHash(20)).toBe(result.finalHash);
  });

  it('calls onTick after every tick', () => {
    const onTick = vi.fn();
    runScenario(generateScenario(2, 5), 3, { onTick });
    expect(onTick).toHaveBeenCalledTimes(3);
    expect(onTick.mock.calls.map(call => call[1])).toEqual([1, 2, 3]);
  });
});

describe('checkDeterminism', () => {
  it('finds no mismatch between two runs of the same scenario', () => {
    expect(checkDeterminism(generateScenario(3, 40), 60)).toEqual([]);
  });
});

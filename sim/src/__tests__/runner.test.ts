// ============================================
// Runner Unit Tests
// ============================================

import { describe, it, expect, vi } from 'vitest';
import { Model } from '../Model';
import { runSimulation } from '../runner';
import { spreadOutRandom, TEST_CONFIG } from './testUtils';

function stationaryModel(): Model {
  return new Model(5, 0, 1, 1, { config: TEST_CONFIG, random: spreadOutRandom(5) });
}

describe('runSimulation', () => {
  it('runs until no cell is infected', () => {
    const model = stationaryModel();
    const summary = runSimulation(model);

    expect(summary).toEqual({
      ticks: TEST_CONFIG.RECOVERY_PERIOD + 1,
      completed: true,
      stats: { total: 5, vulnerable: 3, infected: 0, immune: 2 },
    });
    expect(model.time).toBe(TEST_CONFIG.RECOVERY_PERIOD + 1);
  });

  it('stops at maxTicks', () => {
    const model = stationaryModel();
    const summary = runSimulation(model, { maxTicks: 2 });

    expect(summary.ticks).toBe(2);
    expect(summary.completed).toBe(false);
    expect(summary.stats.infected).toBe(1);
    expect(model.time).toBe(2);
  });

  it('calls onTick after every tick', () => {
    const model = stationaryModel();
    const times: number[] = [];
    const onTick = vi.fn((m: Model) => times.push(m.time));

    runSimulation(model, { onTick });

    expect(onTick).toHaveBeenCalledTimes(TEST_CONFIG.RECOVERY_PERIOD + 1);
    expect(times).toEqual([1, 2, 3, 4]);
  });

  it('does nothing for a model that is already complete', () => {
    const model = stationaryModel();
    runSimulation(model);

    const summary = runSimulation(model);

    expect(summary.ticks).toBe(0);
    expect(summary.completed).toBe(true);
    expect(model.time).toBe(TEST_CONFIG.RECOVERY_PERIOD + 1);
  });
});

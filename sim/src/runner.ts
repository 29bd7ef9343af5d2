// ============================================
// Synchronous Runner
// Drives a Model until it completes or hits a tick limit
// ============================================

import type { PopulationStats } from '#shared';
import type { Model } from './Model';
import { calculatePopulationStats } from './telemetry';

const DEFAULT_MAX_TICKS = 10_000;

export interface RunOptions {
  // Upper bound on ticks for this call
  maxTicks?: number;
  // Called after every tick, e.g. to render or log
  onTick?: (model: Model) => void;
}

export interface RunSummary {
  // Ticks performed by this call
  ticks: number;
  // Whether the model reached isComplete()
  completed: boolean;
  stats: PopulationStats;
}

/**
 * Tick `model` until no cell is infected or `maxTicks` have run.
 * A model that is already complete is returned untouched.
 */
export function runSimulation(model: Model, options: RunOptions = {}): RunSummary {
  const { maxTicks = DEFAULT_MAX_TICKS, onTick } = options;

  let ticks = 0;
  while (!model.isComplete() && ticks < maxTicks) {
    model.tick();
    ticks++;
    onTick?.(model);
  }

  return {
    ticks,
    completed: model.isComplete(),
    stats: calculatePopulationStats(model.population),
  };
}

// ============================================
// Telemetry Module
// Aggregate population statistics and render snapshots
// ============================================

import type { PopulationSnapshot, PopulationStats } from '#shared';
import type { Cell } from './Cell';
import type { Model } from './Model';

/**
 * Count cells per health state
 */
export function calculatePopulationStats(population: readonly Cell[]): PopulationStats {
  const stats: PopulationStats = {
    total: population.length,
    vulnerable: 0,
    infected: 0,
    immune: 0,
  };

  for (const cell of population) {
    stats[cell.health.kind]++;
  }

  return stats;
}

/**
 * Everything an external renderer reads for one frame
 */
export function createPopulationSnapshot(model: Model): PopulationSnapshot {
  return {
    time: model.time,
    cells: model.population.map((cell) => ({
      x: cell.location.x,
      y: cell.location.y,
      color: cell.color(),
    })),
  };
}

// ============================================
// Contact System
// Pairwise proximity check that spreads infection
// ============================================

import { distance, type SimConfig } from '#shared';
import type { Cell } from '../Cell';
import type { System, SystemContext } from './types';
import { logCellInfected } from '../logger';

/**
 * Observer for infections made during a scan
 * @param infectedIndex - Index of the newly infected cell
 * @param sourceIndex - Index of the cell that passed it on
 */
export type InfectionListener = (infectedIndex: number, sourceIndex: number) => void;

/**
 * Compare every unordered pair (i < j) in population order and resolve a
 * contact when their centres are closer than CELL_RADIUS.
 *
 * O(n²) per call: no spatial index.
 *
 * @returns Number of cells infected by this scan
 */
export function checkContacts(
  population: readonly Cell[],
  config: SimConfig,
  onInfection?: InfectionListener
): number {
  let infections = 0;

  for (let i = 0; i < population.length; i++) {
    const a = population[i];
    for (let j = i + 1; j < population.length; j++) {
      const b = population[j];
      if (distance(a.location, b.location) >= config.CELL_RADIUS) continue;

      const newlyInfected = a.contactWith(b);
      if (newlyInfected) {
        infections++;
        if (newlyInfected === b) {
          onInfection?.(j, i);
        } else {
          onInfection?.(i, j);
        }
      }
    }
  }

  return infections;
}

/**
 * ContactSystem - runs after every cell has moved,
 * so infections use post-movement positions only
 */
export class ContactSystem implements System {
  readonly name = 'ContactSystem';

  update({ population, config, time }: SystemContext): void {
    checkContacts(population, config, (infectedIndex, sourceIndex) => {
      logCellInfected(infectedIndex, sourceIndex, time);
    });
  }
}

// ============================================
// Movement System
// Advances every cell one step and bounces it off the world edges
// ============================================

import type { SimConfig } from '#shared';
import type { Cell } from '../Cell';
import type { System, SystemContext } from './types';
import { logCellRecovered } from '../logger';

/**
 * Reflect a cell off the world bounds.
 * Each axis is checked on its own: a position past the max (or min) is
 * clamped to it and that axis' direction component flips sign. A corner
 * can flip both in one call.
 */
export function enforceBounds(cell: Cell, config: SimConfig): void {
  let { x, y } = cell.location;
  let { x: dx, y: dy } = cell.direction;

  if (x > config.MAX_X) {
    x = config.MAX_X;
    dx = -dx;
  }
  if (x < config.MIN_X) {
    x = config.MIN_X;
    dx = -dx;
  }
  if (y > config.MAX_Y) {
    y = config.MAX_Y;
    dy = -dy;
  }
  if (y < config.MIN_Y) {
    y = config.MIN_Y;
    dy = -dy;
  }

  cell.location = { x, y };
  cell.direction = { x: dx, y: dy };
}

/**
 * MovementSystem - per-cell integration
 *
 * For each cell in population order:
 * - cell.tick() (move + infection counter)
 * - enforceBounds()
 */
export class MovementSystem implements System {
  readonly name = 'MovementSystem';

  update({ population, config, time }: SystemContext): void {
    population.forEach((cell, index) => {
      const wasInfected = cell.isInfected();

      cell.tick();
      enforceBounds(cell, config);

      if (wasInfected && cell.isImmune()) {
        logCellRecovered(index, time);
      }
    });
  }
}

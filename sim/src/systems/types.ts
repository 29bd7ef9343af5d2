// ============================================
// Simulation System Types
// ============================================

import type { SimConfig } from '#shared';
import type { Cell } from '../Cell';

/**
 * SystemContext - what every system receives each tick
 */
export interface SystemContext {
  // Ordered population (creation order), owned by the Model
  population: readonly Cell[];

  config: SimConfig;

  // Tick number being processed (already incremented)
  time: number;
}

/**
 * Base System interface
 * Each stage of the simulation step implements this interface
 */
export interface System {
  /** System name for debugging/logging */
  readonly name: string;

  /**
   * Called every simulation tick
   */
  update(context: SystemContext): void;
}

/**
 * System priority - determines update order
 * Lower numbers run first
 *
 * 1. Movement (cell tick + boundary reflection, every cell)
 * 2. Contact (pairwise infection, on post-movement positions)
 */
export const SystemPriority = {
  MOVEMENT: 500,
  CONTACT: 600,
} as const;

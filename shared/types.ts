// ============================================
// Shared Type Definitions
// ============================================

// ============================================
// Health
// ============================================

/**
 * Health of a single cell.
 * Transitions only move forward: vulnerable → infected → immune.
 */
export type HealthState =
  | { readonly kind: 'vulnerable' }
  | {
      readonly kind: 'infected';
      // 0 on the tick the disease was contracted
      readonly ticksSinceInfection: number;
    }
  | { readonly kind: 'immune' };

export type HealthKind = HealthState['kind'];

export const VULNERABLE: HealthState = { kind: 'vulnerable' };
export const IMMUNE: HealthState = { kind: 'immune' };

export function infected(ticksSinceInfection = 0): HealthState {
  return { kind: 'infected', ticksSinceInfection };
}

// ============================================
// Display
// ============================================

export type CellColor = 'gray' | 'red' | 'green';

// Display tag a renderer draws for each health state
export const HEALTH_COLORS = {
  vulnerable: 'gray',
  infected: 'red',
  immune: 'green',
} as const satisfies Record<HealthKind, CellColor>;

/**
 * What a renderer needs to draw one cell
 */
export interface CellSnapshot {
  x: number;
  y: number;
  color: CellColor;
}

/**
 * Complete population snapshot for one tick
 */
export interface PopulationSnapshot {
  time: number;
  cells: CellSnapshot[];
}

/**
 * Head-count per health state
 */
export interface PopulationStats {
  total: number;
  vulnerable: number;
  infected: number;
  immune: number;
}

// ============================================
// Randomness
// ============================================

/**
 * Source of uniform random reals in [0, 1).
 * Math.random satisfies it; createRandom() gives a seeded one.
 */
export type RandomSource = () => number;

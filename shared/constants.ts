// ============================================
// Simulation Constants & Configuration
// ============================================

import { InvalidConfigurationError } from './errors';

/**
 * Tunable values a config is built from (everything except derived sizes)
 */
export interface SimConfigInput {
  // World bounds
  MIN_X: number;
  MAX_X: number;
  MIN_Y: number;
  MAX_Y: number;

  // Disease
  CELL_RADIUS: number;      // Contact distance (strictly less than)
  RECOVERY_PERIOD: number;  // Ticks an infection lasts before the recovery check passes

  // Driver defaults (used by the headless runner, not by Model itself)
  CELL_COUNT: number;
  CELL_SPEED: number;
  INITIAL_INFECTED: number;
  INITIAL_IMMUNE: number;
  TICK_INTERVAL_MS: number;
  STATS_INTERVAL_TICKS: number;
}

/**
 * Complete, frozen simulation config
 */
export interface SimConfig extends Readonly<SimConfigInput> {
  readonly BOUNDS_WIDTH: number;
  readonly BOUNDS_HEIGHT: number;
}

const DEFAULTS: SimConfigInput = {
  MIN_X: -200,
  MAX_X: 200,
  MIN_Y: -200,
  MAX_Y: 200,

  CELL_RADIUS: 15,
  RECOVERY_PERIOD: 90,

  CELL_COUNT: 100,
  CELL_SPEED: 5,
  INITIAL_INFECTED: 1,
  INITIAL_IMMUNE: 0,
  TICK_INTERVAL_MS: 30,
  STATS_INTERVAL_TICKS: 50,
};

/**
 * Build a config from defaults plus overrides.
 * Derives BOUNDS_WIDTH / BOUNDS_HEIGHT and rejects values the engine can't run with.
 */
export function createSimConfig(overrides: Partial<SimConfigInput> = {}): SimConfig {
  const input: SimConfigInput = { ...DEFAULTS, ...overrides };

  if (!(input.MIN_X < input.MAX_X)) {
    throw new InvalidConfigurationError(`MIN_X (${input.MIN_X}) must be less than MAX_X (${input.MAX_X})`);
  }
  if (!(input.MIN_Y < input.MAX_Y)) {
    throw new InvalidConfigurationError(`MIN_Y (${input.MIN_Y}) must be less than MAX_Y (${input.MAX_Y})`);
  }
  if (!Number.isFinite(input.CELL_RADIUS) || input.CELL_RADIUS <= 0) {
    throw new InvalidConfigurationError(`CELL_RADIUS must be a positive number, got ${input.CELL_RADIUS}`);
  }
  if (!Number.isInteger(input.RECOVERY_PERIOD) || input.RECOVERY_PERIOD < 0) {
    throw new InvalidConfigurationError(
      `RECOVERY_PERIOD must be a non-negative integer, got ${input.RECOVERY_PERIOD}`
    );
  }

  return Object.freeze({
    ...input,
    BOUNDS_WIDTH: input.MAX_X - input.MIN_X,
    BOUNDS_HEIGHT: input.MAX_Y - input.MIN_Y,
  });
}

// Default config shared by the runner and anything that doesn't inject its own
export const SIM_CONFIG: SimConfig = createSimConfig();

// ============================================
// Run Options
// Reads the headless driver's settings from environment variables
// ============================================

import { InvalidConfigurationError, SIM_CONFIG } from '#shared';

export interface RunEnvOptions {
  populationSize: number;
  speed: number;
  infectedCount: number;
  immuneCount: number;
  tickIntervalMs: number;
  maxTicks: number;
  seed?: number;
}

type Env = Record<string, string | undefined>;

function readNumber(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new InvalidConfigurationError(`${key} must be a number, got "${raw}"`);
  }
  return value;
}

function readInteger(env: Env, key: string, fallback: number): number {
  const value = readNumber(env, key, fallback);
  if (!Number.isInteger(value)) {
    throw new InvalidConfigurationError(`${key} must be an integer, got ${value}`);
  }
  return value;
}

/**
 * Build run options from env vars, falling back to SIM_CONFIG.
 * Seeding counts are checked by the Model, not here.
 */
export function loadRunOptions(env: Env = process.env): RunEnvOptions {
  const seedRaw = env.SEED;

  return {
    populationSize: readInteger(env, 'CELL_COUNT', SIM_CONFIG.CELL_COUNT),
    speed: readNumber(env, 'CELL_SPEED', SIM_CONFIG.CELL_SPEED),
    infectedCount: readInteger(env, 'INITIAL_INFECTED', SIM_CONFIG.INITIAL_INFECTED),
    immuneCount: readInteger(env, 'INITIAL_IMMUNE', SIM_CONFIG.INITIAL_IMMUNE),
    tickIntervalMs: readNumber(env, 'TICK_INTERVAL_MS', SIM_CONFIG.TICK_INTERVAL_MS),
    maxTicks: readInteger(env, 'MAX_TICKS', Number.MAX_SAFE_INTEGER),
    ...(seedRaw !== undefined && seedRaw.trim() !== '' ? { seed: readInteger(env, 'SEED', 0) } : {}),
  };
}

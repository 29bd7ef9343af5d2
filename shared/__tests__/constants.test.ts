// ============================================
// Simulation Config Unit Tests
// ============================================

import { describe, it, expect } from 'vitest';
import { createSimConfig, SIM_CONFIG } from '../constants';
import { InvalidConfigurationError } from '../errors';

describe('SIM_CONFIG', () => {
  it('derives bounds size from the min/max values', () => {
    expect(SIM_CONFIG.BOUNDS_WIDTH).toBe(SIM_CONFIG.MAX_X - SIM_CONFIG.MIN_X);
    expect(SIM_CONFIG.BOUNDS_HEIGHT).toBe(SIM_CONFIG.MAX_Y - SIM_CONFIG.MIN_Y);
  });

  it('is frozen', () => {
    expect(Object.isFrozen(SIM_CONFIG)).toBe(true);
  });
});

describe('createSimConfig', () => {
  it('applies overrides over the defaults', () => {
    const config = createSimConfig({ MIN_X: 0, MAX_X: 50, CELL_RADIUS: 2 });
    expect(config.MIN_X).toBe(0);
    expect(config.MAX_X).toBe(50);
    expect(config.BOUNDS_WIDTH).toBe(50);
    expect(config.CELL_RADIUS).toBe(2);
    expect(config.RECOVERY_PERIOD).toBe(SIM_CONFIG.RECOVERY_PERIOD);
  });

  it('rejects an empty horizontal range', () => {
    expect(() => createSimConfig({ MIN_X: 5, MAX_X: 5 })).toThrow(InvalidConfigurationError);
  });

  it('rejects an inverted vertical range', () => {
    expect(() => createSimConfig({ MIN_Y: 10, MAX_Y: -10 })).toThrow(
      'MIN_Y (10) must be less than MAX_Y (-10)'
    );
  });

  it('rejects a non-positive contact radius', () => {
    expect(() => createSimConfig({ CELL_RADIUS: 0 })).toThrow(InvalidConfigurationError);
    expect(() => createSimConfig({ CELL_RADIUS: Number.NaN })).toThrow(InvalidConfigurationError);
  });

  it('rejects a fractional or negative recovery period', () => {
    expect(() => createSimConfig({ RECOVERY_PERIOD: 2.5 })).toThrow(InvalidConfigurationError);
    expect(() => createSimConfig({ RECOVERY_PERIOD: -1 })).toThrow(InvalidConfigurationError);
  });

  it('accepts a zero recovery period', () => {
    expect(createSimConfig({ RECOVERY_PERIOD: 0 }).RECOVERY_PERIOD).toBe(0);
  });
});

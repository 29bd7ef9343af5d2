// ============================================
// Shared Types & Constants
// Used by the engine and any renderer that reads it
// ============================================

// Math utilities - points and vector helpers
export * from './math';

// Simulation constants (SIM_CONFIG, createSimConfig)
export * from './constants';

// Type definitions (HealthState, snapshots, RandomSource)
export * from './types';

// Seeded random sources
export * from './random';

// Error types
export * from './errors';

// ============================================
// Shared Test Setup
// Runs before each test file via vitest setupFiles
// ============================================

import { vi } from 'vitest';

// Mock the logger to prevent transports and file system operations
vi.mock('../logger', () => ({
  logger: { info: vi.fn(), error: vi.fn(), warn: vi.fn(), debug: vi.fn(), fatal: vi.fn() },
  perfLogger: { info: vi.fn() },
  logSimulationStarted: vi.fn(),
  logSimulationComplete: vi.fn(),
  logSimulationStopped: vi.fn(),
  logCellInfected: vi.fn(),
  logCellRecovered: vi.fn(),
  logAggregateStats: vi.fn(),
}));

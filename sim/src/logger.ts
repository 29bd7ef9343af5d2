import pino from 'pino';
import type { PopulationStats } from '#shared';

// ============================================
// Logger Configuration
// ============================================

const LOG_DIR = process.env.LOG_DIR || 'logs';
const LOG_LEVEL = process.env.LOG_LEVEL || 'info';
const IS_DEV = process.env.NODE_ENV !== 'production';

/**
 * Create a logger with console + rotating file output
 * pino-roll is used as a Pino transport for file rotation
 * @param filename - Log file name (e.g., 'simulation.log')
 * @param component - Component name for filtering (e.g., 'sim', 'perf')
 */
function createLogger(filename: string, component: string) {
  const targets: pino.TransportTargetOptions[] = [];

  // Console stream with pretty printing (development only)
  if (IS_DEV) {
    targets.push({
      level: LOG_LEVEL,
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss.l',
        ignore: 'pid,hostname',
      },
    });
  }

  // Rotating file stream with JSON (always enabled)
  targets.push({
    level: LOG_LEVEL,
    target: 'pino-roll',
    options: {
      file: `${LOG_DIR}/${filename}`,
      size: '10m',
      limit: { count: 5 },
      mkdir: true,
    },
  });

  return pino(
    {
      level: LOG_LEVEL,
      base: { component },
    },
    pino.transport({ targets })
  );
}

// ============================================
// Logger Instances
// ============================================

// Simulation events (start, infections, recoveries, completion)
export const logger = createLogger('simulation.log', 'sim');

// Tick timing
export const perfLogger = createLogger('performance.log', 'perf');

// ============================================
// Convenience Methods for Simulation Events
// ============================================

/**
 * Log a new simulation run
 */
export function logSimulationStarted(params: {
  populationSize: number;
  speed: number;
  infectedCount: number;
  immuneCount: number;
  seed?: number;
}) {
  logger.info(
    { ...params, event: 'simulation_started' },
    `Simulation started: ${params.populationSize} cells, ${params.infectedCount} infected, ${params.immuneCount} immune`
  );
}

/**
 * Log the tick on which no cell is infected any more
 */
export function logSimulationComplete(time: number, stats: PopulationStats) {
  logger.info(
    { time, ...stats, event: 'simulation_complete' },
    `Simulation complete after ${time} ticks: ${stats.immune} immune, ${stats.vulnerable} never infected`
  );
}

/**
 * Log a run that was stopped before completion (tick limit or signal)
 */
export function logSimulationStopped(time: number, reason: string) {
  logger.warn({ time, reason, event: 'simulation_stopped' }, `Simulation stopped at tick ${time}: ${reason}`);
}

/**
 * Log a contact that passed the disease on
 */
export function logCellInfected(cellIndex: number, sourceIndex: number, time: number) {
  logger.debug(
    { cellIndex, sourceIndex, time, event: 'cell_infected' },
    `Cell ${cellIndex} infected by cell ${sourceIndex}`
  );
}

/**
 * Log a cell leaving the infected state
 */
export function logCellRecovered(cellIndex: number, time: number) {
  logger.debug({ cellIndex, time, event: 'cell_recovered' }, `Cell ${cellIndex} recovered`);
}

// ============================================
// Population State Logging
// ============================================

/**
 * Log aggregate population statistics (lightweight, periodic)
 */
export function logAggregateStats(time: number, stats: PopulationStats) {
  logger.info(
    { time, ...stats, event: 'aggregate_stats' },
    `Tick ${time}: ${stats.infected} infected, ${stats.immune} immune, ${stats.vulnerable} vulnerable`
  );
}

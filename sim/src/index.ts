// ============================================
// Headless Simulation Process
// Builds a Model from env vars and ticks it on an interval until done
// ============================================

import { createRandom, SIM_CONFIG } from '#shared';
import { Model } from './Model';
import { loadRunOptions, type RunEnvOptions } from './env';
import { calculatePopulationStats } from './telemetry';
import {
  logger,
  logAggregateStats,
  logSimulationComplete,
  logSimulationStarted,
  logSimulationStopped,
} from './logger';

/**
 * Read options and seed the model; any configuration error ends the process
 */
function start(): { model: Model; options: RunEnvOptions } {
  try {
    const options = loadRunOptions(process.env);
    const model = new Model(options.populationSize, options.speed, options.infectedCount, options.immuneCount, {
      random: createRandom(options.seed),
    });
    return { model, options };
  } catch (error) {
    logger.fatal(
      { event: 'startup_failed', error: error instanceof Error ? error.message : String(error) },
      'Could not start simulation'
    );
    process.exit(1);
  }
}

const { model, options } = start();

logSimulationStarted({
  populationSize: options.populationSize,
  speed: options.speed,
  infectedCount: options.infectedCount,
  immuneCount: options.immuneCount,
  seed: options.seed,
});

logger.info({
  event: 'systems_registered',
  systems: model.getSystemNames(),
});

// ============================================
// Simulation Loop
// ============================================

const loop = setInterval(() => {
  model.tick();

  if (model.time % SIM_CONFIG.STATS_INTERVAL_TICKS === 0) {
    logAggregateStats(model.time, calculatePopulationStats(model.population));
  }

  if (model.isComplete()) {
    logSimulationComplete(model.time, calculatePopulationStats(model.population));
    clearInterval(loop);
    return;
  }

  if (model.time >= options.maxTicks) {
    logSimulationStopped(model.time, `reached MAX_TICKS (${options.maxTicks})`);
    clearInterval(loop);
  }
}, options.tickIntervalMs);

// ============================================
// Graceful Shutdown
// ============================================

/**
 * Stop ticking on SIGINT (Ctrl-C) or SIGTERM and let the process exit
 */
function shutdown(signal: string) {
  clearInterval(loop);
  logSimulationStopped(model.time, `received ${signal}`);
  process.exit(0);
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));

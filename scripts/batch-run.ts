#!/usr/bin/env npx tsx
// ============================================
// Batch Run Script - Many Seeded Runs, One Summary
// ============================================
// Usage: npx tsx scripts/batch-run.ts [runs] [cellCount] [speed] [infected]
// Example: npx tsx scripts/batch-run.ts 20 100 5 1

import { createRandom, SIM_CONFIG } from '#shared';
import { Model } from '../sim/src/Model';
import { runSimulation, type RunSummary } from '../sim/src/runner';

// ============================================
// Configuration
// ============================================

const RUNS = parseInt(process.argv[2] || '10', 10);
const CELL_COUNT = parseInt(process.argv[3] || String(SIM_CONFIG.CELL_COUNT), 10);
const SPEED = parseFloat(process.argv[4] || String(SIM_CONFIG.CELL_SPEED));
const INFECTED = parseInt(process.argv[5] || String(SIM_CONFIG.INITIAL_INFECTED), 10);
const MAX_TICKS = 10_000;

// ============================================
// Stats Reporting
// ============================================

function average(values: number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / Math.max(1, values.length);
}

function reportStats(results: RunSummary[]) {
  const completed = results.filter((r) => r.completed);
  // Cells that caught the disease at some point (seeded ones included)
  const everInfected = results.map((r) => r.stats.total - r.stats.vulnerable);

  console.log('\n' + '='.repeat(60));
  console.log(`BATCH RESULTS (${results.length} runs)`);
  console.log('='.repeat(60));
  console.log(`Completed:            ${completed.length}/${results.length}`);
  console.log(`Avg ticks to finish:  ${average(completed.map((r) => r.ticks)).toFixed(1)}`);
  console.log(`Avg ever infected:    ${average(everInfected).toFixed(1)} / ${CELL_COUNT}`);
  console.log(`Max ever infected:    ${Math.max(...everInfected)}`);
  console.log(`Min ever infected:    ${Math.min(...everInfected)}`);
  console.log('='.repeat(60) + '\n');
}

function main() {
  console.log(`\nStarting batch:`);
  console.log(`  Runs: ${RUNS}`);
  console.log(`  Cells: ${CELL_COUNT} (speed ${SPEED}, ${INFECTED} infected)\n`);

  const results: RunSummary[] = [];
  for (let seed = 1; seed <= RUNS; seed++) {
    const model = new Model(CELL_COUNT, SPEED, INFECTED, 0, { random: createRandom(seed) });
    const summary = runSimulation(model, { maxTicks: MAX_TICKS });
    console.log(
      `[Run ${seed}] ${summary.completed ? 'done' : 'stopped'} after ${summary.ticks} ticks, ` +
        `${summary.stats.vulnerable} never infected`
    );
    results.push(summary);
  }

  reportStats(results);
}

main();

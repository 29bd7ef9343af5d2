// ============================================
// Simulation System Runner
// Manages and executes the step pipeline in priority order
// ============================================

import type { System, SystemContext } from './types';
import { perfLogger } from '../logger';

// Ticks slower than this get a per-system timing breakdown
const SLOW_TICK_MS = 10;

/**
 * Registered system with its priority
 */
interface RegisteredSystem {
  system: System;
  priority: number;
}

/**
 * SystemRunner - Manages and executes all simulation systems
 *
 * Systems are executed in priority order (lower numbers first).
 * A system that throws aborts the tick; the error reaches the caller.
 */
export class SystemRunner {
  private systems: RegisteredSystem[] = [];

  /**
   * Register a system with a priority
   * @param system The system to register
   * @param priority Lower numbers run first
   */
  register(system: System, priority: number): void {
    this.systems.push({ system, priority });
    // Keep sorted by priority
    this.systems.sort((a, b) => a.priority - b.priority);
  }

  /**
   * Run all systems in priority order
   * Tracks per-system timing and logs when tick is slow
   */
  update(context: SystemContext): void {
    const tickStart = performance.now();
    const timings: { name: string; ms: number }[] = [];

    for (const { system } of this.systems) {
      const systemStart = performance.now();
      system.update(context);
      timings.push({ name: system.name, ms: performance.now() - systemStart });
    }

    const totalMs = performance.now() - tickStart;

    if (totalMs > SLOW_TICK_MS) {
      // Slowest first
      const sorted = [...timings].sort((a, b) => b.ms - a.ms);
      const breakdown = sorted.map((t) => `${t.name}:${t.ms.toFixed(1)}`).join(' ');

      perfLogger.info(
        {
          event: 'slow_tick_breakdown',
          time: context.time,
          population: context.population.length,
          totalMs: totalMs.toFixed(1),
          breakdown: sorted.map((t) => ({ name: t.name, ms: parseFloat(t.ms.toFixed(2)) })),
        },
        `Slow tick ${totalMs.toFixed(1)}ms: ${breakdown}`
      );
    }
  }

  /**
   * Get list of registered systems (for debugging)
   */
  getSystemNames(): string[] {
    return this.systems.map((s) => `${s.system.name} (priority: ${s.priority})`);
  }
}

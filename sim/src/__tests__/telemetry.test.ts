// ============================================
// Telemetry Unit Tests
// ============================================

import { describe, it, expect } from 'vitest';
import { Model } from '../Model';
import { calculatePopulationStats, createPopulationSnapshot } from '../telemetry';
import { createTestCell, scriptedRandom, TEST_CONFIG } from './testUtils';

describe('calculatePopulationStats', () => {
  it('counts cells per health state', () => {
    const population = [
      createTestCell({ health: 'infected' }),
      createTestCell({ health: 'immune' }),
      createTestCell({ health: 'immune' }),
      createTestCell(),
      createTestCell(),
      createTestCell(),
    ];

    expect(calculatePopulationStats(population)).toEqual({
      total: 6,
      vulnerable: 3,
      infected: 1,
      immune: 2,
    });
  });

  it('handles an empty population', () => {
    expect(calculatePopulationStats([])).toEqual({ total: 0, vulnerable: 0, infected: 0, immune: 0 });
  });
});

describe('createPopulationSnapshot', () => {
  it('captures time, positions and colors in population order', () => {
    // Cell 0 at (-5, 5), cell 1 at (5, -5), both with heading 0
    const model = new Model(3, 0, 1, 1, {
      config: TEST_CONFIG,
      random: scriptedRandom([0.25, 0.75, 0, 0.75, 0.25, 0, 0.5, 0.5, 0]),
    });
    model.tick();

    expect(createPopulationSnapshot(model)).toEqual({
      time: 1,
      cells: [
        { x: -5, y: 5, color: 'red' },
        { x: 5, y: -5, color: 'green' },
        { x: 0, y: 0, color: 'gray' },
      ],
    });
  });
});

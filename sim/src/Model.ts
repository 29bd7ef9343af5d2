// ============================================
// Model
// Owns the population and the clock; drives one step at a time
// ============================================

import {
  fromAngle,
  InvalidConfigurationError,
  SIM_CONFIG,
  type Point,
  type RandomSource,
  type SimConfig,
} from '#shared';
import { Cell } from './Cell';
import {
  checkContacts,
  ContactSystem,
  enforceBounds,
  MovementSystem,
  SystemPriority,
  SystemRunner,
} from './systems';
import { logCellInfected } from './logger';

export interface ModelOptions {
  // Bounds, contact radius and recovery period (defaults to SIM_CONFIG)
  config?: SimConfig;
  // Uniform [0, 1) source used for seeding (defaults to Math.random)
  random?: RandomSource;
}

/**
 * Reject seeding counts that don't fit the population
 */
function validateSeeding(
  populationSize: number,
  speed: number,
  infectedCount: number,
  immuneCount: number
): void {
  if (!Number.isInteger(populationSize) || populationSize < 1) {
    throw new InvalidConfigurationError(`Population size must be a positive integer, got ${populationSize}`);
  }
  if (!Number.isInteger(infectedCount) || !Number.isInteger(immuneCount)) {
    throw new InvalidConfigurationError(
      `Seeding counts must be integers, got infected=${infectedCount} immune=${immuneCount}`
    );
  }
  if (!Number.isFinite(speed)) {
    throw new InvalidConfigurationError(`Speed must be a finite number, got ${speed}`);
  }
  if (infectedCount <= 0 || infectedCount >= populationSize) {
    throw new InvalidConfigurationError(
      `At least one and fewer than all ${populationSize} cells must start infected, got ${infectedCount}`
    );
  }
  if (immuneCount < 0 || immuneCount >= populationSize) {
    throw new InvalidConfigurationError(
      `Immune count must be between 0 and ${populationSize - 1}, got ${immuneCount}`
    );
  }
  if (infectedCount + immuneCount >= populationSize) {
    throw new InvalidConfigurationError(
      `At least one cell must start vulnerable: ${infectedCount} infected + ${immuneCount} immune >= ${populationSize}`
    );
  }
}

/**
 * Model - the state of one simulation run
 *
 * Construction seeds the population; afterwards only tick() mutates it.
 * The model never stops itself: a driver polls isComplete().
 */
export class Model {
  readonly config: SimConfig;

  private readonly cells: Cell[] = [];
  private readonly random: RandomSource;
  private readonly systemRunner = new SystemRunner();
  private _time = 0;

  /**
   * @param populationSize - Number of cells, fixed for the run
   * @param speed - Length of every cell's per-tick displacement
   * @param infectedCount - Cells seeded infected (the first ones created)
   * @param immuneCount - Cells seeded immune (the ones right after)
   * @throws InvalidConfigurationError when the counts don't fit the population
   */
  constructor(
    populationSize: number,
    speed: number,
    infectedCount: number,
    immuneCount = 0,
    options: ModelOptions = {}
  ) {
    validateSeeding(populationSize, speed, infectedCount, immuneCount);

    this.config = options.config ?? SIM_CONFIG;
    this.random = options.random ?? Math.random;

    for (let i = 0; i < populationSize; i++) {
      // Draw order per cell: x, y, heading
      const location = this.randomLocation();
      const direction = this.randomDirection(speed);
      const cell = new Cell(location, direction, this.config.RECOVERY_PERIOD);

      if (i < infectedCount) {
        cell.contractDisease();
      } else if (i < infectedCount + immuneCount) {
        cell.immunize();
      }
      this.cells.push(cell);
    }

    // Every cell moves before any contact is checked
    this.systemRunner.register(new MovementSystem(), SystemPriority.MOVEMENT);
    this.systemRunner.register(new ContactSystem(), SystemPriority.CONTACT);
  }

  get population(): readonly Cell[] {
    return this.cells;
  }

  get time(): number {
    return this._time;
  }

  /**
   * Advance the simulation by one step
   */
  tick(): void {
    this._time += 1;
    this.systemRunner.update({
      population: this.cells,
      config: this.config,
      time: this._time,
    });
  }

  /**
   * Bounce a cell that has left the world bounds
   */
  enforceBounds(cell: Cell): void {
    enforceBounds(cell, this.config);
  }

  /**
   * Scan every pair of cells and spread infection between close ones
   * @returns Number of cells newly infected
   */
  checkContacts(): number {
    return checkContacts(this.cells, this.config, (infectedIndex, sourceIndex) => {
      logCellInfected(infectedIndex, sourceIndex, this._time);
    });
  }

  /**
   * True once no cell is infected
   */
  isComplete(): boolean {
    return !this.cells.some((cell) => cell.isInfected());
  }

  getSystemNames(): string[] {
    return this.systemRunner.getSystemNames();
  }

  private randomLocation(): Point {
    const x = this.config.MIN_X + this.random() * this.config.BOUNDS_WIDTH;
    const y = this.config.MIN_Y + this.random() * this.config.BOUNDS_HEIGHT;
    return { x, y };
  }

  private randomDirection(speed: number): Point {
    return fromAngle(2 * Math.PI * this.random(), speed);
  }
}

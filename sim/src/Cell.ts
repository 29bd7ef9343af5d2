// ============================================
// Cell
// A single simulated agent: position, velocity and health
// ============================================

import {
  add,
  infected,
  HEALTH_COLORS,
  IMMUNE,
  SIM_CONFIG,
  VULNERABLE,
  type CellColor,
  type HealthState,
  type Point,
} from '#shared';

/**
 * Cell - one mobile agent in the population
 *
 * Moves ballistically by `direction` every tick. Health only moves
 * forward (vulnerable → infected → immune); immune is terminal.
 */
export class Cell {
  location: Point;
  // Per-tick displacement (velocity)
  direction: Point;

  private _health: HealthState = VULNERABLE;

  constructor(
    location: Point,
    direction: Point,
    private readonly recoveryPeriod: number = SIM_CONFIG.RECOVERY_PERIOD
  ) {
    this.location = location;
    this.direction = direction;
  }

  get health(): HealthState {
    return this._health;
  }

  /**
   * Advance one step: move, then count the infection towards recovery.
   * Immune once ticksSinceInfection exceeds the recovery period.
   */
  tick(): void {
    this.location = add(this.location, this.direction);

    if (this._health.kind === 'infected') {
      const ticksSinceInfection = this._health.ticksSinceInfection + 1;
      this._health =
        ticksSinceInfection > this.recoveryPeriod ? IMMUNE : infected(ticksSinceInfection);
    }
  }

  color(): CellColor {
    switch (this._health.kind) {
      case 'vulnerable':
        return HEALTH_COLORS.vulnerable;
      case 'infected':
        return HEALTH_COLORS.infected;
      case 'immune':
        return HEALTH_COLORS.immune;
    }
  }

  /**
   * Become infected with a fresh counter.
   * Immune cells stay immune.
   */
  contractDisease(): void {
    if (this._health.kind === 'immune') return;
    this._health = infected(0);
  }

  /**
   * Jump straight to immune (seeding only)
   */
  immunize(): void {
    this._health = IMMUNE;
  }

  isVulnerable(): boolean {
    return this._health.kind === 'vulnerable';
  }

  isInfected(): boolean {
    return this._health.kind === 'infected';
  }

  isImmune(): boolean {
    return this._health.kind === 'immune';
  }

  /**
   * Resolve a contact between two cells.
   * An infected cell infects a vulnerable one, whichever side each is on.
   * @returns The cell that was infected by this contact, or null
   */
  contactWith(other: Cell): Cell | null {
    if (this.isInfected() && other.isVulnerable()) {
      other.contractDisease();
      return other;
    }
    if (other.isInfected() && this.isVulnerable()) {
      this.contractDisease();
      return this;
    }
    return null;
  }
}

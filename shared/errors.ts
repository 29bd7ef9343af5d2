// ============================================
// Errors
// ============================================

/**
 * Raised when a simulation cannot be built from the values it was given:
 * seeding counts that don't fit the population, malformed bounds, or
 * unparseable run options.
 */
export class InvalidConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidConfigurationError';
  }
}

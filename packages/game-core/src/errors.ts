// packages/game-core/src/errors.ts
//
// Error classes thrown by the engine. Malformed guesses are not errors: they
// come back as "validation-error" outcomes.

/**
 * Base error class for the Bulls & Cows engine.
 */
export class BullsCowsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BullsCowsError';
  }
}

/**
 * Thrown when a session is configured with an impossible value (e.g., a fixed secret with repeated digits).
 */
export class ConfigurationError extends BullsCowsError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Thrown when a valid guess reaches a session that has already been won. Call `reset()` first.
 */
export class GameFinishedError extends BullsCowsError {
  constructor(public readonly attempts: number) {
    super(`Game already won in ${attempts} attempts; reset to play again`);
    this.name = 'GameFinishedError';
  }
}

/**
 * Thrown when filtering removes every candidate. The secret always agrees with its own feedback, so this means scoring is broken.
 */
export class InvariantViolationError extends BullsCowsError {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantViolationError';
  }
}

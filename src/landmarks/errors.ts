/**
 * Error types raised by the landmark engine.
 * All of them are thrown synchronously to the immediate caller.
 */

export class LandmarkEngineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LandmarkEngineError';
  }
}

/**
 * An operation received an empty collection or point set where at least one
 * element is required.
 */
export class InvalidInputError extends LandmarkEngineError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidInputError';
  }
}

/**
 * A point set does not have exactly two coordinate columns.
 */
export class DimensionMismatchError extends LandmarkEngineError {
  constructor(
    message: string,
    public readonly columnCount: number
  ) {
    super(message);
    this.name = 'DimensionMismatchError';
  }
}

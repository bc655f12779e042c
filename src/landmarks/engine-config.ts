/**
 * Engine Configuration
 *
 * Defaults for the landmark engine. Everything here is read-only; callers
 * override a default by passing it as an argument or through EngineOptions.
 */

import type { LogSink, LogVerbosity } from './engine-logger';

/** Outlier threshold in population standard deviations of the residuals. */
export const DEFAULT_STD_COEF = 5;

/** Column labels the coordinates are read from in labeled point sets. */
export const DEFAULT_COORDINATE_COLUMNS: readonly [string, string] = ['X', 'Y'];

/** Relative cutoff for small singular values in the pseudo-inverse. */
export const PINV_RCOND = 1e-15;

/** One-sided Jacobi SVD stops after this many sweeps even if not converged. */
export const MAX_JACOBI_SWEEPS = 60;

/** Column pairs whose normalized inner product is below this count as orthogonal. */
export const JACOBI_TOLERANCE = 1e-15;

/**
 * Relative cutoff for the least-squares solve of an m x n system
 * (machine epsilon scaled by the larger dimension).
 */
export function lstsqRcond(m: number, n: number): number {
  return Number.EPSILON * Math.max(m, n);
}

export interface EngineOptions {
  /**
   * Column labels selected from labeled point sets.
   * Defaults to DEFAULT_COORDINATE_COLUMNS.
   */
  coordinateColumns?: readonly [string, string];
  /** Receives every emitted log message. */
  onLog?: LogSink;
  /** 'verbose' also emits debug messages. Defaults to LANDMARK_LOG_LEVEL. */
  verbosity?: LogVerbosity;
}

export function resolveCoordinateColumns(options?: EngineOptions): readonly [string, string] {
  return options?.coordinateColumns ?? DEFAULT_COORDINATE_COLUMNS;
}

/**
 * Point set types and helpers.
 *
 * Position is the correspondence key: point i of one set pairs with point i
 * of another, never by coordinate similarity.
 */

import { DEFAULT_COORDINATE_COLUMNS } from './engine-config';
import { DimensionMismatchError, InvalidInputError } from './errors';

export type Point2D = [number, number];

export type PointSet = Point2D[];

/** Coordinate rows as parsed by a caller, not yet validated. */
export type CoordinateRows = ReadonlyArray<ReadonlyArray<number>>;

/** Rows tagged with column labels, e.g. a landmark table with X and Y columns. */
export interface LabeledPointSet {
  columns: readonly string[];
  rows: CoordinateRows;
}

export type PointSetLike = CoordinateRows | LabeledPointSet;

export function isLabeledPointSet(input: PointSetLike): input is LabeledPointSet {
  return !Array.isArray(input);
}

/**
 * Indices of the two coordinate columns of a labeled set.
 * Named columns win; a table with exactly two columns falls back to position.
 */
function coordinateColumnIndices(
  input: LabeledPointSet,
  coordinateColumns: readonly [string, string]
): [number, number] {
  const ix = input.columns.indexOf(coordinateColumns[0]);
  const iy = input.columns.indexOf(coordinateColumns[1]);
  if (ix >= 0 && iy >= 0) {
    return [ix, iy];
  }
  if (input.columns.length === 2) {
    return [0, 1];
  }
  throw new DimensionMismatchError(
    `Expected coordinate columns [${coordinateColumns.join(', ')}] or exactly 2 columns, got [${input.columns.join(', ')}]`,
    input.columns.length
  );
}

/**
 * The labels the coordinates of a point set are read from, or undefined for
 * unlabeled rows.
 */
export function resolveColumnLabels(
  input: PointSetLike,
  coordinateColumns: readonly [string, string] = DEFAULT_COORDINATE_COLUMNS
): [string, string] | undefined {
  if (!isLabeledPointSet(input)) {
    return undefined;
  }
  const [ix, iy] = coordinateColumnIndices(input, coordinateColumns);
  return [input.columns[ix], input.columns[iy]];
}

/**
 * Validate input and copy it into a PointSet.
 *
 * @throws DimensionMismatchError when the rows do not carry exactly two coordinates
 */
export function toPointSet(
  input: PointSetLike,
  coordinateColumns: readonly [string, string] = DEFAULT_COORDINATE_COLUMNS
): PointSet {
  if (!isLabeledPointSet(input)) {
    return input.map((row, i): Point2D => {
      if (row.length !== 2) {
        throw new DimensionMismatchError(
          `Point ${i} has ${row.length} coordinates, expected 2`,
          row.length
        );
      }
      return [row[0], row[1]];
    });
  }

  const [ix, iy] = coordinateColumnIndices(input, coordinateColumns);
  return input.rows.map((row, i): Point2D => {
    if (row.length !== input.columns.length) {
      throw new DimensionMismatchError(
        `Row ${i} has ${row.length} values for ${input.columns.length} columns`,
        row.length
      );
    }
    return [row[ix], row[iy]];
  });
}

export function truncateToCommonLength(a: PointSet, b: PointSet): [PointSet, PointSet] {
  const nb = Math.min(a.length, b.length);
  return [a.slice(0, nb), b.slice(0, nb)];
}

export function pointDistance(a: Point2D, b: Point2D): number {
  return Math.sqrt((a[0] - b[0]) ** 2 + (a[1] - b[1]) ** 2);
}

/**
 * Per-position Euclidean distance over the common length of both sets.
 */
export function pointDistances(a: PointSet, b: PointSet): number[] {
  const nb = Math.min(a.length, b.length);
  const distances: number[] = [];
  for (let i = 0; i < nb; i++) {
    distances.push(pointDistance(a[i], b[i]));
  }
  return distances;
}

/**
 * Map landmarks placed on an image downscaled to `scalePercent` % back to
 * full-resolution coordinates.
 */
export function scalePointSet(points: PointSet, scalePercent: number): PointSet {
  if (!Number.isFinite(scalePercent) || scalePercent <= 0) {
    throw new InvalidInputError(`Scale must be a positive percentage, got ${scalePercent}`);
  }
  const factor = scalePercent / 100;
  return points.map(([x, y]): Point2D => [x / factor, y / factor]);
}

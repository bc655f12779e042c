/**
 * Consensus over repeated landmark annotations of the same image.
 */

import { resolveCoordinateColumns, type EngineOptions } from './engine-config';
import { createEngineLogger } from './engine-logger';
import { InvalidInputError } from './errors';
import {
  isLabeledPointSet,
  resolveColumnLabels,
  toPointSet,
  type CoordinateRows,
  type LabeledPointSet,
  type Point2D,
  type PointSet,
  type PointSetLike,
} from './point-set';

/**
 * Per-position mean over annotations of unequal length.
 *
 * Position i of the result is the mean of point i over exactly the sets
 * longer than i, so an annotator who skipped trailing points only drops out
 * of the positions they did not mark. The result is as long as the longest
 * set; labeled input keeps the coordinate labels of the longest set.
 *
 * @throws InvalidInputError when no sets are given
 */
export function aggregateConsensus(sets: readonly LabeledPointSet[], options?: EngineOptions): LabeledPointSet;
export function aggregateConsensus(sets: readonly CoordinateRows[], options?: EngineOptions): PointSet;
export function aggregateConsensus(sets: readonly PointSetLike[], options?: EngineOptions): PointSet | LabeledPointSet;
export function aggregateConsensus(
  sets: readonly PointSetLike[],
  options: EngineOptions = {}
): PointSet | LabeledPointSet {
  if (sets.length === 0) {
    throw new InvalidInputError('Cannot compute consensus of an empty collection of landmarks');
  }
  const logger = createEngineLogger(options);
  const coordinateColumns = resolveCoordinateColumns(options);
  const pointSets = sets.map(set => toPointSet(set, coordinateColumns));

  // First longest set, its labels name the result
  let baseIndex = 0;
  pointSets.forEach((points, i) => {
    if (points.length > pointSets[baseIndex].length) baseIndex = i;
  });
  const length = pointSets[baseIndex].length;

  const sums: Point2D[] = Array.from({ length }, (): Point2D => [0, 0]);
  const counts = new Array<number>(length).fill(0);
  for (const points of pointSets) {
    points.forEach(([x, y], i) => {
      sums[i][0] += x;
      sums[i][1] += y;
      counts[i]++;
    });
  }
  const consensus: PointSet = sums.map(([sx, sy], i): Point2D => [sx / counts[i], sy / counts[i]]);

  const lengths = pointSets.map(points => points.length);
  if (lengths.some(l => l !== length)) {
    logger.logDebug(`[Consensus] partial coverage, lengths [${lengths.join(', ')}] -> ${length} pts`);
  }

  const base = sets[baseIndex];
  if (isLabeledPointSet(base)) {
    const columns = resolveColumnLabels(base, coordinateColumns) ?? [...coordinateColumns];
    return { columns, rows: consensus };
  }
  return consensus;
}

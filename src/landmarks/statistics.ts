/**
 * Error statistics between reference and sensed landmarks.
 */

import { DEFAULT_STD_COEF, type EngineOptions } from './engine-config';
import { createEngineLogger } from './engine-logger';
import { InvalidInputError } from './errors';
import { classifyOutliers } from './outliers';
import { mean, median, sampleStd } from './descriptive';
import { pointDistances, toPointSet, type PointSet, type PointSetLike } from './point-set';

export interface LandmarkStatistics {
  count: number;
  mean: number;
  /** Sample standard deviation (divisor n - 1) */
  std: number;
  min: number;
  max: number;
  median: number;
  /** Element-wise max + min over all points of both sets */
  imageSize: [number, number];
  /** Euclidean norm of imageSize */
  imageDiagonal: number;
}

/**
 * Implied image extent: element-wise max plus min over every point.
 * This is max + min, not the bounding box size max - min.
 */
export function impliedImageSize(points: PointSet): [number, number] {
  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;
  for (const [x, y] of points) {
    minX = Math.min(minX, x);
    minY = Math.min(minY, y);
    maxX = Math.max(maxX, x);
    maxY = Math.max(maxY, y);
  }
  return [maxX + minX, maxY + minY];
}

/**
 * Summarize the residual error between reference and sensed landmarks.
 *
 * With useAffine the residuals are taken after a global affine alignment
 * (outlier flags are dropped); otherwise they are plain distances over the
 * common length of both sets.
 *
 * @throws InvalidInputError when either set is empty
 */
export function summarize(
  pointsRef: PointSetLike,
  pointsIn: PointSetLike,
  useAffine: boolean = false,
  options: EngineOptions = {}
): LandmarkStatistics {
  const logger = createEngineLogger(options);
  const ref = toPointSet(pointsRef, options.coordinateColumns);
  const sensed = toPointSet(pointsIn, options.coordinateColumns);

  if (ref.length === 0 || sensed.length === 0) {
    throw new InvalidInputError(
      `Cannot summarize empty landmarks (reference: ${ref.length}, sensed: ${sensed.length})`
    );
  }

  const err = useAffine
    ? classifyOutliers(ref, sensed, DEFAULT_STD_COEF, options).residual
    : pointDistances(ref, sensed);

  const imageSize = impliedImageSize([...ref, ...sensed]);
  const stats: LandmarkStatistics = {
    count: err.length,
    mean: mean(err),
    std: sampleStd(err),
    min: Math.min(...err),
    max: Math.max(...err),
    median: median(err),
    imageSize,
    imageDiagonal: Math.sqrt(imageSize[0] ** 2 + imageSize[1] ** 2),
  };

  logger.logDebug(
    `[Statistics] ${stats.count} pts${useAffine ? ' (affine)' : ''}: mean=${stats.mean.toFixed(2)}, median=${stats.median.toFixed(2)}, max=${stats.max.toFixed(2)}`
  );

  return stats;
}

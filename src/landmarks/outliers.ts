/**
 * Outlier detection for landmark correspondences.
 * Flags pairs whose residual after affine alignment is unusually large.
 */

import { estimateAffine } from './affine';
import { DEFAULT_STD_COEF, type EngineOptions } from './engine-config';
import { createEngineLogger } from './engine-logger';
import { pointDistances, toPointSet, truncateToCommonLength, type PointSetLike } from './point-set';
import { populationStd } from './descriptive';

export interface OutlierClassification {
  isOutlier: boolean[];
  /** Distance between each target point and its affinely warped source */
  residual: number[];
  /** stdCoef times the population standard deviation of the residuals */
  threshold: number;
}

/**
 * Classify correspondences as outliers after a global affine alignment.
 *
 * The threshold is computed over the full residual vector, outliers
 * included. Locally clustered non-affine error is not told apart from true
 * outliers.
 *
 * @param stdCoef Multiplier for the population standard deviation of the residuals
 */
export function classifyOutliers(
  points0: PointSetLike,
  points1: PointSetLike,
  stdCoef: number = DEFAULT_STD_COEF,
  options: EngineOptions = {}
): OutlierClassification {
  const logger = createEngineLogger(options);
  const [p0, p1] = truncateToCommonLength(
    toPointSet(points0, options.coordinateColumns),
    toPointSet(points1, options.coordinateColumns)
  );

  const { sourceWarped } = estimateAffine(p0, p1, options);
  const residual = pointDistances(p1, sourceWarped);
  const threshold = populationStd(residual) * stdCoef;
  const isOutlier = residual.map(err => err > threshold);

  const count = isOutlier.filter(Boolean).length;
  logger.logDebug(`[Outliers] ${count}/${residual.length} above ${threshold.toFixed(2)} (${stdCoef} std)`);

  return { isOutlier, residual, threshold };
}

// Public API re-exports
export { aggregateConsensus } from './consensus';
export { createConsensusCollection } from './consensus-collection';
export type { ConsensusCollection, ConsensusCollectionOptions, LandmarkAnnotation } from './consensus-collection';
export { estimateAffine, warpPoints, warpPointsInverse } from './affine';
export type { AffineEstimate, AffineMatrix } from './affine';
export { classifyOutliers } from './outliers';
export type { OutlierClassification } from './outliers';
export { impliedImageSize, summarize } from './statistics';
export type { LandmarkStatistics } from './statistics';
export { mean, median, populationStd, sampleStd } from './descriptive';
export {
  isLabeledPointSet,
  pointDistance,
  pointDistances,
  resolveColumnLabels,
  scalePointSet,
  toPointSet,
  truncateToCommonLength,
} from './point-set';
export type { CoordinateRows, LabeledPointSet, Point2D, PointSet, PointSetLike } from './point-set';
export { DimensionMismatchError, InvalidInputError, LandmarkEngineError } from './errors';
export {
  DEFAULT_COORDINATE_COLUMNS,
  DEFAULT_STD_COEF,
  JACOBI_TOLERANCE,
  MAX_JACOBI_SWEEPS,
  PINV_RCOND,
  lstsqRcond,
} from './engine-config';
export type { EngineOptions } from './engine-config';
export { createEngineLogger } from './engine-logger';
export type { EngineLogger, LogSink, LogVerbosity } from './engine-logger';
export { leastSquares, pseudoInverse, svd } from './linear-algebra';
export type { LeastSquaresResult, SvdResult } from './linear-algebra';

/**
 * Consensus landmarks for a whole dataset: annotations from several
 * annotators, each working on a possibly downscaled copy of the image.
 */

import { aggregateConsensus } from './consensus';
import { resolveCoordinateColumns, type EngineOptions } from './engine-config';
import { createEngineLogger } from './engine-logger';
import {
  isLabeledPointSet,
  resolveColumnLabels,
  scalePointSet,
  toPointSet,
  type LabeledPointSet,
  type PointSet,
  type PointSetLike,
} from './point-set';

export interface LandmarkAnnotation {
  imageName: string;
  annotator: string;
  /** Percentage of the full resolution the annotator worked on, e.g. 25 */
  scale: number;
  points: PointSetLike;
}

export interface ConsensusCollection {
  /** Consensus landmarks at full resolution, by image name */
  landmarks: Map<string, PointSet | LabeledPointSet>;
  /** Number of annotations that contributed to each image */
  annotationCounts: Map<string, number>;
}

export interface ConsensusCollectionOptions extends EngineOptions {
  /** Truncate every consensus to the shortest one in the collection. Default true. */
  equalSize?: boolean;
}

function lengthOf(points: PointSet | LabeledPointSet): number {
  return isLabeledPointSet(points) ? points.rows.length : points.length;
}

function truncate(points: PointSet | LabeledPointSet, length: number): PointSet | LabeledPointSet {
  return isLabeledPointSet(points)
    ? { columns: points.columns, rows: points.rows.slice(0, length) }
    : points.slice(0, length);
}

/**
 * Rescale every annotation to full resolution, then build one consensus per
 * image. Images keep the order in which they first appear.
 */
export function createConsensusCollection(
  annotations: readonly LandmarkAnnotation[],
  options: ConsensusCollectionOptions = {}
): ConsensusCollection {
  const { equalSize = true } = options;
  const logger = createEngineLogger(options);
  const coordinateColumns = resolveCoordinateColumns(options);

  const grouped = new Map<string, PointSetLike[]>();
  for (const annotation of annotations) {
    const rows = scalePointSet(toPointSet(annotation.points, coordinateColumns), annotation.scale);
    const columns = resolveColumnLabels(annotation.points, coordinateColumns);
    const scaled: PointSetLike = columns ? { columns, rows } : rows;

    const group = grouped.get(annotation.imageName);
    if (group) {
      group.push(scaled);
    } else {
      grouped.set(annotation.imageName, [scaled]);
    }
  }

  const landmarks = new Map<string, PointSet | LabeledPointSet>();
  const annotationCounts = new Map<string, number>();
  for (const [imageName, sets] of grouped) {
    annotationCounts.set(imageName, sets.length);
    landmarks.set(imageName, aggregateConsensus(sets, options));
  }

  if (equalSize && landmarks.size > 0) {
    const minLength = Math.min(...[...landmarks.values()].map(lengthOf));
    for (const [imageName, points] of landmarks) {
      landmarks.set(imageName, truncate(points, minLength));
    }
    logger.logDebug(`[Consensus] ${landmarks.size} images truncated to ${minLength} pts`);
  }

  return { landmarks, annotationCounts };
}

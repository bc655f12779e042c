import type { PointSet } from '../point-set';

/** Rectangle corners and their image under x' = 65 - x, y' = y - 60 */
export const CORNERS_SOURCE: PointSet = [[4, 116], [4, 4], [26, 4], [26, 116]];
export const CORNERS_TARGET: PointSet = [[61, 56], [61, -56], [39, -56], [39, 56]];

/** Seven roughly consistent correspondences and a gross error at the end */
export const LANDMARKS_REF: PointSet = [
  [4, 116], [4, 4], [26, 4], [26, 116], [18, 45], [0, 0], [-12, 8], [1, 1],
];
export const LANDMARKS_SENSED: PointSet = [
  [61, 56], [61, -56], [39, -56], [39, 56], [47, -15], [65, -60], [77, -52], [0, 0],
];

export function filled(rows: number, value: number): PointSet {
  return Array.from({ length: rows }, (): [number, number] => [value, value]);
}

import { describe, it, expect } from '@jest/globals';
import { impliedImageSize, summarize } from '../statistics';
import { classifyOutliers } from '../outliers';
import { mean, median, populationStd, sampleStd } from '../descriptive';
import { InvalidInputError } from '../errors';
import { LANDMARKS_REF, LANDMARKS_SENSED } from './fixtures';

describe('summarize', () => {
  it('summarizes plain distances without alignment', () => {
    const stats = summarize(LANDMARKS_REF, LANDMARKS_SENSED);

    const distances = [6849, 6849, 3769, 3769, 4441, 7825, 11521, 2].map(Math.sqrt);
    expect(stats.count).toBe(8);
    expect(stats.mean).toBeCloseTo(distances.reduce((a, b) => a + b, 0) / 8, 10);
    expect(stats.mean).toBeCloseTo(69.019, 3);
    expect(stats.min).toBe(Math.sqrt(2));
    expect(stats.max).toBe(Math.sqrt(11521));
    expect(stats.median).toBeCloseTo((Math.sqrt(4441) + Math.sqrt(6849)) / 2, 10);
  });

  it('summarizes residuals after affine alignment', () => {
    const stats = summarize(LANDMARKS_REF, LANDMARKS_SENSED, true);

    expect(stats.count).toBe(8);
    expect(stats.mean).toBeCloseTo(18.60760876, 6);
    expect(stats.std).toBeCloseTo(21.48950742, 6);
    expect(stats.min).toBeCloseTo(1.02048713, 6);
    expect(stats.max).toBeCloseTo(68.95824913, 6);
    expect(stats.median).toBeCloseTo(13.53387914, 6);
    expect(stats.imageSize).toEqual([65, 56]);
    expect(stats.imageDiagonal).toBe(Math.sqrt(7361));
  });

  it('uses the sample std, unlike the population std behind the outlier threshold', () => {
    const stats = summarize(LANDMARKS_REF, LANDMARKS_SENSED, true);
    const { residual } = classifyOutliers(LANDMARKS_REF, LANDMARKS_SENSED);

    const n = residual.length;
    expect(stats.std / populationStd(residual)).toBeCloseTo(Math.sqrt(n / (n - 1)), 12);
  });

  it('counts only the common length and keeps min <= mean <= max', () => {
    const stats = summarize(LANDMARKS_REF, LANDMARKS_SENSED.slice(0, 3));

    expect(stats.count).toBe(3);
    expect(stats.min).toBeLessThanOrEqual(stats.mean);
    expect(stats.mean).toBeLessThanOrEqual(stats.max);
    expect(stats.min).toBeGreaterThanOrEqual(0);
  });

  it('takes the image size as max + min over both full sets', () => {
    const stats = summarize([[10, 20], [100, 100]], [[30, 5]]);

    expect(stats.count).toBe(1);
    expect(stats.imageSize).toEqual([110, 105]);
    expect(stats.imageDiagonal).toBe(Math.sqrt(110 ** 2 + 105 ** 2));
  });

  it('reports NaN std for a single residual', () => {
    const stats = summarize([[0, 0]], [[3, 4]]);

    expect(stats.mean).toBe(5);
    expect(stats.median).toBe(5);
    expect(stats.std).toBeNaN();
  });

  it('fails on empty landmarks', () => {
    expect(() => summarize([], LANDMARKS_SENSED)).toThrow(InvalidInputError);
    expect(() => summarize(LANDMARKS_REF, [], true)).toThrow(InvalidInputError);
  });

  it('reads labeled tables', () => {
    const stats = summarize(
      { columns: ['X', 'Y'], rows: [[0, 0], [1, 1]] },
      { columns: ['id', 'X', 'Y'], rows: [[1, 3, 4], [2, 1, 1]] }
    );

    expect(stats.count).toBe(2);
    expect(stats.mean).toBe(2.5);
    expect(stats.imageSize).toEqual([3, 4]);
  });
});

describe('impliedImageSize', () => {
  it('adds the extremes instead of subtracting them', () => {
    expect(impliedImageSize([[10, 20], [30, 5]])).toEqual([40, 25]);
  });
});

describe('descriptive statistics', () => {
  const values = [2, 4, 4, 4, 5, 5, 7, 9];

  it('computes mean and both standard deviations', () => {
    expect(mean(values)).toBe(5);
    expect(populationStd(values)).toBe(2);
    expect(sampleStd(values)).toBeCloseTo(Math.sqrt(32 / 7), 12);
  });

  it('takes the middle value or the mean of the two middle values', () => {
    expect(median([3, 1, 2])).toBe(2);
    expect(median(values)).toBe(4.5);
    expect(median([])).toBeNaN();
  });
});

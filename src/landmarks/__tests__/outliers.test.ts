import { describe, it, expect } from '@jest/globals';
import { classifyOutliers } from '../outliers';
import { populationStd } from '../descriptive';
import { LANDMARKS_REF, LANDMARKS_SENSED } from './fixtures';

describe('classifyOutliers', () => {
  it('flags only the grossly inconsistent correspondence', () => {
    const { isOutlier, residual, threshold } = classifyOutliers(LANDMARKS_REF, LANDMARKS_SENSED, 3);

    expect(isOutlier).toEqual([false, false, false, false, false, false, false, true]);

    const expected = [1.02048713, 16.78021565, 10.28754262, 5.47218589, 6.87932830, 18.52354910, 20.93931222, 68.95824913];
    expected.forEach((err, i) => expect(residual[i]).toBeCloseTo(err, 6));
    expect(threshold).toBeCloseTo(3 * 20.10159354, 6);
  });

  it('derives the threshold from the population std of all residuals', () => {
    const { residual, threshold } = classifyOutliers(LANDMARKS_REF, LANDMARKS_SENSED, 2.5);

    expect(threshold).toBeCloseTo(2.5 * populationStd(residual), 12);
  });

  it('flags nothing with the default coefficient on the same data', () => {
    const { isOutlier, threshold } = classifyOutliers(LANDMARKS_REF, LANDMARKS_SENSED);

    expect(threshold).toBeCloseTo(5 * 20.10159354, 6);
    expect(isOutlier.some(Boolean)).toBe(false);
  });

  it('produces non-negative residuals over the common length', () => {
    const { isOutlier, residual } = classifyOutliers(LANDMARKS_REF, LANDMARKS_SENSED.slice(0, 6));

    expect(residual).toHaveLength(6);
    expect(isOutlier).toHaveLength(6);
    expect(residual.every(err => err >= 0)).toBe(true);
  });

  it('behaves like the truncated sets when lengths differ', () => {
    const shortSensed = LANDMARKS_SENSED.slice(0, 5);

    expect(classifyOutliers(LANDMARKS_REF, shortSensed, 1)).toEqual(
      classifyOutliers(LANDMARKS_REF.slice(0, 5), shortSensed, 1)
    );
  });

  it('logs the flagged count in verbose mode', () => {
    const messages: string[] = [];

    classifyOutliers(LANDMARKS_REF, LANDMARKS_SENSED, 3, { onLog: m => messages.push(m), verbosity: 'verbose' });

    expect(messages[messages.length - 1]).toBe('[Outliers] 1/8 above 60.30 (3 std)');
  });
});

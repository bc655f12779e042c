/**
 * Descriptive statistics over residual vectors.
 * Empty input gives NaN rather than throwing.
 */

export function mean(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

function sumSquaredDeviations(values: readonly number[]): number {
  const mu = mean(values);
  let sum = 0;
  for (const v of values) sum += (v - mu) ** 2;
  return sum;
}

/** Standard deviation with divisor n. */
export function populationStd(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  return Math.sqrt(sumSquaredDeviations(values) / values.length);
}

/** Standard deviation with Bessel's correction (divisor n - 1); NaN below two values. */
export function sampleStd(values: readonly number[]): number {
  if (values.length < 2) return NaN;
  return Math.sqrt(sumSquaredDeviations(values) / (values.length - 1));
}

export function median(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

import type { SampleStats } from './types.js';

/**
 * min/max/mean and sample standard deviation (n - 1 divisor).
 * A single sample has a stddev of 0; an empty set yields null.
 *
 * Mean and squared deviations are accumulated incrementally (Welford), so
 * values near the top of the double range do not overflow a running sum.
 */
export function computeStats(values: readonly number[]): SampleStats | null {
  if (values.length === 0) return null;

  let min = values[0];
  let max = values[0];
  let avg = 0;
  let m2 = 0;
  values.forEach((value, i) => {
    if (value < min) min = value;
    if (value > max) max = value;
    const delta = value - avg;
    avg += delta / (i + 1);
    m2 += delta * (value - avg);
  });

  const stddev = values.length > 1 ? Math.sqrt(m2 / (values.length - 1)) : 0;

  return { count: values.length, min, max, avg, stddev };
}

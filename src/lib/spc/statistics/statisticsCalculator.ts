/**
 * Baseline statistics over a measurement sample.
 *
 * Single pass, Welford accumulation: the running mean and the sum of squared
 * deviations (m2) are updated per point.
 *
 * Edge-case policy:
 * - empty sample: INSUFFICIENT_DATA.
 * - one observation: sigma = 0 (zero-variance baseline).
 * - n >= 2: sample standard deviation, m2 / (n - 1).
 */

import { fail, ok, type SpcResult } from "../errors.js";
import type { Measurement, SampleStatistics } from "../types.js";

export function computeBaseline(sample: readonly Measurement[]): SpcResult<SampleStatistics> {
  if (sample.length === 0) {
    return fail("INSUFFICIENT_DATA", "Sample contains no measurements");
  }

  let count = 0;
  let mean = 0;
  let m2 = 0;
  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;

  for (let i = 0; i < sample.length; i++) {
    const value = sample[i].value;
    if (!Number.isFinite(value)) {
      return fail("INVALID_PARAMETER", `Measurement ${i} has a non-finite value`);
    }
    count += 1;
    const delta = value - mean;
    mean += delta / count;
    m2 += delta * (value - mean);
    if (value < min) min = value;
    if (value > max) max = value;
  }

  // m2 can dip a hair below zero from rounding on constant samples
  const sigma = count < 2 ? 0 : Math.sqrt(Math.max(0, m2 / (count - 1)));

  return ok({ count, mean, sigma, min, max });
}

/**
 * Per-point classification of a series against one fixed set of control limits.
 */

import type { ClassifiedPoint, ControlLimits, Measurement, PointStatus } from "../types.js";

function statusFor(value: number, limits: ControlLimits): PointStatus {
  if (value > limits.ucl) return "OUT_HIGH";
  if (value < limits.lcl) return "OUT_LOW";
  if (value > limits.warningUpper) return "WARNING_HIGH";
  if (value < limits.warningLower) return "WARNING_LOW";
  return "IN_CONTROL";
}

/**
 * Distance from center in sigmas, with sigma recovered from the limits.
 * A zero-variance baseline gives 0 on the center and ±Infinity elsewhere.
 */
export function deviationSigmas(value: number, limits: ControlLimits): number {
  const sigma = (limits.ucl - limits.center) / limits.sigmaMultiplier;
  const diff = value - limits.center;
  if (sigma === 0) {
    if (diff === 0) return 0;
    return diff > 0 ? Number.POSITIVE_INFINITY : Number.NEGATIVE_INFINITY;
  }
  return diff / sigma;
}

export function classifyPoint(measurement: Measurement, limits: ControlLimits): ClassifiedPoint {
  return {
    measurement,
    status: statusFor(measurement.value, limits),
    deviationSigmas: deviationSigmas(measurement.value, limits),
  };
}

/** Lazy form; each iteration restarts from the first point. */
export function iterateClassified(
  series: readonly Measurement[],
  limits: ControlLimits
): Iterable<ClassifiedPoint> {
  return {
    *[Symbol.iterator]() {
      for (const measurement of series) {
        yield classifyPoint(measurement, limits);
      }
    },
  };
}

export function classifySeries(
  series: readonly Measurement[],
  limits: ControlLimits
): ClassifiedPoint[] {
  return Array.from(iterateClassified(series, limits));
}

/**
 * Run statistics over a classified series: status counts, same-side runs
 * and the "run of N" shift signal.
 */

import { getShiftRunLength } from "../config.js";
import type { ClassifiedPoint, PointStatus, RunSummary } from "../types.js";

function emptyCounts(): Record<PointStatus, number> {
  return { IN_CONTROL: 0, WARNING_HIGH: 0, WARNING_LOW: 0, OUT_HIGH: 0, OUT_LOW: 0 };
}

function isOutOfControl(status: PointStatus): boolean {
  return status === "OUT_HIGH" || status === "OUT_LOW";
}

export function summarizeClassification(
  points: readonly ClassifiedPoint[],
  options?: { shiftRunLength?: number }
): RunSummary {
  const shiftRunLength = options?.shiftRunLength ?? getShiftRunLength();
  const counts = emptyCounts();

  let firstOutOfControlIndex: number | null = null;
  let above = 0;
  let below = 0;
  let outRun = 0;
  let longestRunAboveCenter = 0;
  let longestRunBelowCenter = 0;
  let longestOutOfControlRun = 0;

  for (let i = 0; i < points.length; i++) {
    const p = points[i];
    counts[p.status] += 1;

    if (p.deviationSigmas > 0) {
      above += 1;
      below = 0;
    } else if (p.deviationSigmas < 0) {
      below += 1;
      above = 0;
    } else {
      above = 0;
      below = 0;
    }
    longestRunAboveCenter = Math.max(longestRunAboveCenter, above);
    longestRunBelowCenter = Math.max(longestRunBelowCenter, below);

    if (isOutOfControl(p.status)) {
      if (firstOutOfControlIndex === null) firstOutOfControlIndex = i;
      outRun += 1;
      longestOutOfControlRun = Math.max(longestOutOfControlRun, outRun);
    } else {
      outRun = 0;
    }
  }

  const total = points.length;
  return {
    total,
    counts,
    outOfControl: counts.OUT_HIGH + counts.OUT_LOW,
    warning: counts.WARNING_HIGH + counts.WARNING_LOW,
    inControlFraction: total === 0 ? null : counts.IN_CONTROL / total,
    firstOutOfControlIndex,
    longestRunAboveCenter,
    longestRunBelowCenter,
    longestOutOfControlRun,
    shiftDetected:
      longestRunAboveCenter >= shiftRunLength || longestRunBelowCenter >= shiftRunLength,
  };
}

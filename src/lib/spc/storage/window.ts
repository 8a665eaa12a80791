/**
 * Time-window filtering shared by the file-backed and in-memory stores.
 */

import type { Measurement, TimeWindow } from "../types.js";

export function inWindow(timestampISO: string, window: TimeWindow): boolean {
  const t = Date.parse(timestampISO);
  if (window.fromISO != null && t < Date.parse(window.fromISO)) return false;
  if (window.toISO != null && t > Date.parse(window.toISO)) return false;
  return true;
}

/** Filter to the window and sort ascending by timestamp; stable for equal timestamps. */
export function selectWindow(measurements: readonly Measurement[], window: TimeWindow): Measurement[] {
  return measurements
    .filter((m) => inWindow(m.timestampISO, window))
    .sort((a, b) => Date.parse(a.timestampISO) - Date.parse(b.timestampISO));
}

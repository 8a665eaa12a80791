/**
 * Storage adapter interfaces for SPC baselines and measurements.
 */

import type { Baseline, Measurement, ScopeKey, TimeWindow } from "../types.js";

export type PersistOutcome = "persisted" | "stale_version";

export interface BaselineStore {
  /** Current authoritative baseline, or null when the scope has none. */
  loadBaseline(scopeKey: ScopeKey): Promise<Baseline | null>;
  /**
   * Compare-and-swap on version: stores `baseline` only when the current
   * version is `baseline.version - 1` (0 meaning no baseline yet). The
   * superseded record is kept in history.
   */
  persistBaseline(scopeKey: ScopeKey, baseline: Baseline): Promise<PersistOutcome>;
  /** Committed baselines, newest first. */
  loadBaselineHistory(scopeKey: ScopeKey, limit?: number): Promise<Baseline[]>;
}

export interface MeasurementSource {
  /** Measurements in the window, ascending by timestamp. */
  fetchMeasurements(scopeKey: ScopeKey, window: TimeWindow): Promise<Measurement[]>;
}

export interface MeasurementStore extends MeasurementSource {
  appendMeasurement(measurement: Measurement): Promise<void>;
}

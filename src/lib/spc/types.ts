/**
 * SPC type definitions: measurements, baselines, limits, classifications.
 */

/** Canonical key of an instrument/workstation/technician combination. */
export type ScopeKey = string;

export interface ScopeParts {
  instrumentId: string;
  workstationId?: string;
  technicianId?: string;
}

export interface Measurement {
  scopeKey: ScopeKey;
  value: number;
  timestampISO: string;
}

/** Inclusive time range. Missing bounds are open. */
export interface TimeWindow {
  fromISO?: string;
  toISO?: string;
}

export interface SampleStatistics {
  count: number;
  mean: number;
  /** Sample standard deviation; 0 for a single observation. */
  sigma: number;
  min: number;
  max: number;
}

export interface Baseline {
  scopeKey: ScopeKey;
  mean: number;
  sigma: number;
  sampleCount: number;
  /** Optimistic-concurrency token; 1 for the first committed baseline. */
  version: number;
  committedAtISO: string;
  window?: TimeWindow;
}

/** The fields limit derivation reads; a Baseline or a Candidate both fit. */
export type BaselineStats = Pick<Baseline, "mean" | "sigma">;

export interface ControlLimits {
  center: number;
  ucl: number;
  lcl: number;
  warningUpper: number;
  warningLower: number;
  sigmaMultiplier: number;
  /** null when the warning zone is switched off. */
  warningMultiplier: number | null;
}

export interface DeriveLimitsOptions {
  sigmaMultiplier?: number;
  /** null switches the warning zone off for this call. */
  warningMultiplier?: number | null;
}

export const POINT_STATUSES = [
  "IN_CONTROL",
  "WARNING_HIGH",
  "WARNING_LOW",
  "OUT_HIGH",
  "OUT_LOW",
] as const;

export type PointStatus = (typeof POINT_STATUSES)[number];

export interface ClassifiedPoint {
  measurement: Measurement;
  status: PointStatus;
  deviationSigmas: number;
}

export interface RunSummary {
  total: number;
  counts: Record<PointStatus, number>;
  outOfControl: number;
  warning: number;
  inControlFraction: number | null;
  firstOutOfControlIndex: number | null;
  longestRunAboveCenter: number;
  longestRunBelowCenter: number;
  longestOutOfControlRun: number;
  shiftDetected: boolean;
}

export type BaselineState = "NO_BASELINE" | "STABLE" | "RECALCULATING";

/** A proposed baseline computed from a window; not authoritative until committed. */
export interface Candidate {
  id: string;
  scopeKey: ScopeKey;
  mean: number;
  sigma: number;
  count: number;
  /** Version observed when the recalculation was requested; 0 when no baseline existed. */
  basedOnVersion: number;
  window: TimeWindow;
  requestedAtISO: string;
}

export interface ScopeEvaluation {
  baseline: Baseline;
  limits: ControlLimits;
  points: ClassifiedPoint[];
  summary: RunSummary;
}

/**
 * Test fixtures for the SPC engine.
 */

import type { Baseline, Measurement, ScopeKey } from "../types.js";

export const SCOPE_A: ScopeKey = "SCALE-01|WS-3|tech-7";
export const SCOPE_B: ScopeKey = "SCALE-02|*|*";

export const T0 = "2025-01-15T08:00:00.000Z";
export const FIXED_NOW = new Date("2025-01-16T12:00:00.000Z");

export const SPC_ENV_KEYS = [
  "SPC_SIGMA_MULTIPLIER",
  "SPC_WARNING_MULTIPLIER",
  "SPC_WARNING_ZONES_ENABLED",
  "SPC_SHIFT_RUN_LENGTH",
  "SPC_BASELINE_HISTORY_CAP",
  "SPC_DATA_DIR",
  "PERSISTENCE_DRIVER",
  "DEBUG_SPC",
] as const;

/** Clears SPC env vars and returns a function that restores them. */
export function isolateSpcEnv(): () => void {
  const saved = new Map<string, string | undefined>();
  for (const key of SPC_ENV_KEYS) {
    saved.set(key, process.env[key]);
    delete process.env[key];
  }
  return () => {
    for (const [key, value] of saved) {
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
  };
}

/** One measurement per minute from `startISO`. */
export function series(
  scopeKey: ScopeKey,
  values: number[],
  startISO: string = T0
): Measurement[] {
  const start = Date.parse(startISO);
  return values.map((value, i) => ({
    scopeKey,
    value,
    timestampISO: new Date(start + i * 60_000).toISOString(),
  }));
}

export function baselineFixture(overrides: Partial<Baseline> = {}): Baseline {
  return {
    scopeKey: SCOPE_A,
    mean: 100,
    sigma: 2,
    sampleCount: 30,
    version: 1,
    committedAtISO: "2025-01-10T00:00:00.000Z",
    ...overrides,
  };
}

export function sequentialIds(prefix = "cand"): () => string {
  let n = 0;
  return () => {
    n += 1;
    return `${prefix}-${n}`;
  };
}

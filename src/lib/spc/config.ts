/**
 * SPC config: env-based getters with safe parsing and clamped defaults.
 */

import { join } from "path";

function parseIntEnv(key: string, defaultVal: number, min: number, max: number): number {
  const raw = process.env[key];
  if (raw == null || raw === "") return defaultVal;
  const n = parseInt(raw, 10);
  if (Number.isNaN(n)) return defaultVal;
  return Math.max(min, Math.min(max, n));
}

function parseFloatEnv(key: string, defaultVal: number, min: number, max: number): number {
  const raw = process.env[key];
  if (raw == null || raw === "") return defaultVal;
  const n = parseFloat(raw);
  if (!Number.isFinite(n) || n <= min) return defaultVal;
  return Math.min(max, n);
}

function parseBoolEnv(key: string, defaultVal: boolean): boolean {
  const v = process.env[key]?.toLowerCase();
  if (v === "true" || v === "1") return true;
  if (v === "false" || v === "0") return false;
  return defaultVal;
}

/** Control band width in sigmas. Default 3. */
export function getSigmaMultiplier(): number {
  return parseFloatEnv("SPC_SIGMA_MULTIPLIER", 3, 0, 10);
}

/** Warning band width in sigmas. Default 2. */
export function getWarningMultiplier(): number {
  return parseFloatEnv("SPC_WARNING_MULTIPLIER", 2, 0, 10);
}

export function isWarningZoneEnabled(): boolean {
  return parseBoolEnv("SPC_WARNING_ZONES_ENABLED", true);
}

/** Consecutive same-side points that flag a process shift. Default 9. */
export function getShiftRunLength(): number {
  return parseIntEnv("SPC_SHIFT_RUN_LENGTH", 9, 2, 100);
}

/** Superseded baselines kept per scope. Default 100. */
export function getBaselineHistoryCap(): number {
  return parseIntEnv("SPC_BASELINE_HISTORY_CAP", 100, 1, 10_000);
}

export function getDataDir(): string {
  const envDir = process.env.SPC_DATA_DIR;
  if (envDir) return envDir;
  return join(process.cwd(), ".data", "spc");
}

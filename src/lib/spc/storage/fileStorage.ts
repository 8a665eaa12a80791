/**
 * File-backed storage adapter for SPC baselines and measurements.
 *
 * Layout under the data dir:
 *   baselines.json              current baseline per scope
 *   history/{scope}.json        committed baselines, oldest first
 *   measurements/{scope}.json   recorded measurements
 *
 * Writes are serialized per resolved data dir within the process, so every
 * adapter over the same directory shares one version compare-and-swap.
 * Files are replaced by rename, so readers never see a half-written file.
 * Entries that fail validation are skipped on read and left untouched on write.
 */

import { randomUUID } from "crypto";
import { mkdir, readFile, rename, writeFile } from "fs/promises";
import { join, resolve } from "path";
import type { z } from "zod";
import type { Baseline, Measurement, ScopeKey, TimeWindow } from "../types.js";
import type { BaselineStore, MeasurementStore, PersistOutcome } from "./types.js";
import { BaselineSchema, MeasurementSchema, firstIssueMessage } from "../schemas.js";
import { getBaselineHistoryCap, getDataDir } from "../config.js";
import { selectWindow } from "./window.js";

/** Pending write chain per resolved data dir. */
const writeChains = new Map<string, Promise<void>>();

function serializeForDir<T>(dir: string, task: () => Promise<T>): Promise<T> {
  const run = (writeChains.get(dir) ?? Promise.resolve()).then(task, task);
  const settle = (): void => {
    if (writeChains.get(dir) === next) writeChains.delete(dir);
  };
  const next = run.then(settle, settle);
  writeChains.set(dir, next);
  return run;
}

/**
 * File name for a scope. Characters outside [A-Za-z0-9-] become `_` plus four
 * hex digits, so distinct scope keys never share a file.
 */
export function scopeFileName(scopeKey: ScopeKey): string {
  const encoded = scopeKey.replace(
    /[^a-zA-Z0-9-]/g,
    (ch) => `_${ch.charCodeAt(0).toString(16).padStart(4, "0")}`
  );
  return `${encoded}.json`;
}

/** First entry that validates and belongs to the scope. */
function findBaseline(items: unknown[], scopeKey: ScopeKey): { index: number; baseline: Baseline } | null {
  for (let i = 0; i < items.length; i++) {
    const result = BaselineSchema.safeParse(items[i]);
    if (result.success && result.data.scopeKey === scopeKey) {
      return { index: i, baseline: result.data };
    }
  }
  return null;
}

/** Drops the oldest valid entries beyond `cap`; unreadable entries stay. */
function capHistory(items: unknown[], cap: number): unknown[] {
  const validIdx: number[] = [];
  items.forEach((item, i) => {
    if (BaselineSchema.safeParse(item).success) validIdx.push(i);
  });
  const excess = validIdx.length - cap;
  if (excess <= 0) return items;
  const drop = new Set(validIdx.slice(0, excess));
  return items.filter((_, i) => !drop.has(i));
}

export class FileStorageAdapter implements BaselineStore, MeasurementStore {
  private readonly dataDir: string;
  private readonly baselinesPath: string;
  private readonly historyDir: string;
  private readonly measurementsDir: string;

  constructor(dataDir?: string) {
    this.dataDir = resolve(dataDir ?? getDataDir());
    this.baselinesPath = join(this.dataDir, "baselines.json");
    this.historyDir = join(this.dataDir, "history");
    this.measurementsDir = join(this.dataDir, "measurements");
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    return serializeForDir(this.dataDir, task);
  }

  private async ensureAllDirs(): Promise<void> {
    await mkdir(this.dataDir, { recursive: true });
    await mkdir(this.historyDir, { recursive: true });
    await mkdir(this.measurementsDir, { recursive: true });
  }

  private async writeJson(path: string, data: unknown): Promise<void> {
    const tmp = `${path}.${randomUUID()}.tmp`;
    await writeFile(tmp, JSON.stringify(data, null, 2), "utf-8");
    await rename(tmp, path);
  }

  /** Reads a JSON array; a missing file is empty, anything unparsable is an error. */
  private async readArray(path: string): Promise<unknown[]> {
    let raw: string;
    try {
      raw = await readFile(path, "utf-8");
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") return [];
      throw err;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      throw new Error(`[SPC:FileStore] ${path} is not valid JSON`);
    }
    if (!Array.isArray(parsed)) {
      throw new Error(`[SPC:FileStore] ${path} does not hold an array`);
    }
    return parsed;
  }

  private validEntries<T>(items: unknown[], schema: z.ZodType<T>, path: string): T[] {
    const valid: T[] = [];
    items.forEach((item, i) => {
      const result = schema.safeParse(item);
      if (result.success) {
        valid.push(result.data);
      } else {
        console.warn(`[SPC:FileStore] Skipping invalid entry ${i} in ${path}: ${firstIssueMessage(result.error)}`);
      }
    });
    return valid;
  }

  private historyPath(scopeKey: ScopeKey): string {
    return join(this.historyDir, scopeFileName(scopeKey));
  }

  private measurementsPath(scopeKey: ScopeKey): string {
    return join(this.measurementsDir, scopeFileName(scopeKey));
  }

  async loadBaseline(scopeKey: ScopeKey): Promise<Baseline | null> {
    const baselines = this.validEntries(await this.readArray(this.baselinesPath), BaselineSchema, this.baselinesPath);
    return baselines.find((b) => b.scopeKey === scopeKey) ?? null;
  }

  async persistBaseline(scopeKey: ScopeKey, baseline: Baseline): Promise<PersistOutcome> {
    const check = BaselineSchema.safeParse(baseline);
    if (!check.success) {
      throw new Error(`[SPC:FileStore] Refusing to persist invalid baseline: ${firstIssueMessage(check.error)}`);
    }
    if (baseline.scopeKey !== scopeKey) {
      throw new Error(`[SPC:FileStore] Baseline scope ${baseline.scopeKey} does not match ${scopeKey}`);
    }
    return this.exclusive(async () => {
      await this.ensureAllDirs();
      const items = await this.readArray(this.baselinesPath);
      const current = findBaseline(items, scopeKey);
      const currentVersion = current?.baseline.version ?? 0;
      if (baseline.version !== currentVersion + 1) return "stale_version";

      if (current) {
        items[current.index] = check.data;
      } else {
        items.push(check.data);
      }

      const historyPath = this.historyPath(scopeKey);
      const history = await this.readArray(historyPath);
      history.push(check.data);

      await this.writeJson(this.baselinesPath, items);
      await this.writeJson(historyPath, capHistory(history, getBaselineHistoryCap()));
      return "persisted";
    });
  }

  async loadBaselineHistory(scopeKey: ScopeKey, limit: number = getBaselineHistoryCap()): Promise<Baseline[]> {
    const path = this.historyPath(scopeKey);
    const history = this.validEntries(await this.readArray(path), BaselineSchema, path);
    return history
      .filter((b) => b.scopeKey === scopeKey)
      .sort((a, b) => b.version - a.version)
      .slice(0, limit);
  }

  async appendMeasurement(measurement: Measurement): Promise<void> {
    const check = MeasurementSchema.safeParse(measurement);
    if (!check.success) {
      throw new Error(`[SPC:FileStore] Invalid measurement: ${firstIssueMessage(check.error)}`);
    }
    await this.exclusive(async () => {
      await this.ensureAllDirs();
      const path = this.measurementsPath(measurement.scopeKey);
      const items = await this.readArray(path);
      items.push(check.data);
      await this.writeJson(path, items);
    });
  }

  async fetchMeasurements(scopeKey: ScopeKey, window: TimeWindow): Promise<Measurement[]> {
    const path = this.measurementsPath(scopeKey);
    const measurements = this.validEntries(await this.readArray(path), MeasurementSchema, path);
    return selectWindow(
      measurements.filter((m) => m.scopeKey === scopeKey),
      window
    );
  }
}

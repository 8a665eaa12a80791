/**
 * DB-backed storage adapter for SPC baselines and measurements.
 * PostgreSQL via drizzle when PERSISTENCE_DRIVER=db.
 *
 * The version compare-and-swap is a conditional write: insert-if-absent for
 * version 1, otherwise UPDATE ... WHERE version = expected. The history row
 * is appended in the same transaction. Failures are logged and rethrown.
 */

import { and, asc, desc, eq, gte, lte, type SQL } from "drizzle-orm";
import type { Baseline, Measurement, ScopeKey, TimeWindow } from "../types.js";
import type { BaselineStore, MeasurementStore, PersistOutcome } from "./types.js";
import { BaselineSchema, MeasurementSchema, TimeWindowSchema, firstIssueMessage } from "../schemas.js";
import { getBaselineHistoryCap } from "../config.js";
import { getDb } from "../../db/index.js";
import { spcBaselineHistory, spcBaselines, spcMeasurements } from "../../db/schema.js";

type BaselineRow = typeof spcBaselines.$inferSelect;

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function rowToBaseline(row: BaselineRow): Baseline | null {
  const candidate: Record<string, unknown> = {
    scopeKey: row.scopeKey,
    mean: row.mean,
    sigma: row.sigma,
    sampleCount: row.sampleCount,
    version: row.version,
    committedAtISO: row.committedAt.toISOString(),
  };
  if (row.window != null) {
    const window = TimeWindowSchema.safeParse(row.window);
    if (window.success) candidate.window = window.data;
  }
  const result = BaselineSchema.safeParse(candidate);
  if (!result.success) {
    console.warn(`[SPC:DbStore] Invalid baseline row scope=${row.scopeKey}: ${firstIssueMessage(result.error)}`);
    return null;
  }
  return result.data;
}

export class DbStorageAdapter implements BaselineStore, MeasurementStore {
  async loadBaseline(scopeKey: ScopeKey): Promise<Baseline | null> {
    try {
      const db = getDb();
      const rows = await db.select().from(spcBaselines).where(eq(spcBaselines.scopeKey, scopeKey));
      if (rows.length === 0) return null;
      return rowToBaseline(rows[0]);
    } catch (err) {
      console.warn("[SPC:DbStore] loadBaseline failed:", errorMessage(err));
      throw err;
    }
  }

  async persistBaseline(scopeKey: ScopeKey, baseline: Baseline): Promise<PersistOutcome> {
    const check = BaselineSchema.safeParse(baseline);
    if (!check.success) {
      throw new Error(`[SPC:DbStore] Refusing to persist invalid baseline: ${firstIssueMessage(check.error)}`);
    }
    if (baseline.scopeKey !== scopeKey) {
      throw new Error(`[SPC:DbStore] Baseline scope ${baseline.scopeKey} does not match ${scopeKey}`);
    }
    const committedAt = new Date(baseline.committedAtISO);
    const fields = {
      mean: baseline.mean,
      sigma: baseline.sigma,
      sampleCount: baseline.sampleCount,
      version: baseline.version,
      committedAt,
      window: baseline.window ?? null,
    };
    const cap = getBaselineHistoryCap();

    try {
      const db = getDb();
      return await db.transaction(async (tx): Promise<PersistOutcome> => {
        const written =
          baseline.version === 1
            ? await tx
                .insert(spcBaselines)
                .values({ scopeKey, ...fields })
                .onConflictDoNothing({ target: spcBaselines.scopeKey })
                .returning({ version: spcBaselines.version })
            : await tx
                .update(spcBaselines)
                .set(fields)
                .where(and(eq(spcBaselines.scopeKey, scopeKey), eq(spcBaselines.version, baseline.version - 1)))
                .returning({ version: spcBaselines.version });
        if (written.length === 0) return "stale_version";

        await tx.insert(spcBaselineHistory).values({
          scopeKey,
          version: baseline.version,
          payload: baseline,
          committedAt,
        });
        // versions are consecutive per scope, so the cap is a version cutoff
        await tx
          .delete(spcBaselineHistory)
          .where(and(eq(spcBaselineHistory.scopeKey, scopeKey), lte(spcBaselineHistory.version, baseline.version - cap)));
        return "persisted";
      });
    } catch (err) {
      console.warn("[SPC:DbStore] persistBaseline failed:", errorMessage(err));
      throw err;
    }
  }

  async loadBaselineHistory(scopeKey: ScopeKey, limit: number = getBaselineHistoryCap()): Promise<Baseline[]> {
    try {
      const db = getDb();
      const rows = await db
        .select({ payload: spcBaselineHistory.payload })
        .from(spcBaselineHistory)
        .where(eq(spcBaselineHistory.scopeKey, scopeKey))
        .orderBy(desc(spcBaselineHistory.version))
        .limit(limit);
      const valid: Baseline[] = [];
      for (const row of rows) {
        const result = BaselineSchema.safeParse(row.payload);
        if (result.success) {
          valid.push(result.data);
        } else {
          console.warn(`[SPC:DbStore] Skipping invalid history row scope=${scopeKey}: ${firstIssueMessage(result.error)}`);
        }
      }
      return valid;
    } catch (err) {
      console.warn("[SPC:DbStore] loadBaselineHistory failed:", errorMessage(err));
      throw err;
    }
  }

  async appendMeasurement(measurement: Measurement): Promise<void> {
    const check = MeasurementSchema.safeParse(measurement);
    if (!check.success) {
      throw new Error(`[SPC:DbStore] Invalid measurement: ${firstIssueMessage(check.error)}`);
    }
    try {
      const db = getDb();
      await db.insert(spcMeasurements).values({
        scopeKey: measurement.scopeKey,
        value: measurement.value,
        ts: new Date(measurement.timestampISO),
      });
    } catch (err) {
      console.warn("[SPC:DbStore] appendMeasurement failed:", errorMessage(err));
      throw err;
    }
  }

  async fetchMeasurements(scopeKey: ScopeKey, window: TimeWindow): Promise<Measurement[]> {
    const conditions: SQL[] = [eq(spcMeasurements.scopeKey, scopeKey)];
    if (window.fromISO != null) conditions.push(gte(spcMeasurements.ts, new Date(window.fromISO)));
    if (window.toISO != null) conditions.push(lte(spcMeasurements.ts, new Date(window.toISO)));
    try {
      const db = getDb();
      const rows = await db
        .select()
        .from(spcMeasurements)
        .where(and(...conditions))
        .orderBy(asc(spcMeasurements.ts), asc(spcMeasurements.id));
      return rows.map((r) => ({
        scopeKey: r.scopeKey,
        value: r.value,
        timestampISO: r.ts.toISOString(),
      }));
    } catch (err) {
      console.warn("[SPC:DbStore] fetchMeasurements failed:", errorMessage(err));
      throw err;
    }
  }
}

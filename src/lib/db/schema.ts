/**
 * Drizzle schema for SPC persistence.
 * spc_baselines holds the current baseline per scope; history rows are append-only.
 */

import { pgTable, text, timestamp, jsonb, serial, integer, doublePrecision, index, uniqueIndex } from "drizzle-orm/pg-core";

/** Current baseline per scope. version is the compare-and-swap token. */
export const spcBaselines = pgTable("spc_baselines", {
  scopeKey: text("scope_key").primaryKey(),
  mean: doublePrecision("mean").notNull(),
  sigma: doublePrecision("sigma").notNull(),
  sampleCount: integer("sample_count").notNull(),
  version: integer("version").notNull(),
  committedAt: timestamp("committed_at", { withTimezone: true }).notNull(),
  window: jsonb("window"),
});

/** Every committed baseline, including superseded ones. */
export const spcBaselineHistory = pgTable(
  "spc_baseline_history",
  {
    id: serial("id").primaryKey(),
    scopeKey: text("scope_key").notNull(),
    version: integer("version").notNull(),
    payload: jsonb("payload").notNull(),
    committedAt: timestamp("committed_at", { withTimezone: true }).notNull(),
  },
  (t) => ({
    scopeVersion: uniqueIndex("spc_baseline_history_scope_version").on(t.scopeKey, t.version),
  })
);

/** Recorded measurements. */
export const spcMeasurements = pgTable(
  "spc_measurements",
  {
    id: serial("id").primaryKey(),
    scopeKey: text("scope_key").notNull(),
    value: doublePrecision("value").notNull(),
    ts: timestamp("ts", { withTimezone: true }).notNull(),
  },
  (t) => ({
    scopeTs: index("spc_measurements_scope_ts").on(t.scopeKey, t.ts),
  })
);

/**
 * Creates and updates the SPC tables in PostgreSQL: spc_baselines (current
 * baseline per scope, version as the compare-and-swap token),
 * spc_baseline_history and spc_measurements.
 *
 * Applies the SQL files in drizzle/ in name order, each once and in its own
 * transaction; applied names are recorded in _migrations.
 * Usage: DATABASE_URL=postgresql://... npm run db:migrate
 */

import { readFile, readdir } from "fs/promises";
import { join } from "path";
import pg from "pg";
import { pendingMigrations } from "./migrations.js";

const url = process.env.DATABASE_URL;

const MIGRATIONS_DIR = join(process.cwd(), "drizzle");

async function main(connectionString: string): Promise<void> {
  const client = new pg.Client({ connectionString });
  await client.connect();
  try {
    await client.query(`
      CREATE TABLE IF NOT EXISTS "_migrations" (
        "name" text PRIMARY KEY,
        "applied_at" timestamp with time zone NOT NULL DEFAULT now()
      )
    `);
    const { rows } = await client.query<{ name: string }>("SELECT name FROM _migrations");
    const applied = new Set(rows.map((r) => r.name));
    const pending = pendingMigrations(await readdir(MIGRATIONS_DIR), applied);
    if (pending.length === 0) {
      console.log("[migrate] SPC schema is up to date.");
      return;
    }
    for (const f of pending) {
      const sql = await readFile(join(MIGRATIONS_DIR, f), "utf-8");
      await client.query("BEGIN");
      try {
        await client.query(sql);
        await client.query("INSERT INTO _migrations (name) VALUES ($1)", [f]);
        await client.query("COMMIT");
      } catch (err) {
        await client.query("ROLLBACK");
        throw err;
      }
      console.log(`[migrate] ${f} applied.`);
    }
    console.log(`[migrate] ${pending.length} migration(s) applied.`);
  } finally {
    await client.end();
  }
}

if (!url) {
  console.error("[migrate] DATABASE_URL is required");
  process.exit(1);
} else {
  main(url).catch((err) => {
    console.error("[migrate] failed:", err);
    process.exit(1);
  });
}

/**
 * Migration bookkeeping for drizzle/*.sql: which files exist, in which order,
 * and which are still to be applied.
 */

/** SQL files in apply order (by name: 0000_, 0001_, ...). */
export function migrationFiles(entries: readonly string[]): string[] {
  return entries.filter((f) => f.endsWith(".sql")).sort();
}

/** Files not yet recorded in _migrations, in apply order. */
export function pendingMigrations(files: readonly string[], applied: ReadonlySet<string>): string[] {
  return migrationFiles(files).filter((f) => !applied.has(f));
}

/**
 * Persistence driver: db | file.
 * PERSISTENCE_DRIVER=db stores baselines and measurements in PostgreSQL; default is the file store.
 */

export type PersistenceDriver = "db" | "file";

export function getPersistenceDriver(): PersistenceDriver {
  const v = process.env.PERSISTENCE_DRIVER?.trim().toLowerCase();
  if (v === "db") return "db";
  return "file";
}

/**
 * Storage selection by PERSISTENCE_DRIVER.
 */

import { getPersistenceDriver } from "../../persistence/driver.js";
import { DbStorageAdapter } from "./dbStorage.js";
import { FileStorageAdapter } from "./fileStorage.js";
import type { BaselineStore, MeasurementStore } from "./types.js";

export type SpcStorage = BaselineStore & MeasurementStore;

export function createStorageAdapter(dataDir?: string): SpcStorage {
  if (getPersistenceDriver() === "db") return new DbStorageAdapter();
  return new FileStorageAdapter(dataDir);
}

export { DbStorageAdapter, FileStorageAdapter };
export type { BaselineStore, MeasurementSource, MeasurementStore, PersistOutcome } from "./types.js";

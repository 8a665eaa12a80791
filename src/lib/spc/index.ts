/**
 * SPC engine: public API.
 */

import { BaselineManager, type BaselineManagerOptions } from "./baseline/baselineManager.js";
import { createStorageAdapter } from "./storage/index.js";

export { computeBaseline } from "./statistics/statisticsCalculator.js";
export { deriveLimits } from "./limits/controlLimitDeriver.js";
export {
  classifySeries,
  classifyPoint,
  iterateClassified,
  deviationSigmas,
} from "./classification/outlierClassifier.js";
export { summarizeClassification } from "./classification/runSummary.js";
export { BaselineManager } from "./baseline/baselineManager.js";
export type { BaselineManagerOptions, EvaluateOptions } from "./baseline/baselineManager.js";
export { makeScopeKey, parseScopeKey } from "./scope.js";
export { ok, fail } from "./errors.js";
export type { SpcError, SpcErrorCode, SpcFailure, SpcResult } from "./errors.js";
export {
  createStorageAdapter,
  DbStorageAdapter,
  FileStorageAdapter,
} from "./storage/index.js";
export type {
  BaselineStore,
  MeasurementSource,
  MeasurementStore,
  PersistOutcome,
  SpcStorage,
} from "./storage/index.js";
export * from "./types.js";

/**
 * A manager over the configured store (PERSISTENCE_DRIVER). Each call builds
 * a new manager; callers that need one shared instance hold on to it.
 */
export function createBaselineManager(
  options?: BaselineManagerOptions & { dataDir?: string }
): BaselineManager {
  const storage = createStorageAdapter(options?.dataDir);
  return new BaselineManager(storage, storage, options);
}

/**
 * Baseline lifecycle per scope: NO_BASELINE -> RECALCULATING -> STABLE.
 *
 * Recalculation computes a private candidate; the committed baseline stays
 * authoritative and readable while candidates exist. Commit is optimistic:
 * the candidate records the version it was computed against and the store's
 * compare-and-swap rejects it once another commit has landed. Retrying a
 * STALE_BASELINE is the caller's decision.
 *
 * Concurrent requests for the same scope and window share one computation
 * and receive the same candidate; each receiver counts as a holder of it.
 * Requests for different windows run independently; scopes share no state
 * beyond the maps below, which are keyed by scope.
 */

import { randomUUID } from "crypto";
import { debugLog } from "../../../utils/debug.js";
import { fail, ok, type SpcResult } from "../errors.js";
import { BaselineSchema, TimeWindowSchema, firstIssueMessage } from "../schemas.js";
import { computeBaseline } from "../statistics/statisticsCalculator.js";
import { deriveLimits } from "../limits/controlLimitDeriver.js";
import { classifySeries } from "../classification/outlierClassifier.js";
import { summarizeClassification } from "../classification/runSummary.js";
import type { BaselineStore, MeasurementSource } from "../storage/types.js";
import type {
  Baseline,
  BaselineState,
  Candidate,
  DeriveLimitsOptions,
  ScopeEvaluation,
  ScopeKey,
  TimeWindow,
} from "../types.js";

export interface BaselineManagerOptions {
  now?: () => Date;
  newId?: () => string;
}

export interface EvaluateOptions extends DeriveLimitsOptions {
  shiftRunLength?: number;
}

function windowKey(window: TimeWindow): string {
  return `${window.fromISO ?? ""}..${window.toISO ?? ""}`;
}

export class BaselineManager {
  private readonly now: () => Date;
  private readonly newId: () => string;
  /** Issued candidates not yet committed or found stale, with their holder count. */
  private readonly pending = new Map<ScopeKey, Map<string, number>>();
  private readonly inFlight = new Map<ScopeKey, Map<string, Promise<SpcResult<Candidate>>>>();

  constructor(
    private readonly store: BaselineStore,
    private readonly source: MeasurementSource,
    options: BaselineManagerOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
    this.newId = options.newId ?? (() => randomUUID());
  }

  async getBaseline(scopeKey: ScopeKey): Promise<SpcResult<Baseline>> {
    const baseline = await this.store.loadBaseline(scopeKey);
    if (!baseline) return fail("NOT_FOUND", `No baseline for scope ${scopeKey}`);
    return ok(baseline);
  }

  async getBaselineHistory(scopeKey: ScopeKey, limit?: number): Promise<Baseline[]> {
    return this.store.loadBaselineHistory(scopeKey, limit);
  }

  isRecalculating(scopeKey: ScopeKey): boolean {
    return (this.pending.get(scopeKey)?.size ?? 0) > 0 || (this.inFlight.get(scopeKey)?.size ?? 0) > 0;
  }

  /**
   * RECALCULATING while a request is in flight or any issued candidate is
   * still held. A candidate is held until it is committed, found stale, or
   * discarded by every caller that received it; one that is never settled
   * keeps its scope RECALCULATING for the life of this manager.
   */
  async getState(scopeKey: ScopeKey): Promise<BaselineState> {
    if (this.isRecalculating(scopeKey)) return "RECALCULATING";
    const baseline = await this.store.loadBaseline(scopeKey);
    return baseline ? "STABLE" : "NO_BASELINE";
  }

  requestRecalculation(scopeKey: ScopeKey, window: TimeWindow = {}): Promise<SpcResult<Candidate>> {
    const parsed = TimeWindowSchema.safeParse(window);
    if (!parsed.success) {
      return Promise.resolve(fail("INVALID_PARAMETER", `Invalid window: ${firstIssueMessage(parsed.error)}`));
    }
    const key = windowKey(parsed.data);
    let byWindow = this.inFlight.get(scopeKey);
    const existing = byWindow?.get(key);
    if (existing) {
      debugLog(`[SPC] Joining in-flight recalculation scope=${scopeKey} window=${key}`);
      return existing.then((result) => {
        // a candidate already committed or found stale is not re-pended
        if (result.success && this.pending.get(scopeKey)?.has(result.data.id)) {
          this.retain(scopeKey, result.data.id);
        }
        return result;
      });
    }
    if (!byWindow) {
      byWindow = new Map();
      this.inFlight.set(scopeKey, byWindow);
    }
    const scopeRuns = byWindow;
    const run = this.recalculate(scopeKey, parsed.data).finally(() => {
      scopeRuns.delete(key);
      if (scopeRuns.size === 0 && this.inFlight.get(scopeKey) === scopeRuns) {
        this.inFlight.delete(scopeKey);
      }
    });
    scopeRuns.set(key, run);
    return run;
  }

  private async recalculate(scopeKey: ScopeKey, window: TimeWindow): Promise<SpcResult<Candidate>> {
    const current = await this.store.loadBaseline(scopeKey);
    const basedOnVersion = current?.version ?? 0;
    const sample = await this.source.fetchMeasurements(scopeKey, window);
    const stats = computeBaseline(sample);
    if (!stats.success) {
      debugLog(`[SPC] Recalculation rejected scope=${scopeKey}: ${stats.error.code}`);
      return stats;
    }
    const candidate: Candidate = {
      id: this.newId(),
      scopeKey,
      mean: stats.data.mean,
      sigma: stats.data.sigma,
      count: stats.data.count,
      basedOnVersion,
      window,
      requestedAtISO: this.now().toISOString(),
    };
    this.retain(scopeKey, candidate.id);
    debugLog(
      `[SPC] Candidate ${candidate.id} scope=${scopeKey} n=${candidate.count} basedOn=v${basedOnVersion}`
    );
    return ok(candidate);
  }

  private retain(scopeKey: ScopeKey, candidateId: string): void {
    let holders = this.pending.get(scopeKey);
    if (!holders) {
      holders = new Map();
      this.pending.set(scopeKey, holders);
    }
    holders.set(candidateId, (holders.get(candidateId) ?? 0) + 1);
  }

  /** Drops one holder, or every holder when `all` is set. */
  private release(scopeKey: ScopeKey, candidateId: string, all: boolean): void {
    const holders = this.pending.get(scopeKey);
    const count = holders?.get(candidateId);
    if (!holders || count === undefined) return;
    if (all || count <= 1) {
      holders.delete(candidateId);
    } else {
      holders.set(candidateId, count - 1);
    }
    if (holders.size === 0) this.pending.delete(scopeKey);
  }

  async commitBaseline(scopeKey: ScopeKey, candidate: Candidate): Promise<SpcResult<Baseline>> {
    if (candidate.scopeKey !== scopeKey) {
      return fail("INVALID_PARAMETER", `Candidate belongs to scope ${candidate.scopeKey}, not ${scopeKey}`);
    }
    const next: Baseline = {
      scopeKey,
      mean: candidate.mean,
      sigma: candidate.sigma,
      sampleCount: candidate.count,
      version: candidate.basedOnVersion + 1,
      committedAtISO: this.now().toISOString(),
      window: candidate.window,
    };
    const check = BaselineSchema.safeParse(next);
    if (!check.success) {
      return fail("INVALID_PARAMETER", `Invalid candidate: ${firstIssueMessage(check.error)}`);
    }

    try {
      const current = await this.store.loadBaseline(scopeKey);
      const currentVersion = current?.version ?? 0;
      if (currentVersion !== candidate.basedOnVersion) {
        return this.stale(scopeKey, candidate, currentVersion);
      }
      const outcome = await this.store.persistBaseline(scopeKey, next);
      if (outcome === "stale_version") {
        const latest = await this.store.loadBaseline(scopeKey);
        return this.stale(scopeKey, candidate, latest?.version ?? 0);
      }
      debugLog(`[SPC] Committed scope=${scopeKey} v${next.version} from candidate ${candidate.id}`);
      return ok(next);
    } finally {
      // committed or stale, the candidate is spent for every holder
      this.release(scopeKey, candidate.id, true);
    }
  }

  private stale(scopeKey: ScopeKey, candidate: Candidate, currentVersion: number): SpcResult<Baseline> {
    debugLog(`[SPC] Stale commit scope=${scopeKey} candidate=${candidate.id}`);
    return fail(
      "STALE_BASELINE",
      `Scope ${scopeKey} is at version ${currentVersion}; candidate was based on version ${candidate.basedOnVersion}`
    );
  }

  /**
   * Gives up the caller's hold on a candidate. Other holders of a coalesced
   * candidate keep it pending. Unknown or already-settled candidates are ignored.
   */
  discard(scopeKey: ScopeKey, candidate: Candidate): void {
    this.release(scopeKey, candidate.id, false);
    debugLog(`[SPC] Discarded candidate ${candidate.id} scope=${scopeKey}`);
  }

  /**
   * Classify the series in `window` against the committed baseline. Limits
   * are derived fresh for this call.
   */
  async evaluateScope(
    scopeKey: ScopeKey,
    window: TimeWindow = {},
    options: EvaluateOptions = {}
  ): Promise<SpcResult<ScopeEvaluation>> {
    const parsed = TimeWindowSchema.safeParse(window);
    if (!parsed.success) {
      return fail("INVALID_PARAMETER", `Invalid window: ${firstIssueMessage(parsed.error)}`);
    }
    const baseline = await this.getBaseline(scopeKey);
    if (!baseline.success) return baseline;

    const { shiftRunLength, ...limitOptions } = options;
    const limits = deriveLimits(baseline.data, limitOptions);
    if (!limits.success) return limits;

    const series = await this.source.fetchMeasurements(scopeKey, parsed.data);
    const points = classifySeries(series, limits.data);
    return ok({
      baseline: baseline.data,
      limits: limits.data,
      points,
      summary: summarizeClassification(points, { shiftRunLength }),
    });
  }
}

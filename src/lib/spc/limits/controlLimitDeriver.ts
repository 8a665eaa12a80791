/**
 * Control limits from a baseline: center ± k·sigma, plus an optional warning band.
 */

import { fail, ok, type SpcResult } from "../errors.js";
import { getSigmaMultiplier, getWarningMultiplier, isWarningZoneEnabled } from "../config.js";
import { DeriveLimitsOptionsSchema, firstIssueMessage } from "../schemas.js";
import type { BaselineStats, ControlLimits, DeriveLimitsOptions } from "../types.js";

function resolveOptions(options?: DeriveLimitsOptions): {
  sigmaMultiplier: number;
  warningMultiplier: number | null;
} {
  const sigmaMultiplier = options?.sigmaMultiplier ?? getSigmaMultiplier();
  let warningMultiplier: number | null;
  if (options?.warningMultiplier !== undefined) {
    warningMultiplier = options.warningMultiplier;
  } else {
    warningMultiplier = isWarningZoneEnabled() ? getWarningMultiplier() : null;
  }
  return { sigmaMultiplier, warningMultiplier };
}

/**
 * Derive limits for one evaluation. Limits are never cached; a baseline may be
 * superseded between calls. sigma = 0 collapses every bound onto the mean.
 */
export function deriveLimits(
  baseline: BaselineStats,
  options?: DeriveLimitsOptions
): SpcResult<ControlLimits> {
  if (!Number.isFinite(baseline.mean)) {
    return fail("INVALID_PARAMETER", "Baseline mean must be finite");
  }
  if (!Number.isFinite(baseline.sigma) || baseline.sigma < 0) {
    return fail("INVALID_PARAMETER", "Baseline sigma must be a finite number >= 0");
  }

  const parsed = DeriveLimitsOptionsSchema.safeParse(resolveOptions(options));
  if (!parsed.success) {
    return fail("INVALID_PARAMETER", firstIssueMessage(parsed.error));
  }
  const { sigmaMultiplier, warningMultiplier } = parsed.data;

  const { mean, sigma } = baseline;
  const ucl = mean + sigmaMultiplier * sigma;
  const lcl = mean - sigmaMultiplier * sigma;
  const warningUpper = warningMultiplier == null ? ucl : mean + warningMultiplier * sigma;
  const warningLower = warningMultiplier == null ? lcl : mean - warningMultiplier * sigma;

  return ok({
    center: mean,
    ucl,
    lcl,
    warningUpper,
    warningLower,
    sigmaMultiplier,
    warningMultiplier,
  });
}

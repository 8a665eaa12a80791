import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { classifySeries } from "../classification/outlierClassifier.js";
import { summarizeClassification } from "../classification/runSummary.js";
import type { ControlLimits } from "../types.js";
import { SCOPE_A, isolateSpcEnv, series } from "./fixtures.js";

const LIMITS: ControlLimits = {
  center: 100,
  ucl: 106,
  lcl: 94,
  warningUpper: 104,
  warningLower: 96,
  sigmaMultiplier: 3,
  warningMultiplier: 2,
};

function summarize(values: number[], shiftRunLength?: number) {
  return summarizeClassification(classifySeries(series(SCOPE_A, values), LIMITS), { shiftRunLength });
}

describe("summarizeClassification", () => {
  let restoreEnv: () => void;

  beforeEach(() => {
    restoreEnv = isolateSpcEnv();
  });

  afterEach(() => {
    restoreEnv();
  });

  it("empty input", () => {
    const summary = summarize([]);
    expect(summary).toEqual({
      total: 0,
      counts: { IN_CONTROL: 0, WARNING_HIGH: 0, WARNING_LOW: 0, OUT_HIGH: 0, OUT_LOW: 0 },
      outOfControl: 0,
      warning: 0,
      inControlFraction: null,
      firstOutOfControlIndex: null,
      longestRunAboveCenter: 0,
      longestRunBelowCenter: 0,
      longestOutOfControlRun: 0,
      shiftDetected: false,
    });
  });

  it("counts statuses and runs", () => {
    const summary = summarize([100.5, 107, 108, 99, 93, 105, 100]);
    expect(summary.total).toBe(7);
    expect(summary.counts).toEqual({
      IN_CONTROL: 3,
      WARNING_HIGH: 1,
      WARNING_LOW: 0,
      OUT_HIGH: 2,
      OUT_LOW: 1,
    });
    expect(summary.outOfControl).toBe(3);
    expect(summary.warning).toBe(1);
    expect(summary.inControlFraction).toBe(3 / 7);
    expect(summary.firstOutOfControlIndex).toBe(1);
    expect(summary.longestOutOfControlRun).toBe(2);
    expect(summary.longestRunAboveCenter).toBe(3);
    expect(summary.longestRunBelowCenter).toBe(2);
    expect(summary.shiftDetected).toBe(false);
  });

  it("a point on the center breaks both runs", () => {
    const summary = summarize([101, 101, 100, 101, 99, 100, 99]);
    expect(summary.longestRunAboveCenter).toBe(2);
    expect(summary.longestRunBelowCenter).toBe(1);
  });

  it("nine in a row on one side => shiftDetected", () => {
    const summary = summarize(new Array<number>(9).fill(101));
    expect(summary.longestRunAboveCenter).toBe(9);
    expect(summary.shiftDetected).toBe(true);
    expect(summary.outOfControl).toBe(0);
  });

  it("shiftRunLength option overrides the default", () => {
    expect(summarize(new Array<number>(9).fill(99), 10).shiftDetected).toBe(false);
    expect(summarize(new Array<number>(4).fill(99), 4).shiftDetected).toBe(true);
  });

  it("reads the default run length from SPC_SHIFT_RUN_LENGTH", () => {
    process.env.SPC_SHIFT_RUN_LENGTH = "5";
    expect(summarize([99, 99, 99, 99, 99]).shiftDetected).toBe(true);
  });
});

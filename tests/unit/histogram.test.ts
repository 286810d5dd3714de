import { describe, expect, it } from "vitest";

import {
  buildSkewHistogram,
  buildSlackHistogram,
  SKEW_BINS,
  skewBinIndex,
  SLACK_BINS,
  slackBinIndex,
} from "../../src/report/histogram.js";
import { NEGATIVE_ZERO_SLACK } from "../../src/report/slack.js";
import type { PathRecord } from "../../src/types/timing.js";

function path(slack: number, startClkDelay?: number, endClkDelay?: number): PathRecord {
  return {
    startInst: "a/reg",
    endInst: "b/reg",
    startClk: "CLK",
    endClk: "CLK",
    pathGroup: "CLK",
    slack,
    startClkDelay,
    endClkDelay,
  };
}

describe("slack bins", () => {
  it("has 31 bounded bins and a final open-ended bin", () => {
    expect(SLACK_BINS).toHaveLength(32);
    expect(SLACK_BINS[0].label).toBe(" -0.000ns < -0.002ns");
    expect(SLACK_BINS[5].label).toBe(" -0.010ns < -0.015ns");
    expect(SLACK_BINS[30].label).toBe(" -2.000ns < -5.000ns");
    expect(SLACK_BINS[31].label).toBe(" -5.000ns <");
  });

  it("puts values in (lower, upper]", () => {
    expect(slackBinIndex(-0.0009)).toBe(0);
    expect(slackBinIndex(NEGATIVE_ZERO_SLACK)).toBe(0);
    expect(slackBinIndex(-0.002)).toBe(1);
    expect(slackBinIndex(-0.0021)).toBe(1);
    expect(SLACK_BINS[slackBinIndex(-0.01)].label).toBe(" -0.010ns < -0.015ns");
    expect(SLACK_BINS[slackBinIndex(-0.25)].label).toBe(" -0.200ns < -0.300ns");
    expect(SLACK_BINS[slackBinIndex(-4.99)].label).toBe(" -2.000ns < -5.000ns");
  });

  it("catches everything at or below -5.0 in the last bin", () => {
    expect(slackBinIndex(-5.0)).toBe(31);
    expect(slackBinIndex(-12.5)).toBe(31);
  });

  it("does not bin positive slack", () => {
    expect(slackBinIndex(0.001)).toBe(-1);
  });
});

describe("skew bins", () => {
  it("has 14 bins from < -5.0 to >= +5.0", () => {
    expect(SKEW_BINS).toHaveLength(14);
    expect(SKEW_BINS[0].label).toBe("        < -5.0ns");
    expect(SKEW_BINS[6].label).toBe(" -0.1ns <  0.0ns");
    expect(SKEW_BINS[13].label).toBe(" +5.0ns <");
  });

  it("puts values in [lower, upper)", () => {
    expect(skewBinIndex(-5.01)).toBe(0);
    expect(skewBinIndex(-5.0)).toBe(1);
    expect(skewBinIndex(-0.05)).toBe(6);
    expect(skewBinIndex(0)).toBe(7);
    expect(skewBinIndex(0.02)).toBe(7);
    expect(skewBinIndex(0.1)).toBe(8);
    expect(skewBinIndex(4.999)).toBe(12);
    expect(skewBinIndex(5.0)).toBe(13);
    expect(skewBinIndex(40)).toBe(13);
  });
});

describe("histograms", () => {
  const slacks = [-0.0001, -0.003, -0.003, -0.012, -0.099, -0.15, -0.45, -0.9, -3.2, -5.0, -8.1, 0.2, 0];
  const paths = slacks.map((slack) => path(slack));

  it("counts every violation exactly once", () => {
    const histogram = buildSlackHistogram(paths);
    const total = histogram.reduce((sum, bin) => sum + bin.count, 0);

    expect(total).toBe(slacks.filter((slack) => slack < 0).length);
    expect(histogram[0].count).toBe(1);
    expect(histogram[1].count).toBe(2);
    expect(histogram[31].count).toBe(2);
  });

  it("ignores met paths", () => {
    const histogram = buildSlackHistogram([path(0.5), path(0)]);
    expect(histogram.every((bin) => bin.count === 0)).toBe(true);
  });

  it("bins skew of violations and skips undefined skew", () => {
    const histogram = buildSkewHistogram([
      path(-0.01, 0.5, 0.52),
      path(-0.25, 0.5, 0.45),
      path(-0.3, 0.5),
      path(-0.3),
      path(0.1, 0.5, 9.0),
    ]);

    expect(histogram.reduce((sum, bin) => sum + bin.count, 0)).toBe(2);
    expect(histogram[6].count).toBe(1);
    expect(histogram[7].count).toBe(1);
  });
});

/**
 * Negative-Slack Classifier
 *
 * Slack and clock-skew histograms over violating paths.
 */

import { pathSkew, type HistogramBin, type HistogramCount, type PathRecord } from "../types/timing.js";

// Descending edges: fine steps near zero, widening past -0.1 and -0.2
const SLACK_EDGES = [
  -0.0, -0.002, -0.004, -0.006, -0.008, -0.01, -0.015, -0.02, -0.03, -0.04, -0.05, -0.06,
  -0.07, -0.08, -0.09, -0.1, -0.11, -0.12, -0.13, -0.14, -0.15, -0.16, -0.17, -0.18,
  -0.19, -0.2, -0.3, -0.4, -0.5, -1.0, -2.0, -5.0,
] as const;

function formatEdge(value: number): string {
  return `-${Math.abs(value).toFixed(3)}`;
}

/**
 * Slack bins, most benign first. Each bin holds `lower < slack <= upper`;
 * the last one holds everything at or below -5.0.
 */
export const SLACK_BINS: readonly HistogramBin[] = Object.freeze([
  ...SLACK_EDGES.slice(0, -1).map((upper, i) => {
    const lower = SLACK_EDGES[i + 1];
    return { label: ` ${formatEdge(upper)}ns < ${formatEdge(lower)}ns`, lower, upper };
  }),
  { label: ` ${formatEdge(-5.0)}ns <`, upper: -5.0 },
]);

/**
 * Skew bins, ascending, each holding `lower <= skew < upper`
 */
export const SKEW_BINS: readonly HistogramBin[] = Object.freeze([
  { label: "        < -5.0ns", upper: -5.0 },
  { label: " -5.0ns < -2.0ns", lower: -5.0, upper: -2.0 },
  { label: " -2.0ns < -1.0ns", lower: -2.0, upper: -1.0 },
  { label: " -1.0ns < -0.5ns", lower: -1.0, upper: -0.5 },
  { label: " -0.5ns < -0.2ns", lower: -0.5, upper: -0.2 },
  { label: " -0.2ns < -0.1ns", lower: -0.2, upper: -0.1 },
  { label: " -0.1ns <  0.0ns", lower: -0.1, upper: 0.0 },
  { label: "  0.0ns < +0.1ns", lower: 0.0, upper: 0.1 },
  { label: " +0.1ns < +0.2ns", lower: 0.1, upper: 0.2 },
  { label: " +0.2ns < +0.5ns", lower: 0.2, upper: 0.5 },
  { label: " +0.5ns < +1.0ns", lower: 0.5, upper: 1.0 },
  { label: " +1.0ns < +2.0ns", lower: 1.0, upper: 2.0 },
  { label: " +2.0ns < +5.0ns", lower: 2.0, upper: 5.0 },
  { label: " +5.0ns <", lower: 5.0 },
]);

/**
 * Index of the slack bin holding `slack`, or -1 for positive values
 */
export function slackBinIndex(slack: number): number {
  return SLACK_BINS.findIndex(({ lower, upper }) => {
    if (upper === undefined) return false;
    if (lower === undefined) return slack <= upper;
    return slack <= upper && slack > lower;
  });
}

/**
 * Index of the skew bin holding `skew`
 */
export function skewBinIndex(skew: number): number {
  return SKEW_BINS.findIndex(({ lower, upper }) => {
    if (lower === undefined) return upper !== undefined && skew < upper;
    if (upper === undefined) return skew >= lower;
    return skew >= lower && skew < upper;
  });
}

function countBins(
  bins: readonly HistogramBin[],
  indexes: Iterable<number>
): HistogramCount[] {
  const counts = bins.map((bin) => ({ ...bin, count: 0 }));
  for (const index of indexes) {
    if (index >= 0) counts[index].count++;
  }
  return counts;
}

function* slackIndexes(paths: Iterable<PathRecord>): Generator<number> {
  for (const path of paths) {
    if (path.slack !== undefined && path.slack < 0) yield slackBinIndex(path.slack);
  }
}

function* skewIndexes(paths: Iterable<PathRecord>): Generator<number> {
  for (const path of paths) {
    if (path.slack === undefined || path.slack >= 0) continue;
    const skew = pathSkew(path);
    if (skew !== undefined) yield skewBinIndex(skew);
  }
}

/**
 * Slack histogram over the violating paths
 */
export function buildSlackHistogram(paths: Iterable<PathRecord>): HistogramCount[] {
  return countBins(SLACK_BINS, slackIndexes(paths));
}

/**
 * Skew histogram over the violating paths; paths without a skew are left out
 */
export function buildSkewHistogram(paths: Iterable<PathRecord>): HistogramCount[] {
  return countBins(SKEW_BINS, skewIndexes(paths));
}

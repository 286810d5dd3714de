/**
 * Aggregator
 *
 * Group-by reductions over violating paths: per path group, clock pair,
 * block pair and stage count, plus the grand total (WNS/TNS).
 */

import type { AggregateBucket, BlockMapRule, CompletedPath, PathRecord } from "../types/timing.js";
import { resolveBlock } from "./block-map.js";

export type PairKey = readonly [string, string];

export interface KeyedBucket<K> extends AggregateBucket {
  key: K;
}

/**
 * All grouped summaries of one violation set
 */
export interface ViolationAggregates {
  total: AggregateBucket;
  byPathGroup: KeyedBucket<string>[];
  byClockPair: KeyedBucket<PairKey>[];
  byBlockPair: KeyedBucket<PairKey>[];
  byStageCount: KeyedBucket<number>[];
}

/**
 * Paths with negative slack, in input order
 */
export function negativeSlackPaths(paths: Iterable<PathRecord>): CompletedPath[] {
  const out: CompletedPath[] = [];
  for (const path of paths) {
    const slack = path.slack;
    if (slack !== undefined && slack < 0) out.push({ ...path, slack });
  }
  return out;
}

/**
 * Fold one slack into a bucket
 */
export function addToBucket(bucket: AggregateBucket | undefined, slack: number): AggregateBucket {
  if (!bucket) return { count: 1, worst: slack, total: slack };
  return {
    count: bucket.count + 1,
    worst: Math.min(bucket.worst, slack),
    total: bucket.total + slack,
  };
}

/**
 * Grand total; an empty set gives zero count, WNS and TNS
 */
export function totalBucket(paths: readonly CompletedPath[]): AggregateBucket {
  return paths.reduce<AggregateBucket>(
    (bucket, path) => addToBucket(bucket.count ? bucket : undefined, path.slack),
    { count: 0, worst: 0, total: 0 }
  );
}

/**
 * Group paths by a key and reduce each group to a bucket.
 *
 * Keys are compared by `id`; paths for which `keyOf` returns undefined are skipped.
 */
export function groupBuckets<K>(
  paths: readonly CompletedPath[],
  keyOf: (path: CompletedPath) => K | undefined,
  id: (key: K) => string,
  compare: (a: K, b: K) => number
): KeyedBucket<K>[] {
  const groups = new Map<string, KeyedBucket<K>>();
  for (const path of paths) {
    const key = keyOf(path);
    if (key === undefined) continue;
    const ref = id(key);
    const bucket = addToBucket(groups.get(ref), path.slack);
    groups.set(ref, { key, ...bucket });
  }
  return [...groups.values()].sort((a, b) => compare(a.key, b.key));
}

export function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function comparePairs(a: PairKey, b: PairKey): number {
  return compareStrings(a[0], b[0]) || compareStrings(a[1], b[1]);
}

const pairId = (key: PairKey): string => JSON.stringify(key);

/**
 * Build every grouped summary of the violating paths
 */
export function aggregateViolations(
  violations: readonly CompletedPath[],
  blockMap: readonly BlockMapRule[] = []
): ViolationAggregates {
  return {
    total: totalBucket(violations),
    byPathGroup: groupBuckets(violations, (p) => p.pathGroup, String, compareStrings),
    byClockPair: groupBuckets<PairKey>(
      violations,
      (p) => [p.startClk, p.endClk],
      pairId,
      comparePairs
    ),
    byBlockPair: groupBuckets<PairKey>(
      violations,
      (p) => [resolveBlock(p.startInst, blockMap), resolveBlock(p.endInst, blockMap)],
      pairId,
      comparePairs
    ),
    byStageCount: groupBuckets(violations, (p) => p.stageCount, String, (a, b) => a - b),
  };
}

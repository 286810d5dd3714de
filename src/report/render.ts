/**
 * Detail Renderer
 *
 * Renders the violation summary: slack and skew histograms, the path
 * group / clock pair / block pair / stage count tables, and the listing of
 * violations grouped by startpoint. Column widths and headers are fixed,
 * downstream scripts scrape this text.
 */

import {
  pathSkew,
  type AggregateBucket,
  type BlockMapRule,
  type CompletedPath,
  type HistogramCount,
  type PathRecord,
  type StartpointGroup,
} from "../types/timing.js";
import {
  aggregateViolations,
  negativeSlackPaths,
  type KeyedBucket,
  type PairKey,
  type ViolationAggregates,
} from "./aggregate.js";
import { fmt3 } from "./fixed.js";
import { buildSkewHistogram, buildSlackHistogram } from "./histogram.js";

const RULE_30 = "-".repeat(30);
const RULE_20 = "-".repeat(20);
const HIST_RULE = ` ${RULE_30}  ${RULE_20}`;
const PATH_GROUP_RULE = ` ${RULE_30}  ${RULE_20}  ${RULE_20}  ${RULE_20}`;
const CLOCK_RULE = ` ${RULE_20}  ${RULE_20}  ${RULE_20}  ${RULE_20}  ${RULE_20}`;
const BLOCK_RULE = ` ${RULE_30}  ${RULE_30}  ${RULE_20}  ${RULE_20}  ${RULE_20}`;

const left = (value: string | number, width: number): string => String(value).padEnd(width);
const right = (value: string | number, width: number): string => String(value).padStart(width);

/**
 * Group violations by startpoint pin.
 *
 * Groups with the most violations come first, ties broken by worst slack;
 * within a group endpoints are sorted worst first.
 */
export function groupByStartpoint(violations: readonly CompletedPath[]): StartpointGroup[] {
  const byStart = new Map<string, CompletedPath[]>();
  for (const path of violations) {
    const pin = path.startPin ?? `${path.startInst}/CP`;
    const list = byStart.get(pin);
    if (list) list.push(path);
    else byStart.set(pin, [path]);
  }

  const groups: StartpointGroup[] = [];
  for (const [startPin, paths] of byStart) {
    groups.push({
      startPin,
      startClk: paths[0].startClk,
      count: paths.length,
      worst: paths.reduce((worst, p) => Math.min(worst, p.slack), paths[0].slack),
      maxStageCount: paths.reduce((max, p) => Math.max(max, p.stageCount ?? 0), 0),
      startClkDelay: paths.find((p) => p.startClkDelay !== undefined)?.startClkDelay ?? 0,
      paths: [...paths].sort((a, b) => a.slack - b.slack),
    });
  }

  return groups.sort((a, b) => b.count - a.count || a.worst - b.worst);
}

function renderHistogram(
  out: string[],
  title: string,
  bins: readonly HistogramCount[],
  total: number
): void {
  out.push(title);
  out.push(HIST_RULE);
  for (const bin of bins) {
    out.push(`${left(bin.label, 30)}  ${right(bin.count, 21)}`);
  }
  out.push(HIST_RULE);
  out.push(` total${right(total, 47)}`);
}

function bucketColumns(bucket: AggregateBucket, sep: string): string {
  return [right(bucket.count, 20), right(fmt3(bucket.worst), 20), right(fmt3(bucket.total), 20)].join(sep);
}

function renderPathGroups(out: string[], rows: readonly KeyedBucket<string>[], total: AggregateBucket): void {
  out.push(
    " path group                           # of violations           worst slack           total slack"
  );
  out.push(PATH_GROUP_RULE);
  for (const row of rows) {
    out.push(` ${left(row.key, 30)}  ${bucketColumns(row, "  ")}`);
  }
  out.push(PATH_GROUP_RULE);
  out.push(` *${left("", 30)}  ${bucketColumns(total, "  ")}`);
}

function renderPairs(
  out: string[],
  header: string,
  rule: string,
  width: number,
  totalWidths: readonly [number, number],
  rows: readonly KeyedBucket<PairKey>[],
  total: AggregateBucket
): void {
  out.push(header);
  out.push(rule);
  for (const row of rows) {
    out.push(` ${left(row.key[0], width)}${left(row.key[1], width)}${bucketColumns(row, "")}`);
  }
  out.push(rule);
  out.push(` ${left("*", totalWidths[0])}${left("*", totalWidths[1])}${bucketColumns(total, "")}`);
}

function renderStageCounts(out: string[], rows: readonly KeyedBucket<number>[], total: number): void {
  out.push(" stage count                          # of violations");
  out.push(HIST_RULE);
  for (const row of rows) {
    out.push(`${right(row.key, 31)}${right(row.count, 22)}`);
  }
  out.push(HIST_RULE);
  out.push(` total${right(total, 47)}`);
}

function renderDetails(out: string[], groups: readonly StartpointGroup[]): void {
  out.push("<# of violations>\t<startpoint> <slack> (<stage_count>) (<clock>:<clock_network_delay>)");
  out.push("\t\t\t<endpoint>   <slack> (<stage_count>) (<clock>:<clock_network_delay>) (<skew>)");
  out.push("");

  for (const group of groups) {
    out.push(
      `${group.count}\t${group.startPin} ${fmt3(group.worst)} (${group.maxStageCount}) ` +
        `(${group.startClk}:${fmt3(group.startClkDelay)})`
    );
    for (const path of group.paths) {
      const endPin = path.endPin ?? `${path.endInst}/D`;
      // Missing values print as zero, and so does a zero-valued delay or skew
      const endClkDelay = path.endClkDelay || 0;
      const skew = pathSkew(path) || 0;
      out.push(
        `\t${endPin} ${fmt3(path.slack)} (${path.stageCount ?? 0}) ` +
          `(${path.endClk}:${fmt3(endClkDelay)}) (${fmt3(skew)})`
      );
    }
  }
}

/**
 * Everything the summary text is built from
 */
export interface ViolationSummary {
  violations: CompletedPath[];
  slackHistogram: HistogramCount[];
  skewHistogram: HistogramCount[];
  aggregates: ViolationAggregates;
  startpoints: StartpointGroup[];
}

/**
 * Classify and aggregate the violating paths of a record set
 */
export function summarizeViolations(
  paths: Iterable<PathRecord>,
  blockMap: readonly BlockMapRule[] = []
): ViolationSummary {
  const violations = negativeSlackPaths(paths);
  return {
    violations,
    slackHistogram: buildSlackHistogram(violations),
    skewHistogram: buildSkewHistogram(violations),
    aggregates: aggregateViolations(violations, blockMap),
    startpoints: groupByStartpoint(violations),
  };
}

/**
 * Render a computed summary as report text (newline terminated)
 */
export function renderViolationSummary(summary: ViolationSummary): string {
  const { aggregates } = summary;
  const total = aggregates.total;
  const out: string[] = [];

  out.push("");
  renderHistogram(out, " violation range                      # of violations", summary.slackHistogram, total.count);
  out.push(HIST_RULE);
  out.push(` WNS:${right(fmt3(total.worst), 48)}`);
  out.push(` TNS:${right(fmt3(total.total), 48)}`);
  out.push("");

  renderHistogram(out, " original skew range                  # of violations", summary.skewHistogram, total.count);
  out.push("");

  renderPathGroups(out, aggregates.byPathGroup, total);
  out.push("");

  renderPairs(
    out,
    " startpoint clock      endpoint clock             # of violations           worst slack           total slack",
    CLOCK_RULE,
    20,
    [21, 20],
    aggregates.byClockPair,
    total
  );
  out.push("");

  renderPairs(
    out,
    " startpoint block                endpoint block                       # of violations           worst slack           total slack",
    BLOCK_RULE,
    30,
    [31, 31],
    aggregates.byBlockPair,
    total
  );
  out.push("");

  renderStageCounts(out, aggregates.byStageCount, total.count);
  out.push("");

  renderDetails(out, summary.startpoints);

  return out.join("\n") + "\n";
}

/**
 * Full summary text for a set of scanned paths
 */
export function renderSummary(
  paths: Iterable<PathRecord>,
  blockMap: readonly BlockMapRule[] = []
): string {
  return renderViolationSummary(summarizeViolations(paths, blockMap));
}

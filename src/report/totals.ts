/**
 * Timing Totals
 *
 * Coarse summary of a PT report: path counts, WNS, TNS, violations and
 * best slack, overall and per path group.
 */

import { compareStrings } from "./aggregate.js";
import { fmt3 } from "./fixed.js";

const SLACK_ANYWHERE = /\bslack\b[^-+\d]*([-+]?\d+(?:\.\d+)?)/;
const STARTPOINT = /^Startpoint:/;
const PATH_GROUP = /^Path Group:\s*(.+)/;
const PATH_TYPE = /^Path Type:\s*(.+)/;

export const UNSPECIFIED_GROUP = "UNSPECIFIED";

/**
 * Running statistics for one path group (or the whole report)
 */
export class TimingStats {
  pathCount = 0;
  readonly slackValues: number[] = [];
  readonly pathTypes = new Map<string, number>();

  recordPath(): void {
    this.pathCount++;
  }

  recordSlack(value: number): void {
    this.slackValues.push(value);
  }

  recordPathType(pathType: string): void {
    this.pathTypes.set(pathType, (this.pathTypes.get(pathType) ?? 0) + 1);
  }

  get wns(): number | undefined {
    return this.slackValues.length ? this.slackValues.reduce((a, b) => Math.min(a, b)) : undefined;
  }

  get bestSlack(): number | undefined {
    return this.slackValues.length ? this.slackValues.reduce((a, b) => Math.max(a, b)) : undefined;
  }

  get violations(): number {
    return this.slackValues.filter((value) => value < 0).length;
  }

  get tns(): number {
    return this.slackValues.filter((value) => value < 0).reduce((sum, value) => sum + value, 0);
  }

  /**
   * Startpoint count, or the number of slacks when no startpoint was seen
   */
  resolvedPathCount(): number {
    return this.pathCount || this.slackValues.length;
  }
}

export interface TimingTotals {
  overall: TimingStats;
  groups: Map<string, TimingStats>;
}

/**
 * Line-at-a-time totals accumulator
 */
export class TotalsParser {
  private readonly overall = new TimingStats();
  private readonly groups = new Map<string, TimingStats>();
  private currentGroup = UNSPECIFIED_GROUP;

  push(raw: string): void {
    const line = raw.replace(/\n$/, "");

    const group = line.match(PATH_GROUP);
    if (group) {
      this.currentGroup = group[1].trim() || UNSPECIFIED_GROUP;
      this.groupStats(this.currentGroup);
      return;
    }

    const pathType = line.match(PATH_TYPE);
    if (pathType) {
      const type = pathType[1].trim();
      this.overall.recordPathType(type);
      this.groupStats(this.currentGroup).recordPathType(type);
      return;
    }

    if (STARTPOINT.test(line)) {
      this.overall.recordPath();
      this.groupStats(this.currentGroup).recordPath();
      return;
    }

    const slack = line.match(SLACK_ANYWHERE);
    if (slack) {
      const value = parseFloat(slack[1]);
      this.overall.recordSlack(value);
      this.groupStats(this.currentGroup).recordSlack(value);
    }
  }

  result(): TimingTotals {
    return { overall: this.overall, groups: this.groups };
  }

  private groupStats(name: string): TimingStats {
    let stats = this.groups.get(name);
    if (!stats) {
      stats = new TimingStats();
      this.groups.set(name, stats);
    }
    return stats;
  }
}

/**
 * Accumulate totals over report lines
 */
export function parseTotals(lines: Iterable<string>): TimingTotals {
  const parser = new TotalsParser();
  for (const line of lines) {
    parser.push(line);
  }
  return parser.result();
}

function formatFloat(value: number | undefined): string {
  return value === undefined ? "n/a" : fmt3(value);
}

function tableRow(cells: readonly [string, string | number, string, string, string | number, string]): string {
  const [group, paths, wns, tns, violations, best] = cells;
  return [
    group.padEnd(24),
    String(paths).padStart(8),
    wns.padStart(10),
    tns.padStart(12),
    String(violations).padStart(11),
    best.padStart(11),
  ].join(" ");
}

/**
 * Render the totals summary (no trailing newline)
 */
export function renderTotals(totals: TimingTotals): string {
  const { overall } = totals;
  const lines: string[] = [];

  lines.push("Summary");
  lines.push("=".repeat(7));
  lines.push(`Total paths: ${overall.resolvedPathCount()}`);
  lines.push(`Worst slack (WNS): ${formatFloat(overall.wns)}`);
  lines.push(`Total negative slack (TNS): ${formatFloat(overall.tns)}`);
  lines.push(`Violations: ${overall.violations}`);
  lines.push(`Best slack: ${formatFloat(overall.bestSlack)}`);

  if (overall.pathTypes.size) {
    lines.push("Path types:");
    const types = [...overall.pathTypes.entries()].sort(([a], [b]) => compareStrings(a, b));
    for (const [type, count] of types) {
      lines.push(`  - ${type}: ${count}`);
    }
  }

  lines.push("");
  lines.push("Per Path Group");
  lines.push("-".repeat(14));
  lines.push(tableRow(["Group", "Paths", "WNS", "TNS", "Violations", "Best"]));
  lines.push("-".repeat(80));

  const names = [...totals.groups.keys()].sort(compareStrings);
  for (const name of names) {
    const stats = totals.groups.get(name);
    if (!stats) continue;
    lines.push(
      tableRow([
        name.slice(0, 24),
        stats.resolvedPathCount(),
        formatFloat(stats.wns),
        formatFloat(stats.tns),
        stats.violations,
        formatFloat(stats.bestSlack),
      ])
    );
  }

  return lines.join("\n");
}

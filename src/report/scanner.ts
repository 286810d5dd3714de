/**
 * Path Block Scanner
 *
 * Reconstructs one record per timing path from a PT report. Each path
 * block looks like:
 *
 *   Startpoint: <inst> (rising edge-triggered flip-flop clocked by <clk>)
 *   Endpoint: <inst> (rising edge-triggered flip-flop clocked by <clk>)
 *   Path Group: <group>
 *   Point ... table
 *     clock network delay (propagated)   <launch delay>
 *     <pins> ...
 *   data arrival time
 *     clock network delay (propagated)   <capture delay>
 *   ...
 *   slack (VIOLATED)                      <slack>
 *
 * Anything else is ignored. A block that never reaches a slack line is dropped.
 */

import type { CompletedPath, PathRecord } from "../types/timing.js";
import { DEFAULT_REPORT_PATTERNS, type ReportPatterns } from "./patterns.js";
import { parseFirstFloat, parseSlackValue } from "./slack.js";

/**
 * Where the scanner is inside the current path block
 */
export enum ScanPhase {
  Header = "header",
  InPointTable = "in_point_table",
  AfterDataArrival = "after_data_arrival",
}

/**
 * Per-block scan state, replaced on every startpoint line
 */
interface BlockContext {
  record: PathRecord;
  phase: ScanPhase;
  stageCount: number;
  lastDataPin?: string;
  fallbackEndPin?: string;
}

export const DEFAULT_PATH_GROUP = "*";

/**
 * Line-at-a-time path scanner.
 *
 * `push` returns the previous path when a new block starts; `finish`
 * returns the last one at end of input.
 */
export class PathScanner {
  private block: BlockContext | null = null;

  constructor(private readonly patterns: ReportPatterns = DEFAULT_REPORT_PATTERNS) {}

  /**
   * Feed one line; returns a completed path if this line closed one
   */
  push(rawLine: string): CompletedPath | undefined {
    const line = rawLine.replace(/\n$/, "");
    const p = this.patterns;

    const start = line.match(p.startpoint);
    if (start) {
      const completed = this.finalize();
      const startInst = start[1].trim();
      this.block = {
        record: {
          startInst,
          endInst: "",
          startClk: start[3].trim(),
          endClk: "",
          pathGroup: DEFAULT_PATH_GROUP,
          startPin: `${startInst}/${p.clockPinSuffix}`,
        },
        phase: ScanPhase.Header,
        stageCount: 0,
      };
      return completed;
    }

    const block = this.block;
    if (!block) return undefined;
    const record = block.record;

    const end = line.match(p.endpoint);
    if (end) {
      record.endInst = end[1].trim();
      record.endClk = end[3].trim();
      return undefined;
    }

    const group = line.match(p.pathGroup);
    if (group) {
      record.pathGroup = group[1].trim();
      return undefined;
    }

    if (p.pointTable.test(line)) {
      block.phase = ScanPhase.InPointTable;
      return undefined;
    }

    if (block.phase === ScanPhase.InPointTable) {
      if (p.dataArrival.test(line)) {
        block.phase = ScanPhase.AfterDataArrival;
        if (block.fallbackEndPin === undefined && record.endInst) {
          block.fallbackEndPin = `${record.endInst}/D`;
        }
        return undefined;
      }

      // Launch clock delay: only the first occurrence counts
      if (p.clockNetworkDelay.test(line)) {
        if (record.startClkDelay === undefined) {
          record.startClkDelay = parseFirstFloat(line);
        }
        return undefined;
      }

      this.scanPointRow(block, line);
    } else if (block.phase === ScanPhase.AfterDataArrival && p.clockNetworkDelay.test(line)) {
      // Capture clock delay: the first one after data arrival
      if (record.endClkDelay === undefined) {
        record.endClkDelay = parseFirstFloat(line);
      }
      return undefined;
    }

    if (p.slack.test(line)) {
      const slack = parseSlackValue(line);
      if (slack !== undefined) {
        record.slack = slack;
      }
    }
    return undefined;
  }

  /**
   * Signal end of input; returns the in-progress path if it has slack
   */
  finish(): CompletedPath | undefined {
    const completed = this.finalize();
    this.block = null;
    return completed;
  }

  private scanPointRow(block: BlockContext, line: string): void {
    const p = this.patterns;
    const pinMatch = line.match(p.pointPin);
    if (!pinMatch || line.includes(p.netRow)) return;

    const pin = pinMatch[1];
    // Only sensitized arcs count as stages, not every output pin on the path
    if (p.outputPin.test(pin) && line.includes(p.sensitizationMarker)) {
      block.stageCount++;
    }
    if (p.dataPin.test(pin)) {
      block.lastDataPin = pin;
    }
  }

  private finalize(): CompletedPath | undefined {
    const block = this.block;
    if (!block) return undefined;

    const { record } = block;
    const slack = record.slack;
    if (slack === undefined) return undefined;

    return {
      ...record,
      slack,
      stageCount: block.stageCount > 0 ? block.stageCount : undefined,
      endPin: block.lastDataPin ?? block.fallbackEndPin,
    };
  }
}

/**
 * Lazily scan completed paths from a sequence of lines
 */
export function* scanPaths(
  lines: Iterable<string>,
  patterns: ReportPatterns = DEFAULT_REPORT_PATTERNS
): Generator<CompletedPath> {
  const scanner = new PathScanner(patterns);
  for (const line of lines) {
    const completed = scanner.push(line);
    if (completed) yield completed;
  }
  const last = scanner.finish();
  if (last) yield last;
}

/**
 * Async variant of {@link scanPaths} for streamed input
 */
export async function* scanPathsAsync(
  lines: AsyncIterable<string>,
  patterns: ReportPatterns = DEFAULT_REPORT_PATTERNS
): AsyncGenerator<CompletedPath> {
  const scanner = new PathScanner(patterns);
  for await (const line of lines) {
    const completed = scanner.push(line);
    if (completed) yield completed;
  }
  const last = scanner.finish();
  if (last) yield last;
}

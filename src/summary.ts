/**
 * Summary Pipeline
 *
 * Read a report, scan its paths and render the violation summary or the
 * totals summary. Text is fully built before anything is written.
 */

import { writeFile } from "fs/promises";
import type { CompletedPath, StartpointGroup } from "./types/timing.js";
import { readReportLines } from "./files/report-reader.js";
import { buildBlockMap } from "./report/block-map.js";
import { createReportPatterns, type StageHeuristic } from "./report/patterns.js";
import { renderViolationSummary, summarizeViolations } from "./report/render.js";
import { scanPathsAsync } from "./report/scanner.js";
import { renderTotals, TotalsParser } from "./report/totals.js";

/**
 * Options for a summary run
 */
export interface SummaryOptions {
  reportPath: string;
  blockMap?: string[];       // literal prefix=name entries
  blockMapFiles?: string[];
  stageHeuristic?: Partial<StageHeuristic>;
}

/**
 * Result of a summary run
 */
export interface SummaryResult {
  text: string;
  pathCount: number;
  violationCount: number;
  wns: number;
  tns: number;
  startpoints: StartpointGroup[];
}

/**
 * Scan every completed path of a report
 */
export async function collectPaths(
  reportPath: string,
  stageHeuristic: Partial<StageHeuristic> = {}
): Promise<CompletedPath[]> {
  const patterns = createReportPatterns(stageHeuristic);
  const paths: CompletedPath[] = [];
  for await (const path of scanPathsAsync(readReportLines(reportPath), patterns)) {
    paths.push(path);
  }
  return paths;
}

/**
 * Produce the violation summary of a report
 */
export async function summarizeReport(options: SummaryOptions): Promise<SummaryResult> {
  // Block map problems are fatal before the report is touched
  const rules = await buildBlockMap(options.blockMap, options.blockMapFiles);

  const paths = await collectPaths(options.reportPath, options.stageHeuristic);
  const summary = summarizeViolations(paths, rules);

  return {
    text: renderViolationSummary(summary),
    pathCount: paths.length,
    violationCount: summary.aggregates.total.count,
    wns: summary.aggregates.total.worst,
    tns: summary.aggregates.total.total,
    startpoints: summary.startpoints,
  };
}

/**
 * Produce the totals summary of a report (newline terminated)
 */
export async function summarizeTotals(reportPath: string): Promise<string> {
  const parser = new TotalsParser();
  for await (const line of readReportLines(reportPath)) {
    parser.push(line);
  }
  return renderTotals(parser.result()) + "\n";
}

/**
 * Startpoints with the most violations, worst first
 */
export async function listWorstStartpoints(
  options: SummaryOptions,
  limit: number
): Promise<StartpointGroup[]> {
  const result = await summarizeReport(options);
  return result.startpoints.slice(0, limit);
}

/**
 * Write summary text to a file, or to stdout when no path is given
 */
export async function writeSummary(text: string, outputPath?: string): Promise<void> {
  if (outputPath) {
    await writeFile(outputPath, text, "utf-8");
  } else {
    process.stdout.write(text);
  }
}

/**
 * Report Patterns
 *
 * Line patterns for PrimeTime `report_timing -nosplit` style reports.
 * Structural patterns are fixed; the stage heuristic (which pins count as
 * a stage, and how a sensitized row is marked) can be overridden for cell
 * libraries that name their pins differently.
 */

/**
 * Structural line patterns of a path block
 */
export interface BlockPatterns {
  startpoint: RegExp;
  endpoint: RegExp;
  pathGroup: RegExp;
  pointTable: RegExp;
  dataArrival: RegExp;
  clockNetworkDelay: RegExp;
  slack: RegExp;
  pointPin: RegExp;
  netRow: string;
}

/**
 * Stage counting and pin resolution heuristic
 */
export interface StageHeuristic {
  outputPin: RegExp;
  dataPin: RegExp;
  sensitizationMarker: string;
  clockPinSuffix: string;
}

export interface ReportPatterns extends BlockPatterns, StageHeuristic {}

export const BLOCK_PATTERNS: Readonly<BlockPatterns> = Object.freeze({
  startpoint: /^\s*Startpoint:\s*(.+?)\s*\((.*clocked by\s+(\S+).*)\)/,
  endpoint: /^\s*Endpoint:\s*(.+?)\s*\((.*clocked by\s+(\S+).*)\)/,
  pathGroup: /^\s*Path Group:\s*(\S+)/,
  pointTable: /^\s*Point\b/,
  dataArrival: /^\s*data arrival time\b/,
  clockNetworkDelay: /^\s*clock network delay \(propagated\)/,
  slack: /^\s*slack\b/,
  // Point-row line with a pin and a cell type in parentheses
  pointPin: /^\s*(\S+?\/[^\s]+)\s*\(/,
  netRow: "(net)",
});

export const DEFAULT_STAGE_HEURISTIC: Readonly<StageHeuristic> = Object.freeze({
  outputPin: /\/(?:Z|ZN|Y|Q\d*|QB\d*|QN|CO|COUT|S|SO|SUM)$/,
  dataPin: /\/(?:D\d*|DIN\d*|DATA\d*)$/,
  sensitizationMarker: "&",
  clockPinSuffix: "CP",
});

/**
 * Build the full pattern set, overriding parts of the stage heuristic
 */
export function createReportPatterns(
  overrides: Partial<StageHeuristic> = {}
): Readonly<ReportPatterns> {
  return Object.freeze({
    ...BLOCK_PATTERNS,
    outputPin: overrides.outputPin ?? DEFAULT_STAGE_HEURISTIC.outputPin,
    dataPin: overrides.dataPin ?? DEFAULT_STAGE_HEURISTIC.dataPin,
    sensitizationMarker:
      overrides.sensitizationMarker ?? DEFAULT_STAGE_HEURISTIC.sensitizationMarker,
    clockPinSuffix: overrides.clockPinSuffix ?? DEFAULT_STAGE_HEURISTIC.clockPinSuffix,
  });
}

export const DEFAULT_REPORT_PATTERNS = createReportPatterns();

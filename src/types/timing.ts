/**
 * Timing Report Types for the STA summary
 */

/**
 * PathRecord represents one completed timing path from a report
 */
export interface PathRecord {
  startInst: string;
  endInst: string;
  startClk: string;
  endClk: string;
  pathGroup: string;
  startClkDelay?: number;  // launch clock network delay
  endClkDelay?: number;    // capture clock network delay
  slack?: number;
  stageCount?: number;     // sensitized output transitions along the path
  startPin?: string;       // instance/CP
  endPin?: string;         // instance/Dx
}

/**
 * A path record whose slack has been recorded
 */
export type CompletedPath = PathRecord & { slack: number };

/**
 * Aggregate over a set of violating paths
 */
export interface AggregateBucket {
  count: number;
  worst: number;  // minimum slack
  total: number;  // sum of slacks (TNS)
}

/**
 * Block mapping rule: instance prefix -> block name
 */
export interface BlockMapRule {
  prefix: string;
  name: string;
}

/**
 * Histogram bin. `lower`/`upper` are undefined for open-ended bins.
 */
export interface HistogramBin {
  label: string;
  lower?: number;
  upper?: number;
}

/**
 * Histogram bin with the number of paths that fell into it
 */
export interface HistogramCount extends HistogramBin {
  count: number;
}

/**
 * Violations grouped by startpoint pin, as listed in the detail section
 */
export interface StartpointGroup {
  startPin: string;
  startClk: string;
  count: number;
  worst: number;
  maxStageCount: number;
  startClkDelay: number;
  paths: CompletedPath[];  // sorted by slack, worst first
}

/**
 * Derived clock skew (capture minus launch), if both delays are known
 */
export function pathSkew(path: PathRecord): number | undefined {
  if (path.startClkDelay === undefined || path.endClkDelay === undefined) {
    return undefined;
  }
  return path.endClkDelay - path.startClkDelay;
}

/**
 * Command-line interface
 *
 * Usage:
 *   sta-summary <report[.gz]> [-o out.summary] [--totals]
 *               [--block-map prefix=name]... [--block-map-file map.txt]...
 */

import type { SummaryConfig } from "./config.js";
import { summarizeReport, summarizeTotals, writeSummary } from "./summary.js";

export const USAGE =
  "Usage: sta-summary <report> [-o <output>] [--totals] " +
  "[--block-map <prefix=name>]... [--block-map-file <path>]...";

/**
 * Parsed command line
 */
export interface CliOptions {
  reportPath: string;
  outputPath?: string;
  totals: boolean;
  blockMap: string[];
  blockMapFiles: string[];
}

/**
 * Raised for unusable command lines
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

/**
 * Parse command-line arguments (without the node and script entries)
 */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  const options: Omit<CliOptions, "reportPath"> = {
    totals: false,
    blockMap: [],
    blockMapFiles: [],
  };
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const eq = arg.startsWith("--") ? arg.indexOf("=") : -1;
    const flag = eq >= 0 ? arg.slice(0, eq) : arg;

    const value = (): string => {
      if (eq >= 0) return arg.slice(eq + 1);
      const next = argv[++i];
      if (next === undefined) throw new UsageError(`Missing value for ${flag}`);
      return next;
    };

    switch (flag) {
      case "-o":
      case "--output":
        options.outputPath = value();
        break;
      case "--block-map":
        options.blockMap.push(value());
        break;
      case "--block-map-file":
        options.blockMapFiles.push(value());
        break;
      case "--totals":
        options.totals = true;
        break;
      default:
        if (flag.startsWith("-") && flag !== "-") {
          throw new UsageError(`Unknown option: ${flag}`);
        }
        positional.push(arg);
    }
  }

  if (positional.length !== 1) {
    throw new UsageError(positional.length ? "Expected a single report path" : "Missing report path");
  }

  return { ...options, reportPath: positional[0] };
}

/**
 * Run the CLI; returns the process exit code
 */
export async function runCli(argv: readonly string[], config: SummaryConfig): Promise<number> {
  if (argv.includes("-h") || argv.includes("--help")) {
    console.log(USAGE);
    return 0;
  }

  try {
    const options = parseCliArgs(argv);
    const text = options.totals
      ? await summarizeTotals(options.reportPath)
      : (
          await summarizeReport({
            reportPath: options.reportPath,
            blockMap: options.blockMap,
            blockMapFiles: [...config.blockMapFiles, ...options.blockMapFiles],
            stageHeuristic: config.stageHeuristic,
          })
        ).text;

    await writeSummary(text, options.outputPath);
    return 0;
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    if (error instanceof UsageError) console.error(USAGE);
    return 1;
  }
}

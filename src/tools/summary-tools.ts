/**
 * MCP Tools for timing report summaries
 *
 * Tool definitions (JSON schema for tools/list) and handlers that validate
 * their arguments with zod and run the summary pipeline.
 */

import { ErrorCode, McpError, type Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import type { SummaryConfig } from "../config.js";
import {
  listWorstStartpoints,
  summarizeReport,
  summarizeTotals,
  writeSummary,
  type SummaryOptions,
} from "../summary.js";
import { fmt3 } from "../report/fixed.js";

/**
 * Tool definitions for MCP server registration
 */
export const summaryToolDefinitions: Tool[] = [
  {
    name: "summarize_timing_report",
    description:
      "Summarize the violating paths of a PrimeTime timing report (plain or .gz): slack and skew histograms, path group, clock pair, block pair and stage count tables, and violations grouped by startpoint.",
    inputSchema: {
      type: "object",
      properties: {
        report_path: { type: "string", description: "Path to the timing report" },
        output_path: {
          type: "string",
          description: "Optional file to write the summary to instead of returning it",
        },
        block_map: {
          type: "array",
          items: { type: "string" },
          description: "Block mapping entries prefix=name; longest prefix wins",
        },
        block_map_files: {
          type: "array",
          items: { type: "string" },
          description: "Block mapping files with 'prefix -> name' or 'prefix name' lines",
        },
      },
      required: ["report_path"],
    },
  },
  {
    name: "summarize_timing_totals",
    description:
      "Coarse totals of a timing report: path count, WNS, TNS, violations and best slack, overall and per path group.",
    inputSchema: {
      type: "object",
      properties: {
        report_path: { type: "string", description: "Path to the timing report" },
      },
      required: ["report_path"],
    },
  },
  {
    name: "list_worst_startpoints",
    description:
      "List the startpoints with the most violating paths, with their worst slack and endpoints.",
    inputSchema: {
      type: "object",
      properties: {
        report_path: { type: "string", description: "Path to the timing report" },
        limit: { type: "number", description: "Maximum number of startpoints (default 10)" },
        block_map: { type: "array", items: { type: "string" } },
        block_map_files: { type: "array", items: { type: "string" } },
      },
      required: ["report_path"],
    },
  },
];

const reportArgs = z.object({
  report_path: z.string().min(1),
  block_map: z.array(z.string()).optional(),
  block_map_files: z.array(z.string()).optional(),
});

const summarizeArgs = reportArgs.extend({
  output_path: z.string().min(1).optional(),
});

const totalsArgs = z.object({
  report_path: z.string().min(1),
});

const startpointArgs = reportArgs.extend({
  limit: z.number().int().positive().default(10),
});

function parseArgs<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  args: unknown,
  toolName: string
): T {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "arguments"}: ${issue.message}`)
      .join("; ");
    throw new McpError(ErrorCode.InvalidParams, `Invalid parameters for tool '${toolName}': ${details}`);
  }
  return parsed.data;
}

function summaryOptions(args: z.infer<typeof reportArgs>, config: SummaryConfig): SummaryOptions {
  return {
    reportPath: args.report_path,
    blockMap: args.block_map,
    blockMapFiles: [...config.blockMapFiles, ...(args.block_map_files ?? [])],
    stageHeuristic: config.stageHeuristic,
  };
}

export type SummaryToolHandler = (args: unknown, config: SummaryConfig) => Promise<string>;

/**
 * Tool handlers keyed by tool name; each returns the text content of the result
 */
export const summaryToolHandlers: Record<string, SummaryToolHandler> = {
  summarize_timing_report: async (args, config) => {
    const parsed = parseArgs(summarizeArgs, args, "summarize_timing_report");
    const result = await summarizeReport(summaryOptions(parsed, config));

    if (!parsed.output_path) {
      return result.text;
    }

    await writeSummary(result.text, parsed.output_path);
    return JSON.stringify(
      {
        success: true,
        outputPath: parsed.output_path,
        paths: result.pathCount,
        violations: result.violationCount,
        wns: fmt3(result.wns),
        tns: fmt3(result.tns),
      },
      null,
      2
    );
  },

  summarize_timing_totals: async (args) => {
    const parsed = parseArgs(totalsArgs, args, "summarize_timing_totals");
    return summarizeTotals(parsed.report_path);
  },

  list_worst_startpoints: async (args, config) => {
    const parsed = parseArgs(startpointArgs, args, "list_worst_startpoints");
    const groups = await listWorstStartpoints(summaryOptions(parsed, config), parsed.limit);

    return JSON.stringify(
      groups.map((group) => ({
        startpoint: group.startPin,
        clock: group.startClk,
        violations: group.count,
        worstSlack: group.worst,
        maxStageCount: group.maxStageCount,
        endpoints: group.paths.map((path) => ({
          endpoint: path.endPin ?? `${path.endInst}/D`,
          clock: path.endClk,
          slack: path.slack,
          stageCount: path.stageCount ?? null,
        })),
      })),
      null,
      2
    );
  },
};

/**
 * Configuration
 *
 * Defaults for every summary run, read from the environment (and .env via
 * dotenv in the entry points):
 *
 *   STA_SUMMARY_BLOCK_MAP_FILES     comma-separated block map files
 *   STA_SUMMARY_STAGE_MARKER        sensitization marker on point rows (default "&")
 *   STA_SUMMARY_CLOCK_PIN           startpoint clock pin suffix (default "CP")
 *   STA_SUMMARY_OUTPUT_PIN_PATTERN  regex for stage output pins
 *   STA_SUMMARY_DATA_PIN_PATTERN    regex for endpoint data pins
 */

import { z } from "zod";
import type { StageHeuristic } from "./report/patterns.js";

const regexSource = z
  .string()
  .min(1)
  .transform((source, ctx) => {
    try {
      return new RegExp(source);
    } catch (error) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: error instanceof Error ? error.message : "invalid regular expression",
      });
      return z.NEVER;
    }
  });

const envSchema = z.object({
  STA_SUMMARY_BLOCK_MAP_FILES: z
    .string()
    .optional()
    .transform((value) =>
      (value ?? "")
        .split(",")
        .map((file) => file.trim())
        .filter(Boolean)
    ),
  STA_SUMMARY_STAGE_MARKER: z.string().min(1).optional(),
  STA_SUMMARY_CLOCK_PIN: z.string().min(1).optional(),
  STA_SUMMARY_OUTPUT_PIN_PATTERN: regexSource.optional(),
  STA_SUMMARY_DATA_PIN_PATTERN: regexSource.optional(),
});

/**
 * Summary configuration
 */
export interface SummaryConfig {
  blockMapFiles: string[];
  stageHeuristic: Partial<StageHeuristic>;
}

/**
 * Raised when the environment holds an invalid setting
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Read the configuration from an environment
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): SummaryConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  const vars = parsed.data;
  return {
    blockMapFiles: vars.STA_SUMMARY_BLOCK_MAP_FILES,
    stageHeuristic: {
      sensitizationMarker: vars.STA_SUMMARY_STAGE_MARKER,
      clockPinSuffix: vars.STA_SUMMARY_CLOCK_PIN,
      outputPin: vars.STA_SUMMARY_OUTPUT_PIN_PATTERN,
      dataPin: vars.STA_SUMMARY_DATA_PIN_PATTERN,
    },
  };
}

/**
 * Report Reader - Streams the lines of plain or gzip-compressed reports
 */

import { constants, createReadStream } from "fs";
import { access, stat } from "fs/promises";
import { createInterface } from "readline";
import { createGunzip } from "zlib";

/**
 * Raised when a report cannot be opened or read to the end
 */
export class ReportReadError extends Error {
  constructor(
    readonly reportPath: string,
    reason: string
  ) {
    super(`Cannot read report ${reportPath}: ${reason}`);
    this.name = "ReportReadError";
  }
}

// Replacement character the UTF-8 decoder substitutes for invalid bytes; they are dropped
const UNDECODABLE = /\uFFFD/g;

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Whether a report path is gzip-compressed (by extension)
 */
export function isCompressed(reportPath: string): boolean {
  return reportPath.endsWith(".gz");
}

async function assertReadableFile(reportPath: string): Promise<void> {
  try {
    await access(reportPath, constants.R_OK);
  } catch (error) {
    throw new ReportReadError(reportPath, errorMessage(error));
  }
  const info = await stat(reportPath);
  if (!info.isFile()) {
    throw new ReportReadError(reportPath, "not a regular file");
  }
}

/**
 * Yield report lines without line terminators, dropping bytes that are not
 * valid UTF-8
 */
export async function* readReportLines(reportPath: string): AsyncGenerator<string> {
  await assertReadableFile(reportPath);

  const source = createReadStream(reportPath);
  const input = isCompressed(reportPath) ? source.pipe(createGunzip()) : source;
  const lines = createInterface({ input, crlfDelay: Infinity });

  let failure: unknown;
  const fail = (error: Error): void => {
    if (failure === undefined) failure = error;
    lines.close();
  };
  source.on("error", fail);
  if (input !== source) input.on("error", fail);

  try {
    for await (const line of lines) {
      if (failure !== undefined) break;
      yield line.replace(UNDECODABLE, "");
    }
  } catch (error) {
    if (failure === undefined) failure = error;
  } finally {
    lines.close();
    source.destroy();
  }

  if (failure !== undefined) {
    throw new ReportReadError(reportPath, errorMessage(failure));
  }
}


import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { fileURLToPath } from "url";
import { gzipSync } from "zlib";
import { afterAll, beforeAll, describe, expect, it } from "vitest";

import { ReportReadError, readReportLines } from "../../src/files/report-reader.js";
import { BlockMapError } from "../../src/report/block-map.js";
import { NEGATIVE_ZERO_SLACK } from "../../src/report/slack.js";
import { collectPaths, listWorstStartpoints, summarizeReport, summarizeTotals } from "../../src/summary.js";

const fixture = (name: string): string => fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url));
const golden = (name: string): string => readFileSync(fixture(name), "utf-8");

describe("summary pipeline", () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), "sta-summary-"));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("scans every completed path of the sample report", async () => {
    const paths = await collectPaths(fixture("sample.rpt"));

    expect(paths.map((p) => p.slack)).toEqual([-0.01, -0.25, NEGATIVE_ZERO_SLACK, 0.125]);
    expect(paths[0]).toMatchObject({
      startPin: "m_core/u_ctrl/state_reg_0_/CP",
      endPin: "m_core/u_alu/acc_reg_3_/D",
      stageCount: 2,
      startClkDelay: 0.5,
      endClkDelay: 0.52,
    });
  });

  it("renders the violation summary", async () => {
    const result = await summarizeReport({ reportPath: fixture("sample.rpt") });

    expect(result.text).toBe(golden("sample.summary"));
    expect(result.pathCount).toBe(4);
    expect(result.violationCount).toBe(3);
    expect(result.wns).toBe(-0.25);
    expect(result.tns).toBeCloseTo(-0.26, 9);
  });

  it("applies literal block map entries", async () => {
    const result = await summarizeReport({
      reportPath: fixture("sample.rpt"),
      blockMap: ["m_core/u_alu=alu", "m_io/u_tx=tx_path"],
    });

    expect(result.text).toBe(golden("sample_block_map.summary"));
  });

  it("reads gzip-compressed reports", async () => {
    const gz = join(dir, "sample.rpt.gz");
    writeFileSync(gz, gzipSync(readFileSync(fixture("sample.rpt"))));

    const result = await summarizeReport({ reportPath: gz });

    expect(result.text).toBe(golden("sample.summary"));
  });

  it("renders the totals summary", async () => {
    await expect(summarizeTotals(fixture("sample.rpt"))).resolves.toBe(golden("sample.totals"));
  });

  it("lists the worst startpoints", async () => {
    const groups = await listWorstStartpoints({ reportPath: fixture("sample.rpt") }, 1);

    expect(groups).toHaveLength(1);
    expect(groups[0].startPin).toBe("m_core/u_ctrl/state_reg_0_/CP");
    expect(groups[0].count).toBe(2);
    expect(groups[0].paths.map((p) => p.endPin)).toEqual([
      "m_io/u_tx/shift_reg_7_/D",
      "m_core/u_alu/acc_reg_3_/D",
    ]);
  });

  it("honours a stage heuristic override", async () => {
    const paths = await collectPaths(fixture("sample.rpt"), { clockPinSuffix: "CK" });
    expect(paths[0].startPin).toBe("m_core/u_ctrl/state_reg_0_/CK");
  });

  it("drops bytes that are not valid UTF-8", async () => {
    const report = join(dir, "latin1.rpt");
    writeFileSync(
      report,
      Buffer.concat([
        Buffer.from("  Startpoint: m_a/r"),
        Buffer.from([0xe9]),
        Buffer.from("0 (rising edge-triggered flip-flop clocked by CLK1)\n  slack (VIOLATED)   -0.100\n"),
      ])
    );

    const paths = await collectPaths(report);

    expect(paths).toHaveLength(1);
    expect(paths[0].startInst).toBe("m_a/r0");
    expect(paths[0].startPin).toBe("m_a/r0/CP");
  });

  it("fails on a missing report", async () => {
    await expect(summarizeReport({ reportPath: join(dir, "missing.rpt") })).rejects.toThrow(ReportReadError);
  });

  it("fails on a directory", async () => {
    await expect(summarizeTotals(dir)).rejects.toThrow("not a regular file");
  });

  it("fails on a corrupt compressed report", async () => {
    const bad = join(dir, "bad.rpt.gz");
    writeFileSync(bad, "this is not gzip data\n");

    const consume = async (): Promise<number> => {
      let count = 0;
      for await (const _line of readReportLines(bad)) count++;
      return count;
    };

    await expect(consume()).rejects.toThrow(ReportReadError);
  });

  it("checks the block map before reading the report", async () => {
    await expect(
      summarizeReport({ reportPath: join(dir, "missing.rpt"), blockMapFiles: [join(dir, "missing.map")] })
    ).rejects.toThrow(BlockMapError);
  });
});

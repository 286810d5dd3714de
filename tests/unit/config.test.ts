import { describe, expect, it } from "vitest";

import { ConfigError, loadConfig } from "../../src/config.js";

describe("loadConfig", () => {
  it("defaults to no block map files and the built-in heuristic", () => {
    const config = loadConfig({});
    expect(config.blockMapFiles).toEqual([]);
    expect(config.stageHeuristic).toEqual({});
  });

  it("splits the block map file list", () => {
    const config = loadConfig({ STA_SUMMARY_BLOCK_MAP_FILES: " a.txt, ,b.txt " });
    expect(config.blockMapFiles).toEqual(["a.txt", "b.txt"]);
  });

  it("reads stage heuristic overrides", () => {
    const config = loadConfig({
      STA_SUMMARY_STAGE_MARKER: "*",
      STA_SUMMARY_CLOCK_PIN: "CK",
      STA_SUMMARY_OUTPUT_PIN_PATTERN: "/(?:X|XN)$",
    });

    expect(config.stageHeuristic.sensitizationMarker).toBe("*");
    expect(config.stageHeuristic.clockPinSuffix).toBe("CK");
    expect(config.stageHeuristic.outputPin?.test("U1/XN")).toBe(true);
    expect(config.stageHeuristic.outputPin?.test("U1/Z")).toBe(false);
    expect(config.stageHeuristic.dataPin).toBeUndefined();
  });

  it("rejects an invalid pin pattern", () => {
    expect(() => loadConfig({ STA_SUMMARY_DATA_PIN_PATTERN: "/(D" })).toThrow(ConfigError);
    expect(() => loadConfig({ STA_SUMMARY_DATA_PIN_PATTERN: "/(D" })).toThrow(/STA_SUMMARY_DATA_PIN_PATTERN/);
  });

  it("rejects an empty stage marker", () => {
    expect(() => loadConfig({ STA_SUMMARY_STAGE_MARKER: "" })).toThrow(ConfigError);
  });
});

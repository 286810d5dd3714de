import { fileURLToPath } from "url";
import { describe, expect, it } from "vitest";

import {
  BlockMapError,
  buildBlockMap,
  loadBlockMapFile,
  normalizePrefix,
  parseBlockMapEntry,
  parseBlockMapText,
  resolveBlock,
  sortBlockMap,
} from "../../src/report/block-map.js";

const fixture = (name: string): string => fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url));

describe("normalizePrefix", () => {
  it("terminates prefixes with the hierarchy separator", () => {
    expect(normalizePrefix(" m_core/u_alu ")).toBe("m_core/u_alu/");
    expect(normalizePrefix("m_core/")).toBe("m_core/");
    expect(normalizePrefix("  ")).toBe("");
  });
});

describe("parseBlockMapEntry", () => {
  it("parses prefix=name", () => {
    expect(parseBlockMapEntry("m_misc/m_abuf=abuf")).toEqual({ prefix: "m_misc/m_abuf/", name: "abuf" });
  });

  it("rejects entries without '='", () => {
    expect(() => parseBlockMapEntry("m_misc")).toThrow(BlockMapError);
  });

  it("rejects an empty prefix", () => {
    expect(() => parseBlockMapEntry("=abuf")).toThrow('Bad mapping entry "=abuf": empty prefix');
  });

  it("rejects an empty name", () => {
    expect(() => parseBlockMapEntry("m_misc=")).toThrow('Bad mapping entry "m_misc=": empty block name');
  });
});

describe("parseBlockMapText", () => {
  it("accepts arrow and whitespace forms, skipping comments and blanks", () => {
    const text = "# blocks\n\nm_misc/m_max_buf/ -> m_max_buf\r\n  m_misc/m_abuf   m_abuf\n";
    expect(parseBlockMapText(text)).toEqual([
      { prefix: "m_misc/m_max_buf/", name: "m_max_buf" },
      { prefix: "m_misc/m_abuf/", name: "m_abuf" },
    ]);
  });

  it("names the source and line of a malformed entry", () => {
    expect(() => parseBlockMapText("m_a/ -> a\nlonely\n", "map.txt")).toThrow(
      'Bad mapping line in map.txt:2: "lonely"'
    );
  });

  it("rejects an arrow line with no name", () => {
    expect(() => parseBlockMapText("m_a/ ->", "map.txt")).toThrow(BlockMapError);
  });
});

describe("block map files", () => {
  it("loads a mapping file", async () => {
    await expect(loadBlockMapFile(fixture("block_map.txt"))).resolves.toEqual([
      { prefix: "m_core/u_alu/", name: "alu" },
      { prefix: "m_io/u_tx/", name: "tx_path" },
    ]);
  });

  it("reports an unreadable file as a block map error", async () => {
    await expect(loadBlockMapFile(fixture("missing_map.txt"))).rejects.toThrow(BlockMapError);
  });

  it("merges entries and files, longest prefix first", async () => {
    const rules = await buildBlockMap(["m_core=core"], [fixture("block_map.txt")]);
    expect(rules.map((rule) => rule.prefix)).toEqual(["m_core/u_alu/", "m_io/u_tx/", "m_core/"]);
  });
});

describe("resolveBlock", () => {
  const rules = sortBlockMap([
    { prefix: "m_misc/", name: "misc" },
    { prefix: "m_misc/m_max_buf/", name: "m_max_buf" },
  ]);

  it("uses the first hierarchy token without rules", () => {
    expect(resolveBlock("m_misc/m_max_buf/u_q/rd_ptr_reg_2_", [])).toBe("m_misc");
    expect(resolveBlock("top_reg", [])).toBe("top_reg");
  });

  it("picks the longest matching prefix", () => {
    expect(resolveBlock("m_misc/m_max_buf/u_q/rd_ptr_reg_2_", rules)).toBe("m_max_buf");
    expect(resolveBlock("m_misc/m_abuf/wr_reg_0_", rules)).toBe("misc");
  });

  it("matches whole hierarchy levels only", () => {
    expect(resolveBlock("m_misc/m_max_buffer/x_reg", rules)).toBe("misc");
    expect(resolveBlock("m_miscx/y_reg", rules)).toBe("m_miscx");
  });
});

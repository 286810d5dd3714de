/**
 * Block Map
 *
 * Resolves instance hierarchy paths to coarse block names for the
 * startpoint block / endpoint block table. By default the first hierarchy
 * token is used (m_misc/m_max_buf/... -> m_misc); mapping rules override
 * this with a longest-prefix match against the full instance path.
 *
 * Mapping file format (one rule per line, # comments):
 *   m_misc/m_max_buf/ -> m_max_buf
 *   m_misc/m_abuf/       m_abuf
 */

import { readFile } from "fs/promises";
import { z } from "zod";
import type { BlockMapRule } from "../types/timing.js";

export const HIERARCHY_SEPARATOR = "/";

/**
 * Raised for malformed block-map entries or unreadable map files
 */
export class BlockMapError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BlockMapError";
  }
}

const blockMapRuleSchema = z.object({
  prefix: z.string().min(1, "empty prefix"),
  name: z.string().min(1, "empty block name"),
});

/**
 * Treat mapping prefixes as hierarchy prefixes (always end with "/")
 */
export function normalizePrefix(prefix: string): string {
  const trimmed = prefix.trim();
  if (!trimmed) return trimmed;
  return trimmed.endsWith(HIERARCHY_SEPARATOR) ? trimmed : trimmed + HIERARCHY_SEPARATOR;
}

function makeRule(prefix: string, name: string, origin: string): BlockMapRule {
  const parsed = blockMapRuleSchema.safeParse({
    prefix: normalizePrefix(prefix),
    name: name.trim(),
  });
  if (!parsed.success) {
    const reason = parsed.error.issues.map((issue) => issue.message).join(", ");
    throw new BlockMapError(`Bad mapping ${origin}: ${reason}`);
  }
  return parsed.data;
}

/**
 * Parse a literal "prefix=name" entry
 */
export function parseBlockMapEntry(entry: string): BlockMapRule {
  const eq = entry.indexOf("=");
  if (eq < 0) {
    throw new BlockMapError(`Block map entry expects prefix=name, got: ${JSON.stringify(entry)}`);
  }
  return makeRule(entry.slice(0, eq), entry.slice(eq + 1), `entry ${JSON.stringify(entry)}`);
}

/**
 * Parse the text of a mapping file.
 *
 * Accepts "prefix -> name" and "prefix name" lines; blank lines and lines
 * starting with # are skipped. Any other shape is fatal for the whole source.
 */
export function parseBlockMapText(text: string, source = "<block map>"): BlockMapRule[] {
  const rules: BlockMapRule[] = [];
  const lines = text.split(/\r?\n/);

  for (let i = 0; i < lines.length; i++) {
    const raw = lines[i];
    const line = raw.trim();
    if (!line || line.startsWith("#")) continue;

    const origin = `line in ${source}:${i + 1}: ${JSON.stringify(raw)}`;
    const arrow = line.indexOf("->");
    if (arrow >= 0) {
      rules.push(makeRule(line.slice(0, arrow), line.slice(arrow + 2), origin));
      continue;
    }

    const parts = line.split(/\s+/);
    if (parts.length < 2) {
      throw new BlockMapError(`Bad mapping ${origin}`);
    }
    rules.push(makeRule(parts[0], parts[1], origin));
  }

  return rules;
}

/**
 * Read and parse a mapping file
 */
export async function loadBlockMapFile(path: string): Promise<BlockMapRule[]> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new BlockMapError(`Cannot read block map file ${path}: ${reason}`);
  }
  return parseBlockMapText(text, path);
}

/**
 * Sort rules so the longest prefix is tried first
 */
export function sortBlockMap(rules: readonly BlockMapRule[]): BlockMapRule[] {
  return [...rules].sort((a, b) => b.prefix.length - a.prefix.length);
}

/**
 * Merge literal entries and mapping files into one ordered rule list
 */
export async function buildBlockMap(
  entries: readonly string[] = [],
  files: readonly string[] = []
): Promise<BlockMapRule[]> {
  const rules = entries.map(parseBlockMapEntry);
  for (const file of files) {
    rules.push(...(await loadBlockMapFile(file)));
  }
  return sortBlockMap(rules);
}

/**
 * Resolve the block name of an instance path.
 *
 * `rules` must already be sorted longest prefix first.
 */
export function resolveBlock(inst: string, rules: readonly BlockMapRule[]): string {
  for (const rule of rules) {
    if (inst.startsWith(rule.prefix)) {
      return rule.name;
    }
  }
  const sep = inst.indexOf(HIERARCHY_SEPARATOR);
  return sep >= 0 ? inst.slice(0, sep) : inst;
}

/**
 * Numeric token parsing for report lines
 */

const FIRST_FLOAT = /([-+]?\d+(?:\.\d+)?)/;
const LAST_FLOAT = /([-+]?\d+(?:\.\d+)?)(?!.*[-+]?\d)/;

/**
 * Value used for slacks printed as "-0.000": negative, but not below any bin edge
 */
export const NEGATIVE_ZERO_SLACK = -1e-12;

/**
 * Parse the first number on a line (PT columns are aligned, the first one is the incr value)
 */
export function parseFirstFloat(line: string): number | undefined {
  const match = line.match(FIRST_FLOAT);
  return match ? parseFloat(match[1]) : undefined;
}

/**
 * Return the last numeric token on a line as text
 */
export function parseLastFloatToken(line: string): string | undefined {
  const match = line.match(LAST_FLOAT);
  return match ? match[1] : undefined;
}

/**
 * Parse the slack from a "slack ..." line.
 *
 * PT prints tiny negative slacks as "-0.000", which parses to -0 and would
 * fail a `< 0` test, so a textually negative zero becomes {@link NEGATIVE_ZERO_SLACK}.
 */
export function parseSlackValue(line: string): number | undefined {
  const token = parseLastFloatToken(line);
  if (token === undefined) return undefined;

  const value = parseFloat(token);
  if (value === 0 && token.trimStart().startsWith("-")) {
    return NEGATIVE_ZERO_SLACK;
  }
  return value;
}

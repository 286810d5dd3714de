/**
 * Three-decimal fixed-point formatting shared by every report table
 */

/**
 * Format with three decimals, rounding exact ties to even and keeping the
 * sign of negative zero.
 *
 * A double is exactly halfway between two thousandths only when it is an
 * odd number of sixteenths (0.0625, 0.1875, ...); `toFixed` would round
 * those away from zero.
 */
export function fmt3(value: number): string {
  if (Object.is(value, -0)) return "-0.000";

  const sixteenths = value * 16;
  if (!Number.isInteger(sixteenths) || sixteenths % 2 === 0) {
    return value.toFixed(3);
  }

  const scaled = Math.abs(value) * 1000;
  const lower = Math.floor(scaled);
  const even = lower % 2 === 0 ? lower : lower + 1;
  return `${value < 0 ? "-" : ""}${(even / 1000).toFixed(3)}`;
}

import Fraction from "fraction.js";

import { vulgarFractionGlyph } from "./parse-amount";

export type AmountDisplayMode = "decimal" | "fraction";

/** Fractions with a larger denominator are shown as decimals instead */
const MAX_FRACTION_DENOMINATOR = 16;

/**
 * Format a quantity as a clean decimal string.
 * At most two decimals, trailing zeros removed (2.50 -> 2.5, 2.00 -> 2).
 */
export function formatAmountAsDecimal(n: number): string {
  if (!Number.isFinite(n) || Number.isInteger(n)) return String(n);

  return n.toFixed(2).replace(/\.?0+$/, "");
}

/**
 * Format a quantity as a whole number plus a unicode fraction glyph.
 * Examples:
 *   0.5   -> "½"
 *   1.5   -> "1 ½"
 *   0.333 -> "⅓"
 *   2.75  -> "2 ¾"
 *
 * Falls back to decimal for values that don't come out as a small fraction.
 */
export function formatAmountAsFraction(n: number): string {
  if (!Number.isFinite(n) || Number.isInteger(n)) return String(n);

  // 0.01 tolerance lets 0.333 become 1/3 and 0.666 become 2/3
  const fracPart = new Fraction(n).simplify(0.01).mod(1).abs();

  if (fracPart.valueOf() === 0) return String(Math.round(n));
  if (fracPart.d > MAX_FRACTION_DENOMINATOR) return formatAmountAsDecimal(n);

  const glyph = vulgarFractionGlyph(fracPart.n, fracPart.d) ?? fracPart.toFraction();
  const wholePart = Math.floor(Math.abs(n));
  const sign = n < 0 ? "-" : "";

  return wholePart === 0 ? `${sign}${glyph}` : `${sign}${wholePart} ${glyph}`;
}

/**
 * Format a quantity for the given display mode.
 */
export function formatAmount(n: number, mode: AmountDisplayMode = "decimal"): string {
  return mode === "fraction" ? formatAmountAsFraction(n) : formatAmountAsDecimal(n);
}

import type { Amount } from "@/types/recipe";

import Fraction from "fraction.js";

/**
 * Every single-codepoint vulgar fraction in Unicode: the three Latin-1
 * glyphs plus the Number Forms block (U+2150–U+215E and U+2189).
 */
export const VULGAR_FRACTIONS: Record<string, [numerator: number, denominator: number]> = {
  "\u00BC": [1, 4], // ¼
  "\u00BD": [1, 2], // ½
  "\u00BE": [3, 4], // ¾
  "\u2150": [1, 7], // ⅐
  "\u2151": [1, 9], // ⅑
  "\u2152": [1, 10], // ⅒
  "\u2153": [1, 3], // ⅓
  "\u2154": [2, 3], // ⅔
  "\u2155": [1, 5], // ⅕
  "\u2156": [2, 5], // ⅖
  "\u2157": [3, 5], // ⅗
  "\u2158": [4, 5], // ⅘
  "\u2159": [1, 6], // ⅙
  "\u215A": [5, 6], // ⅚
  "\u215B": [1, 8], // ⅛
  "\u215C": [3, 8], // ⅜
  "\u215D": [5, 8], // ⅝
  "\u215E": [7, 8], // ⅞
  "\u2189": [0, 3], // ↉
};

// A numeric token may not run straight into more digits or separators,
// so "1.000,5" and "1/2/3" are rejected instead of half-parsed.
const TOKEN_END = String.raw`(?![.,/]?\d)`;

const VULGAR_PATTERN = new RegExp(
  String.raw`^(?:(\d+)\s*)?([${Object.keys(VULGAR_FRACTIONS).join("")}])` + TOKEN_END
);
const MIXED_PREFIX = String.raw`^(\d+)\s+(\d+)\/(\d+)`;
const MIXED_PATTERN = new RegExp(MIXED_PREFIX + TOKEN_END);
const MIXED_START = new RegExp(MIXED_PREFIX);
const FRACTION_PATTERN = new RegExp(String.raw`^(\d+)\/(\d+)` + TOKEN_END);
const DECIMAL_PATTERN = new RegExp(String.raw`^(\d+)[.,](\d+)` + TOKEN_END);
const INTEGER_PATTERN = new RegExp(String.raw`^(\d+)` + TOKEN_END);

interface QuantityMatch {
  value: number;
  /** Length of the numeric token at the start of the text */
  length: number;
}

function fractionValue(whole: number, numerator: number, denominator: number): number {
  return new Fraction(numerator, denominator).add(whole).valueOf();
}

/**
 * Recognize the numeric token at the start of already-trimmed text.
 *
 * Returns null when nothing numeric is there, and also when a fraction has a
 * zero denominator: such text is treated as a plain unit, never as the
 * integer in front of it.
 */
function matchQuantity(text: string): QuantityMatch | null {
  const vulgar = VULGAR_PATTERN.exec(text);

  if (vulgar) {
    const [numerator, denominator] = VULGAR_FRACTIONS[vulgar[2]];
    const whole = vulgar[1] ? parseInt(vulgar[1], 10) : 0;

    return { value: fractionValue(whole, numerator, denominator), length: vulgar[0].length };
  }

  const mixed = MIXED_PATTERN.exec(text);

  // "2 1/2/3" is malformed as a whole, not the integer 2
  if (!mixed && MIXED_START.test(text)) return null;

  if (mixed) {
    const denominator = parseInt(mixed[3], 10);

    if (denominator === 0) return null;

    return {
      value: fractionValue(parseInt(mixed[1], 10), parseInt(mixed[2], 10), denominator),
      length: mixed[0].length,
    };
  }

  const fraction = FRACTION_PATTERN.exec(text);

  if (fraction) {
    const denominator = parseInt(fraction[2], 10);

    if (denominator === 0) return null;

    return {
      value: fractionValue(0, parseInt(fraction[1], 10), denominator),
      length: fraction[0].length,
    };
  }

  const decimal = DECIMAL_PATTERN.exec(text);

  if (decimal) {
    return { value: Number(`${decimal[1]}.${decimal[2]}`), length: decimal[0].length };
  }

  const integer = INTEGER_PATTERN.exec(text);

  if (integer) {
    return { value: parseInt(integer[1], 10), length: integer[0].length };
  }

  return null;
}

/**
 * Parse an amount such as "2 1/4 cups", "1,5 kg", "½" or "a pinch".
 *
 * The numeric token is one of (first match wins): a vulgar fraction glyph,
 * optionally after a whole number; a mixed number; a fraction; a decimal
 * with "." or ","; an integer. Whatever follows the token is the unit. When
 * no token is recognized the quantity is null and the whole text is the
 * unit. Never throws.
 */
export function parseAmount(text: string): Amount {
  const trimmed = text.trim();
  const match = matchQuantity(trimmed);

  if (!match) {
    return { quantity: null, unit: trimmed, originalText: text };
  }

  return {
    quantity: match.value,
    unit: trimmed.slice(match.length).trim(),
    originalText: text,
  };
}

/**
 * The numeric part of an amount exactly as written ("2 1/4", "1,5", "½"),
 * or null when the amount has no quantity.
 */
export function amountFactor(amount: Amount): string | null {
  if (amount.quantity === null) return null;

  const trimmed = amount.originalText.trim();

  return trimmed.slice(0, trimmed.length - amount.unit.length).trim();
}

/**
 * Display text of an amount: its original text without surrounding whitespace.
 */
export function formatAmountText(amount: Amount): string {
  return amount.originalText.trim();
}

/**
 * Glyph for a fraction that Unicode encodes as a single codepoint, if any.
 */
export function vulgarFractionGlyph(numerator: number, denominator: number): string | undefined {
  return Object.keys(VULGAR_FRACTIONS).find((glyph) => {
    const [n, d] = VULGAR_FRACTIONS[glyph];

    return n === numerator && d === denominator;
  });
}

import type { Dimension } from "@/lib/types";
import { SkuCodecError } from "./errors";

export const DEFAULT_MAX_DENOMINATOR = 64;

function gcd(a: number, b: number): number {
  let x = a;
  let y = b;
  while (y !== 0) {
    const next = x % y;
    x = y;
    y = next;
  }
  return x;
}

export function isPowerOfTwo(value: number): boolean {
  if (!Number.isSafeInteger(value) || value <= 0) return false;
  let rest = value;
  while (rest % 2 === 0) rest /= 2;
  return rest === 1;
}

function assertMaxDenominator(maxDenominator: number): void {
  if (!isPowerOfTwo(maxDenominator)) {
    throw new SkuCodecError(
      "UnsupportedPrecision",
      `Maximum denominator must be a power of two, got ${maxDenominator}`,
    );
  }
}

export function reduceDimension(numerator: number, denominator: number): Dimension {
  if (
    !Number.isSafeInteger(numerator) ||
    !Number.isSafeInteger(denominator) ||
    numerator <= 0 ||
    denominator <= 0
  ) {
    throw new SkuCodecError(
      "InvalidDimension",
      `Dimension must be a positive fraction, got ${numerator}/${denominator}`,
    );
  }
  const divisor = gcd(numerator, denominator);
  return { numerator: numerator / divisor, denominator: denominator / divisor };
}

/**
 * Converts a decimal inch value to an exact dimension at `maxDenominator`
 * resolution. Values between two ticks are rejected, never rounded.
 */
export function dimensionFromDecimal(
  value: number,
  maxDenominator: number = DEFAULT_MAX_DENOMINATOR,
): Dimension {
  assertMaxDenominator(maxDenominator);
  if (!Number.isFinite(value) || value <= 0) {
    throw new SkuCodecError("InvalidDimension", `Dimension must be positive, got ${value}`);
  }
  const scaled = value * maxDenominator;
  if (!Number.isInteger(scaled)) {
    throw new SkuCodecError(
      "UnsupportedPrecision",
      `${value} is not a multiple of 1/${maxDenominator}`,
    );
  }
  return reduceDimension(scaled, maxDenominator);
}

export function dimensionToDecimal(value: Dimension): number {
  return value.numerator / value.denominator;
}

export function dimensionsEqual(a: Dimension, b: Dimension): boolean {
  return a.numerator * b.denominator === b.numerator * a.denominator;
}

export function formatDimension(
  value: Dimension | number,
  options: { maxDenominator?: number } = {},
): string {
  const maxDenominator = options.maxDenominator ?? DEFAULT_MAX_DENOMINATOR;
  assertMaxDenominator(maxDenominator);

  const dimension =
    typeof value === "number"
      ? dimensionFromDecimal(value, maxDenominator)
      : reduceDimension(value.numerator, value.denominator);
  const { numerator, denominator } = dimension;

  if (maxDenominator % denominator !== 0) {
    throw new SkuCodecError(
      "UnsupportedPrecision",
      `${numerator}/${denominator} is finer than 1/${maxDenominator}`,
    );
  }

  const whole = Math.floor(numerator / denominator);
  const remainder = numerator - whole * denominator;

  if (remainder === 0) return String(whole);
  if (whole === 0) return `${remainder}/${denominator}`;
  return `${whole} ${remainder}/${denominator}`;
}

/**
 * Reads "3/8", "1 1/32", "1-1/32", "2" or "0.375" back into a dimension.
 */
export function parseFraction(
  text: string,
  options: { maxDenominator?: number } = {},
): Dimension {
  const value = text.trim();

  const mixed = value.match(/^(\d+)(?:\s+|-)(\d+)\/(\d+)$/);
  if (mixed) {
    const whole = Number.parseInt(mixed[1], 10);
    const numerator = Number.parseInt(mixed[2], 10);
    const denominator = Number.parseInt(mixed[3], 10);
    if (denominator > 0) {
      return reduceDimension(whole * denominator + numerator, denominator);
    }
  }

  const fraction = value.match(/^(\d+)\/(\d+)$/);
  if (fraction) {
    return reduceDimension(
      Number.parseInt(fraction[1], 10),
      Number.parseInt(fraction[2], 10),
    );
  }

  if (/^\d+$/.test(value)) {
    return reduceDimension(Number.parseInt(value, 10), 1);
  }

  if (/^\d*\.\d+$/.test(value)) {
    return dimensionFromDecimal(Number.parseFloat(value), options.maxDenominator);
  }

  throw new SkuCodecError("InvalidDimension", `Could not read "${text}" as a fraction`);
}

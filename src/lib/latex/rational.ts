/**
 * Exact Rational Arithmetic
 * Reduced bigint fractions; operations return null where the result is undefined
 */

import type { BinaryOperatorKind, UnaryOperatorKind } from "./operators.ts";

/** A reduced fraction with a positive denominator */
export interface Rational {
  readonly numerator: bigint;
  readonly denominator: bigint;
}

/** Largest |exponent| folded by pow; bigger powers stay symbolic */
export const MAX_EXPONENT = 1024n;

/** Largest n folded by factorial */
export const MAX_FACTORIAL = 1000n;

/** Largest numerator or denominator, in bits, that folding will produce */
export const MAX_RESULT_BITS = 65_536n;

const DECIMAL_PATTERN = /^(\d+)(?:\.(\d+))?$/;

function abs(n: bigint): bigint {
  return n < 0n ? -n : n;
}

function bitLength(n: bigint): bigint {
  return n === 0n ? 0n : BigInt(abs(n).toString(2).length);
}

/** Whether both parts of a value fit in MAX_RESULT_BITS */
function withinResultBounds(r: Rational): boolean {
  return bitLength(r.numerator) <= MAX_RESULT_BITS && bitLength(r.denominator) <= MAX_RESULT_BITS;
}

function bounded(r: Rational | null): Rational | null {
  return r && withinResultBounds(r) ? r : null;
}

function gcd(a: bigint, b: bigint): bigint {
  let x = abs(a);
  let y = abs(b);
  while (y !== 0n) {
    [x, y] = [y, x % y];
  }
  return x;
}

/**
 * Build a reduced rational
 * Returns null for a zero denominator
 */
export function rational(numerator: bigint, denominator: bigint = 1n): Rational | null {
  if (denominator === 0n) return null;
  const sign = denominator < 0n ? -1n : 1n;
  const divisor = gcd(numerator, denominator) || 1n;
  return {
    numerator: (sign * numerator) / divisor,
    denominator: (sign * denominator) / divisor,
  };
}

function integer(n: bigint): Rational {
  return { numerator: n, denominator: 1n };
}

export const ZERO: Rational = integer(0n);
export const ONE: Rational = integer(1n);

/**
 * Parse a decimal literal exactly
 *
 * @example
 * parseRational("3.25");  // { numerator: 13n, denominator: 4n }
 */
export function parseRational(text: string): Rational {
  const match = DECIMAL_PATTERN.exec(text);
  if (!match) {
    throw new RangeError(`Not a decimal literal: '${text}'`);
  }
  const whole = match[1] ?? "0";
  const fraction = match[2] ?? "";
  const scale = 10n ** BigInt(fraction.length);
  return rational(BigInt(whole + fraction), scale) ?? ZERO;
}

export function isInteger(r: Rational): boolean {
  return r.denominator === 1n;
}

export function rationalEquals(a: Rational, b: Rational): boolean {
  return a.numerator === b.numerator && a.denominator === b.denominator;
}

export function negate(r: Rational): Rational {
  return { numerator: -r.numerator, denominator: r.denominator };
}

export function add(a: Rational, b: Rational): Rational {
  const numerator = a.numerator * b.denominator + b.numerator * a.denominator;
  return rational(numerator, a.denominator * b.denominator) ?? ZERO;
}

export function subtract(a: Rational, b: Rational): Rational {
  return add(a, negate(b));
}

export function multiply(a: Rational, b: Rational): Rational {
  return rational(a.numerator * b.numerator, a.denominator * b.denominator) ?? ZERO;
}

/** Returns null when dividing by zero */
export function divide(a: Rational, b: Rational): Rational | null {
  return rational(a.numerator * b.denominator, a.denominator * b.numerator);
}

/**
 * Integer powers only; returns null for fractional or oversized exponents, for 0 to a
 * negative power and for results wider than MAX_RESULT_BITS
 */
export function power(base: Rational, exponent: Rational): Rational | null {
  if (!isInteger(exponent) || abs(exponent.numerator) > MAX_EXPONENT) return null;
  const n = exponent.numerator;
  // |a^n| needs at most bits(a) * |n| bits
  const widest =
    bitLength(base.numerator) > bitLength(base.denominator)
      ? bitLength(base.numerator)
      : bitLength(base.denominator);
  if (widest * abs(n) > MAX_RESULT_BITS) return null;
  if (n >= 0n) {
    return rational(base.numerator ** n, base.denominator ** n);
  }
  return rational(base.denominator ** -n, base.numerator ** -n);
}

/** n! for integers 0..MAX_FACTORIAL; null otherwise */
export function factorial(r: Rational): Rational | null {
  if (!isInteger(r) || r.numerator < 0n || r.numerator > MAX_FACTORIAL) return null;
  let result = 1n;
  for (let i = 2n; i <= r.numerator; i++) {
    result *= i;
  }
  return integer(result);
}

/**
 * Apply a unary operator kind to a value
 * Null when the result is undefined or wider than MAX_RESULT_BITS
 */
export function applyUnary(op: UnaryOperatorKind, value: Rational): Rational | null {
  switch (op) {
    case "negate":
      return bounded(negate(value));
    case "factorial":
      return bounded(factorial(value));
  }
}

/**
 * Apply a binary operator kind to two values
 * Null when the result is undefined or wider than MAX_RESULT_BITS
 */
export function applyBinary(
  op: BinaryOperatorKind,
  left: Rational,
  right: Rational,
): Rational | null {
  switch (op) {
    case "add":
      return bounded(add(left, right));
    case "subtract":
      return bounded(subtract(left, right));
    case "multiply":
      return bounded(multiply(left, right));
    case "divide":
      return bounded(divide(left, right));
    case "power":
      return bounded(power(left, right));
  }
}

/** "13/4", "-5", "0" */
export function formatRational(r: Rational): string {
  return isInteger(r) ? r.numerator.toString() : `${r.numerator}/${r.denominator}`;
}

/**
 * Exact decimal text of |r| when its denominator has no prime factors besides 2 and 5
 * Returns null for repeating decimals such as 1/3
 *
 * @example
 * toDecimalString(parseRational("3.25"));  // "3.25"
 */
export function toDecimalString(r: Rational): string | null {
  let twos = 0n;
  let fives = 0n;
  let rest = r.denominator;
  while (rest % 2n === 0n) {
    rest /= 2n;
    twos++;
  }
  while (rest % 5n === 0n) {
    rest /= 5n;
    fives++;
  }
  if (rest !== 1n) return null;

  const places = twos > fives ? twos : fives;
  const scaled = (abs(r.numerator) * 10n ** places) / r.denominator;
  if (places === 0n) return scaled.toString();

  const digits = scaled.toString().padStart(Number(places) + 1, "0");
  const split = digits.length - Number(places);
  return `${digits.slice(0, split)}.${digits.slice(split)}`;
}

/**
 * Fixed-Point Math Module
 *
 * Provides deterministic Q32.32 arithmetic for lockstep game calculations.
 * All clients using the same operations will produce identical results.
 *
 * Square root and trigonometry use fixed iteration counts, so results are
 * reproducible bit for bit but only approximately correct.
 *
 * @example
 * ```typescript
 * import { FP } from 'q32-math';
 *
 * const dx = FP.FromInt(3);
 * const dy = FP.FromInt(4);
 *
 * const distance = FP.Sqrt(FP.Add(FP.Mul(dx, dx), FP.Mul(dy, dy)));
 *
 * // Convert back to number for display
 * console.log(FP.ToFloat(distance)); // ~5
 * ```
 */

import { FixedPoint } from './FixedPoint.js';

/** Newton-Raphson steps taken by Sqrt */
const SQRT_ITERATIONS = 10;

/** Taylor series terms evaluated by Sin and Cos */
const SERIES_TERMS = 10;

const TWO = FixedPoint.fromInt(2);
const MINUS_ONE = FixedPoint.fromInt(-1);

/** Series coefficients indexed by term mod 4 */
type CoefficientCycle = readonly [FixedPoint, FixedPoint, FixedPoint, FixedPoint];

const COS_COEFFICIENTS: CoefficientCycle = [
  FixedPoint.One,
  FixedPoint.Zero,
  MINUS_ONE,
  FixedPoint.Zero,
];

const SIN_COEFFICIENTS: CoefficientCycle = [
  FixedPoint.Zero,
  FixedPoint.One,
  FixedPoint.Zero,
  MINUS_ONE,
];

/**
 * Sum `initial + Σ c(i) * x^i / i!` for i = 1..SERIES_TERMS.
 * The power and the factorial are carried from term to term.
 */
function taylorSeries(
  x: FixedPoint,
  initial: FixedPoint,
  coefficients: CoefficientCycle
): FixedPoint {
  let sum = initial;
  let power = x;
  let factorial = 1;

  for (let i = 1; i <= SERIES_TERMS; i++) {
    factorial *= i;
    const coefficient = coefficients[i % 4];
    sum = sum.add(coefficient.mul(power).div(FixedPoint.fromInt(factorial)));
    power = power.mul(x);
  }

  return sum;
}

function powBySquaring(base: FixedPoint, exponent: number): FixedPoint {
  if (exponent === 0) return FixedPoint.One;
  if (exponent === 1) return base;

  const half = powBySquaring(base, Math.floor(exponent / 2));
  const squared = half.mul(half);
  return exponent % 2 === 0 ? squared : squared.mul(base);
}

/**
 * FP - Fixed-point number creation, conversion, and math utilities
 * Quantum-style unified API for all fixed-point operations (frozen)
 */
export const FP = Object.freeze({
  // ============ Creation ============

  /**
   * Create a fixed-point number from a JavaScript number (truncates toward zero)
   *
   * WARNING: This relies on native float multiplication. Only use it with
   * literals or data that is identical on every client; see
   * {@link FixedPoint.fromFloat}.
   */
  FromFloat: (value: number): FixedPoint => FixedPoint.fromFloat(value),

  /**
   * Create a fixed-point number from an integer
   * @param value - Integer value
   */
  FromInt: (value: number | bigint): FixedPoint => FixedPoint.fromInt(value),

  /**
   * Create a fixed-point number from its raw Q32.32 encoding (no validation)
   * @param raw - 64-bit signed raw value
   */
  FromRaw: (raw: bigint): FixedPoint => FixedPoint.fromRaw(raw),

  /**
   * Convert a fixed-point number back to a JavaScript number
   */
  ToFloat: (fp: FixedPoint): number => fp.toFloat(),

  /** Integer part, truncated toward zero (throws for NaN) */
  ToInt: (fp: FixedPoint): number => fp.toInt(),

  /** Nearest integer, halves away from zero (throws for NaN) */
  RoundToInt: (fp: FixedPoint): number => fp.roundToInt(),

  // ============ Constants (Quantum naming convention) ============

  /** Zero constant */
  _0: FixedPoint.Zero,

  /** One constant */
  _1: FixedPoint.One,

  /** One half */
  Half: FixedPoint.Half,

  /** Pi constant (3.1415926) */
  Pi: FixedPoint.Pi,

  /** Radians to degrees factor */
  Rad2Deg: FixedPoint.Rad2Deg,

  /** Degrees to radians factor */
  Deg2Rad: FixedPoint.Deg2Rad,

  /** Smallest positive value (2^-32) */
  Precision: FixedPoint.Precision,

  NaN: FixedPoint.NaN,
  PositiveInfinity: FixedPoint.PositiveInfinity,
  NegativeInfinity: FixedPoint.NegativeInfinity,
  MaxValue: FixedPoint.MaxValue,
  MinValue: FixedPoint.MinValue,

  // ============ Arithmetic Operations ============

  /** Add two fixed-point numbers */
  Add: (a: FixedPoint, b: FixedPoint): FixedPoint => a.add(b),

  /** Subtract two fixed-point numbers */
  Sub: (a: FixedPoint, b: FixedPoint): FixedPoint => a.sub(b),

  /** Multiply two fixed-point numbers */
  Mul: (a: FixedPoint, b: FixedPoint): FixedPoint => a.mul(b),

  /** Divide two fixed-point numbers */
  Div: (a: FixedPoint, b: FixedPoint): FixedPoint => a.div(b),

  /** Remainder of two fixed-point numbers (sign follows the dividend) */
  Mod: (a: FixedPoint, b: FixedPoint): FixedPoint => a.mod(b),

  /** Negate a fixed-point number */
  Neg: (a: FixedPoint): FixedPoint => a.neg(),

  // ============ Math Functions ============

  /** Absolute value of a fixed-point number */
  Abs: (a: FixedPoint): FixedPoint => a.abs(),

  /**
   * Square root using exactly 10 Newton-Raphson steps from the seed `x / 2`
   *
   * Accuracy drops for small inputs (the seed is far from the root) and for
   * large ones (`r * r` wraps around). Below 2^-31 the seed `x * Half` rounds
   * to zero, the first step divides by zero and the result ends up NaN.
   *
   * @throws RangeError for a negative finite input
   */
  Sqrt: (x: FixedPoint): FixedPoint => {
    if (x.isNaN() || x.isNegativeInfinity()) return FixedPoint.NaN;
    if (x.isZero()) return FixedPoint.Zero;
    if (x.isPositiveInfinity()) return FixedPoint.PositiveInfinity;
    if (x.isNegative()) {
      throw new RangeError(`Cannot take the square root of negative value ${x.toString()}`);
    }

    let r = x.mul(FixedPoint.Half);
    for (let i = 0; i < SQRT_ITERATIONS; i++) {
      r = r.sub(r.mul(r).sub(x).div(TWO.mul(r)));
    }
    return r;
  },

  /**
   * Raise to a non-negative integer power by squaring
   * @param x - Base
   * @param p - Exponent
   * @throws RangeError if `p` is negative or not an integer
   */
  Pow: (x: FixedPoint, p: number): FixedPoint => {
    if (!Number.isInteger(p) || p < 0) {
      throw new RangeError(`Exponent must be a non-negative integer, got ${p}`);
    }
    if (x.isNaN()) return FixedPoint.NaN;
    return powBySquaring(x, p);
  },

  /** Minimum of two fixed-point numbers (NaN if either is NaN) */
  Min: (a: FixedPoint, b: FixedPoint): FixedPoint => {
    if (a.isNaN() || b.isNaN()) return FixedPoint.NaN;
    return a.lte(b) ? a : b;
  },

  /** Maximum of two fixed-point numbers (NaN if either is NaN) */
  Max: (a: FixedPoint, b: FixedPoint): FixedPoint => {
    if (a.isNaN() || b.isNaN()) return FixedPoint.NaN;
    return a.gte(b) ? a : b;
  },

  // ============ Comparison ============

  /** Check if two fixed-point numbers are equal (always false for NaN) */
  Eq: (a: FixedPoint, b: FixedPoint): boolean => a.eq(b),

  /** Negation of Eq (always true for NaN) */
  Ne: (a: FixedPoint, b: FixedPoint): boolean => a.ne(b),

  /** Check if first is less than second */
  Lt: (a: FixedPoint, b: FixedPoint): boolean => a.lt(b),

  /** Check if first is less than or equal to second */
  Lte: (a: FixedPoint, b: FixedPoint): boolean => a.lte(b),

  /** Check if first is greater than second */
  Gt: (a: FixedPoint, b: FixedPoint): boolean => a.gt(b),

  /** Check if first is greater than or equal to second */
  Gte: (a: FixedPoint, b: FixedPoint): boolean => a.gte(b),

  // ============ Interpolation & Clamping ============

  /**
   * Linear interpolation between two values
   * @param a - Start value
   * @param b - End value
   * @param t - Interpolation factor (0-1)
   */
  Lerp: (a: FixedPoint, b: FixedPoint, t: FixedPoint): FixedPoint => {
    return a.add(b.sub(a).mul(t));
  },

  /** Clamp a value between min and max */
  Clamp: (
    value: FixedPoint,
    min: FixedPoint,
    max: FixedPoint
  ): FixedPoint => {
    return FP.Min(FP.Max(value, min), max);
  },

  // ============ Trigonometry ============

  /**
   * Sine from a 10-term Taylor series (deterministic)
   * Note: Input should be in radians. No range reduction is done, so
   * accuracy falls off quickly beyond [-PI, PI].
   */
  Sin: (x: FixedPoint): FixedPoint => {
    if (x.isNaN()) return FixedPoint.NaN;
    return taylorSeries(x, FixedPoint.Zero, SIN_COEFFICIENTS);
  },

  /**
   * Cosine from a 10-term Taylor series (deterministic)
   * Note: Input should be in radians
   */
  Cos: (x: FixedPoint): FixedPoint => {
    if (x.isNaN()) return FixedPoint.NaN;
    return taylorSeries(x, FixedPoint.One, COS_COEFFICIENTS);
  },

  /** Tangent as Sin / Cos; a zero cosine follows the division rules */
  Tan: (x: FixedPoint): FixedPoint => {
    return FP.Sin(x).div(FP.Cos(x));
  },
});

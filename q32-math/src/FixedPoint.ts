/**
 * Q32.32 Fixed-Point Number
 *
 * A 64-bit signed raw value read as `raw / 2^32`. Every operation works on
 * the raw integer only, so identical inputs give bit-identical outputs on any
 * JavaScript engine.
 *
 * Three raw encodings are reserved for special values and never produced by
 * finite arithmetic except through wraparound at the range edges:
 * - NaN: `-2^63`
 * - NegativeInfinity: `-2^63 + 1`
 * - PositiveInfinity: `2^63 - 1`
 *
 * @example
 * ```typescript
 * import { FixedPoint } from 'q32-math';
 *
 * const a = FixedPoint.fromInt(7);
 * const b = FixedPoint.fromInt(2);
 *
 * a.div(b).toFloat(); // 3.5
 * a.div(FixedPoint.Zero).eq(FixedPoint.PositiveInfinity); // true
 * ```
 */

import { checkFloatConversion } from './DeterminismGuard.js';

// ============ Bit Layout ============

/** Number of fractional bits */
export const FRACTION_BITS = 32;

/** Total width of the raw value */
export const RAW_BITS = 64;

const SHIFT = BigInt(FRACTION_BITS);
const ONE_RAW = 1n << SHIFT;
const HALF_RAW = ONE_RAW >> 1n;
const FRACTION_MASK = ONE_RAW - 1n;
const SIGN_BIT = 1n << 63n;
const UINT64_MASK = (1n << 64n) - 1n;

const NAN_RAW = -(1n << 63n);
const NEGATIVE_INFINITY_RAW = NAN_RAW + 1n;
const POSITIVE_INFINITY_RAW = (1n << 63n) - 1n;
const MAX_RAW = POSITIVE_INFINITY_RAW - 2n;
const MIN_RAW = NAN_RAW + 2n;

/** 2^32 as a float, used only at the float boundary */
const ONE_FLOAT = 4294967296;

/** One quotient bit per dividend bit, plus the fractional width */
const DIVISION_STEPS = RAW_BITS + FRACTION_BITS;

/** Reinterpret any bigint as a signed 64-bit value (native wraparound) */
const wrap = (raw: bigint): bigint => BigInt.asIntN(RAW_BITS, raw);

const isInfiniteRaw = (raw: bigint): boolean =>
  raw === POSITIVE_INFINITY_RAW || raw === NEGATIVE_INFINITY_RAW;

/**
 * Restoring binary long division of two unsigned 64-bit magnitudes.
 *
 * The dividend is shifted out bit by bit into the remainder; after the first
 * 64 steps it is exhausted and the remaining 32 steps shift in zeros, which
 * leaves the quotient scaled by 2^32. The quotient keeps only its low 64 bits.
 */
function longDivide(dividend: bigint, divisor: bigint): bigint {
  let bits = dividend;
  let remainder = 0n;
  let quotient = 0n;

  for (let i = 0; i < DIVISION_STEPS; i++) {
    const topBit = bits & SIGN_BIT;
    bits = (bits << 1n) & UINT64_MASK;
    remainder = (remainder << 1n) & UINT64_MASK;
    if (topBit !== 0n) {
      remainder |= 1n;
    }

    quotient = (quotient << 1n) & UINT64_MASK;
    if (remainder >= divisor) {
      quotient |= 1n;
      remainder -= divisor;
    }
  }

  return quotient;
}

export class FixedPoint {
  private readonly raw: bigint;

  private constructor(raw: bigint) {
    this.raw = raw;
  }

  // ============ Special Values ============

  static readonly NaN = new FixedPoint(NAN_RAW);
  static readonly PositiveInfinity = new FixedPoint(POSITIVE_INFINITY_RAW);
  static readonly NegativeInfinity = new FixedPoint(NEGATIVE_INFINITY_RAW);

  /** Largest finite value */
  static readonly MaxValue = new FixedPoint(MAX_RAW);

  /** Smallest finite value */
  static readonly MinValue = new FixedPoint(MIN_RAW);

  // ============ Constants ============

  static readonly Zero = new FixedPoint(0n);
  static readonly One = new FixedPoint(ONE_RAW);
  static readonly Half = new FixedPoint(HALF_RAW);

  /** Smallest nonzero magnitude, 2^-32 */
  static readonly Precision = new FixedPoint(1n);

  /** Derived from the decimal 3.1415926, not the exact constant */
  static readonly Pi = FixedPoint.fromFloat(3.1415926);

  /** Derived from the single-precision literal 57.29578 */
  static readonly Rad2Deg = FixedPoint.fromFloat(Math.fround(57.29578));

  /** Derived from the single-precision literal 0.01745 */
  static readonly Deg2Rad = FixedPoint.fromFloat(Math.fround(0.01745));

  // ============ Creation ============

  /**
   * Wrap a raw Q32.32 value without validation.
   *
   * Sentinel and out-of-range encodings are accepted as-is. A bigint wider
   * than 64 bits is truncated to its low 64 bits, like a native cast.
   */
  static fromRaw(raw: bigint): FixedPoint {
    return new FixedPoint(wrap(raw));
  }

  /**
   * Create a fixed-point number from an integer.
   *
   * @throws RangeError if `value` is not an integer or `value * 2^32` does not
   * fit the finite raw range
   */
  static fromInt(value: number | bigint): FixedPoint {
    if (typeof value === 'number' && !Number.isInteger(value)) {
      throw new RangeError(`Cannot convert ${value} to fixed-point: not an integer`);
    }

    const raw = BigInt(value) << SHIFT;
    if (raw > MAX_RAW || raw < MIN_RAW) {
      throw new RangeError(`Cannot convert ${value} to fixed-point: out of range`);
    }
    return new FixedPoint(raw);
  }

  /**
   * Create a fixed-point number from a float, truncating toward zero.
   *
   * WARNING: this is the one conversion that depends on native float
   * arithmetic. Feeding it values computed with floats upstream breaks
   * determinism; inside runDeterministic() it follows the configured
   * `floatConversion` policy.
   *
   * `NaN` and `±Infinity` map to their sentinels.
   *
   * @throws RangeError if a finite `value` is outside the finite range
   */
  static fromFloat(value: number): FixedPoint {
    checkFloatConversion(value);

    if (Number.isNaN(value)) {
      return FixedPoint.NaN;
    }
    if (value === Number.POSITIVE_INFINITY) {
      return FixedPoint.PositiveInfinity;
    }
    if (value === Number.NEGATIVE_INFINITY) {
      return FixedPoint.NegativeInfinity;
    }

    const scaled = Math.trunc(value * ONE_FLOAT);
    if (!Number.isFinite(scaled)) {
      throw new RangeError(`Cannot convert ${value} to fixed-point: out of range`);
    }

    const raw = BigInt(scaled);
    if (raw > MAX_RAW || raw < MIN_RAW) {
      throw new RangeError(`Cannot convert ${value} to fixed-point: out of range`);
    }
    return new FixedPoint(raw);
  }

  // ============ Raw Access ============

  /** The 64-bit signed encoding, for snapshots and network messages */
  get rawValue(): bigint {
    return this.raw;
  }

  // ============ Predicates ============

  isNaN(): boolean {
    return this.raw === NAN_RAW;
  }

  isInfinity(): boolean {
    return isInfiniteRaw(this.raw);
  }

  isPositiveInfinity(): boolean {
    return this.raw === POSITIVE_INFINITY_RAW;
  }

  isNegativeInfinity(): boolean {
    return this.raw === NEGATIVE_INFINITY_RAW;
  }

  /** True for every encoding that is neither NaN nor an infinity */
  isFinite(): boolean {
    return !this.isNaN() && !this.isInfinity();
  }

  isZero(): boolean {
    return this.raw === 0n;
  }

  /** Sign test on the raw value; NaN and NegativeInfinity are negative */
  isNegative(): boolean {
    return this.raw < 0n;
  }

  // ============ Comparison ============

  // Any NaN operand makes every comparison false, so NaN is not even equal
  // to itself. ne() is the negation of eq() and therefore true for NaN.

  lt(other: FixedPoint): boolean {
    if (this.isNaN() || other.isNaN()) return false;
    return this.raw < other.raw;
  }

  gt(other: FixedPoint): boolean {
    if (this.isNaN() || other.isNaN()) return false;
    return this.raw > other.raw;
  }

  lte(other: FixedPoint): boolean {
    if (this.isNaN() || other.isNaN()) return false;
    return this.raw <= other.raw;
  }

  gte(other: FixedPoint): boolean {
    if (this.isNaN() || other.isNaN()) return false;
    return this.raw >= other.raw;
  }

  eq(other: FixedPoint): boolean {
    if (this.isNaN() || other.isNaN()) return false;
    return this.raw === other.raw;
  }

  ne(other: FixedPoint): boolean {
    return !this.eq(other);
  }

  // ============ Additive Operators ============

  /**
   * Add two values.
   *
   * +Inf + -Inf is NaN; otherwise an infinite operand wins. Finite sums wrap
   * around at 64 bits.
   */
  add(other: FixedPoint): FixedPoint {
    const a = this.raw;
    const b = other.raw;
    if (a === NAN_RAW || b === NAN_RAW) return FixedPoint.NaN;

    if (a === POSITIVE_INFINITY_RAW || b === POSITIVE_INFINITY_RAW) {
      return a === NEGATIVE_INFINITY_RAW || b === NEGATIVE_INFINITY_RAW
        ? FixedPoint.NaN
        : FixedPoint.PositiveInfinity;
    }
    if (a === NEGATIVE_INFINITY_RAW || b === NEGATIVE_INFINITY_RAW) {
      return FixedPoint.NegativeInfinity;
    }

    return new FixedPoint(wrap(a + b));
  }

  /**
   * Subtract `other` from this value.
   *
   * An infinite minuend wins unless the subtrahend is the same infinity
   * (NaN). A finite minuend minus an infinity gives the opposite infinity.
   * Finite differences wrap around at 64 bits.
   */
  sub(other: FixedPoint): FixedPoint {
    const a = this.raw;
    const b = other.raw;
    if (a === NAN_RAW || b === NAN_RAW) return FixedPoint.NaN;

    if (a === POSITIVE_INFINITY_RAW) {
      return b === POSITIVE_INFINITY_RAW ? FixedPoint.NaN : FixedPoint.PositiveInfinity;
    }
    if (a === NEGATIVE_INFINITY_RAW) {
      return b === NEGATIVE_INFINITY_RAW ? FixedPoint.NaN : FixedPoint.NegativeInfinity;
    }
    if (b === POSITIVE_INFINITY_RAW) return FixedPoint.NegativeInfinity;
    if (b === NEGATIVE_INFINITY_RAW) return FixedPoint.PositiveInfinity;

    return new FixedPoint(wrap(a - b));
  }

  /** Negate; the infinity encodings are each other's two's complement */
  neg(): FixedPoint {
    if (this.isNaN()) return FixedPoint.NaN;
    return new FixedPoint(wrap(-this.raw));
  }

  /**
   * Raw remainder; the sign follows the dividend.
   * A zero divisor gives NaN.
   */
  mod(other: FixedPoint): FixedPoint {
    if (this.isNaN() || other.isNaN() || other.raw === 0n) return FixedPoint.NaN;
    return new FixedPoint(this.raw % other.raw);
  }

  /** Absolute value using the sign mask: `(raw + mask) ^ mask` */
  abs(): FixedPoint {
    if (this.isNaN()) return FixedPoint.NaN;
    const mask = this.raw >> 63n;
    return new FixedPoint(wrap((this.raw + mask) ^ mask));
  }

  // ============ Multiplication ============

  /**
   * Multiply two values.
   *
   * Each operand is split into a signed integer part `i = raw >> 32` and an
   * unsigned fraction `f = raw & 0xFFFFFFFF`, so the product is assembled as
   * `((fa * fb) >> 32) + fa * ib + fb * ia + ((ia * ib) << 32)` without
   * needing a 128-bit intermediate. Overflow wraps at 64 bits.
   */
  mul(other: FixedPoint): FixedPoint {
    const a = this.raw;
    const b = other.raw;
    if (a === NAN_RAW || b === NAN_RAW) return FixedPoint.NaN;

    if (isInfiniteRaw(a) || isInfiniteRaw(b)) {
      if (a === 0n || b === 0n) return FixedPoint.NaN;
      return (a > 0n) === (b > 0n) ? FixedPoint.PositiveInfinity : FixedPoint.NegativeInfinity;
    }

    const fa = a & FRACTION_MASK;
    const ia = a >> SHIFT;
    const fb = b & FRACTION_MASK;
    const ib = b >> SHIFT;

    return new FixedPoint(
      wrap(((fa * fb) >> SHIFT) + fa * ib + fb * ia + ((ia * ib) << SHIFT))
    );
  }

  // ============ Division ============

  /**
   * Divide this value by `other`.
   *
   * - NaN operand or 0 / 0: NaN
   * - nonzero / 0: infinity with the sign of the dividend
   * - infinity / infinity: NaN; infinity / finite: signed infinity;
   *   finite / infinity: zero
   *
   * Finite operands go through {@link longDivide} on their magnitudes.
   */
  div(other: FixedPoint): FixedPoint {
    const a = this.raw;
    const b = other.raw;
    if (a === NAN_RAW || b === NAN_RAW || (a === 0n && b === 0n)) {
      return FixedPoint.NaN;
    }

    const sameSign = (a ^ b) >= 0n;
    if (b === 0n) {
      return sameSign ? FixedPoint.PositiveInfinity : FixedPoint.NegativeInfinity;
    }

    if (isInfiniteRaw(a)) {
      if (isInfiniteRaw(b)) return FixedPoint.NaN;
      return sameSign ? FixedPoint.PositiveInfinity : FixedPoint.NegativeInfinity;
    }
    if (isInfiniteRaw(b)) return FixedPoint.Zero;

    const quotient = longDivide(a < 0n ? -a : a, b < 0n ? -b : b);
    return new FixedPoint(wrap(sameSign ? quotient : -quotient));
  }

  // ============ Conversion ============

  /** Convert to a float for display. NaN becomes `Number.NaN`. */
  toFloat(): number {
    if (this.isNaN()) return Number.NaN;
    return Number(this.raw) / ONE_FLOAT;
  }

  /**
   * Integer part, truncated toward zero.
   * @throws RangeError for NaN
   */
  toInt(): number {
    if (this.isNaN()) {
      throw new RangeError('Cannot convert NaN to an integer');
    }
    return Number(this.raw / ONE_RAW);
  }

  /**
   * Round to the nearest integer, halves away from zero.
   * @throws RangeError for NaN
   */
  roundToInt(): number {
    let result = this.toInt();

    let fraction = this.raw & FRACTION_MASK;
    if (this.raw < 0n) {
      // two's-complement fraction bits of a negative value are 1 - |fraction|
      fraction = ~(fraction - 1n) & FRACTION_MASK;
    }

    if (fraction >= HALF_RAW) {
      result += this.raw >= 0n ? 1 : -1;
    }
    return result;
  }

  toString(): string {
    return String(this.toFloat());
  }
}

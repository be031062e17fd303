/**
 * DoubleInt - integer that survives a trip through an IEEE 754 double
 *
 * Wraps a signed 64-bit integer (held as a bigint) constrained to
 * [-(2^53), 2^53]. Serializes as the plain integer; see schema.ts and
 * document.ts for the deserialization side, which applies the same check.
 *
 * @example
 * ```ts
 * const result = DoubleInt.tryNew(42n);
 * if (result.success) {
 *   result.data.toNumber(); // 42
 * }
 *
 * DoubleInt.tryNew(2n ** 55n).success; // false
 * ```
 *
 * @module double-int
 */

import { isInRange } from './bounds.js';
import { OutOfRangeError } from './errors.js';

// --------------------------------------------------------------------------
// Types
// --------------------------------------------------------------------------

/** Outcome of a validating construction; same shape as zod's safeParse */
export type DoubleIntResult =
  | { success: true; data: DoubleInt }
  | { success: false; error: OutOfRangeError };

// --------------------------------------------------------------------------
// DoubleInt
// --------------------------------------------------------------------------

export class DoubleInt {
  /** The value 0 */
  static readonly ZERO: DoubleInt = new DoubleInt(0n);

  private constructor(private readonly raw: bigint) {
    Object.freeze(this);
  }

  /**
   * Validating constructor. The only construction path that can fail.
   */
  static tryNew(value: bigint): DoubleIntResult {
    if (!isInRange(value)) {
      return { success: false, error: new OutOfRangeError(value) };
    }
    return { success: true, data: new DoubleInt(value) };
  }

  /**
   * Construct without checking the bound.
   *
   * Only for call sites where the value is already known to be in range.
   * Passing anything else yields an instance that breaks the type's
   * invariant; untrusted input must go through {@link DoubleInt.tryNew}.
   */
  static newUnchecked(value: bigint): DoubleInt {
    return new DoubleInt(value);
  }

  /**
   * Conversion from a 64-bit integer.
   * @throws OutOfRangeError when the value is outside the bound
   */
  static from(value: bigint): DoubleInt {
    const result = DoubleInt.tryNew(value);
    if (!result.success) {
      throw result.error;
    }
    return result.data;
  }

  /**
   * Validating constructor for JS numbers.
   * @throws TypeError if `value` is not an integer (NaN, Infinity, fractions)
   */
  static fromNumber(value: number): DoubleIntResult {
    if (!Number.isInteger(value)) {
      throw new TypeError(`Expected an integer, got ${value}`);
    }
    return DoubleInt.tryNew(BigInt(value));
  }

  /** Ordering for Array.prototype.sort */
  static compare(a: DoubleInt, b: DoubleInt): -1 | 0 | 1 {
    return a.compare(b);
  }

  /** The underlying integer, unchanged */
  value(): bigint {
    return this.raw;
  }

  /** Exact for every in-range instance */
  toNumber(): number {
    return Number(this.raw);
  }

  /**
   * Structural equality. Raw integers compare by value; a number that is
   * not an integer never equals a DoubleInt.
   */
  equals(other: DoubleInt | bigint | number): boolean {
    if (other instanceof DoubleInt) {
      return this.raw === other.raw;
    }
    if (typeof other === 'bigint') {
      return this.raw === other;
    }
    return Number.isInteger(other) && this.raw === BigInt(other);
  }

  /** -1 (this < other), 0 (equal), 1 (this > other) */
  compare(other: DoubleInt): -1 | 0 | 1 {
    if (this.raw < other.raw) return -1;
    if (this.raw > other.raw) return 1;
    return 0;
  }

  /** JSON.stringify emits the plain integer */
  toJSON(): number {
    return this.toNumber();
  }

  toString(): string {
    return this.raw.toString();
  }
}

/** Type guard for DoubleInt instances */
export function isDoubleInt(value: unknown): value is DoubleInt {
  return value instanceof DoubleInt;
}

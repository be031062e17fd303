/**
 * Double-int bounds
 *
 * 2^53 is the largest magnitude at which consecutive integers stay
 * distinguishable in an IEEE 754 double. Both endpoints are themselves
 * exact doubles, so the range is inclusive.
 *
 * @see https://spec.openapis.org/registry/format/double-int
 * @module bounds
 */

/** Smallest valid value: -(2^53) */
export const DOUBLE_INT_MIN = -(2n ** 53n);

/** Largest valid value: 2^53 */
export const DOUBLE_INT_MAX = 2n ** 53n;

/** Format name in the OpenAPI format registry */
export const DOUBLE_INT_FORMAT = 'double-int';

/** Inclusive range check against {@link DOUBLE_INT_MIN} and {@link DOUBLE_INT_MAX} */
export function isInRange(value: bigint): boolean {
  return value >= DOUBLE_INT_MIN && value <= DOUBLE_INT_MAX;
}

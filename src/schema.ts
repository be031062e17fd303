/**
 * Zod integration
 *
 * DoubleIntSchema drops into any z.object() as a field type. Input is the
 * plain integer a parser produced (number, or bigint for integers the
 * precise YAML/JSON schemas kept exact); output is a validated DoubleInt.
 *
 * @module schema
 */

import { z } from 'zod';
import { DOUBLE_INT_FORMAT, DOUBLE_INT_MAX, DOUBLE_INT_MIN } from './bounds.js';
import { DoubleInt } from './double-int.js';
import { FLOAT_LITERAL_ISSUE, FloatLiteral } from './float-literal.js';

// --------------------------------------------------------------------------
// Schema
// --------------------------------------------------------------------------

/**
 * Zod schema for a double-int field.
 *
 * Out-of-range values produce a custom issue carrying the OutOfRangeError
 * message, so callers see the offending value and the bound. A FloatLiteral
 * is refused whatever its value: a float scalar is not a 64-bit integer.
 */
export const DoubleIntSchema = z
  .union([z.bigint(), z.number().int(), z.instanceof(FloatLiteral)])
  .transform((raw, ctx) => {
    if (raw instanceof FloatLiteral) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Expected an integer, got float literal ${raw.source}`,
        params: { code: FLOAT_LITERAL_ISSUE, value: raw.source },
      });
      return z.NEVER;
    }
    const result = DoubleInt.tryNew(BigInt(raw));
    if (!result.success) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: result.error.message,
        params: {
          code: result.error.code,
          value: result.error.value.toString(),
        },
      });
      return z.NEVER;
    }
    return result.data;
  });

// --------------------------------------------------------------------------
// Types
// --------------------------------------------------------------------------

/** Accepted input: what a document parser hands over */
export type DoubleIntInput = z.input<typeof DoubleIntSchema>;

// --------------------------------------------------------------------------
// OpenAPI
// --------------------------------------------------------------------------

/**
 * OpenAPI / JSON Schema descriptor for a double-int field.
 * Bounds are plain numbers; both are exact doubles.
 */
export interface DoubleIntJsonSchema {
  type: 'integer';
  format: typeof DOUBLE_INT_FORMAT;
  minimum: number;
  maximum: number;
}

export function doubleIntJsonSchema(): DoubleIntJsonSchema {
  return {
    type: 'integer',
    format: DOUBLE_INT_FORMAT,
    minimum: Number(DOUBLE_INT_MIN),
    maximum: Number(DOUBLE_INT_MAX),
  };
}

/**
 * DoubleIntSchema Tests
 *
 * Zod field validation and the OpenAPI descriptor.
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { DoubleIntSchema, doubleIntJsonSchema } from '../schema.js';
import { DoubleInt } from '../double-int.js';
import { FloatLiteral } from '../float-literal.js';

const CounterSchema = z.object({
  count: DoubleIntSchema,
});

describe('DoubleIntSchema', () => {
  it('should accept integer numbers', () => {
    const result = DoubleIntSchema.safeParse(42);
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data).toBeInstanceOf(DoubleInt);
      expect(result.data.value()).toBe(42n);
    }
  });

  it('should accept bigints at the endpoints', () => {
    expect(DoubleIntSchema.parse(9007199254740992n).value()).toBe(9007199254740992n);
    expect(DoubleIntSchema.parse(-9007199254740992n).value()).toBe(-9007199254740992n);
  });

  it('should reject bigints one past the bound with the range message', () => {
    const result = DoubleIntSchema.safeParse(9007199254740993n);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues).toHaveLength(1);
      expect(result.error.issues[0]?.code).toBe('custom');
      expect(result.error.issues[0]?.message).toBe(
        'Integer 9007199254740993 is outside the double-int range [-9007199254740992, 9007199254740992]'
      );
    }
  });

  it('should reject numbers beyond 2^53', () => {
    expect(DoubleIntSchema.safeParse(2 ** 55).success).toBe(false);
  });

  it('should reject non-integers and non-numbers', () => {
    expect(DoubleIntSchema.safeParse(4.2).success).toBe(false);
    expect(DoubleIntSchema.safeParse('42').success).toBe(false);
    expect(DoubleIntSchema.safeParse(null).success).toBe(false);
    expect(DoubleIntSchema.safeParse(Number.POSITIVE_INFINITY).success).toBe(false);
  });

  it('should refuse float literals even when their value is an integer', () => {
    const result = DoubleIntSchema.safeParse(new FloatLiteral('42.0', 42));
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe('Expected an integer, got float literal 42.0');
    }
  });

  it('should report the field path when nested', () => {
    const result = CounterSchema.safeParse({ count: 2n ** 55n });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(['count']);
    }
  });

  it('should compose with optional()', () => {
    const schema = z.object({ limit: DoubleIntSchema.optional() });
    expect(schema.parse({}).limit).toBeUndefined();
    expect(schema.parse({ limit: 5 }).limit?.value()).toBe(5n);
  });
});

describe('doubleIntJsonSchema', () => {
  it('should describe an integer with the double-int format and bounds', () => {
    expect(doubleIntJsonSchema()).toEqual({
      type: 'integer',
      format: 'double-int',
      minimum: -9007199254740992,
      maximum: 9007199254740992,
    });
  });
});

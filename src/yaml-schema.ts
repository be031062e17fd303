/**
 * Precise js-yaml schemas
 *
 * The stock js-yaml int type builds every integer with parseInt, so
 * 9007199254740993 silently loads as 9007199254740992 and would pass the
 * double-int check. The int type below keeps integers outside the safe
 * range as bigint, and dumps DoubleInt, bigint and integer numbers as plain
 * integer scalars.
 *
 * Only decimal literals are integers here; hex, octal and binary forms
 * load as strings.
 *
 * The marking schemas additionally load every float scalar as a
 * FloatLiteral. The document layer validates against them in a second pass
 * to find DoubleInt fields written as floats.
 *
 * @module yaml-schema
 */

import * as yaml from 'js-yaml';
import { DoubleInt } from './double-int.js';
import { FloatLiteral } from './float-literal.js';

const DECIMAL_INT = /^[-+]?(?:0|[1-9][0-9]*)$/;

// YAML 1.2 core float, as js-yaml resolves it
const YAML_FLOAT =
  /^(?:[-+]?(?:[0-9][0-9_]*)(?:\.[0-9_]*)?(?:[eE][-+]?[0-9]+)?|\.[0-9_]+(?:[eE][-+]?[0-9]+)?|[-+]?\.(?:inf|Inf|INF)|\.(?:nan|NaN|NAN))$/;

const MIN_SAFE = BigInt(Number.MIN_SAFE_INTEGER);
const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);

function isIntegerValue(data: unknown): boolean {
  if (data instanceof DoubleInt || typeof data === 'bigint') {
    return true;
  }
  return typeof data === 'number' && Number.isInteger(data) && !Object.is(data, -0);
}

/** Safe integers load as number, anything wider as bigint */
function constructInteger(data: string): number | bigint {
  const value = BigInt(data);
  return value >= MIN_SAFE && value <= MAX_SAFE ? Number(value) : value;
}

function representInteger(data: unknown): string {
  return String(data);
}

/** Replaces tag:yaml.org,2002:int in the schemas it extends */
export const PreciseIntType = new yaml.Type('tag:yaml.org,2002:int', {
  kind: 'scalar',
  resolve: (data: unknown) => typeof data === 'string' && DECIMAL_INT.test(data),
  construct: constructInteger,
  predicate: isIntegerValue,
  represent: representInteger,
});

/** YAML 1.2 core schema with precise integers */
export const DOUBLE_INT_YAML_SCHEMA = yaml.CORE_SCHEMA.extend({ implicit: [PreciseIntType] });

/** JSON schema with precise integers; reads JSON text through js-yaml */
export const DOUBLE_INT_JSON_SCHEMA = yaml.JSON_SCHEMA.extend({ implicit: [PreciseIntType] });

// --------------------------------------------------------------------------
// Float marking
// --------------------------------------------------------------------------

function floatValue(source: string): number {
  const text = source.replace(/_/g, '').toLowerCase();
  if (text === '.nan') return Number.NaN;
  if (text.endsWith('.inf')) {
    return text.startsWith('-') ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
  }
  return Number(text);
}

/** Replaces tag:yaml.org,2002:float; loads floats as FloatLiteral */
export const MarkedFloatType = new yaml.Type('tag:yaml.org,2002:float', {
  kind: 'scalar',
  resolve: (data: unknown) =>
    typeof data === 'string' && YAML_FLOAT.test(data) && !data.endsWith('_'),
  construct: (data: string) => new FloatLiteral(data, floatValue(data)),
  predicate: (data: unknown) => data instanceof FloatLiteral,
  represent: (data: unknown) => (data instanceof FloatLiteral ? data.source : String(data)),
});

/** DOUBLE_INT_YAML_SCHEMA with float scalars marked */
export const FLOAT_MARKING_YAML_SCHEMA = DOUBLE_INT_YAML_SCHEMA.extend({
  implicit: [MarkedFloatType],
});

/** DOUBLE_INT_JSON_SCHEMA with float scalars marked */
export const FLOAT_MARKING_JSON_SCHEMA = DOUBLE_INT_JSON_SCHEMA.extend({
  implicit: [MarkedFloatType],
});

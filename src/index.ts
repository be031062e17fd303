/**
 * double-int
 *
 * Integer type whose values are exactly representable as IEEE 754 doubles
 * (|value| <= 2^53), with Zod, JSON and YAML integration that validates on
 * the way in and writes a plain integer on the way out.
 */

export {
  DOUBLE_INT_MIN,
  DOUBLE_INT_MAX,
  DOUBLE_INT_FORMAT,
  isInRange,
} from './bounds.js';
export { DoubleInt, isDoubleInt, type DoubleIntResult } from './double-int.js';
export {
  OutOfRangeError,
  DocumentError,
  DocumentErrorCode,
  type DocumentErrorDetail,
} from './errors.js';
export {
  DoubleIntSchema,
  doubleIntJsonSchema,
  type DoubleIntInput,
  type DoubleIntJsonSchema,
} from './schema.js';
export { FloatLiteral, FLOAT_LITERAL_ISSUE } from './float-literal.js';
export {
  PreciseIntType,
  MarkedFloatType,
  DOUBLE_INT_YAML_SCHEMA,
  DOUBLE_INT_JSON_SCHEMA,
  FLOAT_MARKING_YAML_SCHEMA,
  FLOAT_MARKING_JSON_SCHEMA,
} from './yaml-schema.js';
export {
  parseDocument,
  safeParseDocument,
  serializeDocument,
  DocumentFormatSchema,
  DocumentOptionsSchema,
  type DocumentFormat,
  type DocumentOptions,
  type DocumentSettings,
  type ParseDocumentResult,
} from './document.js';
export { createLogger, defaultLogger, type LoggerOptions } from './logger.js';

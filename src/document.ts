/**
 * Document Parsing - JSON/YAML Deserialization and Serialization
 *
 * Parses documents with the precise js-yaml schemas, then validates them
 * against a caller-supplied Zod schema. A DoubleIntSchema field anywhere in
 * that schema enforces the double-int bound at this point; a violation is
 * reported as a DocumentError with code VALIDATION_ERROR.
 *
 * Float scalars are never DoubleInts: `count: 42.0` and
 * `count: 9007199254740993.0` fail even though their doubles are integers.
 *
 * Serialization is transparent: DoubleInt fields come out as plain integers.
 *
 * @module document
 */

import * as yaml from 'js-yaml';
import { z } from 'zod';
import type { Logger } from 'pino';
import { DocumentError, DocumentErrorCode, type DocumentErrorDetail } from './errors.js';
import { defaultLogger } from './logger.js';
import { FLOAT_LITERAL_ISSUE } from './float-literal.js';
import {
  DOUBLE_INT_JSON_SCHEMA,
  DOUBLE_INT_YAML_SCHEMA,
  FLOAT_MARKING_JSON_SCHEMA,
  FLOAT_MARKING_YAML_SCHEMA,
} from './yaml-schema.js';

// ============================================================================
// Options
// ============================================================================

export const DocumentFormatSchema = z.enum(['json', 'yaml']);

export type DocumentFormat = z.infer<typeof DocumentFormatSchema>;

/**
 * Document options, validated on every call
 */
export const DocumentOptionsSchema = z.object({
  /** Input/output format (default: yaml) */
  format: DocumentFormatSchema.default('yaml'),
  /** Indentation width; 0 writes compact JSON (default: 2) */
  indent: z.number().int().min(0).max(8).default(2),
  /** YAML line width, -1 for unlimited (default: 100) */
  lineWidth: z.number().int().min(-1).default(100),
  /** Name shown in syntax error messages */
  filename: z.string().min(1).optional(),
});

export type DocumentSettings = z.output<typeof DocumentOptionsSchema>;

export type DocumentOptions = z.input<typeof DocumentOptionsSchema> & {
  /** Logger instance (default: silent package logger) */
  logger?: Logger;
};

/**
 * Parse result: validated data or the reason it was rejected
 */
export type ParseDocumentResult<T> =
  | { success: true; data: T }
  | { success: false; error: DocumentError };

function resolveOptions(options: DocumentOptions): { settings: DocumentSettings; logger: Logger } {
  const { logger, ...rest } = options;
  return {
    settings: DocumentOptionsSchema.parse(rest),
    logger: logger ?? defaultLogger,
  };
}

// ============================================================================
// Parsing
// ============================================================================

/**
 * Read raw data from text. JSON is checked with JSON.parse first so that
 * YAML-only syntax is not accepted as JSON; values then come from js-yaml,
 * which keeps wide integers exact. With `markFloats`, float scalars load as
 * FloatLiteral.
 */
function loadRaw(content: string, settings: DocumentSettings, markFloats = false): unknown {
  if (settings.format === 'json') {
    JSON.parse(content);
    return yaml.load(content, {
      schema: markFloats ? FLOAT_MARKING_JSON_SCHEMA : DOUBLE_INT_JSON_SCHEMA,
      json: true,
      filename: settings.filename,
    });
  }
  return yaml.load(content, {
    schema: markFloats ? FLOAT_MARKING_YAML_SCHEMA : DOUBLE_INT_YAML_SCHEMA,
    filename: settings.filename,
  });
}

/**
 * Second pass over a document that already validated: re-read it with float
 * scalars marked and keep only the issues DoubleIntSchema raises for them.
 * Other fields may fail this pass too (a z.number() field given a marker);
 * those issues are dropped.
 */
function floatLiteralIssues(
  content: string,
  schema: z.ZodTypeAny,
  settings: DocumentSettings
): DocumentErrorDetail[] {
  const marked = schema.safeParse(loadRaw(content, settings, true));
  if (marked.success) {
    return [];
  }
  return marked.error.issues
    .filter(
      (issue) =>
        issue.code === z.ZodIssueCode.custom && issue.params?.code === FLOAT_LITERAL_ISSUE
    )
    .map((issue) => ({ message: issue.message, path: issue.path }));
}

function syntaxDetail(error: Error): DocumentErrorDetail {
  if (error instanceof yaml.YAMLException && error.mark) {
    return { message: error.reason, path: [`line ${error.mark.line + 1}`] };
  }
  return { message: error.message, path: [] };
}

/**
 * Parse and validate a document without throwing
 *
 * @param content - JSON or YAML text
 * @param schema - Zod schema the document must satisfy
 * @param options - Format and logging options
 */
export function safeParseDocument<S extends z.ZodTypeAny>(
  content: string,
  schema: S,
  options: DocumentOptions = {}
): ParseDocumentResult<z.output<S>> {
  const { settings, logger } = resolveOptions(options);
  logger.debug(
    { format: settings.format, bytes: Buffer.byteLength(content, 'utf8') },
    'Parsing document'
  );

  let raw: unknown;
  try {
    raw = loadRaw(content, settings);
  } catch (error) {
    if (!(error instanceof SyntaxError) && !(error instanceof yaml.YAMLException)) {
      throw error;
    }
    logger.debug({ format: settings.format }, 'Document syntax error');
    return {
      success: false,
      error: new DocumentError(
        `${settings.format === 'json' ? 'JSON' : 'YAML'} syntax error`,
        DocumentErrorCode.SYNTAX_ERROR,
        [syntaxDetail(error)]
      ),
    };
  }

  const parseResult = schema.safeParse(raw);
  const details: DocumentErrorDetail[] = parseResult.success
    ? floatLiteralIssues(content, schema, settings)
    : parseResult.error.issues.map((issue) => ({
        message: issue.message,
        path: issue.path,
      }));

  if (!parseResult.success || details.length > 0) {
    logger.debug({ format: settings.format, issues: details.length }, 'Document validation failed');
    return {
      success: false,
      error: new DocumentError(
        'Document validation failed',
        DocumentErrorCode.VALIDATION_ERROR,
        details
      ),
    };
  }

  return { success: true, data: parseResult.data };
}

/**
 * Parse and validate a document
 *
 * @param content - JSON or YAML text
 * @param schema - Zod schema the document must satisfy
 * @param options - Format and logging options
 * @returns Validated data
 * @throws DocumentError if parsing or validation fails
 */
export function parseDocument<S extends z.ZodTypeAny>(
  content: string,
  schema: S,
  options: DocumentOptions = {}
): z.output<S> {
  const result = safeParseDocument(content, schema, options);
  if (!result.success) {
    throw result.error;
  }
  return result.data;
}

// ============================================================================
// Serialization
// ============================================================================

// JSON.stringify cannot emit a bigint; the replacer writes it as a tagged
// string and the tag is stripped afterwards. JSON escapes the NUL, so the
// tag appears in the output as \u0000.
const BIGINT_TAG = '\u0000double-int:bigint:';
const TAGGED_BIGINT = /"\\u0000double-int:bigint:(-?[0-9]+)"/g;

function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? `${BIGINT_TAG}${value}` : value;
}

/**
 * Serialize a value to JSON or YAML
 *
 * DoubleInt fields and bigints are written as plain integers in both formats.
 */
export function serializeDocument(value: unknown, options: DocumentOptions = {}): string {
  const { settings, logger } = resolveOptions(options);
  logger.debug({ format: settings.format }, 'Serializing document');

  if (settings.format === 'json') {
    return JSON.stringify(value, bigintReplacer, settings.indent).replace(TAGGED_BIGINT, '$1');
  }

  return yaml.dump(value, {
    schema: DOUBLE_INT_YAML_SCHEMA,
    indent: settings.indent,
    lineWidth: settings.lineWidth,
    noRefs: true,
    sortKeys: false,
  });
}

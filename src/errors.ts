/**
 * Error types
 *
 * OutOfRangeError is the only failure of the value type itself.
 * DocumentError is how the document layer reports syntax and validation
 * failures, including out-of-range fields.
 *
 * @module errors
 */

import { DOUBLE_INT_MAX, DOUBLE_INT_MIN } from './bounds.js';

// ============================================================================
// Value errors
// ============================================================================

/**
 * Raised when a candidate integer falls outside [-(2^53), 2^53].
 */
export class OutOfRangeError extends Error {
  readonly code = 'DOUBLE_INT_OUT_OF_RANGE' as const;
  readonly min: bigint = DOUBLE_INT_MIN;
  readonly max: bigint = DOUBLE_INT_MAX;

  constructor(public readonly value: bigint) {
    super(
      `Integer ${value} is outside the double-int range [${DOUBLE_INT_MIN}, ${DOUBLE_INT_MAX}]`
    );
    this.name = 'OutOfRangeError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// ============================================================================
// Document errors
// ============================================================================

/**
 * Error codes for document parsing
 */
export enum DocumentErrorCode {
  /** JSON or YAML text could not be parsed */
  SYNTAX_ERROR = 'SYNTAX_ERROR',
  /** Parsed data did not match the schema */
  VALIDATION_ERROR = 'VALIDATION_ERROR',
}

/**
 * One problem found in a document
 */
export interface DocumentErrorDetail {
  /** Error message */
  message: string;
  /** Path to the problematic field */
  path: (string | number)[];
}

/**
 * Deserialization failure
 */
export class DocumentError extends Error {
  constructor(
    message: string,
    public readonly code: DocumentErrorCode,
    public readonly details: DocumentErrorDetail[] = []
  ) {
    super(message);
    this.name = 'DocumentError';
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Format error for display
   */
  format(): string {
    const lines = [`Error: ${this.message}`];

    if (this.details.length > 0) {
      lines.push('');
      lines.push('Details:');
      for (const detail of this.details) {
        const pathStr = detail.path.length > 0 ? ` at ${detail.path.join('.')}` : '';
        lines.push(`  - ${detail.message}${pathStr}`);
      }
    }

    return lines.join('\n');
  }
}

/**
 * Float literal marker
 *
 * A float scalar read from a document, kept with its source text. Only the
 * checking pass of the document layer produces these, so a DoubleInt field
 * can refuse `42.0` or `9007199254740993.0` instead of the rounded double.
 *
 * @module float-literal
 */

/** Issue code DoubleIntSchema attaches when it is fed a float literal */
export const FLOAT_LITERAL_ISSUE = 'DOUBLE_INT_FLOAT_LITERAL';

export class FloatLiteral {
  constructor(
    /** Scalar text as written in the document */
    readonly source: string,
    /** The double it reads as */
    readonly value: number
  ) {
    Object.freeze(this);
  }
}

/**
 * Feed-level failures. Anything raised from here aborts the whole run; record-level problems are
 * reported as diagnostics instead.
 */
export const FEED_ERROR_CODES = {
  UNSUPPORTED_FORMAT: "UNSUPPORTED_FORMAT",
  PARSE_ERROR: "PARSE_ERROR",
  INVALID_OPTIONS: "INVALID_OPTIONS",
} as const;

export type FeedErrorCode = (typeof FEED_ERROR_CODES)[keyof typeof FEED_ERROR_CODES];

export class FeedError extends Error {
  readonly code: FeedErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: FeedErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "FeedError";
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, FeedError.prototype);
  }
}

/**
 * Raised by record accessors when a field holds a list or mapping where a scalar is expected.
 * The orchestrator turns it into a warning for the field.
 */
export class FieldTypeError extends Error {
  readonly field: string;
  readonly actual: string;

  constructor(field: string, actual: string) {
    super(`${field} has unexpected type (${actual})`);
    this.name = "FieldTypeError";
    this.field = field;
    this.actual = actual;
    Object.setPrototypeOf(this, FieldTypeError.prototype);
  }
}

/**
 * Response parser error types.
 *
 * API-level errors (status >= 301) are never raised: they are returned as
 * ordinary parse results carrying an `Error` member. The errors below are
 * reserved for input the parsers cannot decode.
 *
 * @module error
 */

/**
 * Parser error kinds.
 */
export type ResponseParserErrorKind =
  | 'DecodeError' // Body violates the shape (unknown map tag, bad number, ...)
  | 'MalformedBody' // Body is not well-formed XML/JSON
  | 'UnsupportedBody' // Body type not supported by the protocol
  | 'UnknownProtocol' // No parser registered for the protocol identifier
  | 'Configuration' // Invalid parser configuration
  | 'InvalidTimestamp'; // Timestamp value cannot be converted

/**
 * Error raised when a response cannot be parsed.
 *
 * @example
 * ```typescript
 * throw new ResponseParserError({
 *   kind: 'DecodeError',
 *   message: 'Unknown tag in map entry: Extra',
 * });
 * ```
 */
export class ResponseParserError extends Error {
  /**
   * Error kind identifying the failure.
   */
  public readonly kind: ResponseParserErrorKind;

  /**
   * Protocol identifier of the parser that failed, when known.
   */
  public readonly protocol?: string;

  /**
   * HTTP status code of the response being parsed, when known.
   */
  public readonly statusCode?: number;

  constructor(options: {
    kind: ResponseParserErrorKind;
    message: string;
    protocol?: string;
    statusCode?: number;
    cause?: unknown;
  }) {
    super(options.message, { cause: options.cause });
    this.name = 'ResponseParserError';
    this.kind = options.kind;
    this.protocol = options.protocol;
    this.statusCode = options.statusCode;

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }

    Object.setPrototypeOf(this, ResponseParserError.prototype);
  }

  /**
   * Check whether an unknown value is a parser error, optionally of a given kind.
   */
  static is(error: unknown, kind?: ResponseParserErrorKind): error is ResponseParserError {
    return error instanceof ResponseParserError && (kind === undefined || error.kind === kind);
  }

  /**
   * Copy of this error annotated with the protocol and status code of the
   * response being parsed. Existing annotations win.
   */
  withContext(protocol: string, statusCode: number): ResponseParserError {
    return new ResponseParserError({
      kind: this.kind,
      message: this.message,
      protocol: this.protocol ?? protocol,
      statusCode: this.statusCode ?? statusCode,
      cause: this.cause,
    });
  }

  /**
   * Returns a string representation of the error
   */
  toString(): string {
    let result = `[${this.kind}] ${this.message}`;
    if (this.protocol) {
      result += ` (protocol ${this.protocol})`;
    }
    if (this.statusCode !== undefined) {
      result += ` (HTTP ${this.statusCode})`;
    }
    return result;
  }

  /**
   * Returns a JSON representation of the error
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
      protocol: this.protocol,
      statusCode: this.statusCode,
    };
  }
}

/**
 * Build a decode error.
 */
export function decodeError(message: string, cause?: unknown): ResponseParserError {
  return new ResponseParserError({ kind: 'DecodeError', message, cause });
}

/**
 * Build a malformed-body error from a tokenizer failure.
 */
export function malformedBody(format: 'XML' | 'JSON', cause: unknown): ResponseParserError {
  const detail = cause instanceof Error ? cause.message : String(cause);
  return new ResponseParserError({
    kind: 'MalformedBody',
    message: `Failed to parse ${format}: ${detail}`,
    cause,
  });
}

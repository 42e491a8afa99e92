/**
 * src/core/errors.ts
 * Reasons a request head can be definitively rejected.
 */

export enum ParseErrorKind {
  InvalidMethod = 'INVALID_METHOD',
  InvalidPath = 'INVALID_PATH',
  InvalidVersion = 'INVALID_VERSION',
  InvalidHeaderName = 'INVALID_HEADER_NAME',
  InvalidHeaderValue = 'INVALID_HEADER_VALUE',
  MissingColon = 'MISSING_COLON',
  NewLine = 'INVALID_NEW_LINE',
  TooManyHeaders = 'TOO_MANY_HEADERS',
}

const DESCRIPTIONS: Record<ParseErrorKind, string> = {
  [ParseErrorKind.InvalidMethod]: 'invalid method token',
  [ParseErrorKind.InvalidPath]: 'invalid request target',
  [ParseErrorKind.InvalidVersion]: 'invalid HTTP version',
  [ParseErrorKind.InvalidHeaderName]: 'invalid header name',
  [ParseErrorKind.InvalidHeaderValue]: 'invalid header value',
  [ParseErrorKind.MissingColon]: 'missing colon after header name',
  [ParseErrorKind.NewLine]: 'invalid new line',
  [ParseErrorKind.TooManyHeaders]: 'too many headers',
};

/**
 * A protocol violation that no amount of additional input can repair. The connection
 * that produced it should be answered with `statusCode` and closed.
 */
export class HttpParseError extends Error {
  constructor(
    public readonly kind: ParseErrorKind,
    /** Offset of the offending byte from the start of the parsed buffer. */
    public readonly offset: number,
  ) {
    super(`${DESCRIPTIONS[kind]} at byte ${offset}`);
    this.name = 'HttpParseError';
  }

  get description(): string {
    return DESCRIPTIONS[this.kind];
  }

  get statusCode(): 400 | 431 {
    return this.kind === ParseErrorKind.TooManyHeaders ? 431 : 400;
  }
}

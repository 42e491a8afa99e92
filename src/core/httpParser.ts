/**
 * src/core/httpParser.ts
 * Incremental, zero-copy parsing of an HTTP/1.x request line and header block.
 *
 * Nothing is carried between calls. When a parse reports `partial`, append the next chunk
 * to the same buffer and parse it again from byte zero; the result is identical to parsing
 * the grown buffer in one go.
 */
import { Bytes, Span, toBuffer } from './bytes';
import { ParseErrorKind } from './errors';
import { complete, fail, PARTIAL, ParseResult } from './status';
import { isHeaderNameToken, isHeaderValueToken, isMethodToken, isUriToken } from './tokens';
import { HeaderList } from '../entities/http';

const SP = 0x20;
const HTAB = 0x09;
const CR = 0x0d;
const LF = 0x0a;
const COLON = 0x3a;
const VERSION_PREFIX = Buffer.from('HTTP/1.', 'latin1');

export interface ParserConfig {
  /** Accept runs of spaces between method, target and version. */
  allowMultipleSpacesInRequestLineDelimiters?: boolean;
  /**
   * Skip a header line with a bad name, missing colon or bad value byte instead of
   * rejecting the request. Broken line endings are still rejected.
   */
  ignoreInvalidHeaders?: boolean;
}

export type HttpMinorVersion = 0 | 1;

/**
 * A request head being parsed. Fields fill left to right; after a `partial` or `error`
 * result the ones already reached stay set, so a caller can look at the method and path
 * before the headers have arrived.
 *
 * @example
 * const req = new Request(new HeaderList(16));
 * const res = req.parse(Buffer.from('GET /404 HTTP/1.1\r\nHost:'));
 * // res.status === 'partial', req.path === '/404'
 */
export class Request {
  method?: string;
  path?: string;
  version?: HttpMinorVersion;

  constructor(public readonly headers: HeaderList) {}

  /**
   * Parses `buffer` from its first byte, replacing whatever an earlier call left here.
   * A complete result carries the number of bytes making up the head; anything after that
   * belongs to the body or the next request.
   */
  parse(buffer: Uint8Array, config: ParserConfig = {}): ParseResult<number> {
    return parseRequest(buffer, this, config);
  }

  reset(): void {
    this.method = undefined;
    this.path = undefined;
    this.version = undefined;
    this.headers.clear();
  }
}

export function parseRequest(
  buffer: Uint8Array,
  request: Request,
  config: ParserConfig = {},
): ParseResult<number> {
  request.reset();
  const bytes = new Bytes(toBuffer(buffer));

  const blank = skipEmptyLines(bytes);
  if (blank.status !== 'complete') return blank;

  const method = parseMethod(bytes);
  if (method.status !== 'complete') return method;
  request.method = method.value;

  if (config.allowMultipleSpacesInRequestLineDelimiters) {
    const spaces = skipSpaces(bytes);
    if (spaces.status !== 'complete') return spaces;
  }

  const path = parseUri(bytes);
  if (path.status !== 'complete') return path;
  request.path = path.value;

  if (config.allowMultipleSpacesInRequestLineDelimiters) {
    const spaces = skipSpaces(bytes);
    if (spaces.status !== 'complete') return spaces;
  }

  const version = parseVersion(bytes);
  if (version.status !== 'complete') return version;
  request.version = version.value;
  const eol = parseNewline(bytes, ParseErrorKind.InvalidVersion);
  if (eol.status !== 'complete') return eol;

  const headers = parseHeaderLines(bytes, request.headers, config);
  if (headers.status !== 'complete') return headers;
  return complete(bytes.position);
}

/**
 * Parses a bare header block, such as the trailer section after a chunked body, up to and
 * including the blank line that ends it. `headers` is cleared first.
 */
export function parseHeaders(
  buffer: Uint8Array,
  headers: HeaderList,
  config: ParserConfig = {},
): ParseResult<number> {
  headers.clear();
  const bytes = new Bytes(toBuffer(buffer));
  const result = parseHeaderLines(bytes, headers, config);
  if (result.status !== 'complete') return result;
  return complete(bytes.position);
}

/** Consumes any `\n` / `\r\n` lines ahead of the request line. */
export function skipEmptyLines(bytes: Bytes): ParseResult<void> {
  for (;;) {
    const b = bytes.peek();
    if (b === undefined) return PARTIAL;
    if (b === CR) {
      bytes.bump();
      const next = bytes.next();
      if (next === undefined) return PARTIAL;
      if (next !== LF) return fail(ParseErrorKind.NewLine, bytes.position - 1);
    } else if (b === LF) {
      bytes.bump();
    } else {
      bytes.mark();
      return complete(undefined);
    }
  }
}

export function skipSpaces(bytes: Bytes): ParseResult<void> {
  for (;;) {
    const b = bytes.peek();
    if (b === undefined) return PARTIAL;
    if (b !== SP) {
      bytes.mark();
      return complete(undefined);
    }
    bytes.bump();
  }
}

// Method: one or more token bytes, then a single SP that is consumed.
function parseMethod(bytes: Bytes): ParseResult<string> {
  const first = bytes.peek();
  if (first === undefined) return PARTIAL;
  if (!isMethodToken(first)) return fail(ParseErrorKind.InvalidMethod, bytes.position);
  bytes.mark();
  bytes.bump();
  for (;;) {
    const b = bytes.peek();
    if (b === undefined) return PARTIAL;
    if (b === SP) {
      const span = bytes.slice();
      bytes.bump();
      bytes.mark();
      return complete(bytes.text(span));
    }
    if (!isMethodToken(b)) return fail(ParseErrorKind.InvalidMethod, bytes.position);
    bytes.bump();
  }
}

// Request target: one or more URI bytes, then a single SP that is consumed.
function parseUri(bytes: Bytes): ParseResult<string> {
  const first = bytes.peek();
  if (first === undefined) return PARTIAL;
  if (!isUriToken(first)) return fail(ParseErrorKind.InvalidPath, bytes.position);
  bytes.mark();
  bytes.bump();
  for (;;) {
    const b = bytes.peek();
    if (b === undefined) return PARTIAL;
    if (b === SP) {
      const span = bytes.slice();
      bytes.bump();
      bytes.mark();
      return complete(bytes.text(span));
    }
    if (!isUriToken(b)) return fail(ParseErrorKind.InvalidPath, bytes.position);
    bytes.bump();
  }
}

/**
 * `HTTP/1.0` or `HTTP/1.1`, compared one byte at a time so that any matching prefix is
 * partial rather than an error.
 */
export function parseVersion(bytes: Bytes): ParseResult<HttpMinorVersion> {
  for (const expected of VERSION_PREFIX) {
    const b = bytes.peek();
    if (b === undefined) return PARTIAL;
    if (b !== expected) return fail(ParseErrorKind.InvalidVersion, bytes.position);
    bytes.bump();
  }
  const digit = bytes.peek();
  if (digit === undefined) return PARTIAL;
  if (digit !== 0x30 && digit !== 0x31) {
    return fail(ParseErrorKind.InvalidVersion, bytes.position);
  }
  bytes.bump();
  return complete(digit === 0x31 ? 1 : 0);
}

/**
 * Consumes `\r\n` or a bare `\n`. A `\r` followed by anything else is a broken line
 * ending; any other byte is reported as `otherwise`.
 */
function parseNewline(bytes: Bytes, otherwise: ParseErrorKind): ParseResult<void> {
  const b = bytes.peek();
  if (b === undefined) return PARTIAL;
  if (b === CR) {
    bytes.bump();
    const next = bytes.peek();
    if (next === undefined) return PARTIAL;
    if (next !== LF) return fail(ParseErrorKind.NewLine, bytes.position);
    bytes.bump();
  } else if (b === LF) {
    bytes.bump();
  } else {
    return fail(otherwise, bytes.position);
  }
  bytes.mark();
  return complete(undefined);
}

// Consumes the rest of a rejected header line, through its `\n`.
function skipLine(bytes: Bytes): ParseResult<void> {
  for (;;) {
    const b = bytes.next();
    if (b === undefined) return PARTIAL;
    if (b === LF) {
      bytes.mark();
      return complete(undefined);
    }
  }
}

function parseHeaderLines(
  bytes: Bytes,
  headers: HeaderList,
  config: ParserConfig,
): ParseResult<void> {
  headerLoop: for (;;) {
    const first = bytes.peek();
    if (first === undefined) return PARTIAL;
    if (first === CR || first === LF) {
      return parseNewline(bytes, ParseErrorKind.NewLine);
    }

    if (headers.full) return fail(ParseErrorKind.TooManyHeaders, bytes.position);

    // Name
    if (!isHeaderNameToken(first)) {
      if (!config.ignoreInvalidHeaders) {
        return fail(ParseErrorKind.InvalidHeaderName, bytes.position);
      }
      const skipped = skipLine(bytes);
      if (skipped.status !== 'complete') return skipped;
      continue;
    }
    bytes.mark();
    bytes.bump();
    for (;;) {
      const b = bytes.peek();
      if (b === undefined) return PARTIAL;
      if (b === COLON) break;
      if (isHeaderNameToken(b)) {
        bytes.bump();
        continue;
      }
      if (!config.ignoreInvalidHeaders) {
        const kind =
          b === SP || b === HTAB || b === CR || b === LF
            ? ParseErrorKind.MissingColon
            : ParseErrorKind.InvalidHeaderName;
        return fail(kind, bytes.position);
      }
      const skipped = skipLine(bytes);
      if (skipped.status !== 'complete') return skipped;
      continue headerLoop;
    }
    const name = bytes.text(bytes.slice());
    bytes.bump();

    // Leading whitespace is not part of the value.
    for (;;) {
      const b = bytes.peek();
      if (b === undefined) return PARTIAL;
      if (b !== SP && b !== HTAB) break;
      bytes.bump();
    }

    // Value
    bytes.mark();
    let value: Span;
    for (;;) {
      const b = bytes.peek();
      if (b === undefined) return PARTIAL;
      if (b === CR) {
        bytes.bump();
        const next = bytes.peek();
        if (next === undefined) return PARTIAL;
        if (next !== LF) return fail(ParseErrorKind.InvalidHeaderValue, bytes.position);
        bytes.bump();
        value = bytes.sliceSkip(2);
        break;
      }
      if (b === LF) {
        bytes.bump();
        value = bytes.sliceSkip(1);
        break;
      }
      if (isHeaderValueToken(b)) {
        bytes.bump();
        continue;
      }
      if (!config.ignoreInvalidHeaders) {
        return fail(ParseErrorKind.InvalidHeaderValue, bytes.position);
      }
      const skipped = skipLine(bytes);
      if (skipped.status !== 'complete') return skipped;
      continue headerLoop;
    }

    const raw = bytes.view(value);
    let end = raw.length;
    while (end > 0 && (raw[end - 1] === SP || raw[end - 1] === HTAB)) end--;
    headers.push({ name, value: raw.subarray(0, end) });
  }
}

/**
 * src/core/tokens.ts
 * Byte classification tables for the request-line and header grammars.
 */

/** Frozen 256-entry membership table, indexed by byte value. */
export type ByteTable = readonly boolean[];

/** A single byte, or an inclusive `[from, to]` range. */
export type ByteSpec = number | string | readonly [number | string, number | string];

function code(b: number | string): number {
  return typeof b === 'number' ? b : b.charCodeAt(0);
}

/**
 * Builds a frozen 256-entry lookup table where every listed byte or range maps to `true`.
 *
 * @example
 * const DIGITS = byteMap(['0', '9']);
 */
export function byteMap(...specs: ByteSpec[]): ByteTable {
  const table = new Array<boolean>(256).fill(false);
  for (const spec of specs) {
    if (typeof spec === 'object') {
      const [from, to] = spec;
      table.fill(true, code(from), code(to) + 1);
    } else {
      table[code(spec)] = true;
    }
  }
  return Object.freeze(table);
}

/**
 * RFC 9110 `tchar`: any VCHAR except delimiters.
 *
 * ```text
 * tchar = "!" / "#" / "$" / "%" / "&" / "'" / "*" / "+" / "-" / "." /
 *         "^" / "_" / "`" / "|" / "~" / DIGIT / ALPHA
 * ```
 */
export const TOKEN_MAP = byteMap(
  ['A', 'Z'],
  ['a', 'z'],
  ['0', '9'],
  '!', '#', '$', '%', '&', "'", '*', '+', '-', '.', '^', '_', '`', '|', '~',
);

// Visible ASCII plus opaque high bytes. No stricter RFC 3986 check is attempted here.
export const URI_MAP = byteMap([0x21, 0x7e], [0x80, 0xff]);

// Anything printable or opaque; of the controls only HTAB.
export const HEADER_VALUE_MAP = byteMap('\t', [0x20, 0x7e], [0x80, 0xff]);

export function classify(table: ByteTable, b: number): boolean {
  return table[b] === true;
}

export function isMethodToken(b: number): boolean {
  // Uppercase letters cover nearly every method seen in practice.
  if (b >= 0x41 && b <= 0x5a) return true;
  return TOKEN_MAP[b] === true;
}

export function isHeaderNameToken(b: number): boolean {
  return TOKEN_MAP[b] === true;
}

export function isHeaderValueToken(b: number): boolean {
  return HEADER_VALUE_MAP[b] === true;
}

export function isUriToken(b: number): boolean {
  return URI_MAP[b] === true;
}

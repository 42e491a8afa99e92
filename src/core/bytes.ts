/**
 * src/core/bytes.ts
 * Forward-only cursor over a borrowed buffer. One cursor lives for exactly one parse call.
 */

/** Half-open byte range `[start, end)` into the buffer a cursor was built over. */
export interface Span {
  readonly start: number;
  readonly end: number;
}

export class Bytes {
  private pos = 0;
  private markPos = 0;

  constructor(private readonly buf: Buffer) {}

  get position(): number {
    return this.pos;
  }

  get length(): number {
    return this.buf.length;
  }

  peek(): number | undefined {
    return this.pos < this.buf.length ? this.buf[this.pos] : undefined;
  }

  /**
   * Consumes one byte. Only call after `peek()` returned a byte; running past the end is
   * a bug in the caller, not a parse outcome.
   */
  bump(): void {
    if (this.pos >= this.buf.length) {
      throw new RangeError(`cursor bumped past end of buffer (length ${this.buf.length})`);
    }
    this.pos++;
  }

  next(): number | undefined {
    const b = this.peek();
    if (b !== undefined) this.pos++;
    return b;
  }

  mark(): void {
    this.markPos = this.pos;
  }

  /** Returns `[mark, position)` and re-marks at the current position. */
  slice(): Span {
    return this.sliceSkip(0);
  }

  /** Like {@link slice}, leaving the last `skip` consumed bytes (a terminator) out. */
  sliceSkip(skip: number): Span {
    const span = { start: this.markPos, end: this.pos - skip };
    this.markPos = this.pos;
    return span;
  }

  /** Zero-copy view of `span`. */
  view(span: Span): Buffer {
    return this.buf.subarray(span.start, span.end);
  }

  /** Text of a span already validated as ASCII; latin1 keeps it byte-for-byte. */
  text(span: Span): string {
    return this.buf.toString('latin1', span.start, span.end);
  }
}

export function toBuffer(input: Uint8Array): Buffer {
  return Buffer.isBuffer(input) ? input : Buffer.from(input.buffer, input.byteOffset, input.byteLength);
}

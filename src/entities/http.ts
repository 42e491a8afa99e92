/**
 * src/entities/http.ts
 * Parsed header records and the caller-owned list they are written into.
 */

/**
 * One header line. `value` is a view into the buffer the request was parsed from, so it
 * stays valid only as long as that buffer is not reused.
 */
export interface Header {
  /** Header field name as sent; always ASCII token bytes. */
  readonly name: string;
  /** Raw value bytes, leading and trailing whitespace excluded. Not necessarily UTF-8. */
  readonly value: Buffer;
}

export const EMPTY_HEADER: Header = Object.freeze({ name: '', value: Buffer.alloc(0) });

function asciiLower(s: string): string {
  return s.replace(/[A-Z]/g, (c) => String.fromCharCode(c.charCodeAt(0) | 0x20));
}

/**
 * Fixed-capacity header storage. The parser only appends; it never grows the list. A
 * request carrying more headers than `capacity` is rejected, and the caller may retry with
 * a larger list.
 *
 * @example
 * const headers = new HeaderList(32);
 * const req = new Request(headers);
 * req.parse(buf);
 * headers.get('host')?.value.toString();
 */
export class HeaderList implements Iterable<Header> {
  private readonly slots: Header[];
  private count = 0;

  constructor(public readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new RangeError(`header capacity must be a non-negative integer, got ${capacity}`);
    }
    this.slots = new Array<Header>(capacity).fill(EMPTY_HEADER);
  }

  get length(): number {
    return this.count;
  }

  get full(): boolean {
    return this.count >= this.capacity;
  }

  /** Appends `header`; returns false, leaving the list untouched, when it is full. */
  push(header: Header): boolean {
    if (this.full) return false;
    this.slots[this.count++] = header;
    return true;
  }

  at(index: number): Header | undefined {
    return index >= 0 && index < this.count ? this.slots[index] : undefined;
  }

  clear(): void {
    this.slots.fill(EMPTY_HEADER, 0, this.count);
    this.count = 0;
  }

  /** First header named `name`, compared ASCII case-insensitively. */
  get(name: string): Header | undefined {
    const wanted = asciiLower(name);
    for (const header of this) {
      if (asciiLower(header.name) === wanted) return header;
    }
    return undefined;
  }

  getAll(name: string): Header[] {
    const wanted = asciiLower(name);
    return this.toArray().filter((header) => asciiLower(header.name) === wanted);
  }

  toArray(): Header[] {
    return this.slots.slice(0, this.count);
  }

  *[Symbol.iterator](): Iterator<Header> {
    for (let i = 0; i < this.count; i++) {
      yield this.slots[i];
    }
  }
}

export function headerValueToString(header: Header, encoding: BufferEncoding = 'latin1'): string {
  return header.value.toString(encoding);
}

import { Bytes, toBuffer } from '../../src/core/bytes';

describe('Bytes', () => {
  test('peek does not consume, next does', () => {
    const bytes = new Bytes(Buffer.from('ab'));
    expect(bytes.peek()).toBe(0x61);
    expect(bytes.peek()).toBe(0x61);
    expect(bytes.position).toBe(0);
    expect(bytes.next()).toBe(0x61);
    expect(bytes.next()).toBe(0x62);
    expect(bytes.position).toBe(2);
  });

  test('reports end of buffer as undefined without moving', () => {
    const bytes = new Bytes(Buffer.from('x'));
    bytes.bump();
    expect(bytes.peek()).toBeUndefined();
    expect(bytes.next()).toBeUndefined();
    expect(bytes.position).toBe(1);
  });

  test('bump past the end is an internal error', () => {
    const bytes = new Bytes(Buffer.alloc(0));
    expect(() => bytes.bump()).toThrow(RangeError);
    expect(bytes.position).toBe(0);
  });

  test('slice returns the span since the mark and re-marks', () => {
    const bytes = new Bytes(Buffer.from('GET /'));
    bytes.mark();
    bytes.bump();
    bytes.bump();
    bytes.bump();
    const method = bytes.slice();
    expect(method).toEqual({ start: 0, end: 3 });
    expect(bytes.text(method)).toBe('GET');

    bytes.bump();
    bytes.bump();
    expect(bytes.slice()).toEqual({ start: 3, end: 5 });
  });

  test('sliceSkip leaves trailing terminator bytes out', () => {
    const bytes = new Bytes(Buffer.from('Host:'));
    bytes.mark();
    for (let i = 0; i < 5; i++) bytes.bump();
    const span = bytes.sliceSkip(1);
    expect(bytes.text(span)).toBe('Host');
    expect(bytes.slice()).toEqual({ start: 5, end: 5 });
  });

  test('view shares memory with the source buffer', () => {
    const source = Buffer.from('value');
    const bytes = new Bytes(source);
    const view = bytes.view({ start: 1, end: 4 });
    expect(view.toString()).toBe('alu');
    source[1] = 0x41;
    expect(view.toString()).toBe('Alu');
  });
});

describe('toBuffer', () => {
  test('returns a Buffer unchanged', () => {
    const buf = Buffer.from('abc');
    expect(toBuffer(buf)).toBe(buf);
  });

  test('wraps a Uint8Array without copying', () => {
    const backing = new Uint8Array([0x78, 0x41, 0x42, 0x79]);
    const inner = backing.subarray(1, 3);
    const wrapped = toBuffer(inner);
    expect(wrapped.toString('latin1')).toBe('AB');
    backing[1] = 0x5a;
    expect(wrapped.toString('latin1')).toBe('ZB');
  });
});

import { EMPTY_HEADER, Header, HeaderList, headerValueToString } from '../../src/entities/http';

const header = (name: string, value: string): Header => ({
  name,
  value: Buffer.from(value, 'latin1'),
});

describe('HeaderList', () => {
  test.each([-1, 1.5, Number.NaN])('rejects capacity %p', (capacity) => {
    expect(() => new HeaderList(capacity)).toThrow(RangeError);
  });

  test('starts empty', () => {
    const list = new HeaderList(2);
    expect(list.length).toBe(0);
    expect(list.full).toBe(false);
    expect(list.at(0)).toBeUndefined();
    expect(list.toArray()).toEqual([]);
  });

  test('a zero-capacity list is full from the start', () => {
    const list = new HeaderList(0);
    expect(list.full).toBe(true);
    expect(list.push(header('A', '1'))).toBe(false);
  });

  test('refuses to grow past its capacity', () => {
    const list = new HeaderList(2);
    expect(list.push(header('A', '1'))).toBe(true);
    expect(list.push(header('B', '2'))).toBe(true);
    expect(list.full).toBe(true);
    expect(list.push(header('C', '3'))).toBe(false);
    expect(list.length).toBe(2);
    expect(list.toArray().map((h) => h.name)).toEqual(['A', 'B']);
  });

  test('at() only reaches filled slots', () => {
    const list = new HeaderList(4);
    list.push(header('A', '1'));
    expect(list.at(0)?.name).toBe('A');
    expect(list.at(1)).toBeUndefined();
    expect(list.at(-1)).toBeUndefined();
  });

  test('looks names up ASCII case-insensitively', () => {
    const list = new HeaderList(4);
    list.push(header('Content-Type', 'text/plain'));
    list.push(header('X-Tag', 'a'));
    list.push(header('x-tag', 'b'));
    expect(list.get('content-type')?.value.toString()).toBe('text/plain');
    expect(list.get('X-TAG')?.value.toString()).toBe('a');
    expect(list.getAll('x-Tag').map((h) => h.value.toString())).toEqual(['a', 'b']);
    expect(list.get('missing')).toBeUndefined();
    expect(list.getAll('missing')).toEqual([]);
  });

  test('clear() empties the list for reuse', () => {
    const list = new HeaderList(1);
    list.push(header('A', '1'));
    list.clear();
    expect(list.length).toBe(0);
    expect(list.full).toBe(false);
    expect(list.push(header('B', '2'))).toBe(true);
    expect(list.at(0)?.name).toBe('B');
  });

  test('iterates in insertion order', () => {
    const list = new HeaderList(3);
    list.push(header('A', '1'));
    list.push(header('B', '2'));
    expect([...list].map((h) => h.name)).toEqual(['A', 'B']);
  });

  test('EMPTY_HEADER cannot be modified', () => {
    expect(Object.isFrozen(EMPTY_HEADER)).toBe(true);
    expect(EMPTY_HEADER.value.length).toBe(0);
  });
});

describe('headerValueToString', () => {
  test('decodes as latin1 by default', () => {
    const h: Header = { name: 'X', value: Buffer.from([0x63, 0x61, 0x66, 0xe9]) };
    expect(headerValueToString(h)).toBe('café');
  });

  test('honours an explicit encoding', () => {
    const h: Header = { name: 'X', value: Buffer.from('café', 'utf8') };
    expect(headerValueToString(h, 'utf8')).toBe('café');
  });
});

// tests/entities/sendResponse.test.ts
import {
  findHeaderKey,
  requestsClose,
  ResponseSocket,
  sendResponse,
} from '../../src/entities/sendResponse';
import logger from '../../src/utils/logger';

jest.mock('../../src/utils/logger');

interface FakeSocket extends ResponseSocket {
  destroyed: boolean;
  write: jest.Mock<boolean, [string | Buffer]>;
  end: jest.Mock<void, []>;
}

function fakeSocket(): FakeSocket {
  return {
    destroyed: false,
    write: jest.fn((_data: string | Buffer) => true),
    end: jest.fn(),
  };
}

describe('sendResponse', () => {
  let socket: FakeSocket;

  beforeEach(() => {
    jest.clearAllMocks();
    socket = fakeSocket();
  });

  test('writes only the head when there is no body', () => {
    sendResponse(socket, 204, { 'X-Test': 'yes' });
    expect(socket.write).toHaveBeenCalledTimes(1);
    expect(socket.write).toHaveBeenCalledWith(
      'HTTP/1.1 204 No Content\r\nX-Test: yes\r\nContent-Length: 0\r\n\r\n',
    );
  });

  test('writes the head, then a string body', () => {
    sendResponse(socket, 200, { 'Content-Type': 'text/plain' }, 'Hello');
    expect(socket.write).toHaveBeenNthCalledWith(
      1,
      'HTTP/1.1 200 OK\r\nContent-Type: text/plain\r\nContent-Length: 5\r\n\r\n',
    );
    expect(socket.write).toHaveBeenNthCalledWith(2, 'Hello');
  });

  test('counts bytes, not characters, for Content-Length', () => {
    sendResponse(socket, 200, { 'Content-Type': 'text/plain' }, 'café');
    expect(socket.write).toHaveBeenNthCalledWith(
      1,
      'HTTP/1.1 200 OK\r\nContent-Type: text/plain\r\nContent-Length: 5\r\n\r\n',
    );
  });

  test('writes a binary body untouched', () => {
    const body = Buffer.from([0x01, 0x02, 0x03]);
    sendResponse(socket, 200, { 'Content-Type': 'application/octet-stream' }, body);
    expect(socket.write).toHaveBeenNthCalledWith(2, body);
  });

  test('keeps an explicit Content-Length', () => {
    sendResponse(socket, 200, { 'Content-Type': 'text/plain', 'Content-Length': '2' }, 'ok');
    expect(socket.write).toHaveBeenNthCalledWith(
      1,
      'HTTP/1.1 200 OK\r\nContent-Type: text/plain\r\nContent-Length: 2\r\n\r\n',
    );
  });

  test('defaults Content-Type for a body and warns about it', () => {
    sendResponse(socket, 200, {}, 'abc');
    expect(socket.write).toHaveBeenNthCalledWith(
      1,
      'HTTP/1.1 200 OK\r\nContent-Length: 3\r\nContent-Type: application/octet-stream\r\n\r\n',
    );
    expect(logger.warn).toHaveBeenCalledWith(
      '[sendResponse] Content-Type not set by handler, defaulting to application/octet-stream',
      { status: 200 },
    );
  });

  test('sends an empty reason phrase for unknown codes', () => {
    sendResponse(socket, 499, { 'Content-Type': 'text/plain' });
    expect(socket.write).toHaveBeenCalledWith(
      'HTTP/1.1 499 \r\nContent-Type: text/plain\r\nContent-Length: 0\r\n\r\n',
    );
  });

  test('finds Content-Length and Content-Type in any case', () => {
    sendResponse(socket, 200, { 'content-type': 'text/plain', 'content-length': '2' }, 'ok');
    expect(socket.write).toHaveBeenNthCalledWith(
      1,
      'HTTP/1.1 200 OK\r\ncontent-type: text/plain\r\ncontent-length: 2\r\n\r\n',
    );
    expect(logger.warn).not.toHaveBeenCalled();
  });

  test('ends the socket when close is one of several Connection tokens', () => {
    sendResponse(socket, 200, { Connection: 'Upgrade, close' });
    expect(socket.end).toHaveBeenCalledTimes(1);
  });

  test('ends the socket when Connection: close is set', () => {
    sendResponse(socket, 400, { Connection: 'close', 'Content-Type': 'text/plain' }, '400');
    expect(socket.end).toHaveBeenCalledTimes(1);
  });

  test('matches Connection: close case-insensitively', () => {
    sendResponse(socket, 200, { connection: 'Close' });
    expect(socket.end).toHaveBeenCalledTimes(1);
  });

  test('leaves a keep-alive socket open', () => {
    sendResponse(socket, 200, { Connection: 'keep-alive', 'Content-Type': 'text/plain' }, 'hi');
    expect(socket.end).not.toHaveBeenCalled();
  });

  test('does nothing on a destroyed socket', () => {
    socket.destroyed = true;
    sendResponse(socket, 200, { 'Content-Type': 'text/plain' }, 'Should not write');
    expect(socket.write).not.toHaveBeenCalled();
    expect(socket.end).not.toHaveBeenCalled();
    expect(logger.debug).toHaveBeenCalledWith(
      '[sendResponse] Attempted to write to destroyed socket',
      { status: 200 },
    );
  });
});

describe('findHeaderKey', () => {
  test('returns the key as written', () => {
    expect(findHeaderKey({ 'X-Thing': '1', connection: 'close' }, 'Connection')).toBe(
      'connection',
    );
    expect(findHeaderKey({ 'X-Thing': '1' }, 'connection')).toBeUndefined();
  });
});

describe('requestsClose', () => {
  const cases: Array<[Record<string, string>, boolean]> = [
    [{ Connection: 'close' }, true],
    [{ connection: 'CLOSE' }, true],
    [{ Connection: 'keep-alive' }, false],
    [{ Connection: 'closed' }, false],
    [{}, false],
  ];

  test.each(cases)('%j -> %p', (headers, expected) => {
    expect(requestsClose(headers)).toBe(expected);
  });
});

/**
 * src/entities/sendResponse.ts
 * Writes a complete HTTP/1.1 response to a client socket.
 */
import logger from '../utils/logger';

const STATUS_TEXT: Record<number, string> = {
  200: 'OK',
  204: 'No Content',
  400: 'Bad Request',
  404: 'Not Found',
  408: 'Request Timeout',
  431: 'Request Header Fields Too Large',
  500: 'Internal Server Error',
  505: 'HTTP Version Not Supported',
};

/** The part of a socket a response is written to. */
export interface ResponseSocket {
  readonly destroyed: boolean;
  write(data: string | Buffer): boolean;
  end(): unknown;
}

/** Key under which `name` appears in `headers`, compared case-insensitively. */
export function findHeaderKey(headers: Record<string, string>, name: string): string | undefined {
  const wanted = name.toLowerCase();
  return Object.keys(headers).find((key) => key.toLowerCase() === wanted);
}

/** True when the headers carry a `Connection` value listing the `close` token. */
export function requestsClose(headers: Record<string, string>): boolean {
  const key = findHeaderKey(headers, 'connection');
  if (key === undefined) return false;
  return headers[key]
    .split(',')
    .some((token) => token.trim().toLowerCase() === 'close');
}

export function sendResponse(
  socket: ResponseSocket,
  status: number,
  initialHeaders: Record<string, string>,
  body?: string | Buffer,
): void {
  if (socket.destroyed) {
    logger.debug('[sendResponse] Attempted to write to destroyed socket', { status });
    return;
  }

  const finalHeaders = { ...initialHeaders };
  if (findHeaderKey(finalHeaders, 'content-length') === undefined) {
    finalHeaders['Content-Length'] = String(body === undefined ? 0 : Buffer.byteLength(body));
  }
  if (body !== undefined && findHeaderKey(finalHeaders, 'content-type') === undefined) {
    logger.warn('[sendResponse] Content-Type not set by handler, defaulting to application/octet-stream', {
      status,
    });
    finalHeaders['Content-Type'] = 'application/octet-stream';
  }

  const headerLines = Object.entries(finalHeaders)
    .map(([k, v]) => `${k}: ${v}\r\n`)
    .join('');
  socket.write(`HTTP/1.1 ${status} ${STATUS_TEXT[status] ?? ''}\r\n${headerLines}\r\n`);
  if (body !== undefined) socket.write(body);

  if (requestsClose(finalHeaders)) socket.end();
}

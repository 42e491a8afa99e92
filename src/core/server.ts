import { createServer, Server, Socket } from 'net';

import { HeaderList } from '../entities/http';
import {
  findHeaderKey,
  requestsClose,
  ResponseSocket,
  sendResponse,
} from '../entities/sendResponse';
import { config } from '../config/server.config';
import logger from '../utils/logger';
import { ParserConfig, Request } from './httpParser';

/** The socket surface a connection needs; `net.Socket` satisfies it. */
export interface ClientSocket extends ResponseSocket {
  readonly remoteAddress?: string;
  on(event: 'data', listener: (chunk: Buffer) => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
  once(event: 'close', listener: () => void): unknown;
  destroy(): unknown;
}

export interface HandlerResponse {
  status: number;
  headers?: Record<string, string>;
  body?: string | Buffer;
}

/**
 * Produces the response to a fully parsed request head. Header values are views into the
 * connection's receive buffer and are only valid for the duration of the call.
 */
export type RequestHandler = (request: Request) => HandlerResponse;

export interface HttpServerOptions {
  port?: number;
  host?: string;
  maxHeaders?: number;
  maxHeadBytes?: number;
  headerTimeoutMs?: number;
  parser?: ParserConfig;
  handler?: RequestHandler;
}

/** Default handler: answers with a JSON description of the parsed head. */
export function echoHandler(request: Request): HandlerResponse {
  const body = JSON.stringify({
    method: request.method,
    path: request.path,
    version: `HTTP/1.${request.version}`,
    headers: request.headers
      .toArray()
      .map((h) => ({ name: h.name, value: h.value.toString('latin1') })),
  });
  return { status: 200, headers: { 'Content-Type': 'application/json' }, body };
}

function connectionTokens(request: Request): string[] {
  return request.headers
    .getAll('connection')
    .flatMap((h) => h.value.toString('latin1').split(','))
    .map((t) => t.trim().toLowerCase());
}

export function isKeepAlive(request: Request): boolean {
  const tokens = connectionTokens(request);
  if (tokens.includes('close')) return false;
  return request.version === 1 || tokens.includes('keep-alive');
}

// Bodies are not framed here; a request announcing one ends the connection after the reply.
export function declaresBody(request: Request): boolean {
  if (request.headers.get('transfer-encoding')) return true;
  const length = request.headers.get('content-length');
  return length !== undefined && length.value.toString('latin1').trim() !== '0';
}

export class HttpServer {
  private readonly server: Server = createServer();
  private readonly connections = new Set<ClientSocket>();
  private readonly port: number;
  private readonly host: string;
  private readonly maxHeaders: number;
  private readonly maxHeadBytes: number;
  private readonly headerTimeoutMs: number;
  private readonly parserConfig: ParserConfig;
  private readonly handler: RequestHandler;

  constructor(options: HttpServerOptions = {}) {
    this.port = options.port ?? config.port;
    this.host = options.host ?? config.host;
    this.maxHeaders = options.maxHeaders ?? config.maxHeaders;
    this.maxHeadBytes = options.maxHeadBytes ?? config.maxHeadBytes;
    this.headerTimeoutMs = options.headerTimeoutMs ?? config.headerTimeoutMs;
    this.parserConfig = options.parser ?? config.parser;
    this.handler = options.handler ?? echoHandler;

    this.server.on('connection', (socket: Socket) => this.handleConnection(socket));
    this.server.on('error', (err: NodeJS.ErrnoException) => {
      logger.error('Server error:', { error: err.message, code: err.code });
    });
  }

  public getServer(): Server {
    return this.server;
  }

  /**
   * Drives one connection: every chunk is appended to the pending bytes and the whole
   * pending buffer is parsed again from its start until a head is complete.
   */
  public handleConnection(socket: ClientSocket): void {
    const log = logger.child({ remoteAddress: socket.remoteAddress ?? 'unknown' });
    const request = new Request(new HeaderList(this.maxHeaders));
    let pending: Buffer = Buffer.alloc(0);
    let closed = false;
    let headerTimer: NodeJS.Timeout | undefined;

    this.connections.add(socket);

    // Responses sent with `Connection: close` end the socket themselves.
    const close = () => {
      closed = true;
      if (headerTimer) clearTimeout(headerTimer);
    };

    const reject = (status: number, meta: Record<string, unknown>) => {
      log.warn('Rejected request head', { status, ...meta });
      sendResponse(
        socket,
        status,
        { 'Content-Type': 'text/plain', Connection: 'close' },
        `${status}`,
      );
      close();
    };

    const armHeaderTimer = () => {
      if (headerTimer) clearTimeout(headerTimer);
      headerTimer = setTimeout(() => {
        if (closed) return;
        reject(408, { reason: 'header timeout', pendingBytes: pending.length });
      }, this.headerTimeoutMs);
    };

    const drain = () => {
      while (!closed && pending.length > 0) {
        const result = request.parse(pending, this.parserConfig);

        if (result.status === 'partial') {
          if (pending.length > this.maxHeadBytes) {
            reject(431, { reason: 'request head too large', pendingBytes: pending.length });
          }
          return;
        }

        if (result.status === 'error') {
          reject(result.error.statusCode, {
            reason: result.error.description,
            offset: result.error.offset,
            method: request.method,
            path: request.path,
          });
          return;
        }

        if (headerTimer) clearTimeout(headerTimer);
        log.http(`${request.method} ${request.path} HTTP/1.${request.version}`, {
          headers: request.headers.length,
          headBytes: result.value,
        });

        let response: HandlerResponse;
        try {
          response = this.handler(request);
        } catch (err) {
          log.error('Request handler failed', {
            error: err instanceof Error ? err.message : String(err),
          });
          response = {
            status: 500,
            headers: { 'Content-Type': 'text/plain' },
            body: 'Internal Server Error',
          };
        }
        const headers: Record<string, string> = { ...response.headers };
        const keepAlive =
          isKeepAlive(request) && !declaresBody(request) && !requestsClose(headers);
        // Handlers may ask for close, never for keep-alive.
        const connectionKey = findHeaderKey(headers, 'connection');
        if (connectionKey !== undefined) delete headers[connectionKey];
        headers.Connection = keepAlive ? 'keep-alive' : 'close';
        sendResponse(socket, response.status, headers, response.body);
        if (!keepAlive) {
          close();
          return;
        }
        pending = pending.subarray(result.value);
        armHeaderTimer();
      }
    };

    socket.on('data', (chunk: Buffer) => {
      if (closed) return;
      pending = pending.length === 0 ? chunk : Buffer.concat([pending, chunk]);
      drain();
    });

    socket.on('error', (err: Error) => {
      log.error('Socket error:', { error: err.message });
      closed = true;
      socket.destroy();
    });

    socket.once('close', () => {
      closed = true;
      if (headerTimer) clearTimeout(headerTimer);
      this.connections.delete(socket);
      log.debug('Socket closed', { remainingConnections: this.connections.size });
    });

    armHeaderTimer();
    log.debug('New connection established.', { activeConnections: this.connections.size });
  }

  public destroySockets(): void {
    this.connections.forEach((socket) => socket.destroy());
  }

  public start(): Promise<Server> {
    return new Promise((resolve, reject) => {
      this.server.once('listening', () => {
        logger.info(`Server listening on http://${this.host}:${this.port}`);
        resolve(this.server);
      });
      this.server.once('error', reject);
      this.server.listen(this.port, this.host);
    });
  }

  /** Closes every open socket, then the listener. */
  public stop(): Promise<void> {
    logger.info('Shutting down HTTP server');
    this.destroySockets();
    return new Promise<void>((resolve, reject) => {
      if (!this.server.listening) {
        resolve();
        return;
      }
      this.server.close((err) => {
        if (err) {
          logger.error('Error closing server:', { error: err.message });
          reject(err);
        } else {
          logger.info('Server closed successfully');
          resolve();
        }
      });
    });
  }
}

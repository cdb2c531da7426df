/**
 * HTTP adapter: node:http in front of the request processor.
 *
 *   start: bind host:port → report the bound address
 *   stop:  stop accepting → drop idle keep-alive sockets → wait for close
 *
 * The adapter only translates. It decodes the path, parses the query and
 * writes back whatever the processor answers.
 */

import { createServer } from 'node:http';
import type { IncomingMessage, Server, ServerResponse } from 'node:http';
import type { AddressInfo } from 'node:net';
import { ErrorCode } from '../types/errors.js';
import { setOwn } from '../types/json.js';
import type { RequestParts } from './context-builder.js';
import { CoreError, errorMessage, isCoreError } from './core-error.js';
import { internalErrorResponse } from './response-builder.js';
import type { ResponseParts } from './response-builder.js';
import { createLogger } from './logger.js';
import type { Logger } from './logger.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RequestHandler {
  handle(parts: RequestParts): Promise<ResponseParts>;
}

/** The parts of an IncomingMessage the adapter reads. */
export type IncomingRequest = Pick<
  IncomingMessage,
  'url' | 'method' | 'httpVersion' | 'headersDistinct'
>;

/** The parts of a ServerResponse the adapter writes. */
export interface ResponseSink {
  statusCode: number;
  setHeader(name: string, value: string | string[]): unknown;
  end(body: Buffer): unknown;
}

export interface HttpServerOptions {
  host: string;
  port: number;
  handler: RequestHandler;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// Translation
// ---------------------------------------------------------------------------

/** Percent-decode `path`; a malformed escape keeps the raw text. */
export function decodePath(path: string): string {
  try {
    return decodeURIComponent(path);
  } catch (err) {
    if (err instanceof URIError) return path;
    throw err;
  }
}

/** Query parameters; a repeated key keeps its last value. */
export function parseQuery(query: string): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of new URLSearchParams(query)) {
    setOwn(result, key, value);
  }
  return result;
}

/**
 * @throws CoreError MISSING_CONTEXT when the request carries no URL
 */
export function toRequestParts(req: IncomingRequest): RequestParts {
  if (req.url === undefined) {
    throw new CoreError(ErrorCode.MISSING_CONTEXT, 'request has no URL');
  }
  const queryStart = req.url.indexOf('?');
  const rawPath = queryStart === -1 ? req.url : req.url.slice(0, queryStart);
  const rawQuery = queryStart === -1 ? '' : req.url.slice(queryStart + 1);

  return {
    path: decodePath(rawPath),
    method: req.method ?? 'GET',
    version: `HTTP/${req.httpVersion}`,
    headers: req.headersDistinct,
    query: parseQuery(rawQuery),
  };
}

export function writeResponse(res: ResponseSink, parts: ResponseParts): void {
  res.statusCode = parts.status;
  for (const [name, values] of Object.entries(parts.headers)) {
    res.setHeader(name, values.length === 1 ? values[0] : [...values]);
  }
  res.end(parts.body);
}

/** Handle one exchange. Never rejects. */
export async function serveRequest(
  handler: RequestHandler,
  req: IncomingRequest,
  res: ResponseSink,
  logger: Logger,
): Promise<void> {
  let response: ResponseParts;
  try {
    response = await handler.handle(toRequestParts(req));
  } catch (err) {
    logger.error('request could not be handled', {
      error_code: isCoreError(err) ? err.code : undefined,
      error: errorMessage(err),
    });
    response = internalErrorResponse();
  }
  writeResponse(res, response);
}

// ---------------------------------------------------------------------------
// HttpServer
// ---------------------------------------------------------------------------

export class HttpServer {
  private readonly host: string;
  private readonly port: number;
  private readonly handler: RequestHandler;
  private readonly logger: Logger;
  private server: Server | null = null;

  constructor(options: HttpServerOptions) {
    this.host = options.host;
    this.port = options.port;
    this.handler = options.handler;
    this.logger = options.logger ?? createLogger('http');
  }

  get listening(): boolean {
    return this.server !== null;
  }

  /** Bind and listen. Resolves with the bound address. */
  async start(): Promise<AddressInfo> {
    if (this.server !== null) {
      throw new Error('HTTP server is already started');
    }
    const server = createServer((req: IncomingMessage, res: ServerResponse) => {
      serveRequest(this.handler, req, res, this.logger).catch((err: unknown) => {
        this.logger.error('response could not be written', { error: errorMessage(err) });
        res.destroy();
      });
    });

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.port, this.host, () => {
        server.off('error', reject);
        resolve();
      });
    });
    this.server = server;

    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('HTTP server is not bound to a TCP address');
    }
    this.logger.info('http server listening', { host: address.address, port: address.port });
    return address;
  }

  /** Stop accepting connections and wait for open ones to finish. */
  async stop(): Promise<void> {
    const server = this.server;
    if (server === null) return;
    this.server = null;

    this.logger.info('http server stopping');
    const closed = new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
    server.closeIdleConnections();
    await closed;
  }
}

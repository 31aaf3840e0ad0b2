/**
 * Gatehouse - node:http Adapter
 *
 * Accepts connections on one host/port, reads each request body in full,
 * dispatches to the engine and writes the response. A client that
 * disconnects before the response is written cancels its request context:
 * the remaining pipeline stages are skipped and nothing is written.
 */

import { IncomingMessage, OutgoingHttpHeaders, Server, createServer } from 'http';
import { v4 as uuidv4 } from 'uuid';
import { RequestContext } from '../../domain/context/RequestContext';
import { Errors } from '../../domain/result/Result';
import { AdapterBase, RequestHandler, ServerInfo } from '../platform/adapter';
import type { ILogger } from '../platform/logger';
import { GatehouseRequest, GatehouseResponse, createErrorResponse } from '../platform/types';
import { encodeResponse } from './encoding';

export interface NodeHttpAdapterOptions {
  host: string;
  port: number;

  /** Largest accepted request body in bytes */
  maxBodyBytes?: number;

  logger: ILogger;
}

/**
 * The part of a `ServerResponse` the adapter writes through
 */
export interface ResponseWriter {
  readonly destroyed: boolean;
  readonly writableFinished: boolean;
  readonly headersSent: boolean;
  statusCode: number;
  on(event: 'close', listener: () => void): unknown;
  writeHead(statusCode: number, headers: OutgoingHttpHeaders): unknown;
  end(chunk?: Buffer): unknown;
}

export class PayloadTooLargeError extends Error {
  constructor(readonly limit: number) {
    super(`Request body exceeds ${limit} bytes`);
    this.name = 'PayloadTooLargeError';
    Object.setPrototypeOf(this, PayloadTooLargeError.prototype);
  }
}

const DEFAULT_MAX_BODY_BYTES = 1024 * 1024;

function readBody(req: IncomingMessage, limit: number): Promise<string> {
  return new Promise((resolve, reject) => {
    let size = 0;
    const chunks: Buffer[] = [];

    const onData = (chunk: Buffer): void => {
      size += chunk.length;
      if (size > limit) {
        // Stop reading; the connection closes after the 413 is written
        req.off('data', onData);
        req.pause();
        reject(new PayloadTooLargeError(limit));
        return;
      }
      chunks.push(chunk);
    };

    req.on('data', onData);
    req.once('end', () => resolve(Buffer.concat(chunks).toString('utf8')));
    req.once('error', (error) => reject(error));
  });
}

function parseQuery(url: URL): Record<string, string | undefined> {
  const query: Record<string, string | undefined> = {};
  for (const [key, value] of url.searchParams) {
    // First occurrence wins
    if (query[key] === undefined) {
      query[key] = value;
    }
  }
  return query;
}

/**
 * Build the listener-independent request
 */
export function toGatehouseRequest(req: IncomingMessage, body: string, id: string = uuidv4()): GatehouseRequest {
  const rawUrl = req.url ?? '/';
  const url = new URL(rawUrl, 'http://localhost');

  return {
    id,
    method: (req.method ?? 'GET').toUpperCase(),
    path: url.pathname,
    url: rawUrl,
    headers: { ...req.headers },
    query: parseQuery(url),
    body,
    ip: req.socket.remoteAddress,
    protocol: 'http',
  };
}

export class NodeHttpAdapter extends AdapterBase {
  readonly name = 'node-http';
  readonly protocol = 'http' as const;

  private server: Server | null = null;
  private readonly logger: ILogger;

  constructor(
    handler: RequestHandler,
    private readonly options: NodeHttpAdapterOptions,
  ) {
    super(handler);
    this.logger = options.logger;
  }

  /**
   * @throws when the port cannot be bound
   */
  async start(): Promise<ServerInfo> {
    if (this.server) {
      throw new Error(`Adapter ${this.name} is already started`);
    }

    const server = createServer((req, res) => {
      this.handle(req, res).catch((error: unknown) => {
        this.logger.error('Request handling failed outside the pipeline', error);
        if (!res.headersSent) {
          res.statusCode = 500;
        }
        res.end();
      });
    });

    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error): void => reject(error);
      server.once('error', onError);
      server.listen(this.options.port, this.options.host, () => {
        server.removeListener('error', onError);
        resolve();
      });
    });

    server.on('error', (error) => this.logger.error('HTTP server error', error));
    this.server = server;
    this.running = true;

    const address = server.address();
    const port = typeof address === 'object' && address ? address.port : this.options.port;
    const info: ServerInfo = {
      protocol: this.protocol,
      host: this.options.host,
      port,
      url: `http://${this.options.host}:${port}/`,
    };
    this.logger.info(`Listening on ${info.url}`);
    return info;
  }

  /**
   * Stop accepting connections and wait for in-flight requests
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;

    this.server = null;
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
      server.closeIdleConnections();
    });
    this.running = false;
  }

  /**
   * Read, dispatch and answer one request
   */
  async handle(req: IncomingMessage, res: ResponseWriter): Promise<void> {
    const id = uuidv4();
    const context = RequestContext.create({
      traceId: uuidv4(),
      requestId: id,
      timestamp: Date.now(),
      method: req.method,
      url: req.url,
      ip: req.socket.remoteAddress,
      userAgent: req.headers['user-agent'],
    });

    res.on('close', () => {
      if (!res.writableFinished) {
        context.cancel();
      }
    });

    let body: string;
    try {
      body = await readBody(req, this.options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES);
    } catch (error) {
      if (context.isCancelled()) return;
      const path = new URL(req.url ?? '/', 'http://localhost').pathname;
      if (error instanceof PayloadTooLargeError) {
        const rejected = createErrorResponse(Errors.payloadTooLarge(error.limit, path));
        this.write(req, res, { ...rejected, headers: { ...rejected.headers, Connection: 'close' } });
        return;
      }
      const message = error instanceof Error ? error.message : 'Unreadable request body';
      this.write(req, res, createErrorResponse(Errors.badRequest(message, path)));
      return;
    }

    const request = toGatehouseRequest(req, body, id);
    const response = await this.dispatch(request, context);

    if (context.isCancelled() || res.destroyed) {
      this.logger.debug(`Request ${id} was cancelled; response dropped`);
      return;
    }
    this.write(req, res, response);
  }

  private write(req: IncomingMessage, res: ResponseWriter, response: GatehouseResponse): void {
    const encoded = encodeResponse(response, req.headers['accept-encoding']);
    res.writeHead(encoded.status, encoded.headers);
    res.end(encoded.body);
  }
}

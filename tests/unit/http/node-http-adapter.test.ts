import { EventEmitter } from 'events';
import { IncomingMessage, OutgoingHttpHeaders } from 'http';
import { Socket } from 'net';
import { RequestContext } from '../../../src/domain/context/RequestContext';
import { NodeHttpAdapter, ResponseWriter, toGatehouseRequest } from '../../../src/infrastructure/http/NodeHttpAdapter';
import type { RequestHandler } from '../../../src/infrastructure/platform/adapter';
import { GatehouseRequest, createSuccessResponse, text } from '../../../src/infrastructure/platform/types';
import { RecordingLogger } from '../../support/fixtures';

function incoming(method: string, url: string, headers: Record<string, string>, body?: string): IncomingMessage {
  const message = new IncomingMessage(new Socket());
  message.method = method;
  message.url = url;
  message.headers = headers;
  if (body !== undefined) {
    message.push(Buffer.from(body, 'utf8'));
    message.push(null);
  }
  return message;
}

/**
 * Keeps what the adapter writes; emits `close` once the body is ended
 */
class RecordingResponse extends EventEmitter implements ResponseWriter {
  destroyed = false;
  writableFinished = false;
  headersSent = false;
  statusCode = 200;
  head: { status: number; headers: OutgoingHttpHeaders } | null = null;
  body: Buffer | null = null;

  writeHead(status: number, headers: OutgoingHttpHeaders): this {
    this.head = { status, headers };
    this.headersSent = true;
    return this;
  }

  end(chunk?: Buffer): this {
    this.body = chunk ?? Buffer.alloc(0);
    this.writableFinished = true;
    this.emit('close');
    return this;
  }

  json(): unknown {
    return this.body === null ? null : JSON.parse(this.body.toString('utf8'));
  }
}

describe('NodeHttpAdapter', () => {
  let logger: RecordingLogger;
  let seen: Array<{ request: GatehouseRequest; context: RequestContext }>;
  let res: RecordingResponse;

  const greet: RequestHandler = async (request, context) => {
    seen.push({ request, context });
    return createSuccessResponse(text(`Hello, ${request.query.name ?? 'World'}`));
  };

  function adapter(handler: RequestHandler, maxBodyBytes?: number): NodeHttpAdapter {
    return new NodeHttpAdapter(handler, { host: '127.0.0.1', port: 0, maxBodyBytes, logger });
  }

  beforeEach(() => {
    logger = new RecordingLogger();
    seen = [];
    res = new RecordingResponse();
  });

  it('should dispatch the request and write the encoded response', async () => {
    await adapter(greet).handle(incoming('GET', '/hello?name=Ada', { 'x-trace': 'abc' }, ''), res);

    expect(seen).toHaveLength(1);
    expect(seen[0].request).toMatchObject({
      method: 'GET',
      path: '/hello',
      url: '/hello?name=Ada',
      query: { name: 'Ada' },
      headers: { 'x-trace': 'abc' },
      body: '',
    });
    expect(seen[0].context.get('requestId')).toBe(seen[0].request.id);
    expect(res.head).toEqual({
      status: 200,
      headers: {
        'Content-Type': 'text/plain; charset=utf-8',
        Vary: 'Accept-Encoding',
        'Content-Length': '10',
      },
    });
    expect(res.body?.toString('utf8')).toBe('Hello, Ada');
  });

  it('should hand the full body to the engine', async () => {
    await adapter(greet).handle(incoming('POST', '/login', { 'content-type': 'application/json' }, '{"a":1}'), res);

    expect(seen[0].request.body).toBe('{"a":1}');
  });

  it('should write nothing after the client disconnects', async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const slow: RequestHandler = async (request, context) => {
      seen.push({ request, context });
      await gate;
      return createSuccessResponse(text('late'));
    };

    const pending = adapter(slow).handle(incoming('GET', '/slow', {}, ''), res);
    await waitFor(() => seen.length === 1);

    res.emit('close');
    expect(seen[0].context.isCancelled()).toBe(true);

    release();
    await pending;

    expect(res.head).toBeNull();
    expect(res.body).toBeNull();
    expect(logger.messages('debug')).toEqual([`Request ${seen[0].request.id} was cancelled; response dropped`]);
  });

  it('should reply 413 and stop reading when the body is too large', async () => {
    const req = incoming('POST', '/upload', {}, 'too long');

    await adapter(greet, 4).handle(req, res);

    expect(seen).toHaveLength(0);
    expect(req.isPaused()).toBe(true);
    expect(res.head?.status).toBe(413);
    expect(res.head?.headers).toMatchObject({ Connection: 'close', 'Content-Type': 'application/json; charset=utf-8' });
    expect(res.json()).toEqual({
      message: 'Payload too large',
      statusCode: 413,
      details: 'Request body exceeds 4 bytes',
      path: '/upload',
    });
  });

  it('should reply 400 when the body stream fails', async () => {
    const req = incoming('POST', '/upload', {});

    const pending = adapter(greet).handle(req, res);
    req.emit('error', new Error('connection reset'));
    await pending;

    expect(seen).toHaveLength(0);
    expect(res.head?.status).toBe(400);
    expect(res.json()).toEqual({
      message: 'Bad request',
      statusCode: 400,
      details: 'connection reset',
      path: '/upload',
    });
  });

  it('should not be running before start', () => {
    expect(adapter(greet).isRunning()).toBe(false);
  });
});

describe('toGatehouseRequest', () => {
  it('should split the path from the query and keep the first repeated parameter', () => {
    const request = toGatehouseRequest(
      incoming('get', '/hello?name=Ada&name=Grace&x=', { 'user-agent': 'jest' }),
      '',
      'req-1',
    );

    expect(request).toEqual({
      id: 'req-1',
      method: 'GET',
      path: '/hello',
      url: '/hello?name=Ada&name=Grace&x=',
      headers: { 'user-agent': 'jest' },
      query: { name: 'Ada', x: '' },
      body: '',
      ip: undefined,
      protocol: 'http',
    });
  });

  it('should keep the path percent-encoded', () => {
    const request = toGatehouseRequest(incoming('POST', '/a%20b', {}), '{}', 'req-2');

    expect(request.path).toBe('/a%20b');
    expect(request.body).toBe('{}');
  });
});

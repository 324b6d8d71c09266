import { Readable } from 'node:stream';

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ExecutionError } from '@batchline/core';

import { Router } from '../router';
import { createRequestListener } from '../server';

import type { Logger } from '@batchline/core';
import type { IncomingRequest, OutgoingResponse } from '../server';
import type { RestHandler, RestRequest, RouteDescriptor } from '../types';

class FakeResponse implements OutgoingResponse {
  statusCode = 200;
  headers: Record<string, string> = {};
  body = '';

  setHeader(name: string, value: string): this {
    this.headers[name.toLowerCase()] = value;
    return this;
  }

  end(chunk: string): this {
    this.body = chunk;
    return this;
  }

  get json(): unknown {
    return JSON.parse(this.body);
  }
}

function request(method: string, url: string, chunks: string[] = []): IncomingRequest {
  return Object.assign(Readable.from(chunks), { method, url });
}

describe('Router', () => {
  const handler: RestHandler = async () => ({ status: 200, body: null });
  const router = new Router([
    { method: 'POST', path: '/person/batch_up', handler },
    { method: 'POST', path: '/person/:id', handler },
    { method: 'GET', path: '/person/:id', handler },
  ]);

  it('should prefer earlier routes', () => {
    expect(router.match('POST', '/person/batch_up')).toEqual({ handler, params: {} });
  });

  it('should capture and decode parameters', () => {
    expect(router.match('GET', '/person/jaime%20h')?.params).toEqual({ id: 'jaime h' });
  });

  it('should ignore trailing slashes', () => {
    expect(router.match('GET', '/person/tobie/')?.params).toEqual({ id: 'tobie' });
  });

  it('should not match other methods or lengths', () => {
    expect(router.match('DELETE', '/person/tobie')).toBeUndefined();
    expect(router.match('GET', '/person')).toBeUndefined();
    expect(router.match('GET', '/person/a/b')).toBeUndefined();
  });

  it('should not match malformed escapes', () => {
    expect(router.match('GET', '/person/%E0%A4%A')).toBeUndefined();
  });

  it('should know which paths exist under another method', () => {
    expect(router.allows('/person/tobie')).toBe(true);
    expect(router.allows('/people')).toBe(false);
  });
});

describe('createRequestListener', () => {
  let logger: Logger;
  let echo: RestHandler;
  let routes: RouteDescriptor[];

  beforeEach(() => {
    logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    echo = vi.fn(async (req: RestRequest) => ({ status: 200, body: req }));
    routes = [
      { method: 'POST', path: '/person/:id', handler: echo },
      { method: 'GET', path: '/people', handler: echo },
    ];
  });

  const send = async (incoming: IncomingRequest, maxBodyBytes?: number): Promise<FakeResponse> => {
    const response = new FakeResponse();
    await createRequestListener(routes, { logger, maxBodyBytes })(incoming, response);
    return response;
  };

  it('should pass params, query and the parsed body to the handler', async () => {
    const response = await send(request('POST', '/person/tobie?dry=1', ['{"name":', '"Tobie"}']));

    expect(response.statusCode).toBe(200);
    expect(response.headers['content-type']).toBe('application/json');
    expect(response.json).toEqual({
      params: { id: 'tobie' },
      query: { dry: '1' },
      body: { name: 'Tobie' },
    });
  });

  it('should accept binary chunks', async () => {
    const incoming = Object.assign(Readable.from([Buffer.from('{"name":"a"}')]), {
      method: 'POST',
      url: '/person/a',
    });

    const response = await send(incoming);

    expect(response.json).toMatchObject({ body: { name: 'a' } });
  });

  it('should treat an empty body as absent', async () => {
    const response = await send(request('GET', '/people'));

    expect(response.json).toEqual({ params: {}, query: {} });
  });

  it('should reject invalid JSON with 400', async () => {
    const response = await send(request('POST', '/person/tobie', ['{"name":']));

    expect(response.statusCode).toBe(400);
    expect(response.json).toMatchObject({ error: expect.stringMatching(/^Request body must be valid JSON: /) });
    expect(echo).not.toHaveBeenCalled();
  });

  it('should reject an oversized body with 413', async () => {
    const response = await send(request('POST', '/person/tobie', ['{"name":"abcdef"}']), 8);

    expect(response.statusCode).toBe(413);
    expect(response.json).toEqual({ error: 'Request body exceeds 8 bytes' });
  });

  it('should answer 404 for an unknown path', async () => {
    const response = await send(request('GET', '/nowhere'));

    expect(response.statusCode).toBe(404);
    expect(response.json).toEqual({ error: 'No route for /nowhere' });
  });

  it('should answer 405 for a known path under another method', async () => {
    const response = await send(request('DELETE', '/people'));

    expect(response.statusCode).toBe(405);
    expect(response.json).toEqual({ error: 'Method DELETE not allowed' });
  });

  it('should map a handler that throws', async () => {
    routes = [
      {
        method: 'GET',
        path: '/people',
        handler: async () => {
          throw new ExecutionError('Statement 0 failed: boom', 'SELECT * FROM person;');
        },
      },
    ];

    const response = await send(request('GET', '/people'));

    expect(response.statusCode).toBe(502);
    expect(response.json).toEqual({ error: 'Statement 0 failed: boom', code: 'EXECUTION_ERROR' });
    expect(logger.error).toHaveBeenCalledWith('GET /people failed', expect.anything());
  });

  it('should log every request with an id and duration', async () => {
    await send(request('GET', '/people'));

    expect(logger.info).toHaveBeenCalledWith('GET /people 200', {
      requestId: expect.stringMatching(/^[\da-f-]{36}$/),
      duration: expect.any(Number),
    });
  });
});

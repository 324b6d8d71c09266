/**
 * HTTP Server
 *
 * Adapts the framework-agnostic routes to node:http. The listener is
 * typed on the small part of the request and response it uses.
 */

import { randomUUID } from 'node:crypto';
import { createServer } from 'node:http';

import { consoleLogger, toError } from '@batchline/core';

import { mapErrorToResponse } from './error-mapping';
import { Router } from './router';

import type { Server } from 'node:http';
import type { Logger } from '@batchline/core';
import type { RestResponse, RouteDescriptor } from './types';

export interface IncomingRequest extends AsyncIterable<Buffer | string> {
  method?: string;
  url?: string;
}

export interface OutgoingResponse {
  statusCode: number;
  setHeader(name: string, value: string): unknown;
  end(chunk: string): unknown;
}

export interface HttpServerOptions {
  logger?: Logger;
  /** Largest accepted request body, in bytes */
  maxBodyBytes?: number;
}

const DEFAULT_MAX_BODY_BYTES = 1024 * 1024;

class BodyError extends Error {
  constructor(
    message: string,
    readonly status: number,
  ) {
    super(message);
    this.name = 'BodyError';
  }
}

async function readJsonBody(request: IncomingRequest, maxBytes: number): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;

  for await (const chunk of request) {
    const buffer = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
    size += buffer.length;
    if (size > maxBytes) {
      throw new BodyError(`Request body exceeds ${maxBytes} bytes`, 413);
    }
    chunks.push(buffer);
  }

  const text = Buffer.concat(chunks).toString('utf8');
  if (text.trim().length === 0) {
    return undefined;
  }

  try {
    return JSON.parse(text);
  } catch (error) {
    throw new BodyError(`Request body must be valid JSON: ${toError(error).message}`, 400);
  }
}

export function sendJson(response: OutgoingResponse, { status, body }: RestResponse): void {
  response.statusCode = status;
  response.setHeader('Content-Type', 'application/json');
  response.end(JSON.stringify(body));
}

export function createRequestListener(
  routes: RouteDescriptor[],
  options: HttpServerOptions = {},
): (request: IncomingRequest, response: OutgoingResponse) => Promise<void> {
  const logger = options.logger ?? consoleLogger;
  const maxBodyBytes = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;
  const router = new Router(routes);

  async function dispatch(method: string, url: URL, request: IncomingRequest): Promise<RestResponse> {
    const match = router.match(method, url.pathname);
    if (!match) {
      return router.allows(url.pathname)
        ? { status: 405, body: { error: `Method ${method} not allowed` } }
        : { status: 404, body: { error: `No route for ${url.pathname}` } };
    }

    let body: unknown;
    try {
      body = await readJsonBody(request, maxBodyBytes);
    } catch (error) {
      if (error instanceof BodyError) {
        return { status: error.status, body: { error: error.message } };
      }
      throw error;
    }

    return match.handler({
      params: match.params,
      query: Object.fromEntries(url.searchParams),
      body,
    });
  }

  return async (request, response) => {
    const requestId = randomUUID();
    const startTime = Date.now();
    const method = request.method ?? 'GET';
    const url = new URL(request.url ?? '/', 'http://localhost');

    let result: RestResponse;
    try {
      result = await dispatch(method, url, request);
    } catch (error) {
      logger.error(`${method} ${url.pathname} failed`, { requestId, error });
      result = mapErrorToResponse(error);
    }

    sendJson(response, result);
    logger.info(`${method} ${url.pathname} ${result.status}`, {
      requestId,
      duration: Date.now() - startTime,
    });
  };
}

export function createHttpServer(
  routes: RouteDescriptor[],
  options: HttpServerOptions = {},
): Server {
  const logger = options.logger ?? consoleLogger;
  const listener = createRequestListener(routes, options);

  return createServer((request, response) => {
    listener(request, response).catch((error: unknown) => {
      logger.error('Failed to send a response', { error });
    });
  });
}

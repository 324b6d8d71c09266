export * from './types';
export { NotFoundError, mapErrorToResponse } from './error-mapping';
export { Router } from './router';
export type { RouteMatch } from './router';
export { createPersonRoutes } from './handlers';
export type { PersonRoutesOptions } from './handlers';
export { createHttpServer, createRequestListener, sendJson } from './server';
export type { HttpServerOptions, IncomingRequest, OutgoingResponse } from './server';

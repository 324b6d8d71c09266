/**
 * HTTP Types
 *
 * Framework-agnostic request and response shapes. Handlers never touch
 * the transport; the server adapter translates.
 */

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export interface RestRequest {
  params: Record<string, string>;
  query: Record<string, string>;
  body: unknown;
}

export interface RestResponse {
  status: number;
  body: unknown;
}

export type RestHandler = (request: RestRequest) => Promise<RestResponse>;

export interface RouteDescriptor {
  method: HttpMethod;
  /** Path pattern with `:name` segments, e.g. `/person/:id` */
  path: string;
  handler: RestHandler;
}

export interface ErrorBody {
  error: string;
  code?: string;
}

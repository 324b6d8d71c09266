import type { HttpMethod, RestHandler, RouteDescriptor } from './types';

export interface RouteMatch {
  handler: RestHandler;
  params: Record<string, string>;
}

interface CompiledRoute {
  method: HttpMethod;
  segments: string[];
  handler: RestHandler;
}

function split(path: string): string[] {
  return path.split('/').filter((segment) => segment.length > 0);
}

/**
 * Matches request paths against route patterns in declaration order.
 * A `:name` segment captures one decoded path segment.
 */
export class Router {
  private readonly routes: CompiledRoute[];

  constructor(routes: RouteDescriptor[]) {
    this.routes = routes.map((route) => ({
      method: route.method,
      segments: split(route.path),
      handler: route.handler,
    }));
  }

  match(method: string, pathname: string): RouteMatch | undefined {
    const segments = split(pathname);

    for (const route of this.routes) {
      if (route.method !== method || route.segments.length !== segments.length) {
        continue;
      }

      const params = this.capture(route.segments, segments);
      if (params) {
        return { handler: route.handler, params };
      }
    }

    return undefined;
  }

  /** True when some route serves the path under another method */
  allows(pathname: string): boolean {
    const segments = split(pathname);
    return this.routes.some(
      (route) =>
        route.segments.length === segments.length &&
        this.capture(route.segments, segments) !== undefined,
    );
  }

  private capture(pattern: string[], segments: string[]): Record<string, string> | undefined {
    const params: Record<string, string> = {};

    for (const [index, part] of pattern.entries()) {
      const segment = segments[index];
      if (segment === undefined) {
        return undefined;
      }

      if (part.startsWith(':')) {
        try {
          params[part.slice(1)] = decodeURIComponent(segment);
        } catch {
          return undefined;
        }
      } else if (part !== segment) {
        return undefined;
      }
    }

    return params;
  }
}

/**
 * App Server
 *
 * Fetch-style HTTP router shared by every simulator entry point.
 *
 * @public
 */

import type {
  ServerConfig,
  Logger,
  Route,
  RouteContext,
  RouteGroup,
  RouteHandler,
} from '../types/public-api.js';
import { createServiceError, describeError, errorResponse } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { VERSION } from '../version.js';

/**
 * App Server options
 */
export interface AppServerOptions {
  config: ServerConfig;
  routes?: Route[];
  /** Extra fields merged into the `/health` body */
  healthInfo?: () => Record<string, unknown>;
  logger?: Logger;
}

/** Malformed percent escapes decode to null */
function decodeSegment(segment: string): string | null {
  try {
    return decodeURIComponent(segment);
  } catch (error) {
    if (error instanceof URIError) return null;
    throw error;
  }
}

/**
 * Match a route path against a request path.
 *
 * Supports exact paths, `:name` segments and a trailing `*` prefix match.
 * Returns the captured parameters, or null when the path does not match
 * (a segment that is not valid percent-encoding never matches).
 */
export function matchPath(pattern: string, pathname: string): Record<string, string> | null {
  if (pattern.endsWith('*')) {
    return pathname.startsWith(pattern.slice(0, -1)) ? {} : null;
  }
  if (!pattern.includes(':')) {
    return pattern === pathname ? {} : null;
  }

  const patternParts = pattern.split('/');
  const pathParts = pathname.split('/');
  if (patternParts.length !== pathParts.length) return null;

  const params: Record<string, string> = {};
  for (let i = 0; i < patternParts.length; i++) {
    const expected = patternParts[i] ?? '';
    const actual = pathParts[i] ?? '';
    if (expected.startsWith(':')) {
      if (!actual) return null;
      const decoded = decodeSegment(actual);
      if (decoded === null) return null;
      params[expected.slice(1)] = decoded;
    } else if (expected !== actual) {
      return null;
    }
  }
  return params;
}

/**
 * App Server
 *
 * Provides a fluent API for registering routes, answers CORS preflight and
 * `/health`, and turns unexpected handler exceptions into a 500 JSON error.
 *
 * @example
 * ```typescript
 * const server = new AppServer({ config });
 *
 * server
 *   .route('POST', '/api/sessions', handleStart)
 *   .route('GET', '/api/sessions/:id', handleStatus);
 *
 * const response = await server.fetch(new Request('http://localhost/health'));
 * ```
 *
 * @public
 */
export class AppServer {
  /** Framework version */
  static readonly VERSION = VERSION;

  private config: ServerConfig;
  private userRoutes: Route[] = [];
  private fallbackHandler: RouteHandler | null = null;
  private healthInfo: () => Record<string, unknown>;
  private logger: Logger;

  constructor(options: AppServerOptions) {
    this.config = options.config;
    this.healthInfo = options.healthInfo ?? (() => ({}));
    this.logger = options.logger ?? createLogger('server');

    for (const route of options.routes ?? []) {
      this.userRoutes.push(route);
    }
  }

  // ---------------------------------------------------------------------------
  // Route Composition (fluent API)
  // ---------------------------------------------------------------------------

  /**
   * Register a single HTTP route
   *
   * @param method - HTTP method ('GET', 'POST', etc.) or '*' for all methods
   * @param path - URL path pattern (`:name` parameters, trailing * for prefix matching)
   * @param handler - Route handler function
   * @param description - Optional description for the endpoint index
   * @returns this for method chaining
   */
  route(
    method: Route['method'],
    path: string,
    handler: RouteHandler,
    description?: string
  ): this {
    this.userRoutes.push({ method, path, handler, description });
    return this;
  }

  /**
   * Register multiple routes from a route group
   *
   * @example
   * ```typescript
   * server.routes({ prefix: '/api/appliances', routes: applianceRoutes });
   * ```
   */
  routes(group: RouteGroup | Route[]): this {
    const routeList = Array.isArray(group) ? group : group.routes;
    const prefix = Array.isArray(group) ? '' : (group.prefix ?? '');

    for (const route of routeList) {
      this.userRoutes.push({
        ...route,
        path: prefix + route.path,
      });
    }
    return this;
  }

  /**
   * Set fallback handler for unmatched requests
   */
  fallback(handler: RouteHandler): this {
    this.fallbackHandler = handler;
    return this;
  }

  // ---------------------------------------------------------------------------
  // Request Handling
  // ---------------------------------------------------------------------------

  /**
   * Handle incoming HTTP request
   */
  async fetch(request: Request): Promise<Response> {
    const url = new URL(request.url);

    // 1. CORS preflight (always first)
    const corsResponse = this.handleCORS(request);
    if (corsResponse) return corsResponse;

    // 2. Health check endpoint
    if (url.pathname === '/health' && request.method === 'GET') {
      return this.withCORS(request, this.handleHealth());
    }

    try {
      // 3. User-registered routes (in registration order)
      const userResponse = await this.handleUserRoutes(request, url);
      if (userResponse) return this.withCORS(request, userResponse);

      // 4. Fallback handler
      if (this.fallbackHandler) {
        const fallbackResponse = await this.fallbackHandler(request, { url, params: {} });
        if (fallbackResponse) return this.withCORS(request, fallbackResponse);
      }
    } catch (error) {
      this.logger.error(`${request.method} ${url.pathname} failed:`, describeError(error));
      return this.withCORS(
        request,
        errorResponse(createServiceError('INTERNAL_ERROR', 'Internal server error'))
      );
    }

    // 5. Default 404
    return new Response('Not Found', { status: 404 });
  }

  /**
   * Handle CORS preflight requests
   */
  private handleCORS(request: Request): Response | null {
    if (request.method !== 'OPTIONS') return null;

    const origin = request.headers.get('Origin');
    const allowOrigin = this.allowedOrigin(origin);

    if (!allowOrigin) {
      return new Response(null, { status: 403 });
    }

    return new Response(null, {
      status: 204,
      headers: {
        'Access-Control-Allow-Origin': allowOrigin,
        'Access-Control-Allow-Methods': this.config.cors?.methods?.join(', ') ??
          'GET, POST, PUT, DELETE, OPTIONS',
        'Access-Control-Allow-Headers': this.config.cors?.headers?.join(', ') ??
          'Content-Type, Authorization',
        'Access-Control-Max-Age': String(this.config.cors?.maxAge ?? 86400),
      },
    });
  }

  /**
   * Resolve the Access-Control-Allow-Origin value, or null if not allowed
   */
  private allowedOrigin(origin: string | null): string | null {
    const allowedOrigins = this.config.cors?.origins ?? ['*'];
    if (allowedOrigins.includes('*')) return '*';
    if (origin && allowedOrigins.includes(origin)) return origin;
    return null;
  }

  /**
   * Add the allow-origin header to a non-preflight response
   */
  private withCORS(request: Request, response: Response): Response {
    const allowOrigin = this.allowedOrigin(request.headers.get('Origin'));
    if (allowOrigin && !response.headers.has('Access-Control-Allow-Origin')) {
      response.headers.set('Access-Control-Allow-Origin', allowOrigin);
    }
    return response;
  }

  /**
   * Handle health check endpoint
   */
  private handleHealth(): Response {
    return new Response(
      JSON.stringify({
        status: 'ok',
        name: this.config.app.name,
        version: this.config.app.version,
        frameworkVersion: VERSION,
        timestamp: new Date().toISOString(),
        ...this.healthInfo(),
      }),
      {
        headers: { 'Content-Type': 'application/json' },
      }
    );
  }

  /**
   * Handle user-registered routes
   */
  private async handleUserRoutes(request: Request, url: URL): Promise<Response | null> {
    for (const route of this.userRoutes) {
      // Check method
      if (route.method !== '*' && route.method !== request.method) {
        continue;
      }

      const params = matchPath(route.path, url.pathname);
      if (params) {
        const context: RouteContext = { url, params };
        const response = await route.handler(request, context);
        if (response) return response;
      }
    }

    return null;
  }

  // ---------------------------------------------------------------------------
  // Getters
  // ---------------------------------------------------------------------------

  /**
   * Get all user-registered routes
   */
  getRoutes(): Route[] {
    return [...this.userRoutes];
  }

  /**
   * Get server configuration (read-only copy)
   */
  getConfig(): Readonly<ServerConfig> {
    return Object.freeze({ ...this.config });
  }
}

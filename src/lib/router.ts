import { Errors } from './errors.js';
import type { RequestHead } from './framing.js';
import type { HttpResponse } from './response.js';

/**
 * What a handler sees of one request
 */
export interface RequestContext {
  head: RequestHead;
  /** Request ID for logging/tracking */
  requestId: string;
  /** Read the declared body, bounded by the configured maximum */
  readBody(): Promise<Buffer>;
}

export type RouteHandler = (ctx: RequestContext) => Promise<HttpResponse> | HttpResponse;

/**
 * Read the body and parse it as JSON
 */
export async function readJsonBody(ctx: RequestContext): Promise<unknown> {
  const body = await ctx.readBody();
  try {
    return JSON.parse(body.toString('utf8'));
  } catch (err) {
    throw Errors.invalidJson(err instanceof Error ? err.message : String(err));
  }
}

/**
 * Exact-path router keyed by path, then method
 */
export class Router {
  private routes = new Map<string, Map<string, RouteHandler>>();

  get(path: string, handler: RouteHandler): this {
    return this.add('GET', path, handler);
  }

  post(path: string, handler: RouteHandler): this {
    return this.add('POST', path, handler);
  }

  /**
   * Copy every route of another router into this one
   */
  use(other: Router): this {
    for (const [path, byMethod] of other.routes) {
      for (const [method, handler] of byMethod) {
        this.add(method, path, handler);
      }
    }
    return this;
  }

  private add(method: string, path: string, handler: RouteHandler): this {
    const byMethod = this.routes.get(path) ?? new Map<string, RouteHandler>();
    if (byMethod.has(method)) {
      throw new Error(`Route already registered: ${method} ${path}`);
    }
    byMethod.set(method, handler);
    this.routes.set(path, byMethod);
    return this;
  }

  /**
   * Run the matching handler
   *
   * @throws ApiError not_found unless both path and method match
   */
  async handle(ctx: RequestContext): Promise<HttpResponse> {
    const handler = this.routes.get(ctx.head.path)?.get(ctx.head.method);
    if (!handler) {
      throw Errors.notFound();
    }

    return handler(ctx);
  }
}

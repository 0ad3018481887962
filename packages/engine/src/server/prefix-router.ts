import type { HttpExchange } from "../http/types.js";

export interface RequestHandler {
  handle(exchange: HttpExchange): Promise<void>;
}

interface Route {
  prefix: string;
  handler: RequestHandler;
}

/**
 * Picks a handler by URI prefix. Routes are tried in registration order and
 * the first match wins; the prefix is left on the URI.
 */
export class PrefixRouter {
  private routes: Route[] = [];

  add(prefix: string, handler: RequestHandler): this {
    this.routes.push({ prefix, handler });
    return this;
  }

  match(uri: string): RequestHandler | null {
    return this.routes.find((route) => uri.startsWith(route.prefix))?.handler ?? null;
  }
}

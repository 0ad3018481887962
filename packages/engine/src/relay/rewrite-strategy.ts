import type { HttpRequestMessage } from "../http/request-message.js";
import type { HttpResponseMessage } from "../http/response-message.js";

/**
 * Header rewriting hooks for a relayed exchange. Each is called exactly once,
 * before any bytes reflecting its changes are sent on.
 */
export interface RewriteStrategy {
  rewriteRequest(request: HttpRequestMessage): void | Promise<void>;
  rewriteResponse(response: HttpResponseMessage): void | Promise<void>;
}

/**
 * Points the request at the target host and forces `Connection: close` both
 * ways, since only the first exchange on a connection is parsed.
 */
export class DefaultRewriteStrategy implements RewriteStrategy {
  constructor(private readonly targetHost: string) {}

  rewriteRequest(request: HttpRequestMessage): void {
    request.headers.replace("Host", this.targetHost);
    request.headers.replace("Connection", "close");
  }

  rewriteResponse(response: HttpResponseMessage): void {
    response.headers.replace("Connection", "close");
  }
}

/**
 * Runs `base` first and then whichever hooks `extra` provides.
 *
 * @example
 * const strategy = withRewrites(new DefaultRewriteStrategy("api.internal"), {
 *   rewriteResponse: (response) => response.headers.remove("Set-Cookie"),
 * });
 */
export function withRewrites(
  base: RewriteStrategy,
  extra: Partial<RewriteStrategy>,
): RewriteStrategy {
  return {
    async rewriteRequest(request) {
      await base.rewriteRequest(request);
      await extra.rewriteRequest?.(request);
    },
    async rewriteResponse(response) {
      await base.rewriteResponse(response);
      await extra.rewriteResponse?.(response);
    },
  };
}

import type { ProxyRouteConfig, ServerConfig } from "../config/server-config.js";
import type { IFileSystem } from "../interfaces/filesystem.js";
import type { ISocketFactory } from "../interfaces/socket.js";
import type { Logger } from "../logging/logger.js";
import { basicLogger, prefixedLogger } from "../logging/logger.js";
import { RelayEngine } from "../relay/relay-engine.js";
import type { RewriteStrategy } from "../relay/rewrite-strategy.js";
import {
  DefaultRewriteStrategy,
  withRewrites,
} from "../relay/rewrite-strategy.js";
import { createTargetConnector } from "../relay/target-connector.js";
import { PrefixRouter } from "./prefix-router.js";
import { ProxyHandler } from "./proxy-handler.js";
import { StaticFilesHandler } from "./static-files-handler.js";

export interface RouterDependencies {
  socketFactory: ISocketFactory;
  fileSystem: IFileSystem;
  logger?: Logger;
  /** Extra rewrite hooks for a proxy route, run after the default ones. */
  rewritesFor?: (route: ProxyRouteConfig) => Partial<RewriteStrategy> | undefined;
}

/** Build a router with one handler per configured route, in order. */
export function createRouter(
  config: ServerConfig,
  deps: RouterDependencies,
): PrefixRouter {
  const logger = deps.logger ?? basicLogger();
  const router = new PrefixRouter();

  for (const route of config.routes) {
    if (route.kind === "static") {
      router.add(
        route.prefix,
        new StaticFilesHandler({
          root: route.root,
          fs: deps.fileSystem,
          logger: prefixedLogger("static", logger),
        }),
      );
      continue;
    }

    const base = new DefaultRewriteStrategy(route.targetHost);
    const extra = deps.rewritesFor?.(route);
    const engine = new RelayEngine({
      target: { host: route.targetHost, port: route.targetPort },
      connect: createTargetConnector(deps.socketFactory, { tls: route.tls }),
      strategy: extra ? withRewrites(base, extra) : base,
      maxHeaderSize: config.maxHeaderSize,
      logger: prefixedLogger(`proxy ${route.targetHost}`, logger),
    });
    router.add(route.prefix, new ProxyHandler(engine));
  }

  return router;
}

import { NodeFileSystem, NodeSocketFactory } from "../adapters/node/index.js";
import type { ServerConfig } from "../config/server-config.js";
import type { Logger } from "../logging/logger.js";
import { ProxyServer } from "../server/proxy-server.js";
import type { RouterDependencies } from "../server/routes.js";
import { createRouter } from "../server/routes.js";

export interface NodeServerOptions {
  config: ServerConfig;
  logger?: Logger;
  rewritesFor?: RouterDependencies["rewritesFor"];
}

export function createNodeServer(options: NodeServerOptions): ProxyServer {
  const socketFactory = new NodeSocketFactory();
  const router = createRouter(options.config, {
    socketFactory,
    fileSystem: new NodeFileSystem(),
    logger: options.logger,
    rewritesFor: options.rewritesFor,
  });
  return new ProxyServer({
    socketFactory,
    router,
    config: options.config,
    logger: options.logger,
  });
}

// Node adapters
export {
  NodeFileHandle,
  NodeFileSystem,
  NodeSocketFactory,
  NodeTcpServer,
  NodeTcpSocket,
} from "./adapters/node/index.js";
// Config
export type {
  ProxyRouteConfig,
  RouteConfig,
  ServerConfig,
  StaticRouteConfig,
} from "./config/server-config.js";
export { defaultConfig, proxyRoute } from "./config/server-config.js";
// HTTP
export { HeaderCollection, HeaderField } from "./http/header-collection.js";
export type { HttpMessageOptions, HttpParseErrorCode } from "./http/message.js";
export {
  DEFAULT_MAX_HEADER_SIZE,
  HttpMessage,
  HttpParseError,
} from "./http/message.js";
export type {
  HttpRequestReadErrorCode,
  ReadRequestOptions,
} from "./http/request-reader.js";
export { HttpRequestReadError, readRequest } from "./http/request-reader.js";
export { HttpRequestMessage } from "./http/request-message.js";
export { HttpResponseMessage } from "./http/response-message.js";
export { sendFileResponse, sendResponse } from "./http/response-writer.js";
export type { HttpExchange, HttpResponseOptions } from "./http/types.js";
export { STATUS_TEXT } from "./http/types.js";
// Interfaces
export type {
  IFileHandle,
  IFileStat,
  IFileSystem,
} from "./interfaces/filesystem.js";
export type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
  TcpSocketOptions,
} from "./interfaces/socket.js";
// Logging
export type { Logger, LogLevel } from "./logging/logger.js";
export {
  basicLogger,
  filteredLogger,
  prefixedLogger,
} from "./logging/logger.js";
// Presets
export type { NodeServerOptions } from "./presets/node.js";
export { createNodeServer } from "./presets/node.js";
// Relay
export type { Readiness } from "./relay/readiness.js";
export { ReadinessSelector } from "./relay/readiness.js";
export type {
  RelayEngineOptions,
  RelayStats,
  RelayTarget,
} from "./relay/relay-engine.js";
export { RelayEngine } from "./relay/relay-engine.js";
export type { RewriteStrategy } from "./relay/rewrite-strategy.js";
export {
  DefaultRewriteStrategy,
  withRewrites,
} from "./relay/rewrite-strategy.js";
export type { SourceEvent } from "./relay/socket-source.js";
export { SocketSource } from "./relay/socket-source.js";
export type {
  TargetConnector,
  TargetConnectorOptions,
} from "./relay/target-connector.js";
export { createTargetConnector } from "./relay/target-connector.js";
// Server
export type { RequestHandler } from "./server/prefix-router.js";
export { PrefixRouter } from "./server/prefix-router.js";
export { ProxyHandler } from "./server/proxy-handler.js";
export type { ProxyServerOptions } from "./server/proxy-server.js";
export { ProxyServer } from "./server/proxy-server.js";
export type { RouterDependencies } from "./server/routes.js";
export { createRouter } from "./server/routes.js";
export type { StaticFilesHandlerOptions } from "./server/static-files-handler.js";
export { StaticFilesHandler } from "./server/static-files-handler.js";
// Testing
export {
  InMemorySocketFactory,
  InMemoryTcpSocket,
} from "./testing/in-memory-socket-factory.js";
// Utils
export { concat, decodeToString, fromString } from "./utils/buffer.js";

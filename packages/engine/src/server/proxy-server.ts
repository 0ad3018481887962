import type { ServerConfig } from "../config/server-config.js";
import { HttpParseError } from "../http/message.js";
import { readRequest } from "../http/request-reader.js";
import { sendResponse } from "../http/response-writer.js";
import { STATUS_TEXT } from "../http/types.js";
import type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
} from "../interfaces/socket.js";
import type { Logger } from "../logging/logger.js";
import { basicLogger } from "../logging/logger.js";
import { SocketSource } from "../relay/socket-source.js";
import { fromString } from "../utils/buffer.js";
import type { PrefixRouter } from "./prefix-router.js";

export interface ProxyServerOptions {
  socketFactory: ISocketFactory;
  router: PrefixRouter;
  config: ServerConfig;
  logger?: Logger;
}

/**
 * Accepts connections and runs one exchange per connection: read the request
 * head, hand it to the first handler whose prefix matches, then close.
 */
export class ProxyServer {
  private socketFactory: ISocketFactory;
  private router: PrefixRouter;
  private config: ServerConfig;
  private logger: Logger;
  private tcpServer: ITcpServer | null = null;
  private activeConnections: Set<ITcpSocket> = new Set();
  private pending: Set<Promise<void>> = new Set();

  constructor(options: ProxyServerOptions) {
    this.socketFactory = options.socketFactory;
    this.router = options.router;
    this.config = options.config;
    this.logger = options.logger ?? basicLogger();
  }

  start(): Promise<number> {
    if (this.tcpServer) {
      return Promise.reject(new Error("Server is already started"));
    }

    return new Promise((resolve, reject) => {
      const server = this.socketFactory.createTcpServer();
      this.tcpServer = server;

      let settled = false;

      server.on("connection", (rawSocket) => {
        const socket = this.socketFactory.wrapTcpSocket(rawSocket);
        const task = this.handleConnection(socket);
        this.pending.add(task);
        void task.finally(() => this.pending.delete(task));
      });

      server.on("error", (err) => {
        if (!settled) {
          settled = true;
          this.tcpServer = null;
          reject(err);
          return;
        }
        this.logger.error("TCP server error:", err);
      });

      server.listen(this.config.port, this.config.host, () => {
        if (settled) return;
        settled = true;
        const addr = server.address();
        resolve(addr?.port ?? this.config.port);
      });
    });
  }

  async stop(): Promise<void> {
    const server = this.tcpServer;
    this.tcpServer = null;

    for (const socket of this.activeConnections) {
      socket.close();
    }
    this.activeConnections.clear();

    if (server) {
      await new Promise<void>((resolve) => server.close(() => resolve()));
    }
    await Promise.all(this.pending);
  }

  /** Never rejects: failures are logged and end the connection. */
  async handleConnection(socket: ITcpSocket): Promise<void> {
    this.activeConnections.add(socket);
    socket.onClose(() => {
      this.activeConnections.delete(socket);
    });

    const peer = `${socket.remoteAddress ?? "?"}:${socket.remotePort ?? "?"}`;
    const source = new SocketSource(socket);

    try {
      const request = await readRequest(source, {
        timeoutMs: this.config.requestTimeoutMs,
        maxHeaderSize: this.config.maxHeaderSize,
      }).catch((err: unknown) => {
        this.rejectRequest(socket, err, peer);
        return null;
      });
      if (!request) return;

      if (!this.config.quiet) {
        this.logger.info(`${request.startLine} - ${peer}`);
      }

      const handler = this.router.match(request.uri);
      if (!handler) {
        sendResponse(socket, {
          status: 404,
          statusText: STATUS_TEXT[404],
          body: fromString(`No handler for ${request.uri}.\n`),
        });
        return;
      }

      await handler.handle({ socket, source, request });
    } catch (err) {
      this.logger.error(`Error handling request from ${peer}:`, err);
    } finally {
      socket.close();
      this.activeConnections.delete(socket);
    }
  }

  private rejectRequest(socket: ITcpSocket, err: unknown, peer: string): void {
    if (!(err instanceof HttpParseError)) {
      const reason = err instanceof Error ? err.message : String(err);
      this.logger.debug(`Dropping connection from ${peer}: ${reason}`);
      return;
    }

    this.logger.warn(`Bad request from ${peer}: ${err.message}`);
    const status = err.code === "HEADERS_TOO_LARGE" ? 431 : 400;
    sendResponse(socket, {
      status,
      statusText: STATUS_TEXT[status],
      body: fromString(STATUS_TEXT[status]),
    });
  }
}

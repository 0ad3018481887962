import { DEFAULT_MAX_HEADER_SIZE } from "../http/message.js";
import { HttpResponseMessage } from "../http/response-message.js";
import { sendChunk } from "../http/response-writer.js";
import type { HttpExchange } from "../http/types.js";
import type { ITcpSocket } from "../interfaces/socket.js";
import type { Logger } from "../logging/logger.js";
import { basicLogger } from "../logging/logger.js";
import { ReadinessSelector } from "./readiness.js";
import type { RewriteStrategy } from "./rewrite-strategy.js";
import { SocketSource } from "./socket-source.js";
import type { TargetConnector } from "./target-connector.js";

export interface RelayTarget {
  host: string;
  port: number;
}

export interface RelayEngineOptions {
  target: RelayTarget;
  connect: TargetConnector;
  strategy: RewriteStrategy;
  /** Bound on the buffered response header block. Default: 64KB */
  maxHeaderSize?: number;
  logger?: Logger;
}

export interface RelayStats {
  clientToTargetBytes: number;
  targetToClientBytes: number;
}

/**
 * Relays one request/response exchange between a client and a target.
 *
 * The rewritten request goes out first. After that both sockets are read
 * concurrently: client bytes go to the target untouched, and target bytes
 * are held in a response parser until its header block is complete. At
 * that point the response is rewritten and sent in serialized form, and
 * every later target chunk is passed through as is. The loop ends when
 * either peer closes.
 *
 * The target socket is always closed on return. The client socket is left
 * open for the caller.
 */
export class RelayEngine {
  private readonly target: RelayTarget;
  private readonly connect: TargetConnector;
  private readonly strategy: RewriteStrategy;
  private readonly maxHeaderSize: number;
  private readonly logger: Logger;

  constructor(options: RelayEngineOptions) {
    this.target = options.target;
    this.connect = options.connect;
    this.strategy = options.strategy;
    this.maxHeaderSize = options.maxHeaderSize ?? DEFAULT_MAX_HEADER_SIZE;
    this.logger = options.logger ?? basicLogger();
  }

  async relay(exchange: HttpExchange): Promise<RelayStats> {
    const { request } = exchange;
    await this.strategy.rewriteRequest(request);

    const targetSocket = await this.connect(this.target.host, this.target.port);
    try {
      return await this.pump(exchange, targetSocket);
    } finally {
      targetSocket.close();
    }
  }

  private async pump(
    exchange: HttpExchange,
    targetSocket: ITcpSocket,
  ): Promise<RelayStats> {
    const stats: RelayStats = { clientToTargetBytes: 0, targetToClientBytes: 0 };
    const response = new HttpResponseMessage({
      maxHeaderSize: this.maxHeaderSize,
    });
    const selector = new ReadinessSelector({
      client: exchange.source,
      target: new SocketSource(targetSocket),
    });

    const requestData = exchange.request.serialize();
    await sendChunk(targetSocket, requestData);
    stats.clientToTargetBytes += requestData.length;
    this.logger.debug(`>>> ${exchange.request.startLine}`);

    while (true) {
      const { source, event } = await selector.next();

      if (event.type === "error") {
        throw event.error;
      }

      if (event.type === "end") {
        if (source === "target" && !response.headersRead) {
          this.logger.warn(
            "Target closed before sending complete response headers",
          );
        }
        this.logger.debug(`${source} closed`);
        break;
      }

      if (source === "client") {
        await sendChunk(targetSocket, event.data);
        stats.clientToTargetBytes += event.data.length;
        this.logger.debug(`>>> ${event.data.length} bytes`);
        continue;
      }

      let data = event.data;
      if (!response.headersRead) {
        response.feed(data);
        // Nothing goes to the client until the header block is complete
        if (!response.headersRead) continue;
        await this.strategy.rewriteResponse(response);
        data = response.serialize();
        this.logger.debug(`<<< ${response.startLine}`);
      }

      await sendChunk(exchange.socket, data);
      stats.targetToClientBytes += data.length;
      this.logger.debug(`<<< ${data.length} bytes`);
    }

    this.logger.info(
      `Closing relayed request. client_to_target_bytes=${stats.clientToTargetBytes}, target_to_client_bytes=${stats.targetToClientBytes}`,
    );
    return stats;
  }
}

import type { HttpExchange } from "../http/types.js";
import type { RelayEngine } from "../relay/relay-engine.js";
import type { RequestHandler } from "./prefix-router.js";

export class ProxyHandler implements RequestHandler {
  constructor(private readonly engine: RelayEngine) {}

  async handle(exchange: HttpExchange): Promise<void> {
    await this.engine.relay(exchange);
  }
}

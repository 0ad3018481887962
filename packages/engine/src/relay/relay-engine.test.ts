import { describe, expect, it, vi } from "vitest";
import { HttpParseError } from "../http/message.js";
import { readRequest } from "../http/request-reader.js";
import type { HttpExchange } from "../http/types.js";
import type { Logger } from "../logging/logger.js";
import {
  InMemorySocketFactory,
  InMemoryTcpSocket,
} from "../testing/in-memory-socket-factory.js";
import { concat, decodeToString, fromString } from "../utils/buffer.js";
import { RelayEngine } from "./relay-engine.js";
import type { RewriteStrategy } from "./rewrite-strategy.js";
import { DefaultRewriteStrategy, withRewrites } from "./rewrite-strategy.js";
import { SocketSource } from "./socket-source.js";
import { createTargetConnector } from "./target-connector.js";

const TARGET_HOST = "jira.domain.com";
const TARGET_PORT = 443;

interface ScriptedTarget {
  /** Everything the target has received so far. */
  received(): string;
  socket(): InMemoryTcpSocket | null;
}

/**
 * Registers a target that waits until `respondWhen` holds for what it has
 * received, then writes each response chunk separately and closes.
 */
function scriptedTarget(
  factory: InMemorySocketFactory,
  responseChunks: string[],
  respondWhen: (received: string) => boolean = (text) => text.includes("\r\n\r\n"),
): ScriptedTarget {
  const chunks: Uint8Array[] = [];
  let remote: InMemoryTcpSocket | null = null;

  factory.addTarget(TARGET_HOST, TARGET_PORT, (socket) => {
    remote = socket;
    let responded = false;
    socket.onData((data) => {
      chunks.push(data);
      if (responded || !respondWhen(decodeToString(concat(chunks)))) return;
      responded = true;
      for (const chunk of responseChunks) {
        socket.send(fromString(chunk));
      }
      socket.close();
    });
  });

  return {
    received: () => decodeToString(concat(chunks)),
    socket: () => remote,
  };
}

interface ClientConnection {
  exchange: HttpExchange;
  received(): string;
  peer: InMemoryTcpSocket;
}

async function openExchange(chunks: string[]): Promise<ClientConnection> {
  const [peer, socket] = InMemoryTcpSocket.createPair();
  const source = new SocketSource(socket);
  const received: Uint8Array[] = [];
  peer.onData((data) => received.push(data));

  for (const chunk of chunks) {
    peer.send(fromString(chunk));
  }
  const request = await readRequest(source);

  return {
    exchange: { socket, source, request },
    received: () => decodeToString(concat(received)),
    peer,
  };
}

function silentLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function createEngine(
  factory: InMemorySocketFactory,
  strategy: RewriteStrategy = new DefaultRewriteStrategy(TARGET_HOST),
  logger: Logger = silentLogger(),
): RelayEngine {
  return new RelayEngine({
    target: { host: TARGET_HOST, port: TARGET_PORT },
    connect: createTargetConnector(factory),
    strategy,
    logger,
  });
}

const settle = () => new Promise((resolve) => setTimeout(resolve, 0));

describe("RelayEngine", () => {
  it("rewrites Host and Connection on the outbound request", async () => {
    const factory = new InMemorySocketFactory();
    const target = scriptedTarget(factory, ["HTTP/1.1 204 No Content\r\n\r\n"]);
    const client = await openExchange([
      "GET /rest/auth/1/session HTTP/1.1\r\nHost: localhost:8080\r\n\r\n",
    ]);

    await createEngine(factory).relay(client.exchange);

    expect(client.exchange.request.uri).toBe("/rest/auth/1/session");
    expect(client.exchange.request.headers.value("Host")).toBe(TARGET_HOST);
    expect(client.exchange.request.headers.value("Connection")).toBe("close");
    expect(target.received()).toBe(
      "GET /rest/auth/1/session HTTP/1.1\r\n" +
        "Host: jira.domain.com\r\n" +
        "Connection: close\r\n" +
        "\r\n",
    );
  });

  it("holds split response headers and forwards them rewritten", async () => {
    const factory = new InMemorySocketFactory();
    scriptedTarget(factory, ["HTTP/1.1 200 OK\r\nSet-Co", "okie: a=1\r\n\r\nBODY"]);
    const client = await openExchange(["GET / HTTP/1.1\r\nHost: localhost\r\n\r\n"]);

    const stats = await createEngine(factory).relay(client.exchange);
    await settle();

    const expected =
      "HTTP/1.1 200 OK\r\nSet-Cookie: a=1\r\nConnection: close\r\n\r\nBODY";
    expect(client.received()).toBe(expected);
    expect(stats).toEqual({
      clientToTargetBytes: "GET / HTTP/1.1\r\nHost: jira.domain.com\r\nConnection: close\r\n\r\n".length,
      targetToClientBytes: expected.length,
    });
  });

  it("lets a composed strategy drop Set-Cookie from the response", async () => {
    const factory = new InMemorySocketFactory();
    scriptedTarget(factory, [
      "HTTP/1.1 200 OK\r\nContent-Type: text/plain\r\nSet-Cookie: sid=abc\r\nContent-Length: 4\r\n\r\nBODY",
    ]);
    const client = await openExchange(["GET / HTTP/1.1\r\nHost: localhost\r\n\r\n"]);
    const strategy = withRewrites(new DefaultRewriteStrategy(TARGET_HOST), {
      rewriteResponse: (response) => response.headers.remove("Set-Cookie"),
    });

    await createEngine(factory, strategy).relay(client.exchange);
    await settle();

    expect(client.received()).toBe(
      "HTTP/1.1 200 OK\r\n" +
        "Content-Type: text/plain\r\n" +
        "Content-Length: 4\r\n" +
        "Connection: close\r\n" +
        "\r\n" +
        "BODY",
    );
  });

  it("passes bytes after the response headers through untouched", async () => {
    const factory = new InMemorySocketFactory();
    scriptedTarget(factory, [
      "HTTP/1.1 200 OK\r\n\r\nfirst",
      "Set-Cookie: not-a-header\r\n\r\n",
      "tail",
    ]);
    const client = await openExchange(["GET / HTTP/1.1\r\n\r\n"]);

    await createEngine(factory).relay(client.exchange);
    await settle();

    expect(client.received()).toBe(
      "HTTP/1.1 200 OK\r\nConnection: close\r\n\r\nfirst" +
        "Set-Cookie: not-a-header\r\n\r\n" +
        "tail",
    );
  });

  it("forwards client bytes sent after the request head", async () => {
    const factory = new InMemorySocketFactory();
    const target = scriptedTarget(
      factory,
      ["HTTP/1.1 201 Created\r\n\r\n"],
      (text) => text.endsWith("helloworld"),
    );
    const client = await openExchange([
      "POST /upload HTTP/1.1\r\nHost: localhost\r\nContent-Length: 10\r\n\r\nhello",
      "world",
    ]);

    const stats = await createEngine(factory).relay(client.exchange);

    const expected =
      "POST /upload HTTP/1.1\r\n" +
      "Content-Length: 10\r\n" +
      "Host: jira.domain.com\r\n" +
      "Connection: close\r\n" +
      "\r\n" +
      "helloworld";
    expect(target.received()).toBe(expected);
    expect(stats.clientToTargetBytes).toBe(expected.length);
  });

  it("calls each rewrite hook once, and awaits async hooks", async () => {
    const factory = new InMemorySocketFactory();
    const target = scriptedTarget(factory, [
      "HTTP/1.1 200 OK\r\n",
      "A: 1\r\n",
      "\r\nbody",
      "more",
    ]);
    const client = await openExchange(["GET /a HTTP/1.1\r\n\r\n"]);
    const rewriteRequest = vi.fn(async (request: { uri: string }) => {
      await new Promise((resolve) => setTimeout(resolve, 5));
      request.uri = "/b";
    });
    const rewriteResponse = vi.fn();

    await createEngine(factory, { rewriteRequest, rewriteResponse }).relay(
      client.exchange,
    );
    await settle();

    expect(rewriteRequest).toHaveBeenCalledTimes(1);
    expect(rewriteResponse).toHaveBeenCalledTimes(1);
    expect(target.received()).toBe("GET /b HTTP/1.1\r\n\r\n");
    expect(client.received()).toBe("HTTP/1.1 200 OK\r\nA: 1\r\n\r\nbodymore");
  });

  it("connects over TLS with the target name", async () => {
    const factory = new InMemorySocketFactory();
    scriptedTarget(factory, ["HTTP/1.1 204 No Content\r\n\r\n"]);
    const client = await openExchange(["GET / HTTP/1.1\r\n\r\n"]);

    await createEngine(factory).relay(client.exchange);

    expect(factory.outbound).toHaveLength(1);
    expect(factory.outbound[0].isSecure).toBe(true);
    expect(factory.outbound[0].servername).toBe(TARGET_HOST);
  });

  it("stops when the client closes and closes the target", async () => {
    const factory = new InMemorySocketFactory();
    const target = scriptedTarget(factory, [], () => false);
    const client = await openExchange(["GET / HTTP/1.1\r\n\r\n"]);

    const relay = createEngine(factory).relay(client.exchange);
    setTimeout(() => client.peer.close(), 5);
    const stats = await relay;
    await settle();

    expect(stats.targetToClientBytes).toBe(0);
    expect(factory.outbound[0].isClosed).toBe(true);
    expect(target.socket()?.isClosed).toBe(true);
  });

  it("forwards nothing when the target closes mid-headers", async () => {
    const factory = new InMemorySocketFactory();
    scriptedTarget(factory, ["HTTP/1.1 200 OK\r\nPartial: x"]);
    const client = await openExchange(["GET / HTTP/1.1\r\n\r\n"]);
    const logger = silentLogger();

    const stats = await createEngine(
      factory,
      new DefaultRewriteStrategy(TARGET_HOST),
      logger,
    ).relay(client.exchange);
    await settle();

    expect(stats.targetToClientBytes).toBe(0);
    expect(client.received()).toBe("");
    expect(logger.warn).toHaveBeenCalledWith(
      "Target closed before sending complete response headers",
    );
  });

  it("fails on a malformed response and still closes the target", async () => {
    const factory = new InMemorySocketFactory();
    scriptedTarget(factory, ["garbage\r\n\r\n"]);
    const client = await openExchange(["GET / HTTP/1.1\r\n\r\n"]);

    await expect(createEngine(factory).relay(client.exchange)).rejects.toBeInstanceOf(
      HttpParseError,
    );
    expect(factory.outbound[0].isClosed).toBe(true);
    expect(client.received()).toBe("");
  });

  it("propagates target socket errors and closes the target", async () => {
    const factory = new InMemorySocketFactory();
    factory.addTarget(TARGET_HOST, TARGET_PORT, (socket) => {
      socket.onData(() => factory.outbound[0].fail(new Error("connection reset")));
    });
    const client = await openExchange(["GET / HTTP/1.1\r\n\r\n"]);

    await expect(createEngine(factory).relay(client.exchange)).rejects.toThrow(
      "connection reset",
    );
    expect(factory.outbound[0].isClosed).toBe(true);
  });

  it("propagates connect failures", async () => {
    const factory = new InMemorySocketFactory();
    const client = await openExchange(["GET / HTTP/1.1\r\n\r\n"]);

    await expect(createEngine(factory).relay(client.exchange)).rejects.toThrow(
      "ECONNREFUSED",
    );
    expect(factory.outbound).toHaveLength(0);
  });
});

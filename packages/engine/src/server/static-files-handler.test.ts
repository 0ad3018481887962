import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterAll, beforeAll, describe, expect, it, vi } from "vitest";
import { NodeFileSystem } from "../adapters/node/node-filesystem.js";
import { HttpRequestMessage } from "../http/request-message.js";
import type { ITcpSocket } from "../interfaces/socket.js";
import type { Logger } from "../logging/logger.js";
import { SocketSource } from "../relay/socket-source.js";
import { concat, decodeToString, fromString } from "../utils/buffer.js";
import { resolveRelativePath, StaticFilesHandler } from "./static-files-handler.js";

const MODIFIED = new Date("2024-01-02T03:04:05Z");

let root: string;

beforeAll(async () => {
  root = await fs.mkdtemp(path.join(os.tmpdir(), "relayline-static-"));
  await fs.writeFile(path.join(root, "hello.txt"), "hello world\n");
  await fs.mkdir(path.join(root, "sub"));
  await fs.writeFile(path.join(root, "sub", "page.html"), "<p>hi</p>");
  await fs.utimes(path.join(root, "hello.txt"), MODIFIED, MODIFIED);
  await fs.utimes(path.join(root, "sub", "page.html"), MODIFIED, MODIFIED);
});

afterAll(async () => {
  await fs.rm(root, { recursive: true, force: true });
});

function testLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

async function serve(head: string, logger: Logger = testLogger()): Promise<string> {
  const sent: Uint8Array[] = [];
  const socket: ITcpSocket = {
    send: (data) => sent.push(data.slice()),
    onData() {},
    onClose() {},
    onError() {},
    close() {},
  };
  const request = new HttpRequestMessage();
  request.feed(fromString(head));

  const handler = new StaticFilesHandler({ root: `${root}/`, fs: new NodeFileSystem(), logger });
  await handler.handle({ socket, source: new SocketSource(socket), request });
  return decodeToString(concat(sent));
}

const HELLO_HEAD =
  "HTTP/1.1 200 OK\r\n" +
  "Content-Type: text/plain; charset=utf-8\r\n" +
  "Content-Length: 12\r\n" +
  "Last-Modified: Tue, 02 Jan 2024 03:04:05 GMT\r\n" +
  "Connection: close\r\n" +
  "\r\n";

const NOT_FOUND =
  "HTTP/1.1 404 Not Found\r\n" +
  "Content-Type: text/plain; charset=utf-8\r\n" +
  "Content-Length: 9\r\n" +
  "Connection: close\r\n" +
  "\r\n" +
  "Not Found";

describe("StaticFilesHandler", () => {
  it("serves a file with its type, length and modification time", async () => {
    const logger = testLogger();
    const response = await serve("GET /hello.txt HTTP/1.1\r\n\r\n", logger);

    expect(response).toBe(`${HELLO_HEAD}hello world\n`);
    expect(logger.info).toHaveBeenCalledWith("Sent hello.txt => 12 bytes");
  });

  it("serves files in subdirectories", async () => {
    const response = await serve("GET /sub/page.html HTTP/1.1\r\n\r\n");

    expect(response).toBe(
      "HTTP/1.1 200 OK\r\n" +
        "Content-Type: text/html; charset=utf-8\r\n" +
        "Content-Length: 9\r\n" +
        "Last-Modified: Tue, 02 Jan 2024 03:04:05 GMT\r\n" +
        "Connection: close\r\n" +
        "\r\n" +
        "<p>hi</p>",
    );
  });

  it("ignores the query string and decodes escapes", async () => {
    const response = await serve("GET /hello%2Etxt?v=2 HTTP/1.1\r\n\r\n");
    expect(response).toBe(`${HELLO_HEAD}hello world\n`);
  });

  it("answers HEAD with headers only", async () => {
    const response = await serve("HEAD /hello.txt HTTP/1.1\r\n\r\n");
    expect(response).toBe(HELLO_HEAD);
  });

  it("answers 404 for a missing file", async () => {
    const logger = testLogger();
    const response = await serve("GET /missing.txt HTTP/1.1\r\n\r\n", logger);

    expect(response).toBe(NOT_FOUND);
    expect(logger.warn).toHaveBeenCalledWith("Invalid request URI: /missing.txt");
  });

  it("answers 404 for a directory", async () => {
    expect(await serve("GET /sub HTTP/1.1\r\n\r\n")).toBe(NOT_FOUND);
  });

  it("answers 404 for a path that leaves the root", async () => {
    expect(await serve("GET /sub/../../hello.txt HTTP/1.1\r\n\r\n")).toBe(NOT_FOUND);
  });

  it("answers 405 to other methods", async () => {
    const response = await serve("POST /hello.txt HTTP/1.1\r\n\r\n");

    expect(response).toBe(
      "HTTP/1.1 405 Method Not Allowed\r\n" +
        "Allow: GET, HEAD\r\n" +
        "Content-Length: 18\r\n" +
        "Connection: close\r\n" +
        "\r\n" +
        "Method Not Allowed",
    );
  });
});

describe("resolveRelativePath", () => {
  it.each([
    ["/a/b.txt", "a/b.txt"],
    ["/a%20b.txt?q=1", "a b.txt"],
    ["/docs/#intro", "docs/"],
    ["/", ""],
  ])("maps %s to %j", (uri, expected) => {
    expect(resolveRelativePath(uri)).toBe(expected);
  });

  it.each([
    ["/%E0%A4%A", "a malformed escape"],
    ["//etc/passwd", "an absolute path"],
    ["/a/../../x", "a parent segment"],
    ["/%2e%2e/x", "an encoded parent segment"],
    ["/a%00b", "a NUL byte"],
  ])("rejects %s (%s)", (uri) => {
    expect(resolveRelativePath(uri)).toBeNull();
  });
});

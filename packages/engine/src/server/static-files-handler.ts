import { sendFileResponse, sendResponse } from "../http/response-writer.js";
import type { HttpExchange } from "../http/types.js";
import { STATUS_TEXT } from "../http/types.js";
import type { IFileSystem } from "../interfaces/filesystem.js";
import type { Logger } from "../logging/logger.js";
import { basicLogger } from "../logging/logger.js";
import { fromString } from "../utils/buffer.js";
import { getMimeType } from "./mime-types.js";
import type { RequestHandler } from "./prefix-router.js";

export interface StaticFilesHandlerOptions {
  root: string;
  fs: IFileSystem;
  logger?: Logger;
}

export class StaticFilesHandler implements RequestHandler {
  private root: string;
  private fs: IFileSystem;
  private logger: Logger;

  constructor(options: StaticFilesHandlerOptions) {
    this.root = options.root.replace(/\/+$/, "");
    this.fs = options.fs;
    this.logger = options.logger ?? basicLogger();
  }

  async handle({ socket, request }: HttpExchange): Promise<void> {
    if (request.method !== "GET" && request.method !== "HEAD") {
      sendResponse(socket, {
        status: 405,
        statusText: STATUS_TEXT[405],
        headers: [["Allow", "GET, HEAD"]],
        body: fromString("Method Not Allowed"),
      });
      return;
    }

    const relativePath = resolveRelativePath(request.uri);
    const filePath = relativePath === null ? null : `${this.root}/${relativePath}`;
    const stat = filePath === null ? null : await this.fs.stat(filePath);

    if (filePath === null || !stat?.isFile) {
      this.logger.warn(`Invalid request URI: ${request.uri}`);
      sendResponse(socket, {
        status: 404,
        statusText: STATUS_TEXT[404],
        headers: [["Content-Type", "text/plain; charset=utf-8"]],
        body: fromString("Not Found"),
      });
      return;
    }

    const headers: Array<[string, string]> = [
      ["Content-Type", getMimeType(filePath)],
      ["Content-Length", String(stat.size)],
      ["Last-Modified", stat.mtime.toUTCString()],
    ];

    if (request.method === "HEAD") {
      sendResponse(socket, {
        status: 200,
        statusText: STATUS_TEXT[200],
        headers,
      });
      return;
    }

    const handle = await this.fs.open(filePath);
    try {
      await sendFileResponse(
        socket,
        { status: 200, statusText: STATUS_TEXT[200], headers },
        handle,
        stat.size,
      );
    } finally {
      await handle.close();
    }
    this.logger.info(`Sent ${relativePath} => ${stat.size} bytes`);
  }
}

/**
 * Path below the root for a request URI, or null when the URI is malformed
 * or tries to climb out of the root.
 */
export function resolveRelativePath(uri: string): string | null {
  const pathPart = uri.split("?")[0].split("#")[0];

  let decoded: string;
  try {
    decoded = decodeURIComponent(pathPart);
  } catch {
    return null;
  }

  const relative = decoded.startsWith("/") ? decoded.slice(1) : decoded;
  if (relative.startsWith("/") || relative.includes("\0")) {
    return null;
  }
  const segments = relative.split("/");
  if (segments.some((segment) => segment === "..")) {
    return null;
  }
  return relative;
}

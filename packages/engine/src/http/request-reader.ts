import type { SocketSource } from "../relay/socket-source.js";
import type { HttpMessageOptions } from "./message.js";
import { HttpRequestMessage } from "./request-message.js";

const DEFAULT_REQUEST_TIMEOUT_MS = 5000;

export interface ReadRequestOptions extends HttpMessageOptions {
  /** Time allowed for the whole request head to arrive. Default: 5000ms */
  timeoutMs?: number;
}

export type HttpRequestReadErrorCode =
  | "IDLE_TIMEOUT"
  | "REQUEST_TIMEOUT"
  | "CONNECTION_CLOSED"
  | "CONNECTION_CLOSED_INCOMPLETE";

export class HttpRequestReadError extends Error {
  constructor(
    readonly code: HttpRequestReadErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "HttpRequestReadError";
  }
}

/**
 * Read chunks from `source` until the request head is complete. Bytes that
 * arrived with the head stay in the returned message's body buffer; later
 * ones stay queued on `source`.
 */
export async function readRequest(
  source: SocketSource,
  options?: ReadRequestOptions,
): Promise<HttpRequestMessage> {
  const request = new HttpRequestMessage(options);
  const timeoutMs = options?.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  const deadline = Date.now() + timeoutMs;
  let received = 0;

  while (!request.headersRead) {
    const event = await source.readWithin(deadline - Date.now());

    if (event === null) {
      throw received === 0
        ? new HttpRequestReadError("IDLE_TIMEOUT", "Connection idle timed out")
        : new HttpRequestReadError(
            "REQUEST_TIMEOUT",
            "Request timed out before completion",
          );
    }

    if (event.type === "error") {
      throw event.error;
    }

    if (event.type === "end") {
      throw received === 0
        ? new HttpRequestReadError("CONNECTION_CLOSED", "Connection closed")
        : new HttpRequestReadError(
            "CONNECTION_CLOSED_INCOMPLETE",
            "Connection closed before request was complete",
          );
    }

    received += event.data.length;
    request.feed(event.data);
  }

  return request;
}

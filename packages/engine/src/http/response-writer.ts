import type { IFileHandle } from "../interfaces/filesystem.js";
import type { ITcpSocket } from "../interfaces/socket.js";
import { CRLF, concat, fromString } from "../utils/buffer.js";
import { HeaderCollection } from "./header-collection.js";
import type { HttpResponseOptions } from "./types.js";

const CHUNK_SIZE = 64 * 1024; // 64KB chunks

/**
 * Send a complete HTTP response (headers + body) over a socket.
 */
export function sendResponse(
  socket: ITcpSocket,
  response: HttpResponseOptions,
): void {
  const body = response.body ?? new Uint8Array(0);
  const headers = buildHeaders(response, body.length);
  socket.send(concat([buildHead(response, headers), body]));
}

/**
 * Send headers first, then stream `fileSize` bytes of the file in chunks.
 */
export async function sendFileResponse(
  socket: ITcpSocket,
  response: HttpResponseOptions,
  fileHandle: IFileHandle,
  fileSize: number,
): Promise<void> {
  const headers = buildHeaders(response, fileSize);
  await sendChunk(socket, buildHead(response, headers));

  const buffer = new Uint8Array(CHUNK_SIZE);
  let position = 0;

  while (position < fileSize) {
    const toRead = Math.min(CHUNK_SIZE, fileSize - position);
    const { bytesRead } = await fileHandle.read(buffer, 0, toRead, position);
    if (bytesRead === 0) break;

    await sendChunk(socket, buffer.slice(0, bytesRead));
    position += bytesRead;
  }
}

/** Write one chunk, waiting for the socket to drain when it supports it. */
export async function sendChunk(socket: ITcpSocket, data: Uint8Array): Promise<void> {
  if (socket.sendAndWait) {
    await socket.sendAndWait(data);
    return;
  }
  socket.send(data);
}

function buildHeaders(
  response: HttpResponseOptions,
  contentLength: number,
): HeaderCollection {
  const headers = new HeaderCollection();
  for (const [name, value] of response.headers ?? []) {
    headers.add(name, value);
  }
  if (!headers.has("Content-Length")) {
    headers.add("Content-Length", String(contentLength));
  }
  headers.replace("Connection", "close");
  return headers;
}

function buildHead(
  response: HttpResponseOptions,
  headers: HeaderCollection,
): Uint8Array {
  return fromString(
    `HTTP/1.1 ${response.status} ${response.statusText}${CRLF}${headers.serialize()}${CRLF}`,
  );
}

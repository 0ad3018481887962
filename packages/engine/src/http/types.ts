import type { ITcpSocket } from "../interfaces/socket.js";
import type { SocketSource } from "../relay/socket-source.js";
import type { HttpRequestMessage } from "./request-message.js";

/** A client connection whose request head has been read. */
export interface HttpExchange {
  socket: ITcpSocket;
  /** Reader over `socket`; holds whatever the client sent after the head. */
  source: SocketSource;
  request: HttpRequestMessage;
}

export interface HttpResponseOptions {
  status: number;
  statusText: string;
  headers?: Array<[string, string]>;
  body?: Uint8Array;
}

export const STATUS_TEXT: Record<number, string> = {
  200: "OK",
  400: "Bad Request",
  404: "Not Found",
  405: "Method Not Allowed",
  431: "Request Header Fields Too Large",
  500: "Internal Server Error",
};

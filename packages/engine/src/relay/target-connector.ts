import type { ISocketFactory, ITcpSocket } from "../interfaces/socket.js";

/** Yields a connected byte stream to `host:port`, encrypted or not. */
export type TargetConnector = (host: string, port: number) => Promise<ITcpSocket>;

export interface TargetConnectorOptions {
  /** Upgrade the connection to TLS after connecting. Default: true */
  tls?: boolean;
  /** Accept certificates that fail validation. Default: false */
  skipValidation?: boolean;
}

export function createTargetConnector(
  socketFactory: ISocketFactory,
  options?: TargetConnectorOptions,
): TargetConnector {
  const useTls = options?.tls ?? true;

  return async (host, port) => {
    const socket = await socketFactory.createTcpSocket({ host, port });
    if (!useTls) {
      return socket;
    }

    if (!socket.secure) {
      socket.close();
      throw new Error("Socket implementation does not support TLS");
    }

    try {
      await socket.secure(host, { skipValidation: options?.skipValidation });
    } catch (err) {
      socket.close();
      throw err;
    }
    return socket;
  };
}

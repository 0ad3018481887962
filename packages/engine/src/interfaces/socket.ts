/**
 * Abstract Socket Interfaces
 *
 * The relay and the server only ever see these, so the same code runs over
 * Node sockets and over the in-memory pairs used in tests.
 */

export interface ITcpSocket {
  /** Send data to the remote peer. */
  send(data: Uint8Array): void;

  /**
   * Send data and resolve when it has been accepted without backpressure.
   */
  sendAndWait?(data: Uint8Array): Promise<void>;

  /** Register a callback for incoming data. */
  onData(cb: (data: Uint8Array) => void): void;

  /** Register a callback for connection close. */
  onClose(cb: (hadError: boolean) => void): void;

  /** Register a callback for errors. */
  onError(cb: (err: Error) => void): void;

  /** Close the connection. */
  close(): void;

  /** Remote peer address. */
  remoteAddress?: string;

  /** Remote peer port. */
  remotePort?: number;

  /** Whether this socket is using TLS. */
  isSecure?: boolean;

  /**
   * Upgrade this socket to TLS.
   * @param hostname - Server hostname for SNI
   */
  secure?(
    hostname: string,
    options?: { skipValidation?: boolean },
  ): Promise<void>;

  /** Connect to a remote peer. */
  connect?(port: number, host: string): Promise<void>;
}

export interface ITcpServer {
  /** Start listening on the specified port and optional host. */
  listen(port: number, host?: string, callback?: () => void): void;

  /** Get the address the server is listening on. */
  address(): { port: number } | null;

  on(event: "connection", cb: (socket: unknown) => void): void;
  on(event: "error", cb: (err: Error) => void): void;

  /** Close the server. */
  close(callback?: () => void): void;
}

export interface TcpSocketOptions {
  host?: string;
  port?: number;
}

export interface ISocketFactory {
  /** Create a TCP socket, connected when host and port are given. */
  createTcpSocket(options?: TcpSocketOptions): Promise<ITcpSocket>;

  /** Create a TCP server. */
  createTcpServer(): ITcpServer;

  /** Wrap a native socket into ITcpSocket. */
  wrapTcpSocket(socket: unknown): ITcpSocket;
}

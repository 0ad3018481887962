import * as net from "node:net";
import * as tls from "node:tls";
import type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
  TcpSocketOptions,
} from "../../interfaces/socket.js";

export class NodeTcpSocket implements ITcpSocket {
  private socket: net.Socket;
  private _isSecure = false;

  private dataCallbacks: Array<(data: Uint8Array) => void> = [];
  private closeCallbacks: Array<(hadError: boolean) => void> = [];
  private errorCallbacks: Array<(err: Error) => void> = [];

  private readonly dispatchData = (data: Buffer) => {
    const bytes = new Uint8Array(data);
    for (const cb of this.dataCallbacks) cb(bytes);
  };

  private readonly dispatchClose = (hadError: boolean) => {
    for (const cb of this.closeCallbacks) cb(hadError);
  };

  private readonly dispatchError = (err: Error) => {
    for (const cb of this.errorCallbacks) cb(err);
  };

  constructor(socket?: net.Socket) {
    this.socket = socket || new net.Socket();
    if (socket instanceof tls.TLSSocket) {
      this._isSecure = true;
    }
    this.attach(this.socket);
  }

  get remoteAddress(): string | undefined {
    return this.socket.remoteAddress;
  }

  get remotePort(): number | undefined {
    return this.socket.remotePort;
  }

  get isSecure(): boolean {
    return this._isSecure;
  }

  connect(port: number, host: string): Promise<void> {
    return new Promise((resolve, reject) => {
      const onError = (err: Error) => reject(err);
      this.socket.once("error", onError);
      this.socket.connect(port, host, () => {
        this.socket.off("error", onError);
        resolve();
      });
    });
  }

  send(data: Uint8Array): void {
    if (this.socket.destroyed || !this.socket.writable) {
      return;
    }
    this.socket.write(data);
  }

  sendAndWait(data: Uint8Array): Promise<void> {
    if (this.socket.destroyed || !this.socket.writable) {
      return Promise.reject(new Error("Socket is not writable"));
    }

    return new Promise((resolve, reject) => {
      let settled = false;

      const done = () => {
        if (settled) return;
        settled = true;
        cleanup();
        resolve();
      };

      const fail = (err: Error) => {
        if (settled) return;
        settled = true;
        cleanup();
        reject(err);
      };

      const onDrain = () => done();
      const onClose = () => fail(new Error("Socket closed during write"));
      const onError = (err: Error) => fail(err);

      const cleanup = () => {
        this.socket.off("drain", onDrain);
        this.socket.off("close", onClose);
        this.socket.off("error", onError);
      };

      this.socket.once("close", onClose);
      this.socket.once("error", onError);

      try {
        const accepted = this.socket.write(data);
        if (accepted) {
          done();
        } else {
          this.socket.once("drain", onDrain);
        }
      } catch (err) {
        fail(err instanceof Error ? err : new Error(String(err)));
      }
    });
  }

  onData(cb: (data: Uint8Array) => void): void {
    this.dataCallbacks.push(cb);
  }

  onClose(cb: (hadError: boolean) => void): void {
    this.closeCallbacks.push(cb);
  }

  onError(cb: (err: Error) => void): void {
    this.errorCallbacks.push(cb);
  }

  close(): void {
    this.socket.destroy();
  }

  async secure(
    hostname: string,
    options?: { skipValidation?: boolean },
  ): Promise<void> {
    if (this._isSecure || this.socket instanceof tls.TLSSocket) {
      throw new Error("Socket is already secure");
    }

    const plainSocket = this.socket;

    return new Promise((resolve, reject) => {
      const tlsSocket = tls.connect(
        {
          socket: plainSocket,
          servername: hostname,
          rejectUnauthorized: !options?.skipValidation,
        },
        () => {
          tlsSocket.off("error", onHandshakeError);
          this._isSecure = true;
          this.detach(plainSocket);
          this.attach(tlsSocket);
          this.socket = tlsSocket;
          resolve();
        },
      );

      const onHandshakeError = (err: Error) => {
        tlsSocket.destroy();
        reject(err);
      };
      tlsSocket.once("error", onHandshakeError);
    });
  }

  private attach(socket: net.Socket): void {
    socket.on("data", this.dispatchData);
    socket.on("close", this.dispatchClose);
    socket.on("error", this.dispatchError);
  }

  private detach(socket: net.Socket): void {
    socket.off("data", this.dispatchData);
    socket.off("close", this.dispatchClose);
    socket.off("error", this.dispatchError);
  }
}

export class NodeTcpServer implements ITcpServer {
  private server: net.Server = net.createServer();

  listen(port: number, host?: string, callback?: () => void): void {
    this.server.listen(port, host, callback);
  }

  address(): { port: number } | null {
    const addr = this.server.address();
    if (addr && typeof addr === "object" && "port" in addr) {
      return { port: addr.port };
    }
    return null;
  }

  on(event: "connection", cb: (socket: unknown) => void): void;
  on(event: "error", cb: (err: Error) => void): void;
  on(
    event: "connection" | "error",
    cb: ((socket: unknown) => void) | ((err: Error) => void),
  ): void {
    this.server.on(event, cb);
  }

  close(callback?: () => void): void {
    this.server.close(callback);
  }
}

export class NodeSocketFactory implements ISocketFactory {
  async createTcpSocket(options?: TcpSocketOptions): Promise<ITcpSocket> {
    const socket = new NodeTcpSocket();
    if (options?.host && options?.port) {
      await socket.connect(options.port, options.host);
    }
    return socket;
  }

  createTcpServer(): ITcpServer {
    return new NodeTcpServer();
  }

  wrapTcpSocket(socket: unknown): ITcpSocket {
    if (!(socket instanceof net.Socket)) {
      throw new Error("Expected a Node net.Socket");
    }
    return new NodeTcpSocket(socket);
  }
}

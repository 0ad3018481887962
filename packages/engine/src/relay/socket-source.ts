import type { ITcpSocket } from "../interfaces/socket.js";

export type SourceEvent =
  | { type: "data"; data: Uint8Array }
  | { type: "end" }
  | { type: "error"; error: Error };

/**
 * Pull-style view over a push-style socket.
 *
 * Every data, close and error callback is queued in arrival order and
 * handed out by `read()`. Once the socket has ended or failed, that final
 * event is returned for every further read.
 */
export class SocketSource {
  private queue: SourceEvent[] = [];
  private final: SourceEvent | null = null;
  private waiters: Array<() => void> = [];

  constructor(socket: ITcpSocket) {
    socket.onData((data) => {
      if (this.final) return;
      this.queue.push({ type: "data", data });
      this.notifyWaiters();
    });

    socket.onClose(() => {
      this.finish({ type: "end" });
    });

    socket.onError((error) => {
      this.finish({ type: "error", error });
    });
  }

  async read(): Promise<SourceEvent> {
    while (true) {
      const event = this.take();
      if (event) return event;
      await this.waitForActivity();
    }
  }

  /** Like `read()`, but resolves with null once `timeoutMs` passes. */
  async readWithin(timeoutMs: number): Promise<SourceEvent | null> {
    const deadline = Date.now() + timeoutMs;
    while (true) {
      const event = this.take();
      if (event) return event;
      const hadActivity = await this.waitForActivity(deadline - Date.now());
      if (!hadActivity) return null;
    }
  }

  private take(): SourceEvent | null {
    return this.queue.shift() ?? this.final;
  }

  private finish(event: SourceEvent): void {
    if (this.final) return;
    this.final = event;
    this.notifyWaiters();
  }

  private waitForActivity(timeoutMs?: number): Promise<boolean> {
    if (timeoutMs !== undefined && timeoutMs <= 0) {
      return Promise.resolve(false);
    }

    return new Promise((resolve) => {
      let settled = false;
      let timer: ReturnType<typeof setTimeout> | undefined;

      const onActivity = () => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve(true);
      };

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          if (settled) return;
          settled = true;
          this.waiters = this.waiters.filter((waiter) => waiter !== onActivity);
          resolve(false);
        }, timeoutMs);
      }

      this.waiters.push(onActivity);
    });
  }

  private notifyWaiters(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter();
    }
  }
}

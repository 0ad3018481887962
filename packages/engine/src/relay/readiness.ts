import type { SocketSource, SourceEvent } from "./socket-source.js";

export interface Readiness<K extends string> {
  source: K;
  event: SourceEvent;
}

/**
 * Waits on several sources at once and yields whichever is ready first.
 *
 * One read is kept outstanding per source; `next()` races them and only
 * consumes the winner, so a slow source never blocks a fast one and no
 * event is dropped. A source that just won moves to the back of the race
 * order, which makes sources that are ready at the same time take turns.
 */
export class ReadinessSelector<K extends string> {
  private pending = new Map<K, Promise<Readiness<K>>>();
  private readonly order: K[];

  constructor(private readonly sources: Record<K, SocketSource>) {
    this.order = Object.keys(sources).filter((key): key is K =>
      Object.hasOwn(sources, key),
    );
  }

  async next(): Promise<Readiness<K>> {
    for (const key of this.order) {
      if (!this.pending.has(key)) {
        this.pending.set(
          key,
          this.sources[key].read().then((event) => ({ source: key, event })),
        );
      }
    }

    const ready = await Promise.race(this.pending.values());
    this.pending.delete(ready.source);
    return ready;
  }
}

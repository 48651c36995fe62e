/**
 * Bounded event channel.
 *
 * Writers only ever call `trySend`, which never waits: a full or closed
 * channel rejects the item and counts it as dropped. Readers await items
 * with `receive()` or `for await`. Closing wakes pending readers and
 * discards anything still buffered.
 */

export class EventChannel<T> {
  private buffer: T[] = [];
  private waiters: Array<(item: T | undefined) => void> = [];
  private _closed = false;
  private _dropped = 0;
  private _delivered = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Channel capacity must be an integer >= 1, got ${capacity}`);
    }
  }

  get size(): number {
    return this.buffer.length;
  }

  get dropped(): number {
    return this._dropped;
  }

  get delivered(): number {
    return this._delivered;
  }

  trySend(item: T): boolean {
    if (this._closed) {
      this._dropped++;
      return false;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      this._delivered++;
      waiter(item);
      return true;
    }

    if (this.buffer.length >= this.capacity) {
      this._dropped++;
      return false;
    }
    this.buffer.push(item);
    return true;
  }

  /** Next item, or undefined once the channel is closed. */
  receive(): Promise<T | undefined> {
    if (this.buffer.length > 0) {
      this._delivered++;
      return Promise.resolve(this.buffer.shift());
    }
    if (this._closed) return Promise.resolve(undefined);
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  /** Returns the number of buffered items discarded. */
  close(): number {
    if (this._closed) return 0;
    this._closed = true;
    const discarded = this.buffer.length;
    this.buffer = [];
    for (const waiter of this.waiters) waiter(undefined);
    this.waiters = [];
    return discarded;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T> {
    while (true) {
      const item = await this.receive();
      if (item === undefined) return;
      yield item;
    }
  }
}

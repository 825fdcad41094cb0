import { ChannelClosedError } from "./errors.js";

interface PendingSend<T> {
  item: T;
  resolve: () => void;
  reject: (reason: unknown) => void;
}

interface PendingReceive<T> {
  resolve: (result: IteratorResult<T, undefined>) => void;
  reject: (reason: unknown) => void;
}

/**
 * Bounded hand-off queue between tasks.
 *
 * - `send` suspends while `capacity` items are buffered
 * - `receive` suspends while the buffer is empty
 * - `close` ends the stream; buffered items are still delivered
 *
 * Aborting `signal` rejects every suspended and future `send`/`receive`
 * with the abort reason.
 */
export class Channel<T> implements AsyncIterable<T> {
  readonly capacity: number;
  private readonly buffer: { item: T }[] = [];
  private readonly senders: PendingSend<T>[] = [];
  private readonly receivers: PendingReceive<T>[] = [];
  private closed = false;
  private readonly signal: AbortSignal | undefined;

  constructor(capacity: number, signal?: AbortSignal) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Channel capacity must be at least 1, got ${String(capacity)}`);
    }
    this.capacity = capacity;
    this.signal = signal;
    signal?.addEventListener("abort", () => this.fail(signal.reason), { once: true });
  }

  get size(): number {
    return this.buffer.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  send(item: T): Promise<void> {
    if (this.signal?.aborted) return Promise.reject(this.signal.reason);
    if (this.closed) return Promise.reject(new ChannelClosedError());

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver.resolve({ value: item, done: false });
      return Promise.resolve();
    }
    if (this.buffer.length < this.capacity) {
      this.buffer.push({ item });
      return Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => {
      this.senders.push({ item, resolve, reject });
    });
  }

  receive(): Promise<IteratorResult<T, undefined>> {
    if (this.signal?.aborted) return Promise.reject(this.signal.reason);

    const buffered = this.buffer.shift();
    if (buffered) {
      this.admitSender();
      return Promise.resolve({ value: buffered.item, done: false });
    }
    const sender = this.senders.shift();
    if (sender) {
      sender.resolve();
      return Promise.resolve({ value: sender.item, done: false });
    }
    if (this.closed) return Promise.resolve({ value: undefined, done: true });

    return new Promise((resolve, reject) => {
      this.receivers.push({ resolve, reject });
    });
  }

  /**
   * No more items will be sent. Idempotent.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const sender of this.senders.splice(0)) {
      sender.reject(new ChannelClosedError());
    }
    for (const receiver of this.receivers.splice(0)) {
      receiver.resolve({ value: undefined, done: true });
    }
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    for (;;) {
      const next = await this.receive();
      if (next.done) return;
      yield next.value;
    }
  }

  private admitSender(): void {
    const sender = this.senders.shift();
    if (sender) {
      this.buffer.push({ item: sender.item });
      sender.resolve();
    }
  }

  private fail(reason: unknown): void {
    this.closed = true;
    this.buffer.length = 0;
    for (const sender of this.senders.splice(0)) sender.reject(reason);
    for (const receiver of this.receivers.splice(0)) receiver.reject(reason);
  }
}

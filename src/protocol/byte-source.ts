import type { Readable } from "stream";

const NEWLINE = 0x0a;
const HIGH_WATER_MARK = 1024 * 1024;

/**
 * Pull-style view of an inbound byte channel. Both reads settle only when
 * enough data has arrived, so callers await them instead of polling.
 */
export interface ByteSource {
  readonly closed: boolean;
  /** Next line including its `\n`; the remainder at end of stream; empty once exhausted. */
  readLine(): Promise<Buffer>;
  /** Exactly `size` bytes, fewer only at end of stream. */
  read(size: number): Promise<Buffer>;
  close(): void;
}

export class StreamByteSource implements ByteSource {
  private buffer: Buffer = Buffer.alloc(0);
  private ended = false;
  private isClosed = false;
  private failure: Error | undefined;
  private waiter: (() => void) | undefined;

  constructor(private readonly stream: Readable) {
    stream.on("data", this.onData);
    stream.on("end", this.onEnd);
    stream.on("close", this.onEnd);
    stream.on("error", this.onError);
  }

  get closed(): boolean {
    return this.isClosed;
  }

  async readLine(): Promise<Buffer> {
    for (;;) {
      if (this.isClosed) return Buffer.alloc(0);

      const newline = this.buffer.indexOf(NEWLINE);
      if (newline !== -1) return this.take(newline + 1);
      if (this.failure) throw this.failure;
      if (this.ended) return this.take(this.buffer.length);

      await this.nextChunk();
    }
  }

  async read(size: number): Promise<Buffer> {
    for (;;) {
      if (this.isClosed) return Buffer.alloc(0);

      if (this.buffer.length >= size) return this.take(size);
      if (this.failure) throw this.failure;
      if (this.ended) return this.take(this.buffer.length);

      await this.nextChunk();
    }
  }

  /** Fails pending and later reads, e.g. when the paired output breaks. */
  fail(err: Error): void {
    if (this.isClosed) return;
    this.failure ??= err;
    this.wake();
  }

  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    this.stream.off("data", this.onData);
    this.stream.off("end", this.onEnd);
    this.stream.off("close", this.onEnd);
    this.stream.off("error", this.onError);
    this.stream.pause();
    this.wake();
  }

  private take(size: number): Buffer {
    const chunk = this.buffer.subarray(0, size);
    this.buffer = this.buffer.subarray(size);
    if (this.stream.isPaused() && this.buffer.length < HIGH_WATER_MARK) this.stream.resume();
    return chunk;
  }

  private nextChunk(): Promise<void> {
    // Whoever waits here needs more than is buffered.
    if (this.stream.isPaused()) this.stream.resume();
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  private wake(): void {
    const waiter = this.waiter;
    this.waiter = undefined;
    waiter?.();
  }

  private readonly onData = (chunk: Buffer | string): void => {
    const bytes = typeof chunk === "string" ? Buffer.from(chunk) : chunk;
    this.buffer = Buffer.concat([this.buffer, bytes]);
    if (this.buffer.length >= HIGH_WATER_MARK) this.stream.pause();
    this.wake();
  };

  private readonly onEnd = (): void => {
    this.ended = true;
    this.wake();
  };

  private readonly onError = (err: Error): void => {
    this.fail(err);
  };
}

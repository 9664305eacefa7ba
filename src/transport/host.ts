import { TransportClosedError } from "../protocol/errors";
import type { Transport } from "./transport";

/** Output side provided by an embedding runtime that owns the event loop. */
export type HostSink = {
  write(chunk: string): void;
  flush?(): void;
  close?(): void;
};

export class HostTransport implements Transport {
  private isClosed = false;

  constructor(
    private readonly sink: HostSink,
    readonly sendOnlyBody = true
  ) {}

  write(data: Buffer): void {
    if (this.isClosed) throw new TransportClosedError();
    this.sink.write(data.toString("utf8"));
    this.sink.flush?.();
  }

  async close(): Promise<void> {
    if (this.isClosed) return;
    this.isClosed = true;
    this.sink.close?.();
  }
}

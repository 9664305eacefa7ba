import type { Readable, Writable } from "stream";
import { StreamByteSource } from "../protocol/byte-source";
import { TransportClosedError } from "../protocol/errors";
import { silentLogger, type Logger } from "../util/log";
import type { Transport } from "./transport";

export class StdioTransport implements Transport {
  readonly sendOnlyBody = false;
  readonly source: StreamByteSource;
  protected isClosed = false;

  constructor(
    readonly input: Readable,
    readonly output: Writable,
    protected readonly logger: Logger = silentLogger
  ) {
    this.source = new StreamByteSource(input);
    // Never detached; errors after close are only logged.
    output.on("error", this.onOutputError);
  }

  write(data: Buffer): void {
    if (this.isClosed || this.output.destroyed) throw new TransportClosedError();
    this.output.write(data);
  }

  async close(): Promise<void> {
    if (this.isClosed) return;
    this.isClosed = true;
    this.source.close();
    // The process's own stdout stays open for whatever the host writes last.
    if (this.output !== process.stdout && !this.output.destroyed) this.output.end();
  }

  /** A broken output fails the reader, so the read loop ends the session. */
  private readonly onOutputError = (err: Error): void => {
    if (this.source.closed) {
      this.logger.warn(`Transport error after close: ${err.message}`);
      return;
    }
    this.source.fail(err);
  };
}

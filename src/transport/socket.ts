import type { Duplex } from "stream";
import type { Logger } from "../util/log";
import { StdioTransport } from "./stdio";

/** One accepted stream connection, e.g. a `net.Socket`. */
export class SocketTransport extends StdioTransport {
  constructor(
    private readonly socket: Duplex,
    logger?: Logger
  ) {
    super(socket, socket, logger);
  }

  override async close(): Promise<void> {
    if (this.isClosed) return;
    this.isClosed = true;
    this.source.close();

    const socket = this.socket;
    if (socket.destroyed) return;
    await new Promise<void>((resolve) => {
      socket.once("close", () => resolve());
      socket.end(() => socket.destroy());
    });
  }
}

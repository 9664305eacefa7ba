import WebSocket from "ws";
import { TransportClosedError } from "../protocol/errors";
import type { Transport } from "./transport";

export class WebSocketTransport implements Transport {
  readonly sendOnlyBody = true;

  constructor(private readonly socket: WebSocket) {}

  write(data: Buffer): void {
    if (this.socket.readyState !== WebSocket.OPEN) throw new TransportClosedError();
    this.socket.send(data.toString("utf8"));
  }

  close(): Promise<void> {
    const socket = this.socket;
    if (socket.readyState === WebSocket.CLOSED) return Promise.resolve();
    return new Promise((resolve) => {
      socket.once("close", () => resolve());
      socket.close();
    });
  }
}

export function rawDataToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  return Buffer.from(data).toString("utf8");
}

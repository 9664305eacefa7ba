/**
 * Outbound half of a connection. Inbound bytes are read separately: stream
 * transports expose a ByteSource for the frame reader, message-oriented ones
 * hand whole messages to the session themselves.
 */
export interface Transport {
  /** True when the medium delimits messages, so no headers are synthesized. */
  readonly sendOnlyBody: boolean;
  /** Throws TransportClosedError once closed. */
  write(data: Buffer): void;
  close(): Promise<void>;
}

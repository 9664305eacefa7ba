import type { ByteSource } from "./byte-source";
import { FramingError } from "./errors";
import { silentLogger, type Logger } from "../util/log";

const CONTENT_LENGTH_PATTERN = /^Content-Length: (\d+)\r\n$/;

export const DEFAULT_MAX_HEADER_LINES = 64;

export type ReadScheduler = <T>(read: () => Promise<T>) => Promise<T>;

export type FrameReaderOptions = {
  /** Checked before every header read. */
  signal: AbortSignal;
  /** Runs each read; the server routes reads through its bounded read pool. */
  schedule?: ReadScheduler;
  maxHeaderLines?: number;
  onError?: (error: FramingError) => void;
  logger?: Logger;
};

/**
 * Reads `Content-Length` framed messages from `source` and hands each
 * complete frame (header lines followed by the body) to `onFrame`, in arrival
 * order. Resolves when the signal is aborted, the source is closed or the
 * stream ends; read failures reject.
 */
export async function readFrames(
  source: ByteSource,
  onFrame: (frame: Buffer) => void,
  options: FrameReaderOptions
): Promise<void> {
  const schedule: ReadScheduler = options.schedule ?? ((read) => read());
  const maxHeaderLines = options.maxHeaderLines ?? DEFAULT_MAX_HEADER_LINES;
  const logger = options.logger ?? silentLogger;

  let lines: Buffer[] = [];
  let contentLength: number | undefined;

  const reset = (): void => {
    lines = [];
    contentLength = undefined;
  };

  const fail = (message: string): void => {
    logger.warn(message);
    options.onError?.(new FramingError(message));
    reset();
  };

  while (!options.signal.aborted && !source.closed) {
    const line = await schedule(() => source.readLine());
    if (line.length === 0) break;
    lines.push(line);

    const text = line.toString("ascii");
    if (contentLength === undefined) {
      const length = CONTENT_LENGTH_PATTERN.exec(text)?.[1];
      if (length !== undefined) {
        contentLength = Number(length);
        logger.debug(`Content length: ${contentLength}`);
      }
    }

    if (text !== "\r\n" && text !== "\n") {
      if (lines.length > maxHeaderLines) {
        fail(`Header block exceeded ${maxHeaderLines} lines without a terminating blank line`);
      }
      continue;
    }

    if (contentLength === undefined) {
      // A stray separator between frames carries no headers to lose.
      if (lines.length === 1) reset();
      else fail("Header block ended without a Content-Length header");
      continue;
    }

    const expected = contentLength;
    const body = expected === 0 ? Buffer.alloc(0) : await schedule(() => source.read(expected));
    if (body.length < expected) break;

    onFrame(Buffer.concat([...lines, body]));
    reset();
  }
}

const HEADER_SEPARATOR = "\r\n\r\n";
const CONTENT_LENGTH = "Content-Length: ";
const CHARSET = /charset=([^;\s]+)/i;

export type EncodeOptions = {
  /** Emit the JSON body alone, for transports that delimit messages themselves. */
  sendOnlyBody?: boolean;
};

export function encode(message: object, options: EncodeOptions = {}): Buffer {
  const body = JSON.stringify(message);
  if (options.sendOnlyBody) return Buffer.from(body);

  const header = `${CONTENT_LENGTH}${Buffer.byteLength(body)}${HEADER_SEPARATOR}`;
  return Buffer.concat([Buffer.from(header), Buffer.from(body)]);
}

export type Frame = {
  /** Header names are lower-cased. */
  headers: Map<string, string>;
  body: Buffer;
};

export function parseFrame(frame: Buffer): Frame {
  const headers = new Map<string, string>();
  const headerEnd = frame.indexOf(HEADER_SEPARATOR);
  if (headerEnd === -1) return { headers, body: frame };

  for (const line of frame.subarray(0, headerEnd).toString("ascii").split("\r\n")) {
    const colon = line.indexOf(":");
    if (colon === -1) continue;
    headers.set(line.slice(0, colon).trim().toLowerCase(), line.slice(colon + 1).trim());
  }

  return { headers, body: frame.subarray(headerEnd + HEADER_SEPARATOR.length) };
}

/** Decodes a frame body using the charset of its `Content-Type` header, UTF-8 otherwise. */
export function decodeBody(frame: Frame): string {
  const contentType = frame.headers.get("content-type") ?? "";
  const charset = CHARSET.exec(contentType)?.[1] ?? "utf-8";
  return new TextDecoder(charset).decode(frame.body);
}

import { ErrorCodes } from "./messages";

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Base error carrying the JSON-RPC code it should be answered with. */
export class LspError extends Error {
  constructor(
    message: string,
    readonly code: number = ErrorCodes.InternalError,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class DocumentNotFoundError extends LspError {
  constructor(readonly uri: string) {
    super(`Document not found: ${uri}`, ErrorCodes.InvalidParams);
  }
}

export class FramingError extends LspError {
  constructor(message: string) {
    super(message, ErrorCodes.ParseError);
  }
}

export class TransportClosedError extends LspError {
  constructor() {
    super("Transport is closed");
  }
}

export class FeatureRequestError extends LspError {
  constructor(
    readonly method: string,
    cause: unknown
  ) {
    super(`Request handler for ${method} failed: ${describeError(cause)}`, codeOf(cause), {
      cause,
    });
  }
}

export class FeatureNotificationError extends LspError {
  constructor(
    readonly method: string,
    cause: unknown
  ) {
    super(`Notification handler for ${method} failed: ${describeError(cause)}`, codeOf(cause), {
      cause,
    });
  }
}

function codeOf(err: unknown): number {
  return err instanceof LspError ? err.code : ErrorCodes.InternalError;
}

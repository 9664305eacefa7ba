/**
 * Runtime core for language servers: transports and message framing, the
 * server lifecycle, and the in-memory mirror of open documents.
 */

export { LanguageServer, type ServerOptions } from "./server";
export { defaultConfig, parseSyncKind, resolveServerConfig, type ServerConfig } from "./config";

export {
  Session,
  type ApplyEditResult,
  type Command,
  type CommandHandler,
  type ErrorReporter,
  type ErrorSource,
  type FeatureHandler,
  type FeatureOptions,
} from "./protocol/session";
export { StreamByteSource, type ByteSource } from "./protocol/byte-source";
export { readFrames, DEFAULT_MAX_HEADER_LINES, type FrameReaderOptions } from "./protocol/frame-reader";
export { decodeBody, encode, parseFrame, type Frame } from "./protocol/framing";
export * from "./protocol/messages";
export * from "./protocol/errors";

export { Document, type DocumentOptions } from "./state/document";
export { Workspace, type DocumentSnapshot, type WorkspaceOptions } from "./state/workspace";
export {
  offsetAtPosition,
  positionToRowCol,
  rowColToPosition,
  splitLines,
  wordAtPosition,
  type RowCol,
} from "./state/position";

export type { Transport } from "./transport/transport";
export { StdioTransport } from "./transport/stdio";
export { SocketTransport } from "./transport/socket";
export { WebSocketTransport } from "./transport/websocket";
export { HostTransport, type HostSink } from "./transport/host";

export { WorkerPool, PoolTerminatedError } from "./runtime/pool";
export type { ServerState } from "./runtime/lifecycle";
export { createLogger, silentLogger, type Logger, type LogLevel } from "./util/log";
export { pathToUri, uriToPath } from "./util/uri";

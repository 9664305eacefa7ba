import { TextDocumentSyncKind } from "./protocol/messages";
import { DEFAULT_MAX_HEADER_LINES } from "./protocol/frame-reader";
import { isLogLevel, type LogLevel } from "./util/log";

export type ServerConfig = {
  /** Size of the pool that transport reads are scheduled on. */
  maxWorkers: number;
  /** Size of the pool for handlers registered with `offLoop`. */
  handlerPoolSize: number;
  syncKind: TextDocumentSyncKind;
  maxHeaderLines: number;
  logLevel: LogLevel;
};

export const defaultConfig: ServerConfig = {
  maxWorkers: 2,
  handlerPoolSize: 2,
  syncKind: TextDocumentSyncKind.Incremental,
  maxHeaderLines: DEFAULT_MAX_HEADER_LINES,
  logLevel: "info",
};

export function parseSyncKind(value: string): TextDocumentSyncKind | undefined {
  switch (value.trim().toLowerCase()) {
    case "none":
      return TextDocumentSyncKind.None;
    case "full":
      return TextDocumentSyncKind.Full;
    case "incremental":
      return TextDocumentSyncKind.Incremental;
    default:
      return undefined;
  }
}

function positiveInt(value: string | undefined): number | undefined {
  if (value === undefined || !/^\d+$/.test(value.trim())) return undefined;
  const parsed = Number(value);
  return parsed > 0 ? parsed : undefined;
}

function logLevel(value: string | undefined): LogLevel | undefined {
  const normalized = value?.trim().toLowerCase();
  return normalized !== undefined && isLogLevel(normalized) ? normalized : undefined;
}

/**
 * Explicit overrides win over `LSP_*` environment variables, which win over
 * the defaults. Unparseable environment values are ignored.
 */
export function resolveServerConfig(
  overrides: Partial<ServerConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): ServerConfig {
  const envSyncKind = env.LSP_SYNC_KIND === undefined ? undefined : parseSyncKind(env.LSP_SYNC_KIND);

  return {
    maxWorkers: overrides.maxWorkers ?? positiveInt(env.LSP_MAX_WORKERS) ?? defaultConfig.maxWorkers,
    handlerPoolSize:
      overrides.handlerPoolSize ??
      positiveInt(env.LSP_HANDLER_POOL_SIZE) ??
      defaultConfig.handlerPoolSize,
    syncKind: overrides.syncKind ?? envSyncKind ?? defaultConfig.syncKind,
    maxHeaderLines: overrides.maxHeaderLines ?? defaultConfig.maxHeaderLines,
    logLevel: overrides.logLevel ?? logLevel(env.LSP_LOG_LEVEL) ?? defaultConfig.logLevel,
  };
}

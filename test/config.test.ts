import { describe, test, expect, vi } from "vitest";
import { defaultConfig, parseSyncKind, resolveServerConfig } from "../src/config";
import { TextDocumentSyncKind } from "../src/protocol/messages";
import { createLogger } from "../src/util/log";

describe("resolveServerConfig", () => {
  test("falls back to the defaults", () => {
    expect(resolveServerConfig({}, {})).toEqual(defaultConfig);
  });

  test("reads LSP_* environment variables", () => {
    const config = resolveServerConfig(
      {},
      {
        LSP_MAX_WORKERS: "4",
        LSP_HANDLER_POOL_SIZE: "3",
        LSP_SYNC_KIND: "Full",
        LSP_LOG_LEVEL: "DEBUG",
      }
    );
    expect(config).toEqual({
      ...defaultConfig,
      maxWorkers: 4,
      handlerPoolSize: 3,
      syncKind: TextDocumentSyncKind.Full,
      logLevel: "debug",
    });
  });

  test("ignores values it cannot parse", () => {
    const config = resolveServerConfig(
      {},
      { LSP_MAX_WORKERS: "0", LSP_HANDLER_POOL_SIZE: "two", LSP_SYNC_KIND: "sometimes", LSP_LOG_LEVEL: "loud" }
    );
    expect(config).toEqual(defaultConfig);
  });

  test("explicit overrides win over the environment", () => {
    const config = resolveServerConfig(
      { maxWorkers: 8, syncKind: TextDocumentSyncKind.None },
      { LSP_MAX_WORKERS: "4", LSP_SYNC_KIND: "full" }
    );
    expect(config.maxWorkers).toBe(8);
    expect(config.syncKind).toBe(TextDocumentSyncKind.None);
  });
});

describe("parseSyncKind", () => {
  test("accepts the three kinds by name", () => {
    expect(parseSyncKind("none")).toBe(0);
    expect(parseSyncKind(" FULL ")).toBe(1);
    expect(parseSyncKind("incremental")).toBe(2);
    expect(parseSyncKind("2")).toBeUndefined();
  });
});

describe("createLogger", () => {
  test("prefixes the scope and filters below its level", () => {
    const sink = vi.fn();
    const logger = createLogger("server", "warn", sink);

    logger.info("hidden");
    logger.warn("Connection to a client was lost");
    logger.error("Read failed", { code: "EPIPE" });

    expect(sink.mock.calls).toEqual([
      ["[server] Connection to a client was lost"],
      ["[server] Read failed", { code: "EPIPE" }],
    ]);
  });

  test("silent drops everything", () => {
    const sink = vi.fn();
    createLogger("server", "silent", sink).error("nope");
    expect(sink).not.toHaveBeenCalled();
  });
});

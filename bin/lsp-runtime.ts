#!/usr/bin/env tsx
import { object } from "@optique/core/constructs";
import { message } from "@optique/core/message";
import { optional, withDefault } from "@optique/core/modifiers";
import { option } from "@optique/core/primitives";
import { choice, integer, string } from "@optique/core/valueparser";
import { run } from "@optique/run";
import { parseSyncKind } from "../src/config";
import { LanguageServer } from "../src/server";

const parser = object({
  transport: withDefault(
    option("-t", "--transport", choice(["stdio", "tcp", "ws"]), {
      description: message`Transport to serve the protocol over`,
    }),
    "stdio" as const
  ),
  host: withDefault(
    option("--host", string(), { description: message`Address to listen on for tcp and ws` }),
    "127.0.0.1"
  ),
  port: withDefault(
    option("-p", "--port", integer({ min: 0, max: 65535 }), {
      description: message`Port to listen on for tcp and ws`,
    }),
    2087
  ),
  maxWorkers: optional(
    option("--max-workers", integer({ min: 1 }), {
      description: message`Size of the transport read pool`,
    })
  ),
  sync: optional(
    option("--sync", choice(["none", "full", "incremental"]), {
      description: message`Text document sync kind to advertise`,
    })
  ),
  logLevel: optional(
    option("--log-level", choice(["debug", "info", "warn", "error", "silent"]), {
      description: message`Minimum level written to stderr`,
    })
  ),
});

const result = run(parser, {
  programName: "lsp-runtime",
  version: "0.1.0",
  description: message`Language server runtime over stdio, TCP or WebSocket`,
  help: "option",
});

const server = new LanguageServer({
  name: "lsp-runtime",
  version: "0.1.0",
  config: {
    maxWorkers: result.maxWorkers,
    syncKind: result.sync === undefined ? undefined : parseSyncKind(result.sync),
    logLevel: result.logLevel,
  },
});
server.installSignalHandlers();

let failed = false;
try {
  switch (result.transport) {
    case "stdio":
      await server.startIo();
      break;
    case "tcp":
      await server.startTcp(result.host, result.port);
      break;
    case "ws":
      await server.startWs(result.host, result.port);
      break;
  }
} catch (err) {
  console.error(err instanceof Error ? err : "Server failed");
  failed = true;
}

process.exit(failed ? 1 : server.exitCode);

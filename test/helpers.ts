import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { PassThrough, type Readable } from "stream";
import { vi, type Mock } from "vitest";
import { StreamByteSource } from "../src/protocol/byte-source";
import { readFrames } from "../src/protocol/frame-reader";
import { decodeBody, encode, parseFrame } from "../src/protocol/framing";
import { isNotification, isRecord, type NotificationMessage } from "../src/protocol/messages";
import { LanguageServer, type ServerOptions } from "../src/server";
import type { Logger } from "../src/util/log";
import { pathToUri } from "../src/util/uri";

export type SpyLogger = { [Level in keyof Logger]: Mock };

export function spyLogger(): SpyLogger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export function tempFile(name: string, contents: string): { path: string; uri: string } {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "lsp-runtime-"));
  const filePath = path.join(dir, name);
  fs.writeFileSync(filePath, contents, "utf-8");
  return { path: filePath, uri: pathToUri(filePath) };
}

export function createServer(options: Partial<ServerOptions> = {}): LanguageServer {
  return new LanguageServer({ name: "test-server", version: "0.0.0", logger: spyLogger(), ...options });
}

export const initialize = { jsonrpc: "2.0", id: 1, method: "initialize", params: { capabilities: {} } };

/** A hosted session whose replies are collected as parsed JSON. */
export function hosted(server: LanguageServer) {
  const chunks: string[] = [];
  const sink = { write: vi.fn((chunk: string) => void chunks.push(chunk)), close: vi.fn() };
  const session = server.startHosted(sink);
  const send = (message: object) => session.handleMessage(JSON.stringify(message));
  const replies = (): unknown[] => chunks.map((chunk) => JSON.parse(chunk));
  return { session, sink, send, replies };
}

/** Reads frames off a stream one at a time, the way a client would. */
export function frameClient(stream: Readable) {
  const queue: unknown[] = [];
  const waiting: Array<(msg: unknown) => void> = [];
  const done = readFrames(
    new StreamByteSource(stream),
    (frame) => {
      const msg: unknown = JSON.parse(decodeBody(parseFrame(frame)));
      const resolve = waiting.shift();
      if (resolve) resolve(msg);
      else queue.push(msg);
    },
    { signal: new AbortController().signal }
  );
  const next = (): Promise<unknown> => {
    if (queue.length > 0) return Promise.resolve(queue.shift());
    return new Promise((resolve) => waiting.push(resolve));
  };
  return { next, done };
}

export type LspClient = {
  server: LanguageServer;
  initializeResult: unknown;
  /** Resolves with the result, or the error object of an error response. */
  request(method: string, params: object): Promise<unknown>;
  notify(method: string, params: object): void;
  openFile(uri: string, text: string, version?: number): void;
  writeRaw(bytes: Buffer | string): void;
  notifications: NotificationMessage[];
  /** Sends shutdown + exit and resolves with the server's exit code. */
  shutdown(): Promise<number>;
  running: Promise<void>;
};

/**
 * Runs a server over in-memory stdio streams and talks to it the way an
 * editor would, with Content-Length framed messages.
 */
export async function startLsp(
  configure?: (server: LanguageServer) => void,
  options: Partial<ServerOptions> = {}
): Promise<LspClient> {
  const toServer = new PassThrough();
  const fromServer = new PassThrough();
  const server = createServer(options);
  configure?.(server);

  const running = server.startIo(toServer, fromServer);

  let idCounter = 0;
  const pendingResponses = new Map<number, (value: unknown) => void>();
  const notifications: NotificationMessage[] = [];

  const reading = readFrames(
    new StreamByteSource(fromServer),
    (frame) => {
      const msg: unknown = JSON.parse(decodeBody(parseFrame(frame)));
      if (isNotification(msg)) {
        notifications.push(msg);
        return;
      }
      if (!isRecord(msg) || typeof msg.id !== "number") return;
      const resolve = pendingResponses.get(msg.id);
      if (!resolve) return;
      pendingResponses.delete(msg.id);
      resolve(msg.error ?? msg.result);
    },
    { signal: new AbortController().signal }
  );

  function write(msg: object) {
    toServer.write(encode(msg));
  }

  const client: LspClient = {
    server,
    initializeResult: undefined,
    notifications,
    running,

    request(method, params) {
      const id = ++idCounter;
      return new Promise((resolve) => {
        pendingResponses.set(id, resolve);
        write({ jsonrpc: "2.0", id, method, params });
      });
    },

    notify(method, params) {
      write({ jsonrpc: "2.0", method, params });
    },

    openFile(uri, text, version = 1) {
      client.notify("textDocument/didOpen", {
        textDocument: { uri, languageId: "plaintext", version, text },
      });
    },

    writeRaw(bytes) {
      toServer.write(bytes);
    },

    async shutdown() {
      await client.request("shutdown", {});
      client.notify("exit", {});
      await running;
      await reading;
      return server.exitCode;
    },
  };

  client.initializeResult = await client.request("initialize", {
    processId: null,
    capabilities: {},
    rootUri: "file:///workspace/project",
    workspaceFolders: [{ uri: "file:///workspace/project", name: "project" }],
  });
  client.notify("initialized", {});

  return client;
}

import * as net from "net";
import type { AddressInfo } from "net";
import type { Duplex, Readable, Writable } from "stream";
import WebSocket, { WebSocketServer } from "ws";
import { resolveServerConfig, type ServerConfig } from "./config";
import { describeError } from "./protocol/errors";
import { readFrames, type ReadScheduler } from "./protocol/frame-reader";
import {
  Session,
  type Command,
  type CommandHandler,
  type ErrorReporter,
  type Feature,
  type FeatureHandler,
  type FeatureOptions,
  type SessionContext,
} from "./protocol/session";
import { Lifecycle, type ServerState } from "./runtime/lifecycle";
import { WorkerPool } from "./runtime/pool";
import { HostTransport, type HostSink } from "./transport/host";
import { SocketTransport } from "./transport/socket";
import { StdioTransport } from "./transport/stdio";
import type { Transport } from "./transport/transport";
import { WebSocketTransport, rawDataToString } from "./transport/websocket";
import { createLogger, type Logger } from "./util/log";

export type ServerOptions = {
  name: string;
  version: string;
  config?: Partial<ServerConfig>;
  logger?: Logger;
  reportServerError?: ErrorReporter;
};

type Listener = { close(): Promise<void> };

function toAddressInfo(address: AddressInfo | string | null): AddressInfo {
  if (address === null || typeof address === "string") {
    throw new Error(`Expected a network address, got ${String(address)}`);
  }
  return address;
}

const SHUTDOWN_SIGNALS: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

/**
 * Owns the transports, the read and handler pools and the sessions of one
 * server process, and drives startup and shutdown for every transport kind.
 */
export class LanguageServer {
  readonly name: string;
  readonly version: string;
  readonly config: ServerConfig;
  readonly logger: Logger;

  /** 0 unless the client sent `exit` without a preceding `shutdown`. */
  exitCode = 0;

  private readonly lifecycle: Lifecycle;
  private readonly stop = new AbortController();
  private readonly readPool: WorkerPool;
  private handlerPool: WorkerPool | undefined;
  private readonly features = new Map<string, Feature>();
  private readonly commands = new Map<string, Command>();
  private readonly sessions = new Set<Session>();
  private readonly reportServerError: ErrorReporter | undefined;
  private listener: Listener | undefined;
  private shutdownPromise: Promise<void> | undefined;
  private removeSignalHandlers: (() => void) | undefined;

  constructor(options: ServerOptions) {
    this.name = options.name;
    this.version = options.version;
    this.config = resolveServerConfig(options.config);
    this.logger = options.logger ?? createLogger("server", this.config.logLevel);
    this.reportServerError = options.reportServerError;
    this.lifecycle = new Lifecycle(this.logger);
    this.readPool = new WorkerPool("io", this.config.maxWorkers);
  }

  get state(): ServerState {
    return this.lifecycle.state;
  }

  /** Resolves once shutdown has finished. */
  get closed(): Promise<void> {
    return this.lifecycle.closed;
  }

  get handlerPoolCreated(): boolean {
    return this.handlerPool !== undefined;
  }

  /** Sessions with a live transport. */
  get activeSessions(): number {
    return this.sessions.size;
  }

  feature(method: string, handler: FeatureHandler, options: FeatureOptions = {}): void {
    this.features.set(method, {
      handler,
      offLoop: options.offLoop ?? false,
      capability: options.capability,
    });
  }

  /** Registers a handler for `workspace/executeCommand`; advertised in `initialize`. */
  command(name: string, handler: CommandHandler, options: { offLoop?: boolean } = {}): void {
    this.commands.set(name, { handler, offLoop: options.offLoop ?? false });
  }

  runOffLoop<T>(task: () => T | Promise<T>): Promise<T> {
    return this.ensureHandlerPool().run(task);
  }

  installSignalHandlers(): void {
    const onSignal = (signal: NodeJS.Signals): void => {
      this.logger.info(`Received ${signal}`);
      this.shutdown().catch((err: unknown) => {
        this.logger.error(`Shutdown failed: ${describeError(err)}`);
      });
    };
    for (const signal of SHUTDOWN_SIGNALS) process.once(signal, onSignal);
    this.removeSignalHandlers = () => {
      for (const signal of SHUTDOWN_SIGNALS) process.off(signal, onSignal);
    };
  }

  async startIo(input: Readable = process.stdin, output: Writable = process.stdout): Promise<void> {
    this.logger.info("Starting IO server");

    const transport = new StdioTransport(input, output, this.logger);
    const session = this.attach(transport);
    const lost = await this.readLoop(transport, session, (read) => this.readPool.run(read));
    if (lost) this.logger.error("Connection to the client is lost! Shutting down the server.");

    await this.shutdown({ abrupt: lost });
  }

  async startTcp(host: string, port: number): Promise<void> {
    await this.listenTcp(host, port);
    await this.closed;
  }

  /** Starts accepting TCP connections and resolves with the bound address. */
  async listenTcp(host: string, port: number): Promise<AddressInfo> {
    this.logger.info(`Starting TCP server on ${host}:${port}`);

    const server = net.createServer((socket) => {
      this.handleConnection(socket).catch((err: unknown) => {
        this.logger.error(`Connection failed: ${describeError(err)}`);
      });
    });
    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(port, host, () => {
        server.off("error", reject);
        resolve();
      });
    });

    this.listener = {
      close: () => new Promise((resolve) => server.close(() => resolve())),
    };
    this.lifecycle.transition("running");
    return toAddressInfo(server.address());
  }

  /**
   * Serves one accepted stream connection with its own session until the
   * peer goes away. Losing a single connection does not stop the server.
   * Its reads wait on the socket directly, outside the read pool.
   */
  async handleConnection(socket: Duplex): Promise<void> {
    const transport = new SocketTransport(socket, this.logger);
    const session = this.attach(transport);

    const lost = await this.readLoop(transport, session);
    if (lost) this.logger.warn("Connection to a client was lost");

    this.sessions.delete(session);
    await session.close();
  }

  async startWs(host: string, port: number): Promise<void> {
    await this.listenWs(host, port);
    await this.closed;
  }

  /** Starts accepting WebSocket connections and resolves with the bound address. */
  async listenWs(host: string, port: number): Promise<AddressInfo> {
    this.logger.info(`Starting WebSocket server on ${host}:${port}`);

    const server = new WebSocketServer({ host, port });
    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.once("listening", () => {
        server.off("error", reject);
        resolve();
      });
    });
    server.on("connection", (socket) => this.handleWebSocket(socket));

    this.listener = {
      close: () => new Promise((resolve) => server.close(() => resolve())),
    };
    this.lifecycle.transition("running");
    return toAddressInfo(server.address());
  }

  handleWebSocket(socket: WebSocket): Session {
    const session = this.attach(new WebSocketTransport(socket));

    socket.on("message", (data) => session.handleMessage(rawDataToString(data)));
    socket.on("error", (err) => this.logger.error(`WebSocket error: ${err.message}`));
    socket.on("close", () => {
      this.sessions.delete(session);
      session.close().catch((err: unknown) => {
        this.logger.error(`Failed to close session: ${describeError(err)}`);
      });
    });
    return session;
  }

  /**
   * Embedded mode: the host owns the event loop, pushes whole messages into
   * the returned session and receives replies, without headers, on `sink`.
   */
  startHosted(sink: HostSink, options: { sendOnlyBody?: boolean } = {}): Session {
    this.logger.info("Starting hosted server");

    const session = this.attach(new HostTransport(sink, options.sendOnlyBody ?? true));
    if (this.lifecycle.is("connected")) this.lifecycle.transition("running");
    return session;
  }

  shutdown(options: { abrupt?: boolean } = {}): Promise<void> {
    this.shutdownPromise ??= this.performShutdown(options.abrupt ?? false);
    return this.shutdownPromise;
  }

  private async performShutdown(abrupt: boolean): Promise<void> {
    this.logger.info("Shutting down the server");
    this.lifecycle.transition("shutting-down");

    this.stop.abort();

    if (this.handlerPool) {
      this.handlerPool.terminate();
      // Abrupt shutdowns leave in-flight handlers running unobserved.
      if (!abrupt) await this.handlerPool.join();
    }

    this.readPool.terminate();

    const sessions = Array.from(this.sessions);
    this.sessions.clear();
    const closing = sessions.map((session) => session.close());
    if (this.listener) closing.push(this.listener.close());
    for (const result of await Promise.allSettled(closing)) {
      if (result.status === "rejected") {
        this.logger.error(`Failed to close transport: ${describeError(result.reason)}`);
      }
    }

    this.removeSignalHandlers?.();
    this.logger.info("Server closed");
    this.lifecycle.transition("closed");
  }

  private attach(transport: Transport): Session {
    const session = new Session(this.sessionContext());
    session.connectionMade(transport);
    this.sessions.add(session);
    if (this.lifecycle.is("created")) this.lifecycle.transition("connected");
    return session;
  }

  /** Returns true when the read ended because the channel failed. */
  private async readLoop(
    transport: StdioTransport,
    session: Session,
    schedule?: ReadScheduler
  ): Promise<boolean> {
    if (this.lifecycle.is("connected")) this.lifecycle.transition("running");

    try {
      await readFrames(transport.source, (frame) => session.handleFrame(frame), {
        signal: this.stop.signal,
        schedule,
        maxHeaderLines: this.config.maxHeaderLines,
        onError: (error) => session.reportFramingError(error),
        logger: this.logger,
      });
      return false;
    } catch (err) {
      this.logger.warn(`Transport failed: ${describeError(err)}`);
      return true;
    }
  }

  private ensureHandlerPool(): WorkerPool {
    if (!this.handlerPool) {
      this.handlerPool = new WorkerPool("handler", this.config.handlerPoolSize);
      this.logger.debug(`Created handler pool with ${this.config.handlerPoolSize} slots`);
    }
    return this.handlerPool;
  }

  private sessionContext(): SessionContext {
    return {
      name: this.name,
      version: this.version,
      syncKind: this.config.syncKind,
      logger: this.logger,
      features: this.features,
      commands: this.commands,
      reportServerError: this.reportServerError,
      runOffLoop: <T>(task: () => T | Promise<T>) => this.runOffLoop(task),
      exit: (code) => {
        this.exitCode = code;
        this.shutdown().catch((err: unknown) => {
          this.logger.error(`Shutdown failed: ${describeError(err)}`);
        });
      },
    };
  }
}

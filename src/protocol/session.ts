import { buildServerCapabilities } from "./capabilities";
import {
  FeatureNotificationError,
  FeatureRequestError,
  LspError,
  TransportClosedError,
  describeError,
  type FramingError,
} from "./errors";
import { decodeBody, encode, parseFrame } from "./framing";
import {
  ErrorCodes,
  MessageType,
  isNotification,
  isRequest,
  isRecord,
  isResponse,
  type ConfigurationParams,
  type Diagnostic,
  type NotificationMessage,
  type RegistrationParams,
  type RequestMessage,
  type ResponseMessage,
  type ShowDocumentParams,
  type TextDocumentSyncKind,
  type TraceValue,
  type UnregistrationParams,
  type WorkspaceEdit,
} from "./messages";
import {
  parseDidChangeParams,
  parseDidCloseParams,
  parseDidOpenParams,
  parseExecuteCommandParams,
  parseInitializeParams,
  parseSetTraceParams,
  parseWorkspaceFoldersChange,
} from "./params";
import { Workspace } from "../state/workspace";
import type { Transport } from "../transport/transport";
import type { Logger } from "../util/log";

export type FeatureHandler = (params: unknown, session: Session) => unknown;

export type FeatureOptions = {
  /** Run on the handler pool instead of inline with message dispatch. */
  offLoop?: boolean;
  /** Advertised under the method's provider key in `initialize`. */
  capability?: unknown;
};

export type Feature = {
  handler: FeatureHandler;
  offLoop: boolean;
  capability: unknown;
};

export type CommandHandler = (args: unknown[], session: Session) => unknown;

export type Command = {
  handler: CommandHandler;
  offLoop: boolean;
};

export type ApplyEditResult = { applied: boolean; failureReason?: string };

export type ErrorSource = "request" | "notification" | "message";

export type ErrorReporter = (error: unknown, source: ErrorSource, session: Session) => void;

/** What a session needs from the server that owns it. */
export type SessionContext = {
  name: string;
  version: string;
  syncKind: TextDocumentSyncKind;
  logger: Logger;
  features: ReadonlyMap<string, Feature>;
  commands: ReadonlyMap<string, Command>;
  runOffLoop<T>(task: () => T | Promise<T>): Promise<T>;
  exit(code: number): void;
  reportServerError?: ErrorReporter;
};

type PendingRequest = {
  resolve: (result: unknown) => void;
  reject: (error: Error) => void;
};

const DEFAULT_ERROR_MESSAGE = "Unexpected error in LSP server, see server's logs for details";

/**
 * Protocol state of one client connection: decodes payloads, runs the
 * built-in lifecycle and text synchronization handlers, dispatches to
 * registered features and writes replies to the transport.
 */
export class Session {
  private transport: Transport | undefined;
  private initialized = false;
  private shutdownRequested = false;
  private currentWorkspace: Workspace | undefined;
  private clientCapabilitiesValue: unknown = {};
  private traceValue: TraceValue = "off";
  private nextRequestId = 0;
  private readonly pending = new Map<number | string, PendingRequest>();

  constructor(private readonly context: SessionContext) {}

  get workspace(): Workspace {
    if (!this.currentWorkspace) {
      throw new LspError("Server not initialized", ErrorCodes.ServerNotInitialized);
    }
    return this.currentWorkspace;
  }

  get clientCapabilities(): unknown {
    return this.clientCapabilitiesValue;
  }

  get isInitialized(): boolean {
    return this.initialized;
  }

  /** Set by `initialize` and `$/setTrace`. */
  get trace(): TraceValue {
    return this.traceValue;
  }

  connectionMade(transport: Transport): void {
    this.transport = transport;
  }

  async close(): Promise<void> {
    for (const { reject } of this.pending.values()) reject(new TransportClosedError());
    this.pending.clear();

    const transport = this.transport;
    this.transport = undefined;
    await transport?.close();
  }

  /** Entry point for header-framed transports. */
  handleFrame(frame: Buffer): void {
    let text: string;
    try {
      text = decodeBody(parseFrame(frame));
    } catch (err) {
      this.rejectPayload(err);
      return;
    }
    this.handleMessage(text);
  }

  /** Entry point for transports that deliver one JSON document per message. */
  handleMessage(text: string): void {
    let msg: unknown;
    try {
      msg = JSON.parse(text);
    } catch (err) {
      this.rejectPayload(err);
      return;
    }

    if (isRequest(msg)) {
      this.handleRequest(msg);
    } else if (isNotification(msg)) {
      this.handleNotification(msg);
    } else if (isResponse(msg)) {
      this.handleResponse(msg);
    } else {
      this.context.logger.warn("Ignoring message that is not JSON-RPC 2.0");
    }
  }

  reportFramingError(error: FramingError): void {
    this.sendError(null, error.code, error.message);
  }

  sendNotification(method: string, params?: unknown): void {
    this.send({ jsonrpc: "2.0", method, params });
  }

  sendRequest(method: string, params?: unknown): Promise<unknown> {
    if (!this.transport) return Promise.reject(new TransportClosedError());
    const id = ++this.nextRequestId;
    return new Promise((resolve, reject) => {
      this.pending.set(id, { resolve, reject });
      this.send({ jsonrpc: "2.0", id, method, params });
    });
  }

  async applyEdit(edit: WorkspaceEdit, label?: string): Promise<ApplyEditResult> {
    const result = await this.sendRequest("workspace/applyEdit", { label, edit });
    if (!isRecord(result) || typeof result.applied !== "boolean") {
      throw new LspError("Invalid workspace/applyEdit result", ErrorCodes.InvalidParams);
    }
    return typeof result.failureReason === "string"
      ? { applied: result.applied, failureReason: result.failureReason }
      : { applied: result.applied };
  }

  /** One value per requested item, in request order. */
  async getConfiguration(params: ConfigurationParams): Promise<unknown[]> {
    const result = await this.sendRequest("workspace/configuration", params);
    if (!Array.isArray(result)) {
      throw new LspError("Invalid workspace/configuration result", ErrorCodes.InvalidParams);
    }
    return result;
  }

  async registerCapability(params: RegistrationParams): Promise<void> {
    await this.sendRequest("client/registerCapability", params);
  }

  async unregisterCapability(params: UnregistrationParams): Promise<void> {
    await this.sendRequest("client/unregisterCapability", params);
  }

  async showDocument(params: ShowDocumentParams): Promise<{ success: boolean }> {
    const result = await this.sendRequest("window/showDocument", params);
    if (!isRecord(result) || typeof result.success !== "boolean") {
      throw new LspError("Invalid window/showDocument result", ErrorCodes.InvalidParams);
    }
    return { success: result.success };
  }

  async semanticTokensRefresh(): Promise<void> {
    await this.sendRequest("workspace/semanticTokens/refresh");
  }

  /** Dropped while the client's trace level is off; `verbose` only goes out at verbose. */
  logTrace(message: string, verbose?: string): void {
    if (this.traceValue === "off") return;
    this.sendNotification(
      "$/logTrace",
      this.traceValue === "verbose" && verbose !== undefined ? { message, verbose } : { message }
    );
  }

  showMessage(message: string, type: MessageType = MessageType.Info): void {
    this.sendNotification("window/showMessage", { type, message });
  }

  showMessageLog(message: string, type: MessageType = MessageType.Log): void {
    this.sendNotification("window/logMessage", { type, message });
  }

  publishDiagnostics(uri: string, diagnostics: Diagnostic[], version?: number): void {
    this.sendNotification("textDocument/publishDiagnostics", { uri, version, diagnostics });
  }

  /**
   * Surfaces errors the client is not waiting a response for. Failed requests
   * already carry their error in the response, so they are not repeated here.
   */
  reportServerError(error: unknown, source: ErrorSource): void {
    try {
      if (this.context.reportServerError) {
        this.context.reportServerError(error, source, this);
        return;
      }
      if (error instanceof FeatureRequestError) return;
      this.showMessage(DEFAULT_ERROR_MESSAGE, MessageType.Error);
    } catch (err) {
      this.context.logger.warn(`Failed to report error to client: ${describeError(err)}`);
    }
  }

  private handleRequest(msg: RequestMessage): void {
    if (msg.method === "initialize") {
      this.initialize(msg);
      return;
    }

    if (!this.initialized) {
      this.sendError(msg.id, ErrorCodes.ServerNotInitialized, "Server not initialized");
      return;
    }

    if (this.shutdownRequested) {
      this.sendError(msg.id, ErrorCodes.InvalidRequest, "Server is shutting down");
      return;
    }

    if (msg.method === "shutdown") {
      this.shutdownRequested = true;
      this.sendResponse(msg.id, null);
      return;
    }

    if (msg.method === "workspace/executeCommand") {
      this.respond(msg, this.executeCommand(msg.params));
      return;
    }

    const feature = this.context.features.get(msg.method);
    if (!feature) {
      this.sendError(msg.id, ErrorCodes.MethodNotFound, `Unknown method: ${msg.method}`);
      return;
    }

    this.respond(msg, this.invoke(feature.offLoop, () => feature.handler(msg.params, this)));
  }

  private executeCommand(params: unknown): Promise<unknown> {
    let name: string;
    let args: unknown[];
    try {
      ({ command: name, args } = parseExecuteCommandParams(params));
    } catch (err) {
      return Promise.reject(err);
    }
    const command = this.context.commands.get(name);
    if (!command) {
      return Promise.reject(new LspError(`Unknown command: ${name}`, ErrorCodes.InvalidParams));
    }
    return this.invoke(command.offLoop, () => command.handler(args, this));
  }

  private respond(msg: RequestMessage, result: Promise<unknown>): void {
    result.then(
      (value) => this.sendResponse(msg.id, value ?? null),
      (err: unknown) => {
        const error = new FeatureRequestError(msg.method, err);
        this.context.logger.error(error.message, err);
        this.sendError(msg.id, error.code, error.message);
        this.reportServerError(error, "request");
      }
    );
  }

  private handleNotification(msg: NotificationMessage): void {
    if (msg.method === "exit") {
      this.context.exit(this.shutdownRequested ? 0 : 1);
      return;
    }

    if (!this.initialized) return;

    try {
      this.applyBuiltin(msg);
    } catch (err) {
      const error = new FeatureNotificationError(msg.method, err);
      this.context.logger.error(error.message);
      this.reportServerError(error, "notification");
      return;
    }

    const feature = this.context.features.get(msg.method);
    if (!feature) {
      if (!msg.method.startsWith("$/") && !BUILTIN_NOTIFICATIONS.has(msg.method)) {
        this.context.logger.debug(`Ignoring notification ${msg.method}`);
      }
      return;
    }

    this.invoke(feature.offLoop, () => feature.handler(msg.params, this)).catch((err: unknown) => {
      const error = new FeatureNotificationError(msg.method, err);
      this.context.logger.error(error.message, err);
      this.reportServerError(error, "notification");
    });
  }

  private applyBuiltin(msg: NotificationMessage): void {
    switch (msg.method) {
      case "textDocument/didOpen":
        this.workspace.putDocument(parseDidOpenParams(msg.params));
        return;

      case "textDocument/didChange": {
        const { uri, version, changes } = parseDidChangeParams(msg.params);
        for (const change of changes) this.workspace.updateDocument(uri, change, version);
        return;
      }

      case "textDocument/didClose":
        this.workspace.removeDocument(parseDidCloseParams(msg.params));
        return;

      case "$/setTrace":
        this.traceValue = parseSetTraceParams(msg.params);
        return;

      case "workspace/didChangeWorkspaceFolders": {
        const { added, removed } = parseWorkspaceFoldersChange(msg.params);
        for (const folder of removed) this.workspace.removeFolder(folder.uri);
        for (const folder of added) this.workspace.addFolder(folder);
        return;
      }
    }
  }

  private handleResponse(msg: ResponseMessage): void {
    const request = msg.id === null ? undefined : this.pending.get(msg.id);
    if (!request || msg.id === null) {
      this.context.logger.warn(`Received response for unknown request ${String(msg.id)}`);
      return;
    }

    this.pending.delete(msg.id);
    if (msg.error) {
      request.reject(new LspError(msg.error.message, msg.error.code));
    } else {
      request.resolve(msg.result);
    }
  }

  private initialize(msg: RequestMessage): void {
    const params = parseInitializeParams(msg.params);
    const { logger, syncKind, features, commands } = this.context;

    this.clientCapabilitiesValue = params.capabilities;
    this.traceValue = params.trace;
    this.currentWorkspace = new Workspace({
      rootUri: params.rootUri,
      syncKind,
      folders: params.workspaceFolders,
      logger,
    });
    this.initialized = true;
    logger.info(`Initialized with root ${params.rootUri ?? "(none)"}`);

    const advertised = Array.from(features, ([method, feature]): [string, unknown] => [
      method,
      feature.capability,
    ]);
    this.sendResponse(msg.id, {
      capabilities: buildServerCapabilities(syncKind, advertised, Array.from(commands.keys())),
      serverInfo: { name: this.context.name, version: this.context.version },
    });
  }

  /**
   * Inline handlers run synchronously here, so document mutations keep
   * message order; only their results settle later.
   */
  private invoke(offLoop: boolean, call: () => unknown): Promise<unknown> {
    if (offLoop) return this.context.runOffLoop(call);
    try {
      return Promise.resolve(call());
    } catch (err) {
      return Promise.reject(err);
    }
  }

  private rejectPayload(err: unknown): void {
    const message = `Unable to decode message: ${describeError(err)}`;
    this.context.logger.error(message);
    this.sendError(null, ErrorCodes.ParseError, message);
    this.reportServerError(err, "message");
  }

  private sendResponse(id: number | string, result: unknown): void {
    this.send({ jsonrpc: "2.0", id, result });
  }

  private sendError(id: number | string | null, code: number, message: string): void {
    this.send({ jsonrpc: "2.0", id, error: { code, message } });
  }

  private send(message: ResponseMessage | RequestMessage | NotificationMessage): void {
    const transport = this.transport;
    if (!transport) {
      this.context.logger.warn("Dropping outgoing message: no transport attached");
      return;
    }
    try {
      transport.write(encode(message, { sendOnlyBody: transport.sendOnlyBody }));
    } catch (err) {
      this.context.logger.error(`Failed to write message: ${describeError(err)}`);
    }
  }
}

const BUILTIN_NOTIFICATIONS = new Set([
  "initialized",
  "textDocument/didOpen",
  "textDocument/didChange",
  "textDocument/didClose",
  "workspace/didChangeWorkspaceFolders",
]);

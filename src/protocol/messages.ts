export type RequestMessage = {
  jsonrpc: "2.0";
  id: number | string;
  method: string;
  params?: unknown;
};

export type NotificationMessage = {
  jsonrpc: "2.0";
  method: string;
  params?: unknown;
};

export type ResponseMessage = {
  jsonrpc: "2.0";
  id: number | string | null;
  result?: unknown;
  error?: ResponseError;
};

export type ResponseError = {
  code: number;
  message: string;
  data?: unknown;
};

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isId(value: unknown): value is number | string {
  return typeof value === "number" || typeof value === "string";
}

export function isRequest(msg: unknown): msg is RequestMessage {
  return isRecord(msg) && isId(msg.id) && typeof msg.method === "string";
}

export function isNotification(msg: unknown): msg is NotificationMessage {
  return isRecord(msg) && !("id" in msg) && typeof msg.method === "string";
}

export function isResponse(msg: unknown): msg is ResponseMessage {
  return (
    isRecord(msg) &&
    !("method" in msg) &&
    (isId(msg.id) || msg.id === null) &&
    ("result" in msg || "error" in msg)
  );
}

export type Position = { line: number; character: number };

export type Range = { start: Position; end: Position };

export function isPosition(value: unknown): value is Position {
  return (
    isRecord(value) &&
    typeof value.line === "number" &&
    typeof value.character === "number"
  );
}

export function isRange(value: unknown): value is Range {
  return isRecord(value) && isPosition(value.start) && isPosition(value.end);
}

export const TextDocumentSyncKind = {
  None: 0,
  Full: 1,
  Incremental: 2,
} as const;

export type TextDocumentSyncKind =
  (typeof TextDocumentSyncKind)[keyof typeof TextDocumentSyncKind];

export type TextDocumentItem = {
  uri: string;
  languageId?: string;
  version?: number;
  text: string;
};

export type WorkspaceFolder = { uri: string; name: string };

/**
 * One entry of `textDocument/didChange`'s `contentChanges`, tagged once at
 * decode time. Document code switches on `kind` and never inspects the
 * optional wire fields again.
 */
export type ChangeEvent =
  | { kind: "full"; text: string }
  | { kind: "incremental"; range: Range; rangeLength?: number; text: string }
  | { kind: "none" };

export function decodeChangeEvent(raw: unknown): ChangeEvent {
  if (!isRecord(raw) || typeof raw.text !== "string") return { kind: "none" };

  if (isRange(raw.range)) {
    return typeof raw.rangeLength === "number"
      ? { kind: "incremental", range: raw.range, rangeLength: raw.rangeLength, text: raw.text }
      : { kind: "incremental", range: raw.range, text: raw.text };
  }

  return { kind: "full", text: raw.text };
}

export const DiagnosticSeverity = {
  Error: 1,
  Warning: 2,
  Information: 3,
  Hint: 4,
} as const;

export type DiagnosticSeverity = (typeof DiagnosticSeverity)[keyof typeof DiagnosticSeverity];

export type Diagnostic = {
  range: Range;
  severity?: DiagnosticSeverity;
  source?: string;
  message: string;
};

export type TextEdit = { range: Range; newText: string };

export type WorkspaceEdit = {
  changes?: Record<string, TextEdit[]>;
  documentChanges?: unknown[];
};

export type ConfigurationItem = { scopeUri?: string; section?: string };

export type ConfigurationParams = { items: ConfigurationItem[] };

export type Registration = { id: string; method: string; registerOptions?: unknown };

export type RegistrationParams = { registrations: Registration[] };

export type Unregistration = { id: string; method: string };

// The protocol keeps the historical misspelling of this field.
export type UnregistrationParams = { unregisterations: Unregistration[] };

export type ShowDocumentParams = {
  uri: string;
  external?: boolean;
  takeFocus?: boolean;
  selection?: Range;
};

export type TraceValue = "off" | "messages" | "verbose";

export function isTraceValue(value: unknown): value is TraceValue {
  return value === "off" || value === "messages" || value === "verbose";
}

export const MessageType = {
  Error: 1,
  Warning: 2,
  Info: 3,
  Log: 4,
} as const;

export type MessageType = (typeof MessageType)[keyof typeof MessageType];

export const ErrorCodes = {
  ParseError: -32700,
  InvalidRequest: -32600,
  MethodNotFound: -32601,
  InvalidParams: -32602,
  InternalError: -32603,
  ServerNotInitialized: -32002,
  RequestCancelled: -32800,
} as const;

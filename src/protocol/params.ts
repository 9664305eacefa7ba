import { LspError } from "./errors";
import {
  ErrorCodes,
  decodeChangeEvent,
  isRecord,
  isTraceValue,
  type ChangeEvent,
  type TraceValue,
  type TextDocumentItem,
  type WorkspaceFolder,
} from "./messages";

// Just enough shape checking to read the parameters the runtime acts on.

function invalid(message: string): LspError {
  return new LspError(message, ErrorCodes.InvalidParams);
}

function textDocumentOf(params: unknown): Record<string, unknown> {
  if (!isRecord(params) || !isRecord(params.textDocument)) {
    throw invalid("Missing textDocument parameter");
  }
  return params.textDocument;
}

function uriOf(doc: Record<string, unknown>): string {
  if (typeof doc.uri !== "string") throw invalid("textDocument.uri must be a string");
  return doc.uri;
}

function optionalVersion(doc: Record<string, unknown>): number | undefined {
  return typeof doc.version === "number" ? doc.version : undefined;
}

function isWorkspaceFolder(value: unknown): value is WorkspaceFolder {
  return isRecord(value) && typeof value.uri === "string" && typeof value.name === "string";
}

function foldersOf(value: unknown): WorkspaceFolder[] {
  return Array.isArray(value) ? value.filter(isWorkspaceFolder) : [];
}

export type InitializeParams = {
  rootUri: string | null;
  workspaceFolders: WorkspaceFolder[];
  capabilities: unknown;
  trace: TraceValue;
};

export function parseInitializeParams(params: unknown): InitializeParams {
  if (!isRecord(params)) return { rootUri: null, workspaceFolders: [], capabilities: {}, trace: "off" };

  let rootUri: string | null = null;
  if (typeof params.rootUri === "string") rootUri = params.rootUri;
  else if (typeof params.rootPath === "string") rootUri = params.rootPath;

  return {
    rootUri,
    workspaceFolders: foldersOf(params.workspaceFolders),
    capabilities: params.capabilities ?? {},
    trace: isTraceValue(params.trace) ? params.trace : "off",
  };
}

export function parseDidOpenParams(params: unknown): TextDocumentItem {
  const doc = textDocumentOf(params);
  if (typeof doc.text !== "string") throw invalid("textDocument.text must be a string");

  return {
    uri: uriOf(doc),
    languageId: typeof doc.languageId === "string" ? doc.languageId : undefined,
    version: optionalVersion(doc),
    text: doc.text,
  };
}

export type DidChangeParams = {
  uri: string;
  version: number | undefined;
  changes: ChangeEvent[];
};

export function parseDidChangeParams(params: unknown): DidChangeParams {
  const doc = textDocumentOf(params);
  const rawChanges = isRecord(params) ? params.contentChanges : undefined;
  if (!Array.isArray(rawChanges)) throw invalid("contentChanges must be an array");

  return {
    uri: uriOf(doc),
    version: optionalVersion(doc),
    changes: rawChanges.map(decodeChangeEvent),
  };
}

export function parseDidCloseParams(params: unknown): string {
  return uriOf(textDocumentOf(params));
}

export type WorkspaceFoldersChange = {
  added: WorkspaceFolder[];
  removed: WorkspaceFolder[];
};

export function parseWorkspaceFoldersChange(params: unknown): WorkspaceFoldersChange {
  const event = isRecord(params) ? params.event : undefined;
  if (!isRecord(event)) throw invalid("Missing event parameter");
  return { added: foldersOf(event.added), removed: foldersOf(event.removed) };
}

export function parseSetTraceParams(params: unknown): TraceValue {
  const value = isRecord(params) ? params.value : undefined;
  if (!isTraceValue(value)) throw invalid("value must be off, messages or verbose");
  return value;
}

export type ExecuteCommandParams = {
  command: string;
  args: unknown[];
};

export function parseExecuteCommandParams(params: unknown): ExecuteCommandParams {
  if (!isRecord(params) || typeof params.command !== "string") {
    throw invalid("command must be a string");
  }
  const args = params.arguments ?? [];
  if (!Array.isArray(args)) throw invalid("arguments must be an array");
  return { command: params.command, args };
}

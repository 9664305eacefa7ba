import type { TextDocumentSyncKind } from "./messages";

// Registered request methods that advertise a provider in `initialize`.
const PROVIDERS: Record<string, [key: string, value: unknown]> = {
  "textDocument/formatting": ["documentFormattingProvider", true],
  "textDocument/documentSymbol": ["documentSymbolProvider", true],
  "textDocument/hover": ["hoverProvider", true],
  "textDocument/completion": ["completionProvider", {}],
  "textDocument/definition": ["definitionProvider", true],
  "textDocument/references": ["referencesProvider", true],
  "textDocument/rename": ["renameProvider", true],
  "workspace/symbol": ["workspaceSymbolProvider", true],
};

export type ServerCapabilities = Record<string, unknown>;

export function buildServerCapabilities(
  syncKind: TextDocumentSyncKind,
  features: Iterable<[method: string, capability: unknown]>,
  commands: string[] = []
): ServerCapabilities {
  const capabilities: ServerCapabilities = {
    textDocumentSync: {
      openClose: true,
      change: syncKind,
      save: { includeText: false },
    },
    workspace: {
      workspaceFolders: { supported: true, changeNotifications: true },
    },
  };

  for (const [method, capability] of features) {
    const provider = PROVIDERS[method];
    if (!provider) continue;
    const [key, value] = provider;
    capabilities[key] = capability ?? value;
  }

  if (commands.length > 0) capabilities.executeCommandProvider = { commands };

  return capabilities;
}

import * as fs from "fs";
import { DocumentNotFoundError } from "../protocol/errors";
import {
  TextDocumentSyncKind,
  type ChangeEvent,
  type TextDocumentItem,
  type WorkspaceFolder,
} from "../protocol/messages";
import { createLogger, type Logger } from "../util/log";
import { uriScheme, uriToPath } from "../util/uri";
import { Document } from "./document";

export type WorkspaceOptions = {
  rootUri?: string | null;
  syncKind?: TextDocumentSyncKind;
  folders?: WorkspaceFolder[];
  logger?: Logger;
};

export type DocumentSnapshot = { text: string; version: number | undefined };

/**
 * Open documents and workspace folders of one session. Tracked documents are
 * owned here from `open` until `close`; anything else is read from disk.
 */
export class Workspace {
  readonly rootUri: string;
  readonly rootPath: string;
  readonly syncKind: TextDocumentSyncKind;

  private readonly docs = new Map<string, Document>();
  private readonly folderMap = new Map<string, WorkspaceFolder>();
  private readonly logger: Logger;

  constructor(options: WorkspaceOptions = {}) {
    this.rootUri = options.rootUri ?? "";
    this.rootPath = uriToPath(this.rootUri);
    this.syncKind = options.syncKind ?? TextDocumentSyncKind.Incremental;
    this.logger = options.logger ?? createLogger("workspace");

    for (const folder of options.folders ?? []) this.addFolder(folder);
  }

  get documents(): ReadonlyMap<string, Document> {
    return this.docs;
  }

  get folders(): ReadonlyMap<string, WorkspaceFolder> {
    return this.folderMap;
  }

  isLocal(): boolean {
    const scheme = uriScheme(this.rootUri);
    return (
      (scheme === "" || scheme === "file") &&
      this.rootPath !== "" &&
      fs.existsSync(this.rootPath)
    );
  }

  /**
   * The tracked document for `uri`, or an untracked one backed by the file
   * on disk, re-read on every access.
   */
  getDocument(uri: string): Document {
    return this.docs.get(uri) ?? this.createDocument(uri);
  }

  putDocument(item: TextDocumentItem): Document {
    const doc = this.createDocument(item.uri, item.text, item.version);
    this.docs.set(item.uri, doc);
    return doc;
  }

  updateDocument(uri: string, event: ChangeEvent, version?: number): void {
    const doc = this.docs.get(uri);
    if (!doc) throw new DocumentNotFoundError(uri);

    doc.apply(event);
    doc.version = version;
  }

  removeDocument(uri: string): void {
    if (!this.docs.delete(uri)) throw new DocumentNotFoundError(uri);
  }

  addFolder(folder: WorkspaceFolder): void {
    this.folderMap.set(folder.uri, folder);
  }

  removeFolder(uri: string): void {
    this.folderMap.delete(uri);
  }

  open(uri: string, text: string, version?: number): void {
    this.putDocument({ uri, text, version });
  }

  change(uri: string, event: ChangeEvent, version?: number): void {
    this.updateDocument(uri, event, version);
  }

  close(uri: string): void {
    this.removeDocument(uri);
  }

  read(uri: string): DocumentSnapshot {
    const doc = this.getDocument(uri);
    return { text: doc.source, version: doc.version };
  }

  private createDocument(uri: string, source?: string, version?: number): Document {
    return new Document(uri, { source, version, syncKind: this.syncKind, logger: this.logger });
  }
}

import * as fs from "fs";
import * as path from "path";
import {
  TextDocumentSyncKind,
  type ChangeEvent,
  type Position,
  type Range,
} from "../protocol/messages";
import { createLogger, type Logger } from "../util/log";
import { uriToPath } from "../util/uri";
import {
  offsetAtPosition,
  positionToRowCol,
  rowColToPosition,
  sliceCodePoints,
  splitLines,
  wordAtPosition,
  type RowCol,
} from "./position";

export type DocumentOptions = {
  /** Text of an open document. Without it the document reads its file on every access. */
  source?: string;
  version?: number;
  syncKind?: TextDocumentSyncKind;
  logger?: Logger;
};

export class Document {
  readonly path: string;
  readonly filename: string;
  readonly syncKind: TextDocumentSyncKind;
  version: number | undefined;

  private text: string | undefined;
  private readonly logger: Logger;

  constructor(
    readonly uri: string,
    options: DocumentOptions = {}
  ) {
    this.path = uriToPath(uri);
    this.filename = path.basename(this.path);
    this.text = options.source;
    this.version = options.version;
    this.syncKind = options.syncKind ?? TextDocumentSyncKind.Incremental;
    this.logger = options.logger ?? createLogger("document");
  }

  get source(): string {
    return this.text ?? fs.readFileSync(this.path, "utf-8");
  }

  get lines(): string[] {
    return splitLines(this.source);
  }

  apply(event: ChangeEvent): void {
    switch (event.kind) {
      case "none":
        return;

      case "full":
        this.text = event.text;
        return;

      case "incremental": {
        if (this.syncKind === TextDocumentSyncKind.Incremental) {
          this.applyIncremental(event.range, event.text);
          return;
        }
        this.logger.warn(
          `Ranged change received for ${this.uri}, which is not synced incrementally; replacing the whole text`
        );
        this.text = event.text;
        return;
      }
    }
  }

  positionToRowCol(position: Position): RowCol {
    return positionToRowCol(this.lines, position);
  }

  rowColToPosition(row: number, col: number): Position {
    return rowColToPosition(this.lines, row, col);
  }

  offsetAtPosition(position: Position): number {
    return offsetAtPosition(this.lines, position);
  }

  wordAtPosition(position: Position): string {
    return wordAtPosition(this.lines, position);
  }

  private applyIncremental(range: Range, text: string): void {
    const lines = this.lines;
    const start = positionToRowCol(lines, range.start);
    const end = positionToRowCol(lines, range.end);

    if (start.row === lines.length) {
      this.text = this.source + text;
      return;
    }

    let next = "";
    lines.forEach((line, i) => {
      if (i < start.row || i > end.row) {
        next += line;
        return;
      }
      if (i === start.row) next += sliceCodePoints(line, 0, start.col) + text;
      if (i === end.row) next += sliceCodePoints(line, end.col);
    });
    this.text = next;
  }
}

import type { Position } from "../protocol/messages";

/**
 * Row/column pair where `col` counts Unicode code points. Positions on the
 * wire count UTF-16 code units instead, so any code point outside the Basic
 * Multilingual Plane is one column but two characters.
 */
export type RowCol = { row: number; col: number };

const BMP_MAX = 0xffff;
const WORD_START = /^[A-Za-z0-9_]*/;
const WORD_END = /[A-Za-z0-9_]*$/;

function utf16Length(codePoint: string): number {
  return (codePoint.codePointAt(0) ?? 0) > BMP_MAX ? 2 : 1;
}

/** Splits text into lines that keep their `\n`, `\r\n` or `\r` terminator. */
export function splitLines(text: string): string[] {
  const lines: string[] = [];
  let start = 0;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch !== "\n" && ch !== "\r") continue;
    if (ch === "\r" && text[i + 1] === "\n") i++;
    lines.push(text.slice(start, i + 1));
    start = i + 1;
  }

  if (start < text.length) lines.push(text.slice(start));
  return lines;
}

export function codePointLength(text: string): number {
  let length = 0;
  for (const _ of text) length++;
  return length;
}

export function sliceCodePoints(text: string, start: number, end?: number): string {
  return Array.from(text).slice(start, end).join("");
}

export function positionToRowCol(lines: readonly string[], position: Position): RowCol {
  const line = lines[position.line];
  if (line === undefined) return { row: lines.length, col: 0 };

  let col = position.character;
  let units = 0;
  for (const codePoint of line) {
    if (units >= position.character) break;
    const width = utf16Length(codePoint);
    if (width === 2) col -= 1;
    units += width;
  }

  return { row: position.line, col };
}

export function rowColToPosition(lines: readonly string[], row: number, col: number): Position {
  const line = lines[row];
  if (line === undefined) return { line: lines.length, character: 0 };

  let character = 0;
  let seen = 0;
  for (const codePoint of line) {
    if (seen >= col) break;
    character += utf16Length(codePoint);
    seen++;
  }

  return { line: row, character };
}

export function offsetAtPosition(lines: readonly string[], position: Position): number {
  const { row, col } = positionToRowCol(lines, position);
  let offset = col;
  for (const line of lines.slice(0, row)) offset += codePointLength(line);
  return offset;
}

export function wordAtPosition(lines: readonly string[], position: Position): string {
  if (position.line >= lines.length) return "";

  const { row, col } = positionToRowCol(lines, position);
  const codePoints = Array.from(lines[row] ?? "");
  const before = codePoints.slice(0, col).join("");
  const after = codePoints.slice(col).join("");

  return (WORD_END.exec(before)?.[0] ?? "") + (WORD_START.exec(after)?.[0] ?? "");
}

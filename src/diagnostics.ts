import { ParseError } from "./types.js";
import { utf8Length } from "./lexer.js";

interface Line {
  text: string;
  /** Byte offset of the first character */
  byteStart: number;
  byteLength: number;
}

function splitLines(source: string): Line[] {
  const lines: Line[] = [];
  let byteStart = 0;
  // A byte order mark takes bytes but no column.
  if (source.startsWith("\uFEFF")) {
    byteStart = 3;
    source = source.slice(1);
  }
  for (const raw of source.split("\n")) {
    let byteLength = 0;
    for (const ch of raw) {
      byteLength += utf8Length(ch.codePointAt(0) ?? 0);
    }
    lines.push({ text: raw.endsWith("\r") ? raw.slice(0, -1) : raw, byteStart, byteLength });
    byteStart += byteLength + 1;
  }
  return lines;
}

/** Number of characters of `text` that fit in `bytes` bytes */
function charColumn(text: string, bytes: number): number {
  let column = 0;
  let consumed = 0;
  for (const ch of text) {
    if (consumed >= bytes) break;
    consumed += utf8Length(ch.codePointAt(0) ?? 0);
    column++;
  }
  return column;
}

/**
 * Render a parse error against its source, with the two lines before it
 * and a caret line under the span:
 *
 * ```text
 * error[DuplicateKey]: duplicate key: `a` is already defined
 *  --> 2:1
 *   |
 * 1 | a = 1
 * 2 | a = 2
 *   | ^
 * ```
 */
export function formatParseError(source: string, error: ParseError): string {
  const lines = splitLines(source);

  let index = 0;
  while (index + 1 < lines.length && lines[index + 1].byteStart <= error.span.start) {
    index++;
  }
  const line = lines[index];

  const startColumn = charColumn(line.text, error.span.start - line.byteStart);
  const endOffset = Math.min(error.span.end, line.byteStart + line.byteLength) - line.byteStart;
  const width = Math.max(1, charColumn(line.text, endOffset) - startColumn);

  const gutter = String(index + 1).length;
  const pad = " ".repeat(gutter);

  const out = [`error[${error.kind}]: ${error.message}`, `${pad}--> ${index + 1}:${startColumn + 1}`, `${pad} |`];
  for (let i = Math.max(0, index - 2); i <= index; i++) {
    out.push(`${String(i + 1).padStart(gutter)} | ${lines[i].text}`);
  }
  out.push(`${pad} | ${" ".repeat(startColumn)}${"^".repeat(width)}`);
  return out.join("\n");
}

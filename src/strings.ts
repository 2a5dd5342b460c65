import { ParseError, Span, TomlString } from "./types.js";
import { StringToken, byteLength, utf8Length } from "./lexer.js";

const SIMPLE_ESCAPES: Record<string, string> = {
  b: "\b",
  t: "\t",
  n: "\n",
  f: "\f",
  r: "\r",
  '"': '"',
  "\\": "\\",
};

/**
 * Turn a string token into a string value. Only a basic string that
 * contains an escape is copied; every other string borrows its body from
 * `source`.
 */
export function decodeString(source: string, token: StringToken): TomlString {
  if (token.style === "literal" || !token.hasEscapes) {
    return {
      kind: "borrowed",
      source,
      start: token.bodyStart,
      end: token.bodyEnd,
      span: token.span,
    };
  }
  return { kind: "owned", value: unescape(source, token), span: token.span };
}

function unescape(source: string, token: StringToken): string {
  const end = token.bodyEnd;
  let result = "";
  let runStart = token.bodyStart;
  let pos = token.bodyStart;
  let bytePos = token.bodyByteStart;

  while (pos < end) {
    if (source[pos] !== "\\") {
      const code = source.codePointAt(pos) ?? 0;
      pos += code > 0xffff ? 2 : 1;
      bytePos += utf8Length(code);
      continue;
    }

    result += source.slice(runStart, pos);
    const escapeStart = bytePos;
    const next = pos + 1 < end ? source[pos + 1] : "";

    const simple = SIMPLE_ESCAPES[next];
    if (simple !== undefined) {
      result += simple;
      pos += 2;
      bytePos += 2;
    } else if (next === "u" || next === "U") {
      const digits = next === "u" ? 4 : 8;
      const hex = source.slice(pos + 2, Math.min(pos + 2 + digits, end));
      const span: Span = { start: escapeStart, end: escapeStart + 2 + byteLength(hex) };
      if (!new RegExp(`^[0-9A-Fa-f]{${digits}}$`).test(hex)) {
        throw new ParseError("InvalidEscape", span, `\\${next}${hex}`);
      }
      const code = parseInt(hex, 16);
      if (code > 0x10ffff || (code >= 0xd800 && code <= 0xdfff)) {
        throw new ParseError("InvalidEscape", span, `\\${next}${hex} is not a Unicode scalar value`);
      }
      result += String.fromCodePoint(code);
      pos += 2 + digits;
      bytePos += 2 + digits;
    } else if (token.multiline && (next === " " || next === "\t" || next === "\n" || next === "\r")) {
      // Line-ending backslash: drop the line break and the whitespace after it
      let skip = pos + 1;
      while (source[skip] === " " || source[skip] === "\t") {
        skip++;
      }
      if (!(source[skip] === "\n" || (source[skip] === "\r" && source[skip + 1] === "\n"))) {
        throw new ParseError("InvalidEscape", { start: escapeStart, end: escapeStart + 2 }, "`\\` followed by whitespace");
      }
      while (skip < end && " \t\r\n".includes(source[skip])) {
        skip++;
      }
      bytePos += skip - pos;
      pos = skip;
    } else {
      const found = next === "" ? "" : String.fromCodePoint(source.codePointAt(pos + 1) ?? 0);
      throw new ParseError(
        "InvalidEscape",
        { start: escapeStart, end: escapeStart + 1 + byteLength(found) },
        `\\${found}`,
      );
    }

    runStart = pos;
  }

  return result + source.slice(runStart, end);
}

import { Span, ParseError, DateTimeKind } from "./types.js";
import { classifyDateTime, isDateOnly, looksLikeDateTime } from "./datetime.js";

/**
 * Which grammar the next token is read with. Keys and values share
 * characters (`1.5` is two key segments but one float), so the parser
 * chooses.
 */
export type LexMode = "key" | "value";

export type TokenType =
  | "bare"
  | "string"
  | "number"
  | "boolean"
  | "datetime"
  | "equals"
  | "dot"
  | "comma"
  | "lbracket"
  | "rbracket"
  | "lbrace"
  | "rbrace"
  | "newline"
  | "eof";

export interface SimpleToken {
  type: Exclude<TokenType, "string" | "number" | "datetime">;
  text: string;
  span: Span;
}

export interface StringToken {
  type: "string";
  text: string;
  span: Span;
  style: "basic" | "literal";
  multiline: boolean;
  /** True if a basic string contains a backslash; escapes are not decoded yet */
  hasEscapes: boolean;
  /** Character offsets of the body, delimiters excluded */
  bodyStart: number;
  bodyEnd: number;
  /** Byte offset of `bodyStart` */
  bodyByteStart: number;
}

export interface NumberToken {
  type: "number";
  text: string;
  span: Span;
  hasUnderscores: boolean;
}

export interface DateTimeToken {
  type: "datetime";
  text: string;
  span: Span;
  kind: DateTimeKind;
}

export type Token = SimpleToken | StringToken | NumberToken | DateTimeToken;

const PUNCTUATION: Record<string, SimpleToken["type"]> = {
  "=": "equals",
  ",": "comma",
  "[": "lbracket",
  "]": "rbracket",
  "{": "lbrace",
  "}": "rbrace",
};

/** UTF-8 length of one code point */
export function utf8Length(code: number): number {
  if (code < 0x80) return 1;
  if (code < 0x800) return 2;
  if (code < 0x10000) return 3;
  return 4;
}

/** UTF-8 length of a string, counting a lone surrogate as three bytes */
export function byteLength(text: string): number {
  let length = 0;
  for (const ch of text) {
    length += utf8Length(ch.codePointAt(0) ?? 0);
  }
  return length;
}

function isBareKeyChar(ch: string): boolean {
  return /^[A-Za-z0-9_-]$/.test(ch);
}

function isAtomChar(ch: string): boolean {
  return /^[A-Za-z0-9_+\-.:]$/.test(ch);
}

/** Control characters other than tab are not allowed in strings or comments */
function isControl(ch: string): boolean {
  const code = ch.charCodeAt(0);
  return (code < 0x20 && ch !== "\t") || code === 0x7f;
}

export class Lexer {
  private pos = 0; // character position
  private bytePos = 0; // byte position for spans

  constructor(private source: string) {
    if (source.charCodeAt(0) === 0xfeff) {
      this.advance();
    }
  }

  private peek(offset = 0): string {
    return this.source[this.pos + offset] ?? "";
  }

  private advance(): string {
    if (this.pos >= this.source.length) return "";

    const code = this.source.codePointAt(this.pos) ?? 0;
    const ch = String.fromCodePoint(code);
    this.pos += ch.length;
    this.bytePos += utf8Length(code);
    return ch;
  }

  /** Span of the character at the current position */
  private charSpan(): Span {
    const code = this.source.codePointAt(this.pos) ?? 0;
    return { start: this.bytePos, end: this.bytePos + utf8Length(code) };
  }

  private skipWhitespaceAndComments(): void {
    while (this.pos < this.source.length) {
      const ch = this.peek();
      if (ch === " " || ch === "\t") {
        this.advance();
      } else if (ch === "#") {
        this.advance();
        while (this.pos < this.source.length) {
          const c = this.peek();
          if (c === "\n" || (c === "\r" && this.peek(1) === "\n")) {
            break;
          }
          if (isControl(c)) {
            throw new ParseError("UnexpectedCharacter", this.charSpan(), "control character in comment");
          }
          this.advance();
        }
      } else {
        break;
      }
    }
  }

  nextToken(mode: LexMode): Token {
    this.skipWhitespaceAndComments();

    const start = this.bytePos;
    if (this.pos >= this.source.length) {
      return { type: "eof", text: "", span: { start, end: start } };
    }

    const ch = this.peek();

    if (ch === "\n" || (ch === "\r" && this.peek(1) === "\n")) {
      const text = ch === "\r" ? "\r\n" : "\n";
      this.advance();
      if (ch === "\r") this.advance();
      return { type: "newline", text, span: { start, end: this.bytePos } };
    }

    const punctuation = PUNCTUATION[ch];
    if (punctuation) {
      this.advance();
      return { type: punctuation, text: ch, span: { start, end: this.bytePos } };
    }

    if (ch === '"' || ch === "'") {
      return this.readString(ch);
    }

    if (mode === "key") {
      if (ch === ".") {
        this.advance();
        return { type: "dot", text: ch, span: { start, end: this.bytePos } };
      }
      if (isBareKeyChar(ch)) {
        return this.readBareKey();
      }
    } else if (isAtomChar(ch)) {
      return this.readAtom();
    }

    const found = String.fromCodePoint(this.source.codePointAt(this.pos) ?? 0);
    throw new ParseError("UnexpectedCharacter", this.charSpan(), JSON.stringify(found));
  }

  private readBareKey(): Token {
    const start = this.bytePos;
    const startPos = this.pos;
    while (isBareKeyChar(this.peek())) {
      this.advance();
    }
    return {
      type: "bare",
      text: this.source.slice(startPos, this.pos),
      span: { start, end: this.bytePos },
    };
  }

  private readAtom(): Token {
    const start = this.bytePos;
    const startPos = this.pos;
    while (isAtomChar(this.peek())) {
      this.advance();
    }

    // `1979-05-27 07:32:00` is one value
    if (
      isDateOnly(this.source.slice(startPos, this.pos)) &&
      this.peek() === " " &&
      /^\d{2}:/.test(this.source.slice(this.pos + 1, this.pos + 4))
    ) {
      this.advance();
      while (isAtomChar(this.peek())) {
        this.advance();
      }
    }

    const text = this.source.slice(startPos, this.pos);
    const span = { start, end: this.bytePos };

    if (text === "true" || text === "false") {
      return { type: "boolean", text, span };
    }

    const kind = classifyDateTime(text);
    if (kind) {
      return { type: "datetime", text, span, kind };
    }
    if (looksLikeDateTime(text)) {
      throw new ParseError("InvalidDateTime", span, `\`${text}\``);
    }

    return { type: "number", text, span, hasUnderscores: text.includes("_") };
  }

  private readString(quote: string): StringToken {
    const start = this.bytePos;
    const startPos = this.pos;
    const style = quote === '"' ? "basic" : "literal";
    const multiline = this.source.startsWith(quote.repeat(3), this.pos);

    if (multiline) {
      this.advance();
      this.advance();
      this.advance();
      // A newline right after the opening delimiter is trimmed
      if (this.peek() === "\n") {
        this.advance();
      } else if (this.peek() === "\r" && this.peek(1) === "\n") {
        this.advance();
        this.advance();
      }
    } else {
      this.advance();
    }

    const bodyStart = this.pos;
    const bodyByteStart = this.bytePos;
    let hasEscapes = false;

    while (this.pos < this.source.length) {
      const ch = this.peek();

      if (ch === quote) {
        if (!multiline) {
          const bodyEnd = this.pos;
          this.advance();
          return this.stringToken(startPos, start, style, false, hasEscapes, bodyStart, bodyEnd, bodyByteStart);
        }
        if (this.source.startsWith(quote.repeat(3), this.pos)) {
          // Up to two quotes before the closing delimiter belong to the body
          let extra = 0;
          while (extra < 2 && this.peek(3 + extra) === quote) {
            extra++;
          }
          for (let i = 0; i < extra; i++) {
            this.advance();
          }
          const bodyEnd = this.pos;
          this.advance();
          this.advance();
          this.advance();
          return this.stringToken(startPos, start, style, true, hasEscapes, bodyStart, bodyEnd, bodyByteStart);
        }
        this.advance();
        continue;
      }

      if (ch === "\\" && style === "basic") {
        hasEscapes = true;
        this.advance();
        // Keep an escaped quote or backslash from ending the string
        if (this.peek() === quote || this.peek() === "\\") {
          this.advance();
        }
        continue;
      }

      if (ch === "\n" || (ch === "\r" && this.peek(1) === "\n")) {
        if (!multiline) {
          throw new ParseError("UnterminatedString", { start, end: this.bytePos });
        }
        this.advance();
        if (ch === "\r") this.advance();
        continue;
      }

      if (isControl(ch)) {
        throw new ParseError("UnexpectedCharacter", this.charSpan(), "control character in string");
      }

      this.advance();
    }

    throw new ParseError("UnterminatedString", { start, end: this.bytePos });
  }

  private stringToken(
    startPos: number,
    start: number,
    style: "basic" | "literal",
    multiline: boolean,
    hasEscapes: boolean,
    bodyStart: number,
    bodyEnd: number,
    bodyByteStart: number,
  ): StringToken {
    return {
      type: "string",
      text: this.source.slice(startPos, this.pos),
      span: { start, end: this.bytePos },
      style,
      multiline,
      hasEscapes,
      bodyStart,
      bodyEnd,
      bodyByteStart,
    };
  }
}

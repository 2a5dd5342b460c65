import { Lexer, LexMode, Token, TokenType, byteLength } from "./lexer.js";
import { ArrayValue, ParseError, ParseErrorKind, Span, TableValue, TomlValue } from "./types.js";
import { Table } from "./table.js";
import { decodeString } from "./strings.js";
import { decodeNumber } from "./numbers.js";
import { stringValue } from "./value.js";

/** How a table came to exist, which decides what may add keys to it later */
type TableOrigin = "implicit" | "dotted" | "header" | "array-element" | "inline";

interface TableState {
  map: Map<string, TomlValue>;
  origin: TableOrigin;
}

interface KeySegment {
  text: string;
  span: Span;
}

function describeToken(token: Token): string {
  switch (token.type) {
    case "eof":
      return "end of input";
    case "newline":
      return "newline";
    default:
      return `\`${token.text}\``;
  }
}

export class Parser {
  private lexer: Lexer;
  private current: Token;
  private readonly tables = new WeakMap<Table, TableState>();
  private readonly tableArrays = new WeakMap<ArrayValue, TomlValue[]>();

  constructor(private source: string) {
    this.lexer = new Lexer(source);
    this.current = this.lexer.nextToken("key");
  }

  private advance(mode: LexMode): Token {
    const prev = this.current;
    this.current = this.lexer.nextToken(mode);
    return prev;
  }

  private check(...types: TokenType[]): boolean {
    return types.includes(this.current.type);
  }

  private expect(type: TokenType, mode: LexMode, kind: ParseErrorKind): Token {
    if (this.current.type !== type) {
      throw this.unexpected(kind);
    }
    return this.advance(mode);
  }

  private unexpected(kind: ParseErrorKind): ParseError {
    return new ParseError(kind, this.current.span, `found ${describeToken(this.current)}`);
  }

  private skipNewlines(mode: LexMode): void {
    while (this.check("newline")) {
      this.advance(mode);
    }
  }

  parse(): Table {
    const root = this.createTable("header");
    let target = root.state;

    while (!this.check("eof")) {
      if (this.check("newline")) {
        this.advance("key");
        continue;
      }

      if (this.check("lbracket")) {
        target = this.parseHeader(root.state);
      } else {
        this.parseKeyValue(target, "key");
      }

      if (this.check("newline")) {
        this.advance("key");
      } else if (!this.check("eof")) {
        throw this.unexpected("ExpectedNewline");
      }
    }

    return root.table;
  }

  private createTable(origin: TableOrigin): { state: TableState; table: Table } {
    const state: TableState = { map: new Map(), origin };
    const table = new Table(state.map);
    this.tables.set(table, state);
    return { state, table };
  }

  private stateOf(table: Table): TableState {
    const state = this.tables.get(table);
    if (!state) {
      throw new Error("table was not built by this parser");
    }
    return state;
  }

  // ---- headers ----

  private parseHeader(root: TableState): TableState {
    const open = this.advance("key");
    const isArray = this.check("lbracket") && this.current.span.start === open.span.end;
    if (isArray) {
      this.advance("key");
    }

    const path = this.parseKeyPath();
    let close = this.expect("rbracket", "key", "UnclosedBracket");
    if (isArray) {
      if (!this.check("rbracket") || this.current.span.start !== close.span.end) {
        throw this.unexpected("UnclosedBracket");
      }
      close = this.advance("key");
    }

    const span = { start: open.span.start, end: close.span.end };
    return isArray ? this.appendTableArray(root, path, span) : this.defineTable(root, path, span);
  }

  /** `[a.b]`: the last segment must not already be defined */
  private defineTable(root: TableState, path: KeySegment[], span: Span): TableState {
    const parent = this.resolvePath(root, path.slice(0, -1), "header");
    const last = path[path.length - 1];
    const existing = parent.map.get(last.text);

    if (existing === undefined) {
      const { state, table } = this.createTable("header");
      parent.map.set(last.text, { type: "table", table, span });
      return state;
    }

    if (existing.type === "table") {
      const state = this.stateOf(existing.table);
      if (state.origin === "implicit") {
        state.origin = "header";
        return state;
      }
    }

    throw new ParseError("DuplicateKey", last.span, `table \`${last.text}\` is already defined`);
  }

  /** `[[a.b]]`: start a new element of the table array at the last segment */
  private appendTableArray(root: TableState, path: KeySegment[], span: Span): TableState {
    const parent = this.resolvePath(root, path.slice(0, -1), "header");
    const last = path[path.length - 1];
    const existing = parent.map.get(last.text);

    const items: TomlValue[] | undefined =
      existing === undefined ? [] : existing.type === "array" ? this.tableArrays.get(existing) : undefined;
    if (!items) {
      throw new ParseError("DuplicateKey", last.span, `\`${last.text}\` is not an array of tables`);
    }

    const { state, table } = this.createTable("array-element");
    items.push({ type: "table", table, span });

    if (existing === undefined) {
      const array: ArrayValue = { type: "array", items, tableArray: true, span };
      this.tableArrays.set(array, items);
      parent.map.set(last.text, array);
    }
    return state;
  }

  /**
   * Walk `segments` down from `from`, creating the tables that are missing.
   * Headers and dotted keys both come through here; they differ in which
   * existing tables they may enter.
   */
  private resolvePath(from: TableState, segments: KeySegment[], via: "header" | "dotted"): TableState {
    let current = from;
    for (const segment of segments) {
      const existing = current.map.get(segment.text);

      if (existing === undefined) {
        const { state, table } = this.createTable(via === "header" ? "implicit" : "dotted");
        current.map.set(segment.text, { type: "table", table, span: segment.span });
        current = state;
        continue;
      }

      const next = this.enter(existing, via);
      if (!next) {
        throw new ParseError("DuplicateKey", segment.span, `\`${segment.text}\` is already defined`);
      }
      current = next;
    }
    return current;
  }

  private enter(value: TomlValue, via: "header" | "dotted"): TableState | null {
    if (value.type === "table") {
      const state = this.stateOf(value.table);
      if (state.origin === "inline") return null;
      if (via === "dotted" && state.origin === "header") return null;
      return state;
    }

    // A header path goes through the most recent element of a table array
    if (value.type === "array" && via === "header") {
      const items = this.tableArrays.get(value) ?? [];
      const last = items[items.length - 1];
      if (last?.type === "table") {
        return this.stateOf(last.table);
      }
    }

    return null;
  }

  // ---- keys ----

  private parseKeyPath(): KeySegment[] {
    const segments = [this.parseKeySegment()];
    while (this.check("dot")) {
      this.advance("key");
      segments.push(this.parseKeySegment());
    }
    return segments;
  }

  private parseKeySegment(): KeySegment {
    const token = this.current;
    if (token.type === "bare") {
      this.advance("key");
      return { text: token.text, span: token.span };
    }
    if (token.type === "string" && !token.multiline) {
      const text = stringValue(decodeString(this.source, token));
      this.advance("key");
      return { text, span: token.span };
    }
    throw this.unexpected("ExpectedKey");
  }

  /** `a.b.c = value` into `target`; `after` is the mode for the token after the value */
  private parseKeyValue(target: TableState, after: LexMode): void {
    const path = this.parseKeyPath();
    const last = path[path.length - 1];
    const parent = this.resolvePath(target, path.slice(0, -1), "dotted");

    if (parent.map.has(last.text)) {
      throw new ParseError("DuplicateKey", last.span, `\`${last.text}\` is already defined`);
    }

    this.expect("equals", "value", "ExpectedEquals");
    parent.map.set(last.text, this.parseValue(after));
  }

  // ---- values ----

  private parseValue(after: LexMode): TomlValue {
    const token = this.current;
    switch (token.type) {
      case "string": {
        const value = decodeString(this.source, token);
        this.advance(after);
        return { type: "string", value, span: token.span };
      }
      case "number": {
        // Bare words reach the lexer as number tokens
        if (!/^[+\-0-9.]/.test(token.text) && token.text !== "inf" && token.text !== "nan") {
          throw this.unexpected("ExpectedValue");
        }
        const value = decodeNumber(token);
        this.advance(after);
        return value;
      }
      case "boolean":
        this.advance(after);
        return { type: "boolean", value: token.text === "true", span: token.span };
      case "datetime":
        this.advance(after);
        return { type: token.kind, raw: token.text, span: token.span };
      case "lbracket":
        return this.parseArray(after);
      case "lbrace":
        return this.parseInlineTable(after);
      default:
        throw this.unexpected("ExpectedValue");
    }
  }

  private parseArray(after: LexMode): ArrayValue {
    const open = this.advance("value");
    const items: TomlValue[] = [];

    for (;;) {
      this.skipNewlines("value");
      if (this.check("rbracket")) break;
      if (this.check("eof")) {
        throw new ParseError("UnexpectedEndOfInput", this.current.span, "unclosed array");
      }

      items.push(this.parseValue("value"));

      this.skipNewlines("value");
      if (this.check("comma")) {
        this.advance("value");
        continue;
      }
      if (this.check("rbracket")) break;
      if (this.check("eof")) {
        throw new ParseError("UnexpectedEndOfInput", this.current.span, "unclosed array");
      }
      throw this.unexpected("ExpectedComma");
    }

    const close = this.advance(after);
    return {
      type: "array",
      items,
      tableArray: false,
      span: { start: open.span.start, end: close.span.end },
    };
  }

  private parseInlineTable(after: LexMode): TableValue {
    const open = this.advance("key");
    const { state, table } = this.createTable("inline");

    if (!this.check("rbrace")) {
      for (;;) {
        if (this.check("eof")) {
          throw new ParseError("UnexpectedEndOfInput", this.current.span, "unclosed inline table");
        }

        this.parseKeyValue(state, "key");

        if (this.check("comma")) {
          this.advance("key");
          continue;
        }
        if (this.check("rbrace")) break;
        if (this.check("eof")) {
          throw new ParseError("UnexpectedEndOfInput", this.current.span, "unclosed inline table");
        }
        throw this.unexpected("ExpectedComma");
      }
    }

    const close = this.advance(after);
    return {
      type: "table",
      table,
      span: { start: open.span.start, end: close.span.end },
    };
  }
}

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

function decodeBytes(bytes: Uint8Array): string {
  try {
    return new TextDecoder("utf-8", { fatal: true, ignoreBOM: true }).decode(bytes);
  } catch (e) {
    if (e instanceof TypeError) {
      throw new ParseError("InvalidEncoding", { start: 0, end: bytes.length }, "input is not UTF-8");
    }
    throw e;
  }
}

/**
 * Parse a document into its root table. Bytes must be UTF-8; a string must
 * not contain lone surrogates. Fails on the first error.
 */
export function parse(source: string | Uint8Array): Table {
  const text = typeof source === "string" ? source : decodeBytes(source);

  const surrogate = LONE_SURROGATE.exec(text);
  if (surrogate) {
    const start = byteLength(text.slice(0, surrogate.index));
    throw new ParseError("InvalidEncoding", { start, end: start + 3 }, "lone surrogate");
  }

  const parser = new Parser(text);
  return parser.parse();
}

import { describe, it } from "node:test";
import assert from "node:assert";
import { Lexer, LexMode, Token } from "./lexer.js";
import { ParseError } from "./types.js";

function tokenize(source: string, mode: LexMode): Token[] {
  const lexer = new Lexer(source);
  const tokens: Token[] = [];
  for (;;) {
    const token = lexer.nextToken(mode);
    tokens.push(token);
    if (token.type === "eof") return tokens;
  }
}

function types(source: string, mode: LexMode): string[] {
  return tokenize(source, mode).map((t) => `${t.type}:${t.text}`);
}

function lexError(source: string, mode: LexMode): ParseError {
  try {
    tokenize(source, mode);
  } catch (e) {
    if (e instanceof ParseError) return e;
    throw e;
  }
  assert.fail("expected a lex error");
}

describe("Lexer", () => {
  it("splits dotted keys in key mode", () => {
    assert.deepStrictEqual(types("a.b = 1", "key"), ["bare:a", "dot:.", "bare:b", "equals:=", "bare:1", "eof:"]);
  });

  it("reads a float as one token in value mode", () => {
    assert.deepStrictEqual(types("1.5", "value"), ["number:1.5", "eof:"]);
    assert.deepStrictEqual(types("1.5", "key"), ["bare:1", "dot:.", "bare:5", "eof:"]);
  });

  it("reads booleans and signed numbers", () => {
    assert.deepStrictEqual(types("true, -1_000, +inf", "value"), [
      "boolean:true",
      "comma:,",
      "number:-1_000",
      "comma:,",
      "number:+inf",
      "eof:",
    ]);
  });

  it("keeps a date and time separated by a space together", () => {
    const [token] = tokenize("1979-05-27 07:32:00Z", "value");
    assert.strictEqual(token.type, "datetime");
    assert.deepStrictEqual(token.span, { start: 0, end: 20 });
    if (token.type === "datetime") {
      assert.strictEqual(token.kind, "offset-datetime");
    }
  });

  it("does not join a date with a following word", () => {
    assert.deepStrictEqual(types("1979-05-27 x", "value"), ["datetime:1979-05-27", "number:x", "eof:"]);
  });

  it("skips comments and emits newlines", () => {
    const tokens = tokenize("# hi\r\n", "key");
    assert.deepStrictEqual(
      tokens.map((t) => [t.type, t.text, t.span]),
      [
        ["newline", "\r\n", { start: 4, end: 6 }],
        ["eof", "", { start: 6, end: 6 }],
      ],
    );
  });

  it("measures spans in UTF-8 bytes", () => {
    const [token] = tokenize('"é"', "value");
    assert.ok(token.type === "string");
    assert.deepStrictEqual(token.span, { start: 0, end: 4 });
    assert.strictEqual(token.bodyStart, 1);
    assert.strictEqual(token.bodyEnd, 2);
    assert.strictEqual(token.bodyByteStart, 1);
  });

  it("skips a byte order mark", () => {
    const [token] = tokenize("\uFEFFa", "key");
    assert.deepStrictEqual(token.span, { start: 3, end: 4 });
  });

  it("marks basic strings that contain escapes", () => {
    const [plain, escaped, literal] = tokenize(`"abc" "a\\"b" 'a\\b'`, "value");
    assert.ok(plain.type === "string" && escaped.type === "string" && literal.type === "string");
    assert.strictEqual(plain.hasEscapes, false);
    assert.strictEqual(escaped.hasEscapes, true);
    assert.strictEqual(escaped.text, `"a\\"b"`);
    assert.strictEqual(literal.style, "literal");
    assert.strictEqual(literal.hasEscapes, false);
  });

  it("trims the newline after an opening triple quote", () => {
    const source = '"""\nline"""';
    const [token] = tokenize(source, "value");
    assert.ok(token.type === "string");
    assert.strictEqual(token.multiline, true);
    assert.strictEqual(source.slice(token.bodyStart, token.bodyEnd), "line");
  });

  it("keeps up to two quotes before a closing triple quote", () => {
    const source = "'''a'''''";
    const [token] = tokenize(source, "value");
    assert.ok(token.type === "string");
    assert.strictEqual(source.slice(token.bodyStart, token.bodyEnd), "a''");
    assert.deepStrictEqual(token.span, { start: 0, end: 9 });
  });

  it("rejects a newline in a single-line string", () => {
    const error = lexError('"abc\nd"', "value");
    assert.strictEqual(error.kind, "UnterminatedString");
    assert.deepStrictEqual(error.span, { start: 0, end: 4 });
  });

  it("rejects an unterminated multiline string", () => {
    const error = lexError('"""abc', "value");
    assert.strictEqual(error.kind, "UnterminatedString");
    assert.deepStrictEqual(error.span, { start: 0, end: 6 });
  });

  it("rejects control characters in comments and strings", () => {
    const inComment = lexError("# a\u0001", "key");
    assert.strictEqual(inComment.kind, "UnexpectedCharacter");
    assert.deepStrictEqual(inComment.span, { start: 3, end: 4 });

    const inString = lexError('"a\u007f"', "value");
    assert.strictEqual(inString.kind, "UnexpectedCharacter");
    assert.deepStrictEqual(inString.span, { start: 2, end: 3 });
  });

  it("rejects a bare carriage return", () => {
    const between = lexError("\rb", "key");
    assert.strictEqual(between.kind, "UnexpectedCharacter");
    assert.deepStrictEqual(between.span, { start: 0, end: 1 });

    const inMultiline = lexError('"""a\rb"""', "value");
    assert.strictEqual(inMultiline.kind, "UnexpectedCharacter");
    assert.deepStrictEqual(inMultiline.span, { start: 4, end: 5 });
  });

  it("rejects malformed dates and times", () => {
    assert.strictEqual(lexError("1979-13", "value").kind, "InvalidDateTime");
    assert.strictEqual(lexError("12:30", "value").kind, "InvalidDateTime");
  });

  it("rejects characters outside the grammar", () => {
    const error = lexError("a ? 1", "value");
    assert.strictEqual(error.kind, "UnexpectedCharacter");
    assert.deepStrictEqual(error.span, { start: 2, end: 3 });
    assert.strictEqual(lexError("$", "key").message, 'unexpected character: "$"');
  });
});

import { describe, it } from "node:test";
import assert from "node:assert";
import { parse } from "./parser.js";
import { toPlain } from "./plain.js";
import { ParseError, ParseErrorKind, Span } from "./types.js";
import { asInteger, asString, asTable } from "./value.js";

function parseError(source: string | Uint8Array): ParseError {
  try {
    parse(source);
  } catch (e) {
    if (e instanceof ParseError) return e;
    throw e;
  }
  assert.fail("expected a parse error");
}

function assertError(source: string | Uint8Array, kind: ParseErrorKind, span: Span): void {
  const error = parseError(source);
  assert.strictEqual(error.kind, kind);
  assert.deepStrictEqual(error.span, span);
}

describe("parse", () => {
  it("borrows a string without escapes from the source", () => {
    const source = `name = "demo"`;
    const value = parse(source).get("name");
    assert.ok(value?.type === "string");
    assert.strictEqual(value.value.kind, "borrowed");
    if (value.value.kind === "borrowed") {
      assert.strictEqual(value.value.source, source);
      assert.strictEqual(value.value.start, 8);
      assert.strictEqual(value.value.end, 12);
    }
    assert.strictEqual(parse(source).getString("name"), "demo");
  });

  it("owns a string with an escape", () => {
    const value = parse('msg = "a\\nb"').get("msg");
    assert.ok(value?.type === "string");
    assert.deepStrictEqual(value.value, { kind: "owned", value: "a\nb", span: { start: 6, end: 12 } });
  });

  it("rejects a repeated key at the second occurrence", () => {
    assertError('[package]\nname = "x"\nname = "y"', "DuplicateKey", { start: 21, end: 25 });
  });

  it("keeps array items in order", () => {
    const items = parse("nums = [1, 2, 3]").getArray("nums");
    assert.deepStrictEqual(items.map(asInteger), [1n, 2n, 3n]);
  });

  it("accumulates an array of tables", () => {
    const table = parse('[[servers]]\nip="a"\n[[servers]]\nip="b"');
    const servers = table.get("servers");
    assert.ok(servers?.type === "array");
    assert.strictEqual(servers.tableArray, true);
    assert.deepStrictEqual(
      servers.items.map((item) => asTable(item)?.getString("ip")),
      ["a", "b"],
    );
  });

  it("creates nested tables from a dotted key", () => {
    const table = parse("a.b.c = 1");
    assert.strictEqual(table.getTable("a").getTable("b").getInteger("c"), 1n);
  });

  it("builds the same tree from dotted keys and headers", () => {
    assert.deepStrictEqual(toPlain(parse("a.b.c = 1")), toPlain(parse("[a.b]\nc = 1")));
    assert.deepStrictEqual(toPlain(parse("a.b.c = 1")), { a: { b: { c: 1n } } });
  });

  it("returns the same error for the same input", () => {
    const first = parseError("a = 1\na = 2");
    const second = parseError("a = 1\na = 2");
    assert.strictEqual(first.kind, second.kind);
    assert.deepStrictEqual(first.span, second.span);
  });

  it("parses an empty document", () => {
    assert.strictEqual(parse("").size, 0);
    assert.strictEqual(parse("\n# only a comment\n").size, 0);
  });

  it("accepts bytes, a byte order mark and CRLF line endings", () => {
    const bytes = new TextEncoder().encode("\uFEFFa = 1\r\nb = 'x'\r\n");
    assert.deepStrictEqual(toPlain(parse(bytes)), { a: 1n, b: "x" });
  });

  it("reads keys and values with different grammars", () => {
    assert.deepStrictEqual(toPlain(parse("1.5 = 1.5")), { "1": { "5": 1.5 } });
    assert.deepStrictEqual(toPlain(parse("true = false")), { true: false });
  });

  it("accepts quoted keys", () => {
    assert.deepStrictEqual(toPlain(parse(`"a.b" = 1\n'' = 2\nc."d e" = 3`)), {
      "a.b": 1n,
      "": 2n,
      c: { "d e": 3n },
    });
  });

  it("parses inline tables and nested arrays", () => {
    const source = ["point = { x = 1, y.z = 2 }", "rows = [{ b = 1 }, { b = 2 }]", "grid = [[1, 2], ['a']]"].join("\n");
    assert.deepStrictEqual(toPlain(parse(source)), {
      point: { x: 1n, y: { z: 2n } },
      rows: [{ b: 1n }, { b: 2n }],
      grid: [[1n, 2n], ["a"]],
    });
  });

  it("allows newlines, comments and a trailing comma in arrays", () => {
    const table = parse("a = [\n  1, # one\n  2,\n]\nb = []");
    assert.deepStrictEqual(toPlain(table), { a: [1n, 2n], b: [] });
  });

  it("parses every date and time form", () => {
    const table = parse(
      [
        "odt = 1979-05-27T07:32:00Z",
        "space = 1979-05-27 07:32:00-08:00",
        "ldt = 1979-05-27T07:32:00.999",
        "ld = 1979-05-27",
        "lt = 07:32:00",
      ].join("\n"),
    );
    assert.strictEqual(table.getOffsetDateTime("odt").raw, "1979-05-27T07:32:00Z");
    assert.strictEqual(table.getOffsetDateTime("space").raw, "1979-05-27 07:32:00-08:00");
    assert.strictEqual(table.getLocalDateTime("ldt").raw, "1979-05-27T07:32:00.999");
    assert.strictEqual(table.getLocalDate("ld").raw, "1979-05-27");
    assert.strictEqual(table.getLocalTime("lt").raw, "07:32:00");
  });

  it("records value spans in bytes", () => {
    const value = parse('k = "é"\nn = 42').get("n");
    assert.deepStrictEqual(value?.span, { start: 13, end: 15 });
  });

  it("keeps keys in definition order", () => {
    assert.deepStrictEqual([...parse("z = 1\na = 2\nm = 3").keys()], ["z", "a", "m"]);
  });
});

describe("table definition rules", () => {
  it("adds sub-tables under an element of a table array", () => {
    const table = parse(
      [
        "[[fruit]]",
        'name = "apple"',
        "[fruit.physical]",
        'color = "red"',
        "[[fruit]]",
        'name = "banana"',
      ].join("\n"),
    );
    assert.deepStrictEqual(toPlain(table), {
      fruit: [{ name: "apple", physical: { color: "red" } }, { name: "banana" }],
    });
  });

  it("defines a table that was only created by a header path", () => {
    assert.deepStrictEqual(toPlain(parse("[a.b]\nc = 1\n[a]\nd = 2")), { a: { b: { c: 1n }, d: 2n } });
  });

  it("lets dotted keys extend a dotted table", () => {
    assert.deepStrictEqual(toPlain(parse("a.b = 1\na.c = 2")), { a: { b: 1n, c: 2n } });
  });

  it("rejects a table defined twice", () => {
    assertError("[a]\n[a]", "DuplicateKey", { start: 5, end: 6 });
  });

  it("rejects a repeated dotted key at its last segment", () => {
    assertError("a.b = 1\na.b = 2", "DuplicateKey", { start: 10, end: 11 });
  });

  it("rejects a header for a table created by dotted keys", () => {
    assertError("a.b = 1\n[a]", "DuplicateKey", { start: 9, end: 10 });
    assertError("[a]\nb.c = 1\n[a.b]", "DuplicateKey", { start: 15, end: 16 });
  });

  it("rejects dotted keys into a table defined by a header", () => {
    assertError("[a.b]\nc = 1\n[a]\nb.d = 2", "DuplicateKey", { start: 16, end: 17 });
  });

  it("seals inline tables", () => {
    assertError("a = {b = 1}\na.c = 2", "DuplicateKey", { start: 12, end: 13 });
    assertError("a = {b = 1}\n[a]", "DuplicateKey", { start: 13, end: 14 });
    assertError("a = {b = 1}\n[a.c]", "DuplicateKey", { start: 13, end: 14 });
  });

  it("seals inline arrays", () => {
    assertError("a = [1]\n[[a]]", "DuplicateKey", { start: 10, end: 11 });
  });

  it("does not mix tables and table arrays", () => {
    assertError("[[a]]\n[a]", "DuplicateKey", { start: 7, end: 8 });
    assertError("[a]\n[[a]]", "DuplicateKey", { start: 6, end: 7 });
  });

  it("rejects a path through a value that is not a table", () => {
    assertError("a = 1\na.b = 2", "DuplicateKey", { start: 6, end: 7 });
  });
});

describe("parse errors", () => {
  it("reports a missing value", () => {
    assertError("a = ", "ExpectedValue", { start: 4, end: 4 });
    assertError("a = \nb = 1", "ExpectedValue", { start: 4, end: 5 });
    assertError("a = nope", "ExpectedValue", { start: 4, end: 8 });
  });

  it("reports a missing equals sign", () => {
    assertError("a 1", "ExpectedEquals", { start: 2, end: 3 });
  });

  it("reports a missing key", () => {
    assertError("= 1", "ExpectedKey", { start: 0, end: 1 });
    assertError("a. = 1", "ExpectedKey", { start: 3, end: 4 });
    assertError("[]", "ExpectedKey", { start: 1, end: 2 });
  });

  it("requires a newline after a key/value pair", () => {
    assertError("a = 1 2", "ExpectedNewline", { start: 6, end: 7 });
    assertError("[a] b = 1", "ExpectedNewline", { start: 4, end: 5 });
  });

  it("reports missing commas", () => {
    assertError("a = [1 2]", "ExpectedComma", { start: 7, end: 8 });
    assertError("a = {b = 1 c = 2}", "ExpectedComma", { start: 11, end: 12 });
  });

  it("rejects a trailing comma in an inline table", () => {
    assertError("a = {b = 1,}", "ExpectedKey", { start: 11, end: 12 });
  });

  it("rejects an unclosed array or inline table", () => {
    assertError("a = [1, 2", "UnexpectedEndOfInput", { start: 9, end: 9 });
    assertError("a = {b = 1", "UnexpectedEndOfInput", { start: 10, end: 10 });
  });

  it("rejects an unclosed header", () => {
    assertError("[a", "UnclosedBracket", { start: 2, end: 2 });
    assertError("[[a]", "UnclosedBracket", { start: 4, end: 4 });
    assertError("[[a] ]", "UnclosedBracket", { start: 5, end: 6 });
  });

  it("passes on lexer and decoder errors", () => {
    assertError('a = "abc', "UnterminatedString", { start: 4, end: 8 });
    assertError('a = "\\q"', "InvalidEscape", { start: 5, end: 7 });
    assertError("a = 01", "InvalidNumber", { start: 4, end: 6 });
    assertError("a = 9223372036854775808", "NumberTooLarge", { start: 4, end: 23 });
    assertError("a = 1979-13", "InvalidDateTime", { start: 4, end: 11 });
    assertError("a = ~", "UnexpectedCharacter", { start: 4, end: 5 });
  });

  it("accepts the smallest integer", () => {
    assert.strictEqual(parse("a = -9223372036854775808").getInteger("a"), -9223372036854775808n);
  });

  it("rejects input that is not UTF-8", () => {
    assertError(new Uint8Array([0x61, 0x20, 0x3d, 0x20, 0xff]), "InvalidEncoding", { start: 0, end: 5 });
    assertError('a = "\uD800"', "InvalidEncoding", { start: 5, end: 8 });
  });

  it("rejects a carriage return that does not start a CRLF", () => {
    assertError("a = 1\rb = 2", "UnexpectedCharacter", { start: 5, end: 6 });
    assertError('a = """x\ry"""', "UnexpectedCharacter", { start: 8, end: 9 });
  });

  it("reports the first error only", () => {
    const error = parseError("a = ~\nb = [");
    assert.strictEqual(error.kind, "UnexpectedCharacter");
    assert.strictEqual(error.message, 'unexpected character: "~"');
  });

  it("describes the token it found", () => {
    assert.strictEqual(parseError("a 1").message, "expected `=` after key: found `1`");
    assert.strictEqual(parseError("a = ").message, "expected a value: found end of input");
  });

  it("leaves values readable after an accessor error", () => {
    const table = parse('a = "x"');
    assert.throws(() => table.getInteger("a"));
    const value = table.get("a");
    assert.ok(value);
    assert.strictEqual(asString(value), "x");
  });
});

import type { Table } from "./table.js";

/** Byte offset span in source */
export interface Span {
  start: number;
  end: number;
}

/** String storage: a slice of the source, or a decoded copy */
export type TomlString =
  | {
      kind: "borrowed";
      source: string;
      /** UTF-16 offsets into `source` */
      start: number;
      end: number;
      span: Span;
    }
  | {
      kind: "owned";
      value: string;
      span: Span;
    };

export type DateTimeKind = "offset-datetime" | "local-datetime" | "local-date" | "local-time";

export interface StringValue {
  type: "string";
  value: TomlString;
  span: Span;
}

export interface IntegerValue {
  type: "integer";
  value: bigint;
  span: Span;
}

export interface FloatValue {
  type: "float";
  value: number;
  span: Span;
}

export interface BooleanValue {
  type: "boolean";
  value: boolean;
  span: Span;
}

/**
 * A date and/or time, kept as the text that matched. Field ranges are not
 * checked, so `2023-02-31` is accepted.
 */
export interface DateTimeValue<K extends DateTimeKind = DateTimeKind> {
  type: K;
  raw: string;
  span: Span;
}

export interface ArrayValue {
  type: "array";
  items: readonly TomlValue[];
  /** Built by repeated `[[header]]` lines rather than written inline */
  tableArray: boolean;
  span: Span;
}

export interface TableValue {
  type: "table";
  table: Table;
  span: Span;
}

/** A TOML value */
export type TomlValue =
  | StringValue
  | IntegerValue
  | FloatValue
  | BooleanValue
  | DateTimeValue<"offset-datetime">
  | DateTimeValue<"local-datetime">
  | DateTimeValue<"local-date">
  | DateTimeValue<"local-time">
  | ArrayValue
  | TableValue;

export type ValueKind = TomlValue["type"];

export type ParseErrorKind =
  | "InvalidEncoding"
  | "UnexpectedCharacter"
  | "UnterminatedString"
  | "InvalidEscape"
  | "InvalidNumber"
  | "NumberTooLarge"
  | "InvalidDateTime"
  | "DuplicateKey"
  | "ExpectedKey"
  | "ExpectedEquals"
  | "ExpectedValue"
  | "ExpectedComma"
  | "ExpectedNewline"
  | "UnclosedBracket"
  | "UnexpectedEndOfInput";

const DESCRIPTIONS: Record<ParseErrorKind, string> = {
  InvalidEncoding: "input is not valid UTF-8",
  UnexpectedCharacter: "unexpected character",
  UnterminatedString: "unterminated string",
  InvalidEscape: "invalid escape sequence",
  InvalidNumber: "invalid number",
  NumberTooLarge: "number does not fit in a 64-bit integer",
  InvalidDateTime: "invalid date or time",
  DuplicateKey: "duplicate key",
  ExpectedKey: "expected a key",
  ExpectedEquals: "expected `=` after key",
  ExpectedValue: "expected a value",
  ExpectedComma: "expected `,` between items",
  ExpectedNewline: "expected a newline",
  UnclosedBracket: "unclosed table header",
  UnexpectedEndOfInput: "unexpected end of input",
};

/** Parse error */
export class ParseError extends Error {
  constructor(
    public readonly kind: ParseErrorKind,
    public readonly span: Span,
    detail?: string,
  ) {
    super(detail ? `${DESCRIPTIONS[kind]}: ${detail}` : DESCRIPTIONS[kind]);
    this.name = "ParseError";
  }
}

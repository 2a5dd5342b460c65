export { parse, Parser } from "./parser.js";
export { Lexer } from "./lexer.js";
export type { LexMode, Token, TokenType, SimpleToken, StringToken, NumberToken, DateTimeToken } from "./lexer.js";
export { Table, AccessorError, InvalidKeyError, TypeMismatchError } from "./table.js";
export type { AccessorErrorKind } from "./table.js";
export {
  valueKind,
  stringValue,
  isDateTime,
  asString,
  asInteger,
  asFloat,
  asBoolean,
  asArray,
  asTable,
  coerceBool,
} from "./value.js";
export { decomposeDateTime } from "./datetime.js";
export type { DateTimeFields } from "./datetime.js";
export { formatParseError } from "./diagnostics.js";
export { toPlain, plainValue } from "./plain.js";
export type { PlainValue, PlainTable } from "./plain.js";
export { toTyped, parseTyped } from "./typed.js";
export type { Schema, ScalarSchema, TypedValue, TypedTable, TypedVariant } from "./typed.js";
export { toTagged, errorToTagged } from "./tagged.js";
export type { TaggedType, TaggedScalar, TaggedValue, TaggedTable, TaggedError } from "./tagged.js";
export type {
  Span,
  TomlString,
  TomlValue,
  ValueKind,
  DateTimeKind,
  StringValue,
  IntegerValue,
  FloatValue,
  BooleanValue,
  DateTimeValue,
  ArrayValue,
  TableValue,
  ParseErrorKind,
} from "./types.js";
export { ParseError } from "./types.js";

import { Table } from "./table.js";
import { DateTimeKind, ParseError, TomlValue } from "./types.js";
import { stringValue } from "./value.js";

export type TaggedType =
  | "string"
  | "integer"
  | "float"
  | "bool"
  | "datetime"
  | "datetime-local"
  | "date-local"
  | "time-local";

/** A scalar as `{"type": ..., "value": ...}`, the value always as text */
export interface TaggedScalar {
  type: TaggedType;
  value: string;
}

export type TaggedValue = TaggedScalar | TaggedValue[] | TaggedTable;

export interface TaggedTable {
  [key: string]: TaggedValue;
}

const DATETIME_TYPES: Record<DateTimeKind, TaggedType> = {
  "offset-datetime": "datetime",
  "local-datetime": "datetime-local",
  "local-date": "date-local",
  "local-time": "time-local",
};

function formatFloat(value: number): string {
  if (Number.isNaN(value)) return "nan";
  if (value === Infinity) return "inf";
  if (value === -Infinity) return "-inf";
  if (Object.is(value, -0)) return "-0";
  return String(value);
}

function taggedValue(value: TomlValue): TaggedValue {
  switch (value.type) {
    case "string":
      return { type: "string", value: stringValue(value.value) };
    case "integer":
      return { type: "integer", value: value.value.toString() };
    case "float":
      return { type: "float", value: formatFloat(value.value) };
    case "boolean":
      return { type: "bool", value: String(value.value) };
    case "array":
      return value.items.map(taggedValue);
    case "table":
      return toTagged(value.table);
    default:
      // `1979-05-27 07:32:00z` is written `1979-05-27T07:32:00Z`
      return { type: DATETIME_TYPES[value.type], value: value.raw.replace(" ", "T").toUpperCase() };
  }
}

/** Encode a table in the tagged JSON form the toml-test suite compares */
export function toTagged(table: Table): TaggedTable {
  return Object.fromEntries([...table].map(([key, value]) => [key, taggedValue(value)]));
}

export interface TaggedError {
  error: {
    kind: ParseError["kind"];
    message: string;
    span: [number, number];
  };
}

export function errorToTagged(error: ParseError): TaggedError {
  return {
    error: {
      kind: error.kind,
      message: error.message,
      span: [error.span.start, error.span.end],
    },
  };
}

import type { Table } from "./table.js";
import { DateTimeValue, TomlString, TomlValue, ValueKind } from "./types.js";

/** The variant of a value */
export function valueKind(value: TomlValue): ValueKind {
  return value.type;
}

/** The text of a string value, sliced from the source when borrowed */
export function stringValue(string: TomlString): string {
  return string.kind === "borrowed" ? string.source.slice(string.start, string.end) : string.value;
}

export function isDateTime(value: TomlValue): value is Extract<TomlValue, DateTimeValue> {
  return (
    value.type === "offset-datetime" ||
    value.type === "local-datetime" ||
    value.type === "local-date" ||
    value.type === "local-time"
  );
}

export function asString(value: TomlValue): string | undefined {
  return value.type === "string" ? stringValue(value.value) : undefined;
}

export function asInteger(value: TomlValue): bigint | undefined {
  return value.type === "integer" ? value.value : undefined;
}

export function asFloat(value: TomlValue): number | undefined {
  return value.type === "float" ? value.value : undefined;
}

export function asBoolean(value: TomlValue): boolean | undefined {
  return value.type === "boolean" ? value.value : undefined;
}

export function asArray(value: TomlValue): readonly TomlValue[] | undefined {
  return value.type === "array" ? value.items : undefined;
}

export function asTable(value: TomlValue): Table | undefined {
  return value.type === "table" ? value.table : undefined;
}

/**
 * Read a value as a boolean, also accepting `"true"`/`"True"`,
 * `"false"`/`"False"`, and the numbers 1 and 0.
 */
export function coerceBool(value: TomlValue): boolean | undefined {
  switch (value.type) {
    case "boolean":
      return value.value;
    case "string":
      switch (stringValue(value.value)) {
        case "true":
        case "True":
          return true;
        case "false":
        case "False":
          return false;
        default:
          return undefined;
      }
    case "integer":
      return value.value === 1n ? true : value.value === 0n ? false : undefined;
    case "float":
      return value.value === 1 ? true : value.value === 0 ? false : undefined;
    default:
      return undefined;
  }
}

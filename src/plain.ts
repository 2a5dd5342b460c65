import { Table } from "./table.js";
import { TomlValue } from "./types.js";
import { stringValue } from "./value.js";

export type PlainValue = string | bigint | number | boolean | PlainValue[] | PlainTable;

export interface PlainTable {
  [key: string]: PlainValue;
}

/**
 * Convert a parsed table into plain objects and arrays. Integers stay
 * `bigint`; dates and times become their source text.
 */
export function toPlain(table: Table): PlainTable {
  return Object.fromEntries([...table].map(([key, value]) => [key, plainValue(value)]));
}

/** Plain form of a single value. */
export function plainValue(value: TomlValue): PlainValue {
  switch (value.type) {
    case "string":
      return stringValue(value.value);
    case "integer":
    case "float":
    case "boolean":
      return value.value;
    case "array":
      return value.items.map(plainValue);
    case "table":
      return toPlain(value.table);
    default:
      return value.raw;
  }
}

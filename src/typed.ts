import { parse } from "./parser.js";
import { plainValue, PlainValue } from "./plain.js";
import { InvalidKeyError, Table, TypeMismatchError } from "./table.js";
import { DateTimeKind, DateTimeValue, TomlValue } from "./types.js";
import { stringValue } from "./value.js";

export type ScalarSchema = "string" | "integer" | "float" | "boolean" | DateTimeKind | "any";

/**
 * Shape a table converts into. A string names a value kind; `"any"`
 * accepts every value and gives its plain form.
 *
 * - `{ optional }`: the key may be absent.
 * - `{ array }`: an array whose items all match.
 * - `{ table }`: a table of arbitrary keys whose values all match.
 * - `{ fields }`: a table with named keys; other keys are ignored.
 * - `{ variants }`: a table with exactly one key naming the variant.
 */
export type Schema =
  | ScalarSchema
  | { optional: Schema }
  | { array: Schema }
  | { table: Schema }
  | { fields: Record<string, Schema> }
  | { variants: Record<string, Schema> };

export type TypedValue = PlainValue | DateTimeValue | TypedValue[] | TypedTable | TypedVariant;

export interface TypedTable {
  [key: string]: TypedValue;
}

export interface TypedVariant {
  variant: string;
  value: TypedValue;
}

function childKey(path: string, key: string): string {
  return path === "" ? key : `${path}.${key}`;
}

function expectTable(value: TomlValue, path: string): Table {
  if (value.type !== "table") throw new TypeMismatchError(path, value, "table");
  return value.table;
}

function convertScalar(value: TomlValue, kind: ScalarSchema, path: string): TypedValue {
  if (kind === "any") return plainValue(value);
  if (value.type === "array" || value.type === "table" || value.type !== kind) {
    throw new TypeMismatchError(path, value, kind);
  }
  switch (value.type) {
    case "string":
      return stringValue(value.value);
    case "integer":
    case "float":
    case "boolean":
      return value.value;
    default:
      return value;
  }
}

function convertFields(table: Table, fields: Record<string, Schema>, path: string): TypedTable {
  const entries: [string, TypedValue][] = [];
  for (const [key, schema] of Object.entries(fields)) {
    const converted = convert(table.get(key), schema, childKey(path, key));
    if (converted !== undefined) entries.push([key, converted]);
  }
  return Object.fromEntries(entries);
}

function convertVariant(table: Table, variants: Record<string, Schema>, path: string): TypedVariant {
  const [entry] = table;
  if (entry === undefined) throw new InvalidKeyError(path);
  const [key, inner] = entry;
  if (!Object.hasOwn(variants, key)) throw new InvalidKeyError(childKey(path, key));
  return { variant: key, value: required(inner, variants[key], childKey(path, key)) };
}

// `undefined` only comes back for an absent optional value.
function convert(value: TomlValue | undefined, schema: Schema, path: string): TypedValue | undefined {
  if (typeof schema === "string") {
    if (value === undefined) throw new InvalidKeyError(path);
    return convertScalar(value, schema, path);
  }
  if ("optional" in schema) {
    return value === undefined ? undefined : convert(value, schema.optional, path);
  }
  if (value === undefined) throw new InvalidKeyError(path);

  if ("array" in schema) {
    if (value.type !== "array") throw new TypeMismatchError(path, value, "array");
    return value.items.map((item, i) => required(item, schema.array, `${path}[${i}]`));
  }
  if ("table" in schema) {
    const table = expectTable(value, path);
    return Object.fromEntries(
      [...table].map(([key, item]): [string, TypedValue] => [key, required(item, schema.table, childKey(path, key))]),
    );
  }
  if ("fields" in schema) return convertFields(expectTable(value, path), schema.fields, path);
  return convertVariant(expectTable(value, path), schema.variants, path);
}

/** Convert a present value; an optional schema still yields a value here. */
function required(value: TomlValue, schema: Schema, path: string): TypedValue {
  const converted = convert(value, schema, path);
  if (converted === undefined) throw new InvalidKeyError(path);
  return converted;
}

/**
 * Convert a table by a field schema. Missing keys throw
 * `InvalidKeyError` and wrong kinds throw `TypeMismatchError`, both keyed
 * by the full path (`servers[1].port`). Absent optional fields are left
 * out of the result.
 */
export function toTyped(table: Table, fields: Record<string, Schema>): TypedTable {
  return convertFields(table, fields, "");
}

export function parseTyped(source: string | Uint8Array, fields: Record<string, Schema>): TypedTable {
  return toTyped(parse(source), fields);
}

import { DateTimeValue, TomlValue, ValueKind } from "./types.js";
import { stringValue } from "./value.js";

export type AccessorErrorKind = "InvalidKey" | "TypeMismatch";

/**
 * Error from a typed getter on a parsed table. Unlike `ParseError` it has no
 * span and leaves the tree untouched.
 */
export abstract class AccessorError extends Error {
  abstract readonly kind: AccessorErrorKind;

  constructor(
    public readonly key: string,
    message: string,
  ) {
    super(message);
  }
}

/** The table has no value for the key */
export class InvalidKeyError extends AccessorError {
  readonly kind = "InvalidKey";

  constructor(key: string) {
    super(key, `no value for key \`${key}\``);
    this.name = "InvalidKeyError";
  }
}

/** The key holds a value of another kind, kept in `found` */
export class TypeMismatchError extends AccessorError {
  readonly kind = "TypeMismatch";

  constructor(
    key: string,
    public readonly found: TomlValue,
    public readonly expected: ValueKind,
  ) {
    super(key, `expected ${expected} for key \`${key}\`, found ${found.type}`);
    this.name = "TypeMismatchError";
  }
}

function isKind<K extends ValueKind>(value: TomlValue, kind: K): value is Extract<TomlValue, { type: K }> {
  return value.type === kind;
}

/** A set of key/value pairs, in the order they were defined */
export class Table implements Iterable<[string, TomlValue]> {
  constructor(private readonly map: ReadonlyMap<string, TomlValue>) {}

  get size(): number {
    return this.map.size;
  }

  has(key: string): boolean {
    return this.map.has(key);
  }

  get(key: string): TomlValue | undefined {
    return this.map.get(key);
  }

  keys(): IterableIterator<string> {
    return this.map.keys();
  }

  values(): IterableIterator<TomlValue> {
    return this.map.values();
  }

  entries(): IterableIterator<[string, TomlValue]> {
    return this.map.entries();
  }

  [Symbol.iterator](): IterableIterator<[string, TomlValue]> {
    return this.map.entries();
  }

  getString(key: string): string {
    return stringValue(this.expect(key, "string").value);
  }

  getInteger(key: string): bigint {
    return this.expect(key, "integer").value;
  }

  getFloat(key: string): number {
    return this.expect(key, "float").value;
  }

  getBoolean(key: string): boolean {
    return this.expect(key, "boolean").value;
  }

  getArray(key: string): readonly TomlValue[] {
    return this.expect(key, "array").items;
  }

  getTable(key: string): Table {
    return this.expect(key, "table").table;
  }

  getOffsetDateTime(key: string): DateTimeValue<"offset-datetime"> {
    return this.expect(key, "offset-datetime");
  }

  getLocalDateTime(key: string): DateTimeValue<"local-datetime"> {
    return this.expect(key, "local-datetime");
  }

  getLocalDate(key: string): DateTimeValue<"local-date"> {
    return this.expect(key, "local-date");
  }

  getLocalTime(key: string): DateTimeValue<"local-time"> {
    return this.expect(key, "local-time");
  }

  private expect<K extends ValueKind>(key: string, kind: K): Extract<TomlValue, { type: K }> {
    const value = this.map.get(key);
    if (value === undefined) {
      throw new InvalidKeyError(key);
    }
    if (!isKind(value, kind)) {
      throw new TypeMismatchError(key, value, kind);
    }
    return value;
  }
}

import { DateTimeKind, DateTimeValue } from "./types.js";

const DATE = "(\\d{4})-(\\d{2})-(\\d{2})";
const TIME = "(\\d{2}):(\\d{2}):(\\d{2})(?:\\.(\\d+))?";
const OFFSET = "([Zz]|[+-]\\d{2}:\\d{2})";

const PATTERNS: [DateTimeKind, RegExp][] = [
  ["offset-datetime", new RegExp(`^${DATE}[Tt ]${TIME}${OFFSET}$`)],
  ["local-datetime", new RegExp(`^${DATE}[Tt ]${TIME}$`)],
  ["local-date", new RegExp(`^${DATE}$`)],
  ["local-time", new RegExp(`^${TIME}$`)],
];

const DATE_ONLY = new RegExp(`^${DATE}$`);

/** Classify a lexeme as a date/time shape, or `null` if it is not one */
export function classifyDateTime(text: string): DateTimeKind | null {
  for (const [kind, pattern] of PATTERNS) {
    if (pattern.test(text)) {
      return kind;
    }
  }
  return null;
}

/** True if `text` is a bare date that a ` HH:` time could continue */
export function isDateOnly(text: string): boolean {
  return DATE_ONLY.test(text);
}

/**
 * True for lexemes that can only be a malformed date/time: they contain a
 * `:` or start with four digits and a dash.
 */
export function looksLikeDateTime(text: string): boolean {
  return text.includes(":") || /^\d{4}-/.test(text);
}

/** Numeric fields of a date/time value. Absent parts are left out. */
export interface DateTimeFields {
  year?: number;
  month?: number;
  day?: number;
  hour?: number;
  minute?: number;
  second?: number;
  /** Fractional seconds in nanoseconds; digits past the ninth are dropped */
  nanosecond?: number;
  /** Offset from UTC in minutes, negative west of UTC */
  offsetMinutes?: number;
}

/**
 * Split a date/time value into its numeric fields for a date library to
 * validate. No range checks are made here.
 */
export function decomposeDateTime(value: DateTimeValue): DateTimeFields {
  const fields: DateTimeFields = {};
  let rest = value.raw;

  const date = /^(\d{4})-(\d{2})-(\d{2})/.exec(rest);
  if (date) {
    fields.year = Number(date[1]);
    fields.month = Number(date[2]);
    fields.day = Number(date[3]);
    rest = rest.slice(date[0].length + 1);
  }

  const time = /^(\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?/.exec(rest);
  if (time) {
    fields.hour = Number(time[1]);
    fields.minute = Number(time[2]);
    fields.second = Number(time[3]);
    fields.nanosecond = time[4] ? Number(time[4].slice(0, 9).padEnd(9, "0")) : 0;
    rest = rest.slice(time[0].length);
  }

  if (rest === "Z" || rest === "z") {
    fields.offsetMinutes = 0;
  } else {
    const offset = /^([+-])(\d{2}):(\d{2})$/.exec(rest);
    if (offset) {
      const minutes = Number(offset[2]) * 60 + Number(offset[3]);
      fields.offsetMinutes = offset[1] === "-" ? -minutes : minutes;
    }
  }

  return fields;
}

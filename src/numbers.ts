import { FloatValue, IntegerValue, ParseError } from "./types.js";
import { NumberToken } from "./lexer.js";

const I64_MIN = -(2n ** 63n);
const I64_MAX = 2n ** 63n - 1n;

const RADIX: Record<string, { prefix: string; digit: RegExp }> = {
  x: { prefix: "0x", digit: /^[0-9A-Fa-f]$/ },
  o: { prefix: "0o", digit: /^[0-7]$/ },
  b: { prefix: "0b", digit: /^[01]$/ },
};

const DECIMAL_DIGIT = /^[0-9]$/;
const INTEGER = /^(0|[1-9][0-9]*)$/;
const FLOAT = /^(0|[1-9][0-9]*)(\.[0-9]+)?([eE][+-]?[0-9]+)?$/;

/**
 * Remove underscores, each of which must sit between two digits.
 * Returns `null` when one does not.
 */
function stripUnderscores(text: string, digit: RegExp): string | null {
  let cleaned = "";
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === "_") {
      if (!digit.test(text[i - 1] ?? "") || !digit.test(text[i + 1] ?? "")) {
        return null;
      }
      continue;
    }
    cleaned += ch;
  }
  return cleaned;
}

/** Decode a number token into an integer or float value */
export function decodeNumber(token: NumberToken): IntegerValue | FloatValue {
  const { text, span } = token;
  const invalid = (reason: string) => new ParseError("InvalidNumber", span, `\`${text}\` (${reason})`);

  let sign = "";
  let body = text;
  if (text.startsWith("+") || text.startsWith("-")) {
    sign = text[0];
    body = text.slice(1);
  }

  if (body === "inf") {
    return { type: "float", value: sign === "-" ? -Infinity : Infinity, span };
  }
  if (body === "nan") {
    return { type: "float", value: NaN, span };
  }

  const radix = /^0[xob]/.test(body) ? RADIX[body[1]] : undefined;
  if (radix) {
    if (sign) {
      throw invalid("prefixed integers cannot have a sign");
    }
    const digits = body.slice(2);
    const cleaned = token.hasUnderscores ? stripUnderscores(digits, radix.digit) : digits;
    if (cleaned === null) {
      throw invalid("underscores must be between digits");
    }
    if (cleaned === "" || ![...cleaned].every((ch) => radix.digit.test(ch))) {
      throw invalid("bad digit");
    }
    const value = BigInt(radix.prefix + cleaned);
    if (value > I64_MAX) {
      throw new ParseError("NumberTooLarge", span, `\`${text}\``);
    }
    return { type: "integer", value, span };
  }

  const cleaned = token.hasUnderscores ? stripUnderscores(body, DECIMAL_DIGIT) : body;
  if (cleaned === null) {
    throw invalid("underscores must be between digits");
  }

  if (INTEGER.test(cleaned)) {
    const magnitude = BigInt(cleaned);
    const value = sign === "-" ? -magnitude : magnitude;
    if (value < I64_MIN || value > I64_MAX) {
      throw new ParseError("NumberTooLarge", span, `\`${text}\``);
    }
    return { type: "integer", value, span };
  }

  if (/^[0-9]+$/.test(cleaned)) {
    throw invalid("leading zero");
  }

  const float = FLOAT.exec(cleaned);
  if (float && (float[2] !== undefined || float[3] !== undefined)) {
    const magnitude = Number(cleaned);
    return { type: "float", value: sign === "-" ? -magnitude : magnitude, span };
  }

  throw invalid("malformed");
}

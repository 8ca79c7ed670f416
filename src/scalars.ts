import { InvalidStringError } from "./errors.js";
import type { CalendarDate, DateTime, TimeOfDay } from "./temporal.js";

// --- Constants ---

const BARE_KEY = /^[A-Za-z0-9_-]+$/;
const UTC_OFFSET = /\+00:00$/;
const ZERO_FRACTION = /\.000Z$/;

const SHORT_ESCAPES: Record<string, string> = {
  "\\": "\\\\",
  '"': '\\"',
  "\t": "\\t",
  "\n": "\\n",
  "\r": "\\r",
};

// --- Strings ---

function isControl(code: number): boolean {
  return code < 0x20 || (code >= 0x7f && code <= 0x9f);
}

/**
 * Escaped representation of a string: backslashes and quotes escaped, tab,
 * newline and carriage return as short escapes, every other control character
 * as a two-digit `\xNN` byte escape. Unpaired surrogates are rejected.
 */
function escapeRepr(value: string): string {
  let out = "";
  for (const ch of value) {
    const short = SHORT_ESCAPES[ch];
    if (short !== undefined) {
      out += short;
      continue;
    }
    const code = ch.codePointAt(0) ?? 0;
    if (code >= 0xd800 && code <= 0xdfff) throw new InvalidStringError(code);
    out += isControl(code) ? `\\x${code.toString(16).padStart(2, "0")}` : ch;
  }
  return out;
}

function trailingBackslashes(text: string): number {
  let count = 0;
  for (let i = text.length - 1; i >= 0 && text[i] === "\\"; i--) count++;
  return count;
}

/**
 * TOML has no `\x` escape. Every `\x` in the escaped text is either a byte
 * escape (rewritten to `\u00NN`) or the tail of an escaped backslash followed
 * by a literal "x" (kept). An odd run of backslashes before the split point
 * means the `\x` backslash is itself escaped.
 */
function rewriteByteEscapes(escaped: string): string {
  const [head, ...rest] = escaped.split("\\x");
  let out = head;
  for (const part of rest) {
    out += (trailingBackslashes(out) % 2 === 1 ? "\\x" : "\\u00") + part;
  }
  return out;
}

export function formatString(value: string): string {
  return `"${rewriteByteEscapes(escapeRepr(value))}"`;
}

export function quoteKey(key: string): string {
  return BARE_KEY.test(key) ? key : formatString(key);
}

// --- Booleans and numbers ---

export function formatBoolean(value: boolean): string {
  return value ? "true" : "false";
}

export function formatInteger(value: number | bigint): string {
  return typeof value === "bigint" ? value.toString() : String(Math.trunc(value));
}

/**
 * Floats and decimal strings. Integral text gets a `.0` so a decoder reads it
 * back as a float; exponents lose their leading zero (`1e+05` → `1e+5`).
 */
export function formatFloat(value: number | string): string {
  if (typeof value === "number") {
    if (Number.isNaN(value)) return "nan";
    if (value === Infinity) return "inf";
    if (value === -Infinity) return "-inf";
  }
  const text = String(value).replace("e+0", "e+").replace("e-0", "e-");
  return /^[+-]?\d+$/.test(text) ? `${text}.0` : text;
}

export function formatNumber(value: number): string {
  return Number.isSafeInteger(value) ? formatInteger(value) : formatFloat(value);
}

// --- Dates and times ---

export function formatDateTime(value: Date | DateTime): string {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) return formatString(String(value));
    return value.toISOString().replace(ZERO_FRACTION, "Z");
  }
  return value.toISOString().replace(UTC_OFFSET, "Z");
}

export function formatDate(value: CalendarDate): string {
  return value.toISOString();
}

/** Local time: an offset, when present, is rendered and then cut off. */
export function formatTime(value: TimeOfDay): string {
  const iso = value.toISOString();
  return value.utcOffset === undefined ? iso : iso.slice(0, -6);
}

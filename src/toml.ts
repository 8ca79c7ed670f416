import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { TomlEncoder } from "./encoder.js";
import { InvalidDestinationError } from "./errors.js";
import { defaultTableFactory, type Table } from "./tables.js";

export interface TextWriter {
  write(text: string): unknown;
}

/** A file path (text or UTF-8 bytes), a `file:` URL, or anything with `write(text)`. */
export type Destination = string | Uint8Array | URL | TextWriter;

function isTextWriter(value: unknown): value is TextWriter {
  return typeof value === "object" && value !== null && "write" in value && typeof value.write === "function";
}

function describe(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (value instanceof URL) return `URL '${value.href}'`;
  return typeof value;
}

function resolveDestination(destination: unknown): string | TextWriter {
  if (destination instanceof Uint8Array) return Buffer.from(destination).toString("utf-8");
  if (typeof destination === "string") return destination;
  if (destination instanceof URL) {
    if (destination.protocol !== "file:") throw new InvalidDestinationError(describe(destination));
    return fileURLToPath(destination);
  }
  if (isTextWriter(destination)) return destination;
  throw new InvalidDestinationError(describe(destination));
}

/** Writes through a temporary file so readers never see a half-written document. */
export function writeTextFile(filePath: string, text: string): void {
  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
  const tmp = filePath + ".tmp";
  fs.writeFileSync(tmp, text, "utf-8");
  fs.renameSync(tmp, filePath);
}

/**
 * Stringifies a table as TOML.
 *
 * Without an encoder, a default one is built whose section accumulators match
 * the root: Maps for a Map, plain objects otherwise.
 *
 * @example
 * ```typescript
 * dumps({ a: "I'm a string", b: ["I'm", "a", "list"], c: 2400 });
 * // 'a = "I\'m a string"\nb = [ "I\'m", "a", "list",]\nc = 2400\n'
 * ```
 */
export function dumps(value: Table, encoder?: TomlEncoder): string {
  return (encoder ?? new TomlEncoder({ tableFactory: defaultTableFactory(value) })).encode(value);
}

/**
 * Writes a table as TOML to a file or writer. The document is rendered in full
 * before anything is written.
 *
 * @throws InvalidDestinationError when `destination` is none of the accepted kinds.
 */
export function dump(value: Table, destination: Destination, encoder?: TomlEncoder): void {
  const target = resolveDestination(destination);
  const text = dumps(value, encoder);
  if (typeof target === "string") {
    writeTextFile(target, text);
  } else {
    target.write(text);
  }
}

// --- Public API ---

export { CommentedValue, preserveComments } from "./comments.js";
export { TomlEncoder } from "./encoder.js";
export type {
  Constructor,
  DumpValue,
  EncoderExtension,
  EncoderOptions,
  Sections,
  ValueFormatter,
} from "./encoder.js";
export type { TomlEncodeErrorCode } from "./errors.js";
export {
  CircularReferenceError,
  ConfigurationError,
  InvalidDestinationError,
  InvalidSeparatorError,
  InvalidStringError,
  MixedArrayError,
  TomlEncodeError,
} from "./errors.js";
export {
  formatBoolean,
  formatDate,
  formatDateTime,
  formatFloat,
  formatInteger,
  formatNumber,
  formatString,
  formatTime,
  quoteKey,
} from "./scalars.js";
export { defaultTableFactory, inlineTable, isInlineTable, isTable } from "./tables.js";
export type { Table, TableFactory } from "./tables.js";
export { CalendarDate, DateTime, TimeOfDay } from "./temporal.js";
export type { TimeOfDayInit } from "./temporal.js";
export {
  ArraySeparatorEncoder,
  createEncoder,
  formatFloat32,
  normalizeSeparator,
  PreserveCommentsEncoder,
  PreserveInlineTablesEncoder,
  TypedArrayEncoder,
  typedArrayTypes,
} from "./variants.js";
export type { ArraySeparatorEncoderOptions, EncoderSettings } from "./variants.js";

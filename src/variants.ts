import { z } from "zod";
import { preserveComments } from "./comments.js";
import { TomlEncoder, type Constructor, type DumpValue, type EncoderOptions } from "./encoder.js";
import { InvalidSeparatorError } from "./errors.js";
import { formatFloat, formatInteger } from "./scalars.js";

// --- Array separator ---

const SEPARATOR_CHARS = /^[ \t\n\r,]*$/;

const separatorSchema = z
  .string()
  .transform((separator) => (separator.trim() === "" ? `,${separator}` : separator))
  .refine((separator) => SEPARATOR_CHARS.test(separator));

/**
 * A whitespace-only separator gets a leading comma; anything else may only
 * hold commas and whitespace.
 */
export function normalizeSeparator(separator: string): string {
  const parsed = separatorSchema.safeParse(separator);
  if (!parsed.success) throw new InvalidSeparatorError(separator);
  return parsed.data;
}

export interface ArraySeparatorEncoderOptions extends EncoderOptions {
  separator?: string;
}

export class ArraySeparatorEncoder extends TomlEncoder {
  readonly separator: string;

  constructor({ separator = ",", ...options }: ArraySeparatorEncoderOptions = {}) {
    super(options);
    this.separator = normalizeSeparator(separator);
  }

  /** `[ a<sep> b<sep>]` */
  override dumpList(items: Iterable<unknown>, dumpValue: DumpValue): string {
    let text = "[";
    for (const item of items) text += ` ${dumpValue(item)}${this.separator}`;
    return `${text}]`;
  }
}

// --- Inline tables ---

export class PreserveInlineTablesEncoder extends TomlEncoder {
  constructor(options: Omit<EncoderOptions, "preserveInlineTables"> = {}) {
    super({ ...options, preserveInlineTables: true });
  }
}

// --- Comments ---

export class PreserveCommentsEncoder extends TomlEncoder {
  constructor(options: EncoderOptions = {}) {
    super({ ...options, extensions: [...(options.extensions ?? []), preserveComments] });
  }
}

// --- Typed arrays ---

const INTEGER_ARRAYS: Array<Constructor<ArrayLike<number>>> = [
  Int8Array,
  Uint8Array,
  Uint8ClampedArray,
  Int16Array,
  Uint16Array,
  Int32Array,
  Uint32Array,
];

const BIGINT_ARRAYS: Array<Constructor<ArrayLike<bigint>>> = [BigInt64Array, BigUint64Array];

/** Shortest decimal that reads back as the same float32. */
export function formatFloat32(value: number): string {
  if (!Number.isFinite(value)) return formatFloat(value);
  for (let digits = 1; digits <= 9; digits++) {
    const candidate = Number(value.toPrecision(digits));
    if (Math.fround(candidate) === value) return formatFloat(candidate);
  }
  return formatFloat(value);
}

/**
 * Encoder extension for fixed-width numeric arrays: float arrays always print
 * as floats, integer arrays as integers.
 */
export function typedArrayTypes(encoder: TomlEncoder): void {
  const list = (tokens: string[]): string => encoder.dumpList(tokens, String);

  encoder.registerType(Float32Array, (value) => list(Array.from(value, formatFloat32)));
  encoder.registerType(Float64Array, (value) => list(Array.from(value, (n) => formatFloat(n))));
  for (const ctor of INTEGER_ARRAYS) {
    encoder.registerType(ctor, (value) => list(Array.from(value, (n) => formatInteger(n))));
  }
  for (const ctor of BIGINT_ARRAYS) {
    encoder.registerType(ctor, (value) => list(Array.from(value, (n) => formatInteger(n))));
  }
}

export class TypedArrayEncoder extends TomlEncoder {
  constructor(options: EncoderOptions = {}) {
    super({ ...options, extensions: [...(options.extensions ?? []), typedArrayTypes] });
  }
}

// --- Factory ---

export interface EncoderSettings {
  separator?: string;
  preserveInlineTables?: boolean;
  preserveComments?: boolean;
  typedArrays?: boolean;
}

/** Builds the encoder a combination of settings asks for. */
export function createEncoder(settings: EncoderSettings = {}): TomlEncoder {
  const extensions = [
    ...(settings.preserveComments ? [preserveComments] : []),
    ...(settings.typedArrays ? [typedArrayTypes] : []),
  ];
  const options: EncoderOptions = { preserveInlineTables: settings.preserveInlineTables ?? false, extensions };
  return settings.separator === undefined
    ? new TomlEncoder(options)
    : new ArraySeparatorEncoder({ ...options, separator: settings.separator });
}

import { SocketAddress } from "net";
import { fileURLToPath } from "url";
import { z } from "zod";
import { ActivePath, CycleGuard } from "./cycle-guard.js";
import { ConfigurationError, MixedArrayError } from "./errors.js";
import {
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
import {
  defaultTableFactory,
  isArrayOfTables,
  isInlineTable,
  isTable,
  sectionEntries,
  setTableEntry,
  tableEntries,
  tableSize,
  type Table,
  type TableFactory,
} from "./tables.js";
import { CalendarDate, DateTime, TimeOfDay } from "./temporal.js";

// --- Types ---

export type DumpValue = (value: unknown) => string;

/** Renders one value. `dumpValue` renders nested values with the same encoder. */
export type ValueFormatter<T = unknown> = (value: T, dumpValue: DumpValue) => string;

export type Constructor<T> = abstract new (...args: never[]) => T;

/** Registers extra formatters on an encoder while it is constructed. */
export type EncoderExtension = (encoder: TomlEncoder) => void;

export interface EncoderOptions {
  /** Builds the accumulators nested sections are collected into. */
  tableFactory?: TableFactory;
  /** Write tables tagged with `inlineTable()` as `{ k = v }`. */
  preserveInlineTables?: boolean;
  extensions?: EncoderExtension[];
}

export interface Sections {
  /** Assignments and array-of-tables blocks of this level. */
  text: string;
  /** Nested tables that still need their own header, by quoted key. */
  sections: Table;
}

interface Capability {
  readonly label: string;
  readonly matches: (value: unknown) => boolean;
  readonly format: ValueFormatter;
}

const isFunction = (value: unknown): boolean => typeof value === "function";

const encoderOptionsSchema = z.object({
  tableFactory: z.custom<TableFactory>(isFunction, "must be a function").optional(),
  preserveInlineTables: z.boolean().optional(),
  extensions: z.array(z.custom<EncoderExtension>(isFunction, "must be a function")).optional(),
});

// --- Capability tests ---

function isDecimalLike(value: unknown): value is { toFixed(): string; toExponential(): string } {
  return (
    typeof value === "object" &&
    value !== null &&
    "toFixed" in value &&
    typeof value.toFixed === "function" &&
    "toExponential" in value &&
    typeof value.toExponential === "function"
  );
}

function hasPrimitiveValue(value: unknown): value is { valueOf(): string | number | bigint | boolean } {
  if (typeof value !== "object" || value === null) return false;
  const inner: unknown = value.valueOf();
  return ["string", "number", "bigint", "boolean"].includes(typeof inner);
}

function isIterable(value: unknown): value is Iterable<unknown> {
  return typeof value === "object" && value !== null && Symbol.iterator in value;
}

function formatSocketAddress(value: SocketAddress): string {
  if (!value.port) return value.address;
  return value.family === "ipv6" ? `[${value.address}]:${value.port}` : `${value.address}:${value.port}`;
}

function typeKey(value: unknown): unknown {
  if (value === null) return "null";
  if (typeof value !== "object") return typeof value;
  const proto: unknown = Object.getPrototypeOf(value);
  return typeof proto === "object" && proto !== null ? proto.constructor : undefined;
}

// --- Encoder ---

/**
 * Extendable TOML encoder.
 *
 * Values are rendered through a two-tier lookup: an exact-type table (keyed by
 * `typeof` tag for primitives, by constructor for objects), then an ordered
 * list of capability tests where the first match wins. Values nothing matches
 * are rendered as strings.
 */
export class TomlEncoder {
  readonly preserveInlineTables: boolean;

  private readonly tableFactory: TableFactory;
  private readonly byType = new Map<unknown, ValueFormatter>();
  private readonly capabilities: Capability[] = [];

  constructor(options: EncoderOptions = {}) {
    const parsed = encoderOptionsSchema.safeParse(options);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "options"}: ${i.message}`);
      throw new ConfigurationError(`Invalid encoder options: ${issues.join("; ")}`);
    }
    this.tableFactory = options.tableFactory ?? defaultTableFactory(undefined);
    this.preserveInlineTables = options.preserveInlineTables ?? false;
    this.registerDefaults();
    for (const extension of options.extensions ?? []) extension(this);
  }

  // --- Registration ---

  /** Exact-type formatter: used only when the value's constructor is `ctor`. */
  registerType<T>(ctor: Constructor<T>, format: ValueFormatter<T>): this {
    this.byType.set(ctor, (value, dumpValue) =>
      value instanceof ctor ? format(value, dumpValue) : this.dumpFallback(value),
    );
    return this;
  }

  /** Capability formatter, tried after every earlier registered capability. */
  registerCapability<T>(label: string, test: (value: unknown) => value is T, format: ValueFormatter<T>): this {
    this.capabilities.push({
      label,
      matches: test,
      format: (value, dumpValue) => (test(value) ? format(value, dumpValue) : this.dumpFallback(value)),
    });
    return this;
  }

  private registerDefaults(): void {
    this.byType.set("string", (value) => formatString(String(value)));
    this.byType.set("boolean", (value) => formatBoolean(value === true));
    this.byType.set("number", (value) => formatNumber(Number(value)));
    this.byType.set("bigint", (value) =>
      typeof value === "bigint" ? formatInteger(value) : this.dumpFallback(value),
    );
    this.registerType<unknown[]>(Array, (value, dumpValue) => this.dumpList(value, dumpValue));
    this.registerType(Date, (value) => formatDateTime(value));
    this.registerType(DateTime, (value) => formatDateTime(value));
    this.registerType(CalendarDate, (value) => formatDate(value));
    this.registerType(TimeOfDay, (value) => formatTime(value));

    this.registerCapability("table", isTable, (value, dumpValue) => this.dumpInlineTable(value, dumpValue));
    this.registerCapability("date", (value): value is Date => value instanceof Date, formatDateTime);
    this.registerCapability("url", (value): value is URL => value instanceof URL, (value) =>
      formatString(value.protocol === "file:" ? fileURLToPath(value) : value.href),
    );
    this.registerCapability(
      "socket-address",
      (value): value is SocketAddress => value instanceof SocketAddress,
      (value) => formatString(formatSocketAddress(value)),
    );
    this.registerCapability("decimal", isDecimalLike, (value) => formatFloat(String(value)));
    this.registerCapability("value-object", hasPrimitiveValue, (value) => formatString(String(value.valueOf())));
    this.registerCapability("iterable", isIterable, (value, dumpValue) => this.dumpList(value, dumpValue));
  }

  // --- Dispatch ---

  /** Returns the formatter for a value: exact type, then capabilities, then string. */
  getDumpFunction(value: unknown): ValueFormatter {
    const exact = this.byType.get(typeKey(value));
    if (exact) return exact;
    const capability = this.capabilities.find((c) => c.matches(value));
    return capability ? capability.format : (v) => this.dumpFallback(v);
  }

  dumpValue(value: unknown): string {
    return this.formatValue(value, new ActivePath());
  }

  private formatValue(value: unknown, path: ActivePath): string {
    const format = this.getDumpFunction(value);
    const dumpNested: DumpValue = (inner) => this.formatValue(inner, path);
    if (typeof value !== "object" || value === null) return format(value, dumpNested);
    return path.enter(value, undefined, () => format(value, dumpNested));
  }

  protected dumpFallback(value: unknown): string {
    return formatString(String(value));
  }

  /** `[ a, b, c,]` */
  dumpList(items: Iterable<unknown>, dumpValue: DumpValue): string {
    let text = "[";
    for (const item of items) text += ` ${dumpValue(item)},`;
    return `${text}]`;
  }

  /** `{ k = v, k2 = v2 }`, nested tables inline as well. */
  dumpInlineTable(table: Table, dumpValue: DumpValue): string {
    const pairs = tableEntries(table)
      .filter(([, value]) => value !== null && value !== undefined)
      .map(([key, value]) => `${quoteKey(key)} = ${dumpValue(value)}`);
    return pairs.length === 0 ? "{}" : `{ ${pairs.join(", ")} }`;
  }

  // --- Tables ---

  createTable(): Table {
    return this.tableFactory();
  }

  /**
   * Renders a whole document. Nested tables are expanded one depth at a time,
   * so headers are written before their descendants' and the document depth
   * does not grow the call stack.
   */
  encode(root: Table): string {
    const path = new ActivePath();
    const top = this.flatten(root, "", path);
    let out = top.text;
    for (const [key, text] of this.layers(top.sections, new CycleGuard([root]), path)) {
      if (out && !out.endsWith("\n\n")) out += "\n";
      out += `[${key}]\n${text}`;
    }
    return out;
  }

  /** Immediate assignments of `table` plus the nested tables still to expand. */
  dumpSections(table: Table, prefix: string): Sections {
    return this.flatten(table, prefix, new ActivePath());
  }

  private flatten(table: Table, prefix: string, path: ActivePath): Sections {
    const sup = prefix && !prefix.endsWith(".") ? `${prefix}.` : prefix;
    const sections = this.createTable();
    let text = "";
    let arrayText = "";

    for (const [rawKey, value] of tableEntries(table)) {
      const key = quoteKey(rawKey);
      if (isTable(value)) {
        if (this.preserveInlineTables && isInlineTable(value)) {
          text += `${key} = ${this.formatValue(value, path)}\n`;
        } else {
          setTableEntry(sections, key, value);
        }
      } else if (isArrayOfTables(value)) {
        arrayText += this.dumpArrayOfTables(`${sup}${key}`, value, path);
      } else if (value !== null && value !== undefined) {
        text += `${key} = ${this.formatValue(value, path)}\n`;
      }
    }

    return { text: text + arrayText, sections };
  }

  /**
   * Expands residual sections layer by layer, yielding `[key, text]` for every
   * table that gets a header: one with own assignments, or an empty leaf.
   */
  private *layers(sections: Table, guard: CycleGuard, path: ActivePath): Generator<[key: string, text: string]> {
    while (tableSize(sections) > 0) {
      const layer = sectionEntries(sections);
      guard.admit(layer);
      const next = this.createTable();
      for (const [key, section] of layer) {
        const { text, sections: nested } = this.flatten(section, key, path);
        if (text || tableSize(nested) === 0) yield [key, text];
        for (const [sub, table] of sectionEntries(nested)) setTableEntry(next, `${key}.${sub}`, table);
      }
      sections = next;
    }
  }

  private dumpArrayOfTables(key: string, items: unknown[], path: ActivePath): string {
    let out = "";
    for (const item of items) {
      if (!isTable(item)) throw new MixedArrayError(key);
      out += path.enter(item, key, () => this.dumpArrayElement(key, item, path));
    }
    return out;
  }

  private dumpArrayElement(key: string, element: Table, path: ActivePath): string {
    let head = `[[${key}]]\n`;
    let tail = "\n";

    const own = this.flatten(element, key, path);
    if (own.text.startsWith("[")) tail += own.text;
    else head += own.text;

    const nested = this.createTable();
    for (const [sub, table] of sectionEntries(own.sections)) setTableEntry(nested, `${key}.${sub}`, table);
    for (const [qualified, text] of this.layers(nested, new CycleGuard([element]), path)) {
      tail += `[${qualified}]\n${text}`;
    }

    return head + tail;
  }
}

// --- Types ---

/** A TOML table: a Map or a plain object. Iteration order is output order. */
export type Table = Map<string, unknown> | { [key: string]: unknown };

/** Builds the accumulators the encoder collects nested sections into. */
export type TableFactory = () => Table;

// --- Type guards ---

export function isPlainObject(value: unknown): value is { [key: string]: unknown } {
  if (value === null || typeof value !== "object") return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function isTable(value: unknown): value is Table {
  return value instanceof Map || isPlainObject(value);
}

/** An array holding at least one table is written as an array of tables. */
export function isArrayOfTables(value: unknown): value is unknown[] {
  return Array.isArray(value) && value.some((item) => isTable(item));
}

// --- Access ---

export function tableEntries(table: Table): Array<[string, unknown]> {
  if (table instanceof Map) {
    return [...table.entries()].map(([key, value]): [string, unknown] => [String(key), value]);
  }
  return Object.entries(table);
}

/** Entries whose values are tables; section accumulators only ever hold those. */
export function sectionEntries(sections: Table): Array<[string, Table]> {
  return tableEntries(sections).filter((entry): entry is [string, Table] => isTable(entry[1]));
}

export function getTableEntry(table: Table, key: string): unknown {
  if (table instanceof Map) return table.get(key);
  return Object.prototype.hasOwnProperty.call(table, key) ? table[key] : undefined;
}

// Defined rather than assigned: assigning "__proto__" would replace the prototype.
export function setTableEntry(table: Table, key: string, value: unknown): void {
  if (table instanceof Map) table.set(key, value);
  else Object.defineProperty(table, key, { value, writable: true, enumerable: true, configurable: true });
}

export function tableSize(table: Table): number {
  return table instanceof Map ? table.size : Object.keys(table).length;
}

/**
 * Accumulators of the root's kind: objects for an object root, Maps for a Map,
 * and instances of the root's own class for a Map subclass.
 */
export function defaultTableFactory(root: unknown): TableFactory {
  if (!(root instanceof Map)) return () => ({});
  const ctor: unknown = root.constructor;
  if (ctor === Map || typeof ctor !== "function") return () => new Map<string, unknown>();
  const subclass: Function = ctor;
  return () => {
    const table: unknown = Reflect.construct(subclass, []);
    return table instanceof Map ? table : new Map<string, unknown>();
  };
}

// --- Inline table marker ---

const inlineTables = new WeakSet<object>();

/**
 * Tags a table to be written as `{ k = v, ... }` when the encoder preserves
 * inline tables. Returns the same instance.
 */
export function inlineTable<T extends Table>(table: T): T {
  inlineTables.add(table);
  return table;
}

export function isInlineTable(value: unknown): boolean {
  return typeof value === "object" && value !== null && inlineTables.has(value);
}

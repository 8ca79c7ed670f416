import { describe, it, expect } from "vitest";
import {
  defaultTableFactory,
  getTableEntry,
  inlineTable,
  isArrayOfTables,
  isInlineTable,
  isTable,
  sectionEntries,
  setTableEntry,
  tableSize,
} from "./tables.js";
import { CalendarDate } from "./temporal.js";

describe("isTable", () => {
  it("accepts plain objects, null-prototype objects and Maps", () => {
    expect(isTable({})).toBe(true);
    expect(isTable(Object.create(null))).toBe(true);
    expect(isTable(new Map())).toBe(true);
  });

  it("rejects arrays, class instances and primitives", () => {
    expect(isTable([])).toBe(false);
    expect(isTable(new CalendarDate(2024, 1, 1))).toBe(false);
    expect(isTable(new Date())).toBe(false);
    expect(isTable(null)).toBe(false);
    expect(isTable("a")).toBe(false);
  });
});

describe("isArrayOfTables", () => {
  it("is true when any element is a table", () => {
    expect(isArrayOfTables([{ a: 1 }])).toBe(true);
    expect(isArrayOfTables([1, { a: 1 }])).toBe(true);
  });

  it("is false for empty and table-free arrays", () => {
    expect(isArrayOfTables([])).toBe(false);
    expect(isArrayOfTables([[{ a: 1 }]])).toBe(false);
    expect(isArrayOfTables({ a: 1 })).toBe(false);
  });
});

describe("table access", () => {
  it("reads and writes objects and Maps alike", () => {
    const obj: Record<string, unknown> = {};
    const map = new Map<string, unknown>();
    setTableEntry(obj, "a", 1);
    setTableEntry(map, "a", 1);
    expect(getTableEntry(obj, "a")).toBe(1);
    expect(getTableEntry(map, "a")).toBe(1);
    expect(tableSize(obj)).toBe(1);
    expect(tableSize(map)).toBe(1);
  });

  it("stores __proto__ as an own entry", () => {
    const obj: Record<string, unknown> = {};
    const t = { x: 1 };
    setTableEntry(obj, "__proto__", t);
    expect(Object.getPrototypeOf(obj)).toBe(Object.prototype);
    expect(getTableEntry(obj, "__proto__")).toBe(t);
    expect(sectionEntries(obj)).toEqual([["__proto__", t]]);
  });

  it("does not read inherited properties", () => {
    expect(getTableEntry({}, "toString")).toBeUndefined();
  });

  it("lists only table-valued entries as sections", () => {
    const t = { x: 1 };
    expect(sectionEntries({ a: 1, t })).toEqual([["t", t]]);
  });
});

describe("defaultTableFactory", () => {
  it("matches the kind of the root", () => {
    expect(defaultTableFactory(new Map())()).toBeInstanceOf(Map);
    expect(defaultTableFactory({})()).toEqual({});
  });

  it("builds instances of a Map subclass", () => {
    class OrderedTable extends Map<string, unknown> {}
    const table = defaultTableFactory(new OrderedTable())();
    expect(table).toBeInstanceOf(OrderedTable);
    expect(tableSize(table)).toBe(0);
  });
});

describe("inlineTable", () => {
  it("tags the same instance", () => {
    const t = { a: 1 };
    expect(inlineTable(t)).toBe(t);
    expect(isInlineTable(t)).toBe(true);
    expect(isInlineTable({ a: 1 })).toBe(false);
    expect(isInlineTable("a")).toBe(false);
  });
});

import fs from "fs";
import os from "os";
import path from "path";
import { pathToFileURL } from "url";
import { parse } from "smol-toml";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import {
  ArraySeparatorEncoder,
  CircularReferenceError,
  InvalidDestinationError,
  dump,
  dumps,
  type Destination,
} from "./toml.js";

describe("dumps", () => {
  it("encodes a table", () => {
    expect(dumps({ a: "I'm a string", b: ["I'm", "a", "list"], c: 2400 })).toBe(
      'a = "I\'m a string"\nb = [ "I\'m", "a", "list",]\nc = 2400\n',
    );
  });

  it("encodes a Map", () => {
    const root = new Map<string, unknown>([["t", new Map<string, unknown>([["b", 2]])]]);
    expect(dumps(root)).toBe("[t]\nb = 2\n");
  });

  it("encodes a Map subclass", () => {
    class OrderedTable extends Map<string, unknown> {}
    const root = new OrderedTable([["t", new OrderedTable([["b", 2]])]]);
    expect(dumps(root)).toBe("[t]\nb = 2\n");
  });

  it("uses the given encoder", () => {
    expect(dumps({ a: [1, 2] }, new ArraySeparatorEncoder({ separator: ", " }))).toBe("a = [ 1,  2, ]\n");
  });
});

describe("dump", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "toml-encoder-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("writes the document to a writer in one call", () => {
    const writes: string[] = [];
    dump({ a: 1, t: { b: 2 } }, { write: (text: string) => writes.push(text) });
    expect(writes).toEqual(["a = 1\n\n[t]\nb = 2\n"]);
  });

  it("writes to a file path", () => {
    const file = path.join(tmpDir, "out.toml");
    dump({ a: 1 }, file);
    expect(fs.readFileSync(file, "utf-8")).toBe("a = 1\n");
    expect(fs.existsSync(file + ".tmp")).toBe(false);
  });

  it("writes to a path given as bytes", () => {
    const file = path.join(tmpDir, "bytes.toml");
    dump({ a: 1 }, Buffer.from(file, "utf-8"));
    expect(fs.readFileSync(file, "utf-8")).toBe("a = 1\n");
  });

  it("writes to a file URL", () => {
    const file = path.join(tmpDir, "url.toml");
    dump({ a: 1 }, pathToFileURL(file));
    expect(fs.readFileSync(file, "utf-8")).toBe("a = 1\n");
  });

  it("creates missing directories", () => {
    const file = path.join(tmpDir, "nested", "dir", "out.toml");
    dump({ a: 1 }, file);
    expect(fs.readFileSync(file, "utf-8")).toBe("a = 1\n");
  });

  it("replaces an existing file", () => {
    const file = path.join(tmpDir, "out.toml");
    fs.writeFileSync(file, "old = true\n");
    dump({ a: 1 }, file);
    expect(fs.readFileSync(file, "utf-8")).toBe("a = 1\n");
  });

  it("rejects URLs that are not file URLs", () => {
    expect(() => dump({ a: 1 }, new URL("https://example.com/x.toml"))).toThrow(
      "'destination' must be a path, a file URL or a writable object, got URL 'https://example.com/x.toml'",
    );
  });

  it("rejects destinations of other kinds", () => {
    const destination: Destination = JSON.parse("42");
    expect(() => dump({ a: 1 }, destination)).toThrow(InvalidDestinationError);
    expect(() => dump({ a: 1 }, destination)).toThrow(/got number$/);
  });

  it("checks the destination before encoding", () => {
    const root: Record<string, unknown> = {};
    root.self = root;
    expect(() => dump(root, new URL("https://example.com/x.toml"))).toThrow(InvalidDestinationError);
  });

  it("writes nothing when encoding fails", () => {
    const file = path.join(tmpDir, "cycle.toml");
    const root: Record<string, unknown> = {};
    root.self = root;
    expect(() => dump(root, file)).toThrow(CircularReferenceError);
    expect(fs.existsSync(file)).toBe(false);
  });
});

describe("round trip", () => {
  const doc = {
    title: "Example",
    products: [
      { name: "Hammer", sku: 738594937 },
      { name: "Nail", color: "gray" },
    ],
    owner: { name: "Tom", tags: ["a", "b"] },
    database: { ports: [8000, 8001], enabled: true, ratio: 0.5 },
    servers: { alpha: { ip: "10.0.0.1", "role name": "primary" } },
  };

  it("decodes back to the same data", () => {
    expect(parse(dumps(doc))).toEqual(doc);
  });

  it("encodes the decoded data to the same text", () => {
    const text = dumps(doc);
    expect(dumps(parse(text))).toBe(text);
  });

  it("keeps escaped strings intact", () => {
    const strings = { s: 'quote " back \\ tab \t bell \x07 lit \\x41', u: "snow ☃" };
    expect(parse(dumps(strings))).toEqual(strings);
  });
});

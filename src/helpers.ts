import { TomlEncodeError } from "./errors.js";
import { getTableEntry, inlineTable, isTable, type Table } from "./tables.js";

/**
 * Safely extract a message string from an unknown error value.
 */
export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  if (typeof e === "string") return e;
  return String(e);
}

/**
 * Format an error for a tool response: the message, then the hint when the
 * error carries one.
 */
export function formatError(e: unknown): string {
  const hint = e instanceof TomlEncodeError ? e.hint : undefined;
  return hint ? `Error: ${errorMessage(e)}\n\nHint: ${hint}` : `Error: ${errorMessage(e)}`;
}

/**
 * Format the outcome of a write as a JSON string for MCP responses.
 */
export function formatWriteResult(filePath: string, bytes: number): string {
  return JSON.stringify({ path: filePath, bytes });
}

/**
 * Tag the tables at the given dotted key paths as inline tables.
 * Returns the paths that do not lead to a table.
 */
export function markInlineTables(document: Table, paths: readonly string[]): string[] {
  const missing: string[] = [];
  for (const dotted of paths) {
    let current: unknown = document;
    for (const segment of dotted.split(".")) {
      current = isTable(current) ? getTableEntry(current, segment) : undefined;
    }
    if (isTable(current)) inlineTable(current);
    else missing.push(dotted);
  }
  return missing;
}

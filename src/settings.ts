import path from "path";

export interface ServerSettings {
  /** Directory `write_toml` resolves paths against; nothing is written outside it. */
  rootDir: string;
  /** Default array separator; undefined keeps the `[ a, b,]` layout. */
  separator: string | undefined;
  preserveInlineTables: boolean;
  /** Largest rendered document `write_toml` accepts, in bytes. */
  maxBytes: number;
}

const DEFAULT_MAX_BYTES = 1024 * 1024;

export function loadSettings(env: NodeJS.ProcessEnv = process.env): ServerSettings {
  return {
    rootDir: path.resolve(env.TOML_MCP_ROOT || process.cwd()),
    separator: parseSeparator(env.TOML_MCP_SEPARATOR),
    preserveInlineTables: env.TOML_MCP_PRESERVE_INLINE === "true", // default false
    maxBytes: parseLimit(env.TOML_MCP_MAX_BYTES, DEFAULT_MAX_BYTES),
  };
}

function parseLimit(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value === "") return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) || parsed <= 0 ? defaultValue : parsed;
}

// Env files can't hold a bare tab or newline comfortably, so `\t` and `\n` are unescaped.
function parseSeparator(value: string | undefined): string | undefined {
  if (value === undefined || value === "") return undefined;
  return value.replace(/\\t/g, "\t").replace(/\\n/g, "\n").replace(/\\r/g, "\r");
}

export function describeSettings(settings: ServerSettings): string {
  const parts = [`root: ${settings.rootDir}`, `max bytes: ${settings.maxBytes}`];
  if (settings.separator !== undefined) parts.push(`separator: ${JSON.stringify(settings.separator)}`);
  if (settings.preserveInlineTables) parts.push("inline tables preserved");
  return parts.join(", ");
}

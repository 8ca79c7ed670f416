import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import path from "path";
import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import { formatError, formatWriteResult, markInlineTables } from "./helpers.js";
import type { ServerSettings } from "./settings.js";
import { dumps, writeTextFile } from "./toml.js";
import { createEncoder } from "./variants.js";

export type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

export interface RenderArgs {
  document: Record<string, unknown>;
  separator?: string;
  preserve_inline_tables?: boolean;
  inline_tables?: string[];
}

export interface WriteArgs extends RenderArgs {
  path: string;
}

// --- Input shapes ---

const renderShape = {
  document: z.record(z.string(), z.unknown()).describe("The table to encode, as a JSON object"),
  separator: z
    .string()
    .optional()
    .describe("Array separator: a comma with optional whitespace (e.g. \", \" or \",\\n\")"),
  preserve_inline_tables: z
    .boolean()
    .optional()
    .describe("Write tables listed in inline_tables as { k = v } (default: on when inline_tables is given)"),
  inline_tables: z
    .array(z.string())
    .optional()
    .describe("Dotted key paths of tables to write inline, e.g. ['server.limits']"),
};

const writeShape = {
  ...renderShape,
  path: z.string().describe("Output file, relative to the server's root directory"),
};

// --- Handlers ---

export function renderDocument(args: RenderArgs, settings: ServerSettings): string {
  const inlinePaths = args.inline_tables ?? [];
  const missing = markInlineTables(args.document, inlinePaths);
  if (missing.length > 0) {
    throw new ConfigurationError(`No table at ${missing.map((p) => `'${p}'`).join(", ")}`);
  }
  const encoder = createEncoder({
    separator: args.separator ?? settings.separator,
    preserveInlineTables: args.preserve_inline_tables ?? (settings.preserveInlineTables || inlinePaths.length > 0),
  });
  return dumps(args.document, encoder);
}

/** Resolves `target` under `root`; paths that leave the root are rejected. */
export function resolveOutputPath(root: string, target: string): string {
  const resolved = path.resolve(root, target);
  const relative = path.relative(root, resolved);
  if (relative === "" || relative === ".." || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
    throw new ConfigurationError(
      `Path '${target}' is outside the output directory ${root}`,
      "Use a file path relative to TOML_MCP_ROOT.",
    );
  }
  return resolved;
}

export function handleRender(args: RenderArgs, settings: ServerSettings): ToolResult {
  try {
    return { content: [{ type: "text", text: renderDocument(args, settings) }] };
  } catch (e: unknown) {
    return { content: [{ type: "text", text: formatError(e) }], isError: true };
  }
}

export function handleWrite(args: WriteArgs, settings: ServerSettings): ToolResult {
  try {
    const outputPath = resolveOutputPath(settings.rootDir, args.path);
    const text = renderDocument(args, settings);
    const bytes = Buffer.byteLength(text, "utf-8");
    if (bytes > settings.maxBytes) {
      throw new ConfigurationError(
        `Rendered document is ${bytes} bytes, over the ${settings.maxBytes} byte limit`,
        "Raise TOML_MCP_MAX_BYTES or split the document.",
      );
    }
    writeTextFile(outputPath, text);
    return { content: [{ type: "text", text: formatWriteResult(outputPath, bytes) }] };
  } catch (e: unknown) {
    return { content: [{ type: "text", text: formatError(e) }], isError: true };
  }
}

// --- MCP server ---

export function createServer(settings: ServerSettings): McpServer {
  const server = new McpServer({
    name: "toml-encoder-mcp",
    version: "0.1.0",
  });

  server.registerTool(
    "render_toml",
    {
      description: "Encode a JSON object as a TOML document and return the text. Nested objects become [table] sections, arrays of objects become [[array]] blocks.",
      inputSchema: renderShape,
    },
    async (args) => handleRender(args, settings),
  );

  server.registerTool(
    "write_toml",
    {
      description: "Encode a JSON object as TOML and write it to a file under the server's root directory (TOML_MCP_ROOT). The file is replaced atomically.",
      inputSchema: writeShape,
    },
    async (args) => handleWrite(args, settings),
  );

  return server;
}

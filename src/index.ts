#!/usr/bin/env node

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import dotenv from "dotenv";
import path from "path";
import { fileURLToPath } from "url";
import { createServer } from "./server.js";
import { describeSettings, loadSettings } from "./settings.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
dotenv.config({ path: path.resolve(__dirname, "..", ".env") });

// stdout carries the protocol; everything else goes to stderr.
const settings = loadSettings();
const server = createServer(settings);

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`toml-encoder-mcp listening on stdio (${describeSettings(settings)})`);
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});

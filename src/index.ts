#!/usr/bin/env node

import { readFileSync } from "node:fs";
import { parseArgs } from "node:util";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import { loadConfig } from "./config.js";
import { createServer } from "./server.js";

const pkg = z.object({ version: z.string() })
  .parse(JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf8")));

function optionalInt(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

async function main() {
  try {
    const { values } = parseArgs({
      options: {
        'timeout': { type: 'string', short: 't' },
        'poll-interval': { type: 'string', short: 'p' },
        'tmux-timeout': { type: 'string' },
        'tmux-binary': { type: 'string' }
      }
    });

    const config = loadConfig(process.env, {
      timeoutMs: optionalInt(values['timeout']),
      pollIntervalMs: optionalInt(values['poll-interval']),
      tmuxTimeoutMs: optionalInt(values['tmux-timeout']),
      tmuxBinary: values['tmux-binary']
    });

    // Start the MCP server
    const server = createServer({ version: pkg.version, config });
    const transport = new StdioServerTransport();
    await server.connect(transport);
  } catch (error) {
    console.error("Failed to start MCP server:", error);
    process.exit(1);
  }
}

main().catch(error => {
  console.error("Fatal error:", error);
  process.exit(1);
});

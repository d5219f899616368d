#!/usr/bin/env node
/**
 * MCP server for Tack
 * Lets an MCP client evaluate and disassemble Tack code over stdio.
 *
 * Setup:
 * 1. npm install && npm run build
 * 2. Register the server with your MCP client, e.g.
 *    {
 *      "mcpServers": {
 *        "tack": {
 *          "command": "node",
 *          "args": ["/path/to/tack/dist/tk-mcp.mjs", "--fill", "--workers", "4"]
 *        }
 *      }
 *    }
 *
 * Flags: --fill (pad mismatched shapes), --seed N (random seed),
 * --workers N (kernel pool size, 0 for none), --threshold N (pool cut-over size).
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { fileURLToPath } from 'url';
import { resolve } from 'path';
import { KernelPool } from "./tk-pool.mjs";
import { DEFAULT_SEED, type ExecOptions } from "./tk-context.mjs";
import { TOOLS, handleToolCall } from "./tk-tools.mjs";

export interface ServerConfig {
  fill: boolean;
  seed: number;
  workers: number;
  threshold?: number;
}

// Parse command-line arguments
export function parseArgs(argv: string[]): ServerConfig {
  const config: ServerConfig = { fill: false, seed: DEFAULT_SEED, workers: 0 };
  const count = (flag: string, value: string | undefined): number => {
    const n = Number(value);
    if (value === undefined || !Number.isInteger(n) || n < 0) {
      throw new Error(`${flag} needs a non-negative integer`);
    }
    return n;
  };
  for (let i = 0; i < argv.length; i++) {
    switch (argv[i]) {
      case "--fill": config.fill = true; break;
      case "--seed": config.seed = count("--seed", argv[++i]); break;
      case "--workers": config.workers = count("--workers", argv[++i]); break;
      case "--threshold": config.threshold = count("--threshold", argv[++i]); break;
      default: throw new Error(`unknown argument: ${argv[i]}`);
    }
  }
  return config;
}

export function createServer(options: ExecOptions): Server {
  const server = new Server(
    {
      name: "tack-mcp-server",
      version: "0.1.0",
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  // List available tools
  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: TOOLS };
  });

  // Handle tool calls
  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    return handleToolCall(name, args, options);
  });

  return server;
}

// Start the server
async function main() {
  const config = parseArgs(process.argv.slice(2));
  const pool = config.workers > 0
    ? new KernelPool({ workers: config.workers, threshold: config.threshold })
    : null;
  const server = createServer({ fill: config.fill, seed: config.seed, pool });

  const shutdown = async () => {
    console.error("Tack MCP server shutting down");
    await server.close();
    await pool?.close();
    process.exit(0);
  };
  process.on("SIGINT", () => { shutdown().catch((e) => console.error("Shutdown failed:", e)); });

  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(
    `Tack MCP server running on stdio (fill=${config.fill}, seed=${config.seed}, workers=${pool?.size ?? 0})`
  );
}

// only when run as a program, so tests can import parseArgs
if (process.argv[1] && fileURLToPath(import.meta.url) === resolve(process.argv[1])) {
  main().catch((error) => {
    console.error("Fatal error in main():", error);
    process.exit(1);
  });
}

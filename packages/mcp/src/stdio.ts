// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { errorMessage } from "@steadyhand/core";

import { createServer } from "./server.js";

/**
 * Start the MCP server on stdio and register signal handlers for
 * graceful shutdown. The process stays alive until SIGINT or SIGTERM.
 */
export async function runStdioServer(): Promise<void> {
  const server = createServer();
  const transport = new StdioServerTransport();

  try {
    await server.connect(transport);
  } catch (error: unknown) {
    const message = errorMessage(error);
    process.stderr.write(`Failed to start MCP server: ${message}\n`);
    process.exit(1);
  }

  process.stderr.write("steadyhand MCP server running on stdio\n");

  function shutdown() {
    server
      .close()
      .catch((error: unknown) => {
        const message = errorMessage(error);
        process.stderr.write(`Error during shutdown: ${message}\n`);
      })
      .finally(() => {
        process.exit(0);
      });
  }

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

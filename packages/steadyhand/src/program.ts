// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import type { Command } from "commander";

import { createProgram } from "@steadyhand/cli";
import { runStdioServer } from "@steadyhand/mcp/stdio";

/** The command line program plus the `mcp` command serving tools on stdio. */
export function createFullProgram(): Command {
  const program = createProgram();

  program
    .command("mcp")
    .description("Start MCP server on stdio (for Claude Desktop, Cursor, etc.)")
    .action(async () => {
      await runStdioServer();
    });

  return program;
}

// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { checkBrowser, loadConfig } from "@steadyhand/core";

import {
  buildConnectionOptions,
  cdpConnectionSchema,
  configPathSchema,
  mcpCatchAll,
  mcpJson,
} from "../helpers.js";

export function registerCheckBrowser(server: McpServer): void {
  server.tool(
    "check-browser",
    "Check that the browser's debugging endpoint answers and list its open tabs. Use before a run.",
    {
      ...configPathSchema,
      ...cdpConnectionSchema,
    },
    async ({ config: configPath, ...connection }) => {
      try {
        const config = loadConfig({ path: configPath });
        return mcpJson(await checkBrowser({ config, ...buildConnectionOptions(connection) }));
      } catch (error) {
        return mcpCatchAll(error, "Failed to check browser");
      }
    },
  );
}

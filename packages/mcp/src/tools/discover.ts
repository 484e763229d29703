// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { loadConfig, runDiscovery } from "@steadyhand/core";
import { z } from "zod";

import {
  buildConnectionOptions,
  cdpConnectionSchema,
  configPathSchema,
  mcpCatchAll,
  mcpJson,
  toolLogger,
} from "../helpers.js";
import { quotaSchema } from "./shared.js";

export function registerDiscover(server: McpServer): void {
  server.tool(
    "discover",
    "Search for people in the attached browser and record profiles not seen before. Paced like a person; may take minutes.",
    {
      query: z.string().min(1).describe("People search keywords"),
      maxPages: z
        .number()
        .int()
        .positive()
        .optional()
        .describe("Result pages to visit (default: discovery.maxPages)"),
      quota: quotaSchema.describe("Daily discovery limit (default: limits.discovery)"),
      ...configPathSchema,
      ...cdpConnectionSchema,
    },
    async ({ query, maxPages, quota, config: configPath, ...connection }, extra) => {
      try {
        const config = loadConfig({ path: configPath });
        const result = await runDiscovery({
          config,
          query,
          ...buildConnectionOptions(connection),
          ...(maxPages !== undefined && { maxPages }),
          ...(quota !== undefined && { quota }),
          signal: extra.signal,
          logger: toolLogger(config),
        });
        return mcpJson({
          query: result.query,
          pagesVisited: result.pagesVisited,
          discovered: result.discovered,
          duplicates: result.duplicates,
          stopReason: result.stopReason,
          countToday: result.state.countToday,
        });
      } catch (error) {
        return mcpCatchAll(error, "Failed to discover profiles");
      }
    },
  );
}

// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { listTours, loadConfig, runBrowse } from "@steadyhand/core";
import { z } from "zod";

import {
  buildConnectionOptions,
  cdpConnectionSchema,
  configPathSchema,
  mcpCatchAll,
  mcpJson,
  toolLogger,
} from "../helpers.js";

export function registerBrowse(server: McpServer): void {
  server.tool(
    "browse",
    "Idle through the site's main tabs (feed, network, jobs, messaging, notifications) along a named tour, scrolling and pausing like a person. Use before outreach to warm a session up; may take minutes. With list=true, returns the available tours instead.",
    {
      tour: z.string().min(1).optional().describe("Tour name (default: browse.tour)"),
      list: z.boolean().optional().describe("List the available tours without browsing"),
      ...configPathSchema,
      ...cdpConnectionSchema,
    },
    async ({ tour, list, config: configPath, ...connection }, extra) => {
      try {
        const config = loadConfig({ path: configPath });
        if (list === true) {
          return mcpJson({ defaultTour: config.browse.tour, tours: listTours({ config }) });
        }
        const result = await runBrowse({
          config,
          ...(tour !== undefined && { tour }),
          ...buildConnectionOptions(connection),
          signal: extra.signal,
          logger: toolLogger(config),
        });
        return mcpJson(result);
      } catch (error) {
        return mcpCatchAll(error, "Failed to browse");
      }
    },
  );
}

// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { loadConfig, runFollowUp } from "@steadyhand/core";

import {
  buildConnectionOptions,
  cdpConnectionSchema,
  configPathSchema,
  mcpCatchAll,
  mcpJson,
  toolLogger,
} from "../helpers.js";
import { quotaSchema, summaryPayload, targetsSchema } from "./shared.js";

export function registerFollowUp(server: McpServer): void {
  server.tool(
    "follow-up",
    "Send the configured follow-up message to connected profiles, once each, until the daily quota is spent.",
    {
      targets: targetsSchema,
      quota: quotaSchema.describe("Daily message limit (default: limits.followUp)"),
      ...configPathSchema,
      ...cdpConnectionSchema,
    },
    async ({ targets, quota, config: configPath, ...connection }, extra) => {
      try {
        const config = loadConfig({ path: configPath });
        const result = await runFollowUp({
          config,
          targets,
          ...buildConnectionOptions(connection),
          ...(quota !== undefined && { quota }),
          signal: extra.signal,
          logger: toolLogger(config),
        });
        return mcpJson(summaryPayload(result, result.rejected));
      } catch (error) {
        return mcpCatchAll(error, "Failed to send follow-ups");
      }
    },
  );
}

// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { loadConfig, runConnect } from "@steadyhand/core";
import { z } from "zod";

import {
  buildConnectionOptions,
  cdpConnectionSchema,
  configPathSchema,
  mcpCatchAll,
  mcpJson,
  toolLogger,
} from "../helpers.js";
import { quotaSchema, summaryPayload, targetsSchema } from "./shared.js";

export function registerConnect(server: McpServer): void {
  server.tool(
    "connect",
    "Send connection invitations to profiles, skipping anyone invited before, until the daily quota is spent. Paced like a person; may take minutes.",
    {
      targets: targetsSchema,
      quota: quotaSchema.describe("Daily invitation limit (default: limits.connect)"),
      note: z
        .boolean()
        .optional()
        .describe("Attach the configured note (default: connect.note.enabled)"),
      ...configPathSchema,
      ...cdpConnectionSchema,
    },
    async ({ targets, quota, note, config: configPath, ...connection }, extra) => {
      try {
        const config = loadConfig({ path: configPath });
        const result = await runConnect({
          config,
          targets,
          ...buildConnectionOptions(connection),
          ...(quota !== undefined && { quota }),
          ...(note !== undefined && { note }),
          signal: extra.signal,
          logger: toolLogger(config),
        });
        return mcpJson(summaryPayload(result, result.rejected));
      } catch (error) {
        return mcpCatchAll(error, "Failed to send invitations");
      }
    },
  );
}

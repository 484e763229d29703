// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("@steadyhand/core", async (importOriginal) => {
  const actual = await importOriginal<typeof import("@steadyhand/core")>();
  return {
    ...actual,
    loadConfig: vi.fn(),
    runConnect: vi.fn(),
  };
});

import {
  AutomationUnavailableError,
  emptyState,
  InvalidInputError,
  loadConfig,
  parseConfig,
  runConnect,
} from "@steadyhand/core";

import { registerConnect } from "./connect.js";
import { createMockServer } from "./testing/mock-server.js";

const ANA = "https://www.linkedin.com/in/ana/";

const RESULT = {
  workflow: "connect" as const,
  counts: {
    succeeded: 1,
    failed: 0,
    skippedIneligible: 0,
    skippedDuplicate: 0,
    skippedQuota: 0,
    pending: 0,
  },
  outcomes: [{ target: ANA, status: "succeeded" as const }],
  quotaExhausted: false,
  cancelled: false,
  state: { ...emptyState("connect", "2026-03-01"), countToday: 3 },
  rejected: [],
};

function setup() {
  const { server, getSchema, callTool } = createMockServer();
  registerConnect(server);
  return { server, getSchema, callTool };
}

describe("registerConnect", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(process.stderr, "write").mockReturnValue(true);
    vi.mocked(loadConfig).mockReturnValue(parseConfig({}));
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("registers a tool named connect", () => {
    const { server } = setup();

    expect(server.tool).toHaveBeenCalledOnce();
    expect(server.tool).toHaveBeenCalledWith(
      "connect",
      expect.any(String),
      expect.any(Object),
      expect.any(Function),
    );
  });

  it("rejects an empty target list", () => {
    const { getSchema } = setup();

    expect(getSchema("connect").safeParse({ targets: [] }).success).toBe(false);
  });

  it("rejects a negative quota", () => {
    const { getSchema } = setup();

    expect(getSchema("connect").safeParse({ targets: [ANA], quota: -1 }).success).toBe(false);
  });

  it("returns the run summary as JSON", async () => {
    vi.mocked(runConnect).mockResolvedValue(RESULT);
    const { callTool } = setup();

    const result = await callTool("connect", { targets: [ANA] });

    expect(result).toEqual({
      content: [
        {
          type: "text",
          text: JSON.stringify(
            {
              workflow: "connect",
              counts: RESULT.counts,
              outcomes: RESULT.outcomes,
              quotaExhausted: false,
              cancelled: false,
              countToday: 3,
              rejected: [],
            },
            null,
            2,
          ),
        },
      ],
    });
  });

  it("passes overrides and the request signal to the operation", async () => {
    vi.mocked(runConnect).mockResolvedValue(RESULT);
    const { callTool } = setup();
    const controller = new AbortController();

    await callTool(
      "connect",
      { targets: [ANA], quota: 2, note: false, cdpPort: 9333, config: "campaign.yaml" },
      controller.signal,
    );

    expect(loadConfig).toHaveBeenCalledWith({ path: "campaign.yaml" });
    expect(runConnect).toHaveBeenCalledWith(
      expect.objectContaining({
        targets: [ANA],
        quota: 2,
        note: false,
        cdpPort: 9333,
        signal: controller.signal,
      }),
    );
  });

  it("returns input errors as they are", async () => {
    vi.mocked(runConnect).mockRejectedValue(
      new InvalidInputError("No valid profile targets among 1 given"),
    );
    const { callTool } = setup();

    const result = await callTool("connect", { targets: ["nobody"] });

    expect(result).toEqual({
      isError: true,
      content: [{ type: "text", text: "No valid profile targets among 1 given" }],
    });
  });

  it("marks an aborted run", async () => {
    vi.mocked(runConnect).mockRejectedValue(
      new AutomationUnavailableError("browser disconnected"),
    );
    const { callTool } = setup();

    const result = await callTool("connect", { targets: [ANA] });

    expect(result).toEqual({
      isError: true,
      content: [{ type: "text", text: "Run aborted: browser disconnected" }],
    });
  });

  it("prefixes unexpected errors", async () => {
    vi.mocked(runConnect).mockRejectedValue(new Error("boom"));
    const { callTool } = setup();

    const result = await callTool("connect", { targets: [ANA] });

    expect(result).toEqual({
      isError: true,
      content: [{ type: "text", text: "Failed to send invitations: boom" }],
    });
  });
});

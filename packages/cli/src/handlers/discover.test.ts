// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { MockInstance } from "vitest";

vi.mock("@steadyhand/core", async (importOriginal) => {
  const actual = await importOriginal<typeof import("@steadyhand/core")>();
  return {
    ...actual,
    loadConfig: vi.fn(),
    runDiscovery: vi.fn(),
  };
});

import {
  emptyState,
  InvalidInputError,
  loadConfig,
  parseConfig,
  runDiscovery,
} from "@steadyhand/core";

import { handleDiscover } from "./discover.js";

const ANA = "https://www.linkedin.com/in/ana/";
const BEN = "https://www.linkedin.com/in/ben/";

const RESULT = {
  query: "data engineer",
  pagesVisited: 2,
  discovered: [ANA, BEN],
  duplicates: 3,
  stopReason: "last-page" as const,
  state: { ...emptyState("discovery", "2026-03-01"), countToday: 2 },
};

describe("handleDiscover", () => {
  const originalExitCode = process.exitCode;
  let stdoutSpy: MockInstance<typeof process.stdout.write>;
  let stderrSpy: MockInstance<typeof process.stderr.write>;
  let dir: string;

  beforeEach(() => {
    process.exitCode = undefined;
    vi.clearAllMocks();
    stdoutSpy = vi.spyOn(process.stdout, "write").mockReturnValue(true);
    stderrSpy = vi.spyOn(process.stderr, "write").mockReturnValue(true);
    vi.mocked(loadConfig).mockReturnValue(parseConfig({}));
    dir = mkdtempSync(join(tmpdir(), "discover-"));
  });

  afterEach(() => {
    process.exitCode = originalExitCode;
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  function getStdout(): string {
    return stdoutSpy.mock.calls.map((call) => String(call[0])).join("");
  }

  it("prints the discovered profiles", async () => {
    vi.mocked(runDiscovery).mockResolvedValue(RESULT);

    await handleDiscover("data engineer", {});

    expect(process.exitCode).toBeUndefined();
    expect(getStdout()).toBe(
      'Discovered 2 new profiles for "data engineer" across 2 pages ' +
        "(3 already seen; reached the last result page).\n" +
        `  ${ANA}\n` +
        `  ${BEN}\n`,
    );
  });

  it("uses singular nouns for one profile on one page", async () => {
    vi.mocked(runDiscovery).mockResolvedValue({
      ...RESULT,
      pagesVisited: 1,
      discovered: [ANA],
      duplicates: 0,
      stopReason: "quota",
    });

    await handleDiscover("data engineer", {});

    expect(getStdout()).toBe(
      'Discovered 1 new profile for "data engineer" across 1 page ' +
        "(0 already seen; daily discovery quota reached).\n" +
        `  ${ANA}\n`,
    );
  });

  it("passes limits to the operation", async () => {
    vi.mocked(runDiscovery).mockResolvedValue(RESULT);

    await handleDiscover("data engineer", { maxPages: 4, quota: 10, cdpHost: "127.0.0.1" });

    expect(runDiscovery).toHaveBeenCalledWith(
      expect.objectContaining({
        query: "data engineer",
        maxPages: 4,
        quota: 10,
        cdpHost: "127.0.0.1",
      }),
    );
  });

  it("writes discovered profiles to --output", async () => {
    vi.mocked(runDiscovery).mockResolvedValue(RESULT);
    const output = join(dir, "found.txt");

    await handleDiscover("data engineer", { output });

    expect(readFileSync(output, "utf-8")).toBe(`${ANA}\n${BEN}\n`);
  });

  it("prints JSON with --json", async () => {
    vi.mocked(runDiscovery).mockResolvedValue(RESULT);

    await handleDiscover("data engineer", { json: true });

    expect(JSON.parse(getStdout())).toEqual({
      query: "data engineer",
      pagesVisited: 2,
      discovered: [ANA, BEN],
      duplicates: 3,
      stopReason: "last-page",
      countToday: 2,
    });
  });

  it("sets exitCode 1 when the operation rejects the query", async () => {
    vi.mocked(runDiscovery).mockRejectedValue(
      new InvalidInputError("Search query must not be empty"),
    );

    await handleDiscover("  ", {});

    expect(process.exitCode).toBe(1);
    expect(stderrSpy).toHaveBeenCalledWith("Search query must not be empty\n");
  });
});

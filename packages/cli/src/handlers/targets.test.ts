// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { MockInstance } from "vitest";

import { collectTargets, parseTargetList, parseTargetsFile } from "./targets.js";

describe("parseTargetList", () => {
  it("splits on commas and drops blanks", () => {
    expect(parseTargetList(" /in/ana/ ,,/in/ben/ ")).toEqual(["/in/ana/", "/in/ben/"]);
  });
});

describe("parseTargetsFile", () => {
  it("reads one or more targets per line and skips comments", () => {
    const content = [
      "# prospects",
      "/in/ana/",
      "/in/ben/, /in/cy/  # met at the meetup",
      "",
      "\r",
    ].join("\n");

    expect(parseTargetsFile(content)).toEqual(["/in/ana/", "/in/ben/", "/in/cy/"]);
  });
});

describe("collectTargets", () => {
  const originalExitCode = process.exitCode;
  let stderrSpy: MockInstance<typeof process.stderr.write>;
  let dir: string;

  beforeEach(() => {
    process.exitCode = undefined;
    stderrSpy = vi.spyOn(process.stderr, "write").mockReturnValue(true);
    dir = mkdtempSync(join(tmpdir(), "targets-"));
  });

  afterEach(() => {
    process.exitCode = originalExitCode;
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  it("reads --targets-file", () => {
    const file = join(dir, "targets.txt");
    writeFileSync(file, "/in/ana/\n/in/ben/\n");

    expect(collectTargets({ targetsFile: file })).toEqual(["/in/ana/", "/in/ben/"]);
    expect(process.exitCode).toBeUndefined();
  });

  it("rejects both sources at once", () => {
    expect(collectTargets({ targets: "/in/ana/", targetsFile: "x.txt" })).toBeNull();
    expect(process.exitCode).toBe(1);
    expect(stderrSpy).toHaveBeenCalledWith("Use only one of --targets or --targets-file.\n");
  });

  it("rejects an empty list", () => {
    expect(collectTargets({ targets: " , " })).toBeNull();
    expect(stderrSpy).toHaveBeenCalledWith("No targets provided.\n");
  });

  it("reports an unreadable file", () => {
    expect(collectTargets({ targetsFile: join(dir, "missing.txt") })).toBeNull();
    expect(process.exitCode).toBe(1);
    expect(String(stderrSpy.mock.calls[0]?.[0])).toContain("ENOENT");
  });
});

// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { loadConfig, parseConfig, typingOptions } from "./config.js";
import { ConfigError } from "./errors.js";

describe("parseConfig", () => {
  it("fills every field for an empty document", () => {
    const config = parseConfig(null);

    expect(config.timing).toEqual({ minDelayMs: 750, maxDelayMs: 2250 });
    expect(config.limits).toEqual({ discovery: 100, connect: 10, followUp: 5 });
    expect(config.pacing).toEqual({
      connect: [8000, 13000],
      followUp: [15000, 20000],
      discovery: [15000, 25000],
    });
    expect(config.typing.keyDelayMs).toEqual([35, 95]);
    expect(config.browser).toEqual({
      cdpPort: 9222,
      cdpHost: "127.0.0.1",
      allowRemote: false,
      navigationTimeoutMs: 30000,
    });
    expect(config.connect.note.enabled).toBe(true);
    expect(config.storage.dir).toBe("data");
    expect(config.logging).toEqual({ level: "info", format: "json" });
    expect(config.browse).toEqual({ tour: "quick" });
    expect(config.locator.rolesFile).toBeUndefined();
  });

  it("keeps given values and defaults their siblings", () => {
    const config = parseConfig({ limits: { connect: 3 }, timing: { minDelayMs: 100 } });

    expect(config.limits).toEqual({ discovery: 100, connect: 3, followUp: 5 });
    expect(config.timing).toEqual({ minDelayMs: 100, maxDelayMs: 2250 });
  });

  it("rejects a zero minimum delay", () => {
    expect(() => parseConfig({ timing: { minDelayMs: 0 } })).toThrow(ConfigError);
  });

  it("rejects an inverted delay range", () => {
    expect(() => parseConfig({ timing: { minDelayMs: 900, maxDelayMs: 800 } }, "cfg.yaml")).toThrow(
      'cfg.yaml: Invalid configuration at "timing.maxDelayMs": maxDelayMs must not be below minDelayMs',
    );
  });

  it("rejects probabilities outside [0, 1]", () => {
    expect(() => parseConfig({ typing: { typoProbability: 1.5 } })).toThrow(
      /at "typing.typoProbability"/,
    );
  });

  it("rejects negative and fractional quotas", () => {
    expect(() => parseConfig({ limits: { connect: -1 } })).toThrow(/at "limits.connect"/);
    expect(() => parseConfig({ limits: { followUp: 1.5 } })).toThrow(/at "limits.followUp"/);
  });

  it("rejects unordered pacing ranges", () => {
    expect(() => parseConfig({ pacing: { connect: [9000, 8000] } })).toThrow(
      'Invalid configuration at "pacing.connect": range maximum must not be below its minimum',
    );
  });

  it("rejects unknown log levels", () => {
    expect(() => parseConfig({ logging: { level: "verbose" } })).toThrow(/at "logging.level"/);
  });
});

describe("typingOptions", () => {
  it("adds the correction delay to the configured profile", () => {
    const options = typingOptions(parseConfig({ typing: { typoProbability: 0 } }));

    expect(options.typoProbability).toBe(0);
    expect(options.correctionDelayMs).toEqual([25, 60]);
  });
});

describe("loadConfig", () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "config-"));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("reads YAML from an explicit path", () => {
    const path = join(root, "steadyhand.yaml");
    writeFileSync(path, "limits:\n  connect: 4\nbrowser:\n  cdpPort: 9333\n");

    const config = loadConfig({ path, env: {} });

    expect(config.limits.connect).toBe(4);
    expect(config.browser.cdpPort).toBe(9333);
  });

  it("reads JSON as well", () => {
    const path = join(root, "config.json");
    writeFileSync(path, JSON.stringify({ discovery: { maxPages: 7 } }));

    expect(loadConfig({ path, env: {} }).discovery.maxPages).toBe(7);
  });

  it("takes the path from the environment", () => {
    const path = join(root, "env.yaml");
    writeFileSync(path, "storage:\n  dir: /var/lib/steadyhand\n");

    const config = loadConfig({ env: { STEADYHAND_CONFIG: path } });

    expect(config.storage.dir).toBe("/var/lib/steadyhand");
  });

  it("treats an empty file as all defaults", () => {
    const path = join(root, "empty.yaml");
    writeFileSync(path, "");

    expect(loadConfig({ path, env: {} }).limits.connect).toBe(10);
  });

  it("fails for a missing explicit file", () => {
    expect(() => loadConfig({ path: join(root, "missing.yaml"), env: {} })).toThrow(ConfigError);
  });

  it("fails for malformed YAML", () => {
    const path = join(root, "bad.yaml");
    writeFileSync(path, "limits: [unclosed\n");

    expect(() => loadConfig({ path, env: {} })).toThrow(/Invalid YAML/);
  });

  it("applies the log level override", () => {
    const path = join(root, "steadyhand.yaml");
    writeFileSync(path, "logging:\n  level: warn\n  format: text\n");

    const config = loadConfig({ path, env: { STEADYHAND_LOG_LEVEL: "DEBUG" } });

    expect(config.logging).toEqual({ level: "debug", format: "text" });
  });

  it("rejects an unknown log level override", () => {
    const path = join(root, "steadyhand.yaml");
    writeFileSync(path, "");

    expect(() => loadConfig({ path, env: { STEADYHAND_LOG_LEVEL: "loud" } })).toThrow(
      'Invalid STEADYHAND_LOG_LEVEL "loud": expected one of debug, info, warn, error',
    );
  });
});

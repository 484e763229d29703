// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { describe, expect, it } from "vitest";

import { createLogger, isLogLevel, silentLogger } from "./logger.js";

const clock = () => new Date("2026-03-01T09:30:00.000Z");

function capture() {
  const lines: string[] = [];
  return { lines, write: (line: string) => lines.push(line) };
}

describe("createLogger", () => {
  it("writes JSON records", () => {
    const sink = capture();
    const logger = createLogger({ write: sink.write, clock });

    logger.info("target done", { target: "https://www.linkedin.com/in/dana", outcome: "succeeded" });

    expect(sink.lines).toEqual([
      '{"ts":"2026-03-01T09:30:00.000Z","level":"info","msg":"target done","target":"https://www.linkedin.com/in/dana","outcome":"succeeded"}\n',
    ]);
  });

  it("filters below the configured level", () => {
    const sink = capture();
    const logger = createLogger({ level: "warn", write: sink.write, clock });

    logger.debug("a");
    logger.info("b");
    logger.warn("c");
    logger.error("d");

    expect(sink.lines).toHaveLength(2);
  });

  it("binds fields in child loggers", () => {
    const sink = capture();
    const logger = createLogger({ write: sink.write, clock }).child({ workflow: "connect" });

    logger.warn("slow", { attempt: 2 });

    expect(JSON.parse(sink.lines[0] ?? "")).toEqual({
      ts: "2026-03-01T09:30:00.000Z",
      level: "warn",
      msg: "slow",
      workflow: "connect",
      attempt: 2,
    });
  });

  it("renders errors as messages and drops undefined fields", () => {
    const sink = capture();
    const logger = createLogger({ write: sink.write, clock });

    logger.error("failed", { error: new Error("boom"), extra: undefined });

    expect(JSON.parse(sink.lines[0] ?? "")).toEqual({
      ts: "2026-03-01T09:30:00.000Z",
      level: "error",
      msg: "failed",
      error: "boom",
    });
  });

  it("writes text records", () => {
    const sink = capture();
    const logger = createLogger({ format: "text", write: sink.write, clock });

    logger.info("page done", { page: 2, query: "data engineer" });

    expect(sink.lines).toEqual([
      '2026-03-01T09:30:00.000Z INFO page done page=2 query="data engineer"\n',
    ]);
  });
});

describe("isLogLevel", () => {
  it("accepts known levels only", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
  });
});

describe("silentLogger", () => {
  it("returns itself for children", () => {
    expect(silentLogger.child({ a: 1 })).toBe(silentLogger);
  });
});

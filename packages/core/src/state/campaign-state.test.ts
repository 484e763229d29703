// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { describe, expect, it } from "vitest";

import {
  calendarDay,
  decodeSeen,
  decodeState,
  emptyState,
  encodeSeen,
  encodeState,
  rollover,
} from "./campaign-state.js";
import { CampaignStateFormatError } from "./errors.js";

const encode = (value: unknown) => new TextEncoder().encode(JSON.stringify(value));

describe("calendarDay", () => {
  it("formats the local date", () => {
    expect(calendarDay(new Date(2026, 0, 5, 23, 59))).toBe("2026-01-05");
  });
});

describe("rollover", () => {
  it("resets the counter on a new day", () => {
    const state = { ...emptyState("connect", "2026-03-01"), countToday: 7 };

    expect(rollover(state, "2026-03-02")).toBe(true);
    expect(state.countToday).toBe(0);
    expect(state.epoch).toBe("2026-03-02");
  });

  it("keeps the counter within the same day", () => {
    const state = { ...emptyState("connect", "2026-03-01"), countToday: 7 };

    expect(rollover(state, "2026-03-01")).toBe(false);
    expect(state.countToday).toBe(7);
  });

  it("keeps history across days", () => {
    const state = emptyState("connect", "2026-03-01");
    state.attempted["https://www.linkedin.com/in/a"] = true;

    rollover(state, "2026-03-02");

    expect(state.attempted).toEqual({ "https://www.linkedin.com/in/a": true });
  });
});

describe("decodeState", () => {
  it("reads back what it wrote", () => {
    const state = emptyState("follow-up", "2026-03-01");
    state.countToday = 2;
    state.attempted.x = true;
    state.succeeded.x = "2026-03-01T10:00:00.000Z";

    expect(decodeState("k", encodeState(state), "follow-up")).toEqual(state);
  });

  it("upgrades legacy records", () => {
    const legacy = {
      date: "2026-02-27",
      requests_sent_today: 3,
      attempted_profiles: { a: true, b: true, c: false },
      successful_sends: { a: "2026-02-27T09:00:00Z", d: "2026-02-26T09:00:00Z" },
      failed_attempts: { b: "timeout" },
    };

    expect(decodeState("k", encode(legacy), "connect")).toEqual({
      version: 1,
      workflow: "connect",
      epoch: "2026-02-27",
      countToday: 3,
      attempted: { a: true, b: true, d: true },
      succeeded: { a: "2026-02-27T09:00:00Z", d: "2026-02-26T09:00:00Z" },
      failed: { b: "timeout" },
      ineligible: {},
    });
  });

  it("rejects unknown versions", () => {
    const doc = { ...emptyState("connect", "2026-03-01"), version: 2 };

    expect(() => decodeState("campaign-connect", encode(doc), "connect")).toThrow(
      'Unreadable state record "campaign-connect": unsupported schema version 2',
    );
  });

  it("rejects corrupt files", () => {
    const data = new TextEncoder().encode("{ not json");

    expect(() => decodeState("k", data, "connect")).toThrow(CampaignStateFormatError);
  });

  it("rejects records of another workflow", () => {
    const doc = emptyState("discovery", "2026-03-01");

    expect(() => decodeState("k", encodeState(doc), "connect")).toThrow(/belongs to workflow "discovery"/);
  });

  it("names the invalid field", () => {
    const doc = { ...emptyState("connect", "2026-03-01"), countToday: -1 };

    expect(() => decodeState("k", encode(doc), "connect")).toThrow(/countToday/);
  });
});

describe("seen set", () => {
  it("round-trips", () => {
    const seen = new Set(["a", "b"]);
    expect(decodeSeen("k", encodeSeen(seen))).toEqual(seen);
  });

  it("accepts a bare array", () => {
    expect(decodeSeen("k", encode(["a"]))).toEqual(new Set(["a"]));
  });

  it("rejects other shapes", () => {
    expect(() => decodeSeen("k", encode({ targets: 1 }))).toThrow(CampaignStateFormatError);
  });
});

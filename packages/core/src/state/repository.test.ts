// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { describe, expect, it } from "vitest";

import { emptyState } from "./campaign-state.js";
import { MemoryStateStore } from "./memory-store.js";
import { CampaignStateRepository, SEEN_TARGETS_KEY, stateKey } from "./repository.js";

describe("CampaignStateRepository", () => {
  it("returns a fresh record when nothing is stored", async () => {
    const repo = new CampaignStateRepository(new MemoryStateStore());

    expect(await repo.load("connect", "2026-03-01")).toEqual(emptyState("connect", "2026-03-01"));
  });

  it("stores one record per workflow", async () => {
    const store = new MemoryStateStore();
    const repo = new CampaignStateRepository(store);

    await repo.save({ ...emptyState("connect", "2026-03-01"), countToday: 4 });
    await repo.save(emptyState("follow-up", "2026-03-01"));

    expect(store.keys().sort()).toEqual(["campaign-connect", "campaign-follow-up"]);
    expect((await repo.load("connect", "2026-03-09")).countToday).toBe(4);
  });

  it("resets a workflow", async () => {
    const store = new MemoryStateStore();
    const repo = new CampaignStateRepository(store);
    await repo.save({ ...emptyState("connect", "2026-03-01"), countToday: 4 });

    await repo.reset("connect");

    expect(store.keys()).toEqual([]);
  });

  it("persists the seen set", async () => {
    const store = new MemoryStateStore();
    const repo = new CampaignStateRepository(store);

    expect(await repo.loadSeen()).toEqual(new Set());
    await repo.saveSeen(new Set(["a", "b"]));
    expect(await repo.loadSeen()).toEqual(new Set(["a", "b"]));

    await repo.resetSeen();
    expect(store.keys()).not.toContain(SEEN_TARGETS_KEY);
  });

  it("names keys after the workflow", () => {
    expect(stateKey("follow-up")).toBe("campaign-follow-up");
  });
});

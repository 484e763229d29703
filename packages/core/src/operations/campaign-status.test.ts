// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { parseConfig } from "../config/config.js";
import { emptyState } from "../state/campaign-state.js";
import { campaignReset } from "./campaign-reset.js";
import { campaignStatus } from "./campaign-status.js";
import { createRepository } from "./runtime.js";

const NOW = () => new Date(2026, 4, 12, 9, 30);
const A = "https://www.linkedin.com/in/a";
const B = "https://www.linkedin.com/in/b";

describe("campaign records", () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "campaign-status-"));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  describe("campaignStatus", () => {
    it("reports an empty record for a fresh workflow", async () => {
      const config = parseConfig({ storage: { dir: root } });

      expect(await campaignStatus({ workflow: "follow-up", config, clock: NOW })).toEqual({
        workflow: "follow-up",
        epoch: "2026-05-12",
        countToday: 0,
        quota: 5,
        remainingToday: 5,
        attempted: 0,
        succeeded: 0,
        failed: {},
        ineligible: {},
      });
    });

    it("counts today's work against the quota", async () => {
      const config = parseConfig({ storage: { dir: root }, limits: { connect: 3 } });
      await createRepository(config).save({
        ...emptyState("connect", "2026-05-12"),
        countToday: 2,
        attempted: { [A]: true, [B]: true },
        succeeded: { [A]: "2026-05-12T08:00:00.000Z" },
        failed: { [B]: "Failed to type: detached" },
      });

      const status = await campaignStatus({ workflow: "connect", config, clock: NOW });

      expect(status).toMatchObject({ countToday: 2, quota: 3, remainingToday: 1, attempted: 2, succeeded: 1 });
      expect(status.failed).toEqual({ [B]: "Failed to type: detached" });
    });

    it("shows yesterday's counter as spent", async () => {
      const config = parseConfig({ storage: { dir: root } });
      await createRepository(config).save({ ...emptyState("connect", "2026-05-11"), countToday: 10 });

      const status = await campaignStatus({ workflow: "connect", config, clock: NOW });

      expect(status).toMatchObject({ epoch: "2026-05-12", countToday: 0, remainingToday: 10 });
    });

    it("includes the seen-set size for discovery", async () => {
      const config = parseConfig({ storage: { dir: root } });
      await createRepository(config).saveSeen(new Set([A, B]));

      expect((await campaignStatus({ workflow: "discovery", config, clock: NOW })).seen).toBe(2);
    });
  });

  describe("campaignReset", () => {
    it("forgets the record but keeps the seen-set by default", async () => {
      const config = parseConfig({ storage: { dir: root } });
      const repository = createRepository(config);
      await repository.save({ ...emptyState("discovery", "2026-05-12"), countToday: 4 });
      await repository.saveSeen(new Set([A]));

      const result = await campaignReset({ workflow: "discovery", config });

      expect(result).toEqual({ workflow: "discovery", seenCleared: false });
      expect((await repository.load("discovery", "2026-05-12")).countToday).toBe(0);
      expect(await repository.loadSeen()).toEqual(new Set([A]));
    });

    it("clears the seen-set on request", async () => {
      const config = parseConfig({ storage: { dir: root } });
      const repository = createRepository(config);
      await repository.saveSeen(new Set([A]));

      await campaignReset({ workflow: "discovery", config, includeSeen: true });

      expect(await repository.loadSeen()).toEqual(new Set());
    });
  });
});

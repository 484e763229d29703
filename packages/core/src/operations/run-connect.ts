// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import type { CampaignSummary } from "../campaign/types.js";
import { createConnectStep } from "../workflows/connect.js";
import { withCampaignRuntime } from "./runtime.js";
import { requireTargets } from "./targets.js";
import type { RunInput } from "./types.js";

export interface RunConnectInput extends RunInput {
  /** Profile URLs or `/in/` paths, in processing order. */
  readonly targets: readonly string[];
  /** Defaults to `limits.connect`. */
  readonly quota?: number | undefined;
  /** Overrides `connect.note.enabled`. */
  readonly note?: boolean | undefined;
}

export interface RunConnectOutput extends CampaignSummary {
  /** Inputs that are not profile references. */
  readonly rejected: readonly string[];
}

/**
 * Send connection invitations to `targets`, skipping anyone invited
 * before, until the daily quota is spent.
 */
export async function runConnect(input: RunConnectInput): Promise<RunConnectOutput> {
  const { targets, rejected } = requireTargets(input.targets);
  const { config } = input;
  const note = config.connect.note;
  const withNote = input.note ?? note.enabled;

  const summary = await withCampaignRuntime(input, ({ deps, engine }) =>
    engine.run({
      workflow: "connect",
      targets,
      quota: input.quota ?? config.limits.connect,
      step: createConnectStep(deps, {
        note: withNote ? { template: note.template, context: note.context } : undefined,
      }),
      pacing: { range: config.pacing.connect },
      signal: input.signal,
    }),
  );
  return { ...summary, rejected };
}

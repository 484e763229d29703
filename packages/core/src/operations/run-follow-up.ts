// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import type { CampaignSummary } from "../campaign/types.js";
import { createFollowUpStep } from "../workflows/follow-up.js";
import { withCampaignRuntime } from "./runtime.js";
import { requireTargets } from "./targets.js";
import type { RunInput } from "./types.js";

export interface RunFollowUpInput extends RunInput {
  readonly targets: readonly string[];
  /** Defaults to `limits.followUp`. */
  readonly quota?: number | undefined;
}

export interface RunFollowUpOutput extends CampaignSummary {
  readonly rejected: readonly string[];
}

/**
 * Message first-degree connections in `targets`, once each.
 */
export async function runFollowUp(input: RunFollowUpInput): Promise<RunFollowUpOutput> {
  const { targets, rejected } = requireTargets(input.targets);
  const { config } = input;

  const summary = await withCampaignRuntime(input, ({ deps, engine }) =>
    engine.run({
      workflow: "follow-up",
      targets,
      quota: input.quota ?? config.limits.followUp,
      step: createFollowUpStep(deps, config.followUp),
      pacing: { range: config.pacing.followUp },
      signal: input.signal,
    }),
  );
  return { ...summary, rejected };
}

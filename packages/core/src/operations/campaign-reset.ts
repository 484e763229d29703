// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import type { Config } from "../config/config.js";
import type { WorkflowKind } from "../state/campaign-state.js";
import { createRepository } from "./runtime.js";

export interface CampaignResetInput {
  readonly workflow: WorkflowKind;
  readonly config: Config;
  /** Also forget which profiles discovery has seen. */
  readonly includeSeen?: boolean | undefined;
}

export interface CampaignResetOutput {
  readonly workflow: WorkflowKind;
  readonly seenCleared: boolean;
}

/**
 * Delete the persisted record of a workflow, so every target becomes
 * eligible again and the daily counter restarts.
 */
export async function campaignReset(input: CampaignResetInput): Promise<CampaignResetOutput> {
  const repository = createRepository(input.config);
  await repository.reset(input.workflow);
  const seenCleared = input.includeSeen === true;
  if (seenCleared) {
    await repository.resetSeen();
  }
  return { workflow: input.workflow, seenCleared };
}

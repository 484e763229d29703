// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import type { StepFunction } from "../campaign/types.js";
import { VerificationError } from "../errors.js";
import { ROLES } from "../locator/roles.js";
import { personalize } from "../utils/message-template.js";
import { openPage, readFirstName } from "./profile.js";
import type { MessageTemplate, WorkflowDeps } from "./types.js";

/** Longest message the compose box accepts. */
export const MESSAGE_MAX_LENGTH = 2_000;

const REVIEW_PAUSE: readonly [number, number] = [2_000, 4_000];

/**
 * Step that messages one first-degree connection.
 *
 * Ineligible when the profile is not connected yet, the request is still
 * pending or messaging is restricted.
 */
export function createFollowUpStep(deps: WorkflowDeps, message: MessageTemplate): StepFunction {
  const { actor, locator } = deps;

  return async (target, { logger }) => {
    await openPage(deps, target);
    const name = await readFirstName(deps, logger);

    await actor.click(await locator.require(ROLES.messageAction));
    const input = await locator.require(ROLES.messageInput);
    await actor.pause("think");

    const text = personalize(
      message.template,
      { name, context: message.context },
      { maxLength: MESSAGE_MAX_LENGTH },
    );
    await actor.type(input, text);
    await actor.pause(REVIEW_PAUSE);
    await actor.click(await locator.require(ROLES.sendMessage));
    await actor.pause("short");

    if ((await input.text()).trim() !== "") {
      throw new VerificationError("message is still in the compose box");
    }
    logger.info("message sent", { characters: Array.from(text).length });
  };
}

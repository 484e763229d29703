// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import type { StepFunction } from "../campaign/types.js";
import { isSystemicError, VerificationError } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import { ROLES } from "../locator/roles.js";
import { errorMessage } from "../utils/error-message.js";
import { personalize } from "../utils/message-template.js";
import { openProfile, readFirstName } from "./profile.js";
import type { MessageTemplate, WorkflowDeps } from "./types.js";

/** Longest note the invitation dialog accepts. */
export const NOTE_MAX_LENGTH = 300;

const REVIEW_PAUSE: readonly [number, number] = [1_000, 2_000];

export interface ConnectStepOptions {
  /** Personalised note; omitted or empty template sends without one. */
  readonly note?: MessageTemplate | undefined;
}

/**
 * Step that sends one connection invitation.
 *
 * Ineligible when the profile shows a pending request, a follow-only
 * state or an existing connection.
 */
export function createConnectStep(deps: WorkflowDeps, options: ConnectStepOptions = {}): StepFunction {
  const { actor, locator } = deps;

  return async (target, { logger }) => {
    await openProfile(deps, target);
    await actor.read();

    const connect = await locator.require(ROLES.connectAction);
    await actor.click(connect);
    await actor.pause("short");

    if (await locator.present(ROLES.inviteDialog)) {
      const note = options.note;
      if (note !== undefined && note.template.trim() !== "") {
        await sendWithNote(deps, note, logger);
      } else {
        logger.debug("sending invitation without a note");
        await actor.click(await locator.require(ROLES.sendWithoutNote));
      }
    } else {
      logger.debug("no invitation dialog; request sent directly");
    }

    await actor.pause("short");
    await verifySent(deps);
    logger.info("invitation sent");
  };
}

async function sendWithNote(deps: WorkflowDeps, note: MessageTemplate, logger: Logger): Promise<void> {
  const { actor, locator } = deps;
  try {
    const addNote = await locator.resolve(ROLES.addNote);
    if (addNote.status === "found") {
      await actor.click(addNote.handle);
      await actor.pause("short");
    }
    const input = await locator.require(ROLES.noteInput);
    const text = personalize(
      note.template,
      { name: await readFirstName(deps, logger), context: note.context },
      { maxLength: NOTE_MAX_LENGTH },
    );
    await actor.type(input, text);
    await actor.pause(REVIEW_PAUSE);
    await actor.click(await locator.require(ROLES.sendInvitation));
  } catch (error) {
    if (isSystemicError(error)) {
      throw error;
    }
    logger.warn("could not add a note; sending without one", { error: errorMessage(error) });
    await actor.click(await locator.require(ROLES.sendWithoutNote));
  }
}

async function verifySent({ locator }: WorkflowDeps): Promise<void> {
  if (await locator.present(ROLES.invitationPending)) {
    return;
  }
  if (await locator.present(ROLES.inviteDialog)) {
    throw new VerificationError("invitation dialog is still open");
  }
}

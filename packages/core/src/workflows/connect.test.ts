// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { describe, expect, it } from "vitest";

import { DeliveryError, TargetIneligibleError, VerificationError } from "../errors.js";
import type { FakeAutomationContext } from "../testing/index.js";
import { createConnectStep } from "./connect.js";
import { createDeps, STEP } from "./test-helpers.js";

const TARGET = "https://www.linkedin.com/in/dana-s";
const DIALOG = "div[role='dialog'].send-invite";
const NOTE_INPUT = "textarea[name='message']";

interface ProfileOptions {
  /** What clicking "Send invitation" does; closes the dialog by default. */
  readonly sendCloses?: boolean;
  /** Whether "Add a note" reveals the note box. */
  readonly noteBox?: boolean;
  /** Connect sends at once, without a dialog. */
  readonly direct?: boolean;
}

function markPending(c: FakeAutomationContext): void {
  c.remove(DIALOG);
  c.add("button[aria-label*='Pending']", { attributes: { "aria-label": "Pending, click to withdraw" } });
}

function profile(context: FakeAutomationContext, options: ProfileOptions = {}) {
  const sent: string[] = [];
  context.page(TARGET, (c) => {
    c.add("div.pv-top-card");
    c.add("h1.text-heading-xlarge", { text: "Dana Scully" });
    c.add("button[aria-label^='Connect']", {
      attributes: { "aria-label": "Connect with Dana" },
      onClick: (c) => {
        if (options.direct === true) {
          markPending(c);
          return;
        }
        c.add(DIALOG);
        c.add("button[aria-label='Add a note']", {
          text: "Add a note",
          onClick: (c) => {
            if (options.noteBox === false) return;
            const input = c.add(NOTE_INPUT);
            c.add("button[aria-label='Send invitation']", {
              text: "Send",
              onClick: (c) => {
                sent.push(input.value);
                if (options.sendCloses !== false) markPending(c);
              },
            });
          },
        });
        c.add("button[aria-label='Send without a note']", {
          text: "Send without a note",
          onClick: (c) => {
            sent.push("");
            markPending(c);
          },
        });
      },
    });
  });
  return sent;
}

describe("createConnectStep", () => {
  it("sends an invitation with a personalised note", async () => {
    const { context, deps } = createDeps();
    const sent = profile(context);
    const step = createConnectStep(deps, {
      note: { template: "Hi {{name}}, I work on {{context}} too.", context: "data tooling" },
    });

    await step(TARGET, STEP);

    expect(sent).toEqual(["Hi Dana, I work on data tooling too."]);
    expect(context.eventsOf("navigate")).toEqual([{ type: "navigate", url: TARGET }]);
  });

  it("cuts the note to the dialog's limit", async () => {
    const { context, deps } = createDeps();
    const sent = profile(context);
    const step = createConnectStep(deps, { note: { template: "{{context}}", context: "x".repeat(400) } });

    await step(TARGET, STEP);

    expect(sent).toEqual(["x".repeat(300)]);
  });

  it("sends without a note when notes are off", async () => {
    const { context, deps } = createDeps();
    const sent = profile(context);

    await createConnectStep(deps)(TARGET, STEP);

    expect(sent).toEqual([""]);
  });

  it("falls back to sending without a note when the note box is missing", async () => {
    const { context, deps } = createDeps();
    const sent = profile(context, { noteBox: false });
    const step = createConnectStep(deps, { note: { template: "Hi {{name}}" } });

    await step(TARGET, STEP);

    expect(sent).toEqual([""]);
  });

  it("accepts a request sent without a dialog", async () => {
    const { context, deps } = createDeps();
    profile(context, { direct: true });

    await expect(createConnectStep(deps)(TARGET, STEP)).resolves.toBeUndefined();
  });

  it("reports a pending request as ineligible", async () => {
    const { context, deps } = createDeps();
    context.page(TARGET, (c) => {
      c.add("div.pv-top-card");
      c.add("button[aria-label*='Pending']", { attributes: { "aria-label": "Pending" } });
    });

    const error = await createConnectStep(deps)(TARGET, STEP).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TargetIneligibleError);
    expect(error).toMatchObject({ reason: "connection request already pending" });
  });

  it("fails when the profile does not render", async () => {
    const { deps } = createDeps();

    await expect(createConnectStep(deps)(TARGET, STEP)).rejects.toThrow(
      new DeliveryError("open profile", "profile unavailable or private"),
    );
  });

  it("fails verification when the dialog stays open", async () => {
    const { context, deps } = createDeps();
    profile(context, { sendCloses: false });
    const step = createConnectStep(deps, { note: { template: "Hello" } });

    await expect(step(TARGET, STEP)).rejects.toBeInstanceOf(VerificationError);
  });
});

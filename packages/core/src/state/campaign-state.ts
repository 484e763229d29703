// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { z } from "zod";

import { CampaignStateFormatError } from "./errors.js";

export const WORKFLOW_KINDS = ["discovery", "connect", "follow-up"] as const;
export type WorkflowKind = (typeof WORKFLOW_KINDS)[number];

export const CURRENT_STATE_VERSION = 1;

/**
 * Durable per-workflow campaign record.
 *
 * Maps are plain objects keyed by canonical target so the file stays
 * readable for audit.
 */
export interface CampaignState {
  version: typeof CURRENT_STATE_VERSION;
  workflow: WorkflowKind;
  /** Local calendar day (`YYYY-MM-DD`) that `countToday` belongs to. */
  epoch: string;
  countToday: number;
  attempted: Record<string, true>;
  /** Target → ISO-8601 completion time. */
  succeeded: Record<string, string>;
  /** Target → last failure reason. */
  failed: Record<string, string>;
  /** Target → reason it was skipped as not actionable. */
  ineligible: Record<string, string>;
}

const DAY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

const currentSchema = z.object({
  version: z.literal(CURRENT_STATE_VERSION),
  workflow: z.enum(WORKFLOW_KINDS),
  epoch: z.string().regex(DAY_PATTERN),
  countToday: z.number().int().nonnegative(),
  attempted: z.record(z.string(), z.literal(true)),
  succeeded: z.record(z.string(), z.string()),
  failed: z.record(z.string(), z.string()),
  ineligible: z.record(z.string(), z.string()).default({}),
});

// Records written before versioning: snake_case, no workflow tag.
const legacySchema = z.object({
  date: z.string().regex(DAY_PATTERN),
  requests_sent_today: z.number().int().nonnegative(),
  attempted_profiles: z.record(z.string(), z.boolean()).default({}),
  successful_sends: z.record(z.string(), z.string()).default({}),
  failed_attempts: z.record(z.string(), z.string()).default({}),
});

/**
 * Local calendar day of `date` as `YYYY-MM-DD`.
 */
export function calendarDay(date: Date): string {
  const y = String(date.getFullYear()).padStart(4, "0");
  const m = String(date.getMonth() + 1).padStart(2, "0");
  const d = String(date.getDate()).padStart(2, "0");
  return `${y}-${m}-${d}`;
}

export function emptyState(workflow: WorkflowKind, today: string): CampaignState {
  return {
    version: CURRENT_STATE_VERSION,
    workflow,
    epoch: today,
    countToday: 0,
    attempted: {},
    succeeded: {},
    failed: {},
    ineligible: {},
  };
}

/**
 * Start a new counting day when `today` differs from the stored epoch.
 *
 * @returns whether the counter was reset.
 */
export function rollover(state: CampaignState, today: string): boolean {
  if (state.epoch === today) {
    return false;
  }
  state.epoch = today;
  state.countToday = 0;
  return true;
}

export function encodeState(state: CampaignState): Uint8Array {
  return new TextEncoder().encode(JSON.stringify(state, null, 2) + "\n");
}

/**
 * Decode a stored record, upgrading legacy records in memory.
 *
 * @throws {CampaignStateFormatError} for malformed JSON, an unknown
 *   schema version, or a record that belongs to another workflow.
 */
export function decodeState(
  key: string,
  data: Uint8Array,
  workflow: WorkflowKind,
): CampaignState {
  const doc = parseJson(key, data);

  if (doc !== null && typeof doc === "object" && !("version" in doc)) {
    const legacy = legacySchema.safeParse(doc);
    if (!legacy.success) {
      throw new CampaignStateFormatError(key, describeIssue(legacy.error));
    }
    const attempted: Record<string, true> = {};
    for (const [target, flag] of Object.entries(legacy.data.attempted_profiles)) {
      if (flag) attempted[target] = true;
    }
    return withConsistentAttempts({
      version: CURRENT_STATE_VERSION,
      workflow,
      epoch: legacy.data.date,
      countToday: legacy.data.requests_sent_today,
      attempted,
      succeeded: legacy.data.successful_sends,
      failed: legacy.data.failed_attempts,
      ineligible: {},
    });
  }

  if (
    doc !== null &&
    typeof doc === "object" &&
    "version" in doc &&
    doc.version !== CURRENT_STATE_VERSION
  ) {
    throw new CampaignStateFormatError(
      key,
      `unsupported schema version ${JSON.stringify(doc.version)}`,
    );
  }

  const parsed = currentSchema.safeParse(doc);
  if (!parsed.success) {
    throw new CampaignStateFormatError(key, describeIssue(parsed.error));
  }
  if (parsed.data.workflow !== workflow) {
    throw new CampaignStateFormatError(
      key,
      `record belongs to workflow "${parsed.data.workflow}", expected "${workflow}"`,
    );
  }
  return withConsistentAttempts(parsed.data);
}

/**
 * Decode the discovery seen-set. Accepts the versioned document and a
 * bare JSON array of targets.
 */
export function decodeSeen(key: string, data: Uint8Array): Set<string> {
  const doc = parseJson(key, data);
  const parsed = z
    .union([
      z.array(z.string()),
      z.object({ version: z.literal(CURRENT_STATE_VERSION), targets: z.array(z.string()) }),
    ])
    .safeParse(doc);
  if (!parsed.success) {
    throw new CampaignStateFormatError(key, describeIssue(parsed.error));
  }
  return new Set(Array.isArray(parsed.data) ? parsed.data : parsed.data.targets);
}

export function encodeSeen(seen: ReadonlySet<string>): Uint8Array {
  const doc = { version: CURRENT_STATE_VERSION, targets: [...seen] };
  return new TextEncoder().encode(JSON.stringify(doc, null, 2) + "\n");
}

// Every succeeded target counts as attempted, whatever the file says.
function withConsistentAttempts(state: CampaignState): CampaignState {
  for (const target of Object.keys(state.succeeded)) {
    state.attempted[target] = true;
  }
  return state;
}

function parseJson(key: string, data: Uint8Array): unknown {
  try {
    return JSON.parse(new TextDecoder().decode(data)) as unknown;
  } catch (error) {
    throw new CampaignStateFormatError(key, "not valid JSON", { cause: error });
  }
}

function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (issue === undefined) {
    return "invalid record";
  }
  const path = issue.path.join(".");
  return path === "" ? issue.message : `${path}: ${issue.message}`;
}

// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { readFileSync } from "node:fs";

import { parse as parseYaml } from "yaml";
import { z } from "zod";

import { ConfigError } from "../config/errors.js";
import { errorMessage } from "../utils/error-message.js";
import bundledCatalogue from "./roles.json" with { type: "json" };

/**
 * Role names the workflows resolve. The catalogue may define more.
 */
export const ROLES = {
  profileHeader: "profile-header",
  profileName: "profile-name",
  connectAction: "connect-action",
  inviteDialog: "invite-dialog",
  addNote: "add-note",
  noteInput: "note-input",
  sendInvitation: "send-invitation",
  sendWithoutNote: "send-without-note",
  invitationPending: "invitation-pending",
  messageAction: "message-action",
  messageInput: "message-input",
  sendMessage: "send-message",
  searchInput: "search-input",
  peopleFilter: "people-filter",
  nextPage: "next-page",
  resultLink: "result-link",
  navFeed: "nav-feed",
  navMyNetwork: "nav-my-network",
  navJobs: "nav-jobs",
  navMessaging: "nav-messaging",
  navNotifications: "nav-notifications",
} as const;

export type RoleName = (typeof ROLES)[keyof typeof ROLES];

const strategySchema = z.object({
  kind: z.enum(["attribute", "text", "structural"]),
  selector: z.string().min(1),
  validate: z.enum(["keyword", "none"]).default("keyword"),
});

const indicatorSchema = z.object({
  selector: z.string().min(1),
  reason: z.string().min(1),
});

const roleSchema = z.object({
  keywords: z.array(z.string().min(1)).default([]),
  strategies: z.array(strategySchema).min(1),
  unavailable: z.array(indicatorSchema).default([]),
});

const catalogueSchema = z.object({
  version: z.literal(1),
  roles: z.record(z.string(), roleSchema),
});

export type Strategy = z.infer<typeof strategySchema>;
export type UnavailableIndicator = z.infer<typeof indicatorSchema>;

/**
 * How to find one semantic UI element: strategies tried in order, the
 * keywords a match must carry, and indicators that explain its absence.
 */
export interface RoleDefinition extends z.infer<typeof roleSchema> {
  readonly role: string;
}

/**
 * Validated set of role definitions.
 */
export class RoleCatalogue {
  private readonly roles: ReadonlyMap<string, RoleDefinition>;

  constructor(definitions: readonly RoleDefinition[]) {
    this.roles = new Map(definitions.map((d) => [d.role, d]));
  }

  /**
   * @throws {ConfigError} if the catalogue has no such role.
   */
  get(role: string): RoleDefinition {
    const definition = this.roles.get(role);
    if (definition === undefined) {
      throw new ConfigError(`Unknown UI role "${role}"`);
    }
    return definition;
  }

  has(role: string): boolean {
    return this.roles.has(role);
  }

  names(): string[] {
    return [...this.roles.keys()];
  }
}

/**
 * Validate a parsed catalogue document.
 *
 * @throws {ConfigError} naming the first offending path.
 */
export function parseRoleCatalogue(doc: unknown, source?: string): RoleCatalogue {
  const result = catalogueSchema.safeParse(doc);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue === undefined ? "" : issue.path.join(".");
    throw new ConfigError(
      `Invalid role catalogue${where === "" ? "" : ` at "${where}"`}: ${issue?.message ?? "unknown error"}`,
      source,
    );
  }
  return new RoleCatalogue(
    Object.entries(result.data.roles).map(([role, definition]) => ({ role, ...definition })),
  );
}

/**
 * Load a catalogue from a YAML or JSON file, or the bundled default when
 * no path is given.
 */
export function loadRoleCatalogue(path?: string): RoleCatalogue {
  if (path === undefined) {
    return parseRoleCatalogue(bundledCatalogue, "roles.json");
  }
  let doc: unknown;
  try {
    doc = parseYaml(readFileSync(path, "utf-8"));
  } catch (error) {
    throw new ConfigError(`Cannot read role catalogue: ${errorMessage(error)}`, path, { cause: error });
  }
  return parseRoleCatalogue(doc, path);
}

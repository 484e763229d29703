// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { createRequire } from "node:module";

import { Command, InvalidArgumentError, Option } from "commander";

import { WORKFLOW_KINDS } from "@steadyhand/core";

import {
  handleBrowse,
  handleCampaignReset,
  handleCampaignStatus,
  handleCheckBrowser,
  handleConnect,
  handleDiscover,
  handleFollowUp,
} from "./handlers/index.js";

const require = createRequire(import.meta.url);
const { version } = require("../package.json") as { version: string };

/** Parse a string as a positive integer, throwing on invalid input. */
function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError(`Expected a positive integer, got "${value}".`);
  }
  return n;
}

/** Parse a string as a non-negative integer, throwing on invalid input. */
function parseNonNegativeInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError(
      `Expected a non-negative integer, got "${value}".`,
    );
  }
  return n;
}

/** Options shared by every command that talks to the browser. */
function withConnectionOptions(command: Command): Command {
  return command
    .option("--config <path>", "Configuration file (default: ./steadyhand.yaml)")
    .option("--cdp-port <port>", "Browser debugging port", parsePositiveInt)
    .option("--cdp-host <host>", "Browser debugging host")
    .option("--allow-remote", "Allow a debugging host other than this machine")
    .option("--json", "Output as JSON");
}

function workflowArgument(command: Command): Command {
  return command.addArgument(
    command.createArgument("<workflow>", "Workflow name").choices(WORKFLOW_KINDS),
  );
}

/**
 * Create the CLI program with all subcommands registered.
 */
export function createProgram(): Command {
  const program = new Command()
    .name("steadyhand")
    .description("Paced, human-like outreach in a browser you are logged into")
    .version(version);

  withConnectionOptions(
    program
      .command("discover")
      .description("Search for people and record new profiles")
      .argument("<query>", "People search keywords")
      .option("--max-pages <n>", "Result pages to visit", parsePositiveInt)
      .option("--quota <n>", "Daily discovery limit", parseNonNegativeInt)
      .option("--output <path>", "Write discovered profile URLs to a file"),
  ).action(handleDiscover);

  withConnectionOptions(
    program
      .command("connect")
      .description("Send connection invitations to profiles")
      .option("--targets <urls>", "Comma-separated profile URLs")
      .option("--targets-file <path>", "File with one profile URL per line")
      .option("--quota <n>", "Daily invitation limit", parseNonNegativeInt)
      .option("--no-note", "Send invitations without a note"),
  ).action(handleConnect);

  withConnectionOptions(
    program
      .command("follow-up")
      .description("Message connected profiles")
      .option("--targets <urls>", "Comma-separated profile URLs")
      .option("--targets-file <path>", "File with one profile URL per line")
      .option("--quota <n>", "Daily message limit", parseNonNegativeInt),
  ).action(handleFollowUp);

  withConnectionOptions(
    program
      .command("browse")
      .description("Idle through the main tabs along a named tour")
      .argument("[tour]", "Tour name (default: browse.tour from the configuration)")
      .option("--list", "List the available tours instead of running one"),
  ).action(handleBrowse);

  workflowArgument(program.command("campaign-status"))
    .description("Show a workflow's persisted progress")
    .option("--config <path>", "Configuration file (default: ./steadyhand.yaml)")
    .option("--json", "Output as JSON")
    .action(handleCampaignStatus);

  workflowArgument(program.command("campaign-reset"))
    .description("Forget a workflow's progress so every target is eligible again")
    .option("--config <path>", "Configuration file (default: ./steadyhand.yaml)")
    .addOption(
      new Option("--include-seen", "Also forget profiles discovery has seen"),
    )
    .option("--json", "Output as JSON")
    .action(handleCampaignReset);

  withConnectionOptions(
    program
      .command("check-browser")
      .description("Check that the browser's debugging endpoint answers"),
  ).action(handleCheckBrowser);

  return program;
}

#!/usr/bin/env node
/**
 * Document preview: prints the Block Kit JSON a document builder produces,
 * ready to paste into Slack's Block Kit Builder.
 *
 *   preview <document> [--compact]
 *
 * Documents: workflow, approval, task-modal, home, menu, task-prompt,
 * task-created, report, reminder
 */

import fs from "fs";
import { fileURLToPath } from "url";
import { approvalMessage, dashboardHome, taskModal } from "../blocks/documents.js";
import {
  automationMenu,
  dailyReport,
  pendingTasksReminder,
  taskCreated,
  taskPrompt,
  workflowExample,
} from "../blocks/messages.js";
import type { Block, View } from "../blocks/types.js";

type Document = Block[] | View;

const SAMPLE_DATE = new Date(2024, 0, 15, 9, 0, 0);

export const DOCUMENTS: Record<string, () => Document> = {
  workflow: () => workflowExample(),
  approval: () =>
    approvalMessage(
      "<@U0000000>",
      "Budget Approval",
      "Requesting approval for Q4 marketing budget",
      "req_1705309200000"
    ),
  "task-modal": () => taskModal(),
  home: () => dashboardHome(),
  menu: () => automationMenu(),
  "task-prompt": () => taskPrompt(),
  "task-created": () => taskCreated({ title: "Ship report", priority: "high", due_date: "" }),
  report: () => dailyReport({ totalTasks: 3, pendingApprovals: 1, activeWorkflows: 0 }, SAMPLE_DATE),
  reminder: () =>
    pendingTasksReminder([
      { title: "Ship report", priority: "high" },
      { title: "Review budget", priority: "medium" },
    ]),
};

export interface PreviewArgs {
  document: string | null;
  compact: boolean;
  help: boolean;
}

export function parseArgs(argv: string[]): PreviewArgs {
  const args: PreviewArgs = { document: null, compact: false, help: false };
  for (const arg of argv) {
    if (arg === "--help" || arg === "-h") {
      args.help = true;
    } else if (arg === "--compact") {
      args.compact = true;
    } else if (!args.document) {
      args.document = arg;
    }
  }
  return args;
}

export function usage(): string {
  return [
    "Usage: preview <document> [--compact]",
    "",
    `Documents: ${Object.keys(DOCUMENTS).join(", ")}`,
  ].join("\n");
}

/** Render a named document. Returns null for an unknown name. */
export function renderDocument(name: string, compact: boolean): string | null {
  const build = DOCUMENTS[name];
  if (!build) return null;
  const doc = build();
  // The Block Kit Builder takes message documents wrapped in { blocks }
  const payload = Array.isArray(doc) ? { blocks: doc } : doc;
  return compact ? JSON.stringify(payload) : JSON.stringify(payload, null, 2);
}

function main(): void {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    process.stdout.write(usage() + "\n");
    return;
  }
  if (!args.document) {
    process.stderr.write(usage() + "\n");
    process.exit(1);
  }

  const output = renderDocument(args.document, args.compact);
  if (output === null) {
    process.stderr.write(`Error: unknown document "${args.document}"\n\n${usage()}\n`);
    process.exit(1);
  }
  process.stdout.write(output + "\n");
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return fs.realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  main();
}

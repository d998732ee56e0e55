import fs from "fs";
import { describe, it, expect } from "vitest";
import {
  approvalMessage,
  dashboardHome,
  stepGlyph,
  taskModal,
  workflowMessage,
} from "../documents.js";
import type { ActionsBlock, Block, SectionBlock } from "../types.js";

function fixture(name: string): unknown {
  const url = new URL(`./fixtures/${name}.json`, import.meta.url);
  return JSON.parse(fs.readFileSync(url, "utf-8"));
}

function sectionTexts(blocks: Block[]): string[] {
  return blocks
    .filter((b): b is SectionBlock => b.type === "section")
    .map((b) => b.text.text);
}

const EXAMPLE_STEPS = [
  { name: "Step 1", description: "Description of step 1", status: "completed" },
  { name: "Step 2", description: "Description of step 2", status: "completed" },
  { name: "Step 3", description: "Description of step 3", status: "in_progress" },
  { name: "Step 4", description: "Description of step 4", status: "pending" },
];

describe("workflowMessage()", () => {
  it("matches the golden fixture", () => {
    const blocks = workflowMessage(
      "Example Workflow",
      "In Progress",
      "This is an example workflow automation",
      EXAMPLE_STEPS
    );
    expect(blocks).toStrictEqual(fixture("workflow-message"));
  });

  it("uses the done glyph only for an exact 'completed'", () => {
    expect(stepGlyph("completed")).toBe("✅");
    expect(stepGlyph("Completed")).toBe("⏳");
    expect(stepGlyph("in_progress")).toBe("⏳");
    expect(stepGlyph("pending")).toBe("⏳");
    expect(stepGlyph(undefined)).toBe("⏳");
  });

  it("numbers steps from 1 in input order", () => {
    const blocks = workflowMessage("W", "S", "D", [
      { name: "Zeta" },
      { name: "Alpha", status: "completed" },
      { name: "Mu" },
    ]);
    expect(sectionTexts(blocks).slice(1)).toEqual([
      "⏳ *Step 1:* Zeta\n__",
      "✅ *Step 2:* Alpha\n__",
      "⏳ *Step 3:* Mu\n__",
    ]);
  });

  it("has only the four leading blocks when there are no steps", () => {
    expect(workflowMessage("W", "S", "D", []).map((b) => b.type)).toEqual([
      "header",
      "section",
      "divider",
      "header",
    ]);
  });
});

describe("taskModal()", () => {
  it("matches the golden fixture", () => {
    expect(taskModal()).toStrictEqual(fixture("task-modal"));
  });

  it("offers exactly high, medium, low in that order", () => {
    const priority = taskModal().blocks[2];
    if (priority.type !== "input" || priority.element.type !== "static_select") {
      throw new Error("priority block is not a select input");
    }
    expect(priority.element.options.map((o) => o.value)).toEqual(["high", "medium", "low"]);
  });
});

describe("approvalMessage()", () => {
  it("matches the golden fixture", () => {
    const blocks = approvalMessage(
      "<@U0TEST01>",
      "Budget Approval",
      "Requesting approval for the offsite budget",
      "req_12345"
    );
    expect(blocks).toStrictEqual(fixture("approval-message"));
  });

  it("has three buttons in approve, reject, view-details order, all carrying the id", () => {
    const blocks = approvalMessage("someone", "Type", "Details", "req_777");
    const row = blocks.find((b): b is ActionsBlock => b.type === "actions");
    expect(row?.elements).toHaveLength(3);
    expect(
      row?.elements.map((e) => (e.type === "button" ? [e.action_id, e.style, e.value] : null))
    ).toEqual([
      ["approve_request", "primary", "req_777"],
      ["reject_request", "danger", "req_777"],
      ["view_details", undefined, "req_777"],
    ]);
  });

  it("ends with a context block quoting the id", () => {
    const blocks = approvalMessage("someone", "Type", "Details", "req_777");
    expect(blocks[blocks.length - 1]).toStrictEqual({
      type: "context",
      elements: [{ type: "mrkdwn", text: "Request ID: `req_777`" }],
    });
  });
});

describe("dashboardHome()", () => {
  it("matches the golden fixture", () => {
    expect(dashboardHome()).toStrictEqual(fixture("dashboard-home"));
  });

  it("returns a fresh document on every call", () => {
    const first = dashboardHome();
    first.blocks.pop();
    expect(dashboardHome().blocks).toHaveLength(8);
  });
});

import { describe, it, expect } from "vitest";
import { DOCUMENTS, parseArgs, renderDocument, usage } from "../preview.js";
import { taskModal } from "../../blocks/documents.js";
import { automationMenu } from "../../blocks/messages.js";

describe("parseArgs()", () => {
  it("takes the first positional as the document", () => {
    expect(parseArgs(["approval", "extra", "--compact"])).toEqual({
      document: "approval",
      compact: true,
      help: false,
    });
  });

  it("recognizes both help flags", () => {
    expect(parseArgs(["-h"]).help).toBe(true);
    expect(parseArgs(["--help"]).help).toBe(true);
  });

  it("leaves the document null when none is given", () => {
    expect(parseArgs([]).document).toBeNull();
  });
});

describe("renderDocument()", () => {
  it("wraps message documents in { blocks }", () => {
    expect(renderDocument("menu", true)).toBe(JSON.stringify({ blocks: automationMenu() }));
  });

  it("prints views as they are, indented by default", () => {
    expect(renderDocument("task-modal", false)).toBe(JSON.stringify(taskModal(), null, 2));
  });

  it("renders the report for a fixed sample date", () => {
    expect(renderDocument("report", true)).toContain("*Date:* 2024-01-15\\n*Total Tasks:* 3");
  });

  it("returns null for an unknown document", () => {
    expect(renderDocument("nope", false)).toBeNull();
  });

  it("can render every listed document", () => {
    for (const name of Object.keys(DOCUMENTS)) {
      expect(renderDocument(name, true)).not.toBeNull();
    }
  });
});

describe("usage()", () => {
  it("lists the documents", () => {
    expect(usage().split("\n")[2]).toBe(
      "Documents: workflow, approval, task-modal, home, menu, task-prompt, task-created, report, reminder"
    );
  });
});

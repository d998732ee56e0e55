import { describe, it, expect } from "vitest";
import {
  actions,
  button,
  context,
  datePicker,
  divider,
  header,
  input,
  mrkdwn,
  section,
  selectMenu,
  textInput,
} from "../builders.js";

describe("header()", () => {
  it("wraps text in an emoji-enabled plain_text object", () => {
    expect(header("Hello")).toStrictEqual({
      type: "header",
      text: { type: "plain_text", text: "Hello", emoji: true },
    });
  });
});

describe("section()", () => {
  it("renders mrkdwn text without an accessory key by default", () => {
    const block = section("*bold*");
    expect(block).toStrictEqual({ type: "section", text: { type: "mrkdwn", text: "*bold*" } });
    expect(Object.keys(block)).toEqual(["type", "text"]);
  });

  it("includes the accessory when given", () => {
    const accessory = button("Go", "go");
    expect(section("text", accessory).accessory).toBe(accessory);
  });
});

describe("button()", () => {
  it("has only type, text and action_id when no options are passed", () => {
    expect(Object.keys(button("Click", "click_me"))).toEqual(["type", "text", "action_id"]);
  });

  it("adds value, style and url when they are non-empty", () => {
    expect(
      button("Open", "open", { value: "42", style: "primary", url: "https://example.com" })
    ).toStrictEqual({
      type: "button",
      text: { type: "plain_text", text: "Open" },
      action_id: "open",
      value: "42",
      style: "primary",
      url: "https://example.com",
    });
  });

  it("omits options given as empty strings or undefined", () => {
    const el = button("Cancel", "cancel", { value: "", url: undefined, style: "danger" });
    expect(Object.keys(el)).toEqual(["type", "text", "action_id", "style"]);
  });
});

describe("actions()", () => {
  it("keeps element order", () => {
    const block = actions([button("A", "a"), button("B", "b"), button("C", "c")]);
    expect(block.elements.map((e) => e.action_id)).toEqual(["a", "b", "c"]);
  });

  it("does not share the caller's array", () => {
    const elements = [button("A", "a")];
    const block = actions(elements);
    elements.push(button("B", "b"));
    expect(block.elements).toHaveLength(1);
  });
});

describe("divider() and context()", () => {
  it("builds a bare divider", () => {
    expect(divider()).toStrictEqual({ type: "divider" });
  });

  it("builds a context block from text fragments", () => {
    expect(context([mrkdwn("one"), mrkdwn("two")])).toStrictEqual({
      type: "context",
      elements: [
        { type: "mrkdwn", text: "one" },
        { type: "mrkdwn", text: "two" },
      ],
    });
  });
});

describe("input()", () => {
  it("omits hint and optional by default", () => {
    const block = input("b1", "Label", textInput("a1"));
    expect(Object.keys(block)).toEqual(["type", "block_id", "label", "element"]);
  });

  it("adds a plain_text hint and optional: true when asked", () => {
    const block = input("b1", "Label", textInput("a1"), { hint: "Be brief", optional: true });
    expect(block.hint).toStrictEqual({ type: "plain_text", text: "Be brief" });
    expect(block.optional).toBe(true);
  });

  it("treats optional: false as absent", () => {
    expect("optional" in input("b1", "Label", textInput("a1"), { optional: false })).toBe(false);
  });
});

describe("textInput()", () => {
  it("is just type and action_id with no options", () => {
    expect(textInput("title_input")).toStrictEqual({
      type: "plain_text_input",
      action_id: "title_input",
    });
  });

  it("adds placeholder, initial_value and multiline", () => {
    expect(
      textInput("notes", { placeholder: "Type here", initialValue: "draft", multiline: true })
    ).toStrictEqual({
      type: "plain_text_input",
      action_id: "notes",
      placeholder: { type: "plain_text", text: "Type here" },
      initial_value: "draft",
      multiline: true,
    });
  });

  it("leaves multiline out when false", () => {
    expect("multiline" in textInput("notes", { multiline: false })).toBe(false);
  });
});

describe("selectMenu()", () => {
  it("maps options in order and defaults the placeholder", () => {
    const menu = selectMenu("pick", [
      { label: "One", value: "1" },
      { label: "Two", value: "2" },
    ]);
    expect(menu.placeholder).toStrictEqual({ type: "plain_text", text: "Select an option" });
    expect(menu.options).toStrictEqual([
      { text: { type: "plain_text", text: "One" }, value: "1" },
      { text: { type: "plain_text", text: "Two" }, value: "2" },
    ]);
  });
});

describe("datePicker()", () => {
  it("has a fixed placeholder and no initial_date by default", () => {
    expect(datePicker("due")).toStrictEqual({
      type: "datepicker",
      action_id: "due",
      placeholder: { type: "plain_text", text: "Select a date" },
    });
  });

  it("sets initial_date when given", () => {
    expect(datePicker("due", "2024-03-01").initial_date).toBe("2024-03-01");
  });
});

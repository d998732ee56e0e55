import type {
  ActionsBlock,
  ButtonElement,
  ButtonStyle,
  ContextBlock,
  DatePickerElement,
  DividerBlock,
  HeaderBlock,
  InputBlock,
  InputElement,
  InteractiveElement,
  Mrkdwn,
  PlainText,
  SectionBlock,
  StaticSelectElement,
  TextInputElement,
  TextObject,
} from "./types.js";

/**
 * Pure Block Kit constructors. Optional fields are spread in only when a
 * non-empty value is given, so an omitted option never shows up as an
 * empty or undefined key in the payload.
 */

export function plainText(text: string): PlainText {
  return { type: "plain_text", text };
}

export function mrkdwn(text: string): Mrkdwn {
  return { type: "mrkdwn", text };
}

export function header(text: string): HeaderBlock {
  return {
    type: "header",
    text: { type: "plain_text", text, emoji: true },
  };
}

export function section(text: string, accessory?: InteractiveElement): SectionBlock {
  return {
    type: "section",
    text: mrkdwn(text),
    ...(accessory ? { accessory } : {}),
  };
}

export interface ButtonOptions {
  value?: string;
  style?: ButtonStyle;
  url?: string;
}

export function button(text: string, actionId: string, opts: ButtonOptions = {}): ButtonElement {
  return {
    type: "button",
    text: plainText(text),
    action_id: actionId,
    ...(opts.value ? { value: opts.value } : {}),
    ...(opts.style ? { style: opts.style } : {}),
    ...(opts.url ? { url: opts.url } : {}),
  };
}

export function actions(elements: InteractiveElement[]): ActionsBlock {
  return { type: "actions", elements: [...elements] };
}

export function divider(): DividerBlock {
  return { type: "divider" };
}

export function context(elements: TextObject[]): ContextBlock {
  return { type: "context", elements: [...elements] };
}

export interface InputOptions {
  hint?: string;
  /** Marks the input as not required. */
  optional?: boolean;
}

export function input(
  blockId: string,
  label: string,
  element: InputElement,
  opts: InputOptions = {}
): InputBlock {
  return {
    type: "input",
    block_id: blockId,
    label: plainText(label),
    element,
    ...(opts.hint ? { hint: plainText(opts.hint) } : {}),
    ...(opts.optional ? { optional: true as const } : {}),
  };
}

export interface TextInputOptions {
  placeholder?: string;
  initialValue?: string;
  multiline?: boolean;
}

export function textInput(actionId: string, opts: TextInputOptions = {}): TextInputElement {
  return {
    type: "plain_text_input",
    action_id: actionId,
    ...(opts.placeholder ? { placeholder: plainText(opts.placeholder) } : {}),
    ...(opts.initialValue ? { initial_value: opts.initialValue } : {}),
    ...(opts.multiline ? { multiline: true as const } : {}),
  };
}

export interface MenuOption {
  label: string;
  value: string;
}

export function selectMenu(
  actionId: string,
  options: MenuOption[],
  placeholder = "Select an option"
): StaticSelectElement {
  return {
    type: "static_select",
    action_id: actionId,
    placeholder: plainText(placeholder),
    options: options.map((opt) => ({ text: plainText(opt.label), value: opt.value })),
  };
}

export function datePicker(actionId: string, initialDate?: string): DatePickerElement {
  return {
    type: "datepicker",
    action_id: actionId,
    placeholder: plainText("Select a date"),
    ...(initialDate ? { initial_date: initialDate } : {}),
  };
}

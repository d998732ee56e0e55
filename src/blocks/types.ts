// -------------------------------------------------------
// Block Kit payload shapes produced by the builders.
// Field names follow Slack's wire format (snake_case).
// -------------------------------------------------------

export interface PlainText {
  type: "plain_text";
  text: string;
  emoji?: boolean;
}

export interface Mrkdwn {
  type: "mrkdwn";
  text: string;
}

export type TextObject = PlainText | Mrkdwn;

export type ButtonStyle = "primary" | "danger";

export interface ButtonElement {
  type: "button";
  text: PlainText;
  action_id: string;
  value?: string;
  style?: ButtonStyle;
  url?: string;
}

export interface TextInputElement {
  type: "plain_text_input";
  action_id: string;
  placeholder?: PlainText;
  initial_value?: string;
  multiline?: true;
}

export interface SelectOption {
  text: PlainText;
  value: string;
}

export interface StaticSelectElement {
  type: "static_select";
  action_id: string;
  placeholder: PlainText;
  options: SelectOption[];
}

export interface DatePickerElement {
  type: "datepicker";
  action_id: string;
  placeholder: PlainText;
  initial_date?: string;
}

/** Elements that may sit in an actions row or a section accessory. */
export type InteractiveElement = ButtonElement | StaticSelectElement | DatePickerElement;

/** Elements that may be wrapped by an input block. */
export type InputElement = TextInputElement | StaticSelectElement | DatePickerElement;

export interface HeaderBlock {
  type: "header";
  text: PlainText;
}

export interface SectionBlock {
  type: "section";
  text: Mrkdwn;
  accessory?: InteractiveElement;
}

export interface ActionsBlock {
  type: "actions";
  elements: InteractiveElement[];
}

export interface DividerBlock {
  type: "divider";
}

export interface ContextBlock {
  type: "context";
  elements: TextObject[];
}

export interface InputBlock {
  type: "input";
  block_id: string;
  label: PlainText;
  element: InputElement;
  hint?: PlainText;
  optional?: true;
}

export type Block =
  | HeaderBlock
  | SectionBlock
  | ActionsBlock
  | DividerBlock
  | ContextBlock
  | InputBlock;

export interface ModalView {
  type: "modal";
  callback_id: string;
  title: PlainText;
  submit: PlainText;
  close: PlainText;
  blocks: Block[];
}

export interface HomeView {
  type: "home";
  blocks: Block[];
}

export type View = ModalView | HomeView;

export interface WorkflowStep {
  name: string;
  description?: string;
  status?: string;
}

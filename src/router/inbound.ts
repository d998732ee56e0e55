import { z } from "zod";
import { TaskField } from "../blocks/ids.js";
import { TASK_PRIORITIES, type TaskPriority } from "../store/automation-store.js";

// -------------------------------------------------------
// Normalized units of inbound work. The Slack adapter turns raw
// Bolt payloads into one of these before the router sees them.
// -------------------------------------------------------

export type Ack = () => Promise<void>;

export interface HomeOpenedEvent {
  category: "event";
  name: "app_home_opened";
  userId: string;
}

export interface MessageEvent {
  category: "event";
  name: "message";
  channelId: string;
  userId?: string;
  text: string;
  /** Posted by a bot (ours included); never answered. */
  fromBot: boolean;
}

export interface SlashCommand {
  category: "command";
  /** The command itself, e.g. "/automation". */
  name: string;
  userId: string;
  channelId: string;
  text: string;
  triggerId: string;
}

export interface BlockAction {
  category: "action";
  /** action_id of the element that fired. */
  name: string;
  userId: string;
  triggerId: string;
  channelId?: string;
  messageTs?: string;
  value?: string;
}

export interface ViewSubmission {
  category: "view_submission";
  /** callback_id of the submitted view. */
  name: string;
  userId: string;
  values: ViewStateValues;
}

export type EventUnit = HomeOpenedEvent | MessageEvent;
export type InboundUnit = EventUnit | SlashCommand | BlockAction | ViewSubmission;
export type InboundCategory = InboundUnit["category"];

export class InboundValidationError extends Error {
  readonly issues: z.ZodIssue[];

  constructor(kind: string, error: z.ZodError) {
    super(`Malformed ${kind} payload`);
    this.name = "InboundValidationError";
    this.issues = error.issues;
  }
}

function parseWith<T extends z.ZodTypeAny>(kind: string, schema: T, raw: unknown): z.infer<T> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new InboundValidationError(kind, result.error);
  }
  return result.data;
}

// ---- Events ----

const HomeOpenedSchema = z.object({
  type: z.literal("app_home_opened"),
  user: z.string(),
});

export function parseHomeOpened(raw: unknown): HomeOpenedEvent {
  const event = parseWith("app_home_opened", HomeOpenedSchema, raw);
  return { category: "event", name: "app_home_opened", userId: event.user };
}

const MessageSchema = z.object({
  type: z.literal("message"),
  channel: z.string(),
  user: z.string().optional(),
  text: z.string().optional(),
  subtype: z.string().optional(),
  bot_id: z.string().optional(),
});

export function parseMessage(raw: unknown): MessageEvent {
  const event = parseWith("message", MessageSchema, raw);
  return {
    category: "event",
    name: "message",
    channelId: event.channel,
    ...(event.user ? { userId: event.user } : {}),
    text: event.text ?? "",
    fromBot: event.subtype === "bot_message" || event.bot_id !== undefined,
  };
}

// ---- Slash commands ----

const CommandSchema = z.object({
  command: z.string(),
  user_id: z.string(),
  channel_id: z.string(),
  text: z.string().default(""),
  trigger_id: z.string(),
});

export function parseCommand(raw: unknown): SlashCommand {
  const body = parseWith("command", CommandSchema, raw);
  return {
    category: "command",
    name: body.command,
    userId: body.user_id,
    channelId: body.channel_id,
    text: body.text,
    triggerId: body.trigger_id,
  };
}

// ---- Block actions ----

const BlockActionSchema = z.object({
  type: z.literal("block_actions"),
  user: z.object({ id: z.string() }),
  trigger_id: z.string(),
  channel: z.object({ id: z.string() }).optional(),
  message: z.object({ ts: z.string() }).optional(),
  actions: z
    .array(
      z.object({
        action_id: z.string(),
        value: z.string().optional(),
      })
    )
    .min(1),
});

/** Only the first action of a block_actions payload is routed. */
export function parseAction(raw: unknown): BlockAction {
  const body = parseWith("block_actions", BlockActionSchema, raw);
  const [action] = body.actions;
  return {
    category: "action",
    name: action.action_id,
    userId: body.user.id,
    triggerId: body.trigger_id,
    ...(body.channel ? { channelId: body.channel.id } : {}),
    ...(body.message ? { messageTs: body.message.ts } : {}),
    ...(action.value ? { value: action.value } : {}),
  };
}

// ---- View submissions ----

const ViewStateValueSchema = z.object({
  type: z.string(),
  value: z.string().nullish(),
  selected_option: z.object({ value: z.string() }).nullish(),
  selected_date: z.string().nullish(),
});

const ViewStateValuesSchema = z.record(z.record(ViewStateValueSchema));

export type ViewStateValues = z.infer<typeof ViewStateValuesSchema>;

const ViewSubmissionSchema = z.object({
  type: z.literal("view_submission"),
  user: z.object({ id: z.string() }),
  view: z.object({
    callback_id: z.string(),
    state: z.object({ values: ViewStateValuesSchema }),
  }),
});

export function parseViewSubmission(raw: unknown): ViewSubmission {
  const body = parseWith("view_submission", ViewSubmissionSchema, raw);
  return {
    category: "view_submission",
    name: body.view.callback_id,
    userId: body.user.id,
    values: body.view.state.values,
  };
}

// ---- Task modal form ----

const TaskFormSchema = z.object({
  [TaskField.title.blockId]: z.object({
    [TaskField.title.actionId]: z.object({ value: z.string().min(1) }),
  }),
  [TaskField.description.blockId]: z
    .object({
      [TaskField.description.actionId]: z.object({ value: z.string().nullish() }),
    })
    .optional(),
  [TaskField.priority.blockId]: z.object({
    [TaskField.priority.actionId]: z.object({
      selected_option: z.object({ value: z.enum(TASK_PRIORITIES) }),
    }),
  }),
  [TaskField.dueDate.blockId]: z
    .object({
      [TaskField.dueDate.actionId]: z.object({ selected_date: z.string().nullish() }),
    })
    .optional(),
});

export interface TaskForm {
  title: string;
  description: string;
  priority: TaskPriority;
  dueDate: string;
}

/**
 * Read the task modal's submitted state. Title and priority are required;
 * the title is kept exactly as typed. A missing description or due date
 * comes back as "".
 */
export function parseTaskForm(values: ViewStateValues): TaskForm {
  const form = parseWith("task form", TaskFormSchema, values);
  return {
    title: form.task_title.title_input.value,
    description: form.task_description?.description_input.value ?? "",
    priority: form.task_priority.priority_select.selected_option.value,
    dueDate: form.task_due_date?.due_date_picker.selected_date ?? "",
  };
}

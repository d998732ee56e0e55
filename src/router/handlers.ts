import { approvalMessage, dashboardHome, taskModal } from "../blocks/documents.js";
import { ActionId, TASK_MODAL_CALLBACK_ID } from "../blocks/ids.js";
import {
  GREETING_TEXT,
  TASK_REJECTED_TEXT,
  approvalResolved,
  automationMenu,
  taskCreated,
  taskPrompt,
  workflowExample,
} from "../blocks/messages.js";
import type { ApprovalDecision } from "../store/automation-store.js";
import { deliver } from "../slack/deliver.js";
import type { EventRouter, Handler, HandlerContext } from "./event-router.js";
import {
  InboundValidationError,
  parseTaskForm,
  type BlockAction,
  type EventUnit,
  type SlashCommand,
  type TaskForm,
  type ViewSubmission,
} from "./inbound.js";

export const AUTOMATION_COMMAND = "/automation";

const EXAMPLE_APPROVAL = {
  type: "Budget Approval",
  details: "Requesting approval for Q4 marketing budget",
};

// ---- Shared senders ----

async function sendWorkflowExample(ctx: HandlerContext, channel: string): Promise<void> {
  await deliver("router", "send workflow example", () =>
    ctx.client.send(channel, workflowExample(), "Workflow status")
  );
}

async function sendTaskPrompt(ctx: HandlerContext, channel: string): Promise<void> {
  await deliver("router", "send task prompt", () =>
    ctx.client.send(channel, taskPrompt(), "Task management")
  );
}

/** Record a new pending approval and post its card to the channel. */
async function requestApproval(ctx: HandlerContext, channel: string, userId: string): Promise<void> {
  const approval = ctx.store.createApproval(
    { requester: userId, ...EXAMPLE_APPROVAL },
    ctx.now()
  );
  console.log(`[router] Created approval ${approval.id} for ${userId}`);

  const blocks = approvalMessage(
    `<@${userId}>`,
    approval.type,
    approval.details,
    approval.id
  );
  await deliver("router", "send approval request", () =>
    ctx.client.send(channel, blocks, "Approval request")
  );
}

// ---- Events ----

export const handleHomeOpened: Handler<EventUnit> = async (unit, ctx) => {
  if (unit.name !== "app_home_opened") return;
  const { userId } = unit;
  const ok = await deliver("router", "publish home tab", () =>
    ctx.client.publish(userId, dashboardHome())
  );
  if (ok) console.log(`[router] Published home tab for user ${userId}`);
};

/**
 * Keyword replies to channel messages. First match wins, in order:
 * greeting, workflow, task, approval. Anything else is ignored.
 */
export const handleMessage: Handler<EventUnit> = async (unit, ctx) => {
  if (unit.name !== "message" || unit.fromBot) return;

  const text = unit.text.toLowerCase();
  const channel = unit.channelId;

  if (text.includes("hello") || text.includes("hi")) {
    await deliver("router", "send greeting", () => ctx.client.send(channel, [], GREETING_TEXT));
  } else if (text.includes("workflow")) {
    await sendWorkflowExample(ctx, channel);
  } else if (text.includes("task")) {
    await sendTaskPrompt(ctx, channel);
  } else if (text.includes("approval")) {
    if (!unit.userId) return;
    await requestApproval(ctx, channel, unit.userId);
  }
};

// ---- Commands ----

export const handleAutomationCommand: Handler<SlashCommand> = async (unit, ctx) => {
  await deliver("router", "send command menu", () =>
    ctx.client.send(unit.channelId, automationMenu(), "Automation commands")
  );
};

// ---- Actions ----

export const handleOpenTaskModal: Handler<BlockAction> = async (unit, ctx) => {
  await deliver("router", "open task modal", () => ctx.client.open(unit.triggerId, taskModal()));
};

export const handleViewWorkflow: Handler<BlockAction> = async (unit, ctx) => {
  if (!unit.channelId) {
    console.warn(`[router] ${unit.name} fired outside a channel, nothing to post to`);
    return;
  }
  await sendWorkflowExample(ctx, unit.channelId);
};

export const handleRequestApproval: Handler<BlockAction> = async (unit, ctx) => {
  if (!unit.channelId) {
    console.warn(`[router] ${unit.name} fired outside a channel, nothing to post to`);
    return;
  }
  await requestApproval(ctx, unit.channelId, unit.userId);
};

/**
 * Approve/reject: record the decision, then replace the original card in
 * place with a read-only result (which drops its buttons).
 * An id the store does not know leaves the store untouched.
 */
function resolveRequest(decision: ApprovalDecision): Handler<BlockAction> {
  const label = decision === "approved" ? "Request approved" : "Request rejected";

  return async (unit, ctx) => {
    const requestId = unit.value;
    if (!requestId) return;

    const now = ctx.now();
    const updated = ctx.store.resolveApproval(requestId, decision, unit.userId, now);
    if (updated) {
      console.log(`[router] Approval ${requestId} ${decision} by ${unit.userId}`);
    }

    const { channelId, messageTs } = unit;
    if (!channelId || !messageTs) {
      console.warn(`[router] ${unit.name} for ${requestId} has no message to update`);
      return;
    }
    await deliver("router", `update approval ${requestId}`, () =>
      ctx.client.update(
        channelId,
        messageTs,
        approvalResolved(decision, requestId, unit.userId, now),
        label
      )
    );
  };
}

// ---- View submissions ----

function readTaskForm(unit: ViewSubmission): TaskForm | undefined {
  try {
    return parseTaskForm(unit.values);
  } catch (err) {
    if (!(err instanceof InboundValidationError)) throw err;
    for (const issue of err.issues) {
      console.warn(`[router] Task form rejected: [${issue.path.join(".")}] ${issue.message}`);
    }
    return undefined;
  }
}

export const handleTaskModalSubmit: Handler<ViewSubmission> = async (unit, ctx) => {
  const form = readTaskForm(unit);
  if (!form) {
    // The modal is already closed, so tell the submitter directly.
    await deliver("router", "send task rejection", () =>
      ctx.client.send(unit.userId, [], TASK_REJECTED_TEXT)
    );
    return;
  }

  const task = ctx.store.createTask(
    {
      title: form.title,
      description: form.description,
      priority: form.priority,
      dueDate: form.dueDate,
      createdBy: unit.userId,
    },
    ctx.now()
  );
  console.log(`[router] Created task ${task.id} for ${unit.userId}`);

  // A user id as channel delivers to the user's DM with the bot.
  await deliver("router", "send task confirmation", () =>
    ctx.client.send(unit.userId, taskCreated(task), `Task created: ${task.title}`)
  );
};

/** Wire the bot's dispatch table onto a router. */
export function registerAutomationHandlers(router: EventRouter): EventRouter {
  return router
    .on("event", "app_home_opened", handleHomeOpened)
    .on("event", "message", handleMessage)
    .on("command", AUTOMATION_COMMAND, handleAutomationCommand)
    .on("action", ActionId.OpenTaskModal, handleOpenTaskModal)
    .on("action", ActionId.ViewWorkflowExample, handleViewWorkflow)
    .on("action", ActionId.RequestApproval, handleRequestApproval)
    .on("action", ActionId.ApproveRequest, resolveRequest("approved"))
    .on("action", ActionId.RejectRequest, resolveRequest("rejected"))
    .on("view_submission", TASK_MODAL_CALLBACK_ID, handleTaskModalSubmit);
}

import {
  actions,
  button,
  context,
  datePicker,
  divider,
  header,
  input,
  mrkdwn,
  plainText,
  section,
  selectMenu,
  textInput,
} from "./builders.js";
import { ActionId, TASK_MODAL_CALLBACK_ID, TaskField } from "./ids.js";
import type { Block, HomeView, ModalView, WorkflowStep } from "./types.js";

const STEP_DONE = "✅";
const STEP_WAITING = "⏳";

/** Glyph for a workflow step: only an exact "completed" counts as done. */
export function stepGlyph(status: string | undefined): string {
  return status === "completed" ? STEP_DONE : STEP_WAITING;
}

/**
 * Workflow status message: title, status/description, then one section per
 * step in the order given, numbered from 1.
 */
export function workflowMessage(
  title: string,
  status: string,
  description: string,
  steps: WorkflowStep[]
): Block[] {
  const blocks: Block[] = [
    header(`🔄 ${title}`),
    section(`*Status:* ${status}\n*Description:* ${description}`),
    divider(),
    header("Workflow Steps"),
  ];

  steps.forEach((step, i) => {
    blocks.push(
      section(`${stepGlyph(step.status)} *Step ${i + 1}:* ${step.name}\n_${step.description ?? ""}_`)
    );
  });

  return blocks;
}

/** The task creation modal. Submissions come back under TASK_MODAL_CALLBACK_ID. */
export function taskModal(): ModalView {
  return {
    type: "modal",
    callback_id: TASK_MODAL_CALLBACK_ID,
    title: plainText("Create Task"),
    submit: plainText("Create"),
    close: plainText("Cancel"),
    blocks: [
      input(
        TaskField.title.blockId,
        "Task Title",
        textInput(TaskField.title.actionId, { placeholder: "Enter task title" })
      ),
      input(
        TaskField.description.blockId,
        "Description",
        textInput(TaskField.description.actionId, {
          placeholder: "Enter task description",
          multiline: true,
        }),
        { optional: true }
      ),
      input(
        TaskField.priority.blockId,
        "Priority",
        selectMenu(
          TaskField.priority.actionId,
          [
            { label: "High", value: "high" },
            { label: "Medium", value: "medium" },
            { label: "Low", value: "low" },
          ],
          "Select priority"
        )
      ),
      input(
        TaskField.dueDate.blockId,
        "Due Date",
        datePicker(TaskField.dueDate.actionId),
        { optional: true }
      ),
    ],
  };
}

/**
 * Approval card. The three buttons all carry the request id as their value;
 * the router tells them apart by action_id.
 */
export function approvalMessage(
  requester: string,
  requestType: string,
  details: string,
  requestId: string
): Block[] {
  return [
    header("📋 Approval Request"),
    section(`*Requester:* ${requester}\n*Type:* ${requestType}\n*Details:* ${details}`),
    divider(),
    actions([
      button("✅ Approve", ActionId.ApproveRequest, { value: requestId, style: "primary" }),
      button("❌ Reject", ActionId.RejectRequest, { value: requestId, style: "danger" }),
      button("ℹ️ View Details", ActionId.ViewDetails, { value: requestId }),
    ]),
    context([mrkdwn(`Request ID: \`${requestId}\``)]),
  ];
}

// Static for now: recent activity is not read from the store.
export function dashboardHome(): HomeView {
  return {
    type: "home",
    blocks: [
      header("🏠 Automation Dashboard"),
      section(
        "Welcome to your automation dashboard! Use the buttons below to manage your workflows."
      ),
      divider(),
      section("*Quick Actions*"),
      actions([
        button("📝 Create Task", ActionId.OpenTaskModal),
        button("🔄 View Workflows", ActionId.ViewWorkflows),
        button("📊 View Reports", ActionId.ViewReports),
      ]),
      divider(),
      section("*Recent Activity*"),
      context([mrkdwn("No recent activity")]),
    ],
  };
}

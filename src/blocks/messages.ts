import { format } from "date-fns";
import { actions, button, context, divider, header, mrkdwn, section } from "./builders.js";
import { workflowMessage } from "./documents.js";
import { ActionId } from "./ids.js";
import type { Block, WorkflowStep } from "./types.js";
import type { ApprovalDecision, StoreSummary, Task } from "../store/automation-store.js";

export const GREETING_TEXT = "Hello! 👋 Use `/automation` to get started with automations.";

export const TASK_REJECTED_TEXT =
  "Your task was not created: it needs a title and a priority of high, medium or low.";

/** Pending tasks listed by name in the hourly reminder. */
export const REMINDER_LIST_LIMIT = 5;

export const EXAMPLE_WORKFLOW_STEPS: WorkflowStep[] = [
  { name: "Data Collection", description: "Collecting data from sources", status: "completed" },
  { name: "Data Processing", description: "Processing collected data", status: "completed" },
  { name: "Report Generation", description: "Generating final report", status: "in_progress" },
  { name: "Notification", description: "Sending notifications", status: "pending" },
];

export function workflowExample(): Block[] {
  return workflowMessage(
    "Daily Report Automation",
    "In Progress",
    "Automated daily report generation workflow",
    EXAMPLE_WORKFLOW_STEPS
  );
}

/** Reply to the /automation slash command. */
export function automationMenu(): Block[] {
  return [
    header("🤖 Automation Commands"),
    section(
      "Available automation commands:\n\n" +
        "• *Workflow* - View workflow automation example\n" +
        "• *Task* - Create and manage tasks\n" +
        "• *Approval* - Request approvals\n" +
        "• *Schedule* - Schedule automated tasks"
    ),
    divider(),
    actions([
      button("🔄 View Workflow", ActionId.ViewWorkflowExample),
      button("📝 Create Task", ActionId.OpenTaskModal),
      button("📋 Request Approval", ActionId.RequestApproval),
    ]),
  ];
}

export function taskPrompt(): Block[] {
  return [
    header("📝 Task Management"),
    section("Click the button below to create a new task using our interactive modal."),
    actions([button("Create Task", ActionId.OpenTaskModal)]),
  ];
}

export function taskCreated(task: Pick<Task, "title" | "priority" | "due_date">): Block[] {
  return [
    header("✅ Task Created"),
    section(
      `*Title:* ${task.title}\n` +
        `*Priority:* ${task.priority}\n` +
        `*Due Date:* ${task.due_date || "Not set"}\n` +
        `*Status:* Pending`
    ),
  ];
}

/** Read-only card that replaces an approval request once it is decided. */
export function approvalResolved(
  decision: ApprovalDecision,
  requestId: string,
  userId: string,
  at: Date
): Block[] {
  const approved = decision === "approved";
  const stamp = format(at, "yyyy-MM-dd HH:mm:ss");
  return [
    header(approved ? "✅ Request Approved" : "❌ Request Rejected"),
    section(`Request \`${requestId}\` has been ${decision} by <@${userId}>`),
    context([mrkdwn(`${approved ? "Approved" : "Rejected"} at: ${stamp}`)]),
  ];
}

export function dailyReport(summary: StoreSummary, date: Date): Block[] {
  return [
    header("📊 Daily Automation Report"),
    section(
      `*Date:* ${format(date, "yyyy-MM-dd")}\n` +
        `*Total Tasks:* ${summary.totalTasks}\n` +
        `*Pending Approvals:* ${summary.pendingApprovals}\n` +
        `*Active Workflows:* ${summary.activeWorkflows}`
    ),
    divider(),
    section("*Summary*\nAll systems are running smoothly! ✅"),
  ];
}

/**
 * Reminder for pending tasks. The count is always the full total even
 * though only the first REMINDER_LIST_LIMIT tasks are listed.
 */
export function pendingTasksReminder(pending: Pick<Task, "title" | "priority">[]): Block[] {
  const list = pending
    .slice(0, REMINDER_LIST_LIMIT)
    .map((t) => `• ${t.title} (Priority: ${t.priority})`)
    .join("\n");

  return [
    header("⏰ Pending Tasks Reminder"),
    section(`You have ${pending.length} pending task(s):\n\n${list}`),
    actions([button("View All Tasks", ActionId.ViewTasks)]),
  ];
}

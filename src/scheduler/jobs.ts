import { dailyReport, pendingTasksReminder } from "../blocks/messages.js";
import type { AutomationStore } from "../store/automation-store.js";
import type { OutboundClient } from "../slack/outbound-client.js";
import { deliver } from "../slack/deliver.js";
import type { JobDefinition } from "./job-runner.js";

export interface JobDeps {
  store: AutomationStore;
  client: OutboundClient;
  /** Channel the report and reminders go to. */
  channel: string;
  now?: () => Date;
}

export interface JobSchedules {
  dailyReportCron: string;
  taskReminderCron: string;
}

export async function sendDailyReport(deps: JobDeps): Promise<void> {
  const now = deps.now ? deps.now() : new Date();
  const blocks = dailyReport(deps.store.summary(), now);
  const ok = await deliver("jobs", "send daily report", () =>
    deps.client.send(deps.channel, blocks, "Daily automation report")
  );
  if (ok) console.log("[jobs] Sent daily report");
}

/** Remind the channel about pending tasks. Sends nothing when there are none. */
export async function checkPendingTasks(deps: JobDeps): Promise<void> {
  const pending = deps.store.pendingTasks();
  if (pending.length === 0) return;

  const ok = await deliver("jobs", "send pending tasks reminder", () =>
    deps.client.send(deps.channel, pendingTasksReminder(pending), "Pending tasks reminder")
  );
  if (ok) console.log(`[jobs] Sent reminder for ${pending.length} pending tasks`);
}

export function automationJobs(deps: JobDeps, schedules: JobSchedules): JobDefinition[] {
  return [
    { name: "daily_report", cron: schedules.dailyReportCron, run: () => sendDailyReport(deps) },
    { name: "task_reminder", cron: schedules.taskReminderCron, run: () => checkPendingTasks(deps) },
  ];
}

import { z } from "zod";
import { Collection } from "./collection.js";

export const TaskSchema = z.object({
  id: z.string(),
  title: z.string().min(1),
  description: z.string(),
  priority: z.enum(["high", "medium", "low"]),
  due_date: z.string(),
  created_by: z.string(),
  created_at: z.string(),
  status: z.enum(["pending", "in_progress", "completed"]),
});

export const ApprovalSchema = z.object({
  id: z.string(),
  requester: z.string(),
  type: z.string(),
  details: z.string(),
  status: z.enum(["pending", "approved", "rejected"]),
  created_at: z.string(),
  approved_by: z.string().optional(),
  approved_at: z.string().optional(),
  rejected_by: z.string().optional(),
  rejected_at: z.string().optional(),
});

/** Reserved slot: nothing populates workflows yet. */
export const WorkflowSchema = z.object({
  id: z.string(),
  name: z.string(),
  status: z.string(),
  created_at: z.string(),
});

export type Task = z.infer<typeof TaskSchema>;
export type TaskPriority = Task["priority"];
export type Approval = z.infer<typeof ApprovalSchema>;
export type ApprovalDecision = "approved" | "rejected";
export type Workflow = z.infer<typeof WorkflowSchema>;

export const TASK_PRIORITIES = TaskSchema.shape.priority.options;

export interface NewTask {
  title: string;
  description?: string;
  priority: TaskPriority;
  dueDate?: string;
  createdBy: string;
}

export interface NewApproval {
  requester: string;
  type: string;
  details: string;
}

export interface StoreSummary {
  totalTasks: number;
  pendingApprovals: number;
  activeWorkflows: number;
}

/**
 * Process-wide automation state: tasks, workflows and approval requests.
 * Constructed once at startup and handed to the event router and job runner.
 *
 * No locking. Each call runs to completion on the event loop, so two
 * resolutions of the same approval simply land in arrival order
 * (last write wins).
 */
export class AutomationStore {
  readonly tasks = new Collection<Task>();
  readonly workflows = new Collection<Workflow>();
  readonly approvals = new Collection<Approval>();

  /** Last millisecond handed out as an id, so ids stay unique within a process. */
  private lastIdMs = 0;

  /** Time-based id: `<prefix>_<epoch ms>`, bumped forward on a same-ms collision. */
  nextId(prefix: string, now: Date = new Date()): string {
    const ms = Math.max(now.getTime(), this.lastIdMs + 1);
    this.lastIdMs = ms;
    return `${prefix}_${ms}`;
  }

  createTask(data: NewTask, now: Date = new Date()): Task {
    const task = TaskSchema.parse({
      id: this.nextId("task", now),
      title: data.title,
      description: data.description ?? "",
      priority: data.priority,
      due_date: data.dueDate ?? "",
      created_by: data.createdBy,
      created_at: now.toISOString(),
      status: "pending",
    });
    return this.tasks.append(task);
  }

  createApproval(data: NewApproval, now: Date = new Date()): Approval {
    const approval = ApprovalSchema.parse({
      id: this.nextId("req", now),
      requester: data.requester,
      type: data.type,
      details: data.details,
      status: "pending",
      created_at: now.toISOString(),
    });
    return this.approvals.append(approval);
  }

  /**
   * Move an approval to its final status and stamp who decided and when.
   * Unknown ids are a silent no-op (returns undefined).
   */
  resolveApproval(
    id: string,
    decision: ApprovalDecision,
    userId: string,
    now: Date = new Date()
  ): Approval | undefined {
    const at = now.toISOString();
    return this.approvals.findAndUpdate(
      (a) => a.id === id,
      (a) => {
        a.status = decision;
        if (decision === "approved") {
          a.approved_by = userId;
          a.approved_at = at;
        } else {
          a.rejected_by = userId;
          a.rejected_at = at;
        }
      }
    );
  }

  pendingTasks(): Task[] {
    return this.tasks.filter((t) => t.status === "pending");
  }

  summary(): StoreSummary {
    return {
      totalTasks: this.tasks.size,
      pendingApprovals: this.approvals.filter((a) => a.status === "pending").length,
      activeWorkflows: this.workflows.size,
    };
  }
}

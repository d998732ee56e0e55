/** Stable identifiers shared by the documents and the event router. */

export const ActionId = {
  OpenTaskModal: "open_task_modal",
  ViewWorkflowExample: "view_workflow_example",
  RequestApproval: "request_approval",
  ApproveRequest: "approve_request",
  RejectRequest: "reject_request",
  ViewDetails: "view_details",
  ViewWorkflows: "view_workflows",
  ViewReports: "view_reports",
  ViewTasks: "view_tasks",
} as const;

export type ActionId = (typeof ActionId)[keyof typeof ActionId];

export const TASK_MODAL_CALLBACK_ID = "create_task_modal";

/** block_id / action_id pairs of the task modal inputs. */
export const TaskField = {
  title: { blockId: "task_title", actionId: "title_input" },
  description: { blockId: "task_description", actionId: "description_input" },
  priority: { blockId: "task_priority", actionId: "priority_select" },
  dueDate: { blockId: "task_due_date", actionId: "due_date_picker" },
} as const;

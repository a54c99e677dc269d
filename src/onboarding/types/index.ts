/**
 * Common types for the onboarding workflow
 */

export interface Employee {
  readonly name: string;
  readonly email: string;
  readonly department: string;
  readonly startDate: string; // YYYY-MM-DD
  readonly manager: string;
}

export type ChecklistTaskStatus = 'completed' | 'pending';

export interface ChecklistTask {
  task: string;
  status: ChecklistTaskStatus;
  owner: string;
}

export interface Checklist {
  employee: string;
  created: string; // ISO timestamp
  tasks: ChecklistTask[];
}

/**
 * One line of the metrics log. Field names match the persisted JSON.
 */
export interface WorkflowMetrics {
  timestamp: string;
  employees_processed: number;
  success_count: number;
  success_rate: number;
  workflow_duration: string;
}

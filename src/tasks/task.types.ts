/**
 * Agent Task Types
 */

export type TaskStatus = 'pending' | 'running' | 'completed' | 'failed';

export const TERMINAL_STATUSES: readonly TaskStatus[] = ['completed', 'failed'];

/**
 * Allowed status transitions. Terminal states have none.
 */
export const TASK_TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  pending: ['running', 'failed'],
  running: ['completed', 'failed'],
  completed: [],
  failed: [],
};

export interface TaskOptions {
  /** Step budget for the agent */
  maxSteps: number;
  /** LLM model identifier */
  model: string;
  /** Send screenshots to the model */
  useVision: boolean;
}

/**
 * Task against a registered session
 */
export interface TaskSubmission extends TaskOptions {
  description: string;
  sessionId: string;
}

/**
 * Task that provisions, uses and closes its own private session
 */
export interface IsolatedTaskSubmission extends TaskOptions {
  description: string;
  allowedDomains: string[];
  headless: boolean;
}

export interface AgentTaskResult {
  final_result: string | null;
  steps: number;
  urls_visited: string[];
}

/**
 * Task record as reported to clients
 */
export interface AgentTask {
  task_id: string;
  session_id: string;
  isolated: boolean;
  description: string;
  max_steps: number;
  model: string;
  use_vision: boolean;
  status: TaskStatus;
  result?: AgentTaskResult;
  error?: string;
  created_at: string;
  started_at?: string;
  completed_at?: string;
}

/**
 * Agent Runner Capability
 *
 * Drives a browser session autonomously from a task description.
 */

import type { BrowserSessionHandle } from '../browser/browser-session-handle.js';

export interface AgentRunRequest {
  taskId: string;
  description: string;
  maxSteps: number;
  model: string;
  useVision: boolean;
  browser: BrowserSessionHandle;
  /** Fires when the task's time budget runs out */
  signal: AbortSignal;
}

export interface AgentRunResult {
  /** True when the agent declared the task done */
  success: boolean;
  finalResult: string | null;
  steps: number;
  urlsVisited: string[];
  /** Errors hit along the way, oldest first */
  errors: string[];
}

export interface AgentRunner {
  run(request: AgentRunRequest): Promise<AgentRunResult>;
}

/**
 * Task Manager
 *
 * Accepts agent tasks, returns their ids at once and runs them on their own
 * scheduled units, independent of request handling and of each other.
 * Every outcome of the agent capability, including thrown errors and
 * timeouts, ends in a terminal status on the task record; nothing escapes
 * to the caller that submitted it.
 */

import { randomUUID } from 'crypto';
import type { SessionRegistry } from '../session/session-registry.js';
import type { AgentRunner, AgentRunResult } from './agent-runner.js';
import {
  TASK_TRANSITIONS,
  TERMINAL_STATUSES,
  type AgentTask,
  type AgentTaskResult,
  type IsolatedTaskSubmission,
  type TaskStatus,
  type TaskSubmission,
} from './task.types.js';
import { withTimeout } from '../lib/with-timeout.js';
import { OrchestratorError, extractErrorMessage } from '../shared/errors/index.js';
import { createLogger } from '../shared/services/logging.service.js';

const logger = createLogger('TaskManager');

/**
 * Configuration for TaskManager
 */
export interface TaskManagerConfig {
  registry: SessionRegistry;
  runner: AgentRunner;
  /** Ceiling for one task run (ms, 0 disables) */
  taskTimeoutMs: number;
  /** Keep terminal tasks this long before eviction (ms, 0 keeps them forever) */
  retentionMs?: number;
  /** Interval for evicting expired task records (ms) */
  cleanupIntervalMs?: number;
}

interface TaskRecord {
  id: string;
  sessionId: string;
  isolated: boolean;
  description: string;
  maxSteps: number;
  model: string;
  useVision: boolean;
  status: TaskStatus;
  result?: AgentTaskResult;
  error?: string;
  createdAt: number;
  startedAt?: number;
  completedAt?: number;
}

type TaskBody = (signal: AbortSignal) => Promise<AgentRunResult>;

export class TaskManager {
  private readonly registry: SessionRegistry;
  private readonly runner: AgentRunner;
  private readonly taskTimeoutMs: number;
  private readonly retentionMs: number;
  private readonly tasks = new Map<string, TaskRecord>();
  /** Settles when the task reaches a terminal state */
  private readonly completions = new Map<string, Promise<void>>();
  private cleanupIntervalId: NodeJS.Timeout | null = null;

  constructor(config: TaskManagerConfig) {
    this.registry = config.registry;
    this.runner = config.runner;
    this.taskTimeoutMs = config.taskTimeoutMs;
    this.retentionMs = config.retentionMs ?? 0;

    if (this.retentionMs > 0 && config.cleanupIntervalMs && config.cleanupIntervalMs > 0) {
      this.startCleanupInterval(config.cleanupIntervalMs);
    }
  }

  /**
   * Number of tasks not yet in a terminal state
   */
  get activeCount(): number {
    let count = 0;
    for (const record of this.tasks.values()) {
      if (!TERMINAL_STATUSES.includes(record.status)) count++;
    }
    return count;
  }

  /**
   * Submit a task against a registered session.
   * The session is pinned for the duration of the run.
   *
   * @returns The pending task
   */
  submit(submission: TaskSubmission): AgentTask {
    const record = this.createRecord(submission, submission.sessionId, false);

    this.schedule(record, async (signal) => {
      const session = this.registry.acquire(submission.sessionId);
      try {
        return await this.runner.run({
          taskId: record.id,
          description: submission.description,
          maxSteps: submission.maxSteps,
          model: submission.model,
          useVision: submission.useVision,
          browser: session.handle,
          signal,
        });
      } finally {
        this.registry.release(session);
      }
    });

    return this.toView(record);
  }

  /**
   * Submit a task that runs in its own private session. The session is
   * provisioned when the run starts and closed when it ends, whatever the outcome.
   *
   * @returns The pending task
   */
  submitIsolated(submission: IsolatedTaskSubmission): AgentTask {
    const record = this.createRecord(submission, `task-session-${randomUUID()}`, true);

    this.schedule(record, async (signal) => {
      const handle = await this.registry.openDetached({
        headless: submission.headless,
        allowedDomains: submission.allowedDomains,
      });
      const release = (): Promise<void> =>
        handle.close().catch((error: unknown) => {
          logger.warning('Failed to close task session', {
            taskId: record.id,
            errorMessage: extractErrorMessage(error),
          });
        });
      const onAbort = (): void => {
        void release();
      };
      signal.addEventListener('abort', onAbort, { once: true });

      try {
        return await this.runner.run({
          taskId: record.id,
          description: submission.description,
          maxSteps: submission.maxSteps,
          model: submission.model,
          useVision: submission.useVision,
          browser: handle,
          signal,
        });
      } finally {
        signal.removeEventListener('abort', onAbort);
        await release();
      }
    });

    return this.toView(record);
  }

  /**
   * Current state of a task
   *
   * @throws OrchestratorError NOT_FOUND if the id was never issued or has been evicted
   */
  getStatus(taskId: string): AgentTask {
    const record = this.tasks.get(taskId);
    if (!record) {
      throw OrchestratorError.taskNotFound(taskId);
    }
    return this.toView(record);
  }

  /**
   * All retained tasks, oldest first
   */
  list(): AgentTask[] {
    return Array.from(this.tasks.values(), (record) => this.toView(record));
  }

  /**
   * Resolves once the task is terminal
   *
   * @throws OrchestratorError NOT_FOUND for unknown ids
   */
  async settled(taskId: string): Promise<AgentTask> {
    const completion = this.completions.get(taskId);
    if (completion) {
      await completion;
    }
    return this.getStatus(taskId);
  }

  /**
   * Evict terminal tasks older than the retention period
   *
   * @returns Number of records evicted
   */
  cleanupExpired(now: number = Date.now()): number {
    if (this.retentionMs <= 0) return 0;

    let evicted = 0;
    for (const [taskId, record] of this.tasks.entries()) {
      if (record.completedAt !== undefined && now - record.completedAt > this.retentionMs) {
        this.tasks.delete(taskId);
        evicted++;
      }
    }

    if (evicted > 0) {
      logger.debug('Evicted expired tasks', { count: evicted });
    }
    return evicted;
  }

  /**
   * Stop eviction and wait for running tasks, at most `timeoutMs`.
   * Tasks still unfinished afterwards are marked failed.
   */
  async shutdown(timeoutMs = 10000): Promise<void> {
    this.stop();

    const inFlight = Array.from(this.completions.values());
    if (inFlight.length > 0) {
      logger.info('Waiting for running tasks', { count: inFlight.length });
      try {
        await withTimeout(Promise.all(inFlight), timeoutMs, () =>
          OrchestratorError.timeout('Task drain', timeoutMs)
        );
      } catch (error) {
        logger.warning('Tasks still running at shutdown', {
          errorMessage: extractErrorMessage(error),
        });
      }
    }

    for (const record of this.tasks.values()) {
      this.transition(record, 'failed', { error: 'Server shut down before the task finished' });
    }
  }

  /**
   * Stop the eviction interval
   */
  stop(): void {
    if (this.cleanupIntervalId) {
      clearInterval(this.cleanupIntervalId);
      this.cleanupIntervalId = null;
    }
  }

  private createRecord(
    submission: TaskSubmission | IsolatedTaskSubmission,
    sessionId: string,
    isolated: boolean
  ): TaskRecord {
    const record: TaskRecord = {
      id: `task-${randomUUID()}`,
      sessionId,
      isolated,
      description: submission.description,
      maxSteps: submission.maxSteps,
      model: submission.model,
      useVision: submission.useVision,
      status: 'pending',
      createdAt: Date.now(),
    };
    this.tasks.set(record.id, record);

    logger.info('Task submitted', {
      taskId: record.id,
      sessionId,
      isolated,
      maxSteps: record.maxSteps,
      model: record.model,
    });
    return record;
  }

  private schedule(record: TaskRecord, body: TaskBody): void {
    const completion = new Promise<void>((resolve) => {
      setImmediate(() => {
        void this.execute(record, body).finally(() => resolve());
      });
    });
    this.completions.set(record.id, completion);
  }

  /**
   * Never rejects
   */
  private async execute(record: TaskRecord, body: TaskBody): Promise<void> {
    try {
      if (!this.transition(record, 'running')) {
        return;
      }

      const controller = new AbortController();
      try {
        const outcome = await withTimeout(body(controller.signal), this.taskTimeoutMs, () => {
          controller.abort();
          return OrchestratorError.timeout(`Task ${record.id}`, this.taskTimeoutMs);
        });
        this.finish(record, outcome);
      } catch (error) {
        this.transition(record, 'failed', { error: extractErrorMessage(error) });
      }
    } catch (error) {
      logger.critical(
        'Task bookkeeping failed',
        error instanceof Error ? error : undefined,
        { taskId: record.id }
      );
    } finally {
      this.completions.delete(record.id);
    }
  }

  private finish(record: TaskRecord, outcome: AgentRunResult): void {
    const result: AgentTaskResult = {
      final_result: outcome.finalResult,
      steps: outcome.steps,
      urls_visited: outcome.urlsVisited,
    };

    if (outcome.success) {
      this.transition(record, 'completed', { result });
      return;
    }

    const error =
      outcome.errors.at(-1) ??
      outcome.finalResult ??
      `Agent did not finish the task within ${record.maxSteps} steps`;
    this.transition(record, 'failed', { error: error || 'Agent failed without a message' });
  }

  /**
   * Apply a transition if the state machine allows it
   *
   * @returns Whether the transition happened
   */
  private transition(
    record: TaskRecord,
    next: TaskStatus,
    outcome: { result?: AgentTaskResult; error?: string } = {}
  ): boolean {
    if (!TASK_TRANSITIONS[record.status].includes(next)) {
      return false;
    }

    const now = Date.now();
    record.status = next;
    if (next === 'running') {
      record.startedAt = now;
    } else {
      record.completedAt = now;
    }
    if (next === 'completed') {
      record.result = outcome.result;
    }
    if (next === 'failed') {
      record.error = outcome.error;
    }

    if (next === 'failed') {
      logger.warning('Task failed', { taskId: record.id, error: record.error });
    } else {
      logger.info(`Task ${next}`, { taskId: record.id });
    }
    return true;
  }

  private toView(record: TaskRecord): AgentTask {
    const view: AgentTask = {
      task_id: record.id,
      session_id: record.sessionId,
      isolated: record.isolated,
      description: record.description,
      max_steps: record.maxSteps,
      model: record.model,
      use_vision: record.useVision,
      status: record.status,
      created_at: new Date(record.createdAt).toISOString(),
    };
    if (record.result) view.result = { ...record.result, urls_visited: [...record.result.urls_visited] };
    if (record.error !== undefined) view.error = record.error;
    if (record.startedAt !== undefined) view.started_at = new Date(record.startedAt).toISOString();
    if (record.completedAt !== undefined) {
      view.completed_at = new Date(record.completedAt).toISOString();
    }
    return view;
  }

  private startCleanupInterval(intervalMs: number): void {
    this.cleanupIntervalId = setInterval(() => {
      try {
        this.cleanupExpired();
      } catch (error) {
        logger.error('Task eviction failed', error instanceof Error ? error : undefined);
      }
    }, intervalMs);
    this.cleanupIntervalId.unref();
  }
}

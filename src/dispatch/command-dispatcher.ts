/**
 * Command Dispatcher
 *
 * Single entry point for every operation. Looks the name up in a closed table,
 * validates the parameters against that operation's schema before touching
 * any session, and routes to the registry, a session handle, the extractor
 * or the task manager.
 */

import type { z } from 'zod';
import type { BrowserSessionHandle } from '../browser/browser-session-handle.js';
import type { ContentExtractor } from '../extraction/content-extractor.js';
import type { SessionRegistry } from '../session/session-registry.js';
import type { SessionConfig } from '../session/session.types.js';
import type { TaskManager } from '../tasks/task-manager.js';
import { OrchestratorError, toOrchestratorError } from '../shared/errors/index.js';
import { createLogger } from '../shared/services/logging.service.js';
import * as Schemas from './operation.schemas.js';

const logger = createLogger('CommandDispatcher');

export const OPERATION_NAMES = [
  'create_browser_session',
  'list_browser_sessions',
  'close_browser_session',
  'browser_navigate',
  'browser_click',
  'browser_type',
  'browser_key',
  'browser_scroll',
  'browser_go_back',
  'browser_get_state',
  'browser_list_tabs',
  'browser_switch_tab',
  'browser_close_tab',
  'browser_extract_content',
  'run_agent_task',
  'retry_with_agent',
  'get_agent_task_status',
  'list_agent_tasks',
] as const;

export type OperationName = (typeof OPERATION_NAMES)[number];

export type OperationKind = 'session' | 'browser' | 'extraction' | 'task';

export function isOperationName(name: string): name is OperationName {
  return OPERATION_NAMES.some((known) => known === name);
}

/**
 * Operation as listed to clients
 */
export interface OperationDescriptor {
  name: OperationName;
  kind: OperationKind;
  title: string;
  description: string;
  parameters: { name: string; required: boolean; description?: string }[];
}

/**
 * Table entry with its handler bound to validated input
 */
export interface RegisteredOperation {
  kind: OperationKind;
  title: string;
  description: string;
  schema: z.AnyZodObject;
  execute(params: unknown): Promise<unknown>;
}

interface OperationDefinition<S extends z.AnyZodObject> {
  kind: OperationKind;
  title: string;
  description: string;
  schema: S;
  handler: (params: z.output<S>) => Promise<unknown>;
}

function defineOperation<S extends z.AnyZodObject>(
  definition: OperationDefinition<S>
): RegisteredOperation {
  const { kind, title, description, schema, handler } = definition;
  return {
    kind,
    title,
    description,
    schema,
    execute: async (params: unknown) => {
      const parsed = schema.safeParse(params ?? {});
      if (!parsed.success) {
        const issues = parsed.error.issues;
        const summary = issues
          .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
          .join('; ');
        throw OrchestratorError.invalidParameters(`Invalid parameters: ${summary}`, issues);
      }
      return handler(parsed.data);
    },
  };
}

/**
 * Collaborators the dispatcher routes to
 */
export interface CommandDispatcherDeps {
  registry: SessionRegistry;
  tasks: TaskManager;
  extractor: ContentExtractor;
  /** Model used when a task submission names none */
  defaultModel: string;
}

export class CommandDispatcher {
  private readonly operations: Record<OperationName, RegisteredOperation>;

  constructor(private readonly deps: CommandDispatcherDeps) {
    this.operations = this.buildOperations();
  }

  /**
   * Run an operation by name.
   *
   * @throws OrchestratorError UNKNOWN_OPERATION for names outside the table,
   *   INVALID_PARAMETERS when validation fails, or whatever the operation raised
   */
  async invoke(operationName: string, parameters: unknown): Promise<unknown> {
    if (!isOperationName(operationName)) {
      throw OrchestratorError.unknownOperation(operationName, OPERATION_NAMES);
    }

    const operation = this.operations[operationName];
    const startTime = Date.now();
    logger.debug(`Executing operation: ${operationName}`);

    try {
      const result = await operation.execute(parameters);
      logger.debug(`Operation ${operationName} completed in ${Date.now() - startTime}ms`);
      return result;
    } catch (error) {
      const classified = toOrchestratorError(error, operationName);
      logger.warning(`Operation ${operationName} failed after ${Date.now() - startTime}ms`, {
        code: classified.code,
        message: classified.message,
      });
      throw classified;
    }
  }

  /**
   * Table entry for an operation
   */
  operation(name: OperationName): RegisteredOperation {
    return this.operations[name];
  }

  /**
   * Every operation with its parameters, in table order
   */
  describeOperations(): OperationDescriptor[] {
    return OPERATION_NAMES.map((name) => {
      const { kind, title, description, schema } = this.operations[name];
      const shape: z.ZodRawShape = schema.shape;
      return {
        name,
        kind,
        title,
        description,
        parameters: Object.entries(shape).map(([field, type]) => ({
          name: field,
          required: !type.isOptional(),
          description: type.description,
        })),
      };
    });
  }

  /**
   * Resolve the session, run a command on its handle and record the activity
   */
  private async onSession<T>(
    sessionId: string,
    command: (handle: BrowserSessionHandle) => Promise<T>
  ): Promise<T> {
    const { registry } = this.deps;
    const session = await registry.resolve(sessionId);
    const result = await command(session.handle);
    registry.touch(session.id);
    return result;
  }

  private buildOperations(): Record<OperationName, RegisteredOperation> {
    const { registry, tasks, extractor, defaultModel } = this.deps;

    return {
      // ==================== Session lifecycle ====================

      create_browser_session: defineOperation({
        kind: 'session',
        title: 'Create Browser Session',
        description: 'Start a new browser session with its own configuration',
        schema: Schemas.CreateSessionInputSchema,
        handler: async (params) => {
          const config: Partial<SessionConfig> = {};
          if (params.headless !== undefined) config.headless = params.headless;
          if (params.allowed_domains !== undefined) config.allowedDomains = params.allowed_domains;
          if (params.wait_between_actions !== undefined) {
            config.waitBetweenActionsMs = Math.round(params.wait_between_actions * 1000);
          }
          const session = await registry.create(params.session_id, config);
          return registry.summarize(session);
        },
      }),

      list_browser_sessions: defineOperation({
        kind: 'session',
        title: 'List Browser Sessions',
        description: 'List registered sessions with their status and tab count',
        schema: Schemas.ListSessionsInputSchema,
        handler: async () => {
          const sessions = registry.list();
          return { sessions, count: sessions.length };
        },
      }),

      close_browser_session: defineOperation({
        kind: 'session',
        title: 'Close Browser Session',
        description: 'Close a session and release its browser',
        schema: Schemas.CloseSessionInputSchema,
        handler: async ({ session_id }) => {
          await registry.close(session_id);
          return { session_id, closed: true };
        },
      }),

      // ==================== Browser control ====================

      browser_navigate: defineOperation({
        kind: 'browser',
        title: 'Navigate',
        description: 'Open a URL in the active tab, or in a new tab that becomes active',
        schema: Schemas.NavigateInputSchema,
        handler: ({ session_id, url, new_tab }) =>
          this.onSession(session_id, async (handle) => {
            const result = await handle.navigate(url, new_tab);
            return {
              session_id,
              url: result.url,
              title: result.title,
              tab_count: result.tabCount,
              active_tab: result.activeTab,
            };
          }),
      }),

      browser_click: defineOperation({
        kind: 'browser',
        title: 'Click Element',
        description: 'Click an interactive element by index; with new_tab, open a link in a new tab',
        schema: Schemas.ClickInputSchema,
        handler: ({ session_id, index, new_tab }) =>
          this.onSession(session_id, async (handle) => {
            const result = await handle.click(index, new_tab);
            return {
              session_id,
              index,
              element: result.element,
              opened_in_new_tab: result.openedInNewTab,
              url: result.url,
              title: result.title,
            };
          }),
      }),

      browser_type: defineOperation({
        kind: 'browser',
        title: 'Type Text',
        description: 'Replace the value of an input element with text',
        schema: Schemas.TypeInputSchema,
        handler: ({ session_id, index, text }) =>
          this.onSession(session_id, async (handle) => {
            const element = await handle.type(index, text);
            return { session_id, index, element, text };
          }),
      }),

      browser_key: defineOperation({
        kind: 'browser',
        title: 'Press Key',
        description: 'Press a single key in the active tab',
        schema: Schemas.KeyInputSchema,
        handler: ({ session_id, key }) =>
          this.onSession(session_id, async (handle) => {
            const location = await handle.pressKey(key);
            return { session_id, key, url: location.url, title: location.title };
          }),
      }),

      browser_scroll: defineOperation({
        kind: 'browser',
        title: 'Scroll',
        description: 'Scroll the active tab up or down by one viewport height',
        schema: Schemas.ScrollInputSchema,
        handler: ({ session_id, direction }) =>
          this.onSession(session_id, async (handle) => {
            await handle.scroll(direction);
            return { session_id, direction };
          }),
      }),

      browser_go_back: defineOperation({
        kind: 'browser',
        title: 'Go Back',
        description: 'Navigate back in the active tab history',
        schema: Schemas.GoBackInputSchema,
        handler: ({ session_id }) =>
          this.onSession(session_id, async (handle) => {
            const location = await handle.goBack();
            return { session_id, url: location.url, title: location.title };
          }),
      }),

      browser_get_state: defineOperation({
        kind: 'browser',
        title: 'Get Page State',
        description: 'URL, title, tabs and numbered interactive elements of the active tab',
        schema: Schemas.GetStateInputSchema,
        handler: ({ session_id, include_screenshot }) =>
          this.onSession(session_id, async (handle) => {
            const state = await handle.getState(include_screenshot);
            return {
              session_id,
              url: state.url,
              title: state.title,
              tabs: state.tabs,
              interactive_elements: state.elements,
              ...(state.screenshot !== undefined ? { screenshot: state.screenshot } : {}),
            };
          }),
      }),

      browser_list_tabs: defineOperation({
        kind: 'browser',
        title: 'List Tabs',
        description: 'Open tabs of a session, in order',
        schema: Schemas.ListTabsInputSchema,
        handler: ({ session_id }) =>
          this.onSession(session_id, async (handle) => {
            const tabs = await handle.listTabs();
            return { session_id, tabs };
          }),
      }),

      browser_switch_tab: defineOperation({
        kind: 'browser',
        title: 'Switch Tab',
        description: 'Make the tab at tab_index the active tab',
        schema: Schemas.SwitchTabInputSchema,
        handler: ({ session_id, tab_index }) =>
          this.onSession(session_id, async (handle) => {
            const result = await handle.switchTab(tab_index);
            return {
              session_id,
              url: result.url,
              title: result.title,
              tab_count: result.tabCount,
              active_tab: result.activeTab,
            };
          }),
      }),

      browser_close_tab: defineOperation({
        kind: 'browser',
        title: 'Close Tab',
        description: 'Close the tab at tab_index; later tabs shift down by one',
        schema: Schemas.CloseTabInputSchema,
        handler: ({ session_id, tab_index }) =>
          this.onSession(session_id, async (handle) => {
            const result = await handle.closeTab(tab_index);
            return {
              session_id,
              url: result.url,
              title: result.title,
              tab_count: result.tabCount,
              active_tab: result.activeTab,
            };
          }),
      }),

      // ==================== Extraction ====================

      browser_extract_content: defineOperation({
        kind: 'extraction',
        title: 'Extract Content',
        description: 'Extract information from the active tab with an LLM',
        schema: Schemas.ExtractContentInputSchema,
        handler: async ({ session_id, query, extract_links }) => {
          const page = await this.onSession(session_id, (handle) => handle.readContent());
          const result = await extractor.extract({ query, extractLinks: extract_links, page });
          return { session_id, ...result };
        },
      }),

      // ==================== Agent tasks ====================

      run_agent_task: defineOperation({
        kind: 'task',
        title: 'Run Agent Task',
        description: 'Start an autonomous agent on a session; poll get_agent_task_status for the outcome',
        schema: Schemas.RunAgentTaskInputSchema,
        handler: async (params) => {
          const session = await registry.resolve(params.session_id);
          return tasks.submit({
            description: params.task,
            sessionId: session.id,
            maxSteps: params.max_steps,
            model: params.model ?? defaultModel,
            useVision: params.use_vision,
          });
        },
      }),

      retry_with_agent: defineOperation({
        kind: 'task',
        title: 'Retry With Agent',
        description: 'Start an autonomous agent in its own private browser, closed when the task ends',
        schema: Schemas.RetryWithAgentInputSchema,
        handler: async (params) =>
          tasks.submitIsolated({
            description: params.task,
            maxSteps: params.max_steps,
            model: params.model ?? defaultModel,
            useVision: params.use_vision,
            allowedDomains: params.allowed_domains,
            headless: params.headless,
          }),
      }),

      get_agent_task_status: defineOperation({
        kind: 'task',
        title: 'Get Agent Task Status',
        description: 'Status, result or error of an agent task',
        schema: Schemas.GetTaskStatusInputSchema,
        handler: async ({ task_id }) => tasks.getStatus(task_id),
      }),

      list_agent_tasks: defineOperation({
        kind: 'task',
        title: 'List Agent Tasks',
        description: 'All retained agent tasks, oldest first',
        schema: Schemas.ListTasksInputSchema,
        handler: async () => {
          const all = tasks.list();
          return { tasks: all, count: all.length };
        },
      }),
    };
  }
}

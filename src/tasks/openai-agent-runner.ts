/**
 * OpenAI Agent Runner
 *
 * Step loop: read the page, ask the model for one action as JSON, perform it
 * through the session handle, repeat until the model reports done or the step
 * budget is spent. Action failures are shown to the model on the next step
 * rather than ending the run.
 */

import { z } from 'zod';
import type { AgentRunRequest, AgentRunResult, AgentRunner } from './agent-runner.js';
import type { BrowserSessionHandle, PageState } from '../browser/browser-session-handle.js';
import { SUPPORTED_KEYS } from '../browser/key-names.js';
import {
  firstMessageText,
  missingApiKey,
  parseJsonResponse,
  type ChatCompletionClient,
  type ChatMessage,
} from '../llm/chat-client.js';
import { extractErrorMessage } from '../shared/errors/index.js';
import { createLogger } from '../shared/services/logging.service.js';

const logger = createLogger('AgentRunner');

/** Interactive elements listed to the model per step */
const MAX_PROMPT_ELEMENTS = 150;
/** Previous actions repeated to the model */
const HISTORY_WINDOW = 15;

const AgentActionSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('navigate'), url: z.string().url(), new_tab: z.boolean().optional() }),
  z.object({ type: z.literal('click'), index: z.number().int().min(0), new_tab: z.boolean().optional() }),
  z.object({ type: z.literal('type'), index: z.number().int().min(0), text: z.string() }),
  z.object({ type: z.literal('key'), key: z.enum(SUPPORTED_KEYS) }),
  z.object({ type: z.literal('scroll'), direction: z.enum(['up', 'down']) }),
  z.object({ type: z.literal('go_back') }),
  z.object({ type: z.literal('switch_tab'), tab_index: z.number().int().min(0) }),
  z.object({ type: z.literal('close_tab'), tab_index: z.number().int().min(0) }),
  z.object({ type: z.literal('done'), success: z.boolean(), text: z.string() }),
]);

type AgentAction = z.infer<typeof AgentActionSchema>;

const AgentStepSchema = z.object({
  thought: z.string().optional(),
  action: AgentActionSchema,
});

const SYSTEM_PROMPT = `You operate a web browser to complete a task for the user.
Each turn you see the current page: URL, title, open tabs and numbered interactive elements.
Reply with one JSON object: {"thought": string, "action": <action>} where <action> is one of
  {"type": "navigate", "url": string, "new_tab"?: boolean}
  {"type": "click", "index": number, "new_tab"?: boolean}
  {"type": "type", "index": number, "text": string}
  {"type": "key", "key": string}            e.g. "Enter", "Escape", "ArrowDown"
  {"type": "scroll", "direction": "up" | "down"}
  {"type": "go_back"}
  {"type": "switch_tab", "tab_index": number}
  {"type": "close_tab", "tab_index": number}
  {"type": "done", "success": boolean, "text": string}
Element indices are only valid for the page shown in this turn.
When the task is finished, or cannot be finished, reply with "done" and put the answer or reason in "text".`;

export class OpenAIAgentRunner implements AgentRunner {
  constructor(private readonly client: ChatCompletionClient | null) {}

  async run(request: AgentRunRequest): Promise<AgentRunResult> {
    const client = this.client;
    if (!client) {
      throw missingApiKey('Agent execution');
    }

    const { taskId, description, maxSteps, model, useVision, browser, signal } = request;
    const history: string[] = [];
    const errors: string[] = [];
    const urlsVisited: string[] = [];
    let lastError: string | null = null;

    for (let step = 1; step <= maxSteps; step++) {
      if (signal.aborted) {
        errors.push(`Stopped at step ${step}: time budget exhausted`);
        return { success: false, finalResult: null, steps: step - 1, urlsVisited, errors };
      }

      let action: AgentAction;
      try {
        const state = await browser.getState(useVision);
        if (!urlsVisited.includes(state.url) && state.url !== 'about:blank') {
          urlsVisited.push(state.url);
        }

        const response = await client.complete(
          {
            model,
            temperature: 0,
            response_format: { type: 'json_object' },
            messages: buildMessages(description, state, history, lastError, step, maxSteps),
          },
          { signal }
        );
        const parsed = parseJsonResponse(
          firstMessageText(response, 'Agent step'),
          AgentStepSchema,
          'Agent step'
        );
        action = parsed.action;
        logger.debug('Agent step', { taskId, step, action: action.type, thought: parsed.thought });
      } catch (error) {
        lastError = extractErrorMessage(error);
        errors.push(`Step ${step}: ${lastError}`);
        continue;
      }

      if (action.type === 'done') {
        return {
          success: action.success,
          finalResult: action.text,
          steps: step,
          urlsVisited,
          errors: action.success ? errors : [...errors, action.text],
        };
      }

      try {
        const outcome = await performAction(browser, action);
        history.push(`${step}. ${outcome}`);
        lastError = null;
      } catch (error) {
        lastError = extractErrorMessage(error);
        history.push(`${step}. ${describeAction(action)} failed: ${lastError}`);
        errors.push(`Step ${step}: ${lastError}`);
      }
    }

    errors.push(
      lastError
        ? `Step budget of ${maxSteps} spent; last error: ${lastError}`
        : `Step budget of ${maxSteps} spent without finishing the task`
    );
    return { success: false, finalResult: null, steps: maxSteps, urlsVisited, errors };
  }
}

async function performAction(browser: BrowserSessionHandle, action: AgentAction): Promise<string> {
  switch (action.type) {
    case 'navigate': {
      const result = await browser.navigate(action.url, action.new_tab ?? false);
      return `Opened ${result.url}${action.new_tab ? ' in a new tab' : ''}`;
    }
    case 'click': {
      const result = await browser.click(action.index, action.new_tab ?? false);
      return `Clicked [${action.index}] ${result.element.text}, now on ${result.url}`;
    }
    case 'type':
      await browser.type(action.index, action.text);
      return `Typed "${action.text}" into [${action.index}]`;
    case 'key':
      await browser.pressKey(action.key);
      return `Pressed ${action.key}`;
    case 'scroll':
      await browser.scroll(action.direction);
      return `Scrolled ${action.direction}`;
    case 'go_back': {
      const result = await browser.goBack();
      return `Went back to ${result.url}`;
    }
    case 'switch_tab':
      await browser.switchTab(action.tab_index);
      return `Switched to tab ${action.tab_index}`;
    case 'close_tab': {
      const result = await browser.closeTab(action.tab_index);
      return `Closed tab ${action.tab_index}, now on ${result.url}`;
    }
    case 'done':
      return action.text;
  }
}

function describeAction(action: AgentAction): string {
  switch (action.type) {
    case 'navigate':
      return `navigate to ${action.url}`;
    case 'click':
      return `click [${action.index}]`;
    case 'type':
      return `type into [${action.index}]`;
    case 'key':
      return `press ${action.key}`;
    case 'scroll':
      return `scroll ${action.direction}`;
    case 'go_back':
      return 'go back';
    case 'switch_tab':
      return `switch to tab ${action.tab_index}`;
    case 'close_tab':
      return `close tab ${action.tab_index}`;
    case 'done':
      return 'done';
  }
}

function buildMessages(
  description: string,
  state: PageState,
  history: string[],
  lastError: string | null,
  step: number,
  maxSteps: number
): ChatMessage[] {
  const elements = state.elements
    .slice(0, MAX_PROMPT_ELEMENTS)
    .map((element) => {
      const extras = [
        element.placeholder ? `placeholder="${element.placeholder}"` : '',
        element.href ? `href="${element.href}"` : '',
      ]
        .filter(Boolean)
        .join(' ');
      return `[${element.index}] <${element.tag}${extras ? ` ${extras}` : ''}> ${element.text}`;
    })
    .join('\n');
  const tabs = state.tabs
    .map((tab) => `${tab.index}${tab.active ? ' (active)' : ''}: ${tab.title || '(untitled)'} - ${tab.url}`)
    .join('\n');

  const text = [
    `Task: ${description}`,
    `Step ${step} of ${maxSteps}.`,
    history.length > 0 ? `Previous actions:\n${history.slice(-HISTORY_WINDOW).join('\n')}` : '',
    lastError ? `The previous action failed: ${lastError}` : '',
    `Current page: ${state.title || '(untitled)'} - ${state.url}`,
    `Tabs:\n${tabs}`,
    `Interactive elements:\n${elements || '(none)'}`,
  ]
    .filter(Boolean)
    .join('\n\n');

  if (state.screenshot) {
    return [
      { role: 'system', content: SYSTEM_PROMPT },
      {
        role: 'user',
        content: [
          { type: 'text', text },
          { type: 'image_url', image_url: { url: `data:image/png;base64,${state.screenshot}` } },
        ],
      },
    ];
  }

  return [
    { role: 'system', content: SYSTEM_PROMPT },
    { role: 'user', content: text },
  ];
}

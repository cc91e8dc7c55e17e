/**
 * OpenAIAgentRunner Tests
 */

import { describe, it, expect } from 'vitest';
import { BrowserSessionHandle } from '../../../src/browser/browser-session-handle.js';
import type { AgentRunRequest } from '../../../src/tasks/agent-runner.js';
import { OpenAIAgentRunner } from '../../../src/tasks/openai-agent-runner.js';
import { createScriptedChatClient, userText } from '../../mocks/chat-client.mock.js';
import { FakeBrowserControl } from '../../mocks/browser-control.mock.js';

function createRequest(overrides: Partial<AgentRunRequest> = {}): AgentRunRequest {
  const browser = new BrowserSessionHandle(new FakeBrowserControl(), {
    sessionId: 's1',
    allowedDomains: [],
    waitBetweenActionsMs: 0,
    operationTimeoutMs: 5000,
  });
  return {
    taskId: 'task-1',
    description: 'Find the price of Widget 1',
    maxSteps: 5,
    model: 'test-model',
    useVision: false,
    browser,
    signal: new AbortController().signal,
    ...overrides,
  };
}

describe('OpenAIAgentRunner', () => {
  it('should perform actions until the model reports done', async () => {
    const client = createScriptedChatClient([
      { thought: 'Open the shop', action: { type: 'navigate', url: 'https://shop.test/' } },
      { thought: 'Go to the catalog', action: { type: 'click', index: 0 } },
      { thought: 'Found it', action: { type: 'done', success: true, text: 'Widget 1 costs $5' } },
    ]);
    const runner = new OpenAIAgentRunner(client);

    const result = await runner.run(createRequest());

    expect(result).toEqual({
      success: true,
      finalResult: 'Widget 1 costs $5',
      steps: 3,
      urlsVisited: ['https://shop.test/', 'https://shop.test/catalog'],
      errors: [],
    });
  });

  it('should ask for a JSON action with the configured model', async () => {
    const client = createScriptedChatClient([{ action: { type: 'done', success: true, text: 'ok' } }]);

    await new OpenAIAgentRunner(client).run(createRequest());

    expect(client.requests[0]).toMatchObject({
      model: 'test-model',
      temperature: 0,
      response_format: { type: 'json_object' },
    });
    expect(userText(client.requests[0])).toContain('Task: Find the price of Widget 1');
    expect(userText(client.requests[0])).toContain('Step 1 of 5.');
  });

  it('should list interactive elements and history in later prompts', async () => {
    const client = createScriptedChatClient([
      { action: { type: 'navigate', url: 'https://shop.test/' } },
      { action: { type: 'done', success: true, text: 'ok' } },
    ]);

    await new OpenAIAgentRunner(client).run(createRequest());

    const prompt = userText(client.requests[1]);
    expect(prompt).toContain('Previous actions:\n1. Opened https://shop.test/');
    expect(prompt).toContain('[1] <input placeholder="Search products"> ');
    expect(prompt).toContain('[0] <a href="https://shop.test/catalog"> Catalog');
    expect(prompt).toContain('0 (active): Test Shop - https://shop.test/');
  });

  it('should close a tab the agent opened and return to the remaining one', async () => {
    const client = createScriptedChatClient([
      { action: { type: 'navigate', url: 'https://example.com' } },
      { action: { type: 'navigate', url: 'https://shop.test/', new_tab: true } },
      { action: { type: 'close_tab', tab_index: 1 } },
      { action: { type: 'done', success: true, text: 'ok' } },
    ]);
    const request = createRequest();

    await new OpenAIAgentRunner(client).run(request);

    expect(userText(client.requests[3])).toContain('3. Closed tab 1, now on https://example.com');
    const tabs = await request.browser.listTabs();
    expect(tabs.map((tab) => tab.url)).toEqual(['https://example.com']);
  });

  it('should show a failed action to the model and keep going', async () => {
    const client = createScriptedChatClient([
      { action: { type: 'click', index: 9 } },
      { action: { type: 'done', success: false, text: 'Could not find it' } },
    ]);

    const result = await new OpenAIAgentRunner(client).run(createRequest());

    expect(userText(client.requests[1])).toContain(
      'The previous action failed: No element with index 9: the page has no elements'
    );
    expect(result).toEqual({
      success: false,
      finalResult: 'Could not find it',
      steps: 2,
      urlsVisited: [],
      errors: ['Step 1: No element with index 9: the page has no elements', 'Could not find it'],
    });
  });

  it('should record replies that are not valid JSON', async () => {
    const client = createScriptedChatClient(['not json', { action: { type: 'done', success: true, text: 'ok' } }]);

    const result = await new OpenAIAgentRunner(client).run(createRequest());

    expect(result.success).toBe(true);
    expect(result.steps).toBe(2);
    expect(result.errors).toEqual(['Step 1: Agent step failed: model returned invalid JSON: not json']);
  });

  it('should stop when the step budget is spent', async () => {
    const client = createScriptedChatClient([{ action: { type: 'scroll', direction: 'down' } }]);

    const result = await new OpenAIAgentRunner(client).run(createRequest({ maxSteps: 2 }));

    expect(client.requests).toHaveLength(2);
    expect(result).toEqual({
      success: false,
      finalResult: null,
      steps: 2,
      urlsVisited: [],
      errors: ['Step budget of 2 spent without finishing the task'],
    });
  });

  it('should stop once the signal is aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const client = createScriptedChatClient([{ action: { type: 'go_back' } }]);

    const result = await new OpenAIAgentRunner(client).run(createRequest({ signal: controller.signal }));

    expect(client.complete).not.toHaveBeenCalled();
    expect(result.steps).toBe(0);
    expect(result.errors).toEqual(['Stopped at step 1: time budget exhausted']);
  });

  it('should attach a screenshot when vision is enabled', async () => {
    const client = createScriptedChatClient([{ action: { type: 'done', success: true, text: 'ok' } }]);

    await new OpenAIAgentRunner(client).run(createRequest({ useVision: true }));

    const content = client.requests[0].messages[1].content;
    expect(content).toEqual([
      { type: 'text', text: expect.stringContaining('Task: Find the price of Widget 1') },
      { type: 'image_url', image_url: { url: 'data:image/png;base64,iVBORw0KGgo=' } },
    ]);
  });

  it('should refuse to run without an API key', async () => {
    const runner = new OpenAIAgentRunner(null);

    await expect(runner.run(createRequest())).rejects.toThrow(
      'Agent execution is unavailable: OPENAI_API_KEY is not configured'
    );
  });
});

/**
 * Chat Completion Client
 *
 * The slice of the OpenAI SDK used by extraction and the agent loop, so both
 * can run against an in-process stand-in.
 */

import OpenAI from 'openai';
import { z } from 'zod';
import { OrchestratorError } from '../shared/errors/index.js';

export type ChatMessage = OpenAI.Chat.ChatCompletionMessageParam;
export type ChatRequest = OpenAI.Chat.ChatCompletionCreateParamsNonStreaming;
export type ChatResponse = OpenAI.Chat.ChatCompletion;

export interface ChatCompletionClient {
  complete(request: ChatRequest, options?: { signal?: AbortSignal }): Promise<ChatResponse>;
}

export interface OpenAIClientConfig {
  apiKey?: string;
  baseURL?: string;
  /** Per-request timeout (ms) */
  timeoutMs: number;
  maxRetries: number;
}

/**
 * Build a client over the OpenAI SDK, or null when no API key is configured
 */
export function createOpenAIChatClient(config: OpenAIClientConfig): ChatCompletionClient | null {
  if (!config.apiKey) {
    return null;
  }

  const openai = new OpenAI({
    apiKey: config.apiKey,
    baseURL: config.baseURL,
    timeout: config.timeoutMs,
    maxRetries: config.maxRetries,
  });

  return {
    complete: (request, options) =>
      openai.chat.completions.create(request, { signal: options?.signal }),
  };
}

/**
 * Text of the first choice
 *
 * @throws OrchestratorError UPSTREAM_FAILURE when the model returned no content
 */
export function firstMessageText(response: ChatResponse, operation: string): string {
  const content = response.choices.at(0)?.message.content;
  if (!content) {
    throw OrchestratorError.upstreamFailure(operation, new Error('model returned an empty response'));
  }
  return content;
}

/**
 * Parse a JSON-mode response against a schema
 *
 * @throws OrchestratorError UPSTREAM_FAILURE when the text is not valid JSON or does not match
 */
export function parseJsonResponse<T extends z.ZodTypeAny>(
  text: string,
  schema: T,
  operation: string
): z.infer<T> {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    throw OrchestratorError.upstreamFailure(operation, new Error(`model returned invalid JSON: ${text.slice(0, 200)}`));
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw OrchestratorError.upstreamFailure(operation, new Error(`unexpected response shape: ${issues}`));
  }
  return parsed.data;
}

/**
 * Raised where an LLM-backed capability is used without credentials
 */
export function missingApiKey(capability: string): OrchestratorError {
  return OrchestratorError.missingCredentials(capability, 'OPENAI_API_KEY');
}

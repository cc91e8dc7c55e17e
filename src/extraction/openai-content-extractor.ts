/**
 * OpenAI Content Extractor
 *
 * Answers an extraction query from the page's text with one chat completion.
 */

import { z } from 'zod';
import type { ContentExtractor, ExtractionRequest, ExtractionResult } from './content-extractor.js';
import {
  firstMessageText,
  missingApiKey,
  parseJsonResponse,
  type ChatCompletionClient,
} from '../llm/chat-client.js';
import { createLogger } from '../shared/services/logging.service.js';

const logger = createLogger('ContentExtractor');

/** Links handed to the model at most */
const MAX_PROMPT_LINKS = 100;

const ExtractionResponseSchema = z.object({
  content: z.string(),
  links: z.array(z.object({ text: z.string(), href: z.string() })).optional(),
});

const SYSTEM_PROMPT = `You extract information from web pages.
Answer only from the page content you are given. If the page does not contain
the requested information, say so in "content".
Respond with a JSON object: {"content": string, "links"?: [{"text": string, "href": string}]}.
Include "links" only when asked to, and only links relevant to the query.`;

export class OpenAIContentExtractor implements ContentExtractor {
  constructor(
    private readonly client: ChatCompletionClient | null,
    private readonly model: string
  ) {}

  async extract(request: ExtractionRequest): Promise<ExtractionResult> {
    if (!this.client) {
      throw missingApiKey('Content extraction');
    }

    const { query, extractLinks, page } = request;
    const linkSection = extractLinks
      ? `\n\nLinks on the page:\n${page.links
          .slice(0, MAX_PROMPT_LINKS)
          .map((link) => `- [${link.text}](${link.href})`)
          .join('\n')}`
      : '';

    logger.debug('Extracting content', { url: page.url, extractLinks });

    const response = await this.client.complete({
      model: this.model,
      temperature: 0,
      response_format: { type: 'json_object' },
      messages: [
        { role: 'system', content: SYSTEM_PROMPT },
        {
          role: 'user',
          content: `Query: ${query}\nInclude links: ${extractLinks ? 'yes' : 'no'}\n\nPage: ${page.title} (${page.url})\n\n${page.text}${linkSection}`,
        },
      ],
    });

    const parsed = parseJsonResponse(
      firstMessageText(response, 'Content extraction'),
      ExtractionResponseSchema,
      'Content extraction'
    );

    const result: ExtractionResult = { url: page.url, query, content: parsed.content };
    if (extractLinks) {
      result.links = parsed.links ?? [];
    }
    return result;
  }
}

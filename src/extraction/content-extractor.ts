/**
 * Content Extraction Capability
 */

import type { PageContent, PageLink } from '../browser/browser-control.js';

export interface ExtractionRequest {
  /** What to extract, in natural language */
  query: string;
  /** Include the page's links in the result */
  extractLinks: boolean;
  page: PageContent;
}

export interface ExtractionResult {
  url: string;
  query: string;
  content: string;
  links?: PageLink[];
}

export interface ContentExtractor {
  extract(request: ExtractionRequest): Promise<ExtractionResult>;
}

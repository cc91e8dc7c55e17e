/**
 * Operation Schemas
 *
 * Input shapes of every operation, shared by the HTTP routes, the generic
 * endpoint and MCP tool registration. Field names are the wire names.
 */

import { z } from 'zod';
import { SUPPORTED_KEYS } from '../browser/key-names.js';
import { DEFAULT_SESSION_ID } from '../session/session.types.js';

// ============================================================================
// Shared fields
// ============================================================================

const SessionIdField = z
  .string()
  .min(1)
  .default(DEFAULT_SESSION_ID)
  .describe('Target session (defaults to the lazily created "default" session)');

const ElementIndexField = z
  .number()
  .int()
  .min(0)
  .describe('Element index from the latest browser_get_state');

const TabIndexField = z.number().int().min(0).describe('Zero-based tab position');

const ALLOWED_DOMAINS_DESCRIPTION =
  'Hosts navigation is limited to, e.g. "example.com" or "*.example.com". Empty allows all.';

const TaskFields = {
  task: z.string().min(1).describe('What the agent should accomplish'),
  max_steps: z.number().int().min(1).max(500).default(100).describe('Step budget'),
  model: z.string().min(1).optional().describe('LLM model identifier'),
  use_vision: z.boolean().default(true).describe('Send screenshots to the model'),
};

// ============================================================================
// Session lifecycle
// ============================================================================

export const CreateSessionInputSchema = z.object({
  session_id: z.string().min(1).optional().describe('Session id (generated when omitted)'),
  headless: z.boolean().optional().describe('Run the browser without a window'),
  allowed_domains: z.array(z.string().min(1)).optional().describe(ALLOWED_DOMAINS_DESCRIPTION),
  wait_between_actions: z
    .number()
    .min(0)
    .max(60)
    .optional()
    .describe('Pause after each page-changing action, in seconds'),
});

export const ListSessionsInputSchema = z.object({});

export const CloseSessionInputSchema = z.object({
  session_id: z.string().min(1).describe('Session to close'),
});

// ============================================================================
// Browser control
// ============================================================================

export const NavigateInputSchema = z.object({
  session_id: SessionIdField,
  url: z.string().url().describe('Absolute URL to open'),
  new_tab: z.boolean().default(false).describe('Open in a new tab that becomes active'),
});

export const ClickInputSchema = z.object({
  session_id: SessionIdField,
  index: ElementIndexField,
  new_tab: z.boolean().default(false).describe('Open a link target in a new tab instead'),
});

export const TypeInputSchema = z.object({
  session_id: SessionIdField,
  index: ElementIndexField,
  text: z.string().describe('Text to enter; replaces the current value'),
});

export const KeyInputSchema = z.object({
  session_id: SessionIdField,
  key: z.enum(SUPPORTED_KEYS).describe('Key name, e.g. "Enter", "Escape", "ArrowDown"'),
});

export const ScrollInputSchema = z.object({
  session_id: SessionIdField,
  direction: z.enum(['up', 'down']).default('down').describe('Scroll by one viewport height'),
});

export const GoBackInputSchema = z.object({
  session_id: SessionIdField,
});

export const GetStateInputSchema = z.object({
  session_id: SessionIdField,
  include_screenshot: z.boolean().default(false).describe('Attach a base64 PNG of the viewport'),
});

export const ListTabsInputSchema = z.object({
  session_id: SessionIdField,
});

export const SwitchTabInputSchema = z.object({
  session_id: SessionIdField,
  tab_index: TabIndexField,
});

export const CloseTabInputSchema = z.object({
  session_id: SessionIdField,
  tab_index: TabIndexField,
});

// ============================================================================
// Extraction
// ============================================================================

export const ExtractContentInputSchema = z.object({
  session_id: SessionIdField,
  query: z.string().min(1).describe('What to extract from the current page'),
  extract_links: z.boolean().default(false).describe('Also return relevant links'),
});

// ============================================================================
// Agent tasks
// ============================================================================

export const RunAgentTaskInputSchema = z.object({
  session_id: SessionIdField,
  ...TaskFields,
});

export const RetryWithAgentInputSchema = z.object({
  ...TaskFields,
  allowed_domains: z.array(z.string().min(1)).default([]).describe(ALLOWED_DOMAINS_DESCRIPTION),
  headless: z.boolean().default(true).describe('Run the private browser without a window'),
});

export const GetTaskStatusInputSchema = z.object({
  task_id: z.string().min(1).describe('Id returned at submission'),
});

export const ListTasksInputSchema = z.object({});

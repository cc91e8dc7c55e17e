/**
 * Error Response Utilities
 *
 * Converts results and thrown values into the HTTP error envelope and
 * MCP tool responses.
 */

import { OrchestratorError, type OrchestratorErrorCode } from './orchestrator.error.js';
import { extractErrorMessage } from './extract-error-message.js';

/**
 * HTTP error body
 */
export interface ErrorEnvelope {
  detail: string;
  code: OrchestratorErrorCode | 'INTERNAL_ERROR';
}

/**
 * HTTP error response: status plus envelope body
 */
export interface HttpErrorResponse {
  status: number;
  body: ErrorEnvelope;
}

/**
 * MCP Tool Response type
 */
export interface McpToolResponse {
  [x: string]: unknown;
  content: { type: 'text'; text: string }[];
  structuredContent?: Record<string, unknown>;
  isError?: boolean;
}

/**
 * Create the `{detail, code}` envelope for any thrown value.
 * Unclassified errors become a 500 with their message.
 */
export function createErrorResponse(error: unknown): HttpErrorResponse {
  if (OrchestratorError.isOrchestratorError(error)) {
    return {
      status: error.httpStatus,
      body: { detail: error.message, code: error.code },
    };
  }
  return {
    status: 500,
    body: { detail: extractErrorMessage(error), code: 'INTERNAL_ERROR' },
  };
}

/**
 * Create a structured error response for MCP tools
 *
 * @param error - Error to convert to structured response
 * @returns Structured MCP tool response with isError flag
 */
export function createToolErrorResponse(error: unknown): McpToolResponse {
  const { body } = createErrorResponse(error);
  const textParts = [`Error: ${body.detail}`, `Code: ${body.code}`];

  const structured: Record<string, unknown> = { ...body };
  if (OrchestratorError.isOrchestratorError(error)) {
    structured.retryable = error.retryable;
    if (error.retryable) {
      textParts.push('Retryable: yes');
    }
  }

  return {
    content: [{ type: 'text', text: textParts.join('\n') }],
    structuredContent: structured,
    isError: true,
  };
}

/**
 * Create a success response with structured output
 *
 * @param output - Output data to return
 * @returns Structured MCP tool response
 */
export function createSuccessResponse(output: unknown): McpToolResponse {
  const response: McpToolResponse = {
    content: [{ type: 'text', text: JSON.stringify(output, null, 2) }],
    isError: false,
  };
  if (isRecord(output)) {
    response.structuredContent = output;
  }
  return response;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Error taxonomy and response envelope Tests
 */

import { describe, it, expect } from 'vitest';
import {
  createErrorResponse,
  createSuccessResponse,
  createToolErrorResponse,
  OrchestratorError,
  toOrchestratorError,
} from '../../../src/shared/errors/index.js';

describe('OrchestratorError', () => {
  it('should map each code to its HTTP status', () => {
    expect(OrchestratorError.sessionExists('s1').httpStatus).toBe(409);
    expect(OrchestratorError.sessionNotFound('s1').httpStatus).toBe(404);
    expect(OrchestratorError.invalidParameters('bad').httpStatus).toBe(400);
    expect(OrchestratorError.domainNotAllowed('https://example.com', ['shop.test']).httpStatus).toBe(403);
    expect(OrchestratorError.provisioningFailed('s1', new Error('no chrome')).httpStatus).toBe(500);
    expect(OrchestratorError.timeout('navigate', 1000).httpStatus).toBe(504);
    expect(OrchestratorError.unknownOperation('fly', []).httpStatus).toBe(400);
  });

  it('should mark stale indexes and timeouts as retryable', () => {
    expect(OrchestratorError.indexOutOfRange('tab', 3, 2).retryable).toBe(true);
    expect(OrchestratorError.timeout('click', 500).retryable).toBe(true);
    expect(OrchestratorError.sessionNotFound('s1').retryable).toBe(false);
  });

  it('should describe the valid index range', () => {
    expect(OrchestratorError.indexOutOfRange('tab', 3, 2).message).toBe('No tab with index 3: valid range is 0-1');
  });

  it('should serialize code, context and cause', () => {
    const error = OrchestratorError.provisioningFailed('s1', new Error('no chrome'));

    expect(error.toJSON()).toEqual({
      name: 'OrchestratorError',
      message: 'Failed to start browser for session s1: no chrome',
      code: 'PROVISIONING_FAILED',
      retryable: false,
      context: { sessionId: 's1' },
      cause: { name: 'Error', message: 'no chrome' },
    });
  });
});

describe('toOrchestratorError', () => {
  it('should pass classified errors through', () => {
    const error = OrchestratorError.sessionNotFound('s1');

    expect(toOrchestratorError(error, 'navigate')).toBe(error);
  });

  it('should classify browser deadline errors as timeouts', () => {
    const cause = new Error('Navigation timeout of 30000 ms exceeded');
    cause.name = 'TimeoutError';

    const error = toOrchestratorError(cause, 'navigate');

    expect(error.code).toBe('TIMEOUT');
    expect(error.httpStatus).toBe(504);
    expect(error.retryable).toBe(true);
    expect(error.message).toBe('navigate timed out: Navigation timeout of 30000 ms exceeded');
  });

  it('should classify anything else as an upstream failure', () => {
    const error = toOrchestratorError('socket hang up', 'navigate');

    expect(error.code).toBe('UPSTREAM_FAILURE');
    expect(error.message).toBe('navigate failed: socket hang up');
  });
});

describe('createErrorResponse', () => {
  it('should build the envelope from a classified error', () => {
    expect(createErrorResponse(OrchestratorError.sessionNotFound('s1'))).toEqual({
      status: 404,
      body: { detail: 'Session not found: s1', code: 'NOT_FOUND' },
    });
  });

  it('should answer unclassified errors with 500', () => {
    expect(createErrorResponse(new Error('boom'))).toEqual({
      status: 500,
      body: { detail: 'boom', code: 'INTERNAL_ERROR' },
    });
  });
});

describe('createToolErrorResponse', () => {
  it('should flag the error and mention retryability', () => {
    const response = createToolErrorResponse(OrchestratorError.indexOutOfRange('element', 5, 0));

    expect(response).toEqual({
      content: [
        {
          type: 'text',
          text: 'Error: No element with index 5: the page has no elements\nCode: NOT_FOUND\nRetryable: yes',
        },
      ],
      structuredContent: {
        detail: 'No element with index 5: the page has no elements',
        code: 'NOT_FOUND',
        retryable: true,
      },
      isError: true,
    });
  });

  it('should leave retryability out for unclassified errors', () => {
    const response = createToolErrorResponse(new Error('boom'));

    expect(response.content[0].text).toBe('Error: boom\nCode: INTERNAL_ERROR');
    expect(response.structuredContent).toEqual({ detail: 'boom', code: 'INTERNAL_ERROR' });
  });
});

describe('createSuccessResponse', () => {
  it('should return objects as structured content', () => {
    const response = createSuccessResponse({ session_id: 's1', closed: true });

    expect(response.isError).toBe(false);
    expect(response.structuredContent).toEqual({ session_id: 's1', closed: true });
    expect(response.content[0].text).toBe('{\n  "session_id": "s1",\n  "closed": true\n}');
  });

  it('should keep arrays as text only', () => {
    const response = createSuccessResponse([1, 2]);

    expect(response.structuredContent).toBeUndefined();
    expect(response.content[0].text).toBe('[\n  1,\n  2\n]');
  });
});

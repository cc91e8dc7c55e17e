/**
 * Orchestrator Error
 *
 * Standardized error classification for session, dispatch and task operations.
 * Every failure leaving the core is one of these codes, which the HTTP and MCP
 * surfaces translate into their own envelopes.
 */

import { extractErrorMessage } from './extract-error-message.js';

/**
 * Error codes for orchestration failures
 */
export type OrchestratorErrorCode =
  | 'CONFLICT'
  | 'NOT_FOUND'
  | 'INVALID_PARAMETERS'
  | 'DOMAIN_NOT_ALLOWED'
  | 'PROVISIONING_FAILED'
  | 'UPSTREAM_FAILURE'
  | 'TIMEOUT'
  | 'UNKNOWN_OPERATION';

const HTTP_STATUS: Record<OrchestratorErrorCode, number> = {
  CONFLICT: 409,
  NOT_FOUND: 404,
  INVALID_PARAMETERS: 400,
  DOMAIN_NOT_ALLOWED: 403,
  PROVISIONING_FAILED: 500,
  UPSTREAM_FAILURE: 500,
  TIMEOUT: 504,
  UNKNOWN_OPERATION: 400,
};

/**
 * Options accepted by the OrchestratorError constructor
 */
export interface OrchestratorErrorOptions {
  context?: Record<string, unknown>;
  cause?: Error;
  /** True when repeating the same request may succeed (e.g. stale element index) */
  retryable?: boolean;
}

/**
 * Standardized error for orchestration operations.
 *
 * @example
 * ```typescript
 * try {
 *   await registry.get('s1');
 * } catch (error) {
 *   if (OrchestratorError.isOrchestratorError(error) && error.code === 'NOT_FOUND') {
 *     // create it instead
 *   }
 * }
 * ```
 */
export class OrchestratorError extends Error {
  readonly code: OrchestratorErrorCode;
  readonly cause?: Error;
  readonly context?: Record<string, unknown>;
  readonly retryable: boolean;

  constructor(message: string, code: OrchestratorErrorCode, options: OrchestratorErrorOptions = {}) {
    super(message);
    this.name = 'OrchestratorError';
    this.code = code;
    this.cause = options.cause;
    this.context = options.context;
    this.retryable = options.retryable ?? false;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, OrchestratorError);
    }
  }

  /**
   * HTTP status the surface should answer with
   */
  get httpStatus(): number {
    return HTTP_STATUS[this.code];
  }

  /**
   * Create a JSON-serializable representation of the error
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      retryable: this.retryable,
      context: this.context,
      cause: this.cause
        ? {
            name: this.cause.name,
            message: this.cause.message,
          }
        : undefined,
    };
  }

  /**
   * Type guard to check if an error is an OrchestratorError
   */
  static isOrchestratorError(error: unknown): error is OrchestratorError {
    return error instanceof OrchestratorError;
  }

  // ==================== Factory Methods ====================

  static sessionExists(sessionId: string): OrchestratorError {
    return new OrchestratorError(`Session already exists: ${sessionId}`, 'CONFLICT', {
      context: { sessionId },
    });
  }

  static sessionNotFound(sessionId: string): OrchestratorError {
    return new OrchestratorError(`Session not found: ${sessionId}`, 'NOT_FOUND', {
      context: { sessionId },
    });
  }

  static sessionClosing(sessionId: string): OrchestratorError {
    return new OrchestratorError(`Session is closing: ${sessionId}`, 'CONFLICT', {
      context: { sessionId },
      retryable: true,
    });
  }

  static taskNotFound(taskId: string): OrchestratorError {
    return new OrchestratorError(`Task not found: ${taskId}`, 'NOT_FOUND', {
      context: { taskId },
    });
  }

  /**
   * Index no longer (or never) valid against the live list. Retryable after a fresh state read.
   */
  static indexOutOfRange(
    kind: 'element' | 'tab',
    index: number,
    count: number,
    context?: Record<string, unknown>
  ): OrchestratorError {
    const message =
      count === 0
        ? `No ${kind} with index ${index}: the page has no ${kind}s`
        : `No ${kind} with index ${index}: valid range is 0-${count - 1}`;
    return new OrchestratorError(message, 'NOT_FOUND', {
      context: { kind, index, count, ...context },
      retryable: true,
    });
  }

  /**
   * Element was listed but disappeared before it could be acted on
   */
  static elementDetached(index: number): OrchestratorError {
    return new OrchestratorError(
      `Element ${index} is no longer attached to the page`,
      'NOT_FOUND',
      { context: { kind: 'element', index }, retryable: true }
    );
  }

  static invalidParameters(message: string, issues?: unknown[]): OrchestratorError {
    return new OrchestratorError(message, 'INVALID_PARAMETERS', {
      context: issues ? { issues } : undefined,
    });
  }

  static domainNotAllowed(url: string, allowedDomains: readonly string[]): OrchestratorError {
    return new OrchestratorError(
      `Navigation to ${url} is not allowed (allowed domains: ${allowedDomains.join(', ')})`,
      'DOMAIN_NOT_ALLOWED',
      { context: { url, allowedDomains: [...allowedDomains] } }
    );
  }

  static provisioningFailed(sessionId: string, cause: Error): OrchestratorError {
    return new OrchestratorError(
      `Failed to start browser for session ${sessionId}: ${cause.message}`,
      'PROVISIONING_FAILED',
      { context: { sessionId }, cause }
    );
  }

  static upstreamFailure(
    operation: string,
    cause: Error,
    context?: Record<string, unknown>
  ): OrchestratorError {
    return new OrchestratorError(`${operation} failed: ${cause.message}`, 'UPSTREAM_FAILURE', {
      context: { operation, ...context },
      cause,
    });
  }

  static missingCredentials(capability: string, variable: string): OrchestratorError {
    return new OrchestratorError(
      `${capability} is unavailable: ${variable} is not configured`,
      'UPSTREAM_FAILURE',
      { context: { capability, variable } }
    );
  }

  static timeout(operation: string, timeoutMs: number): OrchestratorError {
    return new OrchestratorError(`${operation} timed out after ${timeoutMs}ms`, 'TIMEOUT', {
      context: { operation, timeoutMs },
      retryable: true,
    });
  }

  /**
   * The browser gave up on its own deadline (e.g. a navigation timeout)
   */
  static browserTimeout(operation: string, cause: Error): OrchestratorError {
    return new OrchestratorError(`${operation} timed out: ${cause.message}`, 'TIMEOUT', {
      context: { operation },
      cause,
      retryable: true,
    });
  }

  static unknownOperation(operation: string, known: readonly string[]): OrchestratorError {
    return new OrchestratorError(`Unknown operation: ${operation}`, 'UNKNOWN_OPERATION', {
      context: { operation, available: [...known] },
    });
  }
}

/**
 * Classify any thrown value. OrchestratorErrors pass through unchanged.
 * Errors named TimeoutError (puppeteer's own deadlines) become TIMEOUT;
 * anything else is an upstream failure of `operation`.
 */
export function toOrchestratorError(error: unknown, operation: string): OrchestratorError {
  if (OrchestratorError.isOrchestratorError(error)) {
    return error;
  }
  const cause = error instanceof Error ? error : new Error(extractErrorMessage(error));
  if (cause.name === 'TimeoutError') {
    return OrchestratorError.browserTimeout(operation, cause);
  }
  return OrchestratorError.upstreamFailure(operation, cause);
}

/**
 * Error Handling
 *
 * Exports the error taxonomy and utilities for structured error responses
 */

export * from './orchestrator.error.js';
export * from './extract-error-message.js';
export * from './error-response.js';

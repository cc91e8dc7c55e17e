/**
 * LoggingService Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import {
  isLogLevel,
  LoggingService,
  type McpNotificationSender,
} from '../../../src/shared/services/logging.service.js';

describe('LoggingService', () => {
  let consoleError: MockInstance;

  beforeEach(() => {
    consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    consoleError.mockRestore();
  });

  it('should drop entries below the minimum level', () => {
    const logging = new LoggingService('warning');
    const registryLogger = logging.child('SessionRegistry');

    registryLogger.info('session created');
    registryLogger.warning('session idle');

    expect(logging.getRecentLogs().map((entry) => entry.message)).toEqual(['session idle']);
    expect(consoleError).toHaveBeenCalledTimes(1);
  });

  it('should write one line per entry to stderr with context', () => {
    const logging = new LoggingService('debug');

    logging.child('SessionRegistry').info('Session created', { sessionId: 's1' });

    const output = String(consoleError.mock.calls[0][0]);
    expect(output).toMatch(/^\[.+\] INFO     \[SessionRegistry\] Session created\n {2}Context: \{"sessionId":"s1"\}$/);
  });

  it('should keep a bounded history', () => {
    const logging = new LoggingService('debug', 2);
    const logger = logging.child('TaskManager');

    logger.debug('one');
    logger.debug('two');
    logger.debug('three');

    expect(logging.getRecentLogs().map((entry) => entry.message)).toEqual(['two', 'three']);
    expect(logging.getRecentLogs(10, 'error')).toEqual([]);
  });

  it('should tag entries from child loggers with their name', () => {
    const logging = new LoggingService('debug');

    logging.child('TaskManager').error('Task failed', new Error('boom'), { taskId: 'task-1' });

    expect(logging.getRecentLogs()[0]).toMatchObject({
      level: 'error',
      logger: 'TaskManager',
      message: 'Task failed',
      context: { taskId: 'task-1' },
    });
  });

  it('should send entries to an attached MCP server instead of stderr', async () => {
    const logging = new LoggingService('info');
    const sender: McpNotificationSender = { sendLoggingMessage: vi.fn(async () => undefined) };
    logging.setMcpServer(sender);

    logging.child('HttpServer').notice('Listening', { port: 8000 });

    await vi.waitFor(() => expect(sender.sendLoggingMessage).toHaveBeenCalled());
    expect(sender.sendLoggingMessage).toHaveBeenCalledWith({
      level: 'notice',
      logger: 'HttpServer',
      data: { message: 'Listening', timestamp: expect.any(String), context: { port: 8000 } },
    });
    expect(consoleError).not.toHaveBeenCalled();
  });

  it('should recognise level names', () => {
    expect(isLogLevel('warning')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });
});

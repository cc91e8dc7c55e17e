/**
 * Logging Service
 *
 * Structured logging on stderr, optionally forwarded to an MCP client as
 * notifications/message. Components log through named child loggers.
 */

/**
 * Log levels (RFC 5424 severities, lowest first)
 */
export const LOG_LEVELS = [
  'debug',
  'info',
  'notice',
  'warning',
  'error',
  'critical',
  'alert',
  'emergency',
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Type guard for level names coming from env, CLI or the MCP client
 */
export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((level) => level === value);
}

function severity(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: number;
  logger: string;
  context?: Record<string, unknown>;
  error?: Error;
}

type Context = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: Context): void;
  info(message: string, context?: Context): void;
  notice(message: string, context?: Context): void;
  warning(message: string, context?: Context): void;
  error(message: string, error?: Error, context?: Context): void;
  critical(message: string, error?: Error, context?: Context): void;
  alert(message: string, error?: Error, context?: Context): void;
  emergency(message: string, error?: Error, context?: Context): void;
}

/**
 * Sink for notifications/message, implemented by the MCP server
 */
export interface McpNotificationSender {
  sendLoggingMessage(params: { level: LogLevel; logger?: string; data: Context }): Promise<void>;
}

/**
 * Level-filtered log writer with a bounded history of recent entries
 */
export class LoggingService {
  private minLevel: LogLevel;
  private entries: LogEntry[] = [];
  private mcpServer: McpNotificationSender | null = null;

  constructor(
    minLevel: LogLevel = 'info',
    private readonly maxEntries = 1000
  ) {
    this.minLevel = minLevel;
  }

  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  /**
   * Route entries to an MCP client instead of stderr; null detaches
   */
  setMcpServer(server: McpNotificationSender | null): void {
    this.mcpServer = server;
  }

  /**
   * Logger that tags every entry with a component name
   */
  child(name: string): Logger {
    const plain =
      (level: LogLevel) =>
      (message: string, context?: Context): void =>
        this.write({ level, message, context, logger: name, timestamp: Date.now() });
    const withError =
      (level: LogLevel) =>
      (message: string, error?: Error, context?: Context): void =>
        this.write({ level, message, context, error, logger: name, timestamp: Date.now() });

    return {
      debug: plain('debug'),
      info: plain('info'),
      notice: plain('notice'),
      warning: plain('warning'),
      error: withError('error'),
      critical: withError('critical'),
      alert: withError('alert'),
      emergency: withError('emergency'),
    };
  }

  /**
   * Most recent entries, oldest first, optionally at or above a level
   */
  getRecentLogs(count = 100, minLevel?: LogLevel): LogEntry[] {
    const floor = minLevel ? severity(minLevel) : 0;
    return this.entries.filter((entry) => severity(entry.level) >= floor).slice(-count);
  }

  private write(entry: LogEntry): void {
    if (severity(entry.level) < severity(this.minLevel)) {
      return;
    }

    this.entries.push(entry);
    if (this.entries.length > this.maxEntries) {
      this.entries.shift();
    }

    const server = this.mcpServer;
    if (server) {
      void this.notify(server, entry);
    } else {
      writeToStderr(entry);
    }
  }

  private async notify(server: McpNotificationSender, entry: LogEntry): Promise<void> {
    const data: Context = {
      message: entry.message,
      timestamp: new Date(entry.timestamp).toISOString(),
    };
    if (entry.context && Object.keys(entry.context).length > 0) {
      data.context = entry.context;
    }
    if (entry.error) {
      data.error = { name: entry.error.name, message: entry.error.message, stack: entry.error.stack };
    }

    try {
      await server.sendLoggingMessage({ level: entry.level, logger: entry.logger, data });
    } catch (error) {
      // Not through write(): a failing sink would recurse
      console.error('[LoggingService] Failed to send MCP notification:', error);
      writeToStderr(entry);
    }
  }
}

// stdout carries the MCP stdio protocol
function writeToStderr(entry: LogEntry): void {
  const lines = [
    `[${new Date(entry.timestamp).toISOString()}] ${entry.level.toUpperCase().padEnd(8)} [${entry.logger}] ${entry.message}`,
  ];
  if (entry.context && Object.keys(entry.context).length > 0) {
    lines.push(`  Context: ${JSON.stringify(entry.context)}`);
  }
  if (entry.error) {
    lines.push(`  Error: ${entry.error.message}`);
    if (entry.error.stack) {
      lines.push(`  Stack: ${entry.error.stack}`);
    }
  }
  console.error(lines.join('\n'));
}

let processLogger: LoggingService | null = null;

/**
 * Process-wide logging service, created on first use at `LOG_LEVEL` (default info)
 */
export function getLogger(): LoggingService {
  const envLevel = process.env.LOG_LEVEL;
  processLogger ??= new LoggingService(isLogLevel(envLevel) ? envLevel : 'info');
  return processLogger;
}

/**
 * Named component logger backed by the process logger.
 * Resolved per call so level and sink changes apply to existing loggers.
 */
export function createLogger(name: string): Logger {
  const resolve = (): Logger => getLogger().child(name);
  return {
    debug: (message, context) => resolve().debug(message, context),
    info: (message, context) => resolve().info(message, context),
    notice: (message, context) => resolve().notice(message, context),
    warning: (message, context) => resolve().warning(message, context),
    error: (message, error, context) => resolve().error(message, error, context),
    critical: (message, error, context) => resolve().critical(message, error, context),
    alert: (message, error, context) => resolve().alert(message, error, context),
    emergency: (message, error, context) => resolve().emergency(message, error, context),
  };
}

/**
 * MCP Server
 *
 * Registers every dispatcher operation as an MCP tool over stdio and forwards
 * log records to the client as notifications/message.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { SetLevelRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import type { z } from 'zod';
import { OPERATION_NAMES, type CommandDispatcher, type OperationName } from '../dispatch/command-dispatcher.js';
import {
  createSuccessResponse,
  createToolErrorResponse,
  type McpToolResponse,
} from '../shared/errors/index.js';
import {
  createLogger,
  getLogger,
  isLogLevel,
  type LogLevel,
  type McpNotificationSender,
} from '../shared/services/logging.service.js';
import type { ServerInfo } from './types.js';

const logger = createLogger('McpServer');

/**
 * Run a dispatcher call and wrap its outcome as a tool response
 */
export async function executeWithLogging(
  dispatcher: CommandDispatcher,
  toolName: OperationName,
  input: unknown
): Promise<McpToolResponse> {
  const startTime = Date.now();
  try {
    logger.debug(`Executing tool: ${toolName}`);
    const result = await dispatcher.invoke(toolName, input);
    logger.debug(`Tool ${toolName} completed in ${Date.now() - startTime}ms`);
    return createSuccessResponse(result);
  } catch (error) {
    logger.error(
      `Tool ${toolName} failed after ${Date.now() - startTime}ms`,
      error instanceof Error ? error : undefined,
      { toolName }
    );
    return createToolErrorResponse(error);
  }
}

export class OrchestratorMcpServer implements McpNotificationSender {
  private readonly server: McpServer;

  constructor(
    private readonly info: ServerInfo,
    private readonly dispatcher: CommandDispatcher
  ) {
    this.server = new McpServer(
      { name: info.name, version: info.version },
      { capabilities: { tools: {}, logging: {} } }
    );

    this.registerLoggingHandlers();
    this.registerTools();
  }

  /**
   * Send logging message notification via MCP protocol
   */
  async sendLoggingMessage(params: {
    level: LogLevel;
    logger?: string;
    data: Record<string, unknown>;
  }): Promise<void> {
    await this.server.server.notification({
      method: 'notifications/message',
      params: {
        level: params.level,
        logger: params.logger,
        data: params.data,
      },
    });
  }

  /**
   * Connect a transport (stdio by default) and route log records to the client
   */
  async start(transport: Transport = new StdioServerTransport()): Promise<void> {
    await this.server.connect(transport);
    getLogger().setMcpServer(this);
    logger.info(`${this.info.name} v${this.info.version} started`, {
      tools: OPERATION_NAMES.length,
    });
  }

  async stop(): Promise<void> {
    getLogger().setMcpServer(null);
    await this.server.close();
  }

  private registerLoggingHandlers(): void {
    this.server.server.setRequestHandler(SetLevelRequestSchema, (request) => {
      const { level } = request.params;
      if (isLogLevel(level)) {
        getLogger().setMinLevel(level);
        logger.info(`Log level set to: ${level}`);
      }
      return {};
    });
  }

  private registerTools(): void {
    for (const name of OPERATION_NAMES) {
      const operation = this.dispatcher.operation(name);
      const inputSchema: z.ZodRawShape = operation.schema.shape;
      this.server.registerTool(
        name,
        {
          title: operation.title,
          description: operation.description,
          inputSchema,
        },
        async (input) => executeWithLogging(this.dispatcher, name, input)
      );
    }
  }
}

#!/usr/bin/env node

/**
 * Browser Session Orchestrator
 *
 * Main entry point - builds the registry, task manager and dispatcher once,
 * serves them over HTTP or MCP stdio and drains them on shutdown.
 */

import { createPuppeteerBrowserFactory } from './browser/puppeteer-browser-control.js';
import { CommandDispatcher } from './dispatch/command-dispatcher.js';
import { OpenAIContentExtractor } from './extraction/openai-content-extractor.js';
import { createOpenAIChatClient } from './llm/chat-client.js';
import { HttpServer } from './server/http-server.js';
import { OrchestratorMcpServer } from './server/mcp-server.js';
import { loadServerConfig, type ServerConfig } from './server/server-config.js';
import type { ServerContext, ServerInfo } from './server/types.js';
import { SessionRegistry } from './session/session-registry.js';
import { DEFAULT_SESSION_CONFIG } from './session/session.types.js';
import { OpenAIAgentRunner } from './tasks/openai-agent-runner.js';
import { TaskManager } from './tasks/task-manager.js';
import { extractErrorMessage } from './shared/errors/index.js';
import { getLogger } from './shared/services/logging.service.js';

const SERVER_INFO: ServerInfo = {
  name: 'browser-orchestrator',
  version: '0.1.0',
};

/** Per-request ceiling for LLM calls (ms) */
const LLM_TIMEOUT_MS = 120_000;
/** Bound on waiting for running tasks at shutdown (ms) */
const SHUTDOWN_GRACE_MS = 10_000;
/** Sweep interval for idle sessions and expired tasks (ms) */
const CLEANUP_INTERVAL_MS = 60_000;

/**
 * Initialize all services
 */
function initializeServices(config: ServerConfig): ServerContext {
  const registry = new SessionRegistry({
    factory: createPuppeteerBrowserFactory({
      executablePath: config.executablePath,
      channel: config.channel,
      navigationTimeoutMs: config.operationTimeoutMs,
    }),
    defaultConfig: { ...DEFAULT_SESSION_CONFIG, headless: config.headless },
    operationTimeoutMs: config.operationTimeoutMs,
    idleTtlMs: config.sessionIdleTtlMs,
    cleanupIntervalMs: CLEANUP_INTERVAL_MS,
  });

  const chatClient = createOpenAIChatClient({
    apiKey: config.openai.apiKey,
    baseURL: config.openai.baseURL,
    timeoutMs: LLM_TIMEOUT_MS,
    maxRetries: 2,
  });

  const tasks = new TaskManager({
    registry,
    runner: new OpenAIAgentRunner(chatClient),
    taskTimeoutMs: config.taskTimeoutMs,
    retentionMs: config.taskRetentionMs,
    cleanupIntervalMs: CLEANUP_INTERVAL_MS,
  });

  const dispatcher = new CommandDispatcher({
    registry,
    tasks,
    extractor: new OpenAIContentExtractor(chatClient, config.openai.model),
    defaultModel: config.openai.model,
  });

  return { dispatcher, registry, tasks };
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const config = loadServerConfig(process.argv.slice(2), process.env);
  const logger = getLogger();
  logger.setMinLevel(config.logLevel);

  if (!config.openai.apiKey) {
    logger.warning('OPENAI_API_KEY is not set; extraction and agent tasks will fail');
  }

  const context = initializeServices(config);
  let stopSurface: () => Promise<void>;

  if (config.transport === 'stdio') {
    const server = new OrchestratorMcpServer(SERVER_INFO, context.dispatcher);
    await server.start();
    stopSurface = () => server.stop();
  } else {
    const server = new HttpServer(SERVER_INFO, context);
    await server.start(config.host, config.port);
    stopSurface = () => server.stop();
  }

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`Received ${signal}, shutting down`);
    try {
      await stopSurface();
      await context.tasks.shutdown(SHUTDOWN_GRACE_MS);
      await context.registry.closeAll();
      process.exit(0);
    } catch (error) {
      logger.error('Shutdown failed', error instanceof Error ? error : undefined);
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  console.error(`Failed to start server: ${extractErrorMessage(error)}`);
  process.exit(1);
});

/**
 * Server Configuration
 *
 * Combines CLI args and environment variables into one validated
 * configuration. CLI values win over the environment.
 */

import { z } from 'zod';
import { parseArgs } from '../cli/args.js';
import { OrchestratorError } from '../shared/errors/index.js';
import { LOG_LEVELS } from '../shared/services/logging.service.js';

export const DEFAULT_MODEL = 'gpt-4o';

const MINUTE = 60_000;

const ServerConfigSchema = z.object({
  host: z.string().min(1).default('127.0.0.1'),
  port: z.number().int().min(0).max(65535).default(8000),
  transport: z.enum(['http', 'stdio']).default('http'),
  headless: z.boolean().default(true),
  executablePath: z.string().min(1).optional(),
  channel: z.enum(['chrome', 'chrome-beta', 'chrome-canary', 'chrome-dev']).optional(),
  operationTimeoutMs: z.number().int().min(0).default(MINUTE),
  taskTimeoutMs: z.number().int().min(0).default(15 * MINUTE),
  sessionIdleTtlMs: z.number().int().min(0).default(30 * MINUTE),
  taskRetentionMs: z.number().int().min(0).default(60 * MINUTE),
  logLevel: z.enum(LOG_LEVELS).default('info'),
  openai: z.object({
    apiKey: z.string().min(1).optional(),
    baseURL: z.string().url().optional(),
    model: z.string().min(1).default(DEFAULT_MODEL),
  }),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;

/**
 * Build the server configuration.
 *
 * @param argv - Command line arguments (process.argv.slice(2))
 * @param env - Environment variables
 * @throws OrchestratorError INVALID_PARAMETERS naming every rejected setting
 */
export function loadServerConfig(argv: string[], env: NodeJS.ProcessEnv): ServerConfig {
  const args = parseArgs(argv);

  const parsed = ServerConfigSchema.safeParse({
    host: args.host ?? nonEmpty(env.HOST),
    port: args.port ?? numberFromEnv(env.PORT),
    transport: args.transport,
    headless: args.headless,
    executablePath: args.executablePath ?? nonEmpty(env.CHROME_PATH),
    channel: args.channel,
    operationTimeoutMs: args.operationTimeoutMs,
    taskTimeoutMs: args.taskTimeoutMs,
    sessionIdleTtlMs: args.sessionIdleTtlMs,
    taskRetentionMs: args.taskRetentionMs,
    logLevel: args.logLevel ?? nonEmpty(env.LOG_LEVEL),
    openai: {
      apiKey: nonEmpty(env.OPENAI_API_KEY),
      baseURL: nonEmpty(env.OPENAI_BASE_URL),
      model: nonEmpty(env.OPENAI_MODEL),
    },
  });

  if (!parsed.success) {
    const summary = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw OrchestratorError.invalidParameters(`Invalid configuration: ${summary}`, parsed.error.issues);
  }

  return parsed.data;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

function numberFromEnv(value: string | undefined): number | undefined {
  const raw = nonEmpty(value);
  return raw === undefined ? undefined : Number(raw);
}

/**
 * HTTP Server
 *
 * JSON-over-HTTP surface: one dedicated route per operation plus the generic
 * `/mcp` endpoint. Every route goes through the CommandDispatcher, so a
 * dedicated route and `POST /mcp` return the same body for the same call.
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import type { AddressInfo } from 'node:net';
import { z } from 'zod';
import type { OperationName } from '../dispatch/command-dispatcher.js';
import { createErrorResponse, OrchestratorError } from '../shared/errors/index.js';
import { createLogger } from '../shared/services/logging.service.js';
import type { ListeningAddress, ServerContext, ServerInfo } from './types.js';

const logger = createLogger('HttpServer');

/** Largest request body accepted */
const MAX_BODY_BYTES = 1024 * 1024;

type HttpMethod = 'GET' | 'POST' | 'DELETE';

interface RouteRequest {
  /** Captured path segments, already decoded */
  params: string[];
  query: URLSearchParams;
  body: unknown;
}

interface Route {
  method: HttpMethod;
  pattern: RegExp;
  handle(request: RouteRequest): Promise<unknown>;
}

const GenericCallSchema = z.object({
  tool_name: z.string().min(1),
  parameters: z.record(z.unknown()).default({}),
});

export class HttpServer {
  private readonly server: Server;
  private readonly routes: Route[];

  constructor(
    private readonly info: ServerInfo,
    private readonly context: ServerContext
  ) {
    this.routes = this.buildRoutes();
    this.server = createServer((req, res) => {
      void this.handleRequest(req, res);
    });
  }

  /**
   * Start listening. Port 0 picks a free port.
   */
  async start(host: string, port: number): Promise<ListeningAddress> {
    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error): void => reject(error);
      this.server.once('error', onError);
      this.server.listen(port, host, () => {
        this.server.off('error', onError);
        resolve();
      });
    });

    const address = this.server.address();
    const bound: ListeningAddress =
      address !== null && typeof address === 'object'
        ? { host: toHost(address), port: address.port }
        : { host, port };
    logger.info(`${this.info.name} v${this.info.version} listening on http://${bound.host}:${bound.port}`);
    return bound;
  }

  /**
   * Stop accepting connections and close idle ones
   */
  async stop(): Promise<void> {
    if (!this.server.listening) return;
    await new Promise<void>((resolve, reject) => {
      this.server.close((error) => (error ? reject(error) : resolve()));
      this.server.closeIdleConnections();
    });
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const method = req.method ?? 'GET';
    const url = new URL(req.url ?? '/', 'http://localhost');
    const path = url.pathname.length > 1 ? url.pathname.replace(/\/+$/, '') : url.pathname;

    try {
      const route = this.routes.find((candidate) => candidate.method === method && candidate.pattern.test(path));
      if (!route) {
        sendJson(res, 404, { detail: 'Not Found', code: 'NOT_FOUND' });
        return;
      }

      const match = route.pattern.exec(path);
      const params = (match?.slice(1) ?? []).map(decodeSegment);
      const body = method === 'POST' ? await readJsonBody(req) : {};
      const result = await route.handle({ params, query: url.searchParams, body });
      sendJson(res, 200, result);
    } catch (error) {
      const { status, body } = createErrorResponse(error);
      if (status >= 500) {
        logger.error(`${method} ${path} failed`, error instanceof Error ? error : undefined, { status });
      } else {
        logger.debug(`${method} ${path} rejected`, { status, code: body.code });
      }
      sendJson(res, status, body);
    }
  }

  private buildRoutes(): Route[] {
    const { dispatcher, registry, tasks } = this.context;
    const call = (operation: OperationName) => (request: RouteRequest) =>
      dispatcher.invoke(operation, request.body);

    return [
      {
        method: 'GET',
        pattern: /^\/$/,
        handle: async () => ({
          name: this.info.name,
          version: this.info.version,
          operations: dispatcher.describeOperations().map((operation) => operation.name),
        }),
      },
      {
        method: 'GET',
        pattern: /^\/health$/,
        handle: async () => ({
          status: 'healthy',
          active_sessions: registry.activeCount,
          active_tasks: tasks.activeCount,
        }),
      },

      // Sessions
      { method: 'POST', pattern: /^\/sessions$/, handle: call('create_browser_session') },
      { method: 'GET', pattern: /^\/sessions$/, handle: () => dispatcher.invoke('list_browser_sessions', {}) },
      {
        method: 'DELETE',
        pattern: /^\/sessions\/([^/]+)$/,
        handle: ({ params }) => dispatcher.invoke('close_browser_session', { session_id: params[0] }),
      },

      // Browser control
      { method: 'POST', pattern: /^\/browser\/navigate$/, handle: call('browser_navigate') },
      { method: 'POST', pattern: /^\/browser\/click$/, handle: call('browser_click') },
      { method: 'POST', pattern: /^\/browser\/type$/, handle: call('browser_type') },
      { method: 'POST', pattern: /^\/browser\/key$/, handle: call('browser_key') },
      { method: 'POST', pattern: /^\/browser\/scroll$/, handle: call('browser_scroll') },
      { method: 'POST', pattern: /^\/browser\/back$/, handle: call('browser_go_back') },
      { method: 'POST', pattern: /^\/browser\/state$/, handle: call('browser_get_state') },
      { method: 'POST', pattern: /^\/browser\/extract$/, handle: call('browser_extract_content') },
      {
        method: 'GET',
        pattern: /^\/browser\/tabs$/,
        handle: ({ query }) => {
          const sessionId = query.get('session_id');
          return dispatcher.invoke('browser_list_tabs', sessionId ? { session_id: sessionId } : {});
        },
      },
      { method: 'POST', pattern: /^\/browser\/tabs\/switch$/, handle: call('browser_switch_tab') },
      { method: 'POST', pattern: /^\/browser\/tabs\/close$/, handle: call('browser_close_tab') },

      // Agent tasks
      { method: 'POST', pattern: /^\/agent\/task$/, handle: call('run_agent_task') },
      { method: 'POST', pattern: /^\/agent\/retry$/, handle: call('retry_with_agent') },
      {
        method: 'GET',
        pattern: /^\/agent\/task\/([^/]+)$/,
        handle: ({ params }) => dispatcher.invoke('get_agent_task_status', { task_id: params[0] }),
      },
      { method: 'GET', pattern: /^\/agent\/tasks$/, handle: () => dispatcher.invoke('list_agent_tasks', {}) },

      // Generic endpoint
      {
        method: 'GET',
        pattern: /^\/mcp$/,
        handle: async () => {
          const tools = dispatcher.describeOperations();
          return { available_tools: tools.map((tool) => tool.name), tools };
        },
      },
      {
        method: 'POST',
        pattern: /^\/mcp$/,
        handle: ({ body }) => {
          const parsed = GenericCallSchema.safeParse(body);
          if (!parsed.success) {
            throw OrchestratorError.invalidParameters(
              'Expected a body of the form {"tool_name": string, "parameters": object}',
              parsed.error.issues
            );
          }
          return dispatcher.invoke(parsed.data.tool_name, parsed.data.parameters);
        },
      },
    ];
  }
}

async function readJsonBody(req: IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buffer.length;
    if (size > MAX_BODY_BYTES) {
      throw OrchestratorError.invalidParameters(`Request body exceeds ${MAX_BODY_BYTES} bytes`);
    }
    chunks.push(buffer);
  }

  const text = Buffer.concat(chunks).toString('utf8');
  if (text.trim() === '') {
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw OrchestratorError.invalidParameters(`Malformed JSON body: ${reason}`);
  }
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    throw OrchestratorError.invalidParameters(`Malformed path segment: ${segment}`);
  }
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  const payload = JSON.stringify(body ?? null);
  res.writeHead(status, {
    'Content-Type': 'application/json; charset=utf-8',
    'Content-Length': Buffer.byteLength(payload),
  });
  res.end(payload);
}

function toHost(address: AddressInfo): string {
  return address.family === 'IPv6' ? `[${address.address}]` : address.address;
}

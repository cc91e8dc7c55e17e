/**
 * Server Types
 *
 * Shapes shared by the HTTP and MCP surfaces
 */

import type { CommandDispatcher } from '../dispatch/command-dispatcher.js';
import type { SessionRegistry } from '../session/session-registry.js';
import type { TaskManager } from '../tasks/task-manager.js';

/**
 * Name and version reported to clients
 */
export interface ServerInfo {
  name: string;
  version: string;
}

/**
 * Core objects a surface serves
 */
export interface ServerContext {
  dispatcher: CommandDispatcher;
  registry: SessionRegistry;
  tasks: TaskManager;
}

/**
 * Address an HTTP surface is listening on
 */
export interface ListeningAddress {
  host: string;
  port: number;
}

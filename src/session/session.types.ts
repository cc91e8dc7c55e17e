/**
 * Session Types
 */

import type { BrowserSessionHandle } from '../browser/browser-session-handle.js';

export type SessionStatus = 'active' | 'closing' | 'closed';

export interface SessionConfig {
  headless: boolean;
  /** Hosts navigation is limited to. Empty means unrestricted. */
  allowedDomains: string[];
  /** Pause after each page-mutating command (ms) */
  waitBetweenActionsMs: number;
  /** Persistent browser profile directory */
  userDataDir?: string;
}

export const DEFAULT_SESSION_CONFIG: SessionConfig = {
  headless: true,
  allowedDomains: [],
  waitBetweenActionsMs: 500,
};

export const DEFAULT_SESSION_ID = 'default';

export interface Session {
  readonly id: string;
  readonly config: SessionConfig;
  readonly handle: BrowserSessionHandle;
  readonly createdAt: number;
  lastActivityAt: number;
  status: SessionStatus;
  /** Running tasks pinned to this session */
  holds: number;
}

/**
 * Point-in-time view of one session, as listed to clients
 */
export interface SessionSummary {
  session_id: string;
  status: SessionStatus;
  config: {
    headless: boolean;
    allowed_domains: string[];
    wait_between_actions: number;
  };
  tab_count: number;
  created_at: string;
  last_activity_at: string;
}

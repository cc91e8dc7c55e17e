/**
 * Session Registry
 *
 * Owns every live browser session, keyed by id. Map mutations and the
 * provisioning bookkeeping run under one lock; launching a browser happens
 * outside it so distinct sessions start in parallel. An id stays reserved from
 * the moment provisioning starts until its close completes.
 */

import { randomUUID } from 'crypto';
import type { BrowserControlFactory } from '../browser/browser-control.js';
import { BrowserSessionHandle } from '../browser/browser-session-handle.js';
import { SerialQueue } from '../lib/serial-queue.js';
import { OrchestratorError, extractErrorMessage } from '../shared/errors/index.js';
import { createLogger } from '../shared/services/logging.service.js';
import {
  DEFAULT_SESSION_CONFIG,
  DEFAULT_SESSION_ID,
  type Session,
  type SessionConfig,
  type SessionSummary,
} from './session.types.js';

const logger = createLogger('SessionRegistry');

/**
 * Configuration for SessionRegistry
 */
export interface SessionRegistryConfig {
  /** Provisions one browser per session */
  factory: BrowserControlFactory;
  /** Config for the lazily created default session and for omitted fields */
  defaultConfig?: SessionConfig;
  /** Ceiling for a single browser command (ms) */
  operationTimeoutMs: number;
  /** Close sessions idle for longer than this (ms, 0 disables) */
  idleTtlMs?: number;
  /** Interval for the idle sweep (ms) */
  cleanupIntervalMs?: number;
}

type Reservation = { session: Session } | { pending: Promise<Session> };

export class SessionRegistry {
  private readonly factory: BrowserControlFactory;
  private readonly defaultConfig: SessionConfig;
  private readonly operationTimeoutMs: number;
  private readonly idleTtlMs: number;
  private readonly sessions = new Map<string, Session>();
  private readonly provisioning = new Map<string, Promise<Session>>();
  private readonly lock = new SerialQueue();
  private cleanupIntervalId: NodeJS.Timeout | null = null;

  constructor(config: SessionRegistryConfig) {
    this.factory = config.factory;
    this.defaultConfig = config.defaultConfig ?? DEFAULT_SESSION_CONFIG;
    this.operationTimeoutMs = config.operationTimeoutMs;
    this.idleTtlMs = config.idleTtlMs ?? 0;

    if (this.idleTtlMs > 0 && config.cleanupIntervalMs && config.cleanupIntervalMs > 0) {
      this.startCleanupInterval(config.cleanupIntervalMs);
    }
  }

  /**
   * Number of active sessions
   */
  get activeCount(): number {
    let count = 0;
    for (const session of this.sessions.values()) {
      if (session.status === 'active') count++;
    }
    return count;
  }

  /**
   * Create and register a session.
   *
   * @param id - Session id (generated when omitted)
   * @param config - Overrides for the default session config
   * @throws OrchestratorError CONFLICT if the id is registered or being provisioned
   * @throws OrchestratorError PROVISIONING_FAILED if the browser cannot be started
   */
  async create(id: string | undefined, config: Partial<SessionConfig> = {}): Promise<Session> {
    const sessionId = id ?? `session-${randomUUID()}`;
    const resolved: SessionConfig = { ...this.defaultConfig, ...config };

    const reservation = await this.lock.run((): Reservation => {
      if (this.sessions.has(sessionId) || this.provisioning.has(sessionId)) {
        throw OrchestratorError.sessionExists(sessionId);
      }
      return { pending: this.startProvisioning(sessionId, resolved) };
    });
    return this.settle(reservation);
  }

  /**
   * Get an active session
   *
   * @throws OrchestratorError NOT_FOUND if absent, closing or closed
   */
  get(id: string): Session {
    const session = this.sessions.get(id);
    if (session?.status !== 'active') {
      throw OrchestratorError.sessionNotFound(id);
    }
    return session;
  }

  /**
   * Return the default session, creating it on first reference.
   * Concurrent first references share one provisioning.
   */
  async getOrCreateDefault(): Promise<Session> {
    const reservation = await this.lock.run((): Reservation => {
      const existing = this.sessions.get(DEFAULT_SESSION_ID);
      if (existing) {
        if (existing.status !== 'active') {
          throw OrchestratorError.sessionClosing(DEFAULT_SESSION_ID);
        }
        return { session: existing };
      }
      const inFlight = this.provisioning.get(DEFAULT_SESSION_ID);
      if (inFlight) {
        return { pending: inFlight };
      }
      return { pending: this.startProvisioning(DEFAULT_SESSION_ID, this.defaultConfig) };
    });
    return this.settle(reservation);
  }

  /**
   * Resolve the session an operation targets. Missing or "default" ids map
   * to the lazily created default session.
   */
  async resolve(id?: string): Promise<Session> {
    if (id === undefined || id === DEFAULT_SESSION_ID) {
      return this.getOrCreateDefault();
    }
    return this.get(id);
  }

  /**
   * Point-in-time snapshot of all registered sessions, in creation order
   */
  list(): SessionSummary[] {
    return Array.from(this.sessions.values(), (session) => this.summarize(session));
  }

  summarize(session: Session): SessionSummary {
    return {
      session_id: session.id,
      status: session.status,
      config: {
        headless: session.config.headless,
        allowed_domains: [...session.config.allowedDomains],
        wait_between_actions: session.config.waitBetweenActionsMs / 1000,
      },
      tab_count: session.handle.tabCount(),
      created_at: new Date(session.createdAt).toISOString(),
      last_activity_at: new Date(session.lastActivityAt).toISOString(),
    };
  }

  /**
   * Record activity on a session
   */
  touch(id: string): void {
    const session = this.sessions.get(id);
    if (session) {
      session.lastActivityAt = Date.now();
    }
  }

  /**
   * Pin an active session so the idle sweep leaves it alone
   */
  acquire(id: string): Session {
    const session = this.get(id);
    session.holds++;
    return session;
  }

  release(session: Session): void {
    session.holds = Math.max(0, session.holds - 1);
    session.lastActivityAt = Date.now();
  }

  /**
   * Close a session. The browser release is attempted even when parts of it
   * fail; failures are logged and the entry is removed regardless.
   *
   * @throws OrchestratorError NOT_FOUND if absent or already closing
   */
  async close(id: string): Promise<void> {
    const session = await this.lock.run(() => {
      const existing = this.sessions.get(id);
      if (existing?.status !== 'active') {
        throw OrchestratorError.sessionNotFound(id);
      }
      existing.status = 'closing';
      return existing;
    });

    try {
      await session.handle.close();
    } catch (error) {
      logger.error(
        'Failed to release browser for session',
        error instanceof Error ? error : undefined,
        { sessionId: id, errorMessage: extractErrorMessage(error) }
      );
    } finally {
      await this.lock.run(() => {
        this.sessions.delete(id);
        session.status = 'closed';
      });
    }

    logger.info('Session closed', { sessionId: id });
  }

  /**
   * Provision a browser that is not registered. The caller owns it and must close it.
   */
  async openDetached(config: Partial<SessionConfig> = {}): Promise<BrowserSessionHandle> {
    const sessionId = `ephemeral-${randomUUID()}`;
    return this.launch(sessionId, { ...this.defaultConfig, ...config });
  }

  /**
   * Close sessions idle for longer than the idle TTL. Sessions pinned by a
   * task or with commands in flight are skipped.
   *
   * @returns Ids of the sessions closed
   */
  async cleanupIdle(now: number = Date.now()): Promise<string[]> {
    if (this.idleTtlMs <= 0) return [];

    const idle = Array.from(this.sessions.values()).filter((session) => {
      if (session.status !== 'active' || session.holds > 0) return false;
      if (session.handle.pendingCommands > 0) return false;
      const lastActive = Math.max(session.lastActivityAt, session.handle.lastCommandAt ?? 0);
      return now - lastActive > this.idleTtlMs;
    });

    const closed: string[] = [];
    for (const session of idle) {
      try {
        await this.close(session.id);
        closed.push(session.id);
      } catch (error) {
        logger.debug('Idle session already gone', {
          sessionId: session.id,
          errorMessage: extractErrorMessage(error),
        });
      }
    }

    if (closed.length > 0) {
      logger.info('Closed idle sessions', { count: closed.length, sessionIds: closed });
    }
    return closed;
  }

  /**
   * Stop the idle sweep, wait for in-flight provisioning and close every session
   */
  async closeAll(): Promise<void> {
    this.stop();
    await Promise.allSettled(Array.from(this.provisioning.values()));

    const ids = Array.from(this.sessions.values())
      .filter((session) => session.status === 'active')
      .map((session) => session.id);

    await Promise.all(
      ids.map((id) =>
        this.close(id).catch((error: unknown) => {
          logger.warning('Session close during shutdown failed', {
            sessionId: id,
            errorMessage: extractErrorMessage(error),
          });
        })
      )
    );
  }

  /**
   * Stop the idle sweep interval
   */
  stop(): void {
    if (this.cleanupIntervalId) {
      clearInterval(this.cleanupIntervalId);
      this.cleanupIntervalId = null;
    }
  }

  private async settle(reservation: Reservation): Promise<Session> {
    return 'session' in reservation ? reservation.session : reservation.pending;
  }

  /**
   * Must be called under the lock. Registration and release of the
   * reservation happen together once the browser is up.
   */
  private startProvisioning(id: string, config: SessionConfig): Promise<Session> {
    const pending = (async (): Promise<Session> => {
      let handle: BrowserSessionHandle;
      try {
        handle = await this.launch(id, config);
      } catch (error) {
        await this.lock.run(() => this.provisioning.delete(id));
        throw error;
      }

      const now = Date.now();
      const session: Session = {
        id,
        config,
        handle,
        createdAt: now,
        lastActivityAt: now,
        status: 'active',
        holds: 0,
      };

      await this.lock.run(() => {
        this.provisioning.delete(id);
        this.sessions.set(id, session);
      });

      logger.info('Session created', {
        sessionId: id,
        headless: config.headless,
        allowedDomains: config.allowedDomains,
      });
      return session;
    })();

    this.provisioning.set(id, pending);
    return pending;
  }

  private async launch(id: string, config: SessionConfig): Promise<BrowserSessionHandle> {
    try {
      const control = await this.factory({
        headless: config.headless,
        userDataDir: config.userDataDir,
      });
      return new BrowserSessionHandle(control, {
        sessionId: id,
        allowedDomains: config.allowedDomains,
        waitBetweenActionsMs: config.waitBetweenActionsMs,
        operationTimeoutMs: this.operationTimeoutMs,
      });
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(extractErrorMessage(error));
      logger.error('Failed to provision browser', cause, { sessionId: id });
      throw OrchestratorError.provisioningFailed(id, cause);
    }
  }

  private startCleanupInterval(intervalMs: number): void {
    this.cleanupIntervalId = setInterval(() => {
      this.cleanupIdle().catch((error: unknown) => {
        logger.error('Idle session sweep failed', error instanceof Error ? error : undefined);
      });
    }, intervalMs);
    this.cleanupIntervalId.unref();
  }
}

/**
 * Browser Session Handle
 *
 * Exclusive owner of one BrowserControl. Every command goes through a FIFO
 * queue, so commands on a session never overlap. Index-based commands read
 * the live element or tab list inside the same queued command, right before
 * acting, and reject indices that are not in it.
 */

import type {
  BrowserControl,
  InteractiveElement,
  PageContent,
  PageLocation,
  ScrollDirection,
  TabInfo,
} from './browser-control.js';
import { DomainPolicy } from './domain-policy.js';
import type { SupportedKey } from './key-names.js';
import { SerialQueue } from '../lib/serial-queue.js';
import { delay, withTimeout } from '../lib/with-timeout.js';
import { OrchestratorError, toOrchestratorError } from '../shared/errors/index.js';
import { createLogger } from '../shared/services/logging.service.js';

const logger = createLogger('BrowserSessionHandle');

export interface BrowserSessionHandleOptions {
  sessionId: string;
  /** Empty means unrestricted */
  allowedDomains: readonly string[];
  /** Pause after each page-mutating command (ms) */
  waitBetweenActionsMs: number;
  /** Ceiling for one command (ms, 0 disables) */
  operationTimeoutMs: number;
}

/**
 * Full page state returned by getState()
 */
export interface PageState extends PageLocation {
  tabs: TabInfo[];
  elements: InteractiveElement[];
  screenshot?: string;
}

export interface ClickResult extends PageLocation {
  element: InteractiveElement;
  openedInNewTab: boolean;
}

export interface TabChangeResult extends PageLocation {
  tabCount: number;
  activeTab: number;
}

interface CommandOptions {
  /** Wait waitBetweenActionsMs afterwards */
  mutating: boolean;
}

export class BrowserSessionHandle {
  readonly sessionId: string;
  readonly policy: DomainPolicy;
  private readonly queue = new SerialQueue();
  private readonly waitBetweenActionsMs: number;
  private readonly operationTimeoutMs: number;
  private closePromise: Promise<void> | null = null;
  private _lastCommandAt: number | null = null;

  constructor(
    private readonly control: BrowserControl,
    options: BrowserSessionHandleOptions
  ) {
    this.sessionId = options.sessionId;
    this.policy = new DomainPolicy(options.allowedDomains);
    this.waitBetweenActionsMs = options.waitBetweenActionsMs;
    this.operationTimeoutMs = options.operationTimeoutMs;
  }

  get isClosed(): boolean {
    return this.closePromise !== null;
  }

  /**
   * Commands queued or running
   */
  get pendingCommands(): number {
    return this.queue.size;
  }

  /**
   * Completion time of the last successful command (epoch ms)
   */
  get lastCommandAt(): number | null {
    return this._lastCommandAt;
  }

  /**
   * Current tab count, 0 once closed
   */
  tabCount(): number {
    return this.isClosed ? 0 : this.control.tabCount();
  }

  /**
   * Load a URL in the active tab, or in a new tab that becomes active.
   */
  navigate(url: string, newTab = false): Promise<TabChangeResult> {
    return this.execute(
      'navigate',
      async () => {
        this.assertAllowed(url);
        if (newTab) {
          await this.control.openTab(url);
        } else {
          await this.control.navigate(url);
        }
        await this.assertLandedAllowed();
        return this.tabChangeResult();
      },
      { mutating: true }
    );
  }

  /**
   * Click an element by index. With `newTab`, a link is opened in a new tab
   * instead; non-link elements are clicked normally.
   */
  click(index: number, newTab = false): Promise<ClickResult> {
    return this.execute(
      'click',
      async () => {
        const element = await this.liveElement(index);
        if (element.href) {
          this.assertAllowed(element.href);
        }

        const openInNewTab = newTab && element.href !== undefined;
        if (openInNewTab && element.href) {
          await this.control.openTab(element.href);
        } else {
          await this.control.clickElement(index);
        }
        await this.assertLandedAllowed();

        const location = await this.control.location();
        return { ...location, element, openedInNewTab: openInNewTab };
      },
      { mutating: true }
    );
  }

  type(index: number, text: string): Promise<InteractiveElement> {
    return this.execute(
      'type',
      async () => {
        const element = await this.liveElement(index);
        await this.control.typeIntoElement(index, text);
        return element;
      },
      { mutating: true }
    );
  }

  pressKey(key: SupportedKey): Promise<PageLocation> {
    return this.execute(
      'pressKey',
      async () => {
        await this.control.pressKey(key);
        await this.assertLandedAllowed();
        return this.control.location();
      },
      { mutating: true }
    );
  }

  scroll(direction: ScrollDirection): Promise<void> {
    return this.execute('scroll', () => this.control.scroll(direction), { mutating: true });
  }

  goBack(): Promise<PageLocation> {
    return this.execute(
      'goBack',
      async () => {
        await this.control.goBack();
        return this.control.location();
      },
      { mutating: true }
    );
  }

  getState(includeScreenshot = false): Promise<PageState> {
    return this.execute(
      'getState',
      async () => {
        const snapshot = await this.control.snapshot(includeScreenshot);
        const tabs = await this.control.listTabs();
        const state: PageState = {
          url: snapshot.url,
          title: snapshot.title,
          tabs,
          elements: snapshot.elements,
        };
        if (snapshot.screenshot !== undefined) {
          state.screenshot = snapshot.screenshot;
        }
        return state;
      },
      { mutating: false }
    );
  }

  listTabs(): Promise<TabInfo[]> {
    return this.execute('listTabs', () => this.control.listTabs(), { mutating: false });
  }

  switchTab(index: number): Promise<TabChangeResult> {
    return this.execute(
      'switchTab',
      async () => {
        await this.liveTab(index);
        await this.control.activateTab(index);
        return this.tabChangeResult();
      },
      { mutating: true }
    );
  }

  closeTab(index: number): Promise<TabChangeResult> {
    return this.execute(
      'closeTab',
      async () => {
        await this.liveTab(index);
        await this.control.closeTab(index);
        return this.tabChangeResult();
      },
      { mutating: true }
    );
  }

  /**
   * Text and links of the active tab, for extraction
   */
  readContent(): Promise<PageContent> {
    return this.execute('readContent', () => this.control.readContent(), { mutating: false });
  }

  /**
   * Release the browser. Commands already running finish first; queued and
   * later commands fail with NotFound. Safe to call more than once.
   * Rejects with TIMEOUT when the release takes longer than the operation timeout.
   */
  close(): Promise<void> {
    this.closePromise ??= withTimeout(
      this.queue.run(async () => {
        logger.debug('Releasing browser', { sessionId: this.sessionId });
        await this.control.close();
      }),
      this.operationTimeoutMs,
      () => OrchestratorError.timeout('close', this.operationTimeoutMs)
    );
    return this.closePromise;
  }

  private execute<T>(
    operation: string,
    command: () => Promise<T>,
    { mutating }: CommandOptions
  ): Promise<T> {
    if (this.isClosed) {
      return Promise.reject(OrchestratorError.sessionNotFound(this.sessionId));
    }

    return new Promise<T>((resolve, reject) => {
      void this.queue.run(async () => {
        if (this.isClosed) {
          reject(OrchestratorError.sessionNotFound(this.sessionId));
          return;
        }

        const running = command();
        let result: T;
        try {
          result = await withTimeout(running, this.operationTimeoutMs, () =>
            OrchestratorError.timeout(operation, this.operationTimeoutMs)
          );
        } catch (error) {
          reject(toOrchestratorError(error, operation));
          // The caller is released at the ceiling; the slot is held until the browser call settles
          await running.then(
            () => undefined,
            () => undefined
          );
          return;
        }

        this._lastCommandAt = Date.now();
        if (mutating && this.waitBetweenActionsMs > 0) {
          await delay(this.waitBetweenActionsMs);
        }
        resolve(result);
      });
    });
  }

  private async liveElement(index: number): Promise<InteractiveElement> {
    const elements = await this.control.listElements();
    const element = elements.find((candidate) => candidate.index === index);
    if (!element) {
      throw OrchestratorError.indexOutOfRange('element', index, elements.length, {
        sessionId: this.sessionId,
      });
    }
    return element;
  }

  private async liveTab(index: number): Promise<TabInfo> {
    const tabs = await this.control.listTabs();
    const tab = tabs.find((candidate) => candidate.index === index);
    if (!tab) {
      throw OrchestratorError.indexOutOfRange('tab', index, tabs.length, {
        sessionId: this.sessionId,
      });
    }
    return tab;
  }

  private assertAllowed(url: string): void {
    if (!this.policy.isAllowed(url)) {
      throw OrchestratorError.domainNotAllowed(url, this.policy.allowedDomains);
    }
  }

  /**
   * Redirects, clicks and key presses can land outside the allow-list.
   * Leave such a page and report it.
   */
  private async assertLandedAllowed(): Promise<void> {
    if (!this.policy.restricted) return;
    const { url } = await this.control.location();
    if (!this.policy.isAllowed(url)) {
      logger.warning('Left disallowed page', { sessionId: this.sessionId, url });
      await this.control.navigate('about:blank');
      throw OrchestratorError.domainNotAllowed(url, this.policy.allowedDomains);
    }
  }

  private async tabChangeResult(): Promise<TabChangeResult> {
    const tabs = await this.control.listTabs();
    const active = tabs.find((tab) => tab.active);
    return {
      url: active?.url ?? 'about:blank',
      title: active?.title ?? '',
      tabCount: tabs.length,
      activeTab: active?.index ?? 0,
    };
  }
}

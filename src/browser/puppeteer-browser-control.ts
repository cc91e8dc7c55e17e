/**
 * Puppeteer Browser Control
 *
 * BrowserControl backed by one launched Chrome instance. Tabs are tracked in
 * an insertion-ordered list so indices match what clients saw in the last
 * listTabs(); pages opened by the site itself (target=_blank, window.open)
 * are appended when Chrome reports them.
 */

import fs from 'node:fs';
import puppeteer, { type Browser, type Page, type Target, TargetType } from 'puppeteer-core';
import { z } from 'zod';
import type {
  BrowserControl,
  BrowserControlFactory,
  BrowserLaunchOptions,
  InteractiveElement,
  PageContent,
  PageLocation,
  PageSnapshot,
  ScrollDirection,
  TabInfo,
} from './browser-control.js';
import type { SupportedKey } from './key-names.js';
import {
  ELEMENT_INDEX_ATTRIBUTE,
  INTERACTIVE_ELEMENTS_SCRIPT,
  PAGE_CONTENT_SCRIPT,
  scrollScript,
} from './browser-scripts.js';
import { OrchestratorError } from '../shared/errors/index.js';
import { createLogger } from '../shared/services/logging.service.js';

const logger = createLogger('PuppeteerBrowserControl');

export type BrowserChannel = 'chrome' | 'chrome-beta' | 'chrome-canary' | 'chrome-dev';

/**
 * Process-wide launch settings shared by every session
 */
export interface PuppeteerLaunchConfig {
  /** Path to Chrome executable (takes precedence over channel) */
  executablePath?: string;
  /** Installed Chrome channel to use when no executable path is given */
  channel?: BrowserChannel;
  /** Timeout for page loads (ms) */
  navigationTimeoutMs: number;
  /** Extra Chrome command-line switches */
  args?: string[];
}

const DEFAULT_VIEWPORT = { width: 1280, height: 1100 };

const InteractiveElementListSchema = z.array(
  z.object({
    index: z.number().int(),
    tag: z.string(),
    text: z.string(),
    placeholder: z.string().optional(),
    href: z.string().optional(),
  })
);

const PageContentResultSchema = z.object({
  text: z.string(),
  links: z.array(z.object({ text: z.string(), href: z.string() })),
});

export class PuppeteerBrowserControl implements BrowserControl {
  private pages: Page[];
  private activeIndex = 0;
  private readonly targetCreatedHandler = (target: Target): void => {
    void this.adoptTarget(target);
  };

  constructor(
    private readonly browser: Browser,
    initialPages: Page[],
    private readonly navigationTimeoutMs: number
  ) {
    this.pages = [...initialPages];
    this.browser.on('targetcreated', this.targetCreatedHandler);
  }

  /**
   * Launch Chrome and wrap it.
   *
   * @param launch - Per-session options (headless, profile)
   * @param config - Process-wide settings (executable, timeouts)
   */
  static async launch(
    launch: BrowserLaunchOptions,
    config: PuppeteerLaunchConfig
  ): Promise<PuppeteerBrowserControl> {
    const { headless, userDataDir } = launch;
    const { executablePath, channel = 'chrome', args = [] } = config;

    if (userDataDir) {
      await fs.promises.mkdir(userDataDir, { recursive: true });
    }

    logger.info('Launching browser', { headless, channel, executablePath, userDataDir });

    const browser = await puppeteer.launch({
      channel: executablePath ? undefined : channel,
      executablePath,
      headless,
      userDataDir,
      defaultViewport: DEFAULT_VIEWPORT,
      args: [
        '--hide-crash-restore-bubble',
        '--disable-background-timer-throttling',
        '--disable-backgrounding-occluded-windows',
        ...args,
      ],
    });

    try {
      const pages = await browser.pages();
      if (pages.length === 0) {
        pages.push(await browser.newPage());
      }
      return new PuppeteerBrowserControl(browser, pages, config.navigationTimeoutMs);
    } catch (error) {
      await browser.close().catch((closeError: unknown) => {
        logger.warning('Failed to close browser after setup error', {
          error: String(closeError),
        });
      });
      throw error;
    }
  }

  async navigate(url: string): Promise<void> {
    await this.activePage().goto(url, {
      waitUntil: 'load',
      timeout: this.navigationTimeoutMs,
    });
  }

  async openTab(url: string): Promise<void> {
    const page = await this.browser.newPage();
    if (!this.pages.includes(page)) {
      this.pages.push(page);
    }
    this.activeIndex = this.pages.indexOf(page);
    await page.bringToFront();
    await page.goto(url, { waitUntil: 'load', timeout: this.navigationTimeoutMs });
  }

  async listElements(): Promise<InteractiveElement[]> {
    const raw: unknown = await this.activePage().evaluate(INTERACTIVE_ELEMENTS_SCRIPT);
    return InteractiveElementListSchema.parse(raw);
  }

  async clickElement(index: number): Promise<void> {
    const element = await this.findElement(index);
    try {
      await element.click();
    } finally {
      await element.dispose();
    }
  }

  async typeIntoElement(index: number, text: string): Promise<void> {
    const element = await this.findElement(index);
    try {
      // Triple click selects existing content so typing replaces it
      await element.click({ count: 3 });
      await element.type(text);
    } finally {
      await element.dispose();
    }
  }

  async pressKey(key: SupportedKey): Promise<void> {
    await this.activePage().keyboard.press(key);
  }

  async scroll(direction: ScrollDirection): Promise<void> {
    await this.activePage().evaluate(scrollScript(direction === 'down' ? 1 : -1));
  }

  async goBack(): Promise<void> {
    await this.activePage().goBack({ waitUntil: 'load', timeout: this.navigationTimeoutMs });
  }

  async location(): Promise<PageLocation> {
    const page = this.activePage();
    return { url: page.url(), title: await page.title() };
  }

  async snapshot(includeScreenshot: boolean): Promise<PageSnapshot> {
    const page = this.activePage();
    const elements = await this.listElements();
    const snapshot: PageSnapshot = {
      url: page.url(),
      title: await page.title(),
      elements,
    };
    if (includeScreenshot) {
      snapshot.screenshot = await page.screenshot({ encoding: 'base64' });
    }
    return snapshot;
  }

  async listTabs(): Promise<TabInfo[]> {
    this.prune();
    return Promise.all(
      this.pages.map(async (page, index) => ({
        index,
        url: page.url(),
        title: await page.title(),
        active: index === this.activeIndex,
      }))
    );
  }

  async activateTab(index: number): Promise<void> {
    const page = this.pageAt(index);
    this.activeIndex = index;
    await page.bringToFront();
  }

  async closeTab(index: number): Promise<void> {
    const page = this.pageAt(index);
    await page.close();
    this.pages.splice(index, 1);

    if (this.pages.length === 0) {
      // A session always keeps one tab
      this.pages.push(await this.browser.newPage());
      this.activeIndex = 0;
    } else if (index < this.activeIndex || this.activeIndex >= this.pages.length) {
      this.activeIndex = Math.max(0, this.activeIndex - 1);
    }

    await this.activePage().bringToFront();
  }

  async readContent(): Promise<PageContent> {
    const page = this.activePage();
    const raw: unknown = await page.evaluate(PAGE_CONTENT_SCRIPT);
    const { text, links } = PageContentResultSchema.parse(raw);
    return { url: page.url(), title: await page.title(), text, links };
  }

  tabCount(): number {
    this.prune();
    return this.pages.length;
  }

  async close(): Promise<void> {
    this.browser.off('targetcreated', this.targetCreatedHandler);
    this.pages = [];
    await this.browser.close();
  }

  private activePage(): Page {
    this.prune();
    const page = this.pages.at(this.activeIndex);
    if (!page) {
      throw OrchestratorError.indexOutOfRange('tab', this.activeIndex, this.pages.length);
    }
    return page;
  }

  private pageAt(index: number): Page {
    this.prune();
    const page = this.pages.at(index);
    if (index < 0 || !page) {
      throw OrchestratorError.indexOutOfRange('tab', index, this.pages.length);
    }
    return page;
  }

  private async findElement(index: number) {
    const element = await this.activePage().$(`[${ELEMENT_INDEX_ATTRIBUTE}="${index}"]`);
    if (!element) {
      throw OrchestratorError.elementDetached(index);
    }
    return element;
  }

  /**
   * Drop pages the site closed on its own, keeping the active tab in range
   */
  private prune(): void {
    const active = this.pages.at(this.activeIndex);
    const open = this.pages.filter((page) => !page.isClosed());
    if (open.length === this.pages.length) return;

    this.pages = open;
    const activeStillOpen = active ? open.indexOf(active) : -1;
    this.activeIndex = activeStillOpen >= 0 ? activeStillOpen : Math.max(0, open.length - 1);
  }

  private async adoptTarget(target: Target): Promise<void> {
    if (target.type() !== TargetType.PAGE) return;
    try {
      const page = await target.page();
      if (page && !this.pages.includes(page)) {
        this.pages.push(page);
        logger.debug('Adopted tab opened by page', { url: page.url(), tabs: this.pages.length });
      }
    } catch (error) {
      logger.warning('Failed to adopt new tab', { error: String(error) });
    }
  }
}

/**
 * Build the factory the registry uses to provision sessions.
 */
export function createPuppeteerBrowserFactory(config: PuppeteerLaunchConfig): BrowserControlFactory {
  return (launch) => PuppeteerBrowserControl.launch(launch, config);
}

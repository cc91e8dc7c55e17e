/**
 * In-memory BrowserControl for unit tests
 *
 * Simulates tabs with per-tab history over a fixed map of pages. Unknown URLs
 * fail the way Chrome reports an unresolvable host.
 */

import type {
  BrowserControl,
  BrowserControlFactory,
  BrowserLaunchOptions,
  InteractiveElement,
  PageContent,
  PageLink,
  PageLocation,
  PageSnapshot,
  ScrollDirection,
  TabInfo,
} from '../../src/browser/browser-control.js';
import type { SupportedKey } from '../../src/browser/key-names.js';

export interface FakeSite {
  title: string;
  elements?: InteractiveElement[];
  text?: string;
  links?: PageLink[];
  /** Server-side redirect target */
  redirectTo?: string;
}

export const FAKE_SITES: Record<string, FakeSite> = {
  'about:blank': { title: '' },
  'https://example.com': {
    title: 'Example Domain',
    text: 'Example Domain. This domain is for use in illustrative examples.',
  },
  'https://shop.test/': {
    title: 'Test Shop',
    elements: [
      { index: 0, tag: 'a', text: 'Catalog', href: 'https://shop.test/catalog' },
      { index: 1, tag: 'input', text: '', placeholder: 'Search products' },
      { index: 2, tag: 'button', text: 'Search' },
      { index: 3, tag: 'a', text: 'Partner', href: 'https://partner.test/' },
    ],
    text: 'Welcome to the test shop',
    links: [{ text: 'Catalog', href: 'https://shop.test/catalog' }],
  },
  'https://shop.test/catalog': {
    title: 'Catalog',
    elements: [{ index: 0, tag: 'a', text: 'Home', href: 'https://shop.test/' }],
    text: 'Widget 1 - $5\nWidget 2 - $7',
  },
  'https://partner.test/': { title: 'Partner Site' },
  'https://shop.test/out': { title: 'Redirecting', redirectTo: 'https://partner.test/' },
};

interface FakeTab {
  history: string[];
  position: number;
}

export class FakeBrowserControl implements BrowserControl {
  readonly launchOptions: BrowserLaunchOptions;
  readonly calls: string[] = [];
  readonly typed: { index: number; text: string }[] = [];
  readonly keys: SupportedKey[] = [];
  scrollY = 0;
  closed = false;
  private tabs: FakeTab[] = [{ history: ['about:blank'], position: 0 }];
  private active = 0;

  constructor(
    launchOptions: BrowserLaunchOptions = { headless: true },
    private readonly sites: Record<string, FakeSite> = FAKE_SITES
  ) {
    this.launchOptions = launchOptions;
  }

  get activeTabIndex(): number {
    return this.active;
  }

  async navigate(url: string): Promise<void> {
    this.calls.push(`navigate ${url}`);
    this.load(this.currentTab(), url);
  }

  async openTab(url: string): Promise<void> {
    this.calls.push(`openTab ${url}`);
    const tab: FakeTab = { history: [], position: -1 };
    this.tabs.push(tab);
    this.active = this.tabs.length - 1;
    this.load(tab, url);
  }

  async listElements(): Promise<InteractiveElement[]> {
    return [...(this.site().elements ?? [])];
  }

  async clickElement(index: number): Promise<void> {
    this.calls.push(`click ${index}`);
    const element = this.site().elements?.find((candidate) => candidate.index === index);
    if (element?.href) {
      this.load(this.currentTab(), element.href);
    }
  }

  async typeIntoElement(index: number, text: string): Promise<void> {
    this.calls.push(`type ${index}`);
    this.typed.push({ index, text });
  }

  async pressKey(key: SupportedKey): Promise<void> {
    this.calls.push(`key ${key}`);
    this.keys.push(key);
  }

  async scroll(direction: ScrollDirection): Promise<void> {
    this.calls.push(`scroll ${direction}`);
    this.scrollY = Math.max(0, this.scrollY + (direction === 'down' ? 1000 : -1000));
  }

  async goBack(): Promise<void> {
    this.calls.push('goBack');
    const tab = this.currentTab();
    if (tab.position > 0) {
      tab.position--;
    }
  }

  async location(): Promise<PageLocation> {
    return { url: this.currentUrl(), title: this.site().title };
  }

  async snapshot(includeScreenshot: boolean): Promise<PageSnapshot> {
    const snapshot: PageSnapshot = {
      url: this.currentUrl(),
      title: this.site().title,
      elements: await this.listElements(),
    };
    if (includeScreenshot) {
      snapshot.screenshot = 'iVBORw0KGgo=';
    }
    return snapshot;
  }

  async listTabs(): Promise<TabInfo[]> {
    return this.tabs.map((tab, index) => {
      const url = tab.history[tab.position] ?? 'about:blank';
      return {
        index,
        url,
        title: this.sites[url]?.title ?? '',
        active: index === this.active,
      };
    });
  }

  async activateTab(index: number): Promise<void> {
    this.calls.push(`activateTab ${index}`);
    this.active = index;
  }

  async closeTab(index: number): Promise<void> {
    this.calls.push(`closeTab ${index}`);
    this.tabs.splice(index, 1);
    if (this.tabs.length === 0) {
      this.tabs.push({ history: ['about:blank'], position: 0 });
      this.active = 0;
    } else if (index < this.active || this.active >= this.tabs.length) {
      this.active = Math.max(0, this.active - 1);
    }
  }

  async readContent(): Promise<PageContent> {
    const site = this.site();
    return {
      url: this.currentUrl(),
      title: site.title,
      text: site.text ?? '',
      links: site.links ?? [],
    };
  }

  tabCount(): number {
    return this.tabs.length;
  }

  async close(): Promise<void> {
    this.calls.push('close');
    this.closed = true;
  }

  private currentTab(): FakeTab {
    const tab = this.tabs.at(this.active);
    if (!tab) {
      throw new Error('no active tab');
    }
    return tab;
  }

  private currentUrl(): string {
    const tab = this.currentTab();
    return tab.history[tab.position] ?? 'about:blank';
  }

  private site(): FakeSite {
    return this.sites[this.currentUrl()] ?? { title: '' };
  }

  private load(tab: FakeTab, url: string): void {
    const site = this.sites[url];
    if (!site) {
      throw new Error(`net::ERR_NAME_NOT_RESOLVED at ${url}`);
    }
    const target = site.redirectTo ?? url;
    tab.history = [...tab.history.slice(0, tab.position + 1), target];
    tab.position = tab.history.length - 1;
  }
}

/**
 * Factory that records every control it provisions
 */
export interface FakeBrowserFactory {
  factory: BrowserControlFactory;
  created: FakeBrowserControl[];
}

export function createFakeBrowserFactory(
  sites: Record<string, FakeSite> = FAKE_SITES
): FakeBrowserFactory {
  const created: FakeBrowserControl[] = [];
  return {
    created,
    factory: async (options) => {
      const control = new FakeBrowserControl(options, sites);
      created.push(control);
      return control;
    },
  };
}

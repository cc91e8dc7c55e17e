/**
 * Browser Control Capability
 *
 * The fixed operation set the orchestrator needs from one browser context.
 * Implementations are not safe for concurrent calls; BrowserSessionHandle
 * serializes access.
 */

import type { SupportedKey } from './key-names.js';

/**
 * Interactive element as exposed to clients, addressed by position
 */
export interface InteractiveElement {
  index: number;
  tag: string;
  /** Visible text, truncated to 100 characters */
  text: string;
  placeholder?: string;
  href?: string;
}

export interface TabInfo {
  index: number;
  url: string;
  title: string;
  active: boolean;
}

export interface PageLocation {
  url: string;
  title: string;
}

export interface PageSnapshot {
  url: string;
  title: string;
  elements: InteractiveElement[];
  /** Base64-encoded PNG of the viewport */
  screenshot?: string;
}

export interface PageLink {
  text: string;
  href: string;
}

export interface PageContent {
  url: string;
  title: string;
  text: string;
  links: PageLink[];
}

export type ScrollDirection = 'up' | 'down';

export interface BrowserControl {
  /** Load `url` in the active tab */
  navigate(url: string): Promise<void>;
  /** Append a tab, make it active and load `url` in it */
  openTab(url: string): Promise<void>;
  /** Interactive elements of the active tab, in document order */
  listElements(): Promise<InteractiveElement[]>;
  clickElement(index: number): Promise<void>;
  typeIntoElement(index: number, text: string): Promise<void>;
  pressKey(key: SupportedKey): Promise<void>;
  /** Scroll the active tab by one viewport height */
  scroll(direction: ScrollDirection): Promise<void>;
  goBack(): Promise<void>;
  /** URL and title of the active tab */
  location(): Promise<PageLocation>;
  snapshot(includeScreenshot: boolean): Promise<PageSnapshot>;
  listTabs(): Promise<TabInfo[]>;
  activateTab(index: number): Promise<void>;
  closeTab(index: number): Promise<void>;
  readContent(): Promise<PageContent>;
  tabCount(): number;
  close(): Promise<void>;
}

/**
 * Options for provisioning one browser context
 */
export interface BrowserLaunchOptions {
  headless: boolean;
  userDataDir?: string;
}

/**
 * Provisions browser contexts. Errors thrown here become ProvisioningError.
 */
export type BrowserControlFactory = (options: BrowserLaunchOptions) => Promise<BrowserControl>;

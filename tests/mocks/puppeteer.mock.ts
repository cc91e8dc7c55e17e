/**
 * Mock Puppeteer for unit tests
 *
 * Provides mock implementations of the Puppeteer Browser, Page and
 * ElementHandle surface PuppeteerBrowserControl uses, without launching a
 * real browser.
 */

import { vi, type Mock } from 'vitest';

/**
 * Mock ElementHandle
 */
export interface MockElementHandle {
  click: Mock;
  type: Mock;
  dispose: Mock;
}

/**
 * Mock Page - Puppeteer-specific API
 */
export interface MockPage {
  url: Mock;
  title: Mock;
  goto: Mock;
  goBack: Mock;
  close: Mock;
  isClosed: Mock;
  evaluate: Mock;
  screenshot: Mock;
  bringToFront: Mock;
  $: Mock;
  keyboard: { press: Mock };
}

/**
 * Mock Target - only the parts used to adopt site-opened tabs
 */
export interface MockTarget {
  type: Mock;
  page: Mock;
}

/**
 * Mock Browser with working 'targetcreated' emission
 */
export interface MockBrowser {
  pages: Mock;
  newPage: Mock;
  close: Mock;
  on: Mock;
  off: Mock;
  /** Emit 'targetcreated' to registered listeners */
  emitTargetCreated: (target: MockTarget) => void;
}

export function createMockElementHandle(): MockElementHandle {
  return {
    click: vi.fn().mockResolvedValue(undefined),
    type: vi.fn().mockResolvedValue(undefined),
    dispose: vi.fn().mockResolvedValue(undefined),
  };
}

/**
 * Creates a mock Page. `goto` updates what `url()` reports.
 */
export function createMockPage(
  options: {
    url?: string;
    title?: string;
    element?: MockElementHandle | null;
  } = {}
): MockPage {
  let currentUrl = options.url ?? 'about:blank';
  let closed = false;
  const element = options.element === undefined ? createMockElementHandle() : options.element;

  return {
    url: vi.fn(() => currentUrl),
    title: vi.fn().mockResolvedValue(options.title ?? ''),
    goto: vi.fn((url: string) => {
      currentUrl = url;
      return Promise.resolve(null);
    }),
    goBack: vi.fn().mockResolvedValue(null),
    close: vi.fn(() => {
      closed = true;
      return Promise.resolve();
    }),
    isClosed: vi.fn(() => closed),
    evaluate: vi.fn().mockResolvedValue(undefined),
    screenshot: vi.fn().mockResolvedValue('iVBORw0KGgo='),
    bringToFront: vi.fn().mockResolvedValue(undefined),
    $: vi.fn().mockResolvedValue(element),
    keyboard: { press: vi.fn().mockResolvedValue(undefined) },
  };
}

/**
 * Creates a mock Browser. `newPage` hands out fresh mock pages and records them.
 */
export function createMockBrowser(
  options: {
    pages?: MockPage[];
  } = {}
): MockBrowser & { created: MockPage[] } {
  const listeners = new Set<(target: MockTarget) => void>();
  const created: MockPage[] = [];

  return {
    created,
    pages: vi.fn().mockResolvedValue(options.pages ?? [createMockPage()]),
    newPage: vi.fn(() => {
      const page = createMockPage();
      created.push(page);
      return Promise.resolve(page);
    }),
    close: vi.fn().mockResolvedValue(undefined),
    on: vi.fn((event: string, handler: (target: MockTarget) => void) => {
      if (event === 'targetcreated') listeners.add(handler);
    }),
    off: vi.fn((event: string, handler: (target: MockTarget) => void) => {
      if (event === 'targetcreated') listeners.delete(handler);
    }),
    emitTargetCreated: (target: MockTarget) => {
      listeners.forEach((handler) => handler(target));
    },
  };
}

/**
 * Target announcing a new page
 */
export function createMockPageTarget(page: MockPage): MockTarget {
  return {
    type: vi.fn().mockReturnValue('page'),
    page: vi.fn().mockResolvedValue(page),
  };
}

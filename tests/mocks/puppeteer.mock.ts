/**
 * Mock Puppeteer for unit tests
 *
 * Covers the subset of Browser, BrowserContext, Page and ElementHandle that
 * the render session and document renderer touch.
 */

import { vi, type Mock } from 'vitest';

export interface MockElementHandle {
  screenshot: Mock;
  dispose: Mock;
}

export interface MockPage {
  setViewport: Mock;
  setContent: Mock;
  evaluate: Mock;
  $: Mock;
  close: Mock;
}

export interface MockBrowserContext {
  newPage: Mock;
  close: Mock;
}

export interface MockBrowser {
  connected: boolean;
  createBrowserContext: Mock;
  close: Mock;
  on: Mock;
  off: Mock;
  /** Simulate a crash: flips `connected` and fires 'disconnected' */
  crash: () => void;
}

/** Bytes returned by the mock element screenshot */
export const MOCK_PNG_BYTES = new Uint8Array([0x89, 0x50, 0x4e, 0x47]);

export function createMockElementHandle(): MockElementHandle {
  return {
    screenshot: vi.fn().mockResolvedValue(MOCK_PNG_BYTES),
    dispose: vi.fn().mockResolvedValue(undefined),
  };
}

export function createMockPage(options: { root?: MockElementHandle | null } = {}): MockPage {
  const root = options.root === undefined ? createMockElementHandle() : options.root;
  return {
    setViewport: vi.fn().mockResolvedValue(undefined),
    setContent: vi.fn().mockResolvedValue(undefined),
    evaluate: vi.fn().mockResolvedValue(true),
    $: vi.fn().mockResolvedValue(root),
    close: vi.fn().mockResolvedValue(undefined),
  };
}

export function createMockBrowserContext(page: MockPage = createMockPage()): MockBrowserContext {
  return {
    newPage: vi.fn().mockResolvedValue(page),
    close: vi.fn().mockResolvedValue(undefined),
  };
}

export function createMockBrowser(
  context: MockBrowserContext = createMockBrowserContext()
): MockBrowser {
  const listeners = new Map<string, Set<() => void>>();

  const browser: MockBrowser = {
    connected: true,
    createBrowserContext: vi.fn().mockResolvedValue(context),
    close: vi.fn().mockImplementation(() => {
      browser.connected = false;
      return Promise.resolve();
    }),
    on: vi.fn().mockImplementation((event: string, handler: () => void) => {
      const set = listeners.get(event) ?? new Set<() => void>();
      set.add(handler);
      listeners.set(event, set);
    }),
    off: vi.fn().mockImplementation((event: string, handler: () => void) => {
      listeners.get(event)?.delete(handler);
    }),
    crash: () => {
      browser.connected = false;
      for (const handler of listeners.get('disconnected') ?? []) {
        handler();
      }
    },
  };

  return browser;
}

/**
 * Browser, context, page and root element wired together
 */
export function createLinkedMocks(): {
  browser: MockBrowser;
  context: MockBrowserContext;
  page: MockPage;
  root: MockElementHandle;
} {
  const root = createMockElementHandle();
  const page = createMockPage({ root });
  const context = createMockBrowserContext(page);
  const browser = createMockBrowser(context);
  return { browser, context, page, root };
}

/**
 * Render Session
 *
 * Owns the single persistent headless browser used for rendering, and hands
 * out one isolated browser context and page per render request.
 *
 * States: uninitialized -> ready -> (ready | dead) -> closed
 *
 * The browser is reused across requests until it is found disconnected.
 * The next request then reopens it once before giving up. Contexts and pages
 * are never reused; both are closed before `withPage` returns.
 */

import os from 'node:os';
import path from 'node:path';
import puppeteer, { type Browser, type Page } from 'puppeteer-core';
import { ensureEngineInstalled, type ChromeChannel } from './engine-installer.js';
import { getLogger, asError } from '../shared/services/logging.service.js';
import { RenderError } from '../shared/errors/render.error.js';
import { extractErrorMessage } from '../shared/errors/extract-error-message.js';

export type { Page };

export type SessionState = 'uninitialized' | 'ready' | 'dead' | 'closed';

/** Default directory for downloaded browser builds */
export const DEFAULT_ENGINE_CACHE_DIR = path.join(
  os.homedir(),
  '.cache',
  'md-reply-renderer',
  'browsers'
);

/** Flags for running inside containers without a user namespace sandbox */
const SANDBOX_ARGS = ['--no-sandbox', '--disable-setuid-sandbox', '--disable-dev-shm-usage'];

export interface RenderSessionOptions {
  /** Path to a Chrome executable (skips provisioning) */
  executablePath?: string;

  /** System Chrome channel (skips provisioning) */
  channel?: ChromeChannel;

  /** Where provisioned browser builds live */
  engineCacheDir?: string;

  /** Additional Chrome command-line arguments */
  args?: string[];
}

/**
 * Per-request page settings
 */
export interface PageSettings {
  viewport: { width: number; height: number };
  /** Pixel density multiplier; values above 1 sharpen the capture */
  deviceScaleFactor: number;
}

export class RenderSession {
  private browser: Browser | null = null;
  private _state: SessionState = 'uninitialized';
  private opening: Promise<void> | null = null;
  private disconnectHandler: (() => void) | null = null;
  private readonly logger = getLogger();

  constructor(private readonly options: RenderSessionOptions = {}) {}

  get state(): SessionState {
    return this._state;
  }

  /**
   * Whether the persistent browser exists and is still connected
   */
  isAlive(): boolean {
    return this.browser?.connected ?? false;
  }

  /**
   * Provision and launch the persistent browser.
   *
   * Never throws on launch failure: the session is left `dead` and the next
   * render retries. Concurrent callers share the same in-flight attempt.
   *
   * @throws RenderError if the session has been closed
   */
  async open(): Promise<void> {
    if (this._state === 'closed') {
      throw RenderError.invalidState(this._state, 'open');
    }

    this.opening ??= this.launchEngine().finally(() => {
      this.opening = null;
    });
    return this.opening;
  }

  /**
   * Run `work` against a fresh page in a fresh browser context.
   *
   * Reopens a dead browser once before giving up with ENGINE_UNAVAILABLE.
   * The page and its context are released on every exit path.
   */
  async withPage<T>(settings: PageSettings, work: (page: Page) => Promise<T>): Promise<T> {
    const browser = await this.acquireBrowser();
    const context = await browser.createBrowserContext();

    try {
      const page = await context.newPage();
      try {
        await page.setViewport({
          width: settings.viewport.width,
          height: settings.viewport.height,
          deviceScaleFactor: settings.deviceScaleFactor,
        });
        return await work(page);
      } finally {
        await page.close().catch((err: unknown) => {
          this.logger.debug('Page close failed', { error: extractErrorMessage(err) });
        });
      }
    } finally {
      await context.close().catch((err: unknown) => {
        this.logger.debug('Browser context close failed', { error: extractErrorMessage(err) });
      });
    }
  }

  /**
   * Close the persistent browser. Idempotent; safe before `open()`.
   */
  async close(): Promise<void> {
    if (this._state === 'closed') {
      return;
    }

    const previous = this._state;
    this.transitionTo('closed');

    // A launch in flight closes its own browser once it sees the closed state
    if (this.opening) {
      await this.opening;
    }

    if (previous !== 'uninitialized') {
      this.logger.info('Closing render session');
    }
    await this.disposeBrowser();
  }

  private async acquireBrowser(): Promise<Browser> {
    if (this._state === 'closed') {
      throw RenderError.sessionClosed();
    }

    if (!this.isAlive()) {
      this.logger.warning('Render engine not available, reinitializing', { state: this._state });
      await this.open();
    }

    const browser = this.browser;
    if (!browser?.connected) {
      throw RenderError.engineUnavailable({ state: this._state });
    }
    return browser;
  }

  private async launchEngine(): Promise<void> {
    // Drop a dead handle before replacing it
    await this.disposeBrowser();

    const { channel, args = [] } = this.options;
    const executablePath = await ensureEngineInstalled({
      executablePath: this.options.executablePath,
      channel,
      cacheDir: this.options.engineCacheDir ?? DEFAULT_ENGINE_CACHE_DIR,
    });

    this.logger.info('Launching render engine', {
      executablePath,
      channel: executablePath ? undefined : (channel ?? 'chrome'),
    });

    let browser: Browser;
    try {
      browser = await puppeteer.launch({
        headless: true,
        executablePath,
        channel: executablePath ? undefined : (channel ?? 'chrome'),
        args: [...SANDBOX_ARGS, ...args],
      });
    } catch (error) {
      const launchError = RenderError.engineLaunchFailed(asError(error), { executablePath });
      this.logger.error('Render engine launch failed', launchError);
      if (this._state !== 'closed') {
        this.transitionTo('dead');
      }
      return;
    }

    if (this._state === 'closed') {
      await browser.close().catch((err: unknown) => {
        this.logger.debug('Browser close after shutdown failed', {
          error: extractErrorMessage(err),
        });
      });
      return;
    }

    this.browser = browser;
    this.disconnectHandler = () => {
      if (this._state === 'ready') {
        this.logger.warning('Render engine disconnected unexpectedly');
        this.transitionTo('dead');
      }
    };
    browser.on('disconnected', this.disconnectHandler);

    this.transitionTo('ready');
    this.logger.info('Render engine ready');
  }

  private async disposeBrowser(): Promise<void> {
    const browser = this.browser;
    if (!browser) {
      return;
    }

    if (this.disconnectHandler) {
      browser.off('disconnected', this.disconnectHandler);
      this.disconnectHandler = null;
    }
    this.browser = null;

    try {
      await browser.close();
    } catch (err) {
      // Already gone when the engine crashed
      this.logger.debug('Browser close failed', { error: extractErrorMessage(err) });
    }
  }

  private transitionTo(next: SessionState): void {
    const previous = this._state;
    if (previous === next) return;
    this._state = next;
    this.logger.debug('Render session state changed', { previous, current: next });
  }
}

/**
 * Document Renderer
 *
 * Markdown -> HTML fragment -> styled page -> element screenshot -> PNG in
 * the cache directory. Every failure is caught here and returned as a
 * RenderResult carrying the original content.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import type { RenderSession, Page } from '../browser/render-session.js';
import { markdownToHtml, type MarkdownConverter } from './markdown-converter.js';
import { buildDocument, MAX_AUTO_WIDTH } from './document-template.js';
import {
  renderFailed,
  renderSucceeded,
  type ContentRenderer,
  type RenderFailureReason,
  type RenderRequest,
  type RenderResult,
} from './render.types.js';
import { saveImage, fileExists } from '../lib/image-file.js';
import { RenderError } from '../shared/errors/render.error.js';
import { extractErrorMessage } from '../shared/errors/extract-error-message.js';
import { getLogger, asError } from '../shared/services/logging.service.js';

/** Element captured as the image */
export const ROOT_SELECTOR = 'body';

/** Generous surface so wide content is not force-wrapped */
export const DEFAULT_VIEWPORT = { width: 1600, height: 1200 };

export const DEFAULT_SETTLE_DELAY_MS = 300;

export const DEFAULT_NAVIGATION_TIMEOUT_MS = 30000;

/**
 * Typesets the page once MathJax has started up.
 * Resolves false when MathJax never loaded (e.g. offline).
 */
const TYPESET_SCRIPT = `(async () => {
  const mathJax = window.MathJax;
  if (!mathJax || !mathJax.startup || typeof mathJax.typesetPromise !== 'function') {
    return false;
  }
  await mathJax.startup.promise;
  await mathJax.typesetPromise();
  return true;
})()`;

export interface DocumentRendererOptions {
  /** Directory receiving rendered PNGs */
  cacheDir: string;
  mathJaxUrl?: string;
  /** Wait after typesetting before capture (ms) */
  settleDelayMs?: number;
  /** Timeout for loading the page content (ms) */
  navigationTimeoutMs?: number;
  maxWidth?: number;
  viewport?: { width: number; height: number };
  /** Markdown converter (default: unified/remark pipeline) */
  convert?: MarkdownConverter;
}

function failureReason(error: unknown): RenderFailureReason {
  if (RenderError.isRenderError(error)) {
    switch (error.code) {
      case 'EMPTY_DOCUMENT':
        return 'EMPTY_DOCUMENT';
      case 'MISSING_OUTPUT':
        return 'MISSING_OUTPUT';
      case 'ENGINE_UNAVAILABLE':
      case 'ENGINE_LAUNCH_FAILED':
      case 'ENGINE_INSTALL_FAILED':
      case 'SESSION_CLOSED':
        return 'ENGINE_UNAVAILABLE';
      case 'INVALID_STATE':
        return 'UNKNOWN';
    }
  }
  // puppeteer's TimeoutError
  if (error instanceof Error && error.name === 'TimeoutError') {
    return 'TIMEOUT';
  }
  return 'UNKNOWN';
}

export class DocumentRenderer implements ContentRenderer {
  private readonly logger = getLogger();
  private readonly convert: MarkdownConverter;
  private readonly settleDelayMs: number;
  private readonly navigationTimeoutMs: number;
  private readonly viewport: { width: number; height: number };

  constructor(
    private readonly session: RenderSession,
    private readonly options: DocumentRendererOptions
  ) {
    this.convert = options.convert ?? markdownToHtml;
    this.settleDelayMs = options.settleDelayMs ?? DEFAULT_SETTLE_DELAY_MS;
    this.navigationTimeoutMs = options.navigationTimeoutMs ?? DEFAULT_NAVIGATION_TIMEOUT_MS;
    this.viewport = options.viewport ?? DEFAULT_VIEWPORT;
  }

  async render(request: RenderRequest): Promise<RenderResult> {
    const startTime = Date.now();

    try {
      const fragment = await this.convert(request.content);
      const html = buildDocument(fragment, {
        minWidth: request.minWidth,
        maxWidth: this.options.maxWidth ?? MAX_AUTO_WIDTH,
        fixedWidth: request.fixedWidth,
        mathJaxUrl: this.options.mathJaxUrl,
      });

      const path = await this.session.withPage(
        { viewport: this.viewport, deviceScaleFactor: request.scaleFactor },
        (page) => this.capture(page, html)
      );

      this.logger.debug('Rendered segment', { path, durationMs: Date.now() - startTime });
      return renderSucceeded(path);
    } catch (error) {
      const reason = failureReason(error);
      const message = extractErrorMessage(error);

      if (reason === 'MISSING_OUTPUT') {
        this.logger.warning('Render produced no image file', { reason, message });
      } else {
        this.logger.error('Render failed', asError(error), {
          reason,
          durationMs: Date.now() - startTime,
        });
      }
      return renderFailed(reason, message, request.content);
    }
  }

  private async capture(page: Page, html: string): Promise<string> {
    await page.setContent(html, {
      waitUntil: 'networkidle0',
      timeout: this.navigationTimeoutMs,
    });

    await this.typeset(page);

    const root = await page.$(ROOT_SELECTOR);
    if (!root) {
      throw RenderError.emptyDocument(ROOT_SELECTOR);
    }

    try {
      const data = await root.screenshot({ type: 'png' });
      const path = await saveImage(this.options.cacheDir, data);
      if (!(await fileExists(path))) {
        throw RenderError.missingOutput(path);
      }
      return path;
    } finally {
      await root.dispose();
    }
  }

  private async typeset(page: Page): Promise<void> {
    const typeset = await page.evaluate(TYPESET_SCRIPT);
    if (typeset !== true) {
      this.logger.warning('MathJax not available; math left as source');
    }
    await sleep(this.settleDelayMs);
  }
}

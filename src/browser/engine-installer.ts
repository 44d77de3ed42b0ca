/**
 * Render Engine Installer
 *
 * Best-effort provisioning of a headless Chrome build before launch.
 * Failures are logged and never thrown: the session then falls back to a
 * system Chrome channel, and a failed launch is retried on the next render.
 */

import {
  Browser,
  detectBrowserPlatform,
  getInstalledBrowsers,
  install,
  resolveBuildId,
} from '@puppeteer/browsers';
import { getLogger, asError } from '../shared/services/logging.service.js';
import { RenderError } from '../shared/errors/render.error.js';

const logger = getLogger();

export type ChromeChannel = 'chrome' | 'chrome-canary' | 'chrome-beta' | 'chrome-dev';

export interface EngineInstallOptions {
  /** Explicit browser binary; skips provisioning */
  executablePath?: string;

  /** System Chrome channel; skips provisioning */
  channel?: ChromeChannel;

  /** Directory holding downloaded browser builds */
  cacheDir: string;

  /** Release tag to resolve when nothing is installed yet (default: 'stable') */
  buildTag?: string;
}

/**
 * Resolve an executable for the render engine, downloading
 * chrome-headless-shell into `cacheDir` when none is present.
 *
 * @returns Executable path, or undefined when launch should use a channel
 */
export async function ensureEngineInstalled(
  options: EngineInstallOptions
): Promise<string | undefined> {
  if (options.executablePath) {
    return options.executablePath;
  }
  if (options.channel) {
    return undefined;
  }

  const { cacheDir, buildTag = 'stable' } = options;

  try {
    const installed = await getInstalledBrowsers({ cacheDir });
    const existing = installed.find((entry) => entry.browser === Browser.CHROMEHEADLESSSHELL);
    if (existing) {
      logger.debug('Render engine already installed', {
        buildId: existing.buildId,
        executablePath: existing.executablePath,
      });
      return existing.executablePath;
    }

    const platform = detectBrowserPlatform();
    if (!platform) {
      throw new Error(`Unsupported platform: ${process.platform} ${process.arch}`);
    }

    const buildId = await resolveBuildId(Browser.CHROMEHEADLESSSHELL, platform, buildTag);
    logger.info('Installing render engine', { buildId, cacheDir });

    const browser = await install({ browser: Browser.CHROMEHEADLESSSHELL, buildId, cacheDir });
    logger.info('Render engine installed', { executablePath: browser.executablePath });
    return browser.executablePath;
  } catch (error) {
    const installError = RenderError.engineInstallFailed(asError(error), { cacheDir });
    logger.warning(installError.message, installError.context);
    return undefined;
  }
}

// src/core/render/page.ts
import type { HtmlRenderer, RenderOptions } from './types.js';
import type { BrowserManager } from './browser.js';
import { ErrorCode, SitewatchError, errorMessage } from '../errors.js';
import { logger } from '../logger.js';

export class PageRenderer implements HtmlRenderer {
  constructor(private browserManager: BrowserManager) {}

  async render(url: string, options: RenderOptions): Promise<string> {
    const browser = await this.browserManager.launch();
    const context = await browser.newContext({ userAgent: options.userAgent });

    try {
      const page = await context.newPage();

      try {
        await page.goto(url, { waitUntil: 'domcontentloaded', timeout: options.timeoutMs });
      } catch (error) {
        throw new SitewatchError(
          ErrorCode.RENDER_FAILED,
          `Failed to load ${url}: ${errorMessage(error)}`,
          true
        );
      }

      if (options.waitForSelector) {
        // A listing that never shows the selector is still worth reading
        await page
          .waitForSelector(options.waitForSelector, { timeout: options.timeoutMs })
          .catch(error => logger.debug(`No ${options.waitForSelector} on ${url}: ${errorMessage(error)}`));
      }

      if (options.settleMs) {
        await page.waitForTimeout(options.settleMs);
      }

      return await page.content();
    } finally {
      await context.close();
    }
  }
}

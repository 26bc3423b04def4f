// src/core/render/browser.ts
import { chromium, type Browser } from 'playwright';
import { ErrorCode, SitewatchError, errorMessage } from '../errors.js';
import { logger } from '../logger.js';

/**
 * Owns the single headless browser shared by every adapter during a run.
 * Launched on first use; the runner closes it when the run ends.
 */
export class BrowserManager {
  private browser?: Browser;
  private launching?: Promise<Browser>;

  async launch(): Promise<Browser> {
    if (this.browser) {
      return this.browser;
    }
    if (!this.launching) {
      this.launching = this.doLaunch();
    }
    try {
      this.browser = await this.launching;
      return this.browser;
    } finally {
      this.launching = undefined;
    }
  }

  private async doLaunch(): Promise<Browser> {
    try {
      logger.info('Launching headless browser');
      return await chromium.launch({ headless: true });
    } catch (error) {
      throw new SitewatchError(
        ErrorCode.BROWSER_NOT_FOUND,
        `Failed to launch browser: ${errorMessage(error)}`,
        false,
        'Run `sitewatch install-browsers` to install Chromium'
      );
    }
  }

  isLaunched(): boolean {
    return this.browser !== undefined;
  }

  async close(): Promise<void> {
    if (this.browser) {
      await this.browser.close();
      this.browser = undefined;
    }
  }
}

/**
 * Probe driver - Playwright session that loads a candidate URL and
 * classifies the page it lands on
 */

import { Browser, BrowserContext, BrowserType, chromium, errors, firefox, webkit } from 'playwright';
import { classifyPage } from './detections';
import { ProbeCrashError, ProbeTimeoutError, describeError } from './errors';
import { BrowserName, DriverConfig, ProbeVerdict } from './types';
import { getScreenshotPath, sleep } from './utils';

/**
 * What the runner needs from a browser session
 */
export interface ProbeDriver {
  open(): Promise<void>;
  /** Throws ProbeTimeoutError or ProbeCrashError when no verdict could be reached */
  probe(url: string, timeoutMs: number, code: string): Promise<ProbeVerdict>;
  isAlive(): boolean;
  close(): Promise<void>;
}

const BROWSER_TYPES: Record<BrowserName, BrowserType> = {
  chromium,
  firefox,
  webkit,
};

export class PlaywrightProbeDriver implements ProbeDriver {
  private browser: Browser | null = null;

  constructor(private readonly config: DriverConfig) {}

  async open(): Promise<void> {
    if (this.browser) {
      await this.close();
    }

    try {
      this.browser = await BROWSER_TYPES[this.config.browser].launch({
        headless: this.config.headless,
        args: this.config.browser === 'chromium' ? ['--disable-dev-shm-usage'] : [],
      });
      console.log(`🌐 Browser launched (${this.config.browser}, headless: ${this.config.headless})`);
    } catch (error) {
      this.browser = null;
      throw new ProbeCrashError(`Could not launch ${this.config.browser}: ${describeError(error)}`, { cause: error });
    }
  }

  isAlive(): boolean {
    return this.browser !== null && this.browser.isConnected();
  }

  async probe(url: string, timeoutMs: number, code: string): Promise<ProbeVerdict> {
    if (!this.browser || !this.browser.isConnected()) {
      throw new ProbeCrashError('Browser not running. Call open() first.');
    }

    let context: BrowserContext | null = null;
    try {
      // Fresh context per probe so cookies from one candidate never reach the next
      context = await this.browser.newContext({
        javaScriptEnabled: !this.config.disableJavaScript,
        viewport: { width: 1440, height: 900 },
      });
      if (this.config.blockImages) {
        await context.route('**/*', route =>
          route.request().resourceType() === 'image' ? route.abort() : route.continue()
        );
      }

      const page = await context.newPage();
      await page.goto(url, { waitUntil: 'domcontentloaded', timeout: timeoutMs });
      await sleep(this.config.dwellMs);

      const domText = await page.innerText('body');
      const verdict = classifyPage(domText, this.config.rules);

      if (verdict.outcome === 'accepted' && this.config.screenshots) {
        // A failed screenshot never changes the verdict
        try {
          const screenshotPath = getScreenshotPath(this.config.screenshotDir, code);
          await page.screenshot({ path: screenshotPath, quality: 70, fullPage: true });
          console.log(`  📸 Screenshot saved: ${screenshotPath}`);
        } catch (screenshotError) {
          console.error(`  ✗ Screenshot failed for ${code}:`, describeError(screenshotError));
        }
      }

      return verdict;
    } catch (error) {
      if (error instanceof errors.TimeoutError) {
        throw new ProbeTimeoutError(url, timeoutMs, { cause: error });
      }
      throw new ProbeCrashError(`Automation failure on ${url}: ${describeError(error)}`, { cause: error });
    } finally {
      if (context) {
        await context.close().catch(closeError => {
          console.error('Error closing browser context:', describeError(closeError));
        });
      }
    }
  }

  async close(): Promise<void> {
    if (!this.browser) return;
    const browser = this.browser;
    this.browser = null;
    try {
      await browser.close();
      console.log('🔴 Browser closed');
    } catch (error) {
      console.error('Error closing browser:', describeError(error));
    }
  }
}

import { chromium, type Page } from 'playwright';
import { loggers } from '../config/logger';
import { BlockedError, FetchError, getErrorMessage } from '../lib/errors';
import { type FetchedPage, type FetchPageOptions, type PageFetcher, looksBlocked } from './pageFetcher';

const log = loggers.scraper;

const SCROLL_ROUNDS = 3;

/**
 * Renders pages in headless Chromium for platforms whose reviews are
 * injected client-side. Only used when BROWSER_RENDERING is enabled.
 */
export class BrowserPageFetcher implements PageFetcher {
  constructor(private readonly timeoutMs: number) {}

  async fetch(url: string, options: FetchPageOptions = {}): Promise<FetchedPage> {
    const browser = await chromium.launch({ headless: true });
    // Configure user agent and viewport on the context; Playwright has no
    // page.setUserAgent.
    const context = await browser.newContext({
      userAgent:
        'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 ' +
        '(KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
      viewport: { width: 1366, height: 768 },
      locale: 'en-US',
      extraHTTPHeaders: {
        'Accept-Language': 'en-US,en;q=0.9',
        ...(options.referer ? { Referer: options.referer } : {}),
      },
    });
    let page: Page | null = null;

    try {
      page = await context.newPage();
      const response = await page.goto(url, {
        timeout: this.timeoutMs,
        waitUntil: 'networkidle',
      });
      const status = response?.status() ?? 200;

      await this.dismissInterstitials(page);
      await this.scrollForLazyReviews(page);

      const html = await page.content();
      if (status === 403 || status === 429 || looksBlocked(html)) {
        throw new BlockedError(url, status);
      }
      if (status >= 400) {
        throw new FetchError(url, `HTTP ${status}`, status);
      }
      return { url: page.url(), status, html };
    } catch (err) {
      if (err instanceof BlockedError || err instanceof FetchError) throw err;
      const message = getErrorMessage(err);
      throw new FetchError(url, message, undefined, /timeout/i.test(message));
    } finally {
      if (page) {
        await page.close().catch((err: unknown) => {
          log.debug({ err: getErrorMessage(err) }, 'page close failed');
        });
      }
      await context.close().catch((err: unknown) => {
        log.debug({ err: getErrorMessage(err) }, 'browser context close failed');
      });
      await browser.close().catch((err: unknown) => {
        log.debug({ err: getErrorMessage(err) }, 'browser close failed');
      });
    }
  }

  /**
   * Cookie-consent walls hide the review list in some headless sessions.
   */
  private async dismissInterstitials(page: Page): Promise<void> {
    const candidateButtons = [
      page.getByRole('button', { name: /Accept all/i }),
      page.getByRole('button', { name: /I agree/i }),
      page.getByRole('button', { name: /Accept/i }),
    ];

    for (const buttonLocator of candidateButtons) {
      const count = await buttonLocator.count();
      if (count > 0) {
        try {
          await buttonLocator.first().click({ timeout: 2_000 });
          await page.waitForTimeout(1_000);
        } catch (err) {
          log.debug({ err: getErrorMessage(err) }, 'consent button click failed');
        }
        return;
      }
    }
  }

  private async scrollForLazyReviews(page: Page): Promise<void> {
    for (let i = 0; i < SCROLL_ROUNDS; i += 1) {
      await page.mouse.wheel(0, 2_000);
      await page.waitForTimeout(750);
    }
  }
}

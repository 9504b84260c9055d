import { loggers } from '../../config/logger';
import { ExtractionError, getErrorMessage } from '../../lib/errors';
import type { Review, ReviewAdapter, ScrapeOptions } from '../../types';
import { findAsin, isHttpUrl, resolveAmazonAsin } from '../../validation/inputs';
import { type AdapterDeps, scrapePage } from './common';

const log = loggers.scraper;

export function amazonReviewPageUrls(asin: string): string[] {
  return [
    `https://www.amazon.com/product-reviews/${asin}/ref=cm_cr_dp_d_show_all_btm`,
    `https://www.amazon.com/dp/${asin}/ref=cm_cr_dp_d_show_all_btm`,
    `https://www.amazon.com/product-reviews/${asin}`,
  ];
}

/**
 * Amazon reviews are always scraped: the Product Advertising API does not
 * expose review text, so configured credentials only show up in /health.
 */
export class AmazonAdapter implements ReviewAdapter {
  public readonly platform = 'amazon';

  constructor(private readonly deps: AdapterDeps) {}

  canHandle(target: string): boolean {
    return (
      isHttpUrl(target) &&
      this.deps.registry.detect(target)?.id === this.platform &&
      findAsin(target) !== undefined
    );
  }

  async scrape(target: string, options: ScrapeOptions = {}): Promise<Review[]> {
    const asin = resolveAmazonAsin(target);
    const productUrl = `https://www.amazon.com/dp/${asin}`;
    let lastError: unknown;

    for (const url of amazonReviewPageUrls(asin)) {
      try {
        return await scrapePage(this.deps, url, {
          platform: this.platform,
          config: this.deps.registry.get(this.platform),
          referer: productUrl,
          reviewUrl: productUrl,
          maxReviews: options.maxReviews,
          heuristic: false,
        });
      } catch (err) {
        lastError = err;
        log.warn({ asin, url, err: getErrorMessage(err) }, 'Amazon page attempt failed');
      }
    }

    throw lastError ?? new ExtractionError(`No Amazon review page could be fetched for ${asin}`);
  }
}

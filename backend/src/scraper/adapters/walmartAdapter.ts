import type { Review, ReviewAdapter, ScrapeOptions } from '../../types';
import { isHttpUrl, resolveWalmartProductId } from '../../validation/inputs';
import { type AdapterDeps, scrapePage } from './common';

export class WalmartAdapter implements ReviewAdapter {
  public readonly platform = 'walmart';

  constructor(private readonly deps: AdapterDeps) {}

  canHandle(target: string): boolean {
    return (
      isHttpUrl(target) &&
      this.deps.registry.detect(target)?.id === this.platform &&
      /\/ip\/(?:[^/]+\/)?\d{3,20}(?:[/?#]|$)/.test(target)
    );
  }

  async scrape(target: string, options: ScrapeOptions = {}): Promise<Review[]> {
    const productId = resolveWalmartProductId(target);
    const pageUrl = `https://www.walmart.com/ip/${productId}`;

    return scrapePage(this.deps, pageUrl, {
      platform: this.platform,
      config: this.deps.registry.get(this.platform),
      referer: 'https://www.walmart.com/',
      reviewUrl: pageUrl,
      maxReviews: options.maxReviews,
    });
  }
}

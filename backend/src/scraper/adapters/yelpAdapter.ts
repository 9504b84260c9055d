import { loggers } from '../../config/logger';
import { getErrorMessage } from '../../lib/errors';
import type { Review, ReviewAdapter, ScrapeOptions } from '../../types';
import { isHttpUrl, resolveYelpBusinessId } from '../../validation/inputs';
import { toReviews } from '../extract';
import { type AdapterDeps, scrapePage, sourceTag } from './common';
import { YelpFusionClient } from './yelpClient';

const log = loggers.scraper;

export class YelpAdapter implements ReviewAdapter {
  public readonly platform = 'yelp';

  constructor(
    private readonly deps: AdapterDeps,
    private readonly client?: YelpFusionClient,
  ) {}

  canHandle(target: string): boolean {
    return (
      isHttpUrl(target) &&
      this.deps.registry.detect(target)?.id === this.platform &&
      target.includes('/biz/')
    );
  }

  async scrape(target: string, options: ScrapeOptions = {}): Promise<Review[]> {
    const businessId = resolveYelpBusinessId(target);
    const pageUrl = `https://www.yelp.com/biz/${encodeURIComponent(businessId)}`;

    if (this.client) {
      try {
        return await this.fromApi(this.client, businessId, pageUrl, options);
      } catch (err) {
        log.warn(
          { businessId, err: getErrorMessage(err) },
          'Yelp API failed, falling back to scraping',
        );
      }
    } else {
      log.info({ businessId }, 'no Yelp API key, scraping only');
    }

    return scrapePage(this.deps, pageUrl, {
      platform: this.platform,
      config: this.deps.registry.get(this.platform),
      referer: 'https://www.yelp.com/',
      reviewUrl: pageUrl,
      maxReviews: options.maxReviews,
    });
  }

  private async fromApi(
    client: YelpFusionClient,
    businessId: string,
    pageUrl: string,
    options: ScrapeOptions,
  ): Promise<Review[]> {
    const apiReviews = await client.businessReviews(businessId);
    return toReviews(
      apiReviews.map((r) => ({
        reviewerName: r.user?.name,
        rating: Math.min(Math.max(r.rating, 0), 5),
        text: r.text,
        date: r.time_created,
      })),
      {
        url: pageUrl,
        platform: this.platform,
        source: sourceTag(this.platform, 'api'),
        maxReviews: options.maxReviews,
      },
    );
  }
}

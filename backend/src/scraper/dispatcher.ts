import { loggers } from '../config/logger';
import { runInBatches } from '../lib/batches';
import {
  UnsupportedPlatformError,
  ValidationError,
  getErrorMessage,
} from '../lib/errors';
import { PlatformRegistry } from '../platforms/registry';
import type { Review, ReviewAdapter, ScrapeMethod } from '../types';
import { validateUrl } from '../validation/inputs';
import { methodOfSource } from './adapters/common';
import { DEFAULT_MAX_REVIEWS } from './extract';
import { UniversalAdapter } from './adapters/universalAdapter';

const log = loggers.scraper;

export const DEFAULT_PRODUCT_PLATFORMS = ['amazon', 'walmart', 'target', 'bestbuy', 'ebay'];
export const PRODUCT_SEARCH_CONCURRENCY = 3;

export type TargetPlatform = 'yelp' | 'amazon' | 'walmart';

export type DispatchOptions = {
  platform?: string;
  maxReviews?: number;
};

export type DispatchResult = {
  platform: string;
  method: ScrapeMethod;
  url: string;
  reviews: Review[];
};

export type PlatformOutcome =
  | { platform: string; status: 'ok'; url: string; count: number }
  | { platform: string; status: 'error'; url?: string; error: string };

export type ProductScrapeResult = {
  product: string;
  reviews: Review[];
  platformResults: PlatformOutcome[];
};

function methodOf(reviews: Review[]): ScrapeMethod {
  return reviews.length ? methodOfSource(reviews[0].source) : 'scraping';
}

/**
 * Routes a URL, identifier or product name to the adapter that should
 * handle it. Dedicated adapters are tried in order; anything else goes to
 * the universal adapter.
 */
export class ScraperDispatcher {
  constructor(
    private readonly registry: PlatformRegistry,
    private readonly adapters: ReviewAdapter[],
    private readonly universal: UniversalAdapter,
    private readonly defaultMaxReviews = DEFAULT_MAX_REVIEWS,
  ) {}

  async scrapeUrl(rawUrl: string, options: DispatchOptions = {}): Promise<DispatchResult> {
    const url = validateUrl(rawUrl);
    const override = options.platform?.trim().toLowerCase();

    let adapter: ReviewAdapter;
    let platform: string;
    if (override) {
      const dedicated = this.adapters.find(
        (a) => a.platform === override && a.canHandle(url),
      );
      if (!dedicated && !this.registry.get(override)) {
        throw new UnsupportedPlatformError(override);
      }
      adapter = dedicated ?? this.universal;
      platform = override;
    } else {
      const dedicated = this.adapters.find((a) => a.canHandle(url));
      adapter = dedicated ?? this.universal;
      platform = dedicated ? dedicated.platform : this.universal.platformFor(url);
    }

    log.info({ url, platform, adapter: adapter.platform }, 'dispatching scrape');
    const reviews = await adapter.scrape(url, {
      platform: override,
      maxReviews: options.maxReviews ?? this.defaultMaxReviews,
    });
    return { platform, method: methodOf(reviews), url, reviews };
  }

  async scrapeTarget(
    platform: TargetPlatform,
    input: string,
    options: Omit<DispatchOptions, 'platform'> = {},
  ): Promise<DispatchResult> {
    const adapter = this.adapters.find((a) => a.platform === platform);
    if (!adapter) throw new UnsupportedPlatformError(platform);

    const reviews = await adapter.scrape(input, {
      maxReviews: options.maxReviews ?? this.defaultMaxReviews,
    });
    return { platform, method: methodOf(reviews), url: input.trim(), reviews };
  }

  /**
   * Search several storefronts for a product name. A platform that fails is
   * reported in `platformResults` and never fails the call.
   */
  async scrapeProduct(
    name: string,
    options: { platforms?: string[]; maxReviews?: number } = {},
  ): Promise<ProductScrapeResult> {
    const product = name.trim();
    if (!product) {
      throw new ValidationError('Product name must be a non-empty string');
    }

    const requested = options.platforms?.length
      ? options.platforms.map((p) => p.trim().toLowerCase()).filter(Boolean)
      : DEFAULT_PRODUCT_PLATFORMS;
    const platforms = [...new Set(requested)];

    const outcomes = await runInBatches(
      platforms,
      PRODUCT_SEARCH_CONCURRENCY,
      async (platform): Promise<{ outcome: PlatformOutcome; reviews: Review[] }> => {
        if (!this.registry.get(platform)) {
          return {
            outcome: { platform, status: 'error', error: `Unsupported platform: ${platform}` },
            reviews: [],
          };
        }
        const url = this.registry.searchUrl(platform, product);
        if (!url) {
          return {
            outcome: { platform, status: 'error', error: 'No product search URL configured' },
            reviews: [],
          };
        }

        try {
          const reviews = await this.universal.scrape(url, {
            platform,
            maxReviews: options.maxReviews ?? this.defaultMaxReviews,
          });
          return { outcome: { platform, status: 'ok', url, count: reviews.length }, reviews };
        } catch (err) {
          const error = getErrorMessage(err);
          log.warn({ product, platform, err: error }, 'product search failed on platform');
          return { outcome: { platform, status: 'error', url, error }, reviews: [] };
        }
      },
    );

    return {
      product,
      reviews: outcomes.flatMap((o) => o.reviews),
      platformResults: outcomes.map((o) => o.outcome),
    };
  }
}

import { loggers } from '../../config/logger';
import { PlatformRegistry } from '../../platforms/registry';
import type { PlatformConfig, Review, ScrapeMethod } from '../../types';
import {
  type RawReview,
  extractHeuristicReviews,
  extractJsonLdReviews,
  extractWithConfig,
  toReviews,
} from '../extract';
import { type PageFetchers, selectFetcher } from '../pageFetcher';

const log = loggers.scraper;

export type AdapterDeps = {
  registry: PlatformRegistry;
  fetchers: PageFetchers;
};

export type ExtractionStrategy = 'selectors' | 'json-ld' | 'heuristic' | 'none';

export function sourceTag(platform: string, method: ScrapeMethod): string {
  return `${platform}_${method}`;
}

export function methodOfSource(source: string): ScrapeMethod {
  const suffix = source.slice(source.lastIndexOf('_') + 1);
  return suffix === 'api' || suffix === 'browser' ? suffix : 'scraping';
}

function hasContent(raw: RawReview[]): boolean {
  return raw.some((r) => r.text.trim() !== '' || r.rating > 0);
}

/**
 * Configured selectors first, then embedded JSON-LD, then the heuristic
 * scan unless `heuristic` is false.
 */
export function extractReviews(
  html: string,
  config: PlatformConfig | undefined,
  heuristic = true,
): { raw: RawReview[]; strategy: ExtractionStrategy } {
  if (config) {
    const raw = extractWithConfig(html, config);
    if (hasContent(raw)) return { raw, strategy: 'selectors' };
  }

  const jsonLd = extractJsonLdReviews(html);
  if (hasContent(jsonLd)) return { raw: jsonLd, strategy: 'json-ld' };

  if (heuristic) {
    const guessed = extractHeuristicReviews(html);
    if (hasContent(guessed)) return { raw: guessed, strategy: 'heuristic' };
  }
  return { raw: [], strategy: 'none' };
}

export type ScrapePageOptions = {
  platform: string;
  config?: PlatformConfig;
  referer?: string;
  /** URL stamped on each review; defaults to the fetched page's final URL. */
  reviewUrl?: string;
  maxReviews?: number;
  heuristic?: boolean;
};

export async function scrapePage(
  deps: AdapterDeps,
  url: string,
  options: ScrapePageOptions,
): Promise<Review[]> {
  const { fetcher, method } = selectFetcher(deps.fetchers, options.config?.requiresJs);
  const page = await fetcher.fetch(url, { referer: options.referer });
  const { raw, strategy } = extractReviews(page.html, options.config, options.heuristic);

  log.info(
    { url, platform: options.platform, method, strategy, found: raw.length },
    'page parsed',
  );

  return toReviews(raw, {
    url: options.reviewUrl ?? page.url,
    platform: options.platform,
    source: sourceTag(options.platform, method),
    maxReviews: options.maxReviews,
  });
}

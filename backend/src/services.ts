import { ReviewAnalyzer } from './analysis/analyzer';
import { type AppConfig, isScrapingOnly } from './config/env';
import { loggers } from './config/logger';
import { ScrapeScheduler } from './jobs/scrapeScheduler';
import { PlatformRegistry } from './platforms/registry';
import { AmazonAdapter } from './scraper/adapters/amazonAdapter';
import type { AdapterDeps } from './scraper/adapters/common';
import { UniversalAdapter } from './scraper/adapters/universalAdapter';
import { WalmartAdapter } from './scraper/adapters/walmartAdapter';
import { YelpAdapter } from './scraper/adapters/yelpAdapter';
import { type JsonFetchImpl, YelpFusionClient } from './scraper/adapters/yelpClient';
import { BrowserPageFetcher } from './scraper/browserPageFetcher';
import { ScraperDispatcher } from './scraper/dispatcher';
import { HttpPageFetcher, type PageFetchers } from './scraper/pageFetcher';

export type Services = {
  config: AppConfig;
  registry: PlatformRegistry;
  analyzer: ReviewAnalyzer;
  dispatcher: ScraperDispatcher;
  scheduler: ScrapeScheduler;
};

export type ServiceOverrides = {
  fetchers?: PageFetchers;
  yelpFetch?: JsonFetchImpl;
  registry?: PlatformRegistry;
};

/**
 * Wire the scraping stack for a config. Tests pass in-process fetchers
 * through `overrides` so nothing leaves the process.
 */
export function createServices(config: AppConfig, overrides: ServiceOverrides = {}): Services {
  const log = loggers.server;
  const registry = overrides.registry ?? PlatformRegistry.fromData();
  const fetchers: PageFetchers = overrides.fetchers ?? {
    http: new HttpPageFetcher({ timeoutMs: config.requestTimeoutMs }),
    browser: config.browserRendering
      ? new BrowserPageFetcher(config.requestTimeoutMs)
      : undefined,
  };

  if (isScrapingOnly(config)) {
    log.info('no platform credentials configured, running in scraping-only mode');
  }
  if (config.amazon) {
    log.info('Amazon credentials configured; reviews are still scraped');
  }

  const deps: AdapterDeps = { registry, fetchers };
  const yelpClient = config.yelpApiKey
    ? new YelpFusionClient(config.yelpApiKey, config.requestTimeoutMs, overrides.yelpFetch)
    : undefined;

  const dispatcher = new ScraperDispatcher(
    registry,
    [new YelpAdapter(deps, yelpClient), new AmazonAdapter(deps), new WalmartAdapter(deps)],
    new UniversalAdapter(deps),
    config.maxReviews,
  );

  return {
    config,
    registry,
    analyzer: new ReviewAnalyzer(),
    dispatcher,
    scheduler: new ScrapeScheduler(dispatcher),
  };
}

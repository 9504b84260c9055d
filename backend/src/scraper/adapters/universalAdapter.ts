import type { Review, ReviewAdapter, ScrapeOptions } from '../../types';
import { isHttpUrl, validateUrl } from '../../validation/inputs';
import { type AdapterDeps, scrapePage } from './common';

export const GENERIC_PLATFORM = 'generic';

/**
 * Fallback for any http(s) page: registry selectors when the domain (or an
 * explicit platform) is known, otherwise JSON-LD and the heuristic scan.
 */
export class UniversalAdapter implements ReviewAdapter {
  public readonly platform = 'universal';

  constructor(private readonly deps: AdapterDeps) {}

  canHandle(target: string): boolean {
    return isHttpUrl(target);
  }

  platformFor(url: string, override?: string): string {
    const config = override
      ? this.deps.registry.get(override)
      : this.deps.registry.detect(url);
    return config?.id ?? GENERIC_PLATFORM;
  }

  async scrape(target: string, options: ScrapeOptions = {}): Promise<Review[]> {
    const url = validateUrl(target);
    const config = options.platform
      ? this.deps.registry.get(options.platform)
      : this.deps.registry.detect(url);

    return scrapePage(this.deps, url, {
      platform: config?.id ?? GENERIC_PLATFORM,
      config,
      maxReviews: options.maxReviews,
    });
  }
}

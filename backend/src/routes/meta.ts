import { Router } from 'express';
import { isScrapingOnly } from '../config/env';
import type { Services } from '../services';

export const SERVICE_NAME = 'review-scraper';
export const SERVICE_VERSION = '2.0.0';

export function metaRouter({ config, registry }: Services): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.json({
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      description: `Review scraping and keyword filtering across ${registry.ids().length} platforms`,
      endpoints: {
        health: 'GET /health',
        scrape: 'POST /scrape | GET /scrape',
        latest: 'GET /latest',
        stop: 'POST /stop',
        search: 'GET /search',
        universal: 'GET /universal',
        platforms: 'GET /platforms',
        categories: 'GET /categories',
        report: 'POST /report/pdf',
      },
      examples: {
        search_by_product: '/search?product=standing%20desk&keywords=assembly,setup',
        search_by_url: '/search?url=https://www.walmart.com/ip/123456&categories=quality&min_rating=4',
        universal: '/universal?url=https://www.target.com/p/chair&keywords=comfort',
      },
    });
  });

  router.get('/health', (_req, res) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      service: SERVICE_NAME,
      environment: config.environment,
      mode: isScrapingOnly(config) ? 'scraping_only' : 'api_enabled',
      credentials: {
        yelp: config.yelpApiKey !== undefined,
        amazon: config.amazon !== undefined,
      },
      browser_rendering: config.browserRendering,
    });
  });

  return router;
}

import { type Request, type Response, Router } from 'express';
import { z } from 'zod';
import { ValidationError } from '../lib/errors';
import { asyncHandler } from '../middleware/errorHandler';
import type { Services } from '../services';
import type { ScrapeTargets } from '../types';
import { hasTargets } from '../jobs/scrapeScheduler';
import {
  resolveAmazonAsin,
  resolveWalmartProductId,
  resolveYelpBusinessId,
  validateRefreshInterval,
  validateUrl,
} from '../validation/inputs';
import { serializeSnapshot } from './serializers';

const optionalInput = z
  .string()
  .nullish()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const intervalInput = z
  .union([z.number(), z.string().trim().regex(/^\d+$/, 'must be a whole number').transform(Number)])
  .nullish()
  .transform((v) => (v === null ? undefined : v));

const scrapeBodySchema = z.object({
  yelp_business_id: optionalInput,
  amazon_asin: optionalInput,
  walmart_product_id: optionalInput,
  url: optionalInput,
  refresh_interval: intervalInput,
});

const scrapeQuerySchema = z.object({
  yelp_url: optionalInput,
  amazon_url: optionalInput,
  walmart_url: optionalInput,
  url: optionalInput,
  refresh_interval: intervalInput,
});

/** Validate every supplied target before any scraping starts. */
function checkTargets(targets: ScrapeTargets, fieldNames: Record<keyof ScrapeTargets, string>): void {
  if (!hasTargets(targets)) {
    throw new ValidationError(
      `Please provide at least one of: ${Object.values(fieldNames).join(', ')}`,
    );
  }
  const checks: [keyof ScrapeTargets, (v: string) => string][] = [
    ['yelp', resolveYelpBusinessId],
    ['amazon', resolveAmazonAsin],
    ['walmart', resolveWalmartProductId],
    ['url', validateUrl],
  ];
  for (const [key, check] of checks) {
    const value = targets[key];
    if (value === undefined) continue;
    try {
      check(value);
    } catch (err) {
      if (err instanceof ValidationError) {
        throw new ValidationError(`${fieldNames[key]}: ${err.message}`, { field: fieldNames[key] });
      }
      throw err;
    }
  }
}

export function scrapeRouter({ scheduler }: Services): Router {
  const router = Router();

  const runScrape = async (
    res: Response,
    targets: ScrapeTargets,
    interval: number | undefined,
  ): Promise<void> => {
    const refreshInterval = validateRefreshInterval(interval);

    scheduler.stop();
    const snapshot = await scheduler.runOnce(targets);
    if (refreshInterval !== undefined) {
      scheduler.start(targets, refreshInterval);
    }

    res.json({
      success: snapshot.status !== 'failed',
      ...serializeSnapshot(snapshot, {
        running: scheduler.isRunning(),
        intervalSeconds: scheduler.intervalSeconds(),
      }),
    });
  };

  router.post(
    '/scrape',
    asyncHandler(async (req: Request, res: Response) => {
      const body = scrapeBodySchema.parse(req.body ?? {});
      const targets: ScrapeTargets = {
        yelp: body.yelp_business_id,
        amazon: body.amazon_asin,
        walmart: body.walmart_product_id,
        url: body.url,
      };
      checkTargets(targets, {
        yelp: 'yelp_business_id',
        amazon: 'amazon_asin',
        walmart: 'walmart_product_id',
        url: 'url',
      });
      await runScrape(res, targets, body.refresh_interval);
    }),
  );

  router.get(
    '/scrape',
    asyncHandler(async (req: Request, res: Response) => {
      const query = scrapeQuerySchema.parse(req.query);
      const targets: ScrapeTargets = {
        yelp: query.yelp_url,
        amazon: query.amazon_url,
        walmart: query.walmart_url,
        url: query.url,
      };
      checkTargets(targets, {
        yelp: 'yelp_url',
        amazon: 'amazon_url',
        walmart: 'walmart_url',
        url: 'url',
      });
      await runScrape(res, targets, query.refresh_interval);
    }),
  );

  router.get('/latest', (_req, res) => {
    res.json(
      serializeSnapshot(scheduler.latest(), {
        running: scheduler.isRunning(),
        intervalSeconds: scheduler.intervalSeconds(),
      }),
    );
  });

  router.post('/stop', (_req, res) => {
    const stopped = scheduler.stop();
    res.json(
      stopped
        ? { success: true, status: 'success', message: 'Background scraping stopped' }
        : { success: true, status: 'info', message: 'No background scraping active' },
    );
  });

  return router;
}

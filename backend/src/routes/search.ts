import { type Request, type Response, Router } from 'express';
import { z } from 'zod';
import { defaultFilter } from '../analysis/analyzer';
import { ValidationError } from '../lib/errors';
import { asyncHandler } from '../middleware/errorHandler';
import type { PlatformOutcome } from '../scraper/dispatcher';
import type { Services } from '../services';
import type { Review } from '../types';
import { parseList } from '../validation/inputs';
import {
  serializeAnalyzedReviews,
  serializeInsights,
  serializeReviews,
} from './serializers';

const optionalText = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const searchQuerySchema = z.object({
  product: optionalText,
  url: optionalText,
  platform: optionalText,
  platforms: z.string().optional(),
  keywords: z.string().optional(),
  categories: z.string().optional(),
  min_rating: z.coerce.number().min(0).max(5).default(0),
  max_rating: z.coerce.number().min(0).max(5).default(5),
  sentiment: z.enum(['positive', 'negative', 'neutral']).optional(),
  sort_by: z.enum(['relevance', 'rating', 'date', 'length']).default('relevance'),
  limit: z.coerce.number().int().min(1).max(500).default(50),
});

const universalQuerySchema = z.object({
  url: optionalText,
  platform: optionalText,
  keywords: z.string().optional(),
});

export function searchRouter({ dispatcher, analyzer, scheduler }: Services): Router {
  const router = Router();

  router.get(
    '/search',
    asyncHandler(async (req: Request, res: Response) => {
      const query = searchQuerySchema.parse(req.query);
      if (!query.product && !query.url) {
        throw new ValidationError('Missing required parameter: product or url');
      }
      if (query.min_rating > query.max_rating) {
        throw new ValidationError('min_rating cannot be greater than max_rating');
      }

      const filter = defaultFilter({
        keywords: parseList(query.keywords),
        categories: parseList(query.categories),
        minRating: query.min_rating,
        maxRating: query.max_rating,
        sentiment: query.sentiment,
        sortBy: query.sort_by,
        limit: query.limit,
      });

      let scraped: Review[];
      let platformResults: PlatformOutcome[];
      let platform: string | undefined;
      if (query.url) {
        const result = await dispatcher.scrapeUrl(query.url, { platform: query.platform });
        scraped = result.reviews;
        platform = result.platform;
        platformResults = [
          { platform: result.platform, status: 'ok', url: result.url, count: result.reviews.length },
        ];
      } else {
        const result = await dispatcher.scrapeProduct(query.product ?? '', {
          platforms: parseList(query.platforms),
        });
        scraped = result.reviews;
        platformResults = result.platformResults;
      }

      const matched = analyzer.filterReviews(scraped, filter);
      const insights = analyzer.insights(matched);
      scheduler.recordUniversal(matched);
      const reviews = serializeAnalyzedReviews(matched);

      res.json({
        success: true,
        data: {
          reviews,
          insights: serializeInsights(insights),
          filter_applied: {
            keywords: filter.keywords,
            categories: filter.categories,
            min_rating: filter.minRating,
            max_rating: filter.maxRating,
            sentiment: filter.sentiment ?? null,
            sort_by: filter.sortBy,
            limit: filter.limit,
          },
          total_found: reviews.length,
          total_scraped: scraped.length,
          ...(query.url ? { original_url: query.url, platform } : { product: query.product }),
          platform_results: platformResults,
          scraped_at: new Date().toISOString(),
        },
        message: `Found ${reviews.length} relevant reviews out of ${scraped.length} total`,
      });
    }),
  );

  router.get(
    '/universal',
    asyncHandler(async (req: Request, res: Response) => {
      const query = universalQuerySchema.parse(req.query);
      if (!query.url) {
        throw new ValidationError('Missing required parameter: url');
      }
      const keywords = parseList(query.keywords);

      const result = await dispatcher.scrapeUrl(query.url, { platform: query.platform });
      const kept = keywords.length
        ? result.reviews.filter((r) => analyzer.matchesAnyKeyword(r, keywords))
        : result.reviews;
      scheduler.recordUniversal(kept);
      const reviews = serializeReviews(kept);

      res.json({
        success: true,
        data: {
          reviews,
          total_reviews: reviews.length,
          platform: result.platform,
          scraping_method: result.method,
          scraped_at: new Date().toISOString(),
          original_url: result.url,
          keywords_filtered: keywords.length ? keywords : null,
        },
        message: `Successfully scraped ${reviews.length} reviews`,
      });
    }),
  );

  return router;
}

import { Router } from 'express';
import { z } from 'zod';
import { writeInsightsPdf } from '../pdf/reportPdf';
import type { ReviewInsights } from '../types';

const count = z.number().int().min(0);

const insightsSchema = z.object({
  total_reviews: count,
  average_rating: z.number().min(0).max(5),
  category_breakdown: z.record(count).default({}),
  sentiment_breakdown: z.object({ positive: count, negative: count, neutral: count }),
  top_categories: z.array(z.string()).default([]),
  rating_distribution: z.object({
    '5_star': count,
    '4_star': count,
    '3_star': count,
    '2_star': count,
    '1_star': count.default(0),
  }),
});

const reportBodySchema = z.object({
  insights: insightsSchema,
  title: z.string().trim().max(200).optional(),
});

export function reportRouter(): Router {
  const router = Router();

  router.post('/report/pdf', (req, res) => {
    const body = reportBodySchema.parse(req.body ?? {});
    const i = body.insights;
    const insights: ReviewInsights = {
      totalReviews: i.total_reviews,
      averageRating: i.average_rating,
      categoryBreakdown: i.category_breakdown,
      sentimentBreakdown: i.sentiment_breakdown,
      topCategories: i.top_categories,
      ratingDistribution: i.rating_distribution,
    };

    res.setHeader('Content-Type', 'application/pdf');
    res.setHeader('Content-Disposition', 'attachment; filename="review-report.pdf"');
    writeInsightsPdf(res, insights, body.title);
  });

  return router;
}

import { type CleanedReview, cleanReviews } from '../analysis/clean';
import type {
  AnalyzedReview,
  PlatformConfig,
  Review,
  ReviewInsights,
  ScrapeSnapshot,
} from '../types';

/*
 * Internal models are camelCase; every JSON body the API returns is
 * snake_case.
 */

export function serializeReview(review: CleanedReview) {
  return {
    reviewer_name: review.reviewerName,
    rating: review.rating,
    review_text: review.text,
    date: review.date,
    review_url: review.url,
    review_link: review.reviewLink,
    star_display: review.starDisplay,
    platform: review.platform,
    source: review.source,
    ...(review.title !== undefined ? { title: review.title } : {}),
    ...(review.helpfulVotes !== undefined ? { helpful_votes: review.helpfulVotes } : {}),
    ...(review.verifiedPurchase !== undefined
      ? { verified_purchase: review.verifiedPurchase }
      : {}),
  };
}

export function serializeAnalyzedReview(review: CleanedReview<AnalyzedReview>) {
  return {
    ...serializeReview(review),
    sentiment: review.sentiment,
    categories: [...review.categories],
    keyword_relevance: Math.round(review.keywordRelevance * 1000) / 1000,
    relevance_percentage: `${(review.keywordRelevance * 100).toFixed(1)}%`,
    authenticity: {
      score: review.authenticity.score,
      is_likely_authentic: review.authenticity.isLikelyAuthentic,
      flags: [...review.authenticity.flags],
      confidence: review.authenticity.confidence,
    },
  };
}

export function serializeReviews(reviews: readonly Review[]) {
  return cleanReviews(reviews).map(serializeReview);
}

export function serializeAnalyzedReviews(reviews: readonly AnalyzedReview[]) {
  return cleanReviews(reviews).map(serializeAnalyzedReview);
}

export function serializeInsights(insights: ReviewInsights) {
  return {
    total_reviews: insights.totalReviews,
    average_rating: insights.averageRating,
    category_breakdown: insights.categoryBreakdown,
    sentiment_breakdown: insights.sentimentBreakdown,
    top_categories: insights.topCategories,
    rating_distribution: insights.ratingDistribution,
  };
}

export function serializePlatform(config: PlatformConfig) {
  return {
    id: config.id,
    name: config.name,
    domain: config.domain,
    rating_scale: config.ratingScale,
    requires_js: config.requiresJs,
    product_search: config.searchUrl !== undefined,
  };
}

export function serializeSnapshot(
  snapshot: ScrapeSnapshot,
  schedule: { running: boolean; intervalSeconds?: number },
) {
  const { yelp, amazon, walmart, universal } = snapshot.reviews;
  const yelpReviews = serializeReviews(yelp);
  const amazonReviews = serializeReviews(amazon);
  const walmartReviews = serializeReviews(walmart);
  const universalReviews = serializeReviews(universal);

  return {
    timestamp: snapshot.timestamp,
    status: snapshot.status,
    yelp_reviews: yelpReviews,
    amazon_reviews: amazonReviews,
    walmart_reviews: walmartReviews,
    universal_reviews: universalReviews,
    errors: snapshot.errors,
    statistics: {
      total_reviews:
        yelpReviews.length + amazonReviews.length + walmartReviews.length + universalReviews.length,
      yelp_review_count: yelpReviews.length,
      amazon_review_count: amazonReviews.length,
      walmart_review_count: walmartReviews.length,
      universal_review_count: universalReviews.length,
      has_errors: snapshot.errors.length > 0,
    },
    background_scraping: schedule.running,
    ...(schedule.intervalSeconds !== undefined
      ? { refresh_interval: schedule.intervalSeconds }
      : {}),
  };
}

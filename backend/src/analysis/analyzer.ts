import { z } from 'zod';
import categoryData from '../data/categories.json';
import { loggers } from '../config/logger';
import type {
  AnalyzedReview,
  AuthenticityFlag,
  AuthenticityReport,
  RatingDistribution,
  Review,
  ReviewFilter,
  ReviewInsights,
  ReviewSentiment,
  SentimentCounts,
  SortBy,
} from '../types';

const log = loggers.analyzer;

const POSITIVE_WORDS = new Set([
  'excellent', 'amazing', 'great', 'love', 'perfect', 'awesome',
  'fantastic', 'wonderful', 'brilliant', 'outstanding', 'superb',
  'recommend', 'happy', 'satisfied', 'pleased', 'impressed',
]);

const NEGATIVE_WORDS = new Set([
  'terrible', 'awful', 'hate', 'horrible', 'worst', 'bad',
  'disappointed', 'poor', 'useless', 'waste', 'regret',
  'broken', 'defective', 'faulty', 'cheap', 'flimsy',
]);

const GENERIC_PATTERNS = [
  /\b(great|good|nice|awesome|amazing|excellent)\s+product\b/i,
  /\bwould\s+recommend\b/i,
  /\b(five|5)\s+stars?\b/i,
  /\bbuy\s+this\b/i,
];

export const DEFAULT_FILTER_LIMIT = 50;
export const MAX_FILTER_LIMIT = 500;
export const RELEVANCE_THRESHOLD = 0.1;

const categoryFileSchema = z.object({
  categories: z
    .array(
      z.object({
        id: z.string().min(1),
        description: z.string(),
        keywords: z.array(z.string().min(1)).min(1),
      }),
    )
    .min(1),
});

export type ReviewCategory = z.infer<typeof categoryFileSchema>['categories'][number];

export function defaultFilter(overrides: Partial<ReviewFilter> = {}): ReviewFilter {
  return {
    keywords: [],
    categories: [],
    minRating: 0,
    maxRating: 5,
    sortBy: 'relevance',
    limit: DEFAULT_FILTER_LIMIT,
    ...overrides,
  };
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function countOccurrences(haystack: string, needle: string): number {
  if (!needle) return 0;
  return haystack.split(needle).length - 1;
}

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

function sortValue(review: AnalyzedReview, sortBy: SortBy): number | string {
  switch (sortBy) {
    case 'rating':
      return review.rating;
    case 'date':
      return review.date;
    case 'length':
      return review.text.length;
    case 'relevance':
    default:
      return review.keywordRelevance;
  }
}

/**
 * Keyword relevance, lexicon sentiment and category tagging over plain
 * review text, plus filtering and aggregate insights.
 */
export class ReviewAnalyzer {
  private readonly categories: ReviewCategory[];

  constructor(categories?: ReviewCategory[]) {
    this.categories = categories ?? categoryFileSchema.parse(categoryData).categories;
  }

  listCategories(): ReviewCategory[] {
    return [...this.categories];
  }

  analyzeSentiment(text: string): ReviewSentiment {
    if (!text) return 'neutral';
    const words = new Set(text.toLowerCase().match(/\w+/g) ?? []);

    let positive = 0;
    let negative = 0;
    for (const word of words) {
      if (POSITIVE_WORDS.has(word)) positive += 1;
      if (NEGATIVE_WORDS.has(word)) negative += 1;
    }

    if (positive > negative) return 'positive';
    if (negative > positive) return 'negative';
    return 'neutral';
  }

  /**
   * Whole-word hits count 2, other substring hits 1, normalised by twice the
   * keyword count and capped at 1.
   */
  keywordRelevance(text: string, keywords: readonly string[]): number {
    const terms = keywords.map((k) => k.trim().toLowerCase()).filter(Boolean);
    if (!text.trim() || !terms.length) return 0;

    const lower = text.toLowerCase();
    let total = 0;
    for (const term of terms) {
      const exact = (lower.match(new RegExp(`\\b${escapeRegExp(term)}\\b`, 'g')) ?? []).length;
      const partial = countOccurrences(lower, term) - exact;
      total += exact * 2 + Math.max(partial, 0);
    }

    return Math.min(total / (terms.length * 2), 1);
  }

  categorize(text: string): string[] {
    if (!text) return [];
    const lower = text.toLowerCase();
    return this.categories
      .filter((c) => c.keywords.some((k) => lower.includes(k.toLowerCase())))
      .map((c) => c.id);
  }

  analyze(review: Review, keywords: readonly string[] = []): AnalyzedReview {
    return {
      ...review,
      sentiment: this.analyzeSentiment(review.text),
      categories: this.categorize(review.text),
      keywordRelevance: keywords.length ? this.keywordRelevance(review.text, keywords) : 1,
      authenticity: this.authenticity(review),
    };
  }

  filterReviews(reviews: readonly Review[], filter: ReviewFilter): AnalyzedReview[] {
    const keywords = filter.keywords.map((k) => k.trim()).filter(Boolean);
    const wanted = new Set(filter.categories.map((c) => c.trim().toLowerCase()).filter(Boolean));
    const limit = Math.min(Math.max(Math.floor(filter.limit), 0), MAX_FILTER_LIMIT);

    const kept: AnalyzedReview[] = [];
    for (const review of reviews) {
      if (review.rating < filter.minRating || review.rating > filter.maxRating) continue;

      const analyzed = this.analyze(review, keywords);
      if (filter.sentiment && analyzed.sentiment !== filter.sentiment) continue;
      if (wanted.size && !analyzed.categories.some((c) => wanted.has(c))) continue;
      if (keywords.length && analyzed.keywordRelevance <= RELEVANCE_THRESHOLD) continue;

      kept.push(analyzed);
    }

    const sorted = this.sortReviews(kept, filter.sortBy);
    log.debug(
      { input: reviews.length, kept: kept.length, sortBy: filter.sortBy, limit },
      'reviews filtered',
    );
    return sorted.slice(0, limit);
  }

  sortReviews(reviews: readonly AnalyzedReview[], sortBy: SortBy): AnalyzedReview[] {
    return [...reviews].sort((a, b) => {
      const av = sortValue(a, sortBy);
      const bv = sortValue(b, sortBy);
      if (av === bv) return 0;
      return av < bv ? 1 : -1;
    });
  }

  insights(reviews: readonly AnalyzedReview[]): ReviewInsights {
    const categoryCounts = new Map<string, number>();
    const sentimentBreakdown: SentimentCounts = { positive: 0, negative: 0, neutral: 0 };
    const ratingDistribution: RatingDistribution = {
      '5_star': 0,
      '4_star': 0,
      '3_star': 0,
      '2_star': 0,
      '1_star': 0,
    };
    let ratingSum = 0;

    for (const review of reviews) {
      for (const category of review.categories) {
        categoryCounts.set(category, (categoryCounts.get(category) ?? 0) + 1);
      }
      sentimentBreakdown[review.sentiment] += 1;
      ratingSum += review.rating;

      const r = review.rating;
      if (r >= 4.5) ratingDistribution['5_star'] += 1;
      else if (r >= 3.5) ratingDistribution['4_star'] += 1;
      else if (r >= 2.5) ratingDistribution['3_star'] += 1;
      else if (r >= 1.5) ratingDistribution['2_star'] += 1;
      else if (r >= 0.5) ratingDistribution['1_star'] += 1;
    }

    // Map iteration keeps first-seen order, so ties stay in encounter order.
    const ranked = [...categoryCounts.entries()].sort((a, b) => b[1] - a[1]);

    return {
      totalReviews: reviews.length,
      averageRating: reviews.length ? round(ratingSum / reviews.length, 2) : 0,
      categoryBreakdown: Object.fromEntries(ranked),
      sentimentBreakdown,
      topCategories: ranked.slice(0, 5).map(([category]) => category),
      ratingDistribution,
    };
  }

  authenticity(review: Review): AuthenticityReport {
    const flags: AuthenticityFlag[] = [];
    let score = 1;

    if (review.text.length < 20) {
      score -= 0.3;
      flags.push('very_short_text');
    }
    if (review.text.length > 2000) {
      score -= 0.1;
      flags.push('very_long_text');
    }

    const genericHits = GENERIC_PATTERNS.filter((p) => p.test(review.text)).length;
    if (genericHits >= 3) {
      score -= 0.2;
      flags.push('generic_language');
    }

    const sentiment = this.analyzeSentiment(review.text);
    if (
      (review.rating >= 4 && sentiment === 'negative') ||
      (review.rating > 0 && review.rating <= 2 && sentiment === 'positive')
    ) {
      score -= 0.4;
      flags.push('rating_sentiment_mismatch');
    }

    if (/^[A-Z][a-z]+\s[A-Z]\.$/.test(review.reviewerName)) {
      score += 0.1;
    } else if (/Amazon Customer|Anonymous/.test(review.reviewerName)) {
      score -= 0.1;
      flags.push('anonymous_reviewer');
    }

    const clamped = round(Math.min(Math.max(score, 0), 1), 2);
    return {
      score: clamped,
      isLikelyAuthentic: clamped >= 0.6,
      flags,
      confidence: flags.length <= 1 ? 'high' : flags.length <= 3 ? 'medium' : 'low',
    };
  }

  matchesAnyKeyword(review: Review, keywords: readonly string[]): boolean {
    const lower = review.text.toLowerCase();
    return keywords.some((k) => {
      const term = k.trim().toLowerCase();
      return term !== '' && lower.includes(term);
    });
  }
}

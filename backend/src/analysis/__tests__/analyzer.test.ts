import { describe, expect, it } from 'vitest';
import type { AnalyzedReview, Review } from '../../types';
import { ReviewAnalyzer, defaultFilter } from '../analyzer';

const CATEGORIES = [
  { id: 'assembly', description: 'Putting it together', keywords: ['assembly', 'setup'] },
  { id: 'quality', description: 'Build quality', keywords: ['sturdy', 'flimsy'] },
  { id: 'delivery', description: 'Shipping', keywords: ['shipping', 'arrived'] },
];

function review(overrides: Partial<Review>): Review {
  return {
    reviewerName: 'Test User',
    rating: 4,
    text: '',
    date: '',
    url: 'https://shop.example.test/item',
    platform: 'generic',
    source: 'generic_scraping',
    ...overrides,
  };
}

describe('ReviewAnalyzer', () => {
  const analyzer = new ReviewAnalyzer(CATEGORIES);

  describe('analyzeSentiment', () => {
    it('compares distinct lexicon hits', () => {
      expect(analyzer.analyzeSentiment('Great desk, I love it')).toBe('positive');
      expect(analyzer.analyzeSentiment('Terrible and flimsy')).toBe('negative');
      expect(analyzer.analyzeSentiment('Great but broken')).toBe('neutral');
      expect(analyzer.analyzeSentiment('')).toBe('neutral');
    });

    it('counts a repeated word once', () => {
      expect(analyzer.analyzeSentiment('LOVE love Love, but bad')).toBe('neutral');
    });
  });

  describe('keywordRelevance', () => {
    it('weights whole-word hits twice as much as partial ones', () => {
      expect(analyzer.keywordRelevance('The assembly was easy', ['assembly'])).toBe(1);
      expect(analyzer.keywordRelevance('Preassembly steps', ['assembly'])).toBe(0.5);
    });

    it('normalises by keyword count and caps at 1', () => {
      expect(analyzer.keywordRelevance('assembly assembly', ['assembly', 'wobble'])).toBe(1);
      expect(analyzer.keywordRelevance('Assembly was fine', ['assembly', 'wobble', 'shipping'])).toBeCloseTo(1 / 3);
    });

    it('is 0 without text or keywords', () => {
      expect(analyzer.keywordRelevance('', ['assembly'])).toBe(0);
      expect(analyzer.keywordRelevance('assembly', [])).toBe(0);
    });
  });

  it('categorizes by keyword substring in category order', () => {
    expect(analyzer.categorize('Setup was quick and shipping was fast')).toEqual(['assembly', 'delivery']);
    expect(analyzer.categorize('')).toEqual([]);
  });

  describe('filterReviews', () => {
    const reviews = [
      review({ reviewerName: 'a', rating: 5, date: '2024-01-01', text: 'Sturdy frame and the setup was easy. Love it.' }),
      review({ reviewerName: 'b', rating: 2, date: '2024-03-01', text: 'Flimsy legs and shipping took weeks. Terrible.' }),
      review({ reviewerName: 'c', rating: 4, date: '2024-02-01', text: 'Arrived on time, nothing else to say.' }),
      review({ reviewerName: 'd', rating: 3, date: '', text: 'The assembly instructions were confusing.' }),
    ];
    const names = (list: AnalyzedReview[]) => list.map((r) => r.reviewerName);

    it('keeps only reviews mentioning a keyword', () => {
      const result = analyzer.filterReviews(reviews, defaultFilter({ keywords: ['assembly', 'setup'] }));
      expect(names(result)).toEqual(['a', 'd']);
      expect(result[0].keywordRelevance).toBe(0.5);
    });

    it('filters by rating range and sorts by rating', () => {
      const result = analyzer.filterReviews(
        reviews,
        defaultFilter({ minRating: 3, maxRating: 5, sortBy: 'rating' }),
      );
      expect(names(result)).toEqual(['a', 'c', 'd']);
      expect(result.every((r) => r.keywordRelevance === 1)).toBe(true);
    });

    it('filters by sentiment', () => {
      const result = analyzer.filterReviews(reviews, defaultFilter({ sentiment: 'negative' }));
      expect(names(result)).toEqual(['b']);
      expect(result[0].categories).toEqual(['quality', 'delivery']);
    });

    it('drops reviews sharing no requested category', () => {
      const result = analyzer.filterReviews(reviews, defaultFilter({ categories: ['delivery'] }));
      expect(names(result)).toEqual(['b', 'c']);
    });

    it('sorts by date descending and truncates to the limit', () => {
      const result = analyzer.filterReviews(reviews, defaultFilter({ sortBy: 'date', limit: 2 }));
      expect(names(result)).toEqual(['b', 'c']);
    });
  });

  describe('insights', () => {
    const analyzed = (rating: number, categories: string[], sentiment: AnalyzedReview['sentiment']): AnalyzedReview => ({
      ...review({ rating }),
      sentiment,
      categories,
      keywordRelevance: 1,
      authenticity: { score: 1, isLikelyAuthentic: true, flags: [], confidence: 'high' },
    });

    it('aggregates counts, averages and buckets', () => {
      const insights = analyzer.insights([
        analyzed(5, ['quality', 'assembly'], 'positive'),
        analyzed(4.5, ['assembly'], 'positive'),
        analyzed(4, ['delivery'], 'neutral'),
        analyzed(3.4, ['assembly', 'delivery'], 'negative'),
        analyzed(1, [], 'negative'),
        analyzed(0, [], 'neutral'),
      ]);

      expect(insights.totalReviews).toBe(6);
      expect(insights.averageRating).toBe(2.98);
      expect(insights.categoryBreakdown).toEqual({ assembly: 3, delivery: 2, quality: 1 });
      expect(Object.keys(insights.categoryBreakdown)).toEqual(['assembly', 'delivery', 'quality']);
      expect(insights.topCategories).toEqual(['assembly', 'delivery', 'quality']);
      expect(insights.sentimentBreakdown).toEqual({ positive: 2, negative: 2, neutral: 2 });
      expect(insights.ratingDistribution).toEqual({
        '5_star': 2,
        '4_star': 1,
        '3_star': 1,
        '2_star': 0,
        '1_star': 1,
      });
    });

    it('returns zeroed insights for no reviews', () => {
      const insights = analyzer.insights([]);
      expect(insights.totalReviews).toBe(0);
      expect(insights.averageRating).toBe(0);
      expect(insights.topCategories).toEqual([]);
    });
  });

  describe('authenticity', () => {
    it('rewards a named reviewer with consistent text', () => {
      const report = analyzer.authenticity(
        review({ reviewerName: 'Maria G.', rating: 5, text: 'Great standing desk, sturdy and easy to put together.' }),
      );
      expect(report).toEqual({ score: 1, isLikelyAuthentic: true, flags: [], confidence: 'high' });
    });

    it('flags short, mismatched and anonymous reviews', () => {
      const report = analyzer.authenticity(review({ reviewerName: 'Amazon Customer', rating: 5, text: 'Bad.' }));
      expect(report.flags).toEqual(['very_short_text', 'rating_sentiment_mismatch', 'anonymous_reviewer']);
      expect(report.score).toBe(0.2);
      expect(report.isLikelyAuthentic).toBe(false);
      expect(report.confidence).toBe('medium');
    });

    it('is attached to every analyzed review', () => {
      const analyzed = analyzer.analyze(review({ reviewerName: 'Anonymous', rating: 3, text: 'Arrived on time, fits the room.' }));
      expect(analyzed.authenticity).toEqual({
        score: 0.9,
        isLikelyAuthentic: true,
        flags: ['anonymous_reviewer'],
        confidence: 'high',
      });
    });

    it('flags generic marketing language', () => {
      const report = analyzer.authenticity(
        review({ reviewerName: 'Sam', rating: 5, text: 'Great product, would recommend. Five stars, buy this now!' }),
      );
      expect(report.flags).toEqual(['generic_language']);
      expect(report.score).toBe(0.8);
    });
  });

  it('matches keywords case-insensitively', () => {
    const r = review({ text: 'Sturdy Frame' });
    expect(analyzer.matchesAnyKeyword(r, ['frame'])).toBe(true);
    expect(analyzer.matchesAnyKeyword(r, ['  ', 'wobble'])).toBe(false);
  });

  it('loads the bundled categories by default', () => {
    const ids = new ReviewAnalyzer().listCategories().map((c) => c.id);
    expect(ids).toEqual([
      'assembly',
      'quality',
      'value',
      'size',
      'comfort',
      'delivery',
      'customer_service',
      'durability',
      'performance',
      'design',
      'features',
    ]);
  });
});

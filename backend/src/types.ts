export type ReviewSentiment = 'positive' | 'negative' | 'neutral';

/** How a review was obtained, e.g. `yelp_api` or `amazon_scraping`. */
export type ReviewSourceTag = string;

export type Review = {
  readonly reviewerName: string;
  readonly rating: number; // 0–5, 0 when the source shows none
  readonly text: string;
  readonly date: string;
  readonly url: string;
  readonly platform: string;
  readonly source: ReviewSourceTag;
  readonly title?: string;
  readonly helpfulVotes?: number;
  readonly verifiedPurchase?: boolean;
};

export type AuthenticityFlag =
  | 'very_short_text'
  | 'very_long_text'
  | 'generic_language'
  | 'rating_sentiment_mismatch'
  | 'anonymous_reviewer';

export type AuthenticityReport = {
  score: number;
  isLikelyAuthentic: boolean;
  flags: AuthenticityFlag[];
  confidence: 'high' | 'medium' | 'low';
};

export type AnalyzedReview = Review & {
  readonly sentiment: ReviewSentiment;
  readonly categories: readonly string[];
  readonly keywordRelevance: number;
  readonly authenticity: AuthenticityReport;
};

export type PlatformConfig = {
  id: string;
  name: string;
  domain: string;
  selectors: {
    reviewContainer: string;
    reviewerName: string;
    rating: string;
    text: string;
    date: string;
    title?: string;
    helpfulVotes?: string;
    verifiedPurchase?: string;
  };
  ratingScale: number;
  requiresJs: boolean;
  searchUrl?: string;
};

export type SortBy = 'relevance' | 'rating' | 'date' | 'length';

export type ReviewFilter = {
  keywords: string[];
  categories: string[];
  minRating: number;
  maxRating: number;
  sentiment?: ReviewSentiment;
  sortBy: SortBy;
  limit: number;
};

export type SentimentCounts = {
  positive: number;
  negative: number;
  neutral: number;
};

export type RatingDistribution = {
  '5_star': number;
  '4_star': number;
  '3_star': number;
  '2_star': number;
  '1_star': number;
};

export type ReviewInsights = {
  totalReviews: number;
  averageRating: number;
  categoryBreakdown: Record<string, number>;
  sentimentBreakdown: SentimentCounts;
  topCategories: string[];
  ratingDistribution: RatingDistribution;
};

export type SearchResult = {
  reviews: AnalyzedReview[];
  insights: ReviewInsights;
  totalScraped: number;
};

export type ScrapeMethod = 'api' | 'scraping' | 'browser';

export type ScrapeOptions = {
  maxReviews?: number;
  /** Registry id to parse the page with, overriding domain detection. */
  platform?: string;
};

/** A single platform-specific source of reviews. */
export interface ReviewAdapter {
  readonly platform: string;
  canHandle(target: string): boolean;
  scrape(target: string, options?: ScrapeOptions): Promise<Review[]>;
}

export type ScrapeTargets = {
  yelp?: string;
  amazon?: string;
  walmart?: string;
  url?: string;
};

export type SnapshotStatus = 'no_data' | 'success' | 'partial_success' | 'failed';

export type ScrapeSnapshot = {
  timestamp: string | null;
  status: SnapshotStatus;
  reviews: {
    yelp: Review[];
    amazon: Review[];
    walmart: Review[];
    universal: Review[];
  };
  errors: string[];
};

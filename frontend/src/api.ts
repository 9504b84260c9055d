export type Sentiment = 'positive' | 'negative' | 'neutral';

export type SortBy = 'relevance' | 'rating' | 'date' | 'length';

export type RatingDistribution = {
  '5_star': number;
  '4_star': number;
  '3_star': number;
  '2_star': number;
  '1_star': number;
};

export type Insights = {
  total_reviews: number;
  average_rating: number;
  category_breakdown: Record<string, number>;
  sentiment_breakdown: Record<Sentiment, number>;
  top_categories: string[];
  rating_distribution: RatingDistribution;
};

export type Authenticity = {
  score: number;
  is_likely_authentic: boolean;
  flags: string[];
  confidence: 'high' | 'medium' | 'low';
};

export type AnalyzedReview = {
  reviewer_name: string;
  rating: number;
  review_text: string;
  date: string;
  review_url: string;
  review_link: string;
  star_display: string;
  platform: string;
  source: string;
  title?: string;
  helpful_votes?: number;
  verified_purchase?: boolean;
  sentiment: Sentiment;
  categories: string[];
  keyword_relevance: number;
  relevance_percentage: string;
  authenticity: Authenticity;
};

export type PlatformResult =
  | { platform: string; status: 'ok'; url: string; count: number }
  | { platform: string; status: 'error'; url?: string; error: string };

export type SearchData = {
  reviews: AnalyzedReview[];
  insights: Insights;
  total_found: number;
  total_scraped: number;
  platform_results: PlatformResult[];
  scraped_at: string;
  product?: string;
  original_url?: string;
  platform?: string;
};

export type SearchParams = {
  product?: string;
  url?: string;
  keywords: string[];
  categories: string[];
  minRating: number;
  sentiment?: Sentiment;
  sortBy: SortBy;
};

export type CategoryInfo = {
  description: string;
  keywords: string[];
};

type Envelope<T> = {
  success: boolean;
  data: T;
  message?: string;
};

const API_BASE = '/api';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

async function errorMessage(res: Response, fallback: string): Promise<string> {
  const body: unknown = await res.json().catch(() => null);
  if (isRecord(body)) {
    if (typeof body.error === 'string') return body.error;
    if (typeof body.message === 'string') return body.message;
  }
  return `${fallback} (HTTP ${res.status})`;
}

async function getJson<T>(path: string, fallback: string): Promise<Envelope<T>> {
  const res = await fetch(`${API_BASE}${path}`);
  if (!res.ok) throw new Error(await errorMessage(res, fallback));
  return res.json();
}

export function buildSearchQuery(params: SearchParams): string {
  const query = new URLSearchParams();
  if (params.url) query.set('url', params.url);
  else if (params.product) query.set('product', params.product);
  if (params.keywords.length) query.set('keywords', params.keywords.join(','));
  if (params.categories.length) query.set('categories', params.categories.join(','));
  if (params.minRating > 0) query.set('min_rating', String(params.minRating));
  if (params.sentiment) query.set('sentiment', params.sentiment);
  query.set('sort_by', params.sortBy);
  return query.toString();
}

export async function searchReviews(params: SearchParams): Promise<Envelope<SearchData>> {
  return getJson<SearchData>(`/search?${buildSearchQuery(params)}`, 'Search failed');
}

export async function fetchCategories(): Promise<Record<string, CategoryInfo>> {
  const body = await getJson<{ categories: Record<string, CategoryInfo> }>(
    '/categories',
    'Could not load categories',
  );
  return body.data.categories;
}

export async function fetchPlatforms(): Promise<string[]> {
  const body = await getJson<{ platforms: string[] }>('/platforms', 'Could not load platforms');
  return body.data.platforms;
}

export async function requestReportPdf(insights: Insights, title: string): Promise<Blob> {
  const res = await fetch(`${API_BASE}/report/pdf`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify({ insights, title }),
  });
  if (!res.ok) throw new Error(await errorMessage(res, 'Failed to generate PDF'));
  return res.blob();
}

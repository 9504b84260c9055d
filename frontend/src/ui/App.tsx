import React, { useEffect, useRef, useState } from 'react';
import {
  type CategoryInfo,
  type SearchData,
  type Sentiment,
  type SortBy,
  fetchCategories,
  fetchPlatforms,
  requestReportPdf,
  searchReviews,
} from '../api';

type SearchMode = 'product' | 'url';

type LogLevel = 'info' | 'error';

type LogEntry = {
  id: number;
  level: LogLevel;
  message: string;
};

const SENTIMENTS: Sentiment[] = ['positive', 'negative', 'neutral'];

const RATING_BUCKETS = ['5_star', '4_star', '3_star', '2_star', '1_star'] as const;

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
}

function label(value: string): string {
  const spaced = value.replace(/_/g, ' ');
  return spaced.charAt(0).toUpperCase() + spaced.slice(1);
}

function messageOf(e: unknown, fallback: string): string {
  return e instanceof Error && e.message ? e.message : fallback;
}

function isSentiment(value: string): value is Sentiment {
  return SENTIMENTS.some((s) => s === value);
}

function isSortBy(value: string): value is SortBy {
  return ['relevance', 'rating', 'date', 'length'].includes(value);
}

export const App: React.FC = () => {
  const [mode, setMode] = useState<SearchMode>('product');
  const [query, setQuery] = useState('');
  const [keywords, setKeywords] = useState('');
  const [selectedCategories, setSelectedCategories] = useState<string[]>([]);
  const [minRating, setMinRating] = useState(0);
  const [sentiment, setSentiment] = useState<Sentiment | undefined>(undefined);
  const [sortBy, setSortBy] = useState<SortBy>('relevance');
  const [categories, setCategories] = useState<Record<string, CategoryInfo>>({});
  const [platforms, setPlatforms] = useState<string[]>([]);
  const [loading, setLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const [data, setData] = useState<SearchData | null>(null);
  const [logs, setLogs] = useState<LogEntry[]>([]);
  const logCounter = useRef(0);

  const pushLog = (message: string, level: LogLevel = 'info') => {
    logCounter.current += 1;
    const id = logCounter.current;
    setLogs((prev) => [...prev, { id, level, message }]);
  };

  useEffect(() => {
    let cancelled = false;
    Promise.all([fetchCategories(), fetchPlatforms()])
      .then(([loadedCategories, loadedPlatforms]) => {
        if (cancelled) return;
        setCategories(loadedCategories);
        setPlatforms(loadedPlatforms);
      })
      .catch((e: unknown) => {
        if (!cancelled) setError(messageOf(e, 'Could not reach the review service.'));
      });
    return () => {
      cancelled = true;
    };
  }, []);

  const toggleCategory = (id: string) => {
    setSelectedCategories((prev) =>
      prev.includes(id) ? prev.filter((c) => c !== id) : [...prev, id],
    );
  };

  const handleSearch = async () => {
    setError(null);
    setData(null);
    setLogs([]);

    const target = query.trim();
    if (!target) {
      const msg =
        mode === 'product'
          ? 'Validation failed: please enter a product name.'
          : 'Validation failed: please paste a product or business page URL.';
      setError(msg);
      pushLog(msg, 'error');
      return;
    }

    const keywordList = splitList(keywords);
    setLoading(true);
    pushLog(
      mode === 'product'
        ? `Searching storefronts for "${target}"…`
        : `Scraping reviews from ${target}…`,
    );
    if (keywordList.length) {
      pushLog(`Filtering by keywords: ${keywordList.join(', ')}`);
    }

    try {
      const res = await searchReviews({
        product: mode === 'product' ? target : undefined,
        url: mode === 'url' ? target : undefined,
        keywords: keywordList,
        categories: selectedCategories,
        minRating,
        sentiment,
        sortBy,
      });
      setData(res.data);
      for (const result of res.data.platform_results) {
        if (result.status === 'ok') {
          pushLog(`${label(result.platform)}: ${result.count} reviews scraped.`);
        } else {
          pushLog(`${label(result.platform)}: ${result.error}`, 'error');
        }
      }
      pushLog(res.message ?? `Found ${res.data.total_found} reviews.`);
    } catch (e: unknown) {
      const msg = messageOf(e, 'Unexpected error during search.');
      setError(msg);
      pushLog(`Backend error during search: ${msg}`, 'error');
    } finally {
      setLoading(false);
    }
  };

  const handleExportPdf = async () => {
    if (!data) return;
    pushLog('Requesting PDF generation from backend…');
    try {
      const blob = await requestReportPdf(data.insights, data.product ?? data.original_url ?? 'Review search');
      const url = window.URL.createObjectURL(blob);
      const a = document.createElement('a');
      a.href = url;
      a.download = 'review-report.pdf';
      a.click();
      window.URL.revokeObjectURL(url);
      pushLog('PDF generated and download started.');
    } catch (e: unknown) {
      const msg = messageOf(e, 'Failed to export PDF.');
      setError(msg);
      pushLog(msg, 'error');
    }
  };

  const insights = data?.insights;
  const total = insights?.total_reviews || 1;

  return (
    <div className="app-root">
      <header className="app-header">
        <h1>Review Finder</h1>
        <p>
          Search reviews across {platforms.length || 'several'} platforms,
          filter them by keyword, category and sentiment, and export a PDF
          summary.
        </p>
      </header>

      <section className="card">
        <div className="mode-row">
          <span className="mode-label">Search by</span>
          <div className="mode-options">
            <label className="mode-option">
              <input
                type="radio"
                name="mode"
                value="product"
                checked={mode === 'product'}
                onChange={() => setMode('product')}
              />
              Product name
            </label>
            <label className="mode-option">
              <input
                type="radio"
                name="mode"
                value="url"
                checked={mode === 'url'}
                onChange={() => setMode('url')}
              />
              Page URL
            </label>
          </div>
        </div>

        <label className="field-label" htmlFor="query-input">
          {mode === 'product' ? 'Product to search' : 'URL to scrape'}
        </label>
        <input
          id="query-input"
          className="text-input"
          type={mode === 'url' ? 'url' : 'text'}
          placeholder={mode === 'url' ? 'https://www.walmart.com/ip/...' : 'standing desk'}
          value={query}
          onChange={(e) => setQuery(e.target.value)}
        />

        <label className="field-label" htmlFor="keywords-input">
          Keywords (comma separated)
        </label>
        <input
          id="keywords-input"
          className="text-input"
          type="text"
          placeholder="assembly, wobble"
          value={keywords}
          onChange={(e) => setKeywords(e.target.value)}
        />

        {Object.keys(categories).length > 0 && (
          <fieldset className="category-list">
            <legend className="field-label">Categories</legend>
            {Object.entries(categories).map(([id, info]) => (
              <label key={id} className="mode-option" title={info.description}>
                <input
                  type="checkbox"
                  checked={selectedCategories.includes(id)}
                  onChange={() => toggleCategory(id)}
                />
                {label(id)}
              </label>
            ))}
          </fieldset>
        )}

        <div className="filter-row">
          <label className="field-label" htmlFor="min-rating">
            Minimum rating
          </label>
          <select
            id="min-rating"
            value={minRating}
            onChange={(e) => setMinRating(Number(e.target.value))}
          >
            {[0, 1, 2, 3, 4, 5].map((r) => (
              <option key={r} value={r}>
                {r === 0 ? 'Any' : `${r}★ and up`}
              </option>
            ))}
          </select>

          <label className="field-label" htmlFor="sentiment">
            Sentiment
          </label>
          <select
            id="sentiment"
            value={sentiment ?? ''}
            onChange={(e) => setSentiment(isSentiment(e.target.value) ? e.target.value : undefined)}
          >
            <option value="">Any</option>
            {SENTIMENTS.map((s) => (
              <option key={s} value={s}>
                {label(s)}
              </option>
            ))}
          </select>

          <label className="field-label" htmlFor="sort-by">
            Sort by
          </label>
          <select
            id="sort-by"
            value={sortBy}
            onChange={(e) => {
              if (isSortBy(e.target.value)) setSortBy(e.target.value);
            }}
          >
            <option value="relevance">Relevance</option>
            <option value="rating">Rating</option>
            <option value="date">Date</option>
            <option value="length">Length</option>
          </select>
        </div>

        <button className="primary-btn" onClick={handleSearch} disabled={loading}>
          {loading ? 'Searching…' : 'Search reviews'}
        </button>

        {error && (
          <div className="error-banner" role="alert">
            {error}
          </div>
        )}

        {logs.length > 0 && (
          <div className="log-panel" aria-live="polite">
            <h3 className="log-panel-title">Activity log</h3>
            <ul className="log-list">
              {logs.map((log) => (
                <li key={log.id} className={`log-entry log-entry-${log.level}`}>
                  {log.message}
                </li>
              ))}
            </ul>
          </div>
        )}
      </section>

      {data && insights && (
        <section className="results">
          <div className="results-header">
            <h2>Results</h2>
            <button className="secondary-btn" onClick={handleExportPdf}>
              Export as PDF
            </button>
          </div>

          <div className="grid">
            <div className="card">
              <h3>Overview</h3>
              <p>
                <strong>Matching reviews:</strong> {data.total_found} of{' '}
                {data.total_scraped}
              </p>
              <p>
                <strong>Average rating:</strong> {insights.average_rating.toFixed(2)}
              </p>
            </div>

            <div className="card">
              <h3>Ratings distribution</h3>
              <ul className="list">
                {RATING_BUCKETS.map((bucket) => {
                  const count = insights.rating_distribution[bucket];
                  const pct = ((count / total) * 100).toFixed(1);
                  return (
                    <li key={bucket}>
                      <strong>{bucket.charAt(0)}★</strong> – {count} ({pct}%)
                    </li>
                  );
                })}
              </ul>
            </div>

            <div className="card">
              <h3>Sentiment breakdown</h3>
              <ul className="list">
                {SENTIMENTS.map((s) => {
                  const count = insights.sentiment_breakdown[s];
                  const pct = ((count / total) * 100).toFixed(1);
                  return (
                    <li key={s}>
                      <strong>{label(s)}</strong> – {count} ({pct}%)
                    </li>
                  );
                })}
              </ul>
            </div>

            <div className="card">
              <h3>Top categories</h3>
              {insights.top_categories.length === 0 ? (
                <p>No categories detected.</p>
              ) : (
                <ul className="list">
                  {insights.top_categories.map((category) => (
                    <li key={category}>
                      <strong>{label(category)}</strong> –{' '}
                      {insights.category_breakdown[category]} mentions
                    </li>
                  ))}
                </ul>
              )}
            </div>
          </div>

          {data.reviews.length === 0 ? (
            <p className="empty-state">No reviews matched the filters.</p>
          ) : (
            <ul className="review-list">
              {data.reviews.map((review, idx) => (
                <li key={`${review.review_url}-${idx}`} className="card review-card">
                  <div className="review-meta">
                    <strong>{review.reviewer_name}</strong>{' '}
                    <span>{review.star_display}</span>{' '}
                    <span className={`sentiment sentiment-${review.sentiment}`}>
                      {label(review.sentiment)}
                    </span>{' '}
                    <span className="authenticity" title={review.authenticity.flags.map(label).join(', ')}>
                      {`${review.authenticity.is_likely_authentic ? 'Likely authentic' : 'Possibly inauthentic'} (${Math.round(review.authenticity.score * 100)}%)`}
                    </span>
                  </div>
                  <p>{review.review_text}</p>
                  <small>
                    {label(review.platform)}
                    {review.date ? ` · ${review.date}` : ''}
                    {review.categories.length
                      ? ` · ${review.categories.map(label).join(', ')}`
                      : ''}
                  </small>
                </li>
              ))}
            </ul>
          )}
        </section>
      )}

      <footer className="app-footer">
        <span>
          Product searches cover the storefronts with a search page; any other
          site can be searched by URL.
        </span>
      </footer>
    </div>
  );
};

import type { Review } from '../types';

export const MAX_TEXT_LENGTH = 5000;

const LINK_LABELS: Record<string, string> = {
  yelp: 'View on Yelp',
  amazon: 'View on Amazon',
  walmart: 'View on Walmart',
  target: 'View on Target',
};

export type DisplayFields = {
  readonly starDisplay: string;
  readonly reviewLink: string;
};

export type CleanedReview<T extends Review = Review> = T & DisplayFields;

export function sanitizeText(text: string): string {
  const collapsed = text.replace(/[<>"'&]/g, '').replace(/\s+/g, ' ').trim();
  return collapsed.length > MAX_TEXT_LENGTH
    ? `${collapsed.slice(0, MAX_TEXT_LENGTH)}...`
    : collapsed;
}

export function starDisplay(rating: number): string {
  const full = Math.min(Math.max(Math.floor(rating), 0), 5);
  return `${'★'.repeat(full)}${'☆'.repeat(5 - full)} (${rating}/5)`;
}

export function reviewLink(platform: string, url: string): string {
  return `${LINK_LABELS[platform.toLowerCase()] ?? 'View Review'}: ${url}`;
}

export function cleanReview<T extends Review>(review: T): CleanedReview<T> | undefined {
  const rating = Math.min(Math.max(Number.isFinite(review.rating) ? review.rating : 0, 0), 5);
  const text = sanitizeText(review.text);
  if (!text && rating <= 0) return undefined;

  return {
    ...review,
    reviewerName: sanitizeText(review.reviewerName) || 'Anonymous',
    rating,
    text,
    date: sanitizeText(review.date),
    starDisplay: starDisplay(rating),
    reviewLink: reviewLink(review.platform, review.url),
  };
}

/** Sanitise for output and drop reviews left with neither text nor rating. */
export function cleanReviews<T extends Review>(reviews: readonly T[]): CleanedReview<T>[] {
  const cleaned: CleanedReview<T>[] = [];
  for (const review of reviews) {
    const c = cleanReview(review);
    if (c) cleaned.push(c);
  }
  return cleaned;
}

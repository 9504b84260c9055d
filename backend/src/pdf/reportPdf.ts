import PDFDocument from 'pdfkit';
import type { Writable } from 'stream';
import type { ReviewInsights } from '../types';

const SENTIMENT_LABELS = [
  ['positive', 'Positive'],
  ['negative', 'Negative'],
  ['neutral', 'Neutral'],
] as const;

const RATING_BUCKETS = ['5_star', '4_star', '3_star', '2_star', '1_star'] as const;

function pct(count: number, total: number): string {
  return ((count / (total || 1)) * 100).toFixed(1);
}

/**
 * Render review insights as a PDF into `out` (an HTTP response in the API).
 * The document is ended before returning; the caller listens on `out`.
 */
export function writeInsightsPdf(
  out: Writable,
  insights: ReviewInsights,
  title?: string,
  generatedAt: Date = new Date(),
): void {
  const doc = new PDFDocument({ margin: 50 });
  doc.pipe(out);

  doc.fontSize(20).text('Review Insights Report', { align: 'center' });
  doc.moveDown(0.5);
  doc.fontSize(14).text(title || 'Review search', { align: 'center' });
  doc.moveDown();

  doc.fontSize(12).text(`Generated at: ${generatedAt.toISOString()}`);
  doc.text(`Reviews analysed: ${insights.totalReviews}`);
  doc.text(`Average rating: ${insights.averageRating.toFixed(2)} / 5`);
  doc.moveDown();

  const total = insights.totalReviews;

  doc.fontSize(16).text('Rating distribution', { underline: true });
  doc.moveDown(0.5);
  for (const bucket of RATING_BUCKETS) {
    const count = insights.ratingDistribution[bucket];
    doc.fontSize(12).text(`${bucket.charAt(0)} stars: ${count} reviews (${pct(count, total)}%)`);
  }
  doc.moveDown();

  doc.fontSize(16).text('Sentiment breakdown', { underline: true });
  doc.moveDown(0.5);
  for (const [key, label] of SENTIMENT_LABELS) {
    const count = insights.sentimentBreakdown[key];
    doc.fontSize(12).text(`${label}: ${count} reviews (${pct(count, total)}%)`);
  }
  doc.moveDown();

  const categories = Object.entries(insights.categoryBreakdown);
  if (categories.length) {
    doc.fontSize(16).text('Categories mentioned', { underline: true });
    doc.moveDown(0.5);
    categories.forEach(([category, count], idx) => {
      doc
        .fontSize(12)
        .text(`${idx + 1}. ${category.replace(/_/g, ' ')}: ${count} reviews (${pct(count, total)}%)`);
    });
  }

  doc.end();
}

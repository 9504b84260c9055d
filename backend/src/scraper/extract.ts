import * as cheerio from 'cheerio';
import type { Cheerio } from 'cheerio';
import type { Element } from 'domhandler';
import { loggers } from '../config/logger';
import { getErrorMessage } from '../lib/errors';
import type { PlatformConfig, Review } from '../types';

const log = loggers.scraper;

export const DEFAULT_MAX_REVIEWS = 50;

/** A review as read off the page, before defaults and de-duplication. */
export type RawReview = {
  reviewerName?: string;
  rating: number;
  text: string;
  date?: string;
  title?: string;
  helpfulVotes?: number;
  verifiedPurchase?: boolean;
};

export type ReviewContext = {
  url: string;
  platform: string;
  source: string;
  maxReviews?: number;
};

const HEURISTIC_CONTAINER_SELECTOR = [
  '[class*="review" i]',
  '[id*="review" i]',
  '[data-testid*="review" i]',
  '[class*="comment" i]',
  '[class*="testimonial" i]',
  '[class*="feedback" i]',
].join(', ');

const HEURISTIC_TEXT_SELECTOR =
  '[class*="text" i], [class*="content" i], [class*="body" i], p';
const HEURISTIC_NAME_SELECTOR =
  '[class*="author" i], [class*="name" i], [class*="user" i]';
const HEURISTIC_RATING_SELECTOR =
  '[class*="rating" i], [class*="star" i], [aria-label*="star" i], [data-rating]';
const HEURISTIC_DATE_SELECTOR = 'time, [class*="date" i]';

const MIN_HEURISTIC_TEXT_LENGTH = 20;

export function cleanText(value: string | undefined): string {
  return (value ?? '').replace(/\s+/g, ' ').trim();
}

/**
 * Pull a 0–5 rating out of strings such as "4.0 out of 5 stars",
 * "Rated 4", "8/10" (with scale 10) or an `a-star-4-5` class name.
 */
export function parseRating(raw: string | undefined, scale = 5): number {
  if (!raw) return 0;

  let value: number | undefined;
  const starClass = raw.match(/a-star-(?:small-|medium-|mini-)?(\d)(?:-(\d))?\b/);
  if (starClass) {
    value = Number(starClass[1]) + (starClass[2] ? Number(starClass[2]) / 10 : 0);
  } else {
    const numeric = raw.match(/(\d+(?:[.,]\d+)?)/);
    if (numeric) value = Number(numeric[1].replace(',', '.'));
  }

  if (value === undefined || !Number.isFinite(value)) return 0;
  const normalized = scale === 5 ? value : (value / scale) * 5;
  return Math.round(Math.min(Math.max(normalized, 0), 5) * 10) / 10;
}

function parseCount(raw: string | undefined): number | undefined {
  if (!raw) return undefined;
  if (/^\s*one\b/i.test(raw)) return 1;
  const match = raw.replace(/,/g, '').match(/(\d+)/);
  return match ? Number(match[1]) : undefined;
}

function ratingSource(node: Cheerio<Element>): string {
  const candidates = [
    node.attr('data-rating'),
    node.attr('aria-label'),
    node.attr('title'),
    node.attr('content'),
    cleanText(node.text()),
    node.attr('class'),
  ];
  return candidates.find((c) => c && /\d/.test(c)) ?? '';
}

function readRating(
  card: Cheerio<Element>,
  selector: string,
  scale: number,
): number {
  const node = card.find(selector).first();
  if (!node.length) return 0;
  return parseRating(ratingSource(node), scale);
}

function readText(card: Cheerio<Element>, selector: string): string {
  return cleanText(card.find(selector).first().text());
}

function readDate(card: Cheerio<Element>, selector: string): string {
  const node = card.find(selector).first();
  if (!node.length) return '';
  return cleanText(node.text()) || node.attr('datetime') || '';
}

/**
 * Read reviews with a platform's configured selectors.
 */
export function extractWithConfig(html: string, config: PlatformConfig): RawReview[] {
  const $ = cheerio.load(html);
  const { selectors } = config;
  const reviews: RawReview[] = [];

  $<Element, string>(selectors.reviewContainer).each((index, el) => {
    try {
      const card = $(el);
      const title = selectors.title ? readText(card, selectors.title) : '';
      reviews.push({
        reviewerName: readText(card, selectors.reviewerName) || undefined,
        rating: readRating(card, selectors.rating, config.ratingScale),
        text: readText(card, selectors.text),
        date: readDate(card, selectors.date) || undefined,
        title: title || undefined,
        helpfulVotes: selectors.helpfulVotes
          ? parseCount(readText(card, selectors.helpfulVotes))
          : undefined,
        verifiedPurchase: selectors.verifiedPurchase
          ? card.find(selectors.verifiedPurchase).length > 0
          : undefined,
      });
    } catch (err) {
      log.warn(
        { platform: config.id, index, err: getErrorMessage(err) },
        'skipping unparseable review container',
      );
    }
  });

  return reviews;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function hasType(node: Record<string, unknown>, type: string): boolean {
  const t = node['@type'];
  if (typeof t === 'string') return t === type;
  return Array.isArray(t) && t.includes(type);
}

function asString(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return undefined;
}

function collectJsonLdReviews(node: unknown, found: Record<string, unknown>[]): void {
  if (Array.isArray(node)) {
    for (const item of node) collectJsonLdReviews(item, found);
    return;
  }
  if (!isRecord(node)) return;

  if (hasType(node, 'Review')) {
    found.push(node);
    return;
  }
  for (const key of ['@graph', 'review', 'reviews', 'itemListElement', 'item']) {
    if (key in node) collectJsonLdReviews(node[key], found);
  }
}

function jsonLdToRaw(node: Record<string, unknown>): RawReview {
  const author = node.author;
  const reviewerName = isRecord(author) ? asString(author.name) : asString(author);

  let rating = 0;
  const reviewRating = node.reviewRating;
  if (isRecord(reviewRating)) {
    const best = Number(asString(reviewRating.bestRating) ?? 5);
    rating = parseRating(
      asString(reviewRating.ratingValue),
      Number.isFinite(best) && best > 0 ? best : 5,
    );
  }

  return {
    reviewerName: reviewerName ? cleanText(reviewerName) : undefined,
    rating,
    text: cleanText(asString(node.reviewBody) ?? asString(node.description)),
    date: asString(node.datePublished),
    title: asString(node.name),
  };
}

/**
 * Read schema.org `Review` objects embedded as JSON-LD.
 */
export function extractJsonLdReviews(html: string): RawReview[] {
  const $ = cheerio.load(html);
  const found: Record<string, unknown>[] = [];

  $('script[type="application/ld+json"]').each((_, el) => {
    const raw = $(el).text();
    try {
      collectJsonLdReviews(JSON.parse(raw), found);
    } catch (err) {
      log.debug({ err: getErrorMessage(err) }, 'ignoring malformed JSON-LD block');
    }
  });

  return found.map(jsonLdToRaw);
}

function groupRepeatedCards(
  $: cheerio.CheerioAPI,
  candidates: Element[],
): Element[] {
  // Siblings sharing a tag and class list are treated as one card layout.
  const groups = new Map<unknown, Map<string, Element[]>>();
  for (const el of candidates) {
    const key = `${el.tagName}.${$(el).attr('class') ?? ''}`;
    const byKey = groups.get(el.parent) ?? new Map<string, Element[]>();
    byKey.set(key, [...(byKey.get(key) ?? []), el]);
    groups.set(el.parent, byKey);
  }

  let best: Element[] = [];
  for (const byKey of groups.values()) {
    for (const group of byKey.values()) {
      if (group.length > best.length) best = group;
    }
  }
  return best;
}

function readHeuristicCards($: cheerio.CheerioAPI, cards: Element[]): RawReview[] {
  const reviews: RawReview[] = [];
  for (const el of cards) {
    try {
      const card = $(el);
      const textNode = card
        .find(HEURISTIC_TEXT_SELECTOR)
        .filter((_, n) => cleanText($(n).text()).length >= MIN_HEURISTIC_TEXT_LENGTH)
        .first();
      const text = cleanText(textNode.length ? textNode.text() : card.text());
      if (text.length < MIN_HEURISTIC_TEXT_LENGTH) continue;

      reviews.push({
        reviewerName: readText(card, HEURISTIC_NAME_SELECTOR) || undefined,
        rating: readRating(card, HEURISTIC_RATING_SELECTOR, 5),
        text,
        date: readDate(card, HEURISTIC_DATE_SELECTOR) || undefined,
      });
    } catch (err) {
      log.warn({ err: getErrorMessage(err) }, 'skipping unparseable heuristic block');
    }
  }
  return reviews;
}

/**
 * Last-resort extraction for pages with no known layout: prefer a run of
 * repeated sibling cards whose class mentions reviews or comments, else the
 * innermost such blocks that carry enough text.
 */
export function extractHeuristicReviews(html: string): RawReview[] {
  const $ = cheerio.load(html);
  $('script, style, noscript, nav, header, footer').remove();

  const candidates = $<Element, string>(HEURISTIC_CONTAINER_SELECTOR).toArray();
  // Icons and badges repeat too; only blocks with readable text can be cards.
  const texty = candidates.filter(
    (el) => cleanText($(el).text()).length >= MIN_HEURISTIC_TEXT_LENGTH,
  );

  const cards = groupRepeatedCards($, texty);
  if (cards.length >= 2) {
    const reviews = readHeuristicCards($, cards);
    if (reviews.length) return reviews;
  }

  const innermost = texty.filter((el) => $(el).find(HEURISTIC_CONTAINER_SELECTOR).length === 0);
  return readHeuristicCards($, innermost);
}

/**
 * Apply defaults, drop empty entries, de-duplicate and cap.
 */
export function toReviews(raw: RawReview[], ctx: ReviewContext): Review[] {
  const max = ctx.maxReviews ?? DEFAULT_MAX_REVIEWS;
  const seen = new Set<string>();
  const reviews: Review[] = [];

  for (const r of raw) {
    const title = r.title ? cleanText(r.title) : undefined;
    const body = cleanText(r.text);
    const text = title && body && !body.startsWith(title) ? `${title} ${body}` : body || title || '';
    if (!text && r.rating <= 0) continue;

    const reviewerName = cleanText(r.reviewerName) || 'Anonymous';
    const key = `${reviewerName}|${text}`;
    if (seen.has(key)) continue;
    seen.add(key);

    reviews.push({
      reviewerName,
      rating: r.rating,
      text,
      date: r.date ?? '',
      url: ctx.url,
      platform: ctx.platform,
      source: ctx.source,
      ...(title ? { title } : {}),
      ...(r.helpfulVotes !== undefined ? { helpfulVotes: r.helpfulVotes } : {}),
      ...(r.verifiedPurchase !== undefined
        ? { verifiedPurchase: r.verifiedPurchase }
        : {}),
    });

    if (reviews.length >= max) break;
  }
  return reviews;
}

import { describe, expect, it } from 'vitest';
import { AMAZON_PAGE, HEURISTIC_PAGE, JSON_LD_PAGE, YELP_PAGE } from '../../__tests__/support/pages';
import { PlatformRegistry } from '../../platforms/registry';
import {
  extractHeuristicReviews,
  extractJsonLdReviews,
  extractWithConfig,
  parseRating,
  toReviews,
} from '../extract';

const registry = PlatformRegistry.fromData();

function config(id: string) {
  const found = registry.get(id);
  if (!found) throw new Error(`missing platform ${id}`);
  return found;
}

describe('parseRating', () => {
  it('reads ratings from text and star classes', () => {
    expect(parseRating('4.0 out of 5 stars')).toBe(4);
    expect(parseRating('Rated 3 out of 5')).toBe(3);
    expect(parseRating('a-icon a-icon-star a-star-4-5')).toBe(4.5);
    expect(parseRating('4,5 Sterne')).toBe(4.5);
  });

  it('rescales and clamps to 0-5', () => {
    expect(parseRating('8', 10)).toBe(4);
    expect(parseRating('Rated 7 out of 5')).toBe(5);
  });

  it('returns 0 when no number is present', () => {
    expect(parseRating(undefined)).toBe(0);
    expect(parseRating('no rating yet')).toBe(0);
  });
});

describe('extractWithConfig', () => {
  it('reads Amazon review cards', () => {
    const raw = extractWithConfig(AMAZON_PAGE, config('amazon'));
    expect(raw).toHaveLength(3);
    expect(raw[0]).toEqual({
      reviewerName: 'Dana K.',
      rating: 4,
      text: 'Assembly took about an hour and the instructions were clear.',
      date: 'Reviewed in the United States on March 3, 2024',
      title: 'Solid desk',
      helpfulVotes: 12,
      verifiedPurchase: true,
    });
    expect(raw[1].verifiedPurchase).toBe(false);
    expect(raw[1].helpfulVotes).toBeUndefined();
    expect(raw[2].helpfulVotes).toBe(1);
  });

  it('reads Yelp review cards', () => {
    const raw = extractWithConfig(YELP_PAGE, config('yelp'));
    expect(raw.map((r) => [r.reviewerName, r.rating, r.date])).toEqual([
      ['Maria G.', 5, 'Mar 3, 2024'],
      ['Tom R.', 2, 'Feb 12, 2024'],
    ]);
  });

  it('finds nothing when the layout does not match', () => {
    expect(extractWithConfig(HEURISTIC_PAGE, config('amazon'))).toEqual([]);
  });
});

describe('extractJsonLdReviews', () => {
  it('reads Review objects nested in a Product', () => {
    expect(extractJsonLdReviews(JSON_LD_PAGE)).toEqual([
      {
        reviewerName: 'Ana P.',
        rating: 4,
        text: 'Sturdy frame and easy assembly.',
        date: '2024-01-10',
        title: undefined,
      },
      {
        reviewerName: 'Ben',
        rating: 4,
        text: 'Good value for the price.',
        date: '2024-02-01',
        title: 'Nice',
      },
    ]);
  });

  it('reads @graph entries and skips malformed blocks', () => {
    const html = `
      <script type="application/ld+json">{not json</script>
      <script type="application/ld+json">
        {"@graph":[{"@type":"Organization"},{"@type":["Review","CreativeWork"],"author":"Zoe","reviewBody":"Fast delivery.","reviewRating":{"ratingValue":5}}]}
      </script>`;
    const raw = extractJsonLdReviews(html);
    expect(raw).toHaveLength(1);
    expect(raw[0].reviewerName).toBe('Zoe');
    expect(raw[0].rating).toBe(5);
  });
});

describe('extractHeuristicReviews', () => {
  it('uses repeated review cards', () => {
    expect(extractHeuristicReviews(HEURISTIC_PAGE)).toEqual([
      { reviewerName: 'Kim', rating: 4, text: 'The chair is comfortable for long work days.', date: undefined },
      { reviewerName: 'Raj', rating: 2, text: 'Armrest cracked after two weeks of normal use.', date: undefined },
    ]);
  });

  it('ignores repeated star icons inside a card', () => {
    const stars = '<i class="review-star"></i>'.repeat(5);
    const html = `
      <div class="review-card">${stars}<p class="review-text">Sturdy frame and the motor is quiet at night.</p></div>
      <div class="review-card">${stars}<p class="review-text">Cable tray is handy but the legs wobble a bit.</p></div>`;
    expect(extractHeuristicReviews(html)).toEqual([
      { reviewerName: undefined, rating: 0, text: 'Sturdy frame and the motor is quiet at night.', date: undefined },
      { reviewerName: undefined, rating: 0, text: 'Cable tray is handy but the legs wobble a bit.', date: undefined },
    ]);
  });

  it('falls back to single text blocks of at least 20 characters', () => {
    const html = `
      <div class="testimonial">Best customer support I have had in years.</div>
      <div class="comment">Too short</div>`;
    const raw = extractHeuristicReviews(html);
    expect(raw.map((r) => r.text)).toEqual(['Best customer support I have had in years.']);
  });
});

describe('toReviews', () => {
  const ctx = { url: 'https://shop.example.test/p/1', platform: 'generic', source: 'generic_scraping' };

  it('joins titles, fills defaults and drops empty entries', () => {
    const reviews = toReviews(
      [
        { rating: 5, text: 'Works well.', title: 'Nice' },
        { rating: 0, text: '   ' },
        { reviewerName: 'Ana', rating: 3, text: 'Nice enough', title: 'Nice' },
      ],
      ctx,
    );
    expect(reviews).toEqual([
      {
        reviewerName: 'Anonymous',
        rating: 5,
        text: 'Nice Works well.',
        date: '',
        url: ctx.url,
        platform: 'generic',
        source: 'generic_scraping',
        title: 'Nice',
      },
      {
        reviewerName: 'Ana',
        rating: 3,
        text: 'Nice enough',
        date: '',
        url: ctx.url,
        platform: 'generic',
        source: 'generic_scraping',
        title: 'Nice',
      },
    ]);
  });

  it('de-duplicates by reviewer and text and caps the count', () => {
    const raw = [
      { reviewerName: 'Ana', rating: 4, text: 'Same text here' },
      { reviewerName: 'Ana', rating: 5, text: 'Same text here' },
      { reviewerName: 'Ben', rating: 4, text: 'Same text here' },
      { reviewerName: 'Cy', rating: 4, text: 'Another one' },
    ];
    expect(toReviews(raw, ctx).map((r) => r.reviewerName)).toEqual(['Ana', 'Ben', 'Cy']);
    expect(toReviews(raw, { ...ctx, maxReviews: 2 }).map((r) => r.reviewerName)).toEqual(['Ana', 'Ben']);
  });
});

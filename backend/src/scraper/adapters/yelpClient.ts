import fetch from 'node-fetch';
import { z } from 'zod';
import { FetchError } from '../../lib/errors';

const YELP_API_BASE = 'https://api.yelp.com/v3';

const yelpReviewSchema = z.object({
  id: z.string().optional(),
  url: z.string().optional(),
  text: z.string().default(''),
  rating: z.number().default(0),
  time_created: z.string().default(''),
  user: z.object({ name: z.string().optional() }).optional(),
});

const yelpReviewsResponseSchema = z.object({
  reviews: z.array(yelpReviewSchema).default([]),
});

export type YelpApiReview = z.infer<typeof yelpReviewSchema>;

export type JsonResponseLike = {
  status: number;
  json(): Promise<unknown>;
};

export type JsonFetchImpl = (
  url: string,
  init: { headers: Record<string, string>; timeout: number },
) => Promise<JsonResponseLike>;

/**
 * Minimal Yelp Fusion client: only the business reviews endpoint.
 */
export class YelpFusionClient {
  private readonly fetchImpl: JsonFetchImpl;

  constructor(
    private readonly apiKey: string,
    private readonly timeoutMs: number,
    fetchImpl?: JsonFetchImpl,
  ) {
    this.fetchImpl = fetchImpl ?? ((url, init) => fetch(url, init));
  }

  async businessReviews(businessId: string): Promise<YelpApiReview[]> {
    const url = `${YELP_API_BASE}/businesses/${encodeURIComponent(businessId)}/reviews`;
    const res = await this.fetchImpl(url, {
      headers: {
        Authorization: `Bearer ${this.apiKey}`,
        Accept: 'application/json',
      },
      timeout: this.timeoutMs,
    });

    if (res.status !== 200) {
      throw new FetchError(url, `Yelp API answered HTTP ${res.status}`, res.status);
    }
    return yelpReviewsResponseSchema.parse(await res.json()).reviews;
  }
}

import fetch, { FetchError as NodeFetchError } from 'node-fetch';
import { loggers } from '../config/logger';
import { BlockedError, FetchError, getErrorMessage } from '../lib/errors';
import type { ScrapeMethod } from '../types';

const log = loggers.scraper;

const USER_AGENTS = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:125.0) Gecko/20100101 Firefox/125.0',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.4 Safari/605.1.15',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36 Edg/124.0.0.0',
];

const BLOCKED_STATUSES = new Set([403, 429, 503]);

const BLOCK_MARKERS =
  /validateCaptcha|Robot Check|are you a robot|px-captcha|captcha-delivery|unusual traffic from your computer/i;

export type FetchedPage = {
  url: string;
  status: number;
  html: string;
};

export type FetchPageOptions = {
  referer?: string;
};

export interface PageFetcher {
  fetch(url: string, options?: FetchPageOptions): Promise<FetchedPage>;
}

export type HttpResponseLike = {
  status: number;
  url: string;
  text(): Promise<string>;
};

export type HttpRequestInit = {
  headers: Record<string, string>;
  timeout: number;
  redirect: 'follow';
};

export type FetchImpl = (
  url: string,
  init: HttpRequestInit,
) => Promise<HttpResponseLike>;

export type HttpPageFetcherOptions = {
  timeoutMs: number;
  retryDelayMs?: number;
  fetchImpl?: FetchImpl;
  userAgents?: string[];
};

export function looksBlocked(html: string): boolean {
  return BLOCK_MARKERS.test(html);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Plain HTTP page fetcher with browser-like headers, a rotating
 * User-Agent, and a single retry on network errors and 5xx answers.
 */
export class HttpPageFetcher implements PageFetcher {
  private readonly timeoutMs: number;
  private readonly retryDelayMs: number;
  private readonly fetchImpl: FetchImpl;
  private readonly userAgents: string[];

  constructor(options: HttpPageFetcherOptions) {
    this.timeoutMs = options.timeoutMs;
    this.retryDelayMs = options.retryDelayMs ?? 1_000;
    this.fetchImpl = options.fetchImpl ?? ((url, init) => fetch(url, init));
    this.userAgents = options.userAgents ?? USER_AGENTS;
  }

  async fetch(url: string, options: FetchPageOptions = {}): Promise<FetchedPage> {
    try {
      return await this.fetchOnce(url, options);
    } catch (firstError) {
      if (!(firstError instanceof FetchError) || !firstError.retryable) {
        throw firstError;
      }
      log.debug({ url, err: firstError.message }, 'retrying page fetch');
      await sleep(this.retryDelayMs);
      try {
        return await this.fetchOnce(url, options);
      } catch (retryError) {
        log.debug({ url, err: getErrorMessage(retryError) }, 'page fetch retry failed');
        throw firstError;
      }
    }
  }

  buildHeaders(referer?: string): Record<string, string> {
    const headers: Record<string, string> = {
      'User-Agent':
        this.userAgents[Math.floor(Math.random() * this.userAgents.length)],
      Accept:
        'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8',
      'Accept-Language': 'en-US,en;q=0.9',
      'Accept-Encoding': 'gzip, deflate, br',
      'Upgrade-Insecure-Requests': '1',
      'Cache-Control': 'max-age=0',
    };
    if (referer) headers.Referer = referer;
    return headers;
  }

  private async fetchOnce(
    url: string,
    options: FetchPageOptions,
  ): Promise<FetchedPage> {
    let response: HttpResponseLike;
    try {
      response = await this.fetchImpl(url, {
        headers: this.buildHeaders(options.referer),
        timeout: this.timeoutMs,
        redirect: 'follow',
      });
    } catch (err) {
      const timedOut =
        err instanceof NodeFetchError && err.type === 'request-timeout';
      throw new FetchError(
        url,
        timedOut ? `timed out after ${this.timeoutMs}ms` : getErrorMessage(err),
        undefined,
        timedOut,
      );
    }

    const html = await response.text();

    if (BLOCKED_STATUSES.has(response.status) || looksBlocked(html)) {
      throw new BlockedError(url, response.status);
    }
    if (response.status < 200 || response.status >= 300) {
      throw new FetchError(url, `HTTP ${response.status}`, response.status);
    }

    return { url: response.url || url, status: response.status, html };
  }
}

/** Plain HTTP fetcher plus the optional headless-browser one. */
export type PageFetchers = {
  http: PageFetcher;
  browser?: PageFetcher;
};

export type SelectedFetcher = {
  fetcher: PageFetcher;
  method: Exclude<ScrapeMethod, 'api'>;
};

export function selectFetcher(
  fetchers: PageFetchers,
  requiresJs: boolean | undefined,
): SelectedFetcher {
  if (requiresJs && fetchers.browser) {
    return { fetcher: fetchers.browser, method: 'browser' };
  }
  return { fetcher: fetchers.http, method: 'scraping' };
}

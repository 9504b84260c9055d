import { ValidationError } from '../lib/errors';

const ASIN_IN_URL_PATTERNS = [
  /\/dp\/([A-Z0-9]{10})/i,
  /\/gp\/product\/([A-Z0-9]{10})/i,
  /\/product\/([A-Z0-9]{10})/i,
  /\/product-reviews\/([A-Z0-9]{10})/i,
  /\/ASIN\/([A-Z0-9]{10})/i,
  /asin=([A-Z0-9]{10})/i,
];

export const MIN_REFRESH_INTERVAL_SECONDS = 60;
export const MAX_REFRESH_INTERVAL_SECONDS = 86_400;

function parseUrl(input: string): URL | undefined {
  try {
    return new URL(input);
  } catch {
    return undefined;
  }
}

function isOnDomain(url: URL, domain: string): boolean {
  const host = url.hostname.toLowerCase();
  return host === domain || host.endsWith(`.${domain}`);
}

function checkYelpId(id: string): string {
  if (!/^[A-Za-z0-9_-]+$/.test(id)) {
    throw new ValidationError('Invalid Yelp business ID format');
  }
  if (id.length < 3 || id.length > 100) {
    throw new ValidationError('Yelp business ID must be 3-100 characters');
  }
  return id;
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    throw new ValidationError('Invalid Yelp business ID format');
  }
}

export function isHttpUrl(input: string): boolean {
  return /^https?:\/\//i.test(input);
}

export function validateUrl(input: string): string {
  const url = input.trim();
  if (!url) {
    throw new ValidationError('URL must be a non-empty string');
  }
  if (!isHttpUrl(url)) {
    throw new ValidationError('URL must start with http:// or https://');
  }
  const parsed = parseUrl(url);
  if (!parsed || !parsed.hostname) {
    throw new ValidationError('Invalid URL format - missing domain');
  }
  return url;
}

/** Business id from a `yelp.com/biz/<id>` URL or a bare id. */
export function resolveYelpBusinessId(input: string): string {
  const value = input.trim();
  if (!value) {
    throw new ValidationError('Yelp input must be a non-empty string');
  }

  if (isHttpUrl(value)) {
    const parsed = parseUrl(value);
    if (!parsed) throw new ValidationError('Invalid URL format');
    if (!isOnDomain(parsed, 'yelp.com')) {
      throw new ValidationError('URL must be from yelp.com domain');
    }
    const match = parsed.pathname.match(/\/biz\/([^/?#]+)/);
    if (!match) {
      throw new ValidationError('Yelp URL must contain /biz/ path');
    }
    return checkYelpId(decodeSegment(match[1]));
  }

  return checkYelpId(value);
}

export function findAsin(url: string): string | undefined {
  for (const pattern of ASIN_IN_URL_PATTERNS) {
    const match = url.match(pattern);
    if (match) return match[1].toUpperCase();
  }
  return undefined;
}

export function resolveAmazonAsin(input: string): string {
  const value = input.trim();
  if (!value) {
    throw new ValidationError('Amazon input must be a non-empty string');
  }

  if (isHttpUrl(value)) {
    const parsed = parseUrl(value);
    if (!parsed) throw new ValidationError('Invalid URL format');
    if (!parsed.hostname.toLowerCase().includes('amazon.')) {
      throw new ValidationError('URL must be from Amazon domain');
    }
    const asin = findAsin(value);
    if (!asin) throw new ValidationError('Amazon URL must contain a valid ASIN');
    return asin;
  }

  if (!/^[A-Z0-9]{10}$/i.test(value)) {
    throw new ValidationError(
      'Invalid Amazon ASIN format (must be 10 alphanumeric characters)',
    );
  }
  return value.toUpperCase();
}

export function resolveWalmartProductId(input: string): string {
  const value = input.trim();
  if (!value) {
    throw new ValidationError('Walmart input must be a non-empty string');
  }

  if (isHttpUrl(value)) {
    const parsed = parseUrl(value);
    if (!parsed) throw new ValidationError('Invalid URL format');
    if (!isOnDomain(parsed, 'walmart.com')) {
      throw new ValidationError('URL must be from walmart.com domain');
    }
    if (!parsed.pathname.includes('/ip/')) {
      throw new ValidationError('Walmart URL must contain /ip/ path');
    }
    const segments = parsed.pathname.split('/').filter(Boolean);
    const id = segments[segments.length - 1];
    if (!id || !/^\d{3,20}$/.test(id)) {
      throw new ValidationError('Walmart URL must end with a numeric product ID');
    }
    return id;
  }

  if (!/^\d+$/.test(value)) {
    throw new ValidationError('Invalid Walmart product ID format');
  }
  if (value.length < 3 || value.length > 20) {
    throw new ValidationError('Walmart product ID must be 3-20 digits');
  }
  return value;
}

export function validateRefreshInterval(
  interval: number | undefined,
): number | undefined {
  if (interval === undefined) return undefined;
  if (!Number.isFinite(interval)) {
    throw new ValidationError('Refresh interval must be a number');
  }
  if (interval <= 0) {
    throw new ValidationError('Refresh interval must be positive');
  }
  if (interval < MIN_REFRESH_INTERVAL_SECONDS) {
    throw new ValidationError(
      `Refresh interval must be at least ${MIN_REFRESH_INTERVAL_SECONDS} seconds to avoid rate limiting`,
    );
  }
  if (interval > MAX_REFRESH_INTERVAL_SECONDS) {
    throw new ValidationError('Refresh interval cannot exceed 24 hours');
  }
  return interval;
}

export function parseList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
}

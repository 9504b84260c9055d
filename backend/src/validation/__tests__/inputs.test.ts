import { describe, expect, it } from 'vitest';
import { ValidationError } from '../../lib/errors';
import {
  findAsin,
  parseList,
  resolveAmazonAsin,
  resolveWalmartProductId,
  resolveYelpBusinessId,
  validateRefreshInterval,
  validateUrl,
} from '../inputs';

describe('validateUrl', () => {
  it('accepts http and https URLs', () => {
    expect(validateUrl(' https://example.test/page ')).toBe('https://example.test/page');
  });

  it('rejects empty, schemeless and hostless input', () => {
    expect(() => validateUrl('  ')).toThrow('URL must be a non-empty string');
    expect(() => validateUrl('ftp://example.test')).toThrow('URL must start with http:// or https://');
    expect(() => validateUrl('https://')).toThrow(ValidationError);
  });
});

describe('resolveYelpBusinessId', () => {
  it('extracts the id from a /biz/ URL', () => {
    expect(resolveYelpBusinessId('https://www.yelp.com/biz/test-bistro-springfield?osq=tacos')).toBe(
      'test-bistro-springfield',
    );
  });

  it('accepts a bare id', () => {
    expect(resolveYelpBusinessId('test_bistro-1')).toBe('test_bistro-1');
  });

  it('rejects other domains, missing /biz/ and bad ids', () => {
    expect(() => resolveYelpBusinessId('https://example.test/biz/x')).toThrow('URL must be from yelp.com domain');
    expect(() => resolveYelpBusinessId('https://www.yelp.com/search?q=x')).toThrow('Yelp URL must contain /biz/ path');
    expect(() => resolveYelpBusinessId('ab')).toThrow('Yelp business ID must be 3-100 characters');
    expect(() => resolveYelpBusinessId('bad id!')).toThrow('Invalid Yelp business ID format');
  });

  it('only trusts yelp.com and its subdomains', () => {
    expect(resolveYelpBusinessId('https://m.yelp.com/biz/test-bistro')).toBe('test-bistro');
    expect(() => resolveYelpBusinessId('https://notyelp.com/biz/test-bistro')).toThrow(
      'URL must be from yelp.com domain',
    );
  });

  it('checks the id taken from a URL like a bare id', () => {
    expect(() => resolveYelpBusinessId('https://www.yelp.com/biz/%E0%A4%A')).toThrow(
      'Invalid Yelp business ID format',
    );
    expect(() => resolveYelpBusinessId('https://www.yelp.com/biz/caf%C3%A9-central')).toThrow(
      'Invalid Yelp business ID format',
    );
    expect(() => resolveYelpBusinessId('https://www.yelp.com/biz/ab')).toThrow(
      'Yelp business ID must be 3-100 characters',
    );
  });
});

describe('resolveAmazonAsin', () => {
  it('normalises bare ASINs to upper case', () => {
    expect(resolveAmazonAsin('b000test01')).toBe('B000TEST01');
  });

  it('finds the ASIN in the common URL shapes', () => {
    expect(resolveAmazonAsin('https://www.amazon.com/Desk/dp/B000TEST01/ref=sr_1_1')).toBe('B000TEST01');
    expect(resolveAmazonAsin('https://www.amazon.com/product-reviews/B000TEST02')).toBe('B000TEST02');
    expect(findAsin('https://www.amazon.com/gp/product/b000test03')).toBe('B000TEST03');
    expect(findAsin('https://www.amazon.com/s?k=desk')).toBeUndefined();
  });

  it('rejects invalid input', () => {
    expect(() => resolveAmazonAsin('B000')).toThrow(
      'Invalid Amazon ASIN format (must be 10 alphanumeric characters)',
    );
    expect(() => resolveAmazonAsin('https://www.amazon.com/s?k=desk')).toThrow(
      'Amazon URL must contain a valid ASIN',
    );
    expect(() => resolveAmazonAsin('https://example.test/dp/B000TEST01')).toThrow(
      'URL must be from Amazon domain',
    );
  });
});

describe('resolveWalmartProductId', () => {
  it('accepts numeric ids and /ip/ URLs', () => {
    expect(resolveWalmartProductId('123456')).toBe('123456');
    expect(resolveWalmartProductId('https://www.walmart.com/ip/Standing-Desk/987654')).toBe('987654');
  });

  it('rejects malformed ids', () => {
    expect(() => resolveWalmartProductId('12')).toThrow('Walmart product ID must be 3-20 digits');
    expect(() => resolveWalmartProductId('abc')).toThrow('Invalid Walmart product ID format');
    expect(() => resolveWalmartProductId('https://www.walmart.com/search?q=desk')).toThrow(
      'Walmart URL must contain /ip/ path',
    );
    expect(() => resolveWalmartProductId('https://notwalmart.com/ip/Desk/987654')).toThrow(
      'URL must be from walmart.com domain',
    );
  });
});

describe('validateRefreshInterval', () => {
  it('passes through undefined and in-range values', () => {
    expect(validateRefreshInterval(undefined)).toBeUndefined();
    expect(validateRefreshInterval(60)).toBe(60);
    expect(validateRefreshInterval(86_400)).toBe(86_400);
  });

  it('rejects out-of-range values', () => {
    expect(() => validateRefreshInterval(0)).toThrow('Refresh interval must be positive');
    expect(() => validateRefreshInterval(59)).toThrow(
      'Refresh interval must be at least 60 seconds to avoid rate limiting',
    );
    expect(() => validateRefreshInterval(86_401)).toThrow('Refresh interval cannot exceed 24 hours');
  });
});

describe('parseList', () => {
  it('splits and trims comma lists', () => {
    expect(parseList(' assembly, setup ,,quality ')).toEqual(['assembly', 'setup', 'quality']);
    expect(parseList(undefined)).toEqual([]);
  });
});

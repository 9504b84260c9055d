import { describe, expect, it } from 'vitest';
import { isScrapingOnly, loadConfig } from '../env';

describe('loadConfig', () => {
  it('applies defaults when nothing is set', () => {
    const config = loadConfig({});
    expect(config).toEqual({
      port: 8080,
      host: '0.0.0.0',
      environment: 'development',
      logLevel: 'info',
      requestTimeoutMs: 20_000,
      maxReviews: 50,
      browserRendering: false,
      corsOrigins: [],
      yelpApiKey: undefined,
      amazon: undefined,
    });
    expect(isScrapingOnly(config)).toBe(true);
  });

  it('reads numbers, flags and lists', () => {
    const config = loadConfig({
      PORT: '3001',
      REQUEST_TIMEOUT_MS: '5000',
      MAX_REVIEWS: '25',
      BROWSER_RENDERING: 'yes',
      CORS_ORIGINS: 'http://localhost:5173, https://reviews.example.test',
      LOG_LEVEL: 'debug',
    });
    expect(config.port).toBe(3001);
    expect(config.requestTimeoutMs).toBe(5_000);
    expect(config.maxReviews).toBe(25);
    expect(config.browserRendering).toBe(true);
    expect(config.corsOrigins).toEqual(['http://localhost:5173', 'https://reviews.example.test']);
    expect(config.logLevel).toBe('debug');
  });

  it('prefers NODE_ENV over FLASK_ENV', () => {
    expect(loadConfig({ FLASK_ENV: 'production' }).environment).toBe('production');
    expect(loadConfig({ NODE_ENV: 'staging', FLASK_ENV: 'production' }).environment).toBe('staging');
  });

  it('treats blank credentials as missing', () => {
    const config = loadConfig({ YELP_API_KEY: '   ', AMAZON_ACCESS_KEY: 'test-access' });
    expect(config.yelpApiKey).toBeUndefined();
    expect(config.amazon).toBeUndefined();
    expect(isScrapingOnly(config)).toBe(true);
  });

  it('enables API mode only with complete credentials', () => {
    const config = loadConfig({
      YELP_API_KEY: 'test-secret',
      AMAZON_ACCESS_KEY: 'test-access',
      AMAZON_SECRET_KEY: 'test-secret',
      AMAZON_PARTNER_TAG: 'test-tag',
    });
    expect(config.yelpApiKey).toBe('test-secret');
    expect(config.amazon).toEqual({
      accessKey: 'test-access',
      secretKey: 'test-secret',
      partnerTag: 'test-tag',
    });
    expect(isScrapingOnly(config)).toBe(false);
  });

  it('rejects invalid values with the offending variable', () => {
    expect(() => loadConfig({ PORT: 'abc' })).toThrow(/^Invalid environment configuration: PORT: /);
    expect(() => loadConfig({ BROWSER_RENDERING: 'maybe' })).toThrow(/BROWSER_RENDERING/);
  });
});

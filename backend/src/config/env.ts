import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .optional()
  .transform((v) => v === 'true' || v === '1' || v === 'yes');

const optionalSecret = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  HOST: z.string().default('0.0.0.0'),
  NODE_ENV: z.string().optional(),
  FLASK_ENV: z.string().optional(),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(20_000),
  MAX_REVIEWS: z.coerce.number().int().min(1).max(500).default(50),
  BROWSER_RENDERING: booleanFlag,
  CORS_ORIGINS: z.string().optional(),
  YELP_API_KEY: optionalSecret,
  AMAZON_ACCESS_KEY: optionalSecret,
  AMAZON_SECRET_KEY: optionalSecret,
  AMAZON_PARTNER_TAG: optionalSecret,
});

export type AppConfig = {
  port: number;
  host: string;
  environment: string;
  logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
  requestTimeoutMs: number;
  maxReviews: number;
  browserRendering: boolean;
  corsOrigins: string[];
  yelpApiKey?: string;
  amazon?: {
    accessKey: string;
    secretKey: string;
    partnerTag: string;
  };
};

/**
 * Parse environment variables into a typed config.
 * Every variable is optional; missing platform credentials leave the
 * service in scraping-only mode.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  const e = parsed.data;
  const amazon =
    e.AMAZON_ACCESS_KEY && e.AMAZON_SECRET_KEY && e.AMAZON_PARTNER_TAG
      ? {
          accessKey: e.AMAZON_ACCESS_KEY,
          secretKey: e.AMAZON_SECRET_KEY,
          partnerTag: e.AMAZON_PARTNER_TAG,
        }
      : undefined;

  return Object.freeze({
    port: e.PORT,
    host: e.HOST,
    environment: e.NODE_ENV || e.FLASK_ENV || 'development',
    logLevel: e.LOG_LEVEL,
    requestTimeoutMs: e.REQUEST_TIMEOUT_MS,
    maxReviews: e.MAX_REVIEWS,
    browserRendering: e.BROWSER_RENDERING,
    corsOrigins: (e.CORS_ORIGINS || '')
      .split(',')
      .map((o) => o.trim())
      .filter(Boolean),
    yelpApiKey: e.YELP_API_KEY,
    amazon,
  });
}

export function isScrapingOnly(config: AppConfig): boolean {
  return !config.yelpApiKey && !config.amazon;
}

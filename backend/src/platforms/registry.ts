import { z } from 'zod';
import platformData from '../data/platforms.json';
import type { PlatformConfig } from '../types';

const platformConfigSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  domain: z.string().min(1),
  selectors: z.object({
    reviewContainer: z.string(),
    reviewerName: z.string(),
    rating: z.string(),
    text: z.string(),
    date: z.string(),
    title: z.string().optional(),
    helpfulVotes: z.string().optional(),
    verifiedPurchase: z.string().optional(),
  }),
  ratingScale: z.number().positive().default(5),
  requiresJs: z.boolean().default(false),
  searchUrl: z.string().url().optional(),
});

const registryFileSchema = z.object({
  platforms: z.array(platformConfigSchema).min(1),
});

function normalizeHost(url: string): string | undefined {
  try {
    const host = new URL(url).hostname.toLowerCase();
    return host.startsWith('www.') ? host.slice(4) : host;
  } catch {
    return undefined;
  }
}

/**
 * Read-only lookup of platform extraction configs by id or URL domain.
 */
export class PlatformRegistry {
  private readonly configs: PlatformConfig[];
  private readonly byId: Map<string, PlatformConfig>;

  constructor(configs: PlatformConfig[]) {
    this.configs = configs;
    this.byId = new Map(configs.map((c) => [c.id, c]));
  }

  static fromData(data: unknown = platformData): PlatformRegistry {
    const parsed = registryFileSchema.parse(data);
    return new PlatformRegistry(parsed.platforms);
  }

  list(): PlatformConfig[] {
    return [...this.configs];
  }

  ids(): string[] {
    return this.configs.map((c) => c.id);
  }

  get(id: string): PlatformConfig | undefined {
    return this.byId.get(id.toLowerCase());
  }

  detect(url: string): PlatformConfig | undefined {
    const host = normalizeHost(url);
    if (!host) return undefined;

    for (const config of this.configs) {
      if (host === config.domain || host.endsWith(`.${config.domain}`)) {
        return config;
      }
    }

    // Regional Amazon storefronts (amazon.co.uk, amazon.de, ...)
    if (/(^|\.)amazon\.[a-z.]+$/.test(host)) {
      return this.byId.get('amazon');
    }
    return undefined;
  }

  searchUrl(id: string, product: string): string | undefined {
    const template = this.get(id)?.searchUrl;
    if (!template) return undefined;
    return template.replace('{query}', encodeURIComponent(product.trim()));
  }
}

import { Router } from 'express';
import type { Services } from '../services';
import { serializePlatform } from './serializers';

export function catalogRouter({ registry, analyzer }: Services): Router {
  const router = Router();

  router.get('/platforms', (_req, res) => {
    const platforms = registry.list();
    res.json({
      success: true,
      data: {
        platforms: platforms.map((p) => p.id),
        details: platforms.map(serializePlatform),
        total_platforms: platforms.length,
      },
      message: `Currently supporting ${platforms.length} platforms`,
    });
  });

  router.get('/categories', (_req, res) => {
    const categories = analyzer.listCategories();
    res.json({
      success: true,
      data: {
        categories: Object.fromEntries(
          categories.map((c) => [c.id, { description: c.description, keywords: c.keywords }]),
        ),
        total_categories: categories.length,
      },
      message: 'Available review categories for filtering',
    });
  });

  return router;
}

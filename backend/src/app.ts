import express, { type Express } from 'express';
import cors from 'cors';
import { errorHandler, notFound } from './middleware/errorHandler';
import { requestLogger } from './middleware/requestLogger';
import { catalogRouter } from './routes/catalog';
import { metaRouter } from './routes/meta';
import { reportRouter } from './routes/report';
import { scrapeRouter } from './routes/scrape';
import { searchRouter } from './routes/search';
import type { Services } from './services';

/**
 * Build the Express app without listening, so tests can drive it through
 * supertest.
 */
export function createApp(services: Services): Express {
  const app = express();
  const { corsOrigins } = services.config;

  app.disable('x-powered-by');
  app.use(requestLogger);
  app.use(cors(corsOrigins.length ? { origin: corsOrigins } : undefined));
  app.use(express.json({ limit: '2mb' }));

  app.use(metaRouter(services));
  app.use(scrapeRouter(services));
  app.use(searchRouter(services));
  app.use(catalogRouter(services));
  app.use(reportRouter());

  app.use(notFound);
  app.use(errorHandler);

  return app;
}

import pino from 'pino';

const LOG_LEVEL = process.env.LOG_LEVEL || 'info';
const SERVICE_NAME = process.env.SERVICE_NAME || 'review-scraper';

export const logger = pino({
  level: LOG_LEVEL,
  base: { service: SERVICE_NAME },
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level: (label) => ({ level: label }),
  },
});

export type Logger = pino.Logger;

export const loggers = {
  server: logger.child({ component: 'server' }),
  scraper: logger.child({ component: 'scraper' }),
  analyzer: logger.child({ component: 'analyzer' }),
  scheduler: logger.child({ component: 'scheduler' }),
};

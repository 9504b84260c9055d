import { loadConfig } from './config/env';
import { loggers } from './config/logger';
import { createApp } from './app';
import { createServices } from './services';

const log = loggers.server;

const config = loadConfig();
const services = createServices(config);
const app = createApp(services);

const server = app.listen(config.port, config.host, () => {
  log.info(
    { port: config.port, host: config.host, environment: config.environment },
    'review scraper listening',
  );
});

function shutdown(signal: string): void {
  log.info({ signal }, 'shutting down');
  services.scheduler.stop();
  server.close((err) => {
    if (err) {
      log.error({ err: err.message }, 'server close failed');
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));

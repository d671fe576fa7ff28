import { createServer } from 'http';
import config from './config';
import { createApp } from './app';
import logger from './utils/logger';

const app = createApp();
const server = createServer(app);

function startServer(): void {
  const { port, host, env } = config.server;
  server.listen(port, host, () => {
    logger.info(`Server listening on ${host}:${port}`, { env });
    logger.info('Feed acquisition configured', {
      provider: config.acquisition.provider,
      fallback: config.acquisition.fallback,
      snapshotPath: config.acquisition.snapshotPath,
      freshnessWindowSeconds: config.acquisition.freshnessWindowSeconds,
    });
  });
}

function shutdown(signal: string): void {
  logger.info(`${signal} received, closing HTTP server`);
  server.close((error) => {
    if (error) {
      logger.error('Error while closing HTTP server', { error: error.message });
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

startServer();

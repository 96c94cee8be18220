/**
 * Extract API entry point
 */

import { config, logger, enableDefaultMetrics, OpenAiTransport } from '@formtable/shared';
import { createApp } from './app';

enableDefaultMetrics();

const app = createApp({ createTransport: () => new OpenAiTransport() });

// Start server
const server = app.listen(config.port, () => {
  logger.info('Extract API started', { port: config.port });
});

// Graceful shutdown
function shutdown(signal: string) {
  logger.info(`${signal} received, shutting down`);
  server.close((error) => {
    if (error) {
      logger.error('Server did not close cleanly', error);
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

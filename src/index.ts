import { loadConfig } from './infrastructure/config/env';
import { errorMessage, Logger } from './infrastructure/logger/Logger';
import { createContainer } from './container';
import { startWebServer } from './api/server';

const config = loadConfig();

Logger.info('Starting Daily Habits', {
  nodeEnv: config.nodeEnv,
  storage: config.storage.driver,
});

const container = createContainer(config);
const server = startWebServer(container.webApp, config.port);

// Graceful shutdown
const shutdown = () => {
  Logger.info('Shutting down...');
  server.close(() => {
    container
      .close()
      .then(() => {
        Logger.info('Server closed');
        process.exit(0);
      })
      .catch(error => {
        Logger.error('Error during shutdown', { error: errorMessage(error) });
        process.exit(1);
      });
  });
};

process.once('SIGINT', shutdown);
process.once('SIGTERM', shutdown);

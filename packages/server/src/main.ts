// Server entry point

import { createHTTPServer } from '@trpc/server/adapters/standalone';
import { consoleLogger, createLevelFilteredLogger } from '@parley/runtime';
import { loadConfig } from './config.js';
import { createAppContext } from './app.js';
import { appRouter } from './trpc/routers/index.js';
import { createContextFactory } from './trpc/context.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLevelFilteredLogger(consoleLogger, config.logLevel);
  const context = await createAppContext({ config, logger });

  const server = createHTTPServer({
    router: appRouter,
    createContext: createContextFactory(context),
  });

  server.listen(config.port, config.host, () => {
    logger.info('Server listening', { host: config.host, port: config.port, ordersFile: config.ordersFile });
  });

  const shutdown = (signal: string) => {
    logger.info('Shutting down', { signal });
    server.close(() => process.exit(0));
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  consoleLogger.error('Server failed to start', {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});

/**
 * Server entry point
 * @module @kubesim/server/main
 */

import { createServiceLogger } from '@kubesim/shared';
import { createServerFromEnvironment } from './index.js';

const logger = createServiceLogger(
  {
    level: 'debug',
    service: 'kubesim',
  },
  { component: 'main' },
);

async function main(): Promise<void> {
  const server = await createServerFromEnvironment();
  await server.start();

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info('Shutting down', { signal });
    try {
      await server.stop();
      process.exit(0);
    } catch (error) {
      logger.error('Shutdown failed', error instanceof Error ? error : undefined);
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  logger.fatal('Server failed to start', error instanceof Error ? error : undefined);
  process.exit(1);
});

// Load environment variables FIRST
import 'dotenv/config';

import { createApp } from '@/app';
import { getAppConfig } from '@/config/app.config';
import { errorMessage } from '@/services/errors';
import { logger } from '@/services/logger';
import { getPipelineDeps } from '@/services/pipeline-deps';

const config = getAppConfig();
const deps = getPipelineDeps();
const app = createApp(config, deps.tripService);

const server = app.listen(config.port, () => {
  logger.info('server:listening', { port: config.port, env: config.nodeEnv });
});

async function shutdown(signal: string): Promise<void> {
  logger.info('server:shutdown', { signal });
  server.close();
  try {
    await deps.tripService.close();
  } catch (err) {
    logger.error('server:shutdown_error', { error: errorMessage(err) });
  } finally {
    process.exit(0);
  }
}

process.on('SIGINT', () => void shutdown('SIGINT'));
process.on('SIGTERM', () => void shutdown('SIGTERM'));

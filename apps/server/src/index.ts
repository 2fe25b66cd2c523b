import { serve } from '@hono/node-server';
import { loadServerConfig } from '@servefs/config';
import { createApp } from './app';
import { createComponentLogger, initializeLogger } from './logger';

// servefs.json is looked up from the working directory unless SERVEFS_CONFIG names a file
const config = loadServerConfig({ configPath: process.env.SERVEFS_CONFIG });
initializeLogger(config.logLevel);
const logger = createComponentLogger('startup');

const app = await createApp(config);

const server = serve(
  {
    fetch: app.fetch,
    port: config.port,
    hostname: config.host,
  },
  (info) => {
    logger.info('Server listening', {
      url: `http://${config.host}:${info.port}`,
      mounts: config.mounts.map((mount) => `${mount.type} ${mount.route}`),
    });
  }
);

let isShuttingDown = false;

function shutdown(signal: string) {
  if (isShuttingDown) return;
  isShuttingDown = true;

  logger.info('Shutting down', { signal });
  server.close((error) => {
    if (error) {
      logger.error('Error while closing server', { error: error.message });
      process.exitCode = 1;
    }
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));

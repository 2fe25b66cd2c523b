/**
 * Application factory
 *
 * Builds the Hono app for a server configuration: middleware, one route per
 * configured mount, the health check and the fallbacks.
 */

import { Hono } from 'hono';
import { HTTPException } from 'hono/http-exception';
import type { MountConfig, ServerConfig } from '@servefs/config';
import {
  assertServableFile,
  createStaticRegistry,
  fileSource,
  layerRegistries,
  mimeTypesRegistry,
  nodeFileSystem,
  readContentSource,
  resolveMediaType,
  type HostMimeRegistry,
} from '@servefs/content';
import { isServefsError } from '@servefs/utils';
import { initializeLogger, isLoggerInitialized } from './logger';
import { requestIdMiddleware } from './middleware/request-id';
import { requestLoggerMiddleware } from './middleware/request-logger';
import { healthRouter } from './routes/health';
import {
  dirHandler,
  faviconHandler,
  sendFileHandler,
  staticContentHandler,
  type HandlerDeps,
} from './handlers';

export type AppDeps = HandlerDeps;

function registryFor(config: ServerConfig, base: HostMimeRegistry): HostMimeRegistry {
  if (!config.mimeOverrides) {
    return base;
  }
  return layerRegistries(createStaticRegistry(config.mimeOverrides), base);
}

async function mountRoute(
  app: Hono,
  mount: MountConfig,
  deps: HandlerDeps & { registry: HostMimeRegistry }
): Promise<void> {
  switch (mount.type) {
    case 'directory': {
      const prefix = mount.route.replace(/\/+$/, '');
      app.get(`${prefix}/*`, dirHandler(mount.root, { strippedPrefix: prefix }, deps));
      return;
    }
    case 'favicon':
      app.get(mount.route, faviconHandler(mount.file, deps));
      return;
    case 'download':
      app.get(mount.route, sendFileHandler(mount.file, deps));
      return;
    case 'static': {
      // Read once at startup; later changes to the file are not picked up
      const fileSystem = deps.fileSystem ?? nodeFileSystem;
      await assertServableFile(mount.file, fileSystem);
      const bytes = await readContentSource(fileSource(mount.file), fileSystem);
      const mediaType = mount.mediaType ?? resolveMediaType(mount.file, deps.registry);
      app.get(mount.route, staticContentHandler(bytes, mediaType));
      return;
    }
  }
}

/**
 * Build the app for a configuration
 *
 * Initializes the global logger at `config.logLevel` when the caller has not.
 *
 * @throws NotFoundError when a static mount's file is missing
 */
export async function createApp(config: ServerConfig, deps: AppDeps = {}): Promise<Hono> {
  if (!isLoggerInitialized()) {
    initializeLogger(config.logLevel);
  }

  const app = new Hono();
  const handlerDeps = {
    ...deps,
    registry: registryFor(config, deps.registry ?? mimeTypesRegistry),
  };

  app.use('*', requestIdMiddleware);
  app.use('*', requestLoggerMiddleware);

  app.route('/', healthRouter);

  for (const mount of config.mounts) {
    await mountRoute(app, mount, handlerDeps);
  }

  app.notFound((c) => c.text('Not Found', 404));

  app.onError((err, c) => {
    const logger = c.get('logger');
    const meta = {
      type: 'request_failed',
      method: c.req.method,
      path: c.req.path,
    };

    if (err instanceof HTTPException) {
      const cause = err.cause;
      const details = {
        ...meta,
        status: err.status,
        code: isServefsError(cause) ? cause.code : undefined,
        error: cause instanceof Error ? cause.message : err.message,
      };
      if (err.status >= 500) {
        logger.error('Content handler failed', {
          ...details,
          stack: cause instanceof Error ? cause.stack : undefined,
        });
      } else {
        logger.warn('Content request rejected', details);
      }
      return err.getResponse();
    }

    logger.error('Unhandled error during request processing', {
      ...meta,
      error: err.message,
      stack: err.stack,
      name: err.name,
    });
    return c.text('Internal Server Error', 500);
  });

  return app;
}

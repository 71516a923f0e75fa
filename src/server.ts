import { randomUUID } from 'node:crypto';

import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import type { FastifyInstance } from 'fastify';
import fastify from 'fastify';

import type { Config } from './config/index.js';
import { ContentRepository } from './content/repository.js';
import { errorHandlerPlugin } from './plugins/error-handler.js';
import { requestLoggerPlugin } from './plugins/request-logger.js';
import { healthRoutesPlugin } from './routes/health.js';
import { openStorage } from './storage/index.js';

// Import types to ensure augmentation is loaded
import './types/index.js';

export interface CreateServerOptions {
  config: Config;
}

export async function createServer(options: CreateServerOptions): Promise<FastifyInstance> {
  const { config } = options;
  const isDev = config.env === 'development';

  const server = fastify({
    logger: {
      level: config.logging.level,
      transport: config.logging.pretty
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'HH:MM:ss Z',
              ignore: 'pid,hostname',
            },
          }
        : undefined,
    },
    requestIdHeader: 'x-request-id',
    genReqId: () => randomUUID(),
    // requestLoggerPlugin logs instead
    disableRequestLogging: true,
    bodyLimit: 1048576,
  });

  server.decorate('config', config);

  await server.register(helmet, {
    global: true,
    contentSecurityPolicy: isDev ? false : undefined,
  });

  await server.register(rateLimit, {
    max: config.rateLimit.global,
    timeWindow: config.rateLimit.windowMs,
  });

  // Read-only surface: cross-origin reads in dev only
  await server.register(cors, {
    origin: isDev,
    methods: ['GET', 'HEAD', 'OPTIONS'],
    allowedHeaders: ['X-Request-ID'],
  });

  await server.register(errorHandlerPlugin, { isDev });
  await server.register(requestLoggerPlugin, { isDev });

  // Backend choice is made once here and never re-evaluated
  const storage = await openStorage(config.storage, server.log);
  server.decorate('storage', storage);

  // For route plugins registered on the returned instance; this server
  // itself only serves /health
  server.decorate(
    'content',
    new ContentRepository({
      storage,
      collection: config.content.collection,
      sequenceFields: config.storage.collections[config.content.collection]?.sequenceFields ?? [],
      childKeys: config.content.childKeys,
    })
  );

  server.log.info(
    { backend: storage.backendKind, collection: config.content.collection },
    'Storage layer initialized'
  );

  server.addHook('onClose', async () => {
    await storage.close();
    server.log.info('Storage layer shutdown complete');
  });

  await server.register(healthRoutesPlugin);

  return server;
}

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';

import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';
import { z } from 'zod';

import type { StorageAdapter } from '../storage/adapter.js';
import type { BackendKind } from '../storage/types.js';

// Read version once at startup (not on every request)
const PackageJsonSchema = z.object({ version: z.string() });
const APP_VERSION = PackageJsonSchema.parse(
  JSON.parse(readFileSync(resolve(process.cwd(), 'package.json'), 'utf-8'))
).version;

interface DependencyStatus {
  status: 'up' | 'down';
  backend?: BackendKind;
  latency?: number;
  error?: string;
}

interface HealthResponse {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  version: string;
  uptime: number;
  dependencies: Record<string, DependencyStatus>;
}

async function checkStorage(storage: StorageAdapter): Promise<DependencyStatus> {
  const start = Date.now();
  try {
    const healthy = await storage.healthy();
    return {
      status: healthy ? 'up' : 'down',
      backend: storage.backendKind,
      latency: Date.now() - start,
    };
  } catch (err) {
    return {
      status: 'down',
      backend: storage.backendKind,
      latency: Date.now() - start,
      error: err instanceof Error ? err.message : 'Unknown error',
    };
  }
}

const healthRoutes: FastifyPluginCallback = (fastify, _options, done) => {
  fastify.get<{ Reply: HealthResponse }>('/health', async (_request, reply) => {
    const storageStatus = await checkStorage(fastify.storage);

    const status: HealthResponse['status'] = storageStatus.status === 'up' ? 'healthy' : 'unhealthy';

    const response: HealthResponse = {
      status,
      timestamp: new Date().toISOString(),
      version: APP_VERSION,
      uptime: process.uptime(),
      dependencies: { storage: storageStatus },
    };

    return reply.status(status === 'healthy' ? 200 : 503).send(response);
  });

  done();
};

export const healthRoutesPlugin = fp(healthRoutes, {
  name: 'health-routes',
  fastify: '5.x',
});

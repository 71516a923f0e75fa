import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import type { FastifyInstance } from 'fastify';
import { describe, it, expect, beforeAll, afterAll } from 'vitest';

import { ConfigSchema } from '@/config/schema.js';
import { createServer } from '@/server.js';

describe('Server Integration', () => {
  let server: FastifyInstance;
  let dataDir: string;

  beforeAll(async () => {
    dataDir = await mkdtemp(join(tmpdir(), 'content-store-server-'));
    const config = ConfigSchema.parse({
      logging: { level: 'error' }, // Quiet logs in tests
      env: 'test',
      storage: {
        backend: 'file',
        file: { dataDir },
        collections: { countries: { sequenceFields: ['visa_types', 'fees'] } },
      },
      content: { collection: 'countries', childKeys: ['country_id'] },
    });
    server = await createServer({ config });
    await server.ready();
  });

  afterAll(async () => {
    if (server.storage.isConnected) await server.close();
    await rm(dataDir, { recursive: true, force: true });
  });

  it('should decorate the server with an open storage adapter', () => {
    expect(server.storage.backendKind).toBe('file');
    expect(server.storage.isConnected).toBe(true);
  });

  it('should persist content through the repository', async () => {
    const created = await server.content.create({ id: 'chile', name: 'Chile', region: 'South America' });

    expect(created).toMatchObject({ id: 'chile', visa_types: [], fees: [], published: false });
    const file = JSON.parse(await readFile(join(dataDir, 'countries.json'), 'utf-8'));
    expect(file).toHaveLength(1);
    expect(file[0]).toMatchObject({ id: 'chile', name: 'Chile' });
  });

  it('should apply security headers', async () => {
    const response = await server.inject({ method: 'GET', url: '/health' });

    expect(response.headers['x-content-type-options']).toBe('nosniff');
  });

  it('should close storage when the server closes', async () => {
    await server.close();

    expect(server.storage.isConnected).toBe(false);
  });
});

describe('Server content routes', () => {
  let server: FastifyInstance;
  let dataDir: string;

  beforeAll(async () => {
    dataDir = await mkdtemp(join(tmpdir(), 'content-store-routes-'));
    server = await createServer({
      config: ConfigSchema.parse({
        logging: { level: 'error' },
        env: 'development',
        storage: { backend: 'file', file: { dataDir } },
        content: { collection: 'countries' },
      }),
    });
    server.get<{ Params: { id: string } }>('/countries/:id', async (request, reply) => {
      const country = await server.content.getById(request.params.id);
      if (!country) return await reply.status(404).send({ id: request.params.id });
      return country;
    });
    await server.ready();
  });

  afterAll(async () => {
    await server.close();
    await rm(dataDir, { recursive: true, force: true });
  });

  it('should serve documents through the content decoration', async () => {
    await server.content.create({ id: 'peru', name: 'Peru' });

    const found = await server.inject({ method: 'GET', url: '/countries/peru' });
    const missing = await server.inject({ method: 'GET', url: '/countries/atlantis' });

    expect(found.statusCode).toBe(200);
    expect(found.json()).toMatchObject({ id: 'peru', name: 'Peru' });
    expect(missing.statusCode).toBe(404);
  });

  it('should answer CORS preflight for reads only', async () => {
    const response = await server.inject({
      method: 'OPTIONS',
      url: '/countries/peru',
      headers: { origin: 'http://localhost:3000', 'access-control-request-method': 'GET' },
    });

    expect(response.statusCode).toBe(204);
    expect(response.headers['access-control-allow-origin']).toBe('http://localhost:3000');
    expect(response.headers['access-control-allow-methods']).toBe('GET, HEAD, OPTIONS');
  });
});

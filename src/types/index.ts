// content-store type definitions

import type { Config } from '../config/index.js';
import type { ContentRepository } from '../content/repository.js';
import type { StorageAdapter } from '../storage/adapter.js';

// Augment Fastify types
declare module 'fastify' {
  interface FastifyInstance {
    config: Config;
    storage: StorageAdapter;
    content: ContentRepository;
  }
}

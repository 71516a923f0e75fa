// Storage module barrel export and backend selection.

import type { FastifyBaseLogger } from 'fastify';

import { StorageAdapter } from './adapter.js';
import type { StorageConfig } from './config.js';
import { StorageBackendUnavailableError } from './errors.js';
import { FsBackend } from './fs-backend.js';
import { MongoBackend } from './mongo-backend.js';
import { createMongoClient } from './mongo-client.js';
import type { StorageBackend } from './types.js';

export type {
  BackendKind,
  CursorState,
  DeleteResult,
  Document,
  Filter,
  FindOptions,
  InsertResult,
  PipelineStage,
  ReturnDocument,
  SortDirection,
  SortSpec,
  StorageBackend,
  Update,
  UpdateResult,
} from './types.js';
export type { StorageConfig, IndexConfig } from './config.js';
export { StorageConfigSchema } from './config.js';
export {
  StorageNotConnectedError,
  StorageUnsupportedQueryError,
  StorageIoFailureError,
  StorageBackendUnavailableError,
} from './errors.js';
export { StorageAdapter } from './adapter.js';
export { QueryCursor } from './cursor.js';
export { FsBackend } from './fs-backend.js';
export { MongoBackend } from './mongo-backend.js';
export { normalizeDocument, normalizeIdentity } from './identity.js';

export function createFsBackend(config: StorageConfig, logger: FastifyBaseLogger): FsBackend {
  return new FsBackend({
    dataDir: config.file.dataDir,
    logger,
    textFields: config.text.fields,
    textWeights: config.text.weights,
    unknownStages: config.aggregation.unknownStages,
  });
}

export function createMongoBackend(
  config: StorageConfig,
  logger: FastifyBaseLogger
): MongoBackend {
  return new MongoBackend({
    client: createMongoClient(config.mongo, logger),
    database: config.mongo.database,
    logger,
    probeTimeoutMs: config.mongo.probeTimeoutMs,
    textFields: config.text.fields,
    textWeights: config.text.weights,
    indexes: config.mongo.indexes,
  });
}

async function openAdapter(
  backend: StorageBackend,
  config: StorageConfig,
  logger: FastifyBaseLogger
): Promise<StorageAdapter> {
  const adapter = new StorageAdapter({
    backend,
    logger,
    collections: config.collections,
  });
  await adapter.open();
  return adapter;
}

/**
 * Choose and open the storage backend once for the process lifetime.
 *
 * - `file`: file store, no probe
 * - `mongo`: MongoDB required; an unreachable server fails startup
 * - `auto`: MongoDB when `mongo.url` is set and the probe succeeds,
 *   otherwise the file store (the fallback is logged)
 */
export async function openStorage(
  config: StorageConfig,
  logger: FastifyBaseLogger
): Promise<StorageAdapter> {
  if (config.backend === 'file' || (config.backend === 'auto' && config.mongo.url === '')) {
    return await openAdapter(createFsBackend(config, logger), config, logger);
  }

  let mongo: MongoBackend | undefined;
  try {
    mongo = createMongoBackend(config, logger);
    return await openAdapter(mongo, config, logger);
  } catch (error) {
    try {
      await mongo?.close();
    } catch (closeError) {
      logger.debug(
        { err: closeError instanceof Error ? closeError.message : 'Unknown error' },
        'MongoDB client close after failed probe'
      );
    }

    if (config.backend === 'mongo' || !(error instanceof StorageBackendUnavailableError)) {
      throw error;
    }

    logger.warn(
      { err: error.message, dataDir: config.file.dataDir },
      'MongoDB unavailable, falling back to file storage'
    );
    return await openAdapter(createFsBackend(config, logger), config, logger);
  }
}

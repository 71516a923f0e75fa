// MongoDB client factory and startup connectivity probe

import type { FastifyBaseLogger } from 'fastify';
import { MongoClient } from 'mongodb';

import type { StorageConfig } from './config.js';
import { StorageBackendUnavailableError } from './errors.js';

/**
 * Create a MongoDB client with a small fixed pool and no driver retries.
 *
 * The client is not connected yet; `probeMongo` connects it. Server
 * selection is bounded by the probe timeout so an unreachable host fails
 * fast instead of hanging on the driver's 30s default. A malformed url
 * throws StorageBackendUnavailableError.
 *
 * @param config - MongoDB connection config (url, pool size, probe timeout)
 * @param logger - Fastify logger for connection events
 */
export function createMongoClient(
  config: StorageConfig['mongo'],
  logger: FastifyBaseLogger
): MongoClient {
  // The connection string is parsed here, before any network activity
  let client: MongoClient;
  try {
    client = new MongoClient(config.url, {
      maxPoolSize: config.maxPoolSize,
      minPoolSize: 0,
      serverSelectionTimeoutMS: config.probeTimeoutMs,
      connectTimeoutMS: config.probeTimeoutMs,
      retryWrites: false,
      retryReads: false,
    });
  } catch (error) {
    throw new StorageBackendUnavailableError(
      `invalid connection string: ${error instanceof Error ? error.message : 'Unknown error'}`
    );
  }

  client.on('open', () => {
    logger.info({ database: config.database }, 'MongoDB connected');
  });

  client.on('topologyClosed', () => {
    logger.info('MongoDB connection closed');
  });

  return client;
}

/**
 * Connect and ping within `timeoutMs`. Any failure, including the timeout,
 * surfaces as StorageBackendUnavailableError.
 */
export async function probeMongo(client: MongoClient, timeoutMs: number): Promise<void> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      reject(new StorageBackendUnavailableError(`no ping response within ${timeoutMs}ms`));
    }, timeoutMs);
  });

  const ping = async (): Promise<void> => {
    await client.connect();
    await client.db('admin').command({ ping: 1 });
  };

  try {
    await Promise.race([ping(), timeout]);
  } catch (error) {
    if (error instanceof StorageBackendUnavailableError) {
      throw error;
    }
    throw new StorageBackendUnavailableError(
      error instanceof Error ? error.message : 'Unknown error'
    );
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Gracefully close a MongoDB client and its pool.
 */
export async function disconnectMongo(client: MongoClient): Promise<void> {
  await client.close();
}

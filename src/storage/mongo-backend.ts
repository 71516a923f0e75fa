// MongoDB storage backend.
//
// Thin adapter over the official driver: the portable filter grammar is
// checked and translated, cursor chains are forwarded as native
// sort/skip/limit, and driver result objects are reshaped into the common
// result types.

import type { FastifyBaseLogger } from 'fastify';
import { ObjectId } from 'mongodb';
import type {
  Collection,
  Db,
  Filter as MongoFilter,
  Document as MongoDocument,
  MongoClient,
  Sort,
} from 'mongodb';

import type { IndexConfig } from './config.js';
import { QueryCursor } from './cursor.js';
import { StorageNotConnectedError, StorageUnsupportedQueryError } from './errors.js';
import {
  DEFAULT_TEXT_FIELDS,
  DEFAULT_TEXT_WEIGHTS,
  assertSupportedFilter,
  rankTextMatches,
} from './filter-matcher.js';
import { NATIVE_ID_FIELD, externalIdOf, toExternalId } from './identity.js';
import { disconnectMongo, probeMongo } from './mongo-client.js';
import { resolveSetFields } from './update.js';
import type {
  CursorState,
  DeleteResult,
  Document,
  Filter,
  FindOptions,
  InsertResult,
  PipelineStage,
  ReturnDocument,
  StorageBackend,
  TextOperator,
  Update,
  UpdateResult,
} from './types.js';

const COLLECTION_NAME = /^[A-Za-z0-9_-]+$/;
const OBJECT_ID_HEX = /^[a-f0-9]{24}$/i;

export interface MongoBackendOptions {
  client: MongoClient;
  database: string;
  logger: FastifyBaseLogger;
  probeTimeoutMs: number;
  textFields?: readonly string[];
  textWeights?: Readonly<Record<string, number>>;
  indexes?: Readonly<Record<string, readonly IndexConfig[]>>;
}

export function escapeRegex(term: string): string {
  return term.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function textCondition(fields: readonly string[], text: TextOperator): MongoDocument {
  const pattern = escapeRegex(text.$search);
  return { $or: fields.map((field) => ({ [field]: { $regex: pattern, $options: 'i' } })) };
}

function cursorStages(state: CursorState): MongoDocument[] {
  const stages: MongoDocument[] = [];
  if (state.sort) stages.push({ $sort: { [state.sort[0]]: state.sort[1] } });
  if (state.skip > 0) stages.push({ $skip: state.skip });
  if (state.limit > 0) stages.push({ $limit: state.limit });
  return stages;
}

export class MongoBackend implements StorageBackend {
  readonly kind = 'mongo' as const;
  private readonly client: MongoClient;
  private readonly database: string;
  private readonly logger: FastifyBaseLogger;
  private readonly probeTimeoutMs: number;
  private readonly textFields: readonly string[];
  private readonly textWeights: Readonly<Record<string, number>>;
  private readonly indexes: Readonly<Record<string, readonly IndexConfig[]>>;
  private db: Db | null = null;

  constructor(options: MongoBackendOptions) {
    this.client = options.client;
    this.database = options.database;
    this.logger = options.logger;
    this.probeTimeoutMs = options.probeTimeoutMs;
    this.textFields = options.textFields ?? DEFAULT_TEXT_FIELDS;
    this.textWeights = options.textWeights ?? DEFAULT_TEXT_WEIGHTS;
    this.indexes = options.indexes ?? {};
  }

  /**
   * Connect and ping within the probe timeout, then create configured
   * indexes. Throws StorageBackendUnavailableError when unreachable.
   */
  async open(): Promise<void> {
    await probeMongo(this.client, this.probeTimeoutMs);
    this.db = this.client.db(this.database);
    await this.ensureIndexes();
  }

  async close(): Promise<void> {
    this.db = null;
    await disconnectMongo(this.client);
  }

  async healthy(): Promise<boolean> {
    if (!this.db) return false;
    try {
      await this.db.command({ ping: 1 });
      return true;
    } catch {
      return false;
    }
  }

  // ---- Queries ----

  async findOne(collection: string, filter: Filter): Promise<Document | null> {
    return await this.collection(collection).findOne(this.translateFilter(filter));
  }

  find(collection: string, filter: Filter, options: FindOptions = {}): QueryCursor<Document> {
    const translated = this.translateFilter(filter);
    return new QueryCursor(async (state) => {
      let cursor = this.collection(collection).find(translated);
      if (state.sort) cursor = cursor.sort(this.stableSort(state.sort[0], state.sort[1]));
      if (state.skip > 0) cursor = cursor.skip(state.skip);
      if (state.limit > 0) cursor = cursor.limit(state.limit);
      return await cursor.toArray();
    }, options);
  }

  async countDocuments(collection: string, filter: Filter): Promise<number> {
    return await this.collection(collection).countDocuments(this.translateFilter(filter));
  }

  async distinct(collection: string, field: string, filter: Filter): Promise<unknown[]> {
    const values: unknown[] = await this.collection(collection).distinct(
      field,
      this.translateFilter(filter)
    );
    return values.filter((value) => value !== null && value !== undefined);
  }

  /**
   * $match stages use the portable translation; other stages are forwarded
   * to the server as-is.
   */
  aggregate(
    collection: string,
    pipeline: readonly PipelineStage[],
    options: FindOptions = {}
  ): QueryCursor<Document> {
    const stages: MongoDocument[] = pipeline.map((stage) =>
      '$match' in stage ? { $match: this.translateFilter(stage.$match) } : { ...stage }
    );
    return new QueryCursor(async (state) => {
      return await this.collection(collection)
        .aggregate([...stages, ...cursorStages(state)])
        .toArray();
    }, options);
  }

  /**
   * Substring match over the weighted fields, ranked client-side with the
   * same scoring as the file backend.
   */
  async textSearch(collection: string, term: string, limit: number): Promise<Document[]> {
    const fields = Object.keys(this.textWeights);
    const docs = await this.collection(collection)
      .find(textCondition(fields, { $search: term }))
      .toArray();
    return rankTextMatches(docs, term, limit, this.textWeights);
  }

  // ---- Mutations ----

  async insertOne(collection: string, doc: Document): Promise<InsertResult> {
    // The driver assigns _id on the object it is given
    const copy: MongoDocument = { ...doc };
    const result = await this.collection(collection).insertOne(copy);
    const nativeId = toExternalId(result.insertedId) ?? String(result.insertedId);
    return { id: externalIdOf(copy, nativeId) };
  }

  async updateOne(collection: string, filter: Filter, update: Update): Promise<UpdateResult> {
    const result = await this.collection(collection).updateOne(this.translateFilter(filter), {
      $set: resolveSetFields(update),
    });
    return { matchedCount: result.matchedCount, modifiedCount: result.modifiedCount };
  }

  async findOneAndUpdate(
    collection: string,
    filter: Filter,
    update: Update,
    returnDocument: ReturnDocument
  ): Promise<Document | null> {
    return await this.collection(collection).findOneAndUpdate(
      this.translateFilter(filter),
      { $set: resolveSetFields(update) },
      { returnDocument }
    );
  }

  async deleteOne(collection: string, filter: Filter): Promise<DeleteResult> {
    const result = await this.collection(collection).deleteOne(this.translateFilter(filter));
    return { deletedCount: result.deletedCount };
  }

  async deleteMany(collection: string, filter: Filter): Promise<DeleteResult> {
    const result = await this.collection(collection).deleteMany(this.translateFilter(filter));
    return { deletedCount: result.deletedCount };
  }

  // ---- Translation ----

  /**
   * Portable grammar -> driver filter. `$text` becomes case-insensitive
   * substring regexes over the text fields; a string `_id` that looks like
   * an ObjectId also matches its ObjectId form.
   */
  translateFilter(filter: Filter): MongoFilter<MongoDocument> {
    assertSupportedFilter(filter);
    const translated: MongoDocument = {};
    const and: MongoDocument[] = [];

    for (const [key, value] of Object.entries(filter)) {
      if (key === '$text') {
        if (filter.$text) and.push(textCondition(this.textFields, filter.$text));
        continue;
      }
      if (key === NATIVE_ID_FIELD && typeof value === 'string' && OBJECT_ID_HEX.test(value)) {
        translated[key] = { $in: [value, new ObjectId(value)] };
        continue;
      }
      translated[key] = value;
    }

    if (and.length > 0) translated.$and = and;
    return translated;
  }

  // ---- Private helpers ----

  private collection(name: string): Collection<MongoDocument> {
    if (!this.db) {
      throw new StorageNotConnectedError();
    }
    if (!COLLECTION_NAME.test(name)) {
      throw new StorageUnsupportedQueryError(`invalid collection name ${JSON.stringify(name)}`);
    }
    return this.db.collection(name);
  }

  // Ties keep natural (_id) order, matching the file backend's stable sort
  private stableSort(field: string, direction: 1 | -1): Sort {
    return field === NATIVE_ID_FIELD ? { [field]: direction } : { [field]: direction, _id: 1 };
  }

  private async ensureIndexes(): Promise<void> {
    for (const [collection, specs] of Object.entries(this.indexes)) {
      for (const spec of specs) {
        try {
          await this.collection(collection).createIndex(spec.keys, { unique: spec.unique });
        } catch (error) {
          this.logger.warn(
            { collection, keys: spec.keys, err: error instanceof Error ? error.message : 'Unknown error' },
            'Failed to create index'
          );
        }
      }
    }
    this.logger.debug({ database: this.database }, 'MongoDB indexes ensured');
  }
}

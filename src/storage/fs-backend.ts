// Flat-file storage backend.
//
// Each collection is one pretty-printed JSON array at <dataDir>/<name>.json;
// array order is insertion order. Every operation reads the whole file and
// every mutation rewrites it. No locking: two uncoordinated writers lose
// updates, the later snapshot wins.

import { randomUUID } from 'node:crypto';
import { accessSync, constants, existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

import type { FastifyBaseLogger } from 'fastify';

import { runPipeline } from './aggregation.js';
import type { UnknownStagePolicy } from './aggregation.js';
import { QueryCursor, applyCursorState } from './cursor.js';
import { StorageIoFailureError, StorageUnsupportedQueryError } from './errors.js';
import {
  DEFAULT_TEXT_FIELDS,
  DEFAULT_TEXT_WEIGHTS,
  assertSupportedFilter,
  isPlainObject,
  matchesFilter,
  rankTextMatches,
  valuesEqual,
} from './filter-matcher.js';
import { NATIVE_ID_FIELD, externalIdOf } from './identity.js';
import { resolveSetFields } from './update.js';
import type {
  DeleteResult,
  Document,
  Filter,
  FindOptions,
  InsertResult,
  PipelineStage,
  ReturnDocument,
  StorageBackend,
  Update,
  UpdateResult,
} from './types.js';

const COLLECTION_NAME = /^[A-Za-z0-9_-]+$/;

export interface FsBackendOptions {
  dataDir: string;
  logger: FastifyBaseLogger;
  textFields?: readonly string[];
  textWeights?: Readonly<Record<string, number>>;
  unknownStages?: UnknownStagePolicy;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

function storedReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

/**
 * Bring a value into its persisted form (Date -> ISO string, bigint -> string)
 * so in-memory comparisons agree with what a later read will see.
 */
function toStored(value: Document): Document {
  const json = JSON.stringify(value, storedReplacer);
  const parsed: unknown = JSON.parse(json);
  if (!isPlainObject(parsed)) {
    throw new StorageUnsupportedQueryError('document must be a plain object');
  }
  return parsed;
}

function toStoredValue(value: unknown): unknown {
  if (value === undefined) return undefined;
  const json = JSON.stringify(value, storedReplacer);
  if (json === undefined) return undefined;
  const parsed: unknown = JSON.parse(json);
  return parsed;
}

/**
 * Filter literals get the same persisted form as documents, so a Date in a
 * filter matches the ISO string it was written as.
 */
function toStoredFilter(filter: unknown): Filter {
  assertSupportedFilter(filter);
  const stored: Filter = {};
  for (const [key, value] of Object.entries(filter)) {
    stored[key] = key === '$text' ? value : toStoredValue(value);
  }
  return stored;
}

function toStoredStage(stage: PipelineStage): PipelineStage {
  // Malformed stages are left for runPipeline to reject
  if (Object.keys(stage).length !== 1 || !('$match' in stage)) return stage;
  return { $match: toStoredFilter(stage.$match) };
}

export class FsBackend implements StorageBackend {
  readonly kind = 'file' as const;
  private readonly dataDir: string;
  private readonly logger: FastifyBaseLogger;
  private readonly textFields: readonly string[];
  private readonly textWeights: Readonly<Record<string, number>>;
  private readonly unknownStages: UnknownStagePolicy;

  constructor(options: FsBackendOptions) {
    this.dataDir = options.dataDir;
    this.logger = options.logger;
    this.textFields = options.textFields ?? DEFAULT_TEXT_FIELDS;
    this.textWeights = options.textWeights ?? DEFAULT_TEXT_WEIGHTS;
    this.unknownStages = options.unknownStages ?? 'passthrough';
  }

  async open(): Promise<void> {
    this.ensureDir();
    this.logger.info({ dataDir: this.dataDir }, 'File storage opened');
  }

  async close(): Promise<void> {
    // Nothing is held open between calls
  }

  async healthy(): Promise<boolean> {
    try {
      accessSync(this.dataDir, constants.R_OK | constants.W_OK);
      return true;
    } catch {
      return false;
    }
  }

  // ---- Whole-snapshot primitives ----

  /**
   * Read the full collection. A missing file is an empty collection.
   */
  readCollection(collection: string): Document[] {
    const path = this.collectionPath(collection);
    if (!existsSync(path)) {
      return [];
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (error) {
      throw new StorageIoFailureError(`cannot read ${collection}: ${errorMessage(error)}`);
    }

    if (!Array.isArray(parsed) || !parsed.every(isPlainObject)) {
      throw new StorageIoFailureError(`${collection} is not an array of documents`);
    }
    return parsed;
  }

  /**
   * Replace the full collection with `docs`.
   */
  writeCollection(collection: string, docs: readonly Document[]): void {
    const path = this.collectionPath(collection);
    this.ensureDir();
    try {
      writeFileSync(path, `${JSON.stringify(docs, storedReplacer, 2)}\n`, 'utf-8');
    } catch (error) {
      throw new StorageIoFailureError(`cannot write ${collection}: ${errorMessage(error)}`);
    }
  }

  // ---- Queries ----

  async findOne(collection: string, filter: Filter): Promise<Document | null> {
    const stored = toStoredFilter(filter);
    return this.readCollection(collection).find((doc) => this.matches(doc, stored)) ?? null;
  }

  find(collection: string, filter: Filter, options: FindOptions = {}): QueryCursor<Document> {
    const stored = toStoredFilter(filter);
    return new QueryCursor(
      async (state) => applyCursorState(this.select(collection, stored), state),
      options
    );
  }

  async countDocuments(collection: string, filter: Filter): Promise<number> {
    return this.select(collection, toStoredFilter(filter)).length;
  }

  async distinct(collection: string, field: string, filter: Filter): Promise<unknown[]> {
    const stored = toStoredFilter(filter);
    const seen = new Map<string, unknown>();

    for (const doc of this.select(collection, stored)) {
      const raw = doc[field];
      const values: unknown[] = Array.isArray(raw) ? raw : [raw];
      for (const value of values) {
        if (value === null || value === undefined) continue;
        const key = JSON.stringify(value);
        if (!seen.has(key)) seen.set(key, value);
      }
    }

    return [...seen.values()];
  }

  aggregate(
    collection: string,
    pipeline: readonly PipelineStage[],
    options: FindOptions = {}
  ): QueryCursor<Document> {
    return new QueryCursor(async (state) => {
      const rows = runPipeline(this.readCollection(collection), pipeline.map(toStoredStage), {
        textFields: this.textFields,
        unknownStages: this.unknownStages,
        logger: this.logger,
      });
      return applyCursorState(rows, state);
    }, options);
  }

  async textSearch(collection: string, term: string, limit: number): Promise<Document[]> {
    return rankTextMatches(this.readCollection(collection), term, limit, this.textWeights);
  }

  // ---- Mutations ----

  async insertOne(collection: string, doc: Document): Promise<InsertResult> {
    const stored = toStored(doc);
    const native = stored[NATIVE_ID_FIELD];
    const nativeId = native === undefined || native === null ? randomUUID() : String(native);
    stored[NATIVE_ID_FIELD] = native ?? nativeId;

    const docs = this.readCollection(collection);
    docs.push(stored);
    this.writeCollection(collection, docs);

    return { id: externalIdOf(stored, nativeId) };
  }

  async updateOne(collection: string, filter: Filter, update: Update): Promise<UpdateResult> {
    const outcome = this.applyUpdate(collection, filter, update);
    if (!outcome) {
      return { matchedCount: 0, modifiedCount: 0 };
    }
    return { matchedCount: 1, modifiedCount: outcome.modified ? 1 : 0 };
  }

  async findOneAndUpdate(
    collection: string,
    filter: Filter,
    update: Update,
    returnDocument: ReturnDocument
  ): Promise<Document | null> {
    const outcome = this.applyUpdate(collection, filter, update);
    if (!outcome) return null;
    return returnDocument === 'after' ? outcome.after : outcome.before;
  }

  async deleteOne(collection: string, filter: Filter): Promise<DeleteResult> {
    const stored = toStoredFilter(filter);
    const docs = this.readCollection(collection);
    const index = docs.findIndex((doc) => this.matches(doc, stored));
    if (index === -1) {
      return { deletedCount: 0 };
    }

    docs.splice(index, 1);
    this.writeCollection(collection, docs);
    return { deletedCount: 1 };
  }

  async deleteMany(collection: string, filter: Filter): Promise<DeleteResult> {
    const stored = toStoredFilter(filter);
    const docs = this.readCollection(collection);
    const kept = docs.filter((doc) => !this.matches(doc, stored));
    const deletedCount = docs.length - kept.length;

    if (deletedCount > 0) {
      this.writeCollection(collection, kept);
    }
    return { deletedCount };
  }

  // ---- Private helpers ----

  private matches(doc: Document, filter: Filter): boolean {
    return matchesFilter(doc, filter, this.textFields);
  }

  private select(collection: string, filter: Filter): Document[] {
    return this.readCollection(collection).filter((doc) => this.matches(doc, filter));
  }

  /**
   * Shallow field-level set on the first match. Each set field replaces the
   * stored value wholesale, sequences included.
   */
  private applyUpdate(
    collection: string,
    filter: Filter,
    update: Update
  ): { before: Document; after: Document; modified: boolean } | null {
    const stored = toStoredFilter(filter);
    const fields = toStored(resolveSetFields(update));

    const docs = this.readCollection(collection);
    const index = docs.findIndex((doc) => this.matches(doc, stored));
    if (index === -1) return null;

    const before = docs[index];
    const modified = Object.entries(fields).some(
      ([key, value]) => !Object.hasOwn(before, key) || !valuesEqual(before[key], value)
    );
    const after = { ...before, ...fields };

    if (modified) {
      docs[index] = after;
      this.writeCollection(collection, docs);
    }
    return { before, after, modified };
  }

  private collectionPath(collection: string): string {
    if (!COLLECTION_NAME.test(collection)) {
      throw new StorageUnsupportedQueryError(`invalid collection name ${JSON.stringify(collection)}`);
    }
    return join(this.dataDir, `${collection}.json`);
  }

  private ensureDir(): void {
    try {
      mkdirSync(this.dataDir, { recursive: true });
    } catch (error) {
      throw new StorageIoFailureError(`cannot create ${this.dataDir}: ${errorMessage(error)}`);
    }
  }
}

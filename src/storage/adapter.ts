// StorageAdapter: the only storage surface callers see.

import type { FastifyBaseLogger } from 'fastify';

import { QueryCursor, stateToOptions } from './cursor.js';
import { StorageNotConnectedError } from './errors.js';
import { assertSupportedFilter } from './filter-matcher.js';
import { identityFilters, normalizeDocument, normalizeIdentity } from './identity.js';
import type {
  BackendKind,
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

export interface CollectionOptions {
  /** Nested sequences that read back as [] when absent or null */
  sequenceFields: readonly string[];
}

export interface StorageAdapterOptions {
  backend: StorageBackend;
  logger: FastifyBaseLogger;
  collections?: Readonly<Record<string, CollectionOptions>>;
}

/**
 * Uniform document-collection interface over whichever backend was chosen
 * at startup.
 *
 * - Every call fails with StorageNotConnectedError outside open()/close()
 * - Returned documents carry one external `id` and no native `_id`
 * - A filter on `id` resolves against the slug first, then the native id
 * - Lookup misses come back as null / empty, never as errors
 */
export class StorageAdapter {
  private readonly backend: StorageBackend;
  private readonly logger: FastifyBaseLogger;
  private readonly collections: Readonly<Record<string, CollectionOptions>>;
  private connected = false;

  constructor(options: StorageAdapterOptions) {
    this.backend = options.backend;
    this.logger = options.logger;
    this.collections = options.collections ?? {};
  }

  get backendKind(): BackendKind {
    return this.backend.kind;
  }

  get isConnected(): boolean {
    return this.connected;
  }

  async open(): Promise<void> {
    if (this.connected) return;
    await this.backend.open();
    this.connected = true;
    this.logger.info({ backend: this.backend.kind }, 'Storage adapter opened');
  }

  async close(): Promise<void> {
    if (!this.connected) return;
    this.connected = false;
    await this.backend.close();
    this.logger.info({ backend: this.backend.kind }, 'Storage adapter closed');
  }

  async healthy(): Promise<boolean> {
    return this.connected && (await this.backend.healthy());
  }

  // ---- Queries ----

  async findOne(collection: string, filter: Filter): Promise<Document | null> {
    this.ensureConnected();
    for (const candidate of identityFilters(filter)) {
      const doc = await this.backend.findOne(collection, candidate);
      if (doc) return this.normalize(collection, doc);
    }
    return null;
  }

  find(collection: string, filter: Filter = {}, options: FindOptions = {}): QueryCursor<Document> {
    this.ensureConnected();
    assertSupportedFilter(filter);

    return new QueryCursor(async (state) => {
      this.ensureConnected();
      const resolved = await this.resolveFilter(collection, filter);
      const rows = await this.backend.find(collection, resolved, stateToOptions(state)).toList();
      return rows.map((doc) => this.normalize(collection, doc));
    }, options);
  }

  async countDocuments(collection: string, filter: Filter = {}): Promise<number> {
    this.ensureConnected();
    return await this.backend.countDocuments(
      collection,
      await this.resolveFilter(collection, filter)
    );
  }

  /**
   * Distinct non-null values of `field`, in first-seen order.
   */
  async distinct(collection: string, field: string, filter: Filter = {}): Promise<unknown[]> {
    this.ensureConnected();
    return await this.backend.distinct(
      collection,
      field,
      await this.resolveFilter(collection, filter)
    );
  }

  /**
   * Rows keep only identity normalization: group rows expose their key as `id`.
   */
  aggregate(collection: string, pipeline: readonly PipelineStage[]): QueryCursor<Document> {
    this.ensureConnected();

    return new QueryCursor(async (state) => {
      this.ensureConnected();
      return await this.backend.aggregate(collection, pipeline, stateToOptions(state)).toList();
    }).map(normalizeIdentity);
  }

  async textSearch(collection: string, term: string, limit = 10): Promise<Document[]> {
    this.ensureConnected();
    const docs = await this.backend.textSearch(collection, term, limit);
    return docs.map((doc) => this.normalize(collection, doc));
  }

  // ---- Mutations ----

  async insertOne(collection: string, doc: Document): Promise<InsertResult> {
    this.ensureConnected();
    return await this.backend.insertOne(collection, doc);
  }

  async updateOne(collection: string, filter: Filter, update: Update): Promise<UpdateResult> {
    this.ensureConnected();
    return await this.backend.updateOne(
      collection,
      await this.resolveFilter(collection, filter),
      update
    );
  }

  async findOneAndUpdate(
    collection: string,
    filter: Filter,
    update: Update,
    options: { returnDocument?: ReturnDocument } = {}
  ): Promise<Document | null> {
    this.ensureConnected();
    const doc = await this.backend.findOneAndUpdate(
      collection,
      await this.resolveFilter(collection, filter),
      update,
      options.returnDocument ?? 'after'
    );
    return doc ? this.normalize(collection, doc) : null;
  }

  async deleteOne(collection: string, filter: Filter): Promise<DeleteResult> {
    this.ensureConnected();
    return await this.backend.deleteOne(collection, await this.resolveFilter(collection, filter));
  }

  /**
   * An empty filter deletes the whole collection.
   */
  async deleteMany(collection: string, filter: Filter = {}): Promise<DeleteResult> {
    this.ensureConnected();
    return await this.backend.deleteMany(collection, await this.resolveFilter(collection, filter));
  }

  // ---- Private helpers ----

  private ensureConnected(): void {
    if (!this.connected) {
      throw new StorageNotConnectedError();
    }
  }

  private normalize(collection: string, doc: Document): Document {
    return normalizeDocument(doc, this.collections[collection]?.sequenceFields);
  }

  /**
   * Pick the slug form of an `id` filter when any document matches it,
   * otherwise the native-id form.
   */
  private async resolveFilter(collection: string, filter: Filter): Promise<Filter> {
    const [slugFilter, nativeFilter] = identityFilters(filter);
    if (nativeFilter === undefined) return slugFilter;

    const slugMatches = await this.backend.countDocuments(collection, slugFilter);
    return slugMatches > 0 ? slugFilter : nativeFilter;
  }
}

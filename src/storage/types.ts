// Storage contract shared by every backend.
//
// Callers only ever see these shapes; driver-native cursors, results and
// identifiers stay inside the backend that produced them.

import type { QueryCursor } from './cursor.js';

/** A stored record. Values are JSON-compatible (Date is accepted on write). */
export type Document = Record<string, unknown>;

/** Free-text operator: case-insensitive substring over the text fields. */
export interface TextOperator {
  $search: string;
}

/**
 * Equality map plus the reserved `$text` operator. Any other operator is
 * rejected by `assertSupportedFilter`.
 */
export type Filter = Record<string, unknown> & { $text?: TextOperator };

export type SortDirection = 1 | -1;

export type SortSpec = readonly [field: string, direction: SortDirection];

export interface CursorState {
  skip: number;
  /** 0 means unbounded */
  limit: number;
  sort: SortSpec | null;
}

export interface FindOptions {
  skip?: number;
  limit?: number;
  sort?: SortSpec;
}

/** Field-level set, either wrapped in `$set` or given as a plain map. */
export type Update = Document | { $set: Document };

export interface MatchStage {
  $match: Filter;
}

export interface CountAccumulator {
  $sum: 1;
}

export interface GroupStage {
  /** `null` groups everything; `'$field'` groups by that field's value */
  $group: { _id: string | null } & Record<string, CountAccumulator | string | null>;
}

export interface SortStage {
  $sort: Record<string, SortDirection>;
}

export type PipelineStage = MatchStage | GroupStage | SortStage;

export interface InsertResult {
  id: string;
}

export interface UpdateResult {
  matchedCount: number;
  modifiedCount: number;
}

export interface DeleteResult {
  deletedCount: number;
}

export type ReturnDocument = 'before' | 'after';

export type BackendKind = 'mongo' | 'file';

/**
 * One of the two interchangeable storage implementations.
 *
 * Backends return raw documents (native `_id` included); the adapter owns
 * identity normalization and the NotConnected guard.
 */
export interface StorageBackend {
  readonly kind: BackendKind;

  open(): Promise<void>;
  close(): Promise<void>;
  healthy(): Promise<boolean>;

  findOne(collection: string, filter: Filter): Promise<Document | null>;
  find(collection: string, filter: Filter, options?: FindOptions): QueryCursor<Document>;
  insertOne(collection: string, doc: Document): Promise<InsertResult>;
  updateOne(collection: string, filter: Filter, update: Update): Promise<UpdateResult>;
  findOneAndUpdate(
    collection: string,
    filter: Filter,
    update: Update,
    returnDocument: ReturnDocument
  ): Promise<Document | null>;
  deleteOne(collection: string, filter: Filter): Promise<DeleteResult>;
  deleteMany(collection: string, filter: Filter): Promise<DeleteResult>;
  countDocuments(collection: string, filter: Filter): Promise<number>;
  distinct(collection: string, field: string, filter: Filter): Promise<unknown[]>;
  aggregate(
    collection: string,
    pipeline: readonly PipelineStage[],
    options?: FindOptions
  ): QueryCursor<Document>;
  textSearch(collection: string, term: string, limit: number): Promise<Document[]>;
}

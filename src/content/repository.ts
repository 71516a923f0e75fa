// Content repository: one collection of slugged content documents with
// embedded sub-record lists, on top of the storage adapter.

import { isPlainObject } from '../storage/filter-matcher.js';
import { normalizeDocument } from '../storage/identity.js';
import type { StorageAdapter } from '../storage/index.js';
import type { Document, Filter, SortSpec } from '../storage/index.js';

export interface ContentListQuery {
  skip?: number;
  limit?: number;
  published?: boolean;
  region?: string;
  search?: string;
  /** Field name; a leading "-" sorts descending */
  sort?: string;
}

export interface ContentRepositoryOptions {
  storage: StorageAdapter;
  collection: string;
  /** Embedded lists that always exist on stored documents */
  sequenceFields?: readonly string[];
  /** Keys dropped from embedded sub-records (their own id and parent references) */
  childKeys?: readonly string[];
}

const DEFAULT_LIST_LIMIT = 100;
const DEFAULT_SEARCH_LIMIT = 10;

/**
 * Parse "name" / "-name" into a sort spec.
 */
export function parseSort(sort: string): SortSpec {
  return sort.startsWith('-') ? [sort.slice(1), -1] : [sort, 1];
}

function stripKeys(value: unknown, keys: ReadonlySet<string>): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => stripKeys(item, keys));
  }
  if (!isPlainObject(value)) {
    return value;
  }
  const cleaned: Document = {};
  for (const [key, inner] of Object.entries(value)) {
    if (!keys.has(key)) cleaned[key] = stripKeys(inner, keys);
  }
  return cleaned;
}

export class ContentRepository {
  private readonly storage: StorageAdapter;
  private readonly collection: string;
  private readonly sequenceFields: readonly string[];
  private readonly childKeys: ReadonlySet<string>;

  constructor(options: ContentRepositoryOptions) {
    this.storage = options.storage;
    this.collection = options.collection;
    this.sequenceFields = options.sequenceFields ?? [];
    this.childKeys = new Set(['id', ...(options.childKeys ?? [])]);
  }

  /** Slug first, then native id */
  async getById(id: string): Promise<Document | null> {
    return await this.storage.findOne(this.collection, { id });
  }

  async list(query: ContentListQuery = {}): Promise<Document[]> {
    const filter: Filter = {};
    if (query.published !== undefined) filter.published = query.published;
    if (query.region) filter.region = query.region;
    if (query.search) filter.$text = { $search: query.search };

    return await this.storage
      .find(this.collection, filter, {
        skip: query.skip ?? 0,
        limit: query.limit ?? DEFAULT_LIST_LIMIT,
        ...(query.sort ? { sort: parseSort(query.sort) } : {}),
      })
      .toList();
  }

  async create(data: Document): Promise<Document> {
    const doc: Document = { published: false, featured: false, ...data };
    for (const field of this.sequenceFields) {
      doc[field] = data[field] ?? [];
    }

    const { id } = await this.storage.insertOne(this.collection, doc);
    return normalizeDocument({ ...doc, id }, this.sequenceFields);
  }

  /**
   * Set every non-null field of `data`. An update with nothing to set
   * returns the current document.
   */
  async update(id: string, data: Document): Promise<Document | null> {
    const fields: Document = {};
    for (const [key, value] of Object.entries(data)) {
      if (value !== null && value !== undefined) fields[key] = value;
    }

    if (Object.keys(fields).length === 0) {
      return await this.getById(id);
    }
    return await this.storage.findOneAndUpdate(
      this.collection,
      { id },
      { $set: fields },
      { returnDocument: 'after' }
    );
  }

  async remove(id: string): Promise<boolean> {
    const { deletedCount } = await this.storage.deleteOne(this.collection, { id });
    return deletedCount > 0;
  }

  async search(term: string, limit = DEFAULT_SEARCH_LIMIT): Promise<Document[]> {
    return await this.storage.textSearch(this.collection, term, limit);
  }

  /**
   * Replace an embedded list wholesale. Sub-record ids and parent references
   * are dropped at every nesting level before the write.
   */
  async replaceEmbedded(id: string, field: string, items: readonly Document[]): Promise<boolean> {
    const cleaned = items.map((item) => stripKeys(item, this.childKeys));
    const { matchedCount } = await this.storage.updateOne(
      this.collection,
      { id },
      { $set: { [field]: cleaned } }
    );
    return matchedCount > 0;
  }
}

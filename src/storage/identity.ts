// Identity normalization: one external `id` per document, no native `_id`.

import { ObjectId } from 'mongodb';

import type { Document, Filter } from './types.js';

export const ID_FIELD = 'id';
export const NATIVE_ID_FIELD = '_id';

function hasExplicitId(value: unknown): boolean {
  return value !== undefined && value !== null && value !== '';
}

/**
 * External form of a backend-native identifier. `null` stays `null` so that
 * group-everything aggregation rows keep their null key.
 */
export function toExternalId(native: unknown): string | null {
  if (native === null || native === undefined) return null;
  if (native instanceof ObjectId) return native.toHexString();
  if (typeof native === 'string') return native;
  return String(native);
}

/**
 * Prefer an explicit slug/generated `id` over the native `_id`, and drop
 * `_id` from the output. Idempotent; returns a new object.
 */
export function normalizeIdentity(doc: Document): Document {
  const { [NATIVE_ID_FIELD]: native, ...rest } = doc;

  if (hasExplicitId(rest[ID_FIELD]) || !Object.hasOwn(doc, NATIVE_ID_FIELD)) {
    return rest;
  }
  return { ...rest, [ID_FIELD]: toExternalId(native) };
}

/**
 * Identity normalization plus `[]` for every expected sequence field that is
 * absent or null.
 */
export function normalizeDocument(doc: Document, sequenceFields: readonly string[] = []): Document {
  const normalized = normalizeIdentity(doc);
  for (const field of sequenceFields) {
    if (normalized[field] === undefined || normalized[field] === null) {
      normalized[field] = [];
    }
  }
  return normalized;
}

/**
 * Candidate filters for a lookup by external id, in resolution order:
 * the slug field first, then the native identifier.
 */
export function identityFilters(filter: Filter): Filter[] {
  if (!Object.hasOwn(filter, ID_FIELD)) return [filter];
  const { [ID_FIELD]: value, ...rest } = filter;
  return [filter, { ...rest, [NATIVE_ID_FIELD]: value }];
}

/**
 * External id reported for a freshly inserted document.
 */
export function externalIdOf(doc: Document, nativeId: string): string {
  const explicit = doc[ID_FIELD];
  return hasExplicitId(explicit) ? String(explicit) : nativeId;
}

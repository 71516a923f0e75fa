// Equality-map filter grammar and its in-memory evaluation.
//
// Grammar: top-level keys are AND-ed; a plain key matches by presence plus
// deep value equality; `$text: { $search }` matches a case-insensitive
// substring of one of the text fields. Nothing else is accepted.

import { isDeepStrictEqual } from 'node:util';

import { StorageUnsupportedQueryError } from './errors.js';
import type { Document, Filter, TextOperator } from './types.js';

export const DEFAULT_TEXT_FIELDS: readonly string[] = ['name', 'summary'];

export const DEFAULT_TEXT_WEIGHTS: Readonly<Record<string, number>> = {
  name: 10,
  summary: 5,
  region: 3,
};

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function isTextOperator(value: unknown): value is TextOperator {
  return isPlainObject(value) && typeof value.$search === 'string';
}

/**
 * Reject anything outside the grammar with StorageUnsupportedQueryError.
 * Called by both backends before a filter is evaluated or forwarded.
 */
export function assertSupportedFilter(filter: unknown): asserts filter is Filter {
  if (!isPlainObject(filter)) {
    throw new StorageUnsupportedQueryError('filter must be a plain object');
  }

  for (const [key, value] of Object.entries(filter)) {
    if (key === '$text') {
      if (!isTextOperator(value)) {
        throw new StorageUnsupportedQueryError('$text requires { $search: string }');
      }
      continue;
    }

    if (key.startsWith('$')) {
      throw new StorageUnsupportedQueryError(`operator ${key} is not supported`);
    }

    if (value instanceof RegExp) {
      throw new StorageUnsupportedQueryError(`regular expression on field ${key}`);
    }

    if (isPlainObject(value)) {
      const operator = Object.keys(value).find((k) => k.startsWith('$'));
      if (operator !== undefined) {
        throw new StorageUnsupportedQueryError(`operator ${operator} on field ${key}`);
      }
    }
  }
}

export function valuesEqual(left: unknown, right: unknown): boolean {
  return isDeepStrictEqual(left, right);
}

function fieldContains(doc: Document, field: string, needle: string): boolean {
  if (!Object.hasOwn(doc, field)) return false;
  const value = doc[field];
  if (value === null || value === undefined) return false;
  return String(value).toLowerCase().includes(needle);
}

export function matchesText(
  doc: Document,
  term: string,
  textFields: readonly string[] = DEFAULT_TEXT_FIELDS
): boolean {
  const needle = term.toLowerCase();
  return textFields.some((field) => fieldContains(doc, field, needle));
}

/**
 * Evaluate an already-validated filter against one document.
 */
export function matchesFilter(
  doc: Document,
  filter: Filter,
  textFields: readonly string[] = DEFAULT_TEXT_FIELDS
): boolean {
  for (const [key, expected] of Object.entries(filter)) {
    if (key === '$text') {
      if (!isTextOperator(expected) || !matchesText(doc, expected.$search, textFields)) {
        return false;
      }
      continue;
    }

    if (!Object.hasOwn(doc, key)) return false;
    if (!valuesEqual(doc[key], expected)) return false;
  }
  return true;
}

/**
 * Relevance score: sum of the weights of every field containing the term.
 */
export function scoreTextMatch(
  doc: Document,
  term: string,
  weights: Readonly<Record<string, number>> = DEFAULT_TEXT_WEIGHTS
): number {
  const needle = term.toLowerCase();
  let score = 0;
  for (const [field, weight] of Object.entries(weights)) {
    if (fieldContains(doc, field, needle)) {
      score += weight;
    }
  }
  return score;
}

/**
 * Keep documents with a positive score, best first (ties keep input order),
 * capped at `limit` (0 = all).
 */
export function rankTextMatches(
  docs: readonly Document[],
  term: string,
  limit: number,
  weights: Readonly<Record<string, number>> = DEFAULT_TEXT_WEIGHTS
): Document[] {
  const ranked = docs
    .map((doc) => ({ doc, score: scoreTextMatch(doc, term, weights) }))
    .filter((entry) => entry.score > 0)
    .sort((a, b) => b.score - a.score)
    .map((entry) => entry.doc);

  return limit > 0 ? ranked.slice(0, limit) : ranked;
}

// Update grammar: a shallow field-level set.

import { StorageUnsupportedQueryError } from './errors.js';
import { isPlainObject } from './filter-matcher.js';
import type { Document, Update } from './types.js';

/**
 * Resolve `{ $set: {...} }` or a plain field map to the fields to set. Every
 * other update operator is rejected.
 */
export function resolveSetFields(update: Update): Document {
  if (!isPlainObject(update)) {
    throw new StorageUnsupportedQueryError('update must be a plain object');
  }

  const operators = Object.keys(update).filter((key) => key.startsWith('$'));
  if (operators.length === 0) {
    return update;
  }

  const unsupported = operators.find((key) => key !== '$set');
  if (unsupported !== undefined) {
    throw new StorageUnsupportedQueryError(`update operator ${unsupported} is not supported`);
  }
  if (Object.keys(update).length !== 1) {
    throw new StorageUnsupportedQueryError('$set cannot be mixed with plain fields');
  }

  const fields: unknown = update.$set;
  if (!isPlainObject(fields)) {
    throw new StorageUnsupportedQueryError('$set requires a plain object');
  }
  return fields;
}

// In-memory aggregation pipeline: $match, $group (count only) and $sort.
//
// Each stage consumes the previous stage's output; the input snapshot is
// never modified.

import type { FastifyBaseLogger } from 'fastify';

import { assertSortDirection, sortRows } from './cursor.js';
import { StorageUnsupportedQueryError } from './errors.js';
import {
  DEFAULT_TEXT_FIELDS,
  assertSupportedFilter,
  isPlainObject,
  matchesFilter,
} from './filter-matcher.js';
import type { Document, PipelineStage, SortSpec } from './types.js';

/** What to do with a stage kind the engine does not implement. */
export type UnknownStagePolicy = 'passthrough' | 'reject';

export interface PipelineOptions {
  textFields?: readonly string[];
  unknownStages?: UnknownStagePolicy;
  logger?: FastifyBaseLogger;
}

function isCountAccumulator(value: unknown): boolean {
  return isPlainObject(value) && Object.keys(value).length === 1 && value.$sum === 1;
}

function groupKey(value: unknown): string {
  return JSON.stringify(value ?? null);
}

function execGroup(rows: readonly Document[], spec: unknown): Document[] {
  if (!isPlainObject(spec) || !Object.hasOwn(spec, '_id')) {
    throw new StorageUnsupportedQueryError('$group requires an _id');
  }

  const accumulators: string[] = [];
  for (const [name, accumulator] of Object.entries(spec)) {
    if (name === '_id') continue;
    if (!isCountAccumulator(accumulator)) {
      throw new StorageUnsupportedQueryError(`$group accumulator ${name} must be { $sum: 1 }`);
    }
    accumulators.push(name);
  }

  const withCounts = (id: unknown, count: number): Document => {
    const row: Document = { _id: id };
    for (const name of accumulators) row[name] = count;
    return row;
  };

  const id = spec._id;
  if (id === null) {
    return [withCounts(null, rows.length)];
  }

  if (typeof id !== 'string' || !id.startsWith('$') || id.length < 2) {
    throw new StorageUnsupportedQueryError("$group _id must be null or a '$field' reference");
  }

  const field = id.slice(1);
  const groups = new Map<string, { value: unknown; count: number }>();
  for (const row of rows) {
    const value = row[field] ?? null;
    const key = groupKey(value);
    const group = groups.get(key);
    if (group) {
      group.count += 1;
    } else {
      groups.set(key, { value, count: 1 });
    }
  }

  return [...groups.values()].map((group) => withCounts(group.value, group.count));
}

function execSort(rows: readonly Document[], spec: unknown): Document[] {
  if (!isPlainObject(spec) || Object.keys(spec).length === 0) {
    throw new StorageUnsupportedQueryError('$sort requires at least one field');
  }

  const keys: SortSpec[] = Object.entries(spec).map(([field, direction]) => {
    assertSortDirection(direction);
    return [field, direction];
  });

  // Missing sort fields count as 0
  return sortRows(rows, keys, (row, field) => row[field] ?? 0);
}

/**
 * Run `pipeline` over `rows` and return the final stage's output.
 */
export function runPipeline(
  rows: readonly Document[],
  pipeline: readonly PipelineStage[],
  options: PipelineOptions = {}
): Document[] {
  const textFields = options.textFields ?? DEFAULT_TEXT_FIELDS;
  const policy = options.unknownStages ?? 'passthrough';
  let current: Document[] = [...rows];

  for (const stage of pipeline) {
    const keys: string[] = Object.keys(stage);
    if (keys.length !== 1) {
      throw new StorageUnsupportedQueryError('pipeline stage must have exactly one key');
    }

    const kind = keys[0];
    const spec: unknown = Object.values(stage)[0];

    switch (kind) {
      case '$match': {
        assertSupportedFilter(spec);
        current = current.filter((row) => matchesFilter(row, spec, textFields));
        break;
      }
      case '$group':
        current = execGroup(current, spec);
        break;
      case '$sort':
        current = execSort(current, spec);
        break;
      default:
        if (policy === 'reject') {
          throw new StorageUnsupportedQueryError(`pipeline stage ${kind} is not supported`);
        }
        options.logger?.warn({ stage: kind }, 'Unsupported pipeline stage passed through');
    }
  }

  return current;
}

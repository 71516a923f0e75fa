// Lazily-materialized query cursor.
//
// The cursor only accumulates skip/limit/sort; the source callback does the
// work on every toList() call, so results are never stale or cached.

import { StorageUnsupportedQueryError } from './errors.js';
import type { CursorState, Document, FindOptions, SortDirection, SortSpec } from './types.js';

export type CursorSource<T> = (state: CursorState) => Promise<T[]>;

// ---------------------------------------------------------------------------
// Value ordering
// ---------------------------------------------------------------------------

// Cross-type order: numbers < strings < objects < arrays < booleans
function typeRank(value: unknown): number {
  if (typeof value === 'number') return 1;
  if (typeof value === 'string') return 2;
  if (Array.isArray(value)) return 4;
  if (typeof value === 'boolean') return 5;
  return 3;
}

function zeroFor(other: unknown): unknown {
  if (typeof other === 'string') return '';
  if (typeof other === 'number') return 0;
  if (typeof other === 'boolean') return false;
  return undefined;
}

/**
 * Total order used by cursor and aggregation sorts. A missing (null or
 * undefined) operand takes the zero value of the other operand's type.
 */
export function compareValues(left: unknown, right: unknown): number {
  const leftMissing = left === null || left === undefined;
  const rightMissing = right === null || right === undefined;
  if (leftMissing && rightMissing) return 0;

  const a = leftMissing ? zeroFor(right) : left;
  const b = rightMissing ? zeroFor(left) : right;
  if (a === undefined) return -1;
  if (b === undefined) return 1;

  if (typeof a === 'number' && typeof b === 'number') {
    return a === b ? 0 : a < b ? -1 : 1;
  }
  if (typeof a === 'string' && typeof b === 'string') {
    return a === b ? 0 : a < b ? -1 : 1;
  }
  if (typeof a === 'boolean' && typeof b === 'boolean') {
    return Number(a) - Number(b);
  }

  const rankDiff = typeRank(a) - typeRank(b);
  if (rankDiff !== 0) return rankDiff;

  const sa = JSON.stringify(a);
  const sb = JSON.stringify(b);
  return sa === sb ? 0 : sa < sb ? -1 : 1;
}

export function assertSortDirection(direction: unknown): asserts direction is SortDirection {
  if (direction !== 1 && direction !== -1) {
    throw new StorageUnsupportedQueryError(`sort direction must be 1 or -1, got ${String(direction)}`);
  }
}

function assertCount(axis: 'skip' | 'limit', count: number): void {
  if (!Number.isInteger(count) || count < 0) {
    throw new StorageUnsupportedQueryError(`${axis} must be a non-negative integer, got ${count}`);
  }
}

/**
 * Stable sort of a copy; the input array is left untouched.
 */
export function sortRows<T extends Document>(
  rows: readonly T[],
  keys: readonly SortSpec[],
  read: (row: T, field: string) => unknown = (row, field) => row[field]
): T[] {
  if (keys.length === 0) return [...rows];
  return [...rows].sort((x, y) => {
    for (const [field, direction] of keys) {
      const diff = compareValues(read(x, field), read(y, field));
      if (diff !== 0) return direction === -1 ? -diff : diff;
    }
    return 0;
  });
}

export function stateToOptions(state: CursorState): FindOptions {
  return {
    skip: state.skip,
    limit: state.limit,
    ...(state.sort ? { sort: state.sort } : {}),
  };
}

/**
 * Apply sort, then skip, then limit to an already-filtered row set.
 */
export function applyCursorState<T extends Document>(rows: readonly T[], state: CursorState): T[] {
  const sorted = state.sort ? sortRows(rows, [state.sort]) : [...rows];
  const end = state.limit > 0 ? state.skip + state.limit : undefined;
  return sorted.slice(state.skip, end);
}

// ---------------------------------------------------------------------------
// QueryCursor
// ---------------------------------------------------------------------------

export class QueryCursor<T> {
  private readonly source: CursorSource<T>;
  private readonly state: CursorState = { skip: 0, limit: 0, sort: null };

  constructor(source: CursorSource<T>, options: FindOptions = {}) {
    this.source = source;
    if (options.skip !== undefined) this.skip(options.skip);
    if (options.limit !== undefined) this.limit(options.limit);
    if (options.sort !== undefined) this.sort(options.sort[0], options.sort[1]);
  }

  skip(count: number): this {
    assertCount('skip', count);
    this.state.skip = count;
    return this;
  }

  /** 0 removes the limit */
  limit(count: number): this {
    assertCount('limit', count);
    this.state.limit = count;
    return this;
  }

  sort(field: string, direction: SortDirection = 1): this {
    assertSortDirection(direction);
    this.state.sort = [field, direction];
    return this;
  }

  getState(): CursorState {
    return { ...this.state };
  }

  /**
   * Run the query. `length` caps the materialized list after skip/limit.
   */
  async toList(length?: number): Promise<T[]> {
    const rows = await this.source(this.getState());
    return length !== undefined && length > 0 ? rows.slice(0, length) : rows;
  }

  /**
   * Derive a cursor that transforms each row. The derived cursor carries the
   * current chain and drives the same source with its own state.
   */
  map<U>(fn: (row: T) => U): QueryCursor<U> {
    const source = this.source;
    return new QueryCursor<U>(
      async (state) => (await source(state)).map(fn),
      stateToOptions(this.state)
    );
  }
}

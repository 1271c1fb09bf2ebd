/**
 * Query Builder
 *
 * Fluent filtering, ordering and slicing over every value stored under a
 * KV key prefix.
 */

import type { KvKey, KVStore } from './kv.ts';

export type Operator = '=' | '!=' | '>' | '<' | '>=' | '<=' | 'in' | 'contains';

export interface QueryResult<T> {
  data: T[];
  count: number;
  hasMore: boolean;
}

function compareValues(a: unknown, b: unknown, op: '>' | '<' | '>=' | '<='): boolean {
  if (typeof a === 'number' && typeof b === 'number') {
    return op === '>' ? a > b : op === '<' ? a < b : op === '>=' ? a >= b : a <= b;
  }
  if (typeof a === 'string' && typeof b === 'string') {
    return op === '>' ? a > b : op === '<' ? a < b : op === '>=' ? a >= b : a <= b;
  }
  return false;
}

/**
 * Order two field values. Missing values sort after present ones.
 */
function compareForSort(a: unknown, b: unknown): number {
  if (a === b) return 0;
  if (a === null || a === undefined) return 1;
  if (b === null || b === undefined) return -1;
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  if (typeof a === 'boolean' && typeof b === 'boolean') return Number(a) - Number(b);
  const left = String(a);
  const right = String(b);
  return left < right ? -1 : left > right ? 1 : 0;
}

/**
 * Query builder for values under a KV prefix
 */
export class Query<T extends object> {
  private filters: ((item: T) => boolean)[] = [];
  private sorters: ((a: T, b: T) => number)[] = [];
  private limitValue: number | null = null;
  private offsetValue = 0;

  constructor(
    private store: KVStore,
    private prefix: KvKey
  ) {}

  /**
   * Add a filter condition
   */
  where<K extends keyof T>(field: K, operator: Operator, value: unknown): this {
    this.filters.push((item) => {
      const fieldValue: unknown = item[field];

      switch (operator) {
        case '=':
          return fieldValue === value;
        case '!=':
          return fieldValue !== value;
        case '>':
        case '<':
        case '>=':
        case '<=':
          return compareValues(fieldValue, value, operator);
        case 'in':
          return Array.isArray(value) && value.includes(fieldValue);
        case 'contains':
          if (Array.isArray(fieldValue)) {
            return fieldValue.includes(value);
          }
          if (typeof fieldValue === 'string' && typeof value === 'string') {
            return fieldValue.includes(value);
          }
          return false;
      }
    });

    return this;
  }

  /**
   * Add a custom filter function
   */
  filter(fn: (item: T) => boolean): this {
    this.filters.push(fn);
    return this;
  }

  /**
   * Sort results. Calling again adds a tie-breaker.
   */
  orderBy<K extends keyof T>(field: K, direction: 'asc' | 'desc' = 'asc'): this {
    this.sorters.push((a, b) => {
      const comparison = compareForSort(a[field], b[field]);
      return direction === 'asc' ? comparison : -comparison;
    });

    return this;
  }

  limit(count: number): this {
    this.limitValue = count;
    return this;
  }

  offset(count: number): this {
    this.offsetValue = count;
    return this;
  }

  /**
   * Execute the query
   */
  async execute(): Promise<QueryResult<T>> {
    const entries = await this.store.list<T>(this.prefix);

    let filtered = entries
      .map(({ value }) => value)
      .filter((item) => this.filters.every((fn) => fn(item)));

    if (this.sorters.length > 0) {
      filtered.sort((a, b) => {
        for (const sorter of this.sorters) {
          const result = sorter(a, b);
          if (result !== 0) return result;
        }
        return 0;
      });
    }

    const totalCount = filtered.length;

    if (this.offsetValue > 0) {
      filtered = filtered.slice(this.offsetValue);
    }

    const hasMore = this.limitValue !== null && filtered.length > this.limitValue;
    if (this.limitValue !== null) {
      filtered = filtered.slice(0, this.limitValue);
    }

    return {
      data: filtered,
      count: totalCount,
      hasMore,
    };
  }

  async all(): Promise<T[]> {
    const result = await this.execute();
    return result.data;
  }

  async first(): Promise<T | null> {
    this.limitValue = 1;
    const result = await this.execute();
    return result.data[0] ?? null;
  }

  async count(): Promise<number> {
    const result = await this.execute();
    return result.count;
  }
}

/**
 * Create a new query builder
 */
export function query<T extends object>(store: KVStore, prefix: KvKey): Query<T> {
  return new Query<T>(store, prefix);
}

/**
 * Data Layer
 *
 * Tuple-keyed storage on SQLite, a query builder over key prefixes, and
 * page slicing for list views.
 */

export {
  KVStore,
  AtomicOperation,
  type KVStoreOptions,
  type KvKey,
  type KvKeyPart,
  type KvEntry,
  type KvListOptions,
  type KvCommitResult,
} from './kv.ts';
export { Query, query, type Operator, type QueryResult } from './query.ts';
export { Paginator, type Page } from './paginator.ts';

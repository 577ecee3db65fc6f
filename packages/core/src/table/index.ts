/**
 * Table — separate-chaining hash table with load-factor growth.
 */

export { HashTable } from './hash-table.js'
export type {
  ValueReleaser,
  TableState,
  SetStatus,
  SetOptions,
  SetOutcome,
  RemoveOutcome,
  EntryView,
  TableStats,
} from './hash-table.js'
export { CreateTableOptionsSchema } from './schemas.js'
export type { CreateTableOptions, TableConfig } from './schemas.js'
export { GROWTH_FACTOR, DEFAULT_INITIAL_CAPACITY, DEFAULT_MAX_LOAD_FACTOR, MAX_BUCKET_SLOTS } from './constants.js'
export { createBucket, createEntry, appendEntry, findEntry, unlinkEntry, drainEntries } from './bucket.js'
export type { Bucket, ChainEntry } from './bucket.js'

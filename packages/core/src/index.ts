/**
 * @chainmap/core
 *
 * In-memory hash table over byte keys with separate chaining,
 * seeded lookup3 hashing and load-factor driven growth.
 */

export * from './table/index.js'
export * from './hash/index.js'
export * from './seed/index.js'
export * from './common/index.js'

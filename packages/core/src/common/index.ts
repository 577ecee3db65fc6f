/**
 * Common utilities — Result pattern, typed errors, shared schemas.
 */

export { Ok, Err, unwrap, unwrapOr, isOk, isErr } from './result.js'
export type { Result } from './result.js'

export { HashTableError } from './errors.js'
export type { ErrorCode } from './errors.js'

export { SeedSchema, CapacitySchema, LoadFactorSchema } from './schemas.js'

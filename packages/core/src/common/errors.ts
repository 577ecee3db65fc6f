/**
 * Typed error class for hash table operations.
 */

export type ErrorCode =
  | 'ALLOCATION_ERROR'
  | 'KEY_EXISTS'
  | 'KEY_NOT_FOUND'
  | 'INVALID_ARGUMENT'

export class HashTableError extends Error {
  readonly code: ErrorCode

  constructor(code: ErrorCode, message: string) {
    super(message)
    this.name = 'HashTableError'
    this.code = code
  }

  static allocation(slots: number, reason: string): HashTableError {
    return new HashTableError('ALLOCATION_ERROR', `cannot allocate ${slots} bucket slots: ${reason}`)
  }

  static keyExists(key: string): HashTableError {
    return new HashTableError('KEY_EXISTS', `key already present: ${key}`)
  }

  static keyNotFound(key: string): HashTableError {
    return new HashTableError('KEY_NOT_FOUND', `key not found: ${key}`)
  }

  static invalidArgument(message: string): HashTableError {
    return new HashTableError('INVALID_ARGUMENT', message)
  }
}

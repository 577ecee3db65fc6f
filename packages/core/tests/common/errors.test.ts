import { describe, it, expect } from 'vitest'
import { HashTableError } from '../../src/common/index.js'

describe('HashTableError', () => {
  it('carries a code and a name', () => {
    const err = new HashTableError('KEY_EXISTS', 'dup')
    expect(err).toBeInstanceOf(Error)
    expect(err.name).toBe('HashTableError')
    expect(err.code).toBe('KEY_EXISTS')
    expect(err.message).toBe('dup')
  })

  it('builds messages from the factories', () => {
    expect(HashTableError.allocation(64, 'limit is 32').message).toBe('cannot allocate 64 bucket slots: limit is 32')
    expect(HashTableError.keyExists('"a"').message).toBe('key already present: "a"')
    expect(HashTableError.keyNotFound('"b"').code).toBe('KEY_NOT_FOUND')
    expect(HashTableError.invalidArgument('x').code).toBe('INVALID_ARGUMENT')
  })
})

import { describe, it, expect } from 'vitest'
import { Ok, Err, unwrap, unwrapOr, isOk, isErr, HashTableError } from '../../src/common/index.js'

describe('Result', () => {
  it('Ok wraps a value', () => {
    const result = Ok(42)
    expect(result.ok).toBe(true)
    if (result.ok) expect(result.value).toBe(42)
  })

  it('Err wraps an error', () => {
    const result = Err(HashTableError.keyNotFound('"a"'))
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.code).toBe('KEY_NOT_FOUND')
  })

  it('unwrap returns value for Ok', () => {
    expect(unwrap(Ok('hello'))).toBe('hello')
  })

  it('unwrap throws the carried error', () => {
    expect(() => unwrap(Err(HashTableError.invalidArgument('bad key')))).toThrow('bad key')
  })

  it('unwrap wraps a non-Error payload', () => {
    expect(() => unwrap(Err('plain failure'))).toThrow(HashTableError)
  })

  it('unwrapOr falls back on Err', () => {
    expect(unwrapOr(Err('nope'), 7)).toBe(7)
    expect(unwrapOr(Ok(3), 7)).toBe(3)
  })

  it('isOk and isErr narrow', () => {
    expect(isOk(Ok(10))).toBe(true)
    expect(isErr(Ok(10))).toBe(false)
    expect(isErr(Err('fail'))).toBe(true)
    expect(isOk(Err('fail'))).toBe(false)
  })
})

import { describe, it, expect } from 'vitest'
import { toKeyBytes, copyKey, keysEqual, isKeyInput, describeKey } from '../../src/hash/index.js'

describe('toKeyBytes', () => {
  it('encodes strings as UTF-8', () => {
    expect(Array.from(toKeyBytes('é'))).toEqual([0xc3, 0xa9])
  })

  it('passes byte arrays through', () => {
    const bytes = Uint8Array.from([1, 2, 3])
    expect(toKeyBytes(bytes)).toBe(bytes)
  })
})

describe('copyKey', () => {
  it('is independent of the source buffer', () => {
    const source = Uint8Array.from([1, 2, 3])
    const copy = copyKey(source)
    source[0] = 9
    expect(Array.from(copy)).toEqual([1, 2, 3])
  })
})

describe('keysEqual', () => {
  it('requires equal length and bytes', () => {
    expect(keysEqual(toKeyBytes('abc'), toKeyBytes('abc'))).toBe(true)
    expect(keysEqual(toKeyBytes('abc'), toKeyBytes('abd'))).toBe(false)
  })

  it('does not treat a prefix as a match', () => {
    expect(keysEqual(toKeyBytes('ab'), toKeyBytes('abc'))).toBe(false)
    expect(keysEqual(toKeyBytes('abc'), toKeyBytes('ab'))).toBe(false)
  })

  it('compares empty keys as equal', () => {
    expect(keysEqual(new Uint8Array(0), toKeyBytes(''))).toBe(true)
  })
})

describe('isKeyInput', () => {
  it('accepts strings and byte arrays only', () => {
    expect(isKeyInput('k')).toBe(true)
    expect(isKeyInput(new Uint8Array(1))).toBe(true)
    expect(isKeyInput(null)).toBe(false)
    expect(isKeyInput(12)).toBe(false)
  })
})

describe('describeKey', () => {
  it('quotes the decoded key', () => {
    expect(describeKey(toKeyBytes('user:1'))).toBe('"user:1"')
  })
})

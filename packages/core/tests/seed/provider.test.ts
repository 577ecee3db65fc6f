import { describe, it, expect } from 'vitest'
import { SeedProvider, deriveSeed } from '../../src/seed/index.js'
import type { SeedSource } from '../../src/seed/index.js'

const fixedSource: SeedSource = { now: () => 1_700_000_000_250, pid: 4242 }
const expectedDerived = (1_700_000_000 ^ 250_000 ^ 4242) >>> 0

describe('deriveSeed', () => {
  it('combines seconds, microseconds and pid', () => {
    expect(deriveSeed(fixedSource)).toBe(expectedDerived)
  })
})

describe('SeedProvider', () => {
  it('starts unset', () => {
    expect(new SeedProvider(fixedSource).isSet).toBe(false)
  })

  it('adopts a nonzero candidate', () => {
    const seeds = new SeedProvider(fixedSource)
    const result = seeds.set(0x1234)
    expect(result).toEqual({ ok: true, value: 0x1234 })
    expect(seeds.isSet).toBe(true)
    expect(seeds.current()).toBe(0x1234)
  })

  it('derives a seed when the candidate is zero', () => {
    const seeds = new SeedProvider(fixedSource)
    expect(seeds.set(0)).toEqual({ ok: true, value: expectedDerived })
  })

  it('ignores every set after the first', () => {
    const seeds = new SeedProvider(fixedSource)
    seeds.set(7)
    expect(seeds.set(9)).toEqual({ ok: true, value: 7 })
    expect(seeds.set(0)).toEqual({ ok: true, value: 7 })
    expect(seeds.current()).toBe(7)
  })

  it('fixes a derived seed on first read', () => {
    const seeds = new SeedProvider(fixedSource)
    expect(seeds.current()).toBe(expectedDerived)
    expect(seeds.set(5)).toEqual({ ok: true, value: expectedDerived })
  })

  it('rejects candidates outside the unsigned 32-bit range', () => {
    const seeds = new SeedProvider(fixedSource)
    for (const candidate of [-1, 2 ** 32, 1.5]) {
      const result = seeds.set(candidate)
      expect(result.ok).toBe(false)
      if (!result.ok) expect(result.error.code).toBe('INVALID_ARGUMENT')
    }
    expect(seeds.isSet).toBe(false)
  })
})

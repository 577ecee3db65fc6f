import { Ok, Err, HashTableError, SeedSchema } from '../common/index.js'
import type { Result } from '../common/index.js'

export interface SeedSource {
  /** Wall-clock reading in milliseconds since the epoch. */
  now: () => number
  pid: number
}

const systemSource: SeedSource = {
  now: () => Date.now(),
  pid: process.pid,
}

/**
 * Derives a seed from the time and process identity:
 * seconds ^ microseconds ^ pid, as an unsigned 32-bit value.
 */
export function deriveSeed(source: SeedSource): number {
  const millis = source.now()
  const seconds = Math.floor(millis / 1000)
  const micros = Math.floor((millis % 1000) * 1000)
  return ((seconds >>> 0) ^ micros ^ (source.pid >>> 0)) >>> 0
}

/**
 * Holds the 32-bit mixing seed that every table hashes with.
 * The seed is fixed the first time it is set or read and never changes
 * afterwards; bucket indices of existing tables depend on it.
 */
export class SeedProvider {
  private seed = 0
  private fixed = false

  constructor(private source: SeedSource = systemSource) {}

  get isSet(): boolean {
    return this.fixed
  }

  /**
   * Adopts `candidate` if nonzero, otherwise derives one. No-op once the
   * seed is fixed; the returned value is the seed in effect.
   */
  set(candidate: number): Result<number, HashTableError> {
    const parsed = SeedSchema.safeParse(candidate)
    if (!parsed.success) {
      return Err(HashTableError.invalidArgument(`seed must be an unsigned 32-bit integer, got ${candidate}`))
    }
    if (!this.fixed) {
      this.seed = parsed.data !== 0 ? parsed.data : deriveSeed(this.source)
      this.fixed = true
    }
    return Ok(this.seed)
  }

  /** Current seed; derives and fixes one if nothing has been set yet. */
  current(): number {
    if (!this.fixed) {
      this.seed = deriveSeed(this.source)
      this.fixed = true
    }
    return this.seed
  }
}

export const processSeed = new SeedProvider()

/** Process-wide seed setter. Call once during startup, before creating tables. */
export function setHashSeed(candidate: number): Result<number, HashTableError> {
  return processSeed.set(candidate)
}

import { Ok, Err, HashTableError } from '../common/index.js'
import type { Result } from '../common/index.js'
import { hashBytes, isKeyInput, toKeyBytes, copyKey, describeKey } from '../hash/index.js'
import type { KeyInput } from '../hash/index.js'
import { processSeed } from '../seed/index.js'
import type { SeedProvider } from '../seed/index.js'
import { GROWTH_FACTOR } from './constants.js'
import { CreateTableOptionsSchema } from './schemas.js'
import type { CreateTableOptions } from './schemas.js'
import { createBucket, createEntry, appendEntry, findEntry, unlinkEntry, drainEntries } from './bucket.js'
import type { Bucket, ChainEntry } from './bucket.js'

export type ValueReleaser<V> = (value: V) => void

/**
 * live: usable. retired: replaced by the handle a grow returned.
 * destroyed: `destroy()` was called.
 */
export type TableState = 'live' | 'retired' | 'destroyed'

export type SetStatus = 'inserted' | 'overwritten'

export interface SetOptions<V> {
  /** Overwrite the value of an existing key instead of failing with KEY_EXISTS. */
  replace?: boolean
  /** Called with the previous value when an overwrite happens. */
  releaseOld?: ValueReleaser<V>
}

export interface SetOutcome<V> {
  status: SetStatus
  /** Authoritative handle. After a grow this is a new table and the receiver is retired. */
  table: HashTable<V>
  grew: boolean
  /** Present when growth was attempted and could not allocate. The write itself stands. */
  growthError?: HashTableError
}

export interface RemoveOutcome<V> {
  status: 'removed'
  value: V
}

export interface EntryView<V> {
  readonly key: Uint8Array
  readonly value: V
}

export interface TableStats {
  size: number
  capacity: number
  maxLoadFactor: number
  occupiedBuckets: number
  collidedBuckets: number
  longestChain: number
}

type BucketSlots<V> = Array<Bucket<V> | null>

function allocateSlots<V>(count: number, limit: number): Result<BucketSlots<V>, HashTableError> {
  if (count > limit) {
    return Err(HashTableError.allocation(count, `limit is ${limit}`))
  }
  try {
    return Ok(new Array<Bucket<V> | null>(count).fill(null))
  } catch (err) {
    if (err instanceof RangeError) {
      return Err(HashTableError.allocation(count, err.message))
    }
    throw err
  }
}

/**
 * Separate-chaining hash table over byte keys.
 *
 * Keys are copied on insert; values are only referenced and never released
 * unless the caller passes a releaser. Growth doubles the bucket count once
 * `floor(size / capacity) >= maxLoadFactor` and moves every entry into a new
 * table; callers must continue with `SetOutcome.table`.
 */
export class HashTable<V> {
  private slots: BucketSlots<V>
  private count = 0
  private state: TableState = 'live'

  private constructor(
    readonly capacity: number,
    readonly maxLoadFactor: number,
    readonly seed: number,
    private readonly maxCapacity: number,
    slots: BucketSlots<V>,
  ) {
    this.slots = slots
  }

  static create<V>(options: CreateTableOptions = {}, seeds: SeedProvider = processSeed): Result<HashTable<V>, HashTableError> {
    const parsed = CreateTableOptionsSchema.safeParse(options)
    if (!parsed.success) {
      return Err(HashTableError.invalidArgument(parsed.error.message))
    }

    const { initialCapacity, maxLoadFactor, maxCapacity } = parsed.data
    const slots = allocateSlots<V>(initialCapacity, maxCapacity)
    if (!slots.ok) return slots

    return Ok(new HashTable<V>(initialCapacity, maxLoadFactor, seeds.current(), maxCapacity, slots.value))
  }

  get size(): number {
    return this.count
  }

  get status(): TableState {
    return this.state
  }

  set(key: KeyInput, value: V, options: SetOptions<V> = {}): Result<SetOutcome<V>, HashTableError> {
    const resolved = this.resolveKey(key)
    if (!resolved.ok) return resolved
    const bytes = resolved.value

    const index = this.indexOf(bytes)
    const bucket = this.slots[index]

    if (bucket !== null) {
      const existing = findEntry(bucket, bytes)
      if (existing !== null) {
        if (!options.replace) {
          return Err(HashTableError.keyExists(describeKey(bytes)))
        }
        options.releaseOld?.(existing.value)
        existing.value = value
        return Ok(this.settle('overwritten'))
      }
    }

    this.place(index, createEntry(copyKey(bytes), value))
    this.count += 1
    return Ok(this.settle('inserted'))
  }

  /** Insert without replacing; an existing key yields KEY_EXISTS. */
  insert(key: KeyInput, value: V): Result<SetOutcome<V>, HashTableError> {
    return this.set(key, value, { replace: false })
  }

  /** Insert or overwrite, releasing the previous value if a releaser is given. */
  upsert(key: KeyInput, value: V, releaseOld?: ValueReleaser<V>): Result<SetOutcome<V>, HashTableError> {
    return this.set(key, value, { replace: true, releaseOld })
  }

  find(key: KeyInput): Result<EntryView<V>, HashTableError> {
    const resolved = this.resolveKey(key)
    if (!resolved.ok) return resolved
    const bytes = resolved.value

    const bucket = this.slots[this.indexOf(bytes)]
    const entry = bucket !== null ? findEntry(bucket, bytes) : null
    if (entry === null) {
      return Err(HashTableError.keyNotFound(describeKey(bytes)))
    }
    return Ok({ key: copyKey(entry.key), value: entry.value })
  }

  get(key: KeyInput): Result<V, HashTableError> {
    const found = this.find(key)
    return found.ok ? Ok(found.value.value) : found
  }

  /** Ok(false) for an absent key; errors only for an unusable handle or key. */
  exists(key: KeyInput): Result<boolean, HashTableError> {
    const found = this.find(key)
    if (found.ok) return Ok(true)
    return found.error.code === 'KEY_NOT_FOUND' ? Ok(false) : found
  }

  remove(key: KeyInput, release?: ValueReleaser<V>): Result<RemoveOutcome<V>, HashTableError> {
    const resolved = this.resolveKey(key)
    if (!resolved.ok) return resolved
    const bytes = resolved.value

    const index = this.indexOf(bytes)
    const bucket = this.slots[index]
    const entry = bucket !== null ? unlinkEntry(bucket, bytes) : null
    if (bucket === null || entry === null) {
      return Err(HashTableError.keyNotFound(describeKey(bytes)))
    }

    if (bucket.length === 0) this.slots[index] = null
    this.count -= 1
    release?.(entry.value)
    return Ok({ status: 'removed', value: entry.value })
  }

  /**
   * Drops every entry, calling `release` on each value if given, and retires
   * the handle. Returns the number of entries dropped.
   */
  destroy(release?: ValueReleaser<V>): Result<number, HashTableError> {
    const unusable = this.checkUsable()
    if (unusable !== null) return Err(unusable)

    let dropped = 0
    for (const bucket of this.slots) {
      if (bucket === null) continue
      for (const entry of drainEntries(bucket)) {
        release?.(entry.value)
        dropped += 1
      }
    }

    this.slots = []
    this.count = 0
    this.state = 'destroyed'
    return Ok(dropped)
  }

  stats(): TableStats {
    let occupiedBuckets = 0
    let collidedBuckets = 0
    let longestChain = 0
    for (const bucket of this.slots) {
      if (bucket === null) continue
      occupiedBuckets += 1
      if (bucket.hadCollision) collidedBuckets += 1
      longestChain = Math.max(longestChain, bucket.length)
    }
    return {
      size: this.count,
      capacity: this.capacity,
      maxLoadFactor: this.maxLoadFactor,
      occupiedBuckets,
      collidedBuckets,
      longestChain,
    }
  }

  private checkUsable(): HashTableError | null {
    if (this.state === 'retired') {
      return HashTableError.invalidArgument('table handle was replaced by a grow; use the table returned from set()')
    }
    if (this.state === 'destroyed') {
      return HashTableError.invalidArgument('table handle has been destroyed')
    }
    return null
  }

  private resolveKey(key: KeyInput): Result<Uint8Array, HashTableError> {
    const unusable = this.checkUsable()
    if (unusable !== null) return Err(unusable)
    if (!isKeyInput(key)) {
      return Err(HashTableError.invalidArgument('key must be a string or a Uint8Array'))
    }
    return Ok(toKeyBytes(key))
  }

  private indexOf(bytes: Uint8Array): number {
    return hashBytes(bytes, this.seed) % this.capacity
  }

  private place(index: number, entry: ChainEntry<V>): void {
    let bucket = this.slots[index]
    if (bucket === null) {
      bucket = createBucket<V>()
      this.slots[index] = bucket
    }
    appendEntry(bucket, entry)
  }

  private settle(status: SetStatus): SetOutcome<V> {
    if (Math.floor(this.count / this.capacity) < this.maxLoadFactor) {
      return { status, table: this, grew: false }
    }

    const grown = this.grow()
    if (!grown.ok) {
      console.warn(`[HashTable] grow past ${this.capacity} buckets failed: ${grown.error.message}`)
      return { status, table: this, grew: false, growthError: grown.error }
    }
    return { status, table: grown.value, grew: true }
  }

  /** Moves every entry into a table with `capacity * GROWTH_FACTOR` buckets. */
  private grow(): Result<HashTable<V>, HashTableError> {
    const capacity = this.capacity * GROWTH_FACTOR
    const slots = allocateSlots<V>(capacity, this.maxCapacity)
    if (!slots.ok) return slots

    const next = new HashTable<V>(capacity, this.maxLoadFactor, this.seed, this.maxCapacity, slots.value)
    for (const bucket of this.slots) {
      if (bucket === null) continue
      for (const entry of drainEntries(bucket)) {
        next.place(next.indexOf(entry.key), entry)
      }
    }
    next.count = this.count

    this.slots = []
    this.count = 0
    this.state = 'retired'
    return Ok(next)
  }
}

/**
 * Singly-linked chains for separate chaining.
 * A bucket owns its entries; an entry owns its key bytes but only
 * references its value.
 */

import { keysEqual } from '../hash/index.js'

export interface ChainEntry<V> {
  readonly key: Uint8Array
  value: V
  next: ChainEntry<V> | null
}

export interface Bucket<V> {
  head: ChainEntry<V> | null
  tail: ChainEntry<V> | null
  length: number
  /** Set once the chain has held two entries. Diagnostic only. */
  hadCollision: boolean
}

export function createBucket<V>(): Bucket<V> {
  return { head: null, tail: null, length: 0, hadCollision: false }
}

export function createEntry<V>(key: Uint8Array, value: V): ChainEntry<V> {
  return { key, value, next: null }
}

/** Appends at the tail in O(1). */
export function appendEntry<V>(bucket: Bucket<V>, entry: ChainEntry<V>): void {
  entry.next = null
  if (bucket.tail !== null) {
    bucket.tail.next = entry
  } else {
    bucket.head = entry
  }
  bucket.tail = entry
  bucket.length += 1
  if (bucket.length > 1) bucket.hadCollision = true
}

/** Full key comparison against every entry; chain history is never consulted. */
export function findEntry<V>(bucket: Bucket<V>, key: Uint8Array): ChainEntry<V> | null {
  for (let entry = bucket.head; entry !== null; entry = entry.next) {
    if (keysEqual(entry.key, key)) return entry
  }
  return null
}

/**
 * Unlinks the entry matching `key` and returns it, or null when the chain
 * ends without a match. Both cursors advance on every step.
 */
export function unlinkEntry<V>(bucket: Bucket<V>, key: Uint8Array): ChainEntry<V> | null {
  let previous: ChainEntry<V> | null = null
  let current = bucket.head

  while (current !== null) {
    if (keysEqual(current.key, key)) {
      if (previous === null) {
        bucket.head = current.next
      } else {
        previous.next = current.next
      }
      if (bucket.tail === current) bucket.tail = previous
      bucket.length -= 1
      current.next = null
      return current
    }
    previous = current
    current = current.next
  }

  return null
}

/** Detaches every entry from the chain, head first, and empties the bucket. */
export function* drainEntries<V>(bucket: Bucket<V>): Generator<ChainEntry<V>> {
  let entry = bucket.head
  bucket.head = null
  bucket.tail = null
  bucket.length = 0
  while (entry !== null) {
    const next: ChainEntry<V> | null = entry.next
    entry.next = null
    yield entry
    entry = next
  }
}

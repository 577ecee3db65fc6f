/**
 * Key normalization and comparison.
 * Keys are byte sequences; strings are taken as their UTF-8 bytes.
 */

export type KeyInput = string | Uint8Array

/** Advisory only. Longer keys are hashed and compared like any other. */
export const MAX_KEY_LEN = 32

const encoder = new TextEncoder()
const decoder = new TextDecoder('utf-8', { fatal: false })

export function isKeyInput(value: unknown): value is KeyInput {
  return typeof value === 'string' || value instanceof Uint8Array
}

export function toKeyBytes(key: KeyInput): Uint8Array {
  return typeof key === 'string' ? encoder.encode(key) : key
}

export function copyKey(bytes: Uint8Array): Uint8Array {
  return bytes.slice()
}

export function keysEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false
  }
  return true
}

/** Printable form for error messages. */
export function describeKey(bytes: Uint8Array): string {
  return JSON.stringify(decoder.decode(bytes))
}

/**
 * Hashing — seeded lookup3 over key bytes, key copy and comparison.
 */

export { hashBytes, toHex32 } from './lookup3.js'
export { MAX_KEY_LEN, isKeyInput, toKeyBytes, copyKey, keysEqual, describeKey } from './key.js'
export type { KeyInput } from './key.js'

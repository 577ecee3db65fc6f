/**
 * Bob Jenkins' lookup3 `hashlittle`, byte-at-a-time form.
 * Reads the key as little-endian 32-bit words, so results match the
 * reference implementation on any host.
 */

function rot(x: number, k: number): number {
  return (x << k) | (x >>> (32 - k))
}

function word(bytes: Uint8Array, at: number): number {
  return bytes[at] | (bytes[at + 1] << 8) | (bytes[at + 2] << 16) | (bytes[at + 3] << 24)
}

export function hashBytes(bytes: Uint8Array, seed: number): number {
  let length = bytes.length
  let a = (0xdeadbeef + length + seed) | 0
  let b = a
  let c = a
  let k = 0

  while (length > 12) {
    a = (a + word(bytes, k)) | 0
    b = (b + word(bytes, k + 4)) | 0
    c = (c + word(bytes, k + 8)) | 0

    // mix
    a = (a - c) | 0; a ^= rot(c, 4); c = (c + b) | 0
    b = (b - a) | 0; b ^= rot(a, 6); a = (a + c) | 0
    c = (c - b) | 0; c ^= rot(b, 8); b = (b + a) | 0
    a = (a - c) | 0; a ^= rot(c, 16); c = (c + b) | 0
    b = (b - a) | 0; b ^= rot(a, 19); a = (a + c) | 0
    c = (c - b) | 0; c ^= rot(b, 4); b = (b + a) | 0

    length -= 12
    k += 12
  }

  // last block: up to 12 trailing bytes, zero-padded
  switch (length) {
    case 12: c = (c + (bytes[k + 11] << 24)) | 0 // falls through
    case 11: c = (c + (bytes[k + 10] << 16)) | 0 // falls through
    case 10: c = (c + (bytes[k + 9] << 8)) | 0 // falls through
    case 9: c = (c + bytes[k + 8]) | 0 // falls through
    case 8: b = (b + (bytes[k + 7] << 24)) | 0 // falls through
    case 7: b = (b + (bytes[k + 6] << 16)) | 0 // falls through
    case 6: b = (b + (bytes[k + 5] << 8)) | 0 // falls through
    case 5: b = (b + bytes[k + 4]) | 0 // falls through
    case 4: a = (a + (bytes[k + 3] << 24)) | 0 // falls through
    case 3: a = (a + (bytes[k + 2] << 16)) | 0 // falls through
    case 2: a = (a + (bytes[k + 1] << 8)) | 0 // falls through
    case 1: a = (a + bytes[k]) | 0
      break
    case 0:
      return c >>> 0
  }

  // final
  c ^= b; c = (c - rot(b, 14)) | 0
  a ^= c; a = (a - rot(c, 11)) | 0
  b ^= a; b = (b - rot(a, 25)) | 0
  c ^= b; c = (c - rot(b, 16)) | 0
  a ^= c; a = (a - rot(c, 4)) | 0
  b ^= a; b = (b - rot(a, 14)) | 0
  c ^= b; c = (c - rot(b, 24)) | 0

  return c >>> 0
}

export function toHex32(n: number): string {
  return (n >>> 0).toString(16).padStart(8, '0')
}

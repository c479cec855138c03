// @scantoken/core — CRC-32 (IEEE 802.3, reflected, zlib-compatible)

import { CHECKSUM_LENGTH } from './types.js'
import { asciiBytes, encodeBase62 } from './encoding.js'

/** Reflected form of the IEEE 802.3 polynomial 0x04C11DB7 */
export const CRC32_POLYNOMIAL = 0xedb88320

const CRC32_TABLE: Uint32Array = (() => {
  const table = new Uint32Array(256)
  for (let n = 0; n < 256; n++) {
    let c = n
    for (let k = 0; k < 8; k++) {
      c = c & 1 ? CRC32_POLYNOMIAL ^ (c >>> 1) : c >>> 1
    }
    table[n] = c >>> 0
  }
  return table
})()

/**
 * Computes the CRC-32 of a byte sequence.
 *
 * Initial register 0xFFFFFFFF, final XOR 0xFFFFFFFF. Output matches zlib,
 * e.g. `crc32(asciiBytes('123456789')) === 0xcbf43926`.
 *
 * @returns Unsigned 32-bit checksum
 */
export function crc32(bytes: Uint8Array): number {
  let crc = 0xffffffff
  for (const byte of bytes) {
    crc = (CRC32_TABLE[(crc ^ byte) & 0xff] ?? 0) ^ (crc >>> 8)
  }
  return (crc ^ 0xffffffff) >>> 0
}

/**
 * Computes the 6-character checksum section for an entropy section.
 *
 * CRC-32 over the ASCII bytes of `entropy` exactly as written,
 * base62-encoded at width 6.
 */
export function computeChecksum(entropy: string): string {
  return encodeBase62(crc32(asciiBytes(entropy)), CHECKSUM_LENGTH)
}

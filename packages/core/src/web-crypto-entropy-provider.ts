// @scantoken/core — WebCrypto-based EntropyProvider implementation

import type { EntropyProvider } from './entropy-provider.js'

/** crypto.getRandomValues rejects requests above 65536 bytes */
const MAX_RANDOM_VALUES_BYTES = 65_536

/**
 * Default EntropyProvider using crypto.getRandomValues.
 *
 * Stateless: one instance can be shared by concurrent callers.
 * NEVER uses Math.random.
 */
export class WebCryptoEntropyProvider implements EntropyProvider {
  randomBytes(length: number): Uint8Array {
    const buffer = new Uint8Array(length)
    for (let offset = 0; offset < length; offset += MAX_RANDOM_VALUES_BYTES) {
      crypto.getRandomValues(buffer.subarray(offset, Math.min(length, offset + MAX_RANDOM_VALUES_BYTES)))
    }
    return buffer
  }
}

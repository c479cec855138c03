// @scantoken/core — EntropyProvider abstraction

/**
 * Source of randomness for token generation.
 *
 * Token unguessability rests entirely on this source, so production
 * implementations MUST be cryptographically secure. The generator calls it
 * synchronously and may call it from many concurrent generations.
 *
 * Default implementation: WebCryptoEntropyProvider (ships with core, zero deps).
 * Deterministic implementations are for tests only.
 */
export interface EntropyProvider {
  /**
   * Returns exactly `length` uniformly random bytes.
   * Throws if the source cannot supply them; callers never fall back.
   */
  randomBytes(length: number): Uint8Array
}

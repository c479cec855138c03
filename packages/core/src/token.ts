// @scantoken/core — Token generation and serialization (asf_<component>_<entropy><checksum>)

import type { EntropyProvider } from './entropy-provider.js'
import type { ComponentRegistry } from './registry.js'
import { queryRegistry } from './registry.js'
import type { GenerationResult, Token, TokenString } from './types.js'
import { BASE62_ALPHABET, ENTROPY_LENGTH, SEPARATOR, TOKEN_PREFIX } from './types.js'
import { computeChecksum } from './crc32.js'
import { isValidComponent, isValidEntropy } from './grammar.js'

/** Bytes requested from the provider per draw */
const ENTROPY_BATCH_BYTES = 32

/**
 * Largest multiple of 62 that fits in a byte (62 * 4).
 * Bytes at or above it are discarded so `byte % 62` stays uniform.
 */
const UNBIASED_BYTE_LIMIT = 248

/**
 * Draws before giving up on a provider that keeps returning out-of-range bytes.
 * A uniform source needs more than one draw with probability below 2^-150.
 */
const MAX_ENTROPY_DRAWS = 16

/**
 * Draws 27 base62 characters, each uniform over the alphabet.
 *
 * @throws {Error} If the provider fails, returns a short buffer, or never yields enough usable bytes
 */
function drawEntropy(entropyProvider: EntropyProvider): string {
  let entropy = ''
  for (let draw = 0; draw < MAX_ENTROPY_DRAWS; draw++) {
    const bytes = entropyProvider.randomBytes(ENTROPY_BATCH_BYTES)
    if (bytes.length !== ENTROPY_BATCH_BYTES) {
      throw new Error(
        `Entropy provider returned ${String(bytes.length)} bytes, expected ${String(ENTROPY_BATCH_BYTES)}`,
      )
    }
    for (const byte of bytes) {
      if (byte >= UNBIASED_BYTE_LIMIT) continue
      entropy += BASE62_ALPHABET.charAt(byte % BASE62_ALPHABET.length)
      if (entropy.length === ENTROPY_LENGTH) return entropy
    }
  }
  throw new Error('Entropy provider did not yield enough unbiased bytes')
}

/**
 * Assembles a token from a component and an entropy section, computing the checksum.
 *
 * @throws {TypeError} If the component or entropy section is malformed
 */
export function serializeToken(component: string, entropy: string): Token {
  if (!isValidComponent(component)) {
    throw new TypeError(`Invalid component ${JSON.stringify(component)}`)
  }
  if (!isValidEntropy(entropy)) {
    throw new TypeError(`Entropy must be ${String(ENTROPY_LENGTH)} base62 characters`)
  }

  const checksum = computeChecksum(entropy)
  const value = `${TOKEN_PREFIX}${SEPARATOR}${component}${SEPARATOR}${entropy}${checksum}` as TokenString

  return { prefix: TOKEN_PREFIX, component, entropy, checksum, value }
}

/**
 * Generates a token for an allocated component.
 *
 * Steps:
 * 1. Check component syntax (no registry or entropy call on failure)
 * 2. Confirm the component is allocated (no entropy drawn on failure)
 * 3. Draw 27 uniform base62 characters from the entropy provider
 * 4. Checksum: base62(CRC-32(ascii(entropy)), width 6)
 * 5. Assemble `asf_{component}_{entropy}{checksum}`
 *
 * @param component - Issuer namespace, 3–6 lowercase letters
 * @param registry - Component allocation list
 * @param entropyProvider - Cryptographically secure randomness
 */
export async function generateToken(
  component: string,
  registry: ComponentRegistry,
  entropyProvider: EntropyProvider,
): Promise<GenerationResult> {
  if (!isValidComponent(component)) {
    return { success: false, reason: 'invalid_component_format' }
  }

  const answer = await queryRegistry(registry, component)
  if (!answer.ok) {
    return { success: false, reason: 'registry_unavailable' }
  }
  if (!answer.allocated) {
    return { success: false, reason: 'unallocated_component' }
  }

  let entropy: string
  try {
    entropy = drawEntropy(entropyProvider)
  } catch {
    return { success: false, reason: 'entropy_source_failure' }
  }

  return { success: true, token: serializeToken(component, entropy) }
}

/**
 * Field-wise token equality.
 */
export function tokenEquals(a: Token, b: Token): boolean {
  return (
    a.component === b.component &&
    a.entropy === b.entropy &&
    a.checksum === b.checksum &&
    a.value === b.value
  )
}

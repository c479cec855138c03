// @scantoken/core — Token validation: grammar, checksum, optional registry tier

import type { ComponentRegistry } from './registry.js'
import { queryRegistry } from './registry.js'
import type { OfflineValidationResult, TokenFields, TokenString, ValidationResult } from './types.js'
import { TOKEN_PREFIX } from './types.js'
import { computeChecksum } from './crc32.js'
import { parseToken } from './grammar.js'

/**
 * Recomputes the checksum of a parsed token and compares it with the one it carries.
 *
 * @returns The expected checksum, or `null` if it matches
 */
export function checksumMismatch(fields: TokenFields): string | null {
  const expected = computeChecksum(fields.entropy)
  return expected === fields.checksum ? null : expected
}

/**
 * Validates a candidate without a registry (offline scanning).
 *
 * 1. Anchored parse — failure is `malformed_token` with the grammar state and offset
 * 2. Checksum recomputation — failure is `checksum_mismatch`
 *
 * Synchronous and pure. Never throws.
 */
export function verifyToken(candidate: string): OfflineValidationResult {
  const parsed = parseToken(candidate)
  if (!parsed.ok) {
    return { valid: false, reason: 'malformed_token', failure: parsed.failure }
  }

  const { fields } = parsed
  const expected = checksumMismatch(fields)
  if (expected !== null) {
    return { valid: false, reason: 'checksum_mismatch', expected, actual: fields.checksum }
  }

  return {
    valid: true,
    token: {
      prefix: TOKEN_PREFIX,
      component: fields.component,
      entropy: fields.entropy,
      checksum: fields.checksum,
      value: candidate as TokenString,
    },
  }
}

/**
 * Validates a candidate token.
 *
 * Runs `verifyToken`, then, when a registry is supplied, confirms the
 * component is allocated. Omit the registry to validate offline.
 *
 * @param candidate - String to validate (must be the whole token)
 * @param registry - Optional allocation list for the third tier
 */
export async function validateToken(
  candidate: string,
  registry?: ComponentRegistry,
): Promise<ValidationResult> {
  const result = verifyToken(candidate)
  if (!result.valid || registry === undefined) {
    return result
  }

  const { component } = result.token
  const answer = await queryRegistry(registry, component)
  if (!answer.ok) {
    return { valid: false, reason: 'registry_unavailable', component }
  }
  if (!answer.allocated) {
    return { valid: false, reason: 'unallocated_component', component }
  }

  return result
}

// @scantoken/core — Types, constants, and branded types

// ============================================================
// Branded Types
// ============================================================

declare const TOKEN_BRAND: unique symbol

/** Branded string type for a token that passed the grammar and checksum */
export type TokenString = string & { readonly [TOKEN_BRAND]: 'ScanToken' }

// ============================================================
// Token Structure Constants
// ============================================================

/** Fixed issuer prefix */
export const TOKEN_PREFIX = 'asf'

/** Separator between token sections */
export const SEPARATOR = '_'

/** Minimum component length in characters */
export const COMPONENT_MIN_LENGTH = 3

/** Maximum component length in characters */
export const COMPONENT_MAX_LENGTH = 6

/** Entropy section length in base62 characters (~160.8 bits) */
export const ENTROPY_LENGTH = 27

/** Checksum section length in base62 characters */
export const CHECKSUM_LENGTH = 6

/**
 * Base62 alphabet. The order defines digit values:
 * `0-9` → 0..9, `A-Z` → 10..35, `a-z` → 36..61.
 */
export const BASE62_ALPHABET = '0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz'

/** Highest base62 digit value allowed as the first checksum character (`4`) */
export const MAX_CHECKSUM_LEAD_VALUE = 4

/** Shortest possible token: `asf_` + 3 + `_` + 27 + 6 */
export const TOKEN_MIN_LENGTH =
  TOKEN_PREFIX.length + 1 + COMPONENT_MIN_LENGTH + 1 + ENTROPY_LENGTH + CHECKSUM_LENGTH // 41

/** Longest possible token: `asf_` + 6 + `_` + 27 + 6 */
export const TOKEN_MAX_LENGTH =
  TOKEN_PREFIX.length + 1 + COMPONENT_MAX_LENGTH + 1 + ENTROPY_LENGTH + CHECKSUM_LENGTH // 44

/**
 * Published detection pattern (unanchored).
 *
 * Third-party secret scanners configure their rules with this string.
 * The codec itself never matches with it; see `scanTokens`.
 */
export const TOKEN_PATTERN = 'asf_([a-z]{3,6})_([0-9A-Za-z]{27})([0-4][0-9A-Za-z]{5})'

// ============================================================
// Token Value
// ============================================================

/** Raw sections of a token string that matched the grammar */
export interface TokenFields {
  readonly component: string
  readonly entropy: string
  readonly checksum: string
}

/** A generated or validated token. Immutable. */
export interface Token extends TokenFields {
  readonly prefix: typeof TOKEN_PREFIX
  readonly value: TokenString
}

// ============================================================
// Grammar
// ============================================================

/** States of the token recognizer */
export type GrammarState =
  | 'start'
  | 'prefix'
  | 'component'
  | 'separator'
  | 'entropy'
  | 'checksum'
  | 'accept'
  | 'reject'

/** Why the recognizer moved to `reject` */
export type GrammarFailureCause = 'unexpected_character' | 'unexpected_end' | 'trailing_input'

/** Where and why a candidate failed the grammar */
export interface GrammarFailure {
  /** State the recognizer was in when it rejected */
  readonly state: Exclude<GrammarState, 'reject'>
  /** Offset into the input of the offending character (input length at end of input) */
  readonly offset: number
  readonly cause: GrammarFailureCause
}

/** Anchored parse result */
export type ParseResult =
  | { readonly ok: true; readonly fields: TokenFields }
  | { readonly ok: false; readonly failure: GrammarFailure }

/** A grammar match found in free text. `end` is exclusive. */
export interface TokenMatch extends TokenFields {
  readonly start: number
  readonly end: number
  readonly text: string
}

// ============================================================
// Result Types (never throw for generation or validation)
// ============================================================

/** Every domain failure a caller can branch on */
export type FailureReason =
  | 'invalid_component_format'
  | 'unallocated_component'
  | 'registry_unavailable'
  | 'malformed_token'
  | 'checksum_mismatch'
  | 'entropy_source_failure'

/** Token generation result */
export type GenerationResult =
  | { readonly success: true; readonly token: Token }
  | {
      readonly success: false
      readonly reason: Extract<
        FailureReason,
        | 'invalid_component_format'
        | 'unallocated_component'
        | 'registry_unavailable'
        | 'entropy_source_failure'
      >
    }

/** Failures produced without consulting a registry */
export type OfflineFailure =
  | { readonly valid: false; readonly reason: 'malformed_token'; readonly failure: GrammarFailure }
  | {
      readonly valid: false
      readonly reason: 'checksum_mismatch'
      readonly expected: string
      readonly actual: string
    }

/** Result of grammar + checksum validation */
export type OfflineValidationResult = { readonly valid: true; readonly token: Token } | OfflineFailure

/** Result of full validation (grammar, checksum, optional registry) */
export type ValidationResult =
  | OfflineValidationResult
  | {
      readonly valid: false
      readonly reason: 'unallocated_component' | 'registry_unavailable'
      readonly component: string
    }

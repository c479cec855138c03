// @scantoken/runtime — Human-readable failures, redaction, fingerprints, text positions

import { createHash } from 'node:crypto'
import { SEPARATOR, TOKEN_PREFIX } from '@scantoken/core'
import type { FailureReason, GrammarFailure, GenerationResult, ValidationResult } from '@scantoken/core'
import type { TextPosition } from './types.js'

/** Fixed message per failure reason */
const FAILURE_MESSAGES: Readonly<Record<FailureReason, string>> = {
  invalid_component_format: 'Component must be 3-6 lowercase ASCII letters',
  unallocated_component: 'Component is not allocated in the registry',
  registry_unavailable: 'Component registry could not be reached',
  malformed_token: 'Token does not match asf_<component>_<entropy><checksum>',
  checksum_mismatch: 'Token checksum does not match its entropy',
  entropy_source_failure: 'Secure random source could not supply entropy',
}

/** Entropy characters left visible by `redactToken` */
const VISIBLE_ENTROPY_CHARS = 4

const REDACTION_MARK = '…'

/**
 * Returns the fixed message for a failure reason.
 */
export function describeFailure(reason: FailureReason): string {
  return FAILURE_MESSAGES[reason]
}

/**
 * Describes where the grammar rejected a candidate.
 */
export function describeGrammarFailure(failure: GrammarFailure): string {
  const offset = String(failure.offset)
  switch (failure.cause) {
    case 'unexpected_character':
      return `unexpected character at offset ${offset} while reading ${failure.state}`
    case 'unexpected_end':
      return `input ended at offset ${offset} while reading ${failure.state}`
    case 'trailing_input':
      return `unexpected input after token at offset ${offset}`
  }
}

/**
 * Full message for a failed generation or validation, including detail
 * carried by the result.
 */
export function describeResult(
  result:
    | Extract<GenerationResult, { success: false }>
    | Extract<ValidationResult, { valid: false }>,
): string {
  const message = describeFailure(result.reason)
  if ('failure' in result) {
    return `${message}: ${describeGrammarFailure(result.failure)}`
  }
  if ('expected' in result) {
    return `${message}: expected ${result.expected}, found ${result.actual}`
  }
  if ('component' in result) {
    return `${message}: ${result.component}`
  }
  return message
}

/**
 * Masks the secret part of a token for display.
 *
 * Keeps the prefix, the component and the first 4 entropy characters:
 * `asf_sample_0000…`. Text without a component separator is fully masked.
 */
export function redactToken(value: string): string {
  const separator = value.indexOf(SEPARATOR, TOKEN_PREFIX.length + SEPARATOR.length)
  if (separator === -1) return REDACTION_MARK
  return value.slice(0, separator + SEPARATOR.length + VISIBLE_ENTROPY_CHARS) + REDACTION_MARK
}

/**
 * SHA3-256 hex digest of the token text.
 *
 * Matches leaked tokens against stored records without keeping the token itself.
 */
export function fingerprintToken(value: string): string {
  return createHash('sha3-256').update(value, 'utf8').digest('hex')
}

/**
 * Creates an offset → 1-based line/column lookup for a text.
 * Lines end at `\n`; a preceding `\r` counts as part of its line.
 */
export function createLocator(text: string): (offset: number) => TextPosition {
  const lineStarts: number[] = [0]
  for (let i = text.indexOf('\n'); i !== -1; i = text.indexOf('\n', i + 1)) {
    lineStarts.push(i + 1)
  }

  return (offset: number): TextPosition => {
    let low = 0
    let high = lineStarts.length - 1
    while (low < high) {
      const mid = (low + high + 1) >>> 1
      if ((lineStarts[mid] ?? 0) <= offset) {
        low = mid
      } else {
        high = mid - 1
      }
    }
    return { line: low + 1, column: offset - (lineStarts[low] ?? 0) + 1 }
  }
}

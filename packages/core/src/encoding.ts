// @scantoken/core — Encoding utilities (fixed-width base62, ASCII bytes)

import { BASE62_ALPHABET } from './types.js'

const BASE = BASE62_ALPHABET.length // 62

/** Failure codes for codec misuse */
export type Base62ErrorCode = 'encoding_overflow' | 'invalid_digit'

/**
 * Thrown when the codec is called with values it cannot represent.
 * Generator and validator flows never trigger it by construction.
 */
export class Base62Error extends Error {
  readonly code: Base62ErrorCode

  /** Index of the offending character (`invalid_digit` only) */
  readonly index: number | undefined

  constructor(code: Base62ErrorCode, message: string, index?: number) {
    super(message)
    this.name = 'Base62Error'
    this.code = code
    this.index = index
  }
}

/**
 * Digit value lookup indexed by char code (-1 = not in alphabet).
 */
const DIGIT_VALUES: readonly number[] = (() => {
  const table: number[] = new Array<number>(128).fill(-1)
  for (let i = 0; i < BASE; i++) {
    table[BASE62_ALPHABET.charCodeAt(i)] = i
  }
  return table
})()

/**
 * Returns the base62 digit value of a single character, or -1.
 */
export function base62DigitValue(ch: string): number {
  if (ch.length !== 1) return -1
  return DIGIT_VALUES[ch.charCodeAt(0)] ?? -1
}

/**
 * Whether the character belongs to the base62 alphabet.
 */
export function isBase62Char(ch: string): boolean {
  return base62DigitValue(ch) !== -1
}

/**
 * Encodes an unsigned integer as a fixed-width base62 string,
 * most-significant digit first, left-padded with `0`.
 *
 * @throws {RangeError} If `value` is not a non-negative safe integer or `width` is negative
 * @throws {Base62Error} `encoding_overflow` if `value >= 62^width`
 */
export function encodeBase62(value: number, width: number): string {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`Expected a non-negative safe integer, got ${String(value)}`)
  }
  if (!Number.isInteger(width) || width < 0) {
    throw new RangeError(`Expected a non-negative integer width, got ${String(width)}`)
  }
  if (value >= BASE ** width) {
    throw new Base62Error(
      'encoding_overflow',
      `Value ${String(value)} does not fit in ${String(width)} base62 digits`,
    )
  }

  const digits: string[] = []
  let remaining = value
  while (remaining > 0) {
    digits.push(BASE62_ALPHABET.charAt(remaining % BASE))
    remaining = Math.floor(remaining / BASE)
  }
  digits.reverse()

  return digits.join('').padStart(width, BASE62_ALPHABET.charAt(0))
}

/**
 * Decodes a base62 string (most-significant digit first) to an unsigned integer.
 * The empty string decodes to 0.
 *
 * @throws {Base62Error} `invalid_digit` for a character outside the alphabet,
 *   `encoding_overflow` if the result exceeds `Number.MAX_SAFE_INTEGER`
 */
export function decodeBase62(text: string): number {
  let acc = 0
  for (let i = 0; i < text.length; i++) {
    const digit = base62DigitValue(text.charAt(i))
    if (digit === -1) {
      throw new Base62Error(
        'invalid_digit',
        `Invalid base62 digit ${JSON.stringify(text.charAt(i))} at index ${String(i)}`,
        i,
      )
    }
    acc = acc * BASE + digit
    if (acc > Number.MAX_SAFE_INTEGER) {
      throw new Base62Error('encoding_overflow', 'Decoded value exceeds Number.MAX_SAFE_INTEGER')
    }
  }
  return acc
}

/**
 * Converts an ASCII string to its raw byte values.
 * Checksums are computed over these bytes, never over decoded digit values.
 *
 * @throws {RangeError} If the text contains a non-ASCII character
 */
export function asciiBytes(text: string): Uint8Array {
  const bytes = new Uint8Array(text.length)
  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i)
    if (code > 0x7f) {
      throw new RangeError(`Non-ASCII character at index ${String(i)}`)
    }
    bytes[i] = code
  }
  return bytes
}

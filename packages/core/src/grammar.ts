// @scantoken/core — Token grammar: explicit state machine, anchored parse, unanchored scan

import type {
  GrammarFailure,
  GrammarFailureCause,
  GrammarState,
  ParseResult,
  TokenFields,
  TokenMatch,
} from './types.js'
import {
  CHECKSUM_LENGTH,
  COMPONENT_MAX_LENGTH,
  COMPONENT_MIN_LENGTH,
  ENTROPY_LENGTH,
  MAX_CHECKSUM_LEAD_VALUE,
  SEPARATOR,
  TOKEN_MIN_LENGTH,
  TOKEN_PREFIX,
} from './types.js'
import { base62DigitValue, isBase62Char } from './encoding.js'

/** `asf_` — consumed by the `prefix` state */
const PREFIX_LITERAL = `${TOKEN_PREFIX}${SEPARATOR}`

function isLowerAlpha(ch: string): boolean {
  return ch >= 'a' && ch <= 'z' && ch.length === 1
}

/**
 * Whether a component is 3–6 lowercase ASCII letters.
 */
export function isValidComponent(component: string): boolean {
  if (component.length < COMPONENT_MIN_LENGTH || component.length > COMPONENT_MAX_LENGTH) {
    return false
  }
  for (const ch of component) {
    if (!isLowerAlpha(ch)) return false
  }
  return true
}

/**
 * Whether an entropy section is exactly 27 base62 characters.
 */
export function isValidEntropy(entropy: string): boolean {
  if (entropy.length !== ENTROPY_LENGTH) return false
  for (const ch of entropy) {
    if (!isBase62Char(ch)) return false
  }
  return true
}

/**
 * Character-at-a-time recognizer for the token grammar.
 *
 * ```
 * start → prefix → component → separator → entropy → checksum → accept
 *                       (any mismatch) → reject
 * ```
 *
 * - `prefix` consumes `asf_`
 * - `component` consumes 3–6 of `[a-z]`; `_` moves to `separator` once 3 are read
 * - `separator` expects the first entropy character
 * - `entropy` consumes the rest of the 27 `[0-9A-Za-z]` characters
 * - `checksum` requires a lead in `[0-4]`, then 5 more base62 characters
 *
 * `reject` is absorbing. The recognizer holds no reference to its input.
 */
export class TokenRecognizer {
  private current: GrammarState = 'start'
  private count = 0
  private componentChars = 0
  private failedIn: Exclude<GrammarState, 'reject'> = 'start'

  /** Current state */
  get state(): GrammarState {
    return this.current
  }

  /** Length of the component section once it has been closed by `_` */
  get componentLength(): number {
    return this.componentChars
  }

  /** State in which the recognizer rejected (meaningful only in `reject`) */
  get rejectedIn(): Exclude<GrammarState, 'reject'> {
    return this.failedIn
  }

  /** Returns the recognizer to `start` so it can be reused */
  reset(): void {
    this.current = 'start'
    this.count = 0
    this.componentChars = 0
    this.failedIn = 'start'
  }

  /**
   * Consumes one character and returns the new state.
   */
  feed(ch: string): GrammarState {
    const state = this.current
    switch (state) {
      case 'reject':
        return state

      case 'start':
        if (ch === PREFIX_LITERAL.charAt(0)) return this.move('prefix', 1)
        return this.reject(state)

      case 'prefix':
        if (ch !== PREFIX_LITERAL.charAt(this.count)) return this.reject(state)
        if (this.count + 1 === PREFIX_LITERAL.length) return this.move('component', 0)
        return this.move('prefix', this.count + 1)

      case 'component':
        if (isLowerAlpha(ch) && this.count < COMPONENT_MAX_LENGTH) {
          return this.move('component', this.count + 1)
        }
        if (ch === SEPARATOR && this.count >= COMPONENT_MIN_LENGTH) {
          this.componentChars = this.count
          return this.move('separator', 0)
        }
        return this.reject(state)

      case 'separator':
        if (isBase62Char(ch)) return this.move('entropy', 1)
        return this.reject(state)

      case 'entropy':
        if (!isBase62Char(ch)) return this.reject(state)
        if (this.count + 1 === ENTROPY_LENGTH) return this.move('checksum', 0)
        return this.move('entropy', this.count + 1)

      case 'checksum': {
        if (this.count === 0) {
          const lead = base62DigitValue(ch)
          if (lead < 0 || lead > MAX_CHECKSUM_LEAD_VALUE) return this.reject(state)
        } else if (!isBase62Char(ch)) {
          return this.reject(state)
        }
        if (this.count + 1 === CHECKSUM_LENGTH) return this.move('accept', 0)
        return this.move('checksum', this.count + 1)
      }

      case 'accept':
        return this.reject(state)
    }
  }

  private move(next: GrammarState, count: number): GrammarState {
    this.current = next
    this.count = count
    return next
  }

  private reject(from: Exclude<GrammarState, 'reject'>): GrammarState {
    this.failedIn = from
    this.current = 'reject'
    return 'reject'
  }
}

type Recognition =
  | { readonly ok: true; readonly end: number; readonly componentLength: number }
  | { readonly ok: false; readonly failure: GrammarFailure }

/**
 * Runs the recognizer over `text` from `start`.
 *
 * Anchored runs must end in `accept` exactly at the end of the input.
 * Unanchored runs stop at the first `accept`.
 */
function recognize(
  recognizer: TokenRecognizer,
  text: string,
  start: number,
  anchored: boolean,
): Recognition {
  recognizer.reset()
  let offset = start

  while (offset < text.length) {
    if (!anchored && recognizer.state === 'accept') break
    const state = recognizer.feed(text.charAt(offset))
    if (state === 'reject') {
      const cause: GrammarFailureCause =
        recognizer.rejectedIn === 'accept' ? 'trailing_input' : 'unexpected_character'
      return { ok: false, failure: { state: recognizer.rejectedIn, offset, cause } }
    }
    offset++
  }

  const state = recognizer.state
  if (state === 'accept') {
    return { ok: true, end: offset, componentLength: recognizer.componentLength }
  }
  if (state === 'reject') {
    // unreachable: rejection returns inside the loop
    return { ok: false, failure: { state: recognizer.rejectedIn, offset, cause: 'unexpected_character' } }
  }
  return { ok: false, failure: { state, offset, cause: 'unexpected_end' } }
}

/**
 * Splits an accepted span into its sections.
 */
function sliceFields(text: string, start: number, end: number, componentLength: number): TokenFields {
  const componentStart = start + PREFIX_LITERAL.length
  const entropyStart = componentStart + componentLength + SEPARATOR.length
  const checksumStart = entropyStart + ENTROPY_LENGTH
  return {
    component: text.slice(componentStart, componentStart + componentLength),
    entropy: text.slice(entropyStart, checksumStart),
    checksum: text.slice(checksumStart, end),
  }
}

/**
 * Parses a candidate string. The entire input must match the grammar.
 *
 * Does not verify the checksum; see `verifyToken`.
 */
export function parseToken(input: string): ParseResult {
  const outcome = recognize(new TokenRecognizer(), input, 0, true)
  if (!outcome.ok) {
    return { ok: false, failure: outcome.failure }
  }
  return { ok: true, fields: sliceFields(input, 0, outcome.end, outcome.componentLength) }
}

/**
 * Lazily finds grammar matches anywhere in free text.
 *
 * Matches are leftmost and non-overlapping: after a match scanning resumes at
 * its end, after a failed attempt it resumes one character past the attempt's
 * start. Each call starts a fresh sequence; pass `fromIndex` to resume from an
 * earlier match's `end`.
 *
 * Does not verify checksums; see `detectTokens`.
 */
export function* scanTokens(text: string, fromIndex = 0): Generator<TokenMatch, void, undefined> {
  const recognizer = new TokenRecognizer()
  let position = Math.max(0, fromIndex)

  while (position + TOKEN_MIN_LENGTH <= text.length) {
    const start = text.indexOf(PREFIX_LITERAL, position)
    if (start === -1) return

    const outcome = recognize(recognizer, text, start, false)
    if (!outcome.ok) {
      position = start + 1
      continue
    }

    yield {
      ...sliceFields(text, start, outcome.end, outcome.componentLength),
      start,
      end: outcome.end,
      text: text.slice(start, outcome.end),
    }
    position = outcome.end
  }
}

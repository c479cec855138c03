// @scantoken/core — Leak detection over free text (grammar → checksum → registry)

import type { ComponentRegistry } from './registry.js'
import { queryRegistry } from './registry.js'
import type { Token, TokenMatch, TokenString } from './types.js'
import { TOKEN_PREFIX } from './types.js'
import { scanTokens } from './grammar.js'
import { checksumMismatch } from './validation.js'

/** A grammar match with its checksum verdict */
export interface Candidate extends TokenMatch {
  readonly checksumValid: boolean
  /** Checksum recomputed from the entropy section */
  readonly expectedChecksum: string
}

/** A checksum-confirmed token found in free text. `end` is exclusive. */
export interface DetectedToken {
  readonly token: Token
  readonly start: number
  readonly end: number
}

/** Outcome of the optional registry tier */
export type RegistryStatus = 'allocated' | 'unallocated' | 'registry_unavailable'

/** A detection tagged by the registry tier */
export interface ConfirmedToken extends DetectedToken {
  readonly registry: RegistryStatus
}

/**
 * Lazily yields every grammar match in `text` with its checksum verdict.
 * Near-misses (right shape, wrong checksum) are included with `checksumValid: false`.
 */
export function* scanCandidates(text: string): Generator<Candidate, void, undefined> {
  for (const match of scanTokens(text)) {
    const expected = checksumMismatch(match)
    yield {
      ...match,
      checksumValid: expected === null,
      expectedChecksum: expected ?? match.checksum,
    }
  }
}

/**
 * Lazily yields checksum-confirmed tokens found in `text`.
 *
 * Tier 1: grammar match (`scanTokens`). Tier 2: checksum recomputation;
 * matches that fail it are discarded.
 */
export function* detectTokens(text: string): Generator<DetectedToken, void, undefined> {
  for (const candidate of scanCandidates(text)) {
    if (candidate.checksumValid) yield toDetectedToken(candidate)
  }
}

/**
 * Builds the detection for a candidate. Callers check `checksumValid` first.
 */
export function toDetectedToken(candidate: Candidate): DetectedToken {
  return {
    token: {
      prefix: TOKEN_PREFIX,
      component: candidate.component,
      entropy: candidate.entropy,
      checksum: candidate.checksum,
      value: candidate.text as TokenString,
    },
    start: candidate.start,
    end: candidate.end,
  }
}

/**
 * Tier 3: tags detections with their component's registry status.
 *
 * Each distinct component is queried once. Registry failures are reported per
 * component as `registry_unavailable`; this function never rejects.
 */
export async function confirmDetections(
  detections: Iterable<DetectedToken>,
  registry: ComponentRegistry,
): Promise<ConfirmedToken[]> {
  const statuses = new Map<string, RegistryStatus>()
  const confirmed: ConfirmedToken[] = []

  for (const detection of detections) {
    const { component } = detection.token
    let status = statuses.get(component)
    if (status === undefined) {
      const answer = await queryRegistry(registry, component)
      status = !answer.ok ? 'registry_unavailable' : answer.allocated ? 'allocated' : 'unallocated'
      statuses.set(component, status)
    }
    confirmed.push({ ...detection, registry: status })
  }

  return confirmed
}

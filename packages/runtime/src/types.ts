// @scantoken/runtime — Types and configuration interfaces

import type {
  ComponentRegistry,
  EntropyProvider,
  GenerationResult,
  RegistryStatus,
  Token,
  ValidationResult,
} from '@scantoken/core'

// ============================================================
// Configuration
// ============================================================

/**
 * Configuration for a scantoken instance.
 *
 * Supply the allocation list either as `components` or as a `registry`
 * capability. Without either, the instance validates and scans offline and
 * cannot generate tokens (every component is unallocated).
 *
 * @example
 * ```typescript
 * const scantoken = createScantoken({ components: ['sample'] })
 * const result = await scantoken.generate('sample')
 * ```
 */
export interface ScantokenConfig {
  /** Allocated components, backed by a static registry */
  readonly components?: readonly string[] | undefined

  /** Registry capability (static list, remote service, cache) */
  readonly registry?: ComponentRegistry | undefined

  /** Custom EntropyProvider implementation (default: WebCryptoEntropyProvider) */
  readonly entropyProvider?: EntropyProvider | undefined

  /**
   * Apply the registry tier in `validate` and `scan`.
   * Default: true when `components` or `registry` is configured, false otherwise.
   */
  readonly enforceRegistry?: boolean | undefined
}

/**
 * Fully resolved configuration with all defaults applied.
 * Exposed as `scantoken.config`.
 */
export interface ResolvedScantokenConfig {
  /** Whether an allocation list was configured */
  readonly hasRegistry: boolean
  readonly enforceRegistry: boolean
}

// ============================================================
// Scan Report
// ============================================================

/** 1-based position in scanned text */
export interface TextPosition {
  readonly line: number
  readonly column: number
}

/** Registry tier outcome, or `unchecked` when the tier is off */
export type FindingRegistryStatus = RegistryStatus | 'unchecked'

/** A checksum-confirmed token found by `scan` */
export interface Finding extends TextPosition {
  readonly token: Token
  readonly start: number
  readonly end: number
  /** Token with its secret part masked, safe to print */
  readonly redacted: string
  /** SHA3-256 hex of the token text */
  readonly fingerprint: string
  readonly registry: FindingRegistryStatus
}

/** A grammar match whose checksum did not verify */
export interface RejectedCandidate extends TextPosition {
  readonly start: number
  readonly end: number
  readonly redacted: string
  readonly expectedChecksum: string
  readonly actualChecksum: string
}

/** Result of scanning one text */
export interface ScanReport {
  readonly findings: readonly Finding[]
  readonly rejected: readonly RejectedCandidate[]
}

// ============================================================
// Instance
// ============================================================

/**
 * The scantoken runtime instance.
 *
 * Created by `createScantoken(config)`. Holds the registry and entropy
 * provider and applies the configured strictness.
 */
export interface ScantokenInstance {
  /** Generate a token for an allocated component */
  generate(component: string): Promise<GenerationResult>

  /** Validate a whole token string (registry tier per `enforceRegistry`) */
  validate(candidate: string): Promise<ValidationResult>

  /**
   * Scan free text for leaked tokens: grammar, checksum, then registry
   * (per `enforceRegistry`).
   */
  scan(text: string): Promise<ScanReport>

  /** Resolved configuration (readonly) */
  readonly config: ResolvedScantokenConfig
}

// @scantoken/runtime — Core scantoken instance (orchestration layer)

import {
  WebCryptoEntropyProvider,
  createStaticRegistry,
  generateToken,
  validateToken,
  scanCandidates,
  toDetectedToken,
  confirmDetections,
} from '@scantoken/core'
import type { ComponentRegistry, DetectedToken, EntropyProvider } from '@scantoken/core'
import type {
  Finding,
  FindingRegistryStatus,
  RejectedCandidate,
  ResolvedScantokenConfig,
  ScanReport,
  ScantokenConfig,
  ScantokenInstance,
} from './types.js'
import { createLocator, fingerprintToken, redactToken } from './report.js'

// ============================================================
// Configuration Resolution
// ============================================================

/**
 * Builds the registry from whichever allocation source the config names.
 *
 * @throws {Error} If both `components` and `registry` are set
 * @throws {TypeError} If a listed component is malformed
 */
function resolveRegistry(config: ScantokenConfig): ComponentRegistry | undefined {
  if (config.components !== undefined && config.registry !== undefined) {
    throw new Error('Configure either `components` or `registry`, not both')
  }
  if (config.components !== undefined) {
    return createStaticRegistry(config.components)
  }
  return config.registry
}

/**
 * Resolves user config with defaults applied.
 */
function resolveConfig(
  config: ScantokenConfig,
  registry: ComponentRegistry | undefined,
): ResolvedScantokenConfig {
  const hasRegistry = registry !== undefined
  return {
    hasRegistry,
    enforceRegistry: hasRegistry && (config.enforceRegistry ?? true),
  }
}

// ============================================================
// Scantoken Instance Factory
// ============================================================

/**
 * Creates a scantoken runtime instance.
 *
 * @param config - Scantoken configuration
 * @returns Initialized ScantokenInstance
 *
 * @example
 * ```typescript
 * const scantoken = createScantoken({ components: ['sample'] })
 *
 * const generated = await scantoken.generate('sample')
 * const report = await scantoken.scan(fs.readFileSync('build.log', 'utf8'))
 * ```
 */
export function createScantoken(config: ScantokenConfig = {}): ScantokenInstance {
  const registry = resolveRegistry(config)
  const resolved = resolveConfig(config, registry)
  const entropyProvider: EntropyProvider = config.entropyProvider ?? new WebCryptoEntropyProvider()

  // Generation always requires membership; an unconfigured registry allocates nothing
  const generationRegistry = registry ?? createStaticRegistry([])
  const validationRegistry = resolved.enforceRegistry ? registry : undefined

  const instance: ScantokenInstance = {
    config: resolved,

    generate(component: string) {
      return generateToken(component, generationRegistry, entropyProvider)
    },

    validate(candidate: string) {
      return validateToken(candidate, validationRegistry)
    },

    async scan(text: string): Promise<ScanReport> {
      const locate = createLocator(text)

      // One pass: checksum-confirmed matches become findings, near-misses are rejected
      const detections: DetectedToken[] = []
      const rejected: RejectedCandidate[] = []
      for (const candidate of scanCandidates(text)) {
        if (candidate.checksumValid) {
          detections.push(toDetectedToken(candidate))
          continue
        }
        rejected.push({
          ...locate(candidate.start),
          start: candidate.start,
          end: candidate.end,
          redacted: redactToken(candidate.text),
          expectedChecksum: candidate.expectedChecksum,
          actualChecksum: candidate.checksum,
        })
      }

      const tagged: readonly (DetectedToken & { readonly registry: FindingRegistryStatus })[] =
        validationRegistry !== undefined
          ? await confirmDetections(detections, validationRegistry)
          : detections.map((detection) => ({ ...detection, registry: 'unchecked' as const }))

      const findings: Finding[] = tagged.map((detection) => ({
        ...locate(detection.start),
        token: detection.token,
        start: detection.start,
        end: detection.end,
        redacted: redactToken(detection.token.value),
        fingerprint: fingerprintToken(detection.token.value),
        registry: detection.registry,
      }))

      return { findings, rejected }
    },
  }

  return instance
}

// @scantoken/runtime — Public API surface
// Configured instances, scan reports, registry files

// ============================================================
// Types
// ============================================================

export type {
  ScantokenConfig,
  ResolvedScantokenConfig,
  ScantokenInstance,
  ScanReport,
  Finding,
  FindingRegistryStatus,
  RejectedCandidate,
  TextPosition,
} from './types.js'

// ============================================================
// Core Orchestration
// ============================================================

export { createScantoken } from './scantoken.js'

// ============================================================
// Reporting
// ============================================================

export {
  describeFailure,
  describeGrammarFailure,
  describeResult,
  redactToken,
  fingerprintToken,
  createLocator,
} from './report.js'

// ============================================================
// Registry Files
// ============================================================

export {
  RegistryDocumentSchema,
  RegistryFileError,
  parseRegistryDocument,
  loadRegistryFile,
} from './registry-file.js'
export type { RegistryDocument } from './registry-file.js'

// @scantoken/core — Public API surface
// Structured, scannable secret tokens: generation, validation, leak detection

// ============================================================
// Types
// ============================================================

export type { EntropyProvider } from './entropy-provider.js'

export type { ComponentRegistry } from './registry.js'

export type {
  TokenString,
  Token,
  TokenFields,
  TokenMatch,
  GrammarState,
  GrammarFailure,
  GrammarFailureCause,
  ParseResult,
  FailureReason,
  GenerationResult,
  OfflineFailure,
  OfflineValidationResult,
  ValidationResult,
} from './types.js'

export type { Base62ErrorCode } from './encoding.js'

export type { Candidate, DetectedToken, ConfirmedToken, RegistryStatus } from './detector.js'

// ============================================================
// Capabilities
// ============================================================

export { WebCryptoEntropyProvider } from './web-crypto-entropy-provider.js'

export { createStaticRegistry, queryRegistry } from './registry.js'

// ============================================================
// Token Operations
// ============================================================

export { generateToken, serializeToken, tokenEquals } from './token.js'

export { validateToken, verifyToken, checksumMismatch } from './validation.js'

// ============================================================
// Grammar & Detection
// ============================================================

export {
  TokenRecognizer,
  parseToken,
  scanTokens,
  isValidComponent,
  isValidEntropy,
} from './grammar.js'

export { scanCandidates, detectTokens, toDetectedToken, confirmDetections } from './detector.js'

// ============================================================
// Constants
// ============================================================

export {
  TOKEN_PREFIX,
  SEPARATOR,
  COMPONENT_MIN_LENGTH,
  COMPONENT_MAX_LENGTH,
  ENTROPY_LENGTH,
  CHECKSUM_LENGTH,
  BASE62_ALPHABET,
  MAX_CHECKSUM_LEAD_VALUE,
  TOKEN_MIN_LENGTH,
  TOKEN_MAX_LENGTH,
  TOKEN_PATTERN,
} from './types.js'

// ============================================================
// Encoding Utilities
// ============================================================

export {
  Base62Error,
  encodeBase62,
  decodeBase62,
  base62DigitValue,
  isBase62Char,
  asciiBytes,
} from './encoding.js'

export { crc32, computeChecksum, CRC32_POLYNOMIAL } from './crc32.js'

/**
 * @souldos/hal
 *
 * Hardware abstraction layer for the SoulDOS shell: the HalInterface
 * contract, the module manifest, signature verification, and the mock
 * implementation.
 *
 * This package performs no I/O. Diagnostics leave through an injected
 * DiagnosticSink; the shell decides where they are written.
 */

// Types
export type {
  HalInterface,
  HalOperation,
  HalResult,
  TensorData,
} from './types/hal.js';
export { halErr, halOk } from './types/hal.js';

export type {
  ModuleManifestEntry,
  ReadonlyModuleManifest,
} from './types/manifest.js';

export type {
  ErrorOutcome,
  FailedOutcome,
  VerificationOutcome,
  VerifiedOutcome,
} from './types/verification.js';
export {
  SignatureSource,
  VerificationStatus,
  isSignatureSource,
  signatureSourceLabel,
} from './types/verification.js';

// Diagnostic sink interface and in-memory implementation
export type { DiagnosticSink, HalDiagnostic } from './logging/diagnostic-sink.js';
export { MemoryDiagnosticSink } from './logging/diagnostic-sink.js';

// Implementations
export {
  DEFAULT_INTERNAL_ALLOW_LIST,
  DEFAULT_MANIFEST_ENTRIES,
  DEFAULT_SIMULATED_MISMATCHES,
  ModuleManifest,
  createDefaultManifest,
} from './manifest/module-manifest.js';
export type { VerificationContext } from './verification/verify.js';
export { calculateLocalSignature, verifyModuleSignature } from './verification/verify.js';
export type { MockHalOptions } from './mock/mock-hal.js';
export { MOCK_HAL_SOURCE, MockHal } from './mock/mock-hal.js';

/**
 * SoulDOS HAL — Verification Types
 *
 * Defines the signature sources a module can be checked against and the
 * tri-state outcome of a check.
 *
 * An unknown module or an unknown source is not the same thing as a failed
 * comparison, so the outcome is never collapsed into a boolean.
 */

// ---------------------------------------------------------------------------
// Signature Sources
// ---------------------------------------------------------------------------

/**
 * The trust sources recognized by the HAL.
 *
 * verifyModuleSignature() accepts any string as its source selector; a value
 * outside this enum is valid input and yields a VerificationStatus.Error.
 */
export enum SignatureSource {
  /** Simulated blockchain ledger: manifest lookup plus signature comparison. */
  Ledger = 'ledger',
  /** Internal manifest: membership in the manifest or the internal allow-list. */
  Internal = 'internal',
}

const SOURCE_LABELS: Readonly<Record<SignatureSource, string>> = {
  [SignatureSource.Ledger]: 'Simulated Blockchain Ledger',
  [SignatureSource.Internal]: 'Internal Manifest',
};

export function isSignatureSource(value: string): value is SignatureSource {
  return value === SignatureSource.Ledger || value === SignatureSource.Internal;
}

/**
 * Human-readable label for a source selector. Unrecognized selectors are
 * returned unchanged.
 */
export function signatureSourceLabel(source: string): string {
  return isSignatureSource(source) ? SOURCE_LABELS[source] : source;
}

// ---------------------------------------------------------------------------
// Verification Outcome
// ---------------------------------------------------------------------------

export enum VerificationStatus {
  /** The module is trusted by the selected source. */
  Verified = 'Verified',
  /** The module is listed but its local signature does not match. */
  Failed = 'Failed',
  /** The check could not be performed (unlisted module, unknown source). */
  Error = 'Error',
}

export interface VerifiedOutcome {
  readonly status: VerificationStatus.Verified;
  readonly moduleName: string;
  readonly source: string;
}

export interface FailedOutcome {
  readonly status: VerificationStatus.Failed;
  readonly moduleName: string;
  readonly source: string;
  readonly expectedSignature: string;
  readonly calculatedSignature: string;
}

export interface ErrorOutcome {
  readonly status: VerificationStatus.Error;
  readonly moduleName: string;
  readonly source: string;
  /** Operator-facing reason, printed verbatim by the shell. */
  readonly reason: string;
}

/**
 * Result of a single module signature check.
 * A discriminated union on `status`.
 */
export type VerificationOutcome = VerifiedOutcome | FailedOutcome | ErrorOutcome;

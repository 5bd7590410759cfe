/**
 * SoulDOS HAL — Module Signature Verification
 *
 * Resolves a (module, source) pair to a tri-state VerificationOutcome.
 *
 * Branch order is fixed:
 *   1. source selector
 *   2. manifest / allow-list membership
 *   3. signature comparison (ledger only)
 *
 * The function is pure over its inputs. Its only side effect is the
 * diagnostic trail handed to `context.trace`.
 */

import type { ReadonlyModuleManifest } from '../types/manifest.js';
import {
  SignatureSource,
  VerificationStatus,
  signatureSourceLabel,
} from '../types/verification.js';
import type { VerificationOutcome } from '../types/verification.js';

export interface VerificationContext {
  readonly manifest: ReadonlyModuleManifest;
  /** Extra identifiers accepted by the internal source. */
  readonly internalAllowList: ReadonlyArray<string>;
  /** Simulated local signatures; see DEFAULT_SIMULATED_MISMATCHES. */
  readonly simulatedMismatches: ReadonlyMap<string, string>;
  /** Receives one message per diagnostic step. */
  readonly trace?: ((message: string) => void) | undefined;
}

export function verifyModuleSignature(
  moduleName: string,
  source: string,
  context: VerificationContext,
): VerificationOutcome {
  const trace = context.trace ?? (() => undefined);
  const label = signatureSourceLabel(source);

  if (source === SignatureSource.Ledger) {
    trace(`Accessing ledger manifest for module '${moduleName}' via '${label}'...`);

    const entry = context.manifest.get(moduleName);
    if (entry === undefined) {
      trace(`Module '${moduleName}' not found in ledger manifest.`);
      return {
        status: VerificationStatus.Error,
        moduleName,
        source,
        reason: `Module '${moduleName}' not listed in the simulated blockchain ledger.`,
      };
    }

    trace(`Found entry. Expected signature (from ${entry.provenanceUrl}): ${entry.expectedSignature}`);

    const calculated = calculateLocalSignature(moduleName, entry.expectedSignature, context.simulatedMismatches);
    trace(`Calculated local signature for '${moduleName}': ${calculated}`);

    if (calculated === entry.expectedSignature) {
      trace(`Signature VERIFIED for '${moduleName}'.`);
      return { status: VerificationStatus.Verified, moduleName, source };
    }

    trace(
      `SIGNATURE MISMATCH for '${moduleName}'! ` +
      `Expected '${entry.expectedSignature}', got '${calculated}'.`,
    );
    return {
      status: VerificationStatus.Failed,
      moduleName,
      source,
      expectedSignature: entry.expectedSignature,
      calculatedSignature: calculated,
    };
  }

  if (source === SignatureSource.Internal) {
    trace(`Performing internal integrity check for core module '${moduleName}' against '${label}'...`);

    if (context.manifest.has(moduleName) || context.internalAllowList.includes(moduleName)) {
      trace(`Core module '${moduleName}' integrity VERIFIED internally.`);
      return { status: VerificationStatus.Verified, moduleName, source };
    }

    trace(`Core module '${moduleName}' not recognized for internal check.`);
    return {
      status: VerificationStatus.Error,
      moduleName,
      source,
      reason: `Core module '${moduleName}' not recognized for internal check.`,
    };
  }

  return {
    status: VerificationStatus.Error,
    moduleName,
    source,
    reason: `Unknown signature source: ${source}`,
  };
}

/**
 * Simulated "local" signature of an installed module.
 *
 * PLACEHOLDER: returns the mismatch-table value when one is registered,
 * otherwise the expected signature itself.
 */
export function calculateLocalSignature(
  moduleName: string,
  expectedSignature: string,
  simulatedMismatches: ReadonlyMap<string, string>,
): string {
  return simulatedMismatches.get(moduleName) ?? expectedSignature;
}

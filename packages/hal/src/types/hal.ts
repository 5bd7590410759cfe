/**
 * SoulDOS HAL — Interface Contract
 *
 * HalInterface is the single boundary between the shell and the hardware
 * layer. The shell never reaches past it; every value it prints comes back
 * through one of these methods.
 *
 * No method throws. Operations that can fail return a HalResult; module
 * verification returns its own tri-state VerificationOutcome.
 */

import type { VerificationOutcome } from './verification.js';

/**
 * Result of a HAL operation.
 * A discriminated union: either the value or an operator-facing error string.
 */
export type HalResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: string };

export function halOk<T>(value: T): HalResult<T> {
  return { ok: true, value };
}

export function halErr<T = never>(error: string): HalResult<T> {
  return { ok: false, error };
}

/** Placeholder tensor payload. Carries a textual description only. */
export interface TensorData {
  readonly info: string;
}

/** Names of the HAL operations, used to attribute diagnostics. */
export type HalOperation =
  | 'getSystemStatus'
  | 'verifyModuleSignature'
  | 'getEmotionalMap'
  | 'collapseTruthWaveform'
  | 'initializeNpu'
  | 'runOnnxModel';

export interface HalInterface {
  getSystemStatus(): HalResult<string>;

  /**
   * Check a module against a trust source.
   *
   * @param signatureSource - a SignatureSource value; any other string
   *   produces an Error outcome
   */
  verifyModuleSignature(moduleName: string, signatureSource: string): VerificationOutcome;

  getEmotionalMap(): HalResult<ReadonlyArray<string>>;

  collapseTruthWaveform(emotion: string, mode: string, timeVector: string): HalResult<string>;

  initializeNpu(): HalResult<string>;

  runOnnxModel(modelPath: string, inputs: TensorData): HalResult<TensorData>;
}

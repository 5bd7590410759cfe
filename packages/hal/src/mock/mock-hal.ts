/**
 * SoulDOS HAL — Mock Implementation
 *
 * MockHal is the only HalInterface implementation. Every method returns a
 * fixed or lightly templated value; module verification runs the manifest
 * lookup in ../verification/verify.ts.
 *
 * Diagnostics go to the injected DiagnosticSink under the source name
 * `MockHAL`. Without a sink they are dropped.
 */

import type { DiagnosticSink } from '../logging/diagnostic-sink.js';
import {
  DEFAULT_INTERNAL_ALLOW_LIST,
  DEFAULT_SIMULATED_MISMATCHES,
  createDefaultManifest,
} from '../manifest/module-manifest.js';
import { halOk } from '../types/hal.js';
import type { HalInterface, HalOperation, HalResult, TensorData } from '../types/hal.js';
import type { ReadonlyModuleManifest } from '../types/manifest.js';
import type { VerificationOutcome } from '../types/verification.js';
import { verifyModuleSignature } from '../verification/verify.js';

export const MOCK_HAL_SOURCE = 'MockHAL';

export interface MockHalOptions {
  readonly sink?: DiagnosticSink | undefined;
  readonly manifest?: ReadonlyModuleManifest | undefined;
  readonly internalAllowList?: ReadonlyArray<string> | undefined;
  readonly simulatedMismatches?: ReadonlyMap<string, string> | undefined;
}

export class MockHal implements HalInterface {
  private readonly sink: DiagnosticSink | undefined;
  private readonly manifest: ReadonlyModuleManifest;
  private readonly internalAllowList: ReadonlyArray<string>;
  private readonly simulatedMismatches: ReadonlyMap<string, string>;

  constructor(options: MockHalOptions = {}) {
    this.sink = options.sink;
    this.manifest = options.manifest ?? createDefaultManifest();
    this.internalAllowList = options.internalAllowList ?? DEFAULT_INTERNAL_ALLOW_LIST;
    this.simulatedMismatches = options.simulatedMismatches ?? DEFAULT_SIMULATED_MISMATCHES;
  }

  getSystemStatus(): HalResult<string> {
    return halOk('MockStatus: System Optimal, Resonance Field Stable.');
  }

  verifyModuleSignature(moduleName: string, signatureSource: string): VerificationOutcome {
    return verifyModuleSignature(moduleName, signatureSource, {
      manifest: this.manifest,
      internalAllowList: this.internalAllowList,
      simulatedMismatches: this.simulatedMismatches,
      trace: (message) => this.emit('verifyModuleSignature', message),
    });
  }

  getEmotionalMap(): HalResult<ReadonlyArray<string>> {
    return halOk(['Joy: Bright Cloud', 'Sadness: Blue Mist']);
  }

  collapseTruthWaveform(emotion: string, mode: string, timeVector: string): HalResult<string> {
    this.emit(
      'collapseTruthWaveform',
      `Collapsing truth waveform for emotion '${emotion}', mode '${mode}', time_vector '${timeVector}'`,
    );
    return halOk("MockHAL: Waveform collapsed to 'MockMemoryNode'");
  }

  initializeNpu(): HalResult<string> {
    return halOk('MockHAL: NPU initialized and ready for ONNX models.');
  }

  runOnnxModel(modelPath: string, inputs: TensorData): HalResult<TensorData> {
    this.emit('runOnnxModel', `Running ONNX model ${modelPath} with input info: '${inputs.info}'`);
    return halOk({ info: `MockHAL: ONNX model ${modelPath} processed with input ${inputs.info}` });
  }

  private emit(operation: HalOperation, message: string): void {
    this.sink?.append({ source: MOCK_HAL_SOURCE, operation, message });
  }
}

/**
 * SoulDOS HAL — MockHal Tests
 *
 * Isolation: diagnostics are collected with MemoryDiagnosticSink.
 */

import { describe, it, expect } from 'vitest';
import { MemoryDiagnosticSink, MockHal, ModuleManifest, VerificationStatus } from '../src/index.js';

describe('MockHal', () => {
  it('returns the canned system status', () => {
    expect(new MockHal().getSystemStatus()).toEqual({
      ok: true,
      value: 'MockStatus: System Optimal, Resonance Field Stable.',
    });
  });

  it('returns the emotional map', () => {
    expect(new MockHal().getEmotionalMap()).toEqual({
      ok: true,
      value: ['Joy: Bright Cloud', 'Sadness: Blue Mist'],
    });
  });

  it('initializes the NPU', () => {
    expect(new MockHal().initializeNpu()).toEqual({
      ok: true,
      value: 'MockHAL: NPU initialized and ready for ONNX models.',
    });
  });

  it('collapses the truth waveform and records the arguments', () => {
    const sink = new MemoryDiagnosticSink();
    const result = new MockHal({ sink }).collapseTruthWaveform('joy', 'focus', 'now');
    expect(result).toEqual({ ok: true, value: "MockHAL: Waveform collapsed to 'MockMemoryNode'" });
    expect(sink.entries).toEqual([
      {
        source: 'MockHAL',
        operation: 'collapseTruthWaveform',
        message: "Collapsing truth waveform for emotion 'joy', mode 'focus', time_vector 'now'",
      },
    ]);
  });

  it('templates the ONNX output from its inputs', () => {
    const sink = new MemoryDiagnosticSink();
    const result = new MockHal({ sink }).runOnnxModel('models/test.onnx', { info: '1x3x224x224' });
    expect(result).toEqual({
      ok: true,
      value: { info: 'MockHAL: ONNX model models/test.onnx processed with input 1x3x224x224' },
    });
    expect(sink.messages()).toEqual([
      "Running ONNX model models/test.onnx with input info: '1x3x224x224'",
    ]);
  });

  it('routes verification diagnostics to the sink', () => {
    const sink = new MemoryDiagnosticSink();
    const outcome = new MockHal({ sink }).verifyModuleSignature('HAL_Interface', 'internal');
    expect(outcome.status).toBe(VerificationStatus.Verified);
    expect(sink.entries.map((e) => e.operation)).toEqual(['verifyModuleSignature', 'verifyModuleSignature']);
    expect(sink.messages()[1]).toBe("Core module 'HAL_Interface' integrity VERIFIED internally.");
  });

  it('works without a sink', () => {
    const outcome = new MockHal().verifyModuleSignature('UserInterfaceModule', 'ledger');
    expect(outcome.status).toBe(VerificationStatus.Failed);
  });

  it('uses an injected manifest and allow-list', () => {
    const hal = new MockHal({
      manifest: new ModuleManifest([
        { moduleName: 'TestModule', expectedSignature: 'sig-test', provenanceUrl: 'gh://test/m' },
      ]),
      internalAllowList: ['BootLoader'],
    });
    expect(hal.verifyModuleSignature('TestModule', 'ledger').status).toBe(VerificationStatus.Verified);
    expect(hal.verifyModuleSignature('SoulOS_Core', 'ledger').status).toBe(VerificationStatus.Error);
    expect(hal.verifyModuleSignature('BootLoader', 'internal').status).toBe(VerificationStatus.Verified);
    expect(hal.verifyModuleSignature('HAL_Interface', 'internal').status).toBe(VerificationStatus.Error);
  });

  it('clears collected diagnostics', () => {
    const sink = new MemoryDiagnosticSink();
    new MockHal({ sink }).runOnnxModel('m', { info: 'i' });
    sink.clear();
    expect(sink.entries).toHaveLength(0);
  });
});

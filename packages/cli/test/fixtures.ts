/**
 * Shared fixtures for the CLI tests.
 *
 * Output is rendered with a color level 0 theme so assertions compare
 * plain text.
 */

import { Writable } from 'node:stream'
import { Chalk } from 'chalk'
import { MockHal, VerificationStatus, halErr } from '@souldos/hal'
import type { HalInterface, HalResult, TensorData, VerificationOutcome } from '@souldos/hal'
import type { ShellConfig } from '../src/config.js'
import type { OutputWriter, ShellContext } from '../src/tui/context.js'
import { ConsoleDiagnosticSink } from '../src/tui/output/diagnostics.js'
import { createTheme } from '../src/tui/theme.js'

export const plain = createTheme(new Chalk({ level: 0 }))

/** 2026-01-05 09:07:03 local time. */
export const FIXED_NOW = (): Date => new Date(2026, 0, 5, 9, 7, 3)

export const TEST_CONFIG: ShellConfig = { historySize: 50, halTrace: false, colorLevel: 0 }

export class MemoryWriter implements OutputWriter {
  text = ''

  write(chunk: string): void {
    this.text += chunk
  }

  lines(): string[] {
    return this.text.split('\n')
  }
}

/** A Writable stream that keeps everything written to it. */
export function memoryStream(): { stream: Writable; text: () => string } {
  let text = ''
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      text += chunk.toString()
      callback()
    },
  })
  return { stream, text: () => text }
}

/** Context over MockHal; `trace` wires HAL diagnostics into the same output. */
export function makeContext(options: { trace?: boolean; hal?: HalInterface } = {}): {
  ctx: ShellContext
  out: MemoryWriter
} {
  const out = new MemoryWriter()
  const hal = options.hal ?? new MockHal({
    sink: options.trace === true ? new ConsoleDiagnosticSink(out, plain) : undefined,
  })
  return { ctx: { hal, out, t: plain, now: FIXED_NOW }, out }
}

/** A HAL whose every operation fails. */
export class BrokenHal implements HalInterface {
  getSystemStatus(): HalResult<string> {
    return halErr('sensor offline')
  }

  verifyModuleSignature(moduleName: string, signatureSource: string): VerificationOutcome {
    return {
      status: VerificationStatus.Error,
      moduleName,
      source: signatureSource,
      reason: 'manifest unavailable',
    }
  }

  getEmotionalMap(): HalResult<ReadonlyArray<string>> {
    return halErr('field collapsed')
  }

  collapseTruthWaveform(): HalResult<string> {
    return halErr('no waveform')
  }

  initializeNpu(): HalResult<string> {
    return halErr('npu missing')
  }

  runOnnxModel(): HalResult<TensorData> {
    return halErr('model not found')
  }
}

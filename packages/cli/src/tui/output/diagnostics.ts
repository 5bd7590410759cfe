import type { DiagnosticSink, HalDiagnostic } from '@souldos/hal'
import type { OutputWriter } from '../context.js'
import type { Theme } from '../theme.js'

/**
 * ConsoleDiagnosticSink — writes HAL diagnostics to the shell output.
 *
 * One muted line per entry, prefixed with the producing implementation:
 *   MockHAL: Signature VERIFIED for 'TensorMemoryDriver'.
 */
export class ConsoleDiagnosticSink implements DiagnosticSink {
  constructor(
    private readonly out: OutputWriter,
    private readonly t: Theme,
  ) {}

  append(entry: HalDiagnostic): void {
    this.out.write(this.t.muted(`${entry.source}: ${entry.message}`) + '\n')
  }
}

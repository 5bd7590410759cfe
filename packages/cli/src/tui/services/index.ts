import { MockHal } from '@souldos/hal'
import type { HalInterface } from '@souldos/hal'
import type { OutputWriter } from '../context.js'
import { ConsoleDiagnosticSink } from '../output/diagnostics.js'
import type { Theme } from '../theme.js'

export interface HalServiceOptions {
  readonly out: OutputWriter
  readonly t: Theme
  /** When false, HAL diagnostics are dropped instead of printed. */
  readonly trace: boolean
}

/**
 * createHalService — the single HAL instance used by the shell.
 *
 * This is the only place that names a HalInterface implementation.
 * Nothing else in the shell references MockHal directly.
 */
export function createHalService(options: HalServiceOptions): HalInterface {
  return new MockHal({
    sink: options.trace ? new ConsoleDiagnosticSink(options.out, options.t) : undefined,
  })
}

export type { HalInterface } from '@souldos/hal'

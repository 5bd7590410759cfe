import type { HalInterface } from '@souldos/hal'
import type { Theme } from './theme.js'

/** Anything text can be written to. process.stdout satisfies it. */
export interface OutputWriter {
  write(text: string): unknown
}

/**
 * ShellContext — everything a command needs to produce its output.
 *
 * Immutable for the lifetime of the shell. Commands read from the HAL and
 * write to `out`; none of them change the context.
 */
export interface ShellContext {
  readonly hal: HalInterface
  readonly out: OutputWriter
  readonly t: Theme
  readonly now: () => Date
}

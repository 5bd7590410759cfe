/**
 * shell.ts — SoulDOS interactive readline shell.
 *
 * Two states, strictly alternating:
 *
 *   READING      readline owns the input stream and waits for a line.
 *   DISPATCHING  the line is parsed by the Commander grammar and the
 *                command runs to completion, writing to the output.
 *
 * Every command is synchronous, so a line is fully handled before the
 * next 'line' event is processed. The loop ends on exit/quit, end of
 * input, an input stream error, or Ctrl+C on a terminal.
 */

import * as readline from 'node:readline'
import { Chalk } from 'chalk'
import type { HalInterface } from '@souldos/hal'
import { parseCommandLine } from '../commands/index.js'
import { resolveShellConfig } from '../config.js'
import type { ShellConfig } from '../config.js'
import { runBootSequence } from './boot.js'
import type { OutputWriter, ShellContext } from './context.js'
import { dispatchCommand } from './dispatch.js'
import { buildPS1 } from './prompt.js'
import { createHalService } from './services/index.js'
import { createTheme, t as defaultTheme } from './theme.js'
import type { Theme } from './theme.js'

export type ShellExitReason = 'quit' | 'eof' | 'input-error' | 'interrupt'

export type ShellInput = NodeJS.ReadableStream & { readonly isTTY?: boolean | undefined }

export interface ShellOptions {
  readonly input?: ShellInput | undefined
  readonly output?: NodeJS.WritableStream | undefined
  readonly errorOutput?: OutputWriter | undefined
  /** Defaults to the HAL service, wired to the output. */
  readonly hal?: HalInterface | undefined
  readonly theme?: Theme | undefined
  readonly now?: (() => Date) | undefined
  readonly config?: ShellConfig | undefined
}

const EXIT_WORDS = new Set(['exit', 'quit'])

function printParseError(ctx: ShellContext, message: string): void {
  ctx.out.write(
    '\n  ' + ctx.t.red(message) +
    '\n  ' + ctx.t.dim("type 'help' for available commands") + '\n',
  )
}

/**
 * handleLine — process one input line.
 *
 * Returns 'exit' for exit/quit (any case) and 'continue' otherwise.
 * An empty line produces no output.
 */
export function handleLine(line: string, ctx: ShellContext): 'continue' | 'exit' {
  const input = line.trim()

  if (input === '') return 'continue'
  if (EXIT_WORDS.has(input.toLowerCase())) return 'exit'

  const parsed = parseCommandLine(input)
  switch (parsed.kind) {
    case 'displayed':
      ctx.out.write(parsed.output)
      break
    case 'error':
      printParseError(ctx, parsed.message)
      break
    case 'command':
      try {
        dispatchCommand(parsed.command, ctx)
      } catch (err) {
        ctx.out.write('\n  ' + ctx.t.red(String(err)) + '\n')
      }
      break
  }
  return 'continue'
}

function resolveTheme(options: ShellOptions, config: ShellConfig): Theme {
  if (options.theme !== undefined) return options.theme
  if (config.colorLevel !== undefined) return createTheme(new Chalk({ level: config.colorLevel }))
  return defaultTheme
}

/**
 * launchShell — run the boot sequence, then the read-dispatch loop.
 *
 * Resolves with the reason the loop ended; never rejects on user input.
 */
export function launchShell(options: ShellOptions = {}): Promise<ShellExitReason> {
  const config      = options.config ?? resolveShellConfig()
  const input       = options.input ?? process.stdin
  const output      = options.output ?? process.stdout
  const errorOutput = options.errorOutput ?? process.stderr
  const t           = resolveTheme(options, config)

  const ctx: ShellContext = {
    hal: options.hal ?? createHalService({ out: output, t, trace: config.halTrace }),
    out: output,
    t,
    now: options.now ?? (() => new Date()),
  }

  runBootSequence(ctx)

  const terminal = input.isTTY === true
  const ps1      = buildPS1(t)

  const rl = readline.createInterface({
    input,
    terminal,
    historySize: config.historySize,
    ...(terminal ? { output } : {}),
  })
  rl.setPrompt(ps1)

  // Written directly rather than through rl.prompt(), which only reaches
  // the output in terminal mode.
  const showPrompt = (): void => {
    output.write('\n' + ps1)
  }

  return new Promise<ShellExitReason>((resolve) => {
    let reason: ShellExitReason = 'eof'
    let finished = false

    const finish = (why: ShellExitReason): void => {
      if (finished) return
      finished = true
      reason = why
      rl.close()
    }

    rl.on('line', (line: string) => {
      // readline may still deliver lines buffered before close().
      if (finished) return
      if (handleLine(line, ctx) === 'exit') {
        finish('quit')
        return
      }
      showPrompt()
    })

    rl.on('SIGINT', () => {
      output.write('\n')
      finish('interrupt')
    })

    const onInputError = (err: unknown): void => {
      if (finished) return
      const message = err instanceof Error ? err.message : String(err)
      errorOutput.write(t.red(`input stream error: ${message}`) + '\n')
      finish('input-error')
    }
    rl.on('error', onInputError)
    input.on('error', onInputError)

    rl.on('close', () => {
      finished = true
      input.removeListener('error', onInputError)
      resolve(reason)
    })

    showPrompt()
  })
}

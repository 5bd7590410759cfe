/**
 * commands/index.ts — the line-command grammar.
 *
 * Every input line is parsed by a fresh Commander program built here.
 * Commander never exits the process: exitOverride() turns its exits into
 * CommanderError, and configureOutput() captures the text it would print.
 *
 * Tokens are case-sensitive. Excess arguments are rejected.
 */

import { Command, CommanderError } from 'commander'
import type { LineParseResult, ShellCommand } from './types.js'

export type { LineParseResult, ShellCommand, ShellCommandKind } from './types.js'

export const PROGRAM_NAME = 'souldos'
export const VERSION      = '0.0.1-alpha'
export const DESCRIPTION  = 'CLI for SoulWare OS'

interface ProgramOutput {
  writeOut: (text: string) => void
  writeErr: (text: string) => void
}

/**
 * buildLineProgram — construct the Commander program for one input line.
 *
 * `onCommand` receives the parsed ShellCommand from the matching action.
 */
export function buildLineProgram(
  onCommand: (command: ShellCommand) => void,
  output: ProgramOutput,
): Command {
  const program = new Command(PROGRAM_NAME)
    .description(DESCRIPTION)
    .version(VERSION)
    .exitOverride()
    .configureOutput(output)
    .allowExcessArguments(false)

  const line = (name: string, description: string): Command =>
    program.command(name).description(description).allowExcessArguments(false)

  line('help', 'Displays help information')
    .action(() => onCommand({ kind: 'help' }))

  line('ver', 'Displays version information')
    .action(() => onCommand({ kind: 'ver' }))

  line('date', 'Displays the current date')
    .action(() => onCommand({ kind: 'date' }))

  line('time', 'Displays the current time')
    .action(() => onCommand({ kind: 'time' }))

  line('cls', 'Clears the screen')
    .alias('clear')
    .action(() => onCommand({ kind: 'clear' }))

  line('ls', 'Lists directory contents or module status (placeholder)')
    .alias('dir')
    .action(() => onCommand({ kind: 'list' }))

  line('status', 'Displays system status or memory resonance')
    .alias('mem')
    .action(() => onCommand({ kind: 'status' }))

  line('check-module-integrity', 'Checks the integrity of a module against the ledger')
    .argument('[module_name]', 'module to verify')
    .action((moduleName: string | undefined) => onCommand({ kind: 'check-module-integrity', moduleName }))

  line('system-integrity-check', 'Performs a system integrity check')
    .action(() => onCommand({ kind: 'system-integrity-check' }))

  line('ping', 'Pings the system')
    .action(() => onCommand({ kind: 'ping' }))

  line('init-npu', 'Initializes the NPU')
    .action(() => onCommand({ kind: 'init-npu' }))

  line('map-emotion', 'Gets the emotional map')
    .action(() => onCommand({ kind: 'map-emotion' }))

  line('collapse-truth', 'Collapses a truth waveform')
    .argument('<emotion>')
    .argument('<mode>')
    .argument('<time>')
    .action((emotion: string, mode: string, time: string) =>
      onCommand({ kind: 'collapse-truth', emotion, mode, time }))

  line('run-onnx-test', 'Runs a test ONNX model')
    .argument('<model_path>')
    .argument('<input_info>')
    .action((modelPath: string, inputInfo: string) =>
      onCommand({ kind: 'run-onnx-test', modelPath, inputInfo }))

  return program
}

/** Split an input line on runs of whitespace. */
export function tokenize(line: string): string[] {
  const trimmed = line.trim()
  return trimmed === '' ? [] : trimmed.split(/\s+/)
}

/**
 * parseCommandLine — match one input line against the grammar.
 *
 * Never throws for user input. Commander's exits become `displayed`
 * (help and version text, exit code 0) or `error` (everything else).
 */
export function parseCommandLine(line: string): LineParseResult {
  const parsed: ShellCommand[] = []
  let out = ''
  let err = ''

  const program = buildLineProgram((command) => { parsed.push(command) }, {
    writeOut: (text) => { out += text },
    writeErr: (text) => { err += text },
  })

  try {
    program.parse(tokenize(line), { from: 'user' })
  } catch (e) {
    if (!(e instanceof CommanderError)) throw e
    // Help requested without a subcommand is written to the error stream.
    if (e.exitCode === 0 || e.code === 'commander.help') {
      return { kind: 'displayed', output: out + err }
    }
    return { kind: 'error', message: e.message }
  }

  const command = parsed[0]
  if (command === undefined) {
    return { kind: 'error', message: `error: no command in '${line.trim()}'` }
  }
  return { kind: 'command', command }
}

/**
 * buildProcessProgram — the Commander program for process arguments.
 *
 * The binary takes no subcommands and no options beyond --help and
 * --version; `action` starts the interactive shell.
 */
export function buildProcessProgram(action: () => Promise<void>): Command {
  return new Command(PROGRAM_NAME)
    .description(
      DESCRIPTION + '\n' +
      'Starts the interactive SoulDOS shell. Type \'help\' at the prompt for commands.',
    )
    .version(VERSION)
    .allowExcessArguments(false)
    .action(action)
}

#!/usr/bin/env node
/**
 * bin/souldos.ts — entry point for the `souldos` command.
 *
 * Process arguments go through Commander, which handles --help and
 * --version and rejects anything else. With no arguments the interactive
 * shell starts; the process exits once the shell loop ends.
 *
 *   souldos            → boot sequence, then the SoulDOS> prompt
 *   souldos --version  → 0.0.1-alpha
 */

import { t } from '../tui/theme.js'
import { buildProcessProgram } from '../commands/index.js'
import { resolveShellConfig } from '../config.js'

const program = buildProcessProgram(async () => {
  const config = resolveShellConfig()
  const { launchShell } = await import('../tui/shell.js')
  const reason = await launchShell({ config })
  process.exitCode = reason === 'input-error' ? 1 : 0
})

try {
  await program.parseAsync()
} catch (err) {
  const message = err instanceof Error ? err.message : String(err)
  process.stderr.write(t.red(`[ERROR] ${message}`) + '\n')
  process.exitCode = 1
}

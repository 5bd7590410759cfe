/**
 * config.ts — shell configuration resolution.
 *
 * Each setting resolves with the following precedence:
 *
 *   1. Explicit override passed to resolveShellConfig()
 *   2. Environment variable
 *   3. Default
 *
 *   SOULDOS_HISTORY_SIZE   readline history length (positive integer, default 50)
 *   SOULDOS_HAL_TRACE      '0' | 'false' | 'off' hides HAL diagnostics (default on)
 *   NO_COLOR               any non-empty value disables color
 *
 * The boot sequence and the command set are not configurable.
 */

import type { ColorSupportLevel } from 'chalk'
import { ConfigError } from './errors.js'

export interface ShellConfig {
  readonly historySize: number
  readonly halTrace: boolean
  /** Forced color level; undefined leaves detection to chalk. */
  readonly colorLevel: ColorSupportLevel | undefined
}

export const DEFAULT_HISTORY_SIZE = 50

const FALSE_VALUES = new Set(['0', 'false', 'off', 'no'])
const TRUE_VALUES  = new Set(['1', 'true', 'on', 'yes'])

function parseHistorySize(raw: string): number {
  const trimmed = raw.trim()
  const n = Number(trimmed)
  if (trimmed === '' || !Number.isInteger(n) || n <= 0) {
    throw new ConfigError('SOULDOS_HISTORY_SIZE', raw, 'a positive integer')
  }
  return n
}

function parseFlag(variable: string, raw: string): boolean {
  const v = raw.trim().toLowerCase()
  if (FALSE_VALUES.has(v)) return false
  if (TRUE_VALUES.has(v)) return true
  throw new ConfigError(variable, raw, 'one of 0, 1, true, false, on, off, yes, no')
}

/**
 * resolveShellConfig — read the shell settings once at startup.
 *
 * @throws {ConfigError} when an environment variable is set to an unusable value
 */
export function resolveShellConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<ShellConfig> = {},
): ShellConfig {
  const rawHistory = env['SOULDOS_HISTORY_SIZE']
  const rawTrace   = env['SOULDOS_HAL_TRACE']
  const noColor    = env['NO_COLOR']

  return {
    historySize:
      overrides.historySize ??
      (rawHistory !== undefined ? parseHistorySize(rawHistory) : DEFAULT_HISTORY_SIZE),
    halTrace:
      overrides.halTrace ??
      (rawTrace !== undefined ? parseFlag('SOULDOS_HAL_TRACE', rawTrace) : true),
    colorLevel:
      overrides.colorLevel ??
      (noColor !== undefined && noColor !== '' ? 0 : undefined),
  }
}

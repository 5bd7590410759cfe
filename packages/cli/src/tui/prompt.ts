import type { Theme } from './theme.js'

/**
 * buildPS1 — construct the colored prompt string.
 *
 * Format: SoulDOS>
 */
export function buildPS1(t: Theme): string {
  return t.blue.bold('SoulDOS') + t.blueDim('> ')
}

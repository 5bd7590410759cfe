import chalk, { type ChalkInstance } from 'chalk'
import { VerificationStatus } from '@souldos/hal'

export function createTheme(c: ChalkInstance) {
  return {
    blue:       c.hex('#4FC3F7'),
    blueBright: c.hex('#81D4FA'),
    blueDim:    c.hex('#0277BD'),
    text:       c.hex('#C8C8C0'),
    white:      c.hex('#F2F2EC'),
    dim:        c.hex('#444444'),
    muted:      c.hex('#666666'),
    amber:      c.hex('#D4880A'),
    green:      c.hex('#81C784'),
    red:        c.hex('#CF6679'),
  } as const
}

export type Theme = ReturnType<typeof createTheme>

export const t: Theme = createTheme(chalk)

export const statusColor = (theme: Theme, status: VerificationStatus): ChalkInstance => {
  switch (status) {
    case VerificationStatus.Verified: return theme.green
    case VerificationStatus.Failed:   return theme.red
    case VerificationStatus.Error:    return theme.amber
  }
}

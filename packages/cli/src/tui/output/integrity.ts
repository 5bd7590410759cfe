import { SignatureSource, VerificationStatus, signatureSourceLabel } from '@souldos/hal'
import type { VerificationOutcome } from '@souldos/hal'
import type { ShellContext } from '../context.js'
import { statusColor } from '../theme.js'

/** Modules checked against the internal manifest, at boot and on demand. */
export const INTERNAL_CHECK_MODULES: ReadonlyArray<string> = [
  'SoulOS_Core',
  'TensorMemoryDriver',
  'HAL_Interface',
]

/**
 * Modules checked against the ledger by system-integrity-check. The last two
 * exercise the simulated mismatch and the unlisted-module path.
 */
export const LEDGER_CHECK_MODULES: ReadonlyArray<string> = [
  'EmotionalResonanceEngine',
  'UserInterfaceModule',
  'NonExistentModule',
]

/** VERIFIED | FAILED | ERROR - <reason>, colored by status. */
export function formatVerdict(ctx: ShellContext, outcome: VerificationOutcome): string {
  const color = statusColor(ctx.t, outcome.status)
  switch (outcome.status) {
    case VerificationStatus.Verified: return color('VERIFIED')
    case VerificationStatus.Failed:   return color('FAILED')
    case VerificationStatus.Error:    return color('ERROR - ' + outcome.reason)
  }
}

/**
 * renderModuleCheck — `check-module-integrity <module_name>`.
 *
 * Verifies one module against the ledger. HAL diagnostics land between the
 * header and the result line.
 */
export function renderModuleCheck(ctx: ShellContext, moduleName: string | undefined): void {
  const { t } = ctx

  if (moduleName === undefined) {
    ctx.out.write(t.amber('Usage: check-module-integrity <module_name>') + '\n')
    return
  }

  const label = signatureSourceLabel(SignatureSource.Ledger)
  ctx.out.write('\n' + t.text(`Verifying module '${moduleName}' using ${label}...`) + '\n')

  const outcome = ctx.hal.verifyModuleSignature(moduleName, SignatureSource.Ledger)

  if (outcome.status === VerificationStatus.Error) {
    ctx.out.write(t.red(`Error during verification for '${moduleName}': ${outcome.reason}`) + '\n')
    return
  }

  ctx.out.write(
    t.text(`Verification Result for '${moduleName}': `) + formatVerdict(ctx, outcome) + '\n',
  )
}

function renderCheckLine(ctx: ShellContext, moduleName: string, source: SignatureSource): void {
  const outcome = ctx.hal.verifyModuleSignature(moduleName, source)
  ctx.out.write(
    '  ' +
    ctx.t.text(`Checking '${moduleName}' (source: ${signatureSourceLabel(source)}): `) +
    formatVerdict(ctx, outcome) +
    '\n',
  )
}

/**
 * renderSystemIntegrityCheck — `system-integrity-check`.
 *
 * Internal manifest checks first, then ledger checks.
 */
export function renderSystemIntegrityCheck(ctx: ShellContext): void {
  const { t } = ctx

  ctx.out.write('\n' + t.text('Performing comprehensive system integrity check...') + '\n')

  ctx.out.write('\n' + t.blue(`--- ${signatureSourceLabel(SignatureSource.Internal)} Checks ---`) + '\n')
  for (const name of INTERNAL_CHECK_MODULES) {
    renderCheckLine(ctx, name, SignatureSource.Internal)
  }

  ctx.out.write('\n' + t.blue(`--- ${signatureSourceLabel(SignatureSource.Ledger)} Checks ---`) + '\n')
  for (const name of LEDGER_CHECK_MODULES) {
    renderCheckLine(ctx, name, SignatureSource.Ledger)
  }

  ctx.out.write('\n' + t.text('System integrity check complete.') + '\n')
}

/**
 * renderBootCheck — one line of the boot-time internal check.
 *
 *   SoulOS_Core integrity: Verified
 *   GhostModule integrity: Check FAILED - <reason>
 */
export function renderBootCheck(ctx: ShellContext, moduleName: string): void {
  const { t } = ctx
  const outcome = ctx.hal.verifyModuleSignature(moduleName, SignatureSource.Internal)

  let verdict: string
  switch (outcome.status) {
    case VerificationStatus.Verified: verdict = t.green('Verified'); break
    case VerificationStatus.Failed:   verdict = t.red('Check FAILED'); break
    case VerificationStatus.Error:    verdict = t.red('Check FAILED - ' + outcome.reason); break
  }

  ctx.out.write('  ' + t.text(`${moduleName} integrity: `) + verdict + '\n')
}

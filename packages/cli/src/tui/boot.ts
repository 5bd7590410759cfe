import type { ShellContext } from './context.js'
import { renderBanner } from './output/banner.js'
import { INTERNAL_CHECK_MODULES, renderBootCheck } from './output/integrity.js'

/**
 * runBootSequence — the fixed startup routine.
 *
 *   1. banner
 *   2. internal manifest checks (INTERNAL_CHECK_MODULES)
 *   3. one system status fetch
 *   4. one NPU initialization
 *   5. ready line
 *
 * Nothing here is retried. A failed step is printed and the next one runs.
 */
export function runBootSequence(ctx: ShellContext): void {
  const { t } = ctx

  renderBanner(ctx)
  ctx.out.write(t.muted('Initializing System...') + '\n')

  ctx.out.write('\n' + t.text('Performing initial system integrity check...') + '\n')
  for (const name of INTERNAL_CHECK_MODULES) {
    renderBootCheck(ctx, name)
  }

  ctx.out.write('\n' + t.text('Fetching initial system status...') + '\n')
  const status = ctx.hal.getSystemStatus()
  ctx.out.write(
    (status.ok
      ? t.muted('System Status: ') + t.text(status.value)
      : t.red(`Failed to get status: ${status.error}`)) + '\n',
  )

  ctx.out.write('\n' + t.text('Attempting to initialize NPU...') + '\n')
  const npu = ctx.hal.initializeNpu()
  ctx.out.write(
    (npu.ok
      ? t.text(npu.value)
      : t.red(`NPU Initialization Failed: ${npu.error}`)) + '\n',
  )

  ctx.out.write('\n' + t.green("System Initialized. Type 'help' for available commands.") + '\n')
}

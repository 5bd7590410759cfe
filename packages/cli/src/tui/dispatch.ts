import type { ShellCommand } from '../commands/index.js'
import type { ShellContext } from './context.js'
import { renderHelp } from './output/help.js'
import { renderDate, renderTime } from './output/clock.js'
import { renderModuleCheck, renderSystemIntegrityCheck } from './output/integrity.js'
import {
  renderClear,
  renderCollapseTruth,
  renderEmotionalMap,
  renderList,
  renderNpuInit,
  renderOnnxTest,
  renderPing,
  renderStatus,
  renderVersion,
} from './output/system.js'

/**
 * dispatchCommand — run one parsed command against the context.
 *
 * Output only: no command changes the context or the HAL.
 */
export function dispatchCommand(command: ShellCommand, ctx: ShellContext): void {
  switch (command.kind) {
    case 'help':                   return renderHelp(ctx)
    case 'ver':                    return renderVersion(ctx)
    case 'date':                   return renderDate(ctx)
    case 'time':                   return renderTime(ctx)
    case 'clear':                  return renderClear(ctx)
    case 'list':                   return renderList(ctx)
    case 'status':                 return renderStatus(ctx)
    case 'check-module-integrity': return renderModuleCheck(ctx, command.moduleName)
    case 'system-integrity-check': return renderSystemIntegrityCheck(ctx)
    case 'ping':                   return renderPing(ctx)
    case 'init-npu':               return renderNpuInit(ctx)
    case 'map-emotion':            return renderEmotionalMap(ctx)
    case 'collapse-truth':         return renderCollapseTruth(ctx, command.emotion, command.mode, command.time)
    case 'run-onnx-test':          return renderOnnxTest(ctx, command.modelPath, command.inputInfo)
  }
}

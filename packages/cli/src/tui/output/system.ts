import type { ShellContext } from '../context.js'

export const VERSION_LINE = 'SoulWare CLI Version 0.0.1 (Alpha)'
export const CLEAR_SCREEN = '\x1B[2J\x1B[H'

export function renderVersion(ctx: ShellContext): void {
  ctx.out.write(ctx.t.text(VERSION_LINE) + '\n')
}

export function renderClear(ctx: ShellContext): void {
  ctx.out.write(CLEAR_SCREEN)
}

export function renderList(ctx: ShellContext): void {
  ctx.out.write(ctx.t.muted('Placeholder: Listing directory contents or module status...') + '\n')
}

export function renderPing(ctx: ShellContext): void {
  ctx.out.write(ctx.t.green('pong!') + '\n')
}

export function renderStatus(ctx: ShellContext): void {
  const result = ctx.hal.getSystemStatus()
  ctx.out.write(
    (result.ok
      ? ctx.t.text(result.value)
      : ctx.t.red(`Error getting system status: ${result.error}`)) + '\n',
  )
}

export function renderNpuInit(ctx: ShellContext): void {
  const result = ctx.hal.initializeNpu()
  ctx.out.write(
    (result.ok
      ? ctx.t.text(result.value)
      : ctx.t.red(`Error initializing NPU: ${result.error}`)) + '\n',
  )
}

export function renderEmotionalMap(ctx: ShellContext): void {
  const { t } = ctx

  ctx.out.write('\n' + t.text('Fetching emotional map from Tensor Field...') + '\n')

  const result = ctx.hal.getEmotionalMap()
  if (!result.ok) {
    ctx.out.write(t.red(`Error fetching emotional map: ${result.error}`) + '\n')
    return
  }

  let out = t.blue('Current Emotional Map in Tensor Field:') + '\n'
  if (result.value.length === 0) {
    out += '  ' + t.muted('Emotional map is currently clear.') + '\n'
  } else {
    for (const entry of result.value) {
      out += '  ' + t.dim('-') + ' ' + t.white(entry) + '\n'
    }
  }
  ctx.out.write(out)
}

export function renderCollapseTruth(ctx: ShellContext, emotion: string, mode: string, time: string): void {
  const { t } = ctx

  ctx.out.write(
    '\n' +
    t.text(`Attempting to collapse truth waveform for emotion '${emotion}', mode '${mode}', time '${time}'...`) +
    '\n',
  )

  const result = ctx.hal.collapseTruthWaveform(emotion, mode, time)
  ctx.out.write(
    (result.ok
      ? t.text(`Tensor Waveform Collapse Result: '${result.value}'`)
      : t.red(`Error during truth collapse: ${result.error}`)) + '\n',
  )
}

export function renderOnnxTest(ctx: ShellContext, modelPath: string, inputInfo: string): void {
  const result = ctx.hal.runOnnxModel(modelPath, { info: inputInfo })
  ctx.out.write(
    (result.ok
      ? ctx.t.text(`ONNX Model Output: ${result.value.info}`)
      : ctx.t.red(`Error running ONNX model: ${result.error}`)) + '\n',
  )
}

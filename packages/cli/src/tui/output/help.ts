import type { ShellContext } from '../context.js'

/**
 * renderHelp — print available shell commands grouped by category.
 */
export function renderHelp(ctx: ShellContext): void {
  const { t } = ctx

  const section = (label: string) =>
    '\n  ' + t.dim('─── ') + t.blue(label) + '\n'

  const cmd = (name: string, desc: string) => {
    const pad = ' '.repeat(Math.max(1, 42 - name.length))
    return '  ' + t.white(name) + t.dim(pad + desc) + '\n'
  }

  let out = '\n'

  out += section('integrity')
  out += cmd('check-module-integrity <module_name>', 'verify a module against the ledger')
  out += cmd('system-integrity-check', 'run internal and ledger checks')

  out += section('hal')
  out += cmd('status  mem', 'system status')
  out += cmd('init-npu', 'initialize the NPU')
  out += cmd('map-emotion', 'show the emotional map')
  out += cmd('collapse-truth <emotion> <mode> <time>', 'collapse a truth waveform')
  out += cmd('run-onnx-test <model_path> <input_info>', 'run a test ONNX model')

  out += section('system')
  out += cmd('ver', 'version information')
  out += cmd('date', 'current date')
  out += cmd('time', 'current time')
  out += cmd('cls  clear', 'clear the screen')
  out += cmd('ls  dir', 'list module status (placeholder)')
  out += cmd('ping', 'pong')
  out += cmd('help', 'show this help')
  out += cmd('exit  quit', 'leave the shell')

  ctx.out.write(out)
}

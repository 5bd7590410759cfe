import { VERSION } from '../../commands/index.js'
import type { ShellContext } from '../context.js'

const INNER_WIDTH = 49

function boxLine(text: string): string {
  const free  = Math.max(0, INNER_WIDTH - text.length)
  const left  = Math.floor(free / 2)
  const right = free - left
  return '*' + ' '.repeat(left) + text + ' '.repeat(right) + '*'
}

/**
 * renderBanner — print the welcome box shown before the boot checks.
 *
 *   ***************************************************
 *   *                                                 *
 *   *        Welcome to SoulWare CLI (SoulDOS)        *
 *   *               Version 0.0.1-alpha               *
 *   *                                                 *
 *   ***************************************************
 */
export function renderBanner(ctx: ShellContext): void {
  const { t } = ctx
  const rule  = '*'.repeat(INNER_WIDTH + 2)
  const blank = boxLine('')

  let out = ''
  out += t.blueDim(rule) + '\n'
  out += t.blueDim(blank) + '\n'
  out += t.blue.bold(boxLine('Welcome to SoulWare CLI (SoulDOS)')) + '\n'
  out += t.muted(boxLine(`Version ${VERSION}`)) + '\n'
  out += t.blueDim(blank) + '\n'
  out += t.blueDim(rule) + '\n'

  ctx.out.write(out)
}

import type { ShellContext } from '../context.js'

const pad2 = (n: number): string => String(n).padStart(2, '0')

/** Local date as YYYY-MM-DD. */
export function formatDate(d: Date): string {
  return `${d.getFullYear()}-${pad2(d.getMonth() + 1)}-${pad2(d.getDate())}`
}

/** Local time as HH:MM:SS, 24-hour. */
export function formatTime(d: Date): string {
  return `${pad2(d.getHours())}:${pad2(d.getMinutes())}:${pad2(d.getSeconds())}`
}

export function renderDate(ctx: ShellContext): void {
  ctx.out.write(ctx.t.text(formatDate(ctx.now())) + '\n')
}

export function renderTime(ctx: ShellContext): void {
  ctx.out.write(ctx.t.text(formatTime(ctx.now())) + '\n')
}

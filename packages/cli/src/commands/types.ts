/**
 * ShellCommand — the closed set of line commands the shell understands.
 *
 * Aliases collapse to one variant: `cls`/`clear` → clear, `ls`/`dir` → list,
 * `status`/`mem` → status. `exit` and `quit` never reach this type; the shell
 * loop consumes them before parsing.
 */
export type ShellCommand =
  | { readonly kind: 'help' }
  | { readonly kind: 'ver' }
  | { readonly kind: 'date' }
  | { readonly kind: 'time' }
  | { readonly kind: 'clear' }
  | { readonly kind: 'list' }
  | { readonly kind: 'status' }
  | { readonly kind: 'check-module-integrity'; readonly moduleName: string | undefined }
  | { readonly kind: 'system-integrity-check' }
  | { readonly kind: 'ping' }
  | { readonly kind: 'init-npu' }
  | { readonly kind: 'map-emotion' }
  | { readonly kind: 'collapse-truth'; readonly emotion: string; readonly mode: string; readonly time: string }
  | { readonly kind: 'run-onnx-test'; readonly modelPath: string; readonly inputInfo: string }

export type ShellCommandKind = ShellCommand['kind']

/**
 * Result of parsing one input line.
 *
 *   command   — a ShellCommand ready to dispatch
 *   displayed — commander produced text of its own (--help, --version)
 *   error     — the line did not match the grammar; message is commander's
 */
export type LineParseResult =
  | { readonly kind: 'command'; readonly command: ShellCommand }
  | { readonly kind: 'displayed'; readonly output: string }
  | { readonly kind: 'error'; readonly message: string }

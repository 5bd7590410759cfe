/**
 * CLI error types.
 *
 * Errors that reach the entry point are printed and end the process with
 * exit code 1. Everything raised inside the shell loop is printed and the
 * loop continues.
 */

/**
 * Thrown by resolveShellConfig() when an environment variable holds a value
 * it cannot use. The message names the variable and the rejected value.
 */
export class ConfigError extends Error {
  constructor(
    readonly variable: string,
    readonly value: string,
    expected: string,
  ) {
    super(`${variable}=${JSON.stringify(value)} is invalid: expected ${expected}`);
    this.name = 'ConfigError';
  }
}

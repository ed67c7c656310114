/**
 * POSIX shell quoting for command lines sent over ssh and shown in logs
 */

const SAFE_ARG = /^[A-Za-z0-9_\-+=.,/:@%]+$/

export function quoteArg(arg: string): string {
  if (arg === '') return "''"
  if (SAFE_ARG.test(arg)) return arg
  return `'${arg.replace(/'/g, `'\\''`)}'`
}

export function renderCommandLine(program: string, args: readonly string[]): string {
  return [program, ...args].map(quoteArg).join(' ')
}

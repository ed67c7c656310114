/**
 * Flakeshift CLI - Colors Utility
 *
 * Snowflake theme: cyan and lavender accents on neutral text.
 *
 * Terminal colors using tuiuiu.js text-utils + ANSI 256
 * Supports NO_COLOR and FORCE_COLOR
 */

import { colorize, style } from 'tuiuiu.js'
import type { Formatter } from 'cli-args-parser'

// Check if colors should be enabled
const isColorEnabled = (): boolean => {
  // Respect NO_COLOR standard
  if (process.env.NO_COLOR !== undefined) return false
  if (process.env.FORCE_COLOR !== undefined) return true
  // Diagnostics go to stderr, so that is the stream that decides
  return process.stderr.isTTY ?? false
}

const enabled = isColorEnabled()

/**
 * Snowflake Palette (ANSI 256)
 *
 * - 81:  Frost cyan   (#5FD7FF) - primary, commands
 * - 110: Ice blue     (#87AFD7) - options
 * - 147: Lavender     (#AFAFFF) - highlights
 * - 252: Light gray   (#D0D0D0) - text
 * - 245: Medium gray  (#8A8A8A) - muted text
 */
const ansi = {
  bold: (s: string) => enabled ? style(s, 'bold') : s,
  dim: (s: string) => enabled ? style(s, 'dim') : s,

  frost: (s: string) => enabled ? `\x1b[38;5;81m${s}\x1b[39m` : s,
  ice: (s: string) => enabled ? `\x1b[38;5;110m${s}\x1b[39m` : s,
  lavender: (s: string) => enabled ? `\x1b[38;5;147m${s}\x1b[39m` : s,

  white: (s: string) => enabled ? colorize(s, 'whiteBright') : s,
  gray: (s: string) => enabled ? `\x1b[38;5;245m${s}\x1b[39m` : s,
  lightGray: (s: string) => enabled ? `\x1b[38;5;252m${s}\x1b[39m` : s,

  // Status keeps the usual semantic colors
  red: (s: string) => enabled ? colorize(s, 'redBright') : s,
  green: (s: string) => enabled ? colorize(s, 'greenBright') : s,
  yellow: (s: string) => enabled ? colorize(s, 'yellowBright') : s
}

/**
 * Formatter for cli-args-parser help and version output
 */
export const flakeshiftFormatter: Formatter = {
  'section-header': s => ansi.bold(ansi.white(s)),

  'program-name': s => ansi.bold(ansi.frost(s)),
  'version': s => ansi.lavender(s),
  'description': s => ansi.lightGray(s),

  'command-name': s => ansi.frost(s),
  'command-alias': s => ansi.gray(s),
  'command-description': s => ansi.lightGray(s),

  'option-flag': s => ansi.ice(s),
  'option-type': s => ansi.gray(s),
  'option-default': s => ansi.dim(ansi.gray(s)),
  'option-description': s => ansi.lightGray(s),

  'positional-name': s => ansi.lavender(s),

  'error-header': s => ansi.bold(ansi.red(s)),
  'error-message': s => ansi.red(s),
  'error-option': s => ansi.frost(s)
}

// Semantic colors
export const c = {
  command: (text: string) => ansi.bold(ansi.frost(text)),
  path: (text: string) => ansi.ice(text),
  generation: (text: string) => ansi.bold(ansi.lavender(text)),

  success: (text: string) => ansi.green(text),
  error: (text: string) => ansi.red(text),
  warning: (text: string) => ansi.yellow(text),
  info: (text: string) => ansi.frost(text),

  header: (text: string) => ansi.bold(ansi.white(text)),
  label: (text: string) => ansi.gray(text),
  muted: (text: string) => ansi.dim(text)
}

export const symbols = {
  success: enabled ? ansi.green('✓') : '[OK]',
  error: enabled ? ansi.red('✗') : '[ERROR]',
  warning: enabled ? ansi.yellow('⚠') : '[WARN]',
  arrow: enabled ? ansi.frost('>') : '>'
}

export const print = {
  success: (msg: string) => console.error(`${symbols.success} ${c.success(msg)}`),
  error: (msg: string) => console.error(`${symbols.error} ${c.error(msg)}`),
  warning: (msg: string) => console.error(`${symbols.warning} ${c.warning(msg)}`)
}

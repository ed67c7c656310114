/**
 * CLI UI utilities - TTY-aware output
 *
 * - TTY (interactive): Pretty UI with tables, colors
 * - Pipe: Clean output, no UI elements, data only to stdout
 *
 * Everything except `output` goes to stderr so that build logs and tables
 * stay separate.
 */

import { Table, renderToString } from 'tuiuiu.js'
import type { Reporter } from '../types.js'
import { c, symbols } from './lib/colors.js'

// Detect if running in interactive terminal
export const isTTY = process.stdout.isTTY ?? false
export const isStderrTTY = process.stderr.isTTY ?? false

let quiet = false

/**
 * Suppress informational messages; warnings and errors are still shown
 */
export function setQuiet(value: boolean): void {
  quiet = value
}

/**
 * Output data to stdout (for pipes)
 * This is the ONLY function that should write to stdout for data
 */
export function output(data: string): void {
  process.stdout.write(data + '\n')
}

/**
 * Progress message to stderr
 */
export function log(message: string): void {
  if (!quiet) {
    console.error(message)
  }
}

/**
 * Log verbose message (only with the verbose flag)
 */
export function verbose(message: string, enabled: boolean): void {
  if (enabled) {
    console.error(c.muted(`[flakeshift] ${message}`))
  }
}

/**
 * Log error to stderr (always shown)
 */
export function error(message: string): void {
  console.error(`${symbols.error} ${c.error(message)}`)
}

/**
 * Log success message (only in TTY mode)
 */
export function success(message: string): void {
  if (isStderrTTY && !quiet) {
    console.error(`${symbols.success} ${c.success(message)}`)
  }
}

/**
 * Log warning message (always shown)
 */
export function warn(message: string): void {
  console.error(`${symbols.warning} ${c.warning(message)}`)
}

/**
 * Reporter for library code: info as progress, debug only when verbose
 */
export function createReporter(options: { verbose: boolean }): Reporter {
  return {
    info: message => log(`${symbols.arrow} ${c.info(message)}`),
    warn,
    debug: message => verbose(message, options.verbose)
  }
}

export interface TableColumn<K extends string> {
  key: K
  header: string
  align?: 'left' | 'center' | 'right'
}

/**
 * Format data as a table using tuiuiu.js
 */
export function formatTable<K extends string>(
  columns: Array<TableColumn<K>>,
  data: Array<Record<K, string>>,
  options: { borderStyle?: 'single' | 'round' | 'ascii' | 'none' } = {}
): string {
  if (!isTTY) {
    // Simple tab-separated output for pipes
    const headers = columns.map(col => col.header).join('\t')
    const rows = data.map(row => columns.map(col => row[col.key]).join('\t'))
    return [headers, ...rows].join('\n')
  }

  const table = Table({
    columns: columns.map(col => ({
      key: col.key,
      header: col.header,
      align: col.align || 'left'
    })),
    data,
    borderStyle: options.borderStyle || 'round',
    showHeader: true
  })

  return renderToString(table)
}

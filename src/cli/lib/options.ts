/**
 * Typed access to parsed CLI options
 *
 * cli-args-parser hands back loosely typed records; these readers narrow
 * each value once at the boundary.
 */

import type { DiffMode, Installable } from '../../types.js'
import { defaultInstallable, parseFlakeInstallable } from '../../lib/installable.js'
import { parseAttribute } from '../../lib/attribute-path.js'
import { InvalidOptionError } from '../../lib/errors.js'

/**
 * The parts of a cli-args-parser CommandParseResult that commands read
 */
export interface ParseResult {
  command: readonly string[]
  options: unknown
  positional: unknown
  rest: unknown
  errors: readonly unknown[]
}

export class ParsedOptions {
  private readonly options: Record<string, unknown>
  private readonly positional: Record<string, unknown>
  /** Arguments after `--` */
  readonly rest: string[]
  readonly command: string[]
  readonly errors: string[]

  constructor(result: ParseResult) {
    this.options = toRecord(result.options)
    this.positional = toRecord(result.positional)
    this.rest = Array.isArray(result.rest)
      ? result.rest.filter((arg): arg is string => typeof arg === 'string')
      : []
    this.command = [...result.command]
    this.errors = result.errors.map(String)
  }

  string(name: string): string | undefined {
    const value = this.options[name]
    if (typeof value === 'string' && value !== '') return value
    if (typeof value === 'number') return String(value)
    return undefined
  }

  bool(name: string): boolean {
    return this.options[name] === true
  }

  positionalString(name: string): string | undefined {
    const value = this.positional[name]
    return typeof value === 'string' && value !== '' ? value : undefined
  }
}

function toRecord(value: unknown): Record<string, unknown> {
  if (value === null || typeof value !== 'object') return {}
  return Object.fromEntries(Object.entries(value))
}

/**
 * --diff auto|always|never
 */
export function parseDiffMode(value: string | undefined, fallback: DiffMode): DiffMode {
  if (value === undefined) return fallback
  if (value === 'auto' || value === 'always' || value === 'never') return value
  throw new InvalidOptionError('--diff', value, 'auto, always or never')
}

/**
 * Installable from the positional argument and --file / --expr.
 *
 * With --file or --expr the positional is the attribute path. A positional
 * under /nix/store is a store path. Anything else is `reference#attribute`.
 */
export function installableFromOptions(opts: ParsedOptions): Installable {
  const positional = opts.positionalString('installable')
  const file = opts.string('file')
  const expr = opts.string('expr')

  if (file !== undefined) {
    return { kind: 'file', path: file, attribute: parseAttribute(positional ?? '', { strict: true }) }
  }
  if (expr !== undefined) {
    return { kind: 'expression', expression: expr, attribute: parseAttribute(positional ?? '', { strict: true }) }
  }
  if (positional === undefined) {
    return defaultInstallable()
  }
  if (positional.startsWith('/nix/store/')) {
    return { kind: 'store', path: positional }
  }
  return parseFlakeInstallable(positional, { strict: true })
}

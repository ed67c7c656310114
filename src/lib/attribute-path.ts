/**
 * Attribute path codec
 *
 * Attribute paths address a value inside an evaluation tree:
 *
 *   nixosConfigurations.myhost            → ["nixosConfigurations", "myhost"]
 *   homeConfigurations."alice@laptop"     → ["homeConfigurations", "alice@laptop"]
 *   packages."x86_64-linux".default       → ["packages", "x86_64-linux", "default"]
 *
 * Segments containing a dot are double-quoted when joined.
 */

import type { AttributePath } from '../types.js'
import { InvalidAttributePathError } from './errors.js'

export interface ParseAttributeOptions {
  /** Throw on an unterminated quote instead of keeping the remainder as literal text */
  strict?: boolean
}

const WHITESPACE = /\s/

/**
 * Parse a dotted attribute path.
 *
 * Whitespace around separators and around quoted segments is dropped.
 * An unterminated quote keeps the rest of the input as the last segment,
 * unless `strict` is set.
 */
export function parseAttribute(input: string, options: ParseAttributeOptions = {}): AttributePath {
  if (input.trim() === '') return []

  const segments: AttributePath = []
  let segment = ''
  // Whitespace seen outside quotes, kept only if more segment text follows
  let pending = ''
  let inQuote = false

  for (const ch of input) {
    if (inQuote) {
      if (ch === '"') {
        inQuote = false
      } else {
        segment += ch
      }
      continue
    }

    if (ch === '"') {
      inQuote = true
      pending = ''
    } else if (ch === '.') {
      segments.push(segment)
      segment = ''
      pending = ''
    } else if (WHITESPACE.test(ch)) {
      if (segment !== '') pending += ch
    } else {
      segment += pending + ch
      pending = ''
    }
  }

  if (inQuote && options.strict) {
    throw new InvalidAttributePathError(input, 'unterminated quote')
  }

  segments.push(segment)
  return segments
}

function needsQuoting(segment: string): boolean {
  return segment.includes('.') || segment === '' || segment !== segment.trim()
}

/**
 * Join segments into a dotted attribute path, quoting where needed.
 */
export function joinAttribute(segments: readonly string[]): string {
  return segments
    .map(segment => (needsQuoting(segment) ? `"${segment}"` : segment))
    .join('.')
}

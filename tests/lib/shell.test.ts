/**
 * Tests for shell.ts
 */

import { describe, it, expect } from 'vitest'
import { quoteArg, renderCommandLine } from '../../src/lib/shell.js'

describe('shell', () => {
  it('should leave safe arguments alone', () => {
    expect(quoteArg('/nix/store/abc-system')).toBe('/nix/store/abc-system')
    expect(quoteArg('--preserve-env=PATH,NIX_PATH')).toBe('--preserve-env=PATH,NIX_PATH')
  })

  it('should quote empty arguments', () => {
    expect(quoteArg('')).toBe("''")
  })

  it('should single-quote arguments with spaces', () => {
    expect(quoteArg('a b')).toBe("'a b'")
  })

  it('should escape embedded single quotes', () => {
    expect(quoteArg("it's")).toBe("'it'\\''s'")
  })

  it('should render a command line', () => {
    expect(renderCommandLine('nix', ['eval', '--apply', 'x: x ? "h"']))
      .toBe(`nix eval --apply 'x: x ? "h"'`)
  })
})

/**
 * Tests for errors.ts
 */

import { describe, it, expect } from 'vitest'
import {
  CommandError,
  ConfigurationNotFoundError,
  ExitError,
  FlakeshiftError,
  InvalidConfigError,
  InvalidOptionError,
  ProfileRevertError,
  ResolutionError,
  UnsupportedVariantError,
  formatErrorForCli,
  isFlakeshiftError
} from '../../src/lib/errors.js'

describe('errors', () => {
  it('should list every attempted configuration', () => {
    const error = new ConfigurationNotFoundError(['.#homeConfigurations.alice@myhost', '.#homeConfigurations.alice'])
    expect(error.message).toBe(
      "Couldn't find configuration automatically. Tried:\n  .#homeConfigurations.alice@myhost\n  .#homeConfigurations.alice"
    )
    expect(error.code).toBe('CONFIGURATION_NOT_FOUND')
    expect(error).toBeInstanceOf(ResolutionError)
  })

  it('should describe exit failures with the operation', () => {
    const error = new ExitError('nix build .#', 1, null, 'Building configuration')
    expect(error.message).toBe('Building configuration failed: command exited with status 1')
    expect(error.command).toBe('nix build .#')
    expect(error.context).toEqual({ command: 'nix build .#', status: 1, signal: null })
    expect(error).toBeInstanceOf(CommandError)
  })

  it('should keep both errors when a profile revert fails', () => {
    const activation = new ExitError('switch-to-configuration switch', 1)
    const revert = new Error('permission denied')
    const error = new ProfileRevertError('/nix/var/nix/profiles/system', 41, activation, revert)

    expect(error.activationError).toBe(activation)
    expect(error.cause).toBe(revert)
    expect(error.message).toBe(
      'Activation failed (Command exited with status 1) and restoring /nix/var/nix/profiles/system to generation 41 also failed: permission denied'
    )
  })

  it('should format errors for the CLI', () => {
    const error = new UnsupportedVariantError('Home-Manager', 'boot', ['switch', 'build'])
    expect(formatErrorForCli(error)).toBe('Error: Home-Manager does not support "boot"\n  Suggestion: Supported: switch, build')
    expect(formatErrorForCli(new Error('plain'))).toBe('Error: plain')
    expect(formatErrorForCli('text')).toBe('Error: text')
  })

  it('should prefix config errors with the file', () => {
    expect(new InvalidConfigError('bad', '/etc/flakeshift/config.yaml').message)
      .toBe('Invalid config in /etc/flakeshift/config.yaml: bad')
    expect(new InvalidConfigError('bad').message).toBe('Invalid config: bad')
  })

  it('should name the option and expected values', () => {
    const error = new InvalidOptionError('--diff', 'sometimes', 'auto, always or never')
    expect(error.message).toBe('Invalid value for --diff: "sometimes"')
    expect(error.suggestion).toBe('Expected auto, always or never')
  })

  it('should recognise its own errors only', () => {
    expect(isFlakeshiftError(new InvalidOptionError('--to', 'x', 'a number'))).toBe(true)
    expect(isFlakeshiftError(new Error('boom'))).toBe(false)
  })
})

/**
 * Environment context
 *
 * Snapshot of the process environment taken once at the CLI boundary and
 * threaded through every operation.
 */

import os from 'node:os'
import type { EnvContext, PlatformName } from '../types.js'
import { MissingEnvironmentError, RunningAsRootError } from './errors.js'

export const ENV_PREFIX = 'FLAKESHIFT_'

/** Installable override variable per platform */
export const OVERRIDE_VARS: Record<PlatformName, string> = {
  nixos: 'FLAKESHIFT_OS_FLAKE',
  home: 'FLAKESHIFT_HOME_FLAKE',
  darwin: 'FLAKESHIFT_DARWIN_FLAKE'
}

export const ASKPASS_VAR = 'FLAKESHIFT_SUDO_ASKPASS'

/** Nix variables preserved across elevation */
export const NIX_PRESERVED_VARS = [
  'PATH',
  'NIX_CONFIG',
  'NIX_PATH',
  'NIX_REMOTE',
  'NIX_SSL_CERT_FILE',
  'NIX_USER_CONF_FILES'
] as const

export interface EnvContextOverrides {
  hostname?: string | null
  platform?: NodeJS.Platform
  isRoot?: boolean
}

function nonEmpty(value: string | undefined): string | null {
  return value === undefined || value === '' ? null : value
}

function detectHostname(): string | null {
  try {
    return nonEmpty(os.hostname())
  } catch {
    return null
  }
}

function detectRoot(): boolean {
  return typeof process.getuid === 'function' && process.getuid() === 0
}

/**
 * Build the context from an environment map (defaults to process.env)
 */
export function createEnvContext(
  env: NodeJS.ProcessEnv = process.env,
  overrides: EnvContextOverrides = {}
): EnvContext {
  const ambient: Record<string, string> = {}
  const toolVars: Record<string, string> = {}

  for (const [key, value] of Object.entries(env)) {
    if (value === undefined) continue
    ambient[key] = value
    if (key.startsWith(ENV_PREFIX)) {
      toolVars[key] = value
    }
  }

  const installableOverrides: Partial<Record<PlatformName, string>> = {}
  for (const [platform, variable] of Object.entries(OVERRIDE_VARS)) {
    const value = nonEmpty(env[variable])
    if (value !== null && isPlatformName(platform)) {
      installableOverrides[platform] = value
    }
  }

  return {
    ambient,
    user: nonEmpty(env.USER),
    home: nonEmpty(env.HOME),
    hostname: overrides.hostname !== undefined ? overrides.hostname : detectHostname(),
    platform: overrides.platform ?? process.platform,
    isRoot: overrides.isRoot ?? detectRoot(),
    overrides: installableOverrides,
    askpass: nonEmpty(env[ASKPASS_VAR]),
    toolVars
  }
}

function isPlatformName(value: string): value is PlatformName {
  return value === 'nixos' || value === 'home' || value === 'darwin'
}

/**
 * USER is required at the point of use
 */
export function requireUser(env: EnvContext): string {
  if (env.user === null) throw new MissingEnvironmentError('USER')
  return env.user
}

/**
 * HOME is required at the point of use
 */
export function requireHome(env: EnvContext): string {
  if (env.home === null) throw new MissingEnvironmentError('HOME')
  return env.home
}

/**
 * Refuse to run as root unless bypassed. Returns whether commands that need
 * privileges should elevate.
 */
export function checkNotRoot(env: EnvContext, bypass: boolean): boolean {
  if (bypass) return false
  if (env.isRoot) throw new RunningAsRootError()
  return true
}

/**
 * Flakeshift Config Loader
 *
 * Loads user defaults from a YAML file:
 *
 *   $FLAKESHIFT_CONFIG
 *   $XDG_CONFIG_HOME/flakeshift/config.yaml
 *   ~/.config/flakeshift/config.yaml
 *
 * A `config.local.yaml` next to the chosen file is merged on top of it.
 */

import fs from 'node:fs'
import path from 'node:path'
import { parse as parseYaml } from 'yaml'
import type { DiffMode, EnvContext, FlakeshiftConfig } from '../types.js'
import { InvalidConfigError } from './errors.js'
import { DEFAULT_DIFF_TOOL } from './diff.js'

const CONFIG_DIR = 'flakeshift'
const CONFIG_FILE = 'config.yaml'
const CONFIG_LOCAL_FILE = 'config.local.yaml'
const DIFF_MODES: readonly DiffMode[] = ['auto', 'always', 'never']

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: FlakeshiftConfig = {
  diff: 'auto',
  nom: false,
  elevation: {
    program: 'sudo'
  },
  diff_tool: {
    program: DEFAULT_DIFF_TOOL.program,
    args: [...DEFAULT_DIFF_TOOL.args]
  }
}

// ============================================================================
// Variable expansion
// ============================================================================

/**
 * Expand environment variables in a string
 * Supports: ${VAR}, ${VAR:-default}, $VAR
 */
export function expandEnvVars(str: string, vars: Readonly<Record<string, string>>): string {
  return str
    .replace(/\$\{([^}:]+):-([^}]*)\}/g, (_, name: string, fallback: string) => vars[name] || fallback)
    .replace(/\$\{([^}]+)\}/g, (_, name: string) => vars[name] ?? '')
    .replace(/\$([A-Z_][A-Z0-9_]*)/gi, (_, name: string) => vars[name] ?? '')
}

/**
 * Recursively expand env vars in parsed YAML
 */
function expandEnvVarsInValue(value: unknown, vars: Readonly<Record<string, string>>): unknown {
  if (typeof value === 'string') {
    return expandEnvVars(value, vars)
  }
  if (Array.isArray(value)) {
    return value.map(item => expandEnvVarsInValue(item, vars))
  }
  if (isRecord(value)) {
    const result: Record<string, unknown> = {}
    for (const [key, item] of Object.entries(value)) {
      result[key] = expandEnvVarsInValue(item, vars)
    }
    return result
  }
  return value
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

// ============================================================================
// Discovery
// ============================================================================

/**
 * Path of the config file to use, whether or not it exists
 */
export function findConfigPath(env: EnvContext): string | null {
  const explicit = env.ambient.FLAKESHIFT_CONFIG
  if (explicit) {
    return path.resolve(explicit)
  }

  const xdg = env.ambient.XDG_CONFIG_HOME
  if (xdg) {
    return path.join(xdg, CONFIG_DIR, CONFIG_FILE)
  }

  if (env.home !== null) {
    return path.join(env.home, '.config', CONFIG_DIR, CONFIG_FILE)
  }

  return null
}

function loadConfigFile(configPath: string, vars: Readonly<Record<string, string>>): Record<string, unknown> {
  if (!fs.existsSync(configPath)) {
    return {}
  }

  let parsed: unknown
  try {
    parsed = parseYaml(fs.readFileSync(configPath, 'utf-8'))
  } catch (err) {
    throw new InvalidConfigError(`Could not parse ${configPath}`, configPath, err)
  }

  if (parsed === null || parsed === undefined) {
    return {}
  }
  if (!isRecord(parsed)) {
    throw new InvalidConfigError(`Expected a mapping at the top level of ${configPath}`, configPath)
  }

  const expanded = expandEnvVarsInValue(parsed, vars)
  return isRecord(expanded) ? expanded : {}
}

// ============================================================================
// Validation
// ============================================================================

function fail(configPath: string | undefined, key: string, expected: string): never {
  throw new InvalidConfigError(`Invalid value for "${key}": expected ${expected}`, configPath)
}

/**
 * Apply the known keys of `raw` over `base`. Unknown keys are ignored.
 */
export function mergeConfig(
  base: FlakeshiftConfig,
  raw: Record<string, unknown>,
  configPath?: string
): FlakeshiftConfig {
  const config: FlakeshiftConfig = {
    ...base,
    elevation: { ...base.elevation },
    diff_tool: { program: base.diff_tool.program, args: [...base.diff_tool.args] }
  }

  if (raw.diff !== undefined) {
    const mode = DIFF_MODES.find(m => m === raw.diff)
    if (mode === undefined) fail(configPath, 'diff', DIFF_MODES.join(' | '))
    config.diff = mode
  }

  if (raw.nom !== undefined) {
    if (typeof raw.nom !== 'boolean') fail(configPath, 'nom', 'a boolean')
    config.nom = raw.nom
  }

  if (raw.builder !== undefined) {
    if (typeof raw.builder !== 'string') fail(configPath, 'builder', 'a host name')
    config.builder = raw.builder
  }

  if (raw.elevation !== undefined) {
    if (!isRecord(raw.elevation)) fail(configPath, 'elevation', 'a mapping')
    const program = raw.elevation.program
    if (program !== undefined) {
      if (typeof program !== 'string' || program === '') fail(configPath, 'elevation.program', 'a program name')
      config.elevation.program = program
    }
  }

  if (raw.diff_tool !== undefined) {
    if (!isRecord(raw.diff_tool)) fail(configPath, 'diff_tool', 'a mapping')
    const { program, args } = raw.diff_tool
    if (program !== undefined) {
      if (typeof program !== 'string' || program === '') fail(configPath, 'diff_tool.program', 'a program name')
      config.diff_tool.program = program
    }
    if (args !== undefined) {
      if (!Array.isArray(args)) fail(configPath, 'diff_tool.args', 'a list of strings')
      const strings = args.filter((arg): arg is string => typeof arg === 'string')
      if (strings.length !== args.length) fail(configPath, 'diff_tool.args', 'a list of strings')
      config.diff_tool.args = strings
    }
  }

  return config
}

/**
 * Load configuration, falling back to defaults when no file exists
 */
export function loadConfig(env: EnvContext): FlakeshiftConfig {
  const configPath = findConfigPath(env)
  if (configPath === null) {
    return mergeConfig(DEFAULT_CONFIG, {})
  }

  const config = mergeConfig(DEFAULT_CONFIG, loadConfigFile(configPath, env.ambient), configPath)

  const localPath = path.join(path.dirname(configPath), CONFIG_LOCAL_FILE)
  return mergeConfig(config, loadConfigFile(localPath, env.ambient), localPath)
}

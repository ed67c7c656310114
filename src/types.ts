/**
 * Flakeshift Type Definitions
 */

// ============================================================================
// Installables
// ============================================================================

/**
 * Ordered attribute path segments, e.g. ["nixosConfigurations", "myhost"]
 */
export type AttributePath = string[]

export interface FlakeInstallable {
  kind: 'flake'
  /** Flake reference: a local path or a registry/URL pointer */
  reference: string
  attribute: AttributePath
}

export interface FileInstallable {
  kind: 'file'
  path: string
  attribute: AttributePath
}

export interface ExpressionInstallable {
  kind: 'expression'
  /** Literal Nix source passed with --expr */
  expression: string
  attribute: AttributePath
}

export interface StoreInstallable {
  kind: 'store'
  path: string
}

/**
 * An already-resolved system closure (e.g. /run/current-system).
 * Carries no attribute path and is never resolved against a tree.
 */
export interface SystemInstallable {
  kind: 'system'
  system: string
}

export type Installable =
  | FlakeInstallable
  | FileInstallable
  | ExpressionInstallable
  | StoreInstallable
  | SystemInstallable

/** Installables that address an attribute inside an evaluation tree */
export type TreeInstallable = FlakeInstallable | FileInstallable | ExpressionInstallable

// ============================================================================
// Generations
// ============================================================================

export interface GenerationInfo {
  /** Ordering key, unique within a profile */
  number: number
  /** Path of the generation link (e.g. /nix/var/nix/profiles/system-42-link) */
  path: string
  /** True for the generation the profile currently points at */
  current: boolean
  /** Modification time of the generation link */
  createdAt: Date | null
  nixosVersion: string | null
  kernelVersion: string | null
  specialisations: string[]
}

// ============================================================================
// Runtime context
// ============================================================================

export type PlatformName = 'nixos' | 'home' | 'darwin'

export type DiffMode = 'auto' | 'always' | 'never'

export type DiffStrictness = 'propagate' | 'swallow'

/**
 * Process environment captured once at the CLI boundary.
 * Nothing below the CLI reads process.env directly.
 */
export interface EnvContext {
  /** Full ambient environment, used as the base for child processes */
  readonly ambient: Readonly<Record<string, string>>
  readonly user: string | null
  readonly home: string | null
  readonly hostname: string | null
  readonly platform: NodeJS.Platform
  readonly isRoot: boolean
  /** FLAKESHIFT_{OS,HOME,DARWIN}_FLAKE installable overrides */
  readonly overrides: Readonly<Partial<Record<PlatformName, string>>>
  /** FLAKESHIFT_SUDO_ASKPASS */
  readonly askpass: string | null
  /** Every FLAKESHIFT_* variable, forwarded to elevated commands */
  readonly toolVars: Readonly<Record<string, string>>
}

/**
 * Progress and diagnostics sink for library code
 */
export interface Reporter {
  info(message: string): void
  warn(message: string): void
  debug(message: string): void
}

// ============================================================================
// Configuration file
// ============================================================================

export interface DiffToolConfig {
  program: string
  /** Arguments placed before the two compared paths */
  args: string[]
}

export interface FlakeshiftConfig {
  diff: DiffMode
  nom: boolean
  elevation: {
    program: string
  }
  diff_tool: DiffToolConfig
  /** Default remote builder host */
  builder?: string
}

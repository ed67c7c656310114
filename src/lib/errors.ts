/**
 * Flakeshift Error Hierarchy
 *
 * Typed error classes for the CLI and programmatic usage.
 *
 * Hierarchy:
 *   FlakeshiftError (base)
 *   ├── ConfigError
 *   │   └── InvalidConfigError
 *   ├── ResolutionError (addressing a configuration inside a tree)
 *   │   ├── ConfigurationNotFoundError
 *   │   ├── ExplicitConfigurationNotFoundError
 *   │   ├── StoreInstallableError
 *   │   └── InvalidAttributePathError
 *   ├── CommandError (external tool invocation)
 *   │   ├── ExitError
 *   │   └── SpawnError
 *   ├── UserRejectedError
 *   ├── GenerationError
 *   │   ├── ProfileNotFoundError
 *   │   ├── NoGenerationsError
 *   │   ├── NoOlderGenerationError
 *   │   ├── GenerationNotFoundError
 *   │   └── CurrentGenerationNotFoundError
 *   ├── ProfileRevertError
 *   ├── ActivationProgramNotFoundError
 *   ├── EnvironmentError
 *   │   ├── MissingEnvironmentError
 *   │   ├── RunningAsRootError
 *   │   └── HostnameError
 *   └── ValidationError
 *       ├── UnsupportedVariantError
 *       └── InvalidOptionError
 */

interface ErrorOptions {
  suggestion?: string
  context?: Record<string, unknown>
  cause?: unknown
}

/**
 * Base error class for all Flakeshift errors
 */
export class FlakeshiftError extends Error {
  /** Error code for programmatic handling */
  readonly code: string

  /** Suggestion for how to fix the error */
  readonly suggestion?: string

  /** Additional context/data about the error */
  readonly context?: Record<string, unknown>

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, { cause: options?.cause })
    this.name = 'FlakeshiftError'
    this.code = code
    this.suggestion = options?.suggestion
    this.context = options?.context

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  /**
   * Format error for CLI output
   */
  toCliOutput(): string {
    const lines = [`Error: ${this.message}`]
    if (this.suggestion) {
      lines.push(`  Suggestion: ${this.suggestion}`)
    }
    return lines.join('\n')
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

export class ConfigError extends FlakeshiftError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, options)
    this.name = 'ConfigError'
  }
}

/**
 * Thrown when config.yaml has invalid content
 */
export class InvalidConfigError extends ConfigError {
  constructor(message: string, configPath?: string, cause?: unknown) {
    super(
      configPath ? `Invalid config in ${configPath}: ${message}` : `Invalid config: ${message}`,
      'INVALID_CONFIG',
      {
        suggestion: 'Check your flakeshift config.yaml syntax',
        context: configPath ? { configPath } : undefined,
        cause
      }
    )
    this.name = 'InvalidConfigError'
  }
}

// =============================================================================
// Resolution Errors
// =============================================================================

export class ResolutionError extends FlakeshiftError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, options)
    this.name = 'ResolutionError'
  }
}

/**
 * Thrown when automatic detection finds no matching configuration
 */
export class ConfigurationNotFoundError extends ResolutionError {
  readonly attempted: string[]

  constructor(attempted: string[]) {
    super(
      `Couldn't find configuration automatically. Tried:\n${attempted.map(a => `  ${a}`).join('\n')}`,
      'CONFIGURATION_NOT_FOUND',
      {
        suggestion: 'Pass the configuration name explicitly, or add an attribute path to the installable',
        context: { attempted }
      }
    )
    this.name = 'ConfigurationNotFoundError'
    this.attempted = attempted
  }
}

/**
 * Thrown when an explicitly requested configuration does not exist
 */
export class ExplicitConfigurationNotFoundError extends ResolutionError {
  readonly attempted: string

  constructor(attempted: string) {
    super(
      `Explicitly specified configuration not found: ${attempted}`,
      'EXPLICIT_CONFIGURATION_NOT_FOUND',
      {
        suggestion: 'Check the configuration name against the outputs of your flake',
        context: { attempted }
      }
    )
    this.name = 'ExplicitConfigurationNotFoundError'
    this.attempted = attempted
  }
}

/**
 * Thrown when a store path is used where an attribute path is required
 */
export class StoreInstallableError extends ResolutionError {
  constructor(operation: string, path: string) {
    super(
      `Store path installables are not supported by ${operation}: ${path}`,
      'STORE_INSTALLABLE',
      {
        suggestion: 'Use a flake reference, --file or --expr instead',
        context: { operation, path }
      }
    )
    this.name = 'StoreInstallableError'
  }
}

/**
 * Thrown by the strict attribute path parser
 */
export class InvalidAttributePathError extends ResolutionError {
  constructor(input: string, reason: string) {
    super(
      `Invalid attribute path "${input}": ${reason}`,
      'INVALID_ATTRIBUTE_PATH',
      {
        suggestion: 'Close every double quote; quoted segments look like foo."bar.baz"',
        context: { input }
      }
    )
    this.name = 'InvalidAttributePathError'
  }
}

// =============================================================================
// Command Errors
// =============================================================================

export class CommandError extends FlakeshiftError {
  /** Rendered command line */
  readonly command: string

  constructor(message: string, code: string, command: string, options?: ErrorOptions) {
    super(message, code, { ...options, context: { command, ...options?.context } })
    this.name = 'CommandError'
    this.command = command
  }
}

/**
 * Thrown when an external program exits unsuccessfully
 */
export class ExitError extends CommandError {
  /** Raw exit status, null when terminated by a signal */
  readonly status: number | null
  readonly signal: string | null

  constructor(command: string, status: number | null, signal: string | null = null, operation?: string) {
    const how = status !== null ? `exited with status ${status}` : `was terminated by ${signal ?? 'a signal'}`
    super(
      operation ? `${operation} failed: command ${how}` : `Command ${how}`,
      'COMMAND_FAILED',
      command,
      { context: { status, signal } }
    )
    this.name = 'ExitError'
    this.status = status
    this.signal = signal
  }
}

/**
 * Thrown when an external program cannot be started at all
 */
export class SpawnError extends CommandError {
  constructor(command: string, cause: Error) {
    super(
      `Failed to execute ${command}: ${cause.message}`,
      'SPAWN_FAILED',
      command,
      {
        suggestion: 'Make sure the program is installed and on your PATH',
        cause
      }
    )
    this.name = 'SpawnError'
  }
}

// =============================================================================
// Confirmation
// =============================================================================

export class UserRejectedError extends FlakeshiftError {
  constructor() {
    super('User rejected the new config', 'USER_REJECTED')
    this.name = 'UserRejectedError'
  }
}

// =============================================================================
// Generation Errors
// =============================================================================

export class GenerationError extends FlakeshiftError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, options)
    this.name = 'GenerationError'
  }
}

export class ProfileNotFoundError extends GenerationError {
  constructor(profilePath: string) {
    super(
      `No profile found at ${profilePath}`,
      'PROFILE_NOT_FOUND',
      { context: { profilePath } }
    )
    this.name = 'ProfileNotFoundError'
  }
}

export class NoGenerationsError extends GenerationError {
  constructor(profilePath: string) {
    super(
      `No generations found for ${profilePath}`,
      'NO_GENERATIONS',
      { context: { profilePath } }
    )
    this.name = 'NoGenerationsError'
  }
}

export class NoOlderGenerationError extends GenerationError {
  constructor(current: number) {
    super(
      'No generation older than the current one exists',
      'NO_OLDER_GENERATION',
      {
        suggestion: 'Pass a generation number explicitly',
        context: { current }
      }
    )
    this.name = 'NoOlderGenerationError'
  }
}

export class GenerationNotFoundError extends GenerationError {
  constructor(number: number) {
    super(
      `Generation ${number} not found`,
      'GENERATION_NOT_FOUND',
      {
        suggestion: 'Run "flakeshift os info" to list available generations',
        context: { number }
      }
    )
    this.name = 'GenerationNotFoundError'
  }
}

export class CurrentGenerationNotFoundError extends GenerationError {
  constructor(profilePath: string) {
    super(
      `Current generation not found for ${profilePath}`,
      'CURRENT_GENERATION_NOT_FOUND',
      { context: { profilePath } }
    )
    this.name = 'CurrentGenerationNotFoundError'
  }
}

/**
 * The built output has no activation program at the expected place
 */
export class ActivationProgramNotFoundError extends FlakeshiftError {
  constructor(programPath: string, cause?: unknown) {
    super(
      `Activation program not found: ${programPath}`,
      'ACTIVATION_PROGRAM_NOT_FOUND',
      {
        suggestion: 'Check that the installable builds a system configuration',
        context: { programPath },
        cause
      }
    )
    this.name = 'ActivationProgramNotFoundError'
  }
}

/**
 * Thrown when restoring the profile pointer after a failed activation also fails.
 * The activation error is kept alongside; the revert error is the cause.
 */
export class ProfileRevertError extends FlakeshiftError {
  readonly activationError: unknown

  constructor(profilePath: string, generation: number, activationError: unknown, revertError: unknown) {
    const activationMessage = activationError instanceof Error ? activationError.message : String(activationError)
    const revertMessage = revertError instanceof Error ? revertError.message : String(revertError)
    super(
      `Activation failed (${activationMessage}) and restoring ${profilePath} to generation ${generation} also failed: ${revertMessage}`,
      'PROFILE_REVERT_FAILED',
      {
        suggestion: `Point ${profilePath} back at generation ${generation} manually`,
        context: { profilePath, generation },
        cause: revertError
      }
    )
    this.name = 'ProfileRevertError'
    this.activationError = activationError
  }
}

// =============================================================================
// Environment Errors
// =============================================================================

export class EnvironmentError extends FlakeshiftError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, options)
    this.name = 'EnvironmentError'
  }
}

export class MissingEnvironmentError extends EnvironmentError {
  constructor(variable: string) {
    super(
      `Required environment variable ${variable} is not set`,
      'MISSING_ENVIRONMENT',
      { context: { variable } }
    )
    this.name = 'MissingEnvironmentError'
  }
}

export class RunningAsRootError extends EnvironmentError {
  constructor() {
    super(
      "Don't run flakeshift as root. It calls sudo internally as needed",
      'RUNNING_AS_ROOT',
      { suggestion: 'Pass --bypass-root-check if you really mean it' }
    )
    this.name = 'RunningAsRootError'
  }
}

export class HostnameError extends EnvironmentError {
  constructor() {
    super(
      'Unable to fetch hostname automatically, and no hostname supplied',
      'HOSTNAME_UNAVAILABLE',
      { suggestion: 'Pass --hostname explicitly' }
    )
    this.name = 'HostnameError'
  }
}

// =============================================================================
// Validation Errors
// =============================================================================

export class ValidationError extends FlakeshiftError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, options)
    this.name = 'ValidationError'
  }
}

export class UnsupportedVariantError extends ValidationError {
  constructor(platform: string, variant: string, supported: readonly string[]) {
    super(
      `${platform} does not support "${variant}"`,
      'UNSUPPORTED_VARIANT',
      {
        suggestion: `Supported: ${supported.join(', ')}`,
        context: { platform, variant }
      }
    )
    this.name = 'UnsupportedVariantError'
  }
}

export class InvalidOptionError extends ValidationError {
  constructor(option: string, value: string, expected: string) {
    super(
      `Invalid value for ${option}: "${value}"`,
      'INVALID_OPTION',
      {
        suggestion: `Expected ${expected}`,
        context: { option, value }
      }
    )
    this.name = 'InvalidOptionError'
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isFlakeshiftError(error: unknown): error is FlakeshiftError {
  return error instanceof FlakeshiftError
}

// =============================================================================
// Error Formatting Helpers
// =============================================================================

/**
 * Format any error for CLI output
 */
export function formatErrorForCli(error: unknown): string {
  if (isFlakeshiftError(error)) {
    return error.toCliOutput()
  }
  if (error instanceof Error) {
    return `Error: ${error.message}`
  }
  return `Error: ${String(error)}`
}

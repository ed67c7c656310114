/**
 * Platform descriptors
 *
 * What differs between NixOS, Home-Manager and nix-darwin: where
 * configurations live in the tree, what gets built, what the running
 * configuration is, and how a build is activated.
 */

import fs from 'node:fs'
import path from 'node:path'
import type { DiffStrictness, EnvContext, PlatformName } from '../types.js'
import { Command, type CommandContext } from '../lib/command.js'
import { ActivationProgramNotFoundError } from '../lib/errors.js'

// ============================================================================
// Types
// ============================================================================

export type RebuildVariant = 'switch' | 'boot' | 'test' | 'build' | 'build-vm'

export interface ActivationRequest {
  /** Build output (the out-link) */
  outPath: string
  /** Build output with the specialisation applied */
  targetPath: string
  elevate: boolean
  targetHost: string | null
  /** Home-Manager backup extension for clobbered files */
  backupExtension?: string
}

export interface ToplevelOptions {
  withBootloader?: boolean
}

export interface PlatformDescriptor {
  readonly name: PlatformName
  readonly label: string
  /** Root attribute holding the named configurations */
  readonly configType: string
  readonly variants: readonly RebuildVariant[]
  /** How the configuration name is chosen when none is given */
  readonly defaultName: 'hostname' | 'user'
  /** Whether the rebuild refuses to run as root and elevates internally */
  readonly rootCheck: boolean
  readonly diffStrictness: DiffStrictness
  readonly outLinkPrefix: string
  readonly supportsSpecialisation: boolean
  /** Attribute path under the configuration that builds it */
  toplevel(variant: RebuildVariant, options?: ToplevelOptions): string[]
  buildMessage(variant: RebuildVariant): string
  specialisationMarker(env: EnvContext): string | null
  /** The running configuration to compare against; null on fresh installs */
  previousGeneration(env: EnvContext): string | null
  activates(variant: RebuildVariant): boolean
  registersBoot(variant: RebuildVariant): boolean
  activate(request: ActivationRequest, ctx: CommandContext): Promise<void>
  registerBoot(request: ActivationRequest, ctx: CommandContext): Promise<void>
}

// ============================================================================
// Shared helpers
// ============================================================================

export const SYSTEM_PROFILE = '/nix/var/nix/profiles/system'
export const CURRENT_PROFILE = '/run/current-system'

function existing(candidate: string): string | null {
  return fs.existsSync(candidate) ? candidate : null
}

/**
 * Absolute path of an activation program, following the store links
 */
export function resolveActivationProgram(root: string, ...segments: string[]): string {
  const program = path.join(root, ...segments)
  try {
    return fs.realpathSync(program)
  } catch (err) {
    throw new ActivationProgramNotFoundError(program, err)
  }
}

/**
 * `nix build --no-link --profile <profile> <path>`: record `outPath` as the
 * newest generation of `profile`
 */
function setProfileCommand(profile: string, outPath: string): Command {
  return new Command('nix').args(['build', '--no-link', '--profile', profile, outPath])
}

// ============================================================================
// NixOS
// ============================================================================

export interface NixosPaths {
  systemProfile: string
  currentProfile: string
  specialisationMarker: string
}

export const NIXOS_PATHS: NixosPaths = {
  systemProfile: SYSTEM_PROFILE,
  currentProfile: CURRENT_PROFILE,
  specialisationMarker: '/etc/specialisation'
}

export function nixosPlatform(overrides: Partial<NixosPaths> = {}): PlatformDescriptor {
  const paths: NixosPaths = { ...NIXOS_PATHS, ...overrides }

  const switchToConfiguration = async (
    root: string,
    mode: 'test' | 'boot' | 'switch',
    message: string,
    request: ActivationRequest,
    ctx: CommandContext
  ): Promise<void> => {
    const program = resolveActivationProgram(root, 'bin', 'switch-to-configuration')
    await new Command(program)
      .arg(mode)
      .ssh(request.targetHost)
      .message(message)
      .elevate(request.elevate)
      .run(ctx)
  }

  return {
    name: 'nixos',
    label: 'NixOS',
    configType: 'nixosConfigurations',
    variants: ['switch', 'boot', 'test', 'build', 'build-vm'],
    defaultName: 'hostname',
    rootCheck: true,
    diffStrictness: 'propagate',
    outLinkPrefix: 'flakeshift-os',
    supportsSpecialisation: true,

    toplevel(variant, options = {}) {
      const output = variant !== 'build-vm'
        ? 'toplevel'
        : options.withBootloader ? 'vmWithBootLoader' : 'vm'
      return ['config', 'system', 'build', output]
    },

    buildMessage(variant) {
      return variant === 'build-vm' ? 'Building NixOS VM image' : 'Building NixOS configuration'
    },

    specialisationMarker: () => paths.specialisationMarker,

    previousGeneration: () => existing(paths.currentProfile),

    activates: variant => variant === 'switch' || variant === 'test',

    registersBoot: variant => variant === 'switch' || variant === 'boot',

    async activate(request, ctx) {
      await switchToConfiguration(request.targetPath, 'test', 'Activating configuration', request, ctx)
    },

    async registerBoot(request, ctx) {
      await setProfileCommand(paths.systemProfile, fs.realpathSync(request.outPath))
        .elevate(request.elevate)
        .ssh(request.targetHost)
        .message('Setting system profile')
        .run(ctx)

      await switchToConfiguration(request.outPath, 'boot', 'Adding configuration to bootloader', request, ctx)
    }
  }
}

// ============================================================================
// Home-Manager
// ============================================================================

export interface HomePaths {
  /** Candidate profile locations, first existing wins */
  profiles?: (env: EnvContext) => string[]
  specialisationMarker?: (env: EnvContext) => string | null
}

function defaultHomeProfiles(env: EnvContext): string[] {
  const candidates: string[] = []
  if (env.user !== null) {
    candidates.push(path.join('/nix/var/nix/profiles/per-user', env.user, 'home-manager'))
  }
  if (env.home !== null) {
    candidates.push(path.join(env.home, '.local/state/nix/profiles/home-manager'))
  }
  return candidates
}

function defaultHomeMarker(env: EnvContext): string | null {
  return env.home === null ? null : path.join(env.home, '.local/share/home-manager/specialisation')
}

export function homePlatform(overrides: HomePaths = {}): PlatformDescriptor {
  const profiles = overrides.profiles ?? defaultHomeProfiles
  const marker = overrides.specialisationMarker ?? defaultHomeMarker

  return {
    name: 'home',
    label: 'Home-Manager',
    configType: 'homeConfigurations',
    variants: ['switch', 'build'],
    defaultName: 'user',
    rootCheck: false,
    // The previous profile may predate the current layout; comparison is advisory
    diffStrictness: 'swallow',
    outLinkPrefix: 'flakeshift-home',
    supportsSpecialisation: true,

    toplevel: () => ['config', 'home', 'activationPackage'],

    buildMessage: () => 'Building Home-Manager configuration',

    specialisationMarker: marker,

    previousGeneration(env) {
      for (const candidate of profiles(env)) {
        if (existing(candidate) !== null) return candidate
      }
      return null
    },

    activates: variant => variant === 'switch',

    registersBoot: () => false,

    async activate(request, ctx) {
      const command = new Command(resolveActivationProgram(request.targetPath, 'activate'))
        .withRequiredEnv(ctx.env)
        .ssh(request.targetHost)
        .message('Activating configuration')

      if (request.backupExtension) {
        ctx.reporter.info(`Using ${request.backupExtension} as the backup extension`)
        command.setEnv('HOME_MANAGER_BACKUP_EXT', request.backupExtension)
      }

      await command.run(ctx)
    },

    async registerBoot() {
      // Home-Manager has no boot entry
    }
  }
}

// ============================================================================
// nix-darwin
// ============================================================================

export interface DarwinPaths {
  systemProfile: string
  currentProfile: string
}

export const DARWIN_PATHS: DarwinPaths = {
  systemProfile: SYSTEM_PROFILE,
  currentProfile: CURRENT_PROFILE
}

const DEPRECATED_ACTIVATE_USER = '# nix-darwin: deprecated'

/**
 * Older nix-darwin generations ship a separate user activation script and
 * run `darwin-rebuild activate` unprivileged
 */
export function darwinActivationNeedsElevation(outPath: string): boolean {
  let script: string
  try {
    script = fs.readFileSync(path.join(outPath, 'activate-user'), 'utf-8')
  } catch {
    return true
  }
  return script.includes(DEPRECATED_ACTIVATE_USER)
}

export function darwinPlatform(overrides: Partial<DarwinPaths> = {}): PlatformDescriptor {
  const paths: DarwinPaths = { ...DARWIN_PATHS, ...overrides }

  return {
    name: 'darwin',
    label: 'nix-darwin',
    configType: 'darwinConfigurations',
    variants: ['switch', 'build'],
    defaultName: 'hostname',
    rootCheck: true,
    diffStrictness: 'propagate',
    outLinkPrefix: 'flakeshift-darwin',
    supportsSpecialisation: false,

    toplevel: () => ['toplevel'],

    buildMessage: () => 'Building Darwin configuration',

    specialisationMarker: () => null,

    previousGeneration: () => existing(paths.currentProfile),

    activates: variant => variant === 'switch',

    registersBoot: () => false,

    async activate(request, ctx) {
      await setProfileCommand(paths.systemProfile, request.outPath)
        .elevate(request.elevate)
        .ssh(request.targetHost)
        .message('Setting system profile')
        .run(ctx)

      const program = resolveActivationProgram(request.outPath, 'sw', 'bin', 'darwin-rebuild')
      await new Command(program)
        .arg('activate')
        .ssh(request.targetHost)
        .message('Activating configuration')
        .elevate(request.elevate && darwinActivationNeedsElevation(request.outPath))
        .run(ctx)
    },

    async registerBoot() {
      // The system profile is set as part of activation
    }
  }
}

export function platformFor(name: PlatformName): PlatformDescriptor {
  switch (name) {
    case 'nixos':
      return nixosPlatform()
    case 'home':
      return homePlatform()
    case 'darwin':
      return darwinPlatform()
  }
}

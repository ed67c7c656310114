/**
 * Rebuild orchestration
 *
 * Sequences one rebuild as a fixed series of states:
 *
 *   resolve-installable → build → resolve-specialisation → diff
 *     → confirm → copy-remote → activate → register-boot → done
 *
 * Dry runs and build-only variants stop after `diff`. The temporary output
 * link, when one is used, lives until the last state has finished.
 */

import type { DiffMode, DiffToolConfig, EnvContext, Installable } from '../types.js'
import { Command, type CommandContext } from '../lib/command.js'
import { runBuild } from '../lib/build.js'
import { confirmAction, type Prompter } from '../lib/confirm.js'
import { compareConfigurations } from '../lib/diff.js'
import { checkNotRoot } from '../lib/env-context.js'
import { HostnameError, UnsupportedVariantError } from '../lib/errors.js'
import { resolveEnvInstallable } from '../lib/installable.js'
import { withOutputLink } from '../lib/output-link.js'
import { resolveSpecialisation, targetProfilePath } from '../lib/specialisation.js'
import { resolveAgainstTree } from '../lib/tree.js'
import { updateFlake } from '../lib/update.js'
import type { ActivationRequest, PlatformDescriptor, RebuildVariant } from './platforms.js'

export type RebuildState =
  | 'resolve-installable'
  | 'build'
  | 'resolve-specialisation'
  | 'diff'
  | 'confirm'
  | 'copy-remote'
  | 'activate'
  | 'register-boot'
  | 'done'

export interface RebuildOptions {
  variant: RebuildVariant
  installable: Installable
  /** Configuration name (hostname for NixOS and Darwin, any name for Home-Manager) */
  configName?: string
  outLink?: string
  dry?: boolean
  ask?: boolean
  diff?: DiffMode
  nom?: boolean
  specialisation?: string
  noSpecialisation?: boolean
  buildHost?: string | null
  targetHost?: string | null
  bypassRootCheck?: boolean
  /** Passed to nix build and to the tree probes */
  extraArgs?: string[]
  update?: boolean
  updateInput?: string
  backupExtension?: string
  /** build-vm: include a bootloader in the VM */
  withBootloader?: boolean
}

export interface RebuildDeps {
  ctx: CommandContext
  prompter: Prompter
  diffTool?: DiffToolConfig
  onState?: (state: RebuildState) => void
}

export interface RebuildResult {
  /** States entered, in order */
  states: RebuildState[]
  installable: Installable
  specialisation: string | null
  /** Named output link; null when a temporary link was used */
  outLink: string | null
  activated: boolean
}

interface ConfigName {
  name: string | undefined
  /** The target is not the running machine, so comparing with it is meaningless */
  foreignHost: boolean
}

/**
 * Pick the configuration name. NixOS and Darwin default to the hostname;
 * Home-Manager leaves the name to auto-detection.
 */
export function resolveConfigName(
  platform: PlatformDescriptor,
  explicit: string | undefined,
  env: EnvContext
): ConfigName {
  if (platform.defaultName === 'user') {
    return { name: explicit, foreignHost: false }
  }

  if (explicit !== undefined && explicit !== '') {
    const foreignHost = platform.name === 'nixos' && env.hostname !== null && env.hostname !== explicit
    return { name: explicit, foreignHost }
  }

  if (env.hostname === null) {
    throw new HostnameError()
  }
  return { name: env.hostname, foreignHost: false }
}

export function shouldCompare(mode: DiffMode, previous: string | null, foreignHost: boolean): boolean {
  if (previous === null || mode === 'never') return false
  return mode === 'always' || !foreignHost
}

function isBuildOnly(variant: RebuildVariant): boolean {
  return variant === 'build' || variant === 'build-vm'
}

export async function rebuild(
  platform: PlatformDescriptor,
  options: RebuildOptions,
  deps: RebuildDeps
): Promise<RebuildResult> {
  const { ctx } = deps
  const states: RebuildState[] = []
  const enter = (state: RebuildState): void => {
    states.push(state)
    deps.onState?.(state)
  }

  if (!platform.variants.includes(options.variant)) {
    throw new UnsupportedVariantError(platform.label, options.variant, platform.variants)
  }

  const elevate = platform.rootCheck
    ? checkNotRoot(ctx.env, options.bypassRootCheck ?? false)
    : false

  // --------------------------------------------------------------------------
  enter('resolve-installable')

  const requested = resolveEnvInstallable(ctx.env.overrides[platform.name], options.installable)

  if (options.update || options.updateInput) {
    await updateFlake(requested, { input: options.updateInput }, ctx)
  }

  const { name, foreignHost } = resolveConfigName(platform, options.configName, ctx.env)
  const installable = await resolveAgainstTree(
    requested,
    {
      configType: platform.configType,
      extraPath: platform.toplevel(options.variant, { withBootloader: options.withBootloader }),
      explicitName: name,
      pushDrv: true,
      evalArgs: options.extraArgs
    },
    ctx
  )

  return withOutputLink(options.outLink, platform.outLinkPrefix, async (link) => {
    const result = (specialisation: string | null, activated: boolean): RebuildResult => ({
      states,
      installable,
      specialisation,
      outLink: link.temporary ? null : link.path,
      activated
    })

    // ------------------------------------------------------------------------
    enter('build')

    await runBuild(
      installable,
      {
        outLink: link.path,
        buildHost: options.buildHost,
        nom: options.nom,
        extraArgs: options.extraArgs,
        message: platform.buildMessage(options.variant)
      },
      ctx
    )

    // ------------------------------------------------------------------------
    enter('resolve-specialisation')

    const specialisation = platform.supportsSpecialisation
      ? resolveSpecialisation({
        noSpecialisation: options.noSpecialisation,
        specialisation: options.specialisation,
        markerPath: platform.specialisationMarker(ctx.env)
      })
      : null
    const targetPath = targetProfilePath(link.path, specialisation)
    ctx.reporter.debug(`Target profile: ${targetPath}`)

    // ------------------------------------------------------------------------
    enter('diff')

    const previous = platform.previousGeneration(ctx.env)
    if (shouldCompare(options.diff ?? 'auto', previous, foreignHost) && previous !== null) {
      await compareConfigurations(
        previous,
        targetPath,
        { strictness: platform.diffStrictness, tool: deps.diffTool },
        ctx
      )
    } else {
      ctx.reporter.debug('Skipping configuration comparison')
    }

    if (isBuildOnly(options.variant)) {
      if (options.ask || options.dry) {
        ctx.reporter.warn(`--ask and --dry have no effect for ${options.variant}`)
      }
      enter('done')
      return result(specialisation, false)
    }

    if (options.dry) {
      if (options.ask) {
        ctx.reporter.warn('--ask has no effect as dry run was requested')
      }
      enter('done')
      return result(specialisation, false)
    }

    // ------------------------------------------------------------------------
    enter('confirm')

    await confirmAction(options.ask ?? false, deps.prompter, ctx.reporter)

    const targetHost = options.targetHost ?? null
    if (targetHost !== null) {
      enter('copy-remote')
      await new Command('nix')
        .withRequiredEnv(ctx.env)
        .args(['copy', '--to', `ssh://${targetHost}`, targetPath])
        .message('Copying configuration to target')
        .run(ctx)
    }

    const request: ActivationRequest = {
      outPath: link.path,
      targetPath,
      elevate,
      targetHost,
      backupExtension: options.backupExtension
    }

    if (platform.activates(options.variant)) {
      enter('activate')
      await platform.activate(request, ctx)
    }

    if (platform.registersBoot(options.variant)) {
      enter('register-boot')
      await platform.registerBoot(request, ctx)
    }

    enter('done')
    ctx.reporter.debug(`Completed operation with output path: ${targetPath}`)
    return result(specialisation, true)
  })
}

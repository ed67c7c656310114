/**
 * Rollback orchestration
 *
 *   select-target → diff → confirm → repoint-profile → activate → done
 *
 * If activation fails, the profile is pointed back at the generation that was
 * current before and the activation error is rethrown. A failed revert is
 * reported as ProfileRevertError, which keeps the activation error.
 */

import type { DiffToolConfig, GenerationInfo } from '../types.js'
import { Command, type CommandContext } from '../lib/command.js'
import { confirmAction, type Prompter } from '../lib/confirm.js'
import { compareConfigurations } from '../lib/diff.js'
import { checkNotRoot } from '../lib/env-context.js'
import { ProfileRevertError } from '../lib/errors.js'
import {
  assertProfile,
  currentGenerationNumber,
  findGenerationByNumber,
  findPreviousGeneration,
  generationLinkPath
} from '../lib/generations.js'
import { repointProfile } from '../lib/profile.js'
import { resolveSpecialisation, targetProfilePath } from '../lib/specialisation.js'
import { NIXOS_PATHS, resolveActivationProgram, type NixosPaths } from './platforms.js'

export type RollbackState =
  | 'select-target'
  | 'diff'
  | 'confirm'
  | 'repoint-profile'
  | 'activate'
  | 'revert-profile'
  | 'done'

export interface RollbackOptions {
  /** Generation number to roll back to; the previous one when absent */
  to?: number
  dry?: boolean
  ask?: boolean
  specialisation?: string
  noSpecialisation?: boolean
  bypassRootCheck?: boolean
}

export interface RollbackDeps {
  ctx: CommandContext
  prompter: Prompter
  diffTool?: DiffToolConfig
  paths?: Partial<NixosPaths>
  onState?: (state: RollbackState) => void
}

export interface RollbackResult {
  states: RollbackState[]
  target: GenerationInfo
  /** Generation that was current before the rollback, when known */
  previous: number | null
  activated: boolean
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

export async function rollback(options: RollbackOptions, deps: RollbackDeps): Promise<RollbackResult> {
  const { ctx } = deps
  const paths: NixosPaths = { ...NIXOS_PATHS, ...deps.paths }
  const states: RollbackState[] = []
  const enter = (state: RollbackState): void => {
    states.push(state)
    deps.onState?.(state)
  }

  const elevate = checkNotRoot(ctx.env, options.bypassRootCheck ?? false)

  // --------------------------------------------------------------------------
  enter('select-target')

  assertProfile(paths.systemProfile)
  const target = options.to !== undefined
    ? findGenerationByNumber(paths.systemProfile, options.to)
    : findPreviousGeneration(paths.systemProfile)

  ctx.reporter.info(`Rolling back to generation ${target.number}`)

  const generationLink = generationLinkPath(paths.systemProfile, target.number)
  const specialisation = resolveSpecialisation({
    noSpecialisation: options.noSpecialisation,
    specialisation: options.specialisation,
    markerPath: paths.specialisationMarker
  })

  // --------------------------------------------------------------------------
  enter('diff')

  await compareConfigurations(
    paths.currentProfile,
    generationLink,
    { strictness: 'propagate', tool: deps.diffTool },
    ctx
  )

  if (options.dry) {
    if (options.ask) {
      ctx.reporter.warn('--ask has no effect as dry run was requested')
    }
    ctx.reporter.info(`Dry run: would roll back to generation ${target.number}`)
    enter('done')
    return { states, target, previous: null, activated: false }
  }

  // --------------------------------------------------------------------------
  enter('confirm')

  await confirmAction(options.ask ?? false, deps.prompter, ctx.reporter)

  let previous: number | null = null
  try {
    previous = currentGenerationNumber(paths.systemProfile)
  } catch (err) {
    ctx.reporter.warn(`Failed to get current generation number: ${describeError(err)}`)
  }

  // --------------------------------------------------------------------------
  enter('repoint-profile')

  await repointProfile(
    paths.systemProfile,
    generationLink,
    { elevate, message: 'Setting system profile' },
    ctx
  )

  // --------------------------------------------------------------------------
  enter('activate')

  try {
    const program = resolveActivationProgram(
      targetProfilePath(generationLink, specialisation),
      'bin',
      'switch-to-configuration'
    )
    await new Command(program)
      .arg('switch')
      .elevate(elevate)
      .message('Activating configuration')
      .run(ctx)
  } catch (activationError) {
    if (previous === null) {
      ctx.reporter.warn('Current generation unknown, leaving the system profile as it is')
      throw activationError
    }

    enter('revert-profile')
    try {
      await repointProfile(
        paths.systemProfile,
        generationLinkPath(paths.systemProfile, previous),
        { elevate, message: 'Rolling back system profile' },
        ctx
      )
    } catch (revertError) {
      throw new ProfileRevertError(paths.systemProfile, previous, activationError, revertError)
    }
    throw activationError
  }

  enter('done')
  ctx.reporter.info(`Successfully rolled back to generation ${target.number}`)
  return { states, target, previous, activated: true }
}

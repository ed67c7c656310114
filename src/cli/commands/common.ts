/**
 * Flakeshift CLI - Shared rebuild plumbing
 */

import { rebuild, type RebuildOptions, type RebuildResult } from '../../domain/rebuild.js'
import type { PlatformDescriptor, RebuildVariant } from '../../domain/platforms.js'
import type { CliRuntime } from '../lib/runtime.js'
import { installableFromOptions, parseDiffMode } from '../lib/options.js'
import { c } from '../lib/colors.js'
import * as ui from '../ui.js'

/**
 * Options every rebuild subcommand takes
 */
export function commonRebuildOptions(runtime: CliRuntime, variant: RebuildVariant): RebuildOptions {
  const { opts, config } = runtime
  return {
    variant,
    installable: installableFromOptions(opts),
    outLink: opts.string('out-link'),
    dry: opts.bool('dry'),
    ask: opts.bool('ask'),
    diff: parseDiffMode(opts.string('diff'), config.diff),
    nom: config.nom ? !opts.bool('no-nom') : opts.bool('nom'),
    update: opts.bool('update'),
    updateInput: opts.string('update-input'),
    extraArgs: opts.rest
  }
}

export async function runRebuild(
  platform: PlatformDescriptor,
  options: RebuildOptions,
  runtime: CliRuntime
): Promise<RebuildResult> {
  const result = await rebuild(platform, options, {
    ctx: runtime.ctx,
    prompter: runtime.prompter,
    diffTool: runtime.config.diff_tool,
    onState: state => ui.verbose(`state: ${state}`, runtime.verbose)
  })

  if (result.outLink !== null) {
    ui.log(`${c.label('Output:')} ${c.path(result.outLink)}`)
  }
  if (result.activated) {
    ui.success(`${platform.label} configuration ${options.variant} complete`)
  }
  return result
}

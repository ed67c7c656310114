/**
 * Builder invocation
 *
 *   nix build <installable> [--builders "ssh://host - - - 100"] --out-link <path> [extra]
 *
 * With nom, the builder emits internal-json logs that `nom --json` renders.
 */

import type { Installable } from '../types.js'
import { Command, type CommandContext } from './command.js'
import { toBuildArgs } from './installable.js'

export interface BuildOptions {
  outLink: string
  /** Remote builder host */
  buildHost?: string | null
  /** Pipe the build log through nix-output-monitor */
  nom?: boolean
  extraArgs?: readonly string[]
  message?: string
}

/**
 * Remote builder entry in the form the builder's --builders flag takes it
 */
export function builderSpec(host: string): string {
  return `ssh://${host} - - - 100`
}

/**
 * Arguments after `nix`, in the order the builder receives them
 */
export function buildArgs(installable: Installable, options: BuildOptions): string[] {
  const args = ['build', ...toBuildArgs(installable)]
  if (options.buildHost) {
    args.push('--builders', builderSpec(options.buildHost))
  }
  args.push('--out-link', options.outLink)
  args.push(...(options.extraArgs ?? []))
  if (options.nom) {
    args.push('--log-format', 'internal-json', '--verbose')
  }
  return args
}

export async function runBuild(
  installable: Installable,
  options: BuildOptions,
  ctx: CommandContext
): Promise<void> {
  const build = new Command('nix')
    .withRequiredEnv(ctx.env)
    .args(buildArgs(installable, options))
    .message(options.message ?? 'Building configuration')

  if (!options.nom) {
    await build.run(ctx)
    return
  }

  await build.pipeInto(new Command('nom').arg('--json'), ctx)
}

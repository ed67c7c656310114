/**
 * Interactive exploration of a configuration with `nix repl`
 */

import type { Installable } from '../types.js'
import { Command, type CommandContext } from '../lib/command.js'
import { assertEvaluable, resolveEnvInstallable, toBuildArgs } from '../lib/installable.js'
import { resolveAgainstTree } from '../lib/tree.js'
import type { PlatformDescriptor } from './platforms.js'
import { resolveConfigName } from './rebuild.js'

export interface ReplOptions {
  installable: Installable
  configName?: string
  extraArgs?: string[]
}

/**
 * Open a REPL on the configuration itself, not on its build output
 */
export async function openRepl(
  platform: PlatformDescriptor,
  options: ReplOptions,
  ctx: CommandContext
): Promise<Installable> {
  const requested = resolveEnvInstallable(ctx.env.overrides[platform.name], options.installable)
  assertEvaluable(requested, 'nix repl')

  const { name } = resolveConfigName(platform, options.configName, ctx.env)
  const installable = await resolveAgainstTree(
    requested,
    {
      configType: platform.configType,
      extraPath: [],
      explicitName: name,
      pushDrv: false
    },
    ctx
  )

  await new Command('nix')
    .withRequiredEnv(ctx.env)
    .arg('repl')
    .args(toBuildArgs(installable))
    .args(options.extraArgs ?? [])
    .run(ctx)

  return installable
}

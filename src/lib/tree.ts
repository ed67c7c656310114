/**
 * Resolving an installable against a tree of configurations
 *
 * `nixosConfigurations`, `homeConfigurations` and `darwinConfigurations` are
 * attribute sets of named configurations. An installable without an attribute
 * path is pointed at one of them:
 *
 *   .  →  .#nixosConfigurations.myhost.config.system.build.toplevel
 *
 * Membership is probed with `nix eval --apply 'x: x ? "name"'`; only a
 * trimmed stdout of "true" counts as present.
 */

import type { EnvContext, Installable, TreeInstallable } from '../types.js'
import { Command, type CommandContext } from './command.js'
import { appendAttribute, describeInstallable, toBuildArgs } from './installable.js'
import { requireUser } from './env-context.js'
import { ConfigurationNotFoundError, ExplicitConfigurationNotFoundError, HostnameError } from './errors.js'

export interface TreeResolveOptions {
  /** Root attribute, e.g. "nixosConfigurations" */
  configType: string
  /** Appended after the configuration name when `pushDrv` is set */
  extraPath: readonly string[]
  /** Configuration name given explicitly; auto-detected otherwise */
  explicitName?: string
  /** Append `extraPath` to address a buildable derivation */
  pushDrv: boolean
  /** Extra arguments for nix eval */
  evalArgs?: readonly string[]
}

function probeExpression(name: string): string {
  return `x: x ? ${JSON.stringify(name)}`
}

/**
 * Ask the evaluator whether `name` is an attribute of `installable`
 */
export async function hasAttribute(
  installable: TreeInstallable,
  name: string,
  evalArgs: readonly string[],
  ctx: CommandContext
): Promise<boolean> {
  const probe = new Command('nix')
    .withRequiredEnv(ctx.env)
    .arg('eval')
    .args(evalArgs)
    .args(['--apply', probeExpression(name)])
    .args(toBuildArgs(installable))

  try {
    const output = await probe.runCapture(ctx)
    return output !== null && output.trim() === 'true'
  } catch (err) {
    ctx.reporter.debug(`Probe for "${name}" failed: ${err instanceof Error ? err.message : String(err)}`)
    return false
  }
}

/**
 * Default names to try: "user@host", then "user"
 */
export function autoDetectNames(env: EnvContext): string[] {
  const user = requireUser(env)
  if (env.hostname === null) {
    throw new HostnameError()
  }
  return [`${user}@${env.hostname}`, user]
}

/**
 * Point `installable` at a configuration inside `configType`.
 *
 * Installables that already carry an attribute path are returned unchanged,
 * as are store and system installables.
 */
export async function resolveAgainstTree(
  installable: Installable,
  options: TreeResolveOptions,
  ctx: CommandContext
): Promise<Installable> {
  if (installable.kind === 'store' || installable.kind === 'system') {
    return installable
  }
  if (installable.attribute.length > 0) {
    ctx.reporter.debug(`Using explicit attribute path from installable: ${describeInstallable(installable)}`)
    return installable
  }

  const root: TreeInstallable = { ...installable, attribute: [options.configType] }
  const evalArgs = options.evalArgs ?? []
  const finish = (name: string): Installable =>
    appendAttribute(root, options.pushDrv ? [name, ...options.extraPath] : [name])

  if (options.explicitName !== undefined) {
    if (await hasAttribute(root, options.explicitName, evalArgs, ctx)) {
      ctx.reporter.debug(`Using explicit configuration: ${options.explicitName}`)
      return finish(options.explicitName)
    }
    throw new ExplicitConfigurationNotFoundError(
      describeInstallable(appendAttribute(root, [options.explicitName]))
    )
  }

  const attempted: string[] = []
  for (const name of autoDetectNames(ctx.env)) {
    attempted.push(describeInstallable(appendAttribute(root, [name])))
    if (await hasAttribute(root, name, evalArgs, ctx)) {
      ctx.reporter.debug(`Using automatically detected configuration: ${name}`)
      return finish(name)
    }
  }

  throw new ConfigurationNotFoundError(attempted)
}

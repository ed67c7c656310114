/**
 * Flakeshift - programmatic API
 *
 * @example
 * ```ts
 * import {
 *   createEnvContext, createReadlinePrompter, detectElevation, flakeInstallable, NodeSpawner, nixosPlatform, rebuild
 * } from 'flakeshift'
 *
 * const env = createEnvContext()
 * const spawner = new NodeSpawner()
 * const ctx = {
 *   env,
 *   spawner,
 *   elevation: await detectElevation(env.platform, spawner, env.ambient),
 *   reporter: { info: console.error, warn: console.error, debug: () => {} }
 * }
 *
 * await rebuild(nixosPlatform(), { variant: 'test', installable: flakeInstallable('.') }, {
 *   ctx,
 *   prompter: createReadlinePrompter()
 * })
 * ```
 */

export * from './types.js'

// Addressing
export { parseAttribute, joinAttribute } from './lib/attribute-path.js'
export {
  flakeInstallable,
  parseFlakeInstallable,
  resolveEnvInstallable,
  defaultInstallable,
  isTreeInstallable,
  appendAttribute,
  assertEvaluable,
  toBuildArgs,
  describeInstallable
} from './lib/installable.js'
export { resolveAgainstTree, hasAttribute, autoDetectNames, type TreeResolveOptions } from './lib/tree.js'

// Commands
export { Command, type CommandContext, type Invocation } from './lib/command.js'
export { NodeSpawner, type Spawner, type SpawnRequest, type SpawnResult, type PipeResult } from './lib/spawner.js'
export {
  LinuxElevation,
  DarwinElevation,
  detectElevation,
  type ElevationStrategy,
  type ElevationRequest,
  type ElevatedInvocation,
  type EnvAction
} from './lib/elevation.js'
export { createEnvContext, checkNotRoot, requireUser, requireHome } from './lib/env-context.js'
export { loadConfig, mergeConfig, DEFAULT_CONFIG } from './lib/config-loader.js'
export { createReadlinePrompter, confirmAction, type Prompter, type ReadlinePrompterOptions } from './lib/confirm.js'
export { compareConfigurations, DEFAULT_DIFF_TOOL } from './lib/diff.js'
export { buildArgs, runBuild, builderSpec, type BuildOptions } from './lib/build.js'
export { updateFlake } from './lib/update.js'

// Generations
export {
  listGenerations,
  sortGenerations,
  findPreviousGeneration,
  findGenerationByNumber,
  currentGenerationNumber,
  generationLinkPath,
  parseGenerationNumber
} from './lib/generations.js'
export { repointProfile } from './lib/profile.js'
export { createOutputLink, withOutputLink, type OutputLink } from './lib/output-link.js'
export { resolveSpecialisation, targetProfilePath } from './lib/specialisation.js'

// Orchestration
export {
  nixosPlatform,
  homePlatform,
  darwinPlatform,
  platformFor,
  type PlatformDescriptor,
  type RebuildVariant,
  type ActivationRequest
} from './domain/platforms.js'
export { rebuild, type RebuildOptions, type RebuildResult, type RebuildState, type RebuildDeps } from './domain/rebuild.js'
export { rollback, type RollbackOptions, type RollbackResult, type RollbackState, type RollbackDeps } from './domain/rollback.js'
export { openRepl, type ReplOptions } from './domain/repl.js'
export { profileGenerations, toGenerationRow, type GenerationRow } from './domain/info.js'

export * from './lib/errors.js'

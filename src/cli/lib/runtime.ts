/**
 * Flakeshift CLI - Runtime wiring
 *
 * Everything an orchestrator needs, built once per invocation from the
 * process environment and the config file.
 */

import type { FlakeshiftConfig } from '../../types.js'
import type { CommandContext } from '../../lib/command.js'
import { loadConfig } from '../../lib/config-loader.js'
import { createReadlinePrompter, type Prompter } from '../../lib/confirm.js'
import { detectElevation } from '../../lib/elevation.js'
import { createEnvContext } from '../../lib/env-context.js'
import { NodeSpawner } from '../../lib/spawner.js'
import { createReporter } from '../ui.js'
import { ParsedOptions } from './options.js'

export interface CliRuntime {
  opts: ParsedOptions
  config: FlakeshiftConfig
  ctx: CommandContext
  prompter: Prompter
  verbose: boolean
}

export async function createRuntime(opts: ParsedOptions): Promise<CliRuntime> {
  const verbose = opts.bool('verbose')
  const env = createEnvContext()
  const config = loadConfig(env)
  const spawner = new NodeSpawner()
  const elevation = await detectElevation(env.platform, spawner, env.ambient, config.elevation.program)
  const reporter = createReporter({ verbose })

  reporter.debug(`Using ${elevation.name} elevation via ${config.elevation.program}`)

  return {
    opts,
    config,
    ctx: { spawner, env, elevation, reporter },
    prompter: createReadlinePrompter(),
    verbose
  }
}

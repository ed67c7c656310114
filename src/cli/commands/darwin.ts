/**
 * Flakeshift CLI - Darwin Command Group
 *
 * nix-darwin: switch, build, repl
 */

import { darwinPlatform } from '../../domain/platforms.js'
import { openRepl } from '../../domain/repl.js'
import type { CliRuntime } from '../lib/runtime.js'
import { installableFromOptions } from '../lib/options.js'
import { c, print } from '../lib/colors.js'
import * as ui from '../ui.js'
import { commonRebuildOptions, runRebuild } from './common.js'

/**
 * Router for darwin subcommands
 */
export async function runDarwinGroup(runtime: CliRuntime): Promise<void> {
  const { opts } = runtime
  const subcommand = opts.command[1] ?? ''

  switch (subcommand) {
    case 'switch':
    case 'build':
      await runRebuild(darwinPlatform(), {
        ...commonRebuildOptions(runtime, subcommand),
        configName: opts.string('hostname'),
        buildHost: opts.string('build-host') ?? runtime.config.builder ?? null,
        bypassRootCheck: opts.bool('bypass-root-check')
      }, runtime)
      break

    case 'repl':
      await openRepl(darwinPlatform(), {
        installable: installableFromOptions(opts),
        configName: opts.string('hostname'),
        extraArgs: opts.rest
      }, runtime.ctx)
      break

    default:
      print.error(`Unknown darwin subcommand: ${c.command(subcommand)}`)
      ui.log(`Run "${c.command('flakeshift darwin --help')}" for usage information`)
      process.exitCode = 1
  }
}

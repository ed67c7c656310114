/**
 * Flakeshift CLI - Home Command Group
 *
 * Home-Manager: switch, build, repl
 */

import { homePlatform } from '../../domain/platforms.js'
import { openRepl } from '../../domain/repl.js'
import type { CliRuntime } from '../lib/runtime.js'
import { installableFromOptions } from '../lib/options.js'
import { c, print } from '../lib/colors.js'
import * as ui from '../ui.js'
import { commonRebuildOptions, runRebuild } from './common.js'

/**
 * Router for home subcommands
 */
export async function runHomeGroup(runtime: CliRuntime): Promise<void> {
  const { opts } = runtime
  const subcommand = opts.command[1] ?? ''

  switch (subcommand) {
    case 'switch':
    case 'build':
      await runRebuild(homePlatform(), {
        ...commonRebuildOptions(runtime, subcommand),
        configName: opts.string('configuration'),
        specialisation: opts.string('specialisation'),
        noSpecialisation: opts.bool('no-specialisation'),
        backupExtension: opts.string('backup-extension')
      }, runtime)
      break

    case 'repl':
      await openRepl(homePlatform(), {
        installable: installableFromOptions(opts),
        configName: opts.string('configuration'),
        extraArgs: opts.rest
      }, runtime.ctx)
      break

    default:
      print.error(`Unknown home subcommand: ${c.command(subcommand)}`)
      ui.log(`Run "${c.command('flakeshift home --help')}" for usage information`)
      process.exitCode = 1
  }
}

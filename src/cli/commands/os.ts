/**
 * Flakeshift CLI - OS Command Group
 *
 * NixOS: switch, boot, test, build, build-vm, repl, rollback, info
 */

import { nixosPlatform, type RebuildVariant } from '../../domain/platforms.js'
import { openRepl } from '../../domain/repl.js'
import { rollback } from '../../domain/rollback.js'
import { profileGenerations, toGenerationRow } from '../../domain/info.js'
import { InvalidOptionError } from '../../lib/errors.js'
import type { CliRuntime } from '../lib/runtime.js'
import { installableFromOptions } from '../lib/options.js'
import { c, print } from '../lib/colors.js'
import * as ui from '../ui.js'
import { commonRebuildOptions, runRebuild } from './common.js'

const REBUILD_VARIANTS: readonly RebuildVariant[] = ['switch', 'boot', 'test', 'build', 'build-vm']

function isRebuildVariant(value: string): value is RebuildVariant {
  return REBUILD_VARIANTS.some(variant => variant === value)
}

/**
 * Router for os subcommands
 */
export async function runOsGroup(runtime: CliRuntime): Promise<void> {
  const subcommand = runtime.opts.command[1] ?? ''

  if (isRebuildVariant(subcommand)) {
    await runOsRebuild(subcommand, runtime)
    return
  }

  switch (subcommand) {
    case 'repl':
      await openRepl(nixosPlatform(), {
        installable: installableFromOptions(runtime.opts),
        configName: runtime.opts.string('hostname'),
        extraArgs: runtime.opts.rest
      }, runtime.ctx)
      break

    case 'rollback':
      await runOsRollback(runtime)
      break

    case 'info':
      runOsInfo(runtime)
      break

    default:
      print.error(`Unknown os subcommand: ${c.command(subcommand)}`)
      ui.log(`Run "${c.command('flakeshift os --help')}" for usage information`)
      process.exitCode = 1
  }
}

async function runOsRebuild(variant: RebuildVariant, runtime: CliRuntime): Promise<void> {
  const { opts, config } = runtime
  await runRebuild(nixosPlatform(), {
    ...commonRebuildOptions(runtime, variant),
    configName: opts.string('hostname'),
    specialisation: opts.string('specialisation'),
    noSpecialisation: opts.bool('no-specialisation'),
    buildHost: opts.string('build-host') ?? config.builder ?? null,
    targetHost: opts.string('target-host') ?? null,
    bypassRootCheck: opts.bool('bypass-root-check'),
    withBootloader: opts.bool('with-bootloader')
  }, runtime)
}

function parseGenerationOption(value: string | undefined): number | undefined {
  if (value === undefined) return undefined
  if (!/^\d+$/.test(value)) {
    throw new InvalidOptionError('--to', value, 'a generation number')
  }
  return Number(value)
}

async function runOsRollback(runtime: CliRuntime): Promise<void> {
  const { opts } = runtime
  const result = await rollback({
    to: parseGenerationOption(opts.string('to')),
    dry: opts.bool('dry'),
    ask: opts.bool('ask'),
    specialisation: opts.string('specialisation'),
    noSpecialisation: opts.bool('no-specialisation'),
    bypassRootCheck: opts.bool('bypass-root-check')
  }, {
    ctx: runtime.ctx,
    prompter: runtime.prompter,
    diffTool: runtime.config.diff_tool,
    onState: state => ui.verbose(`state: ${state}`, runtime.verbose)
  })

  if (result.activated) {
    ui.success(`Now on generation ${c.generation(String(result.target.number))}`)
  }
}

function runOsInfo(runtime: CliRuntime): void {
  const generations = profileGenerations(runtime.opts.string('profile'))

  ui.output(ui.formatTable(
    [
      { key: 'generation', header: 'Generation', align: 'right' },
      { key: 'date', header: 'Build date' },
      { key: 'version', header: 'NixOS version' },
      { key: 'kernel', header: 'Kernel' },
      { key: 'specialisations', header: 'Specialisations' },
      { key: 'current', header: 'Current', align: 'center' }
    ],
    generations.map(toGenerationRow)
  ))
}

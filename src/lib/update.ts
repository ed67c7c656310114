/**
 * Flake input updates before a build
 */

import type { Installable } from '../types.js'
import { Command, type CommandContext } from './command.js'

export interface UpdateOptions {
  /** Update a single input instead of the whole lock file */
  input?: string
}

export function updateArgs(reference: string, options: UpdateOptions): string[] {
  return options.input
    ? ['flake', 'lock', '--update-input', options.input, reference]
    : ['flake', 'update', '--flake', reference]
}

/**
 * Refresh the lock file of a flake installable. Other kinds have no lock file
 * and are left alone with a warning.
 */
export async function updateFlake(
  installable: Installable,
  options: UpdateOptions,
  ctx: CommandContext
): Promise<void> {
  if (installable.kind !== 'flake') {
    ctx.reporter.warn(`Only flake installables can be updated, ignoring update for ${installable.kind} installable`)
    return
  }

  await new Command('nix')
    .withRequiredEnv(ctx.env)
    .args(updateArgs(installable.reference, options))
    .message(options.input ? `Updating flake input ${options.input}` : 'Updating flake lock file')
    .run(ctx)
}

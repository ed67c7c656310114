/**
 * Configuration comparison
 *
 * Runs the diff tool (nvd by default) with the old and new closures as its
 * last two arguments. Only the exit status is interpreted.
 */

import type { DiffStrictness, DiffToolConfig } from '../types.js'
import { Command, type CommandContext } from './command.js'

export const DEFAULT_DIFF_TOOL: DiffToolConfig = {
  program: 'nvd',
  args: ['diff']
}

export interface CompareOptions {
  /** 'propagate' rethrows tool failures, 'swallow' logs them */
  strictness: DiffStrictness
  tool?: DiffToolConfig
  message?: string
}

export async function compareConfigurations(
  oldPath: string,
  newPath: string,
  options: CompareOptions,
  ctx: CommandContext
): Promise<void> {
  const tool = options.tool ?? DEFAULT_DIFF_TOOL
  const command = new Command(tool.program)
    .args(tool.args)
    .args([oldPath, newPath])
    .message(options.message ?? 'Comparing changes')

  try {
    await command.run(ctx)
  } catch (err) {
    if (options.strictness === 'propagate') {
      throw err
    }
    ctx.reporter.warn(`Comparing configurations failed: ${err instanceof Error ? err.message : String(err)}`)
  }
}

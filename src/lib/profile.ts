/**
 * Profile pointer updates
 *
 * The profile symlink is replaced, never edited: a new link is created next
 * to it and renamed over the old one.
 */

import fs from 'node:fs'
import path from 'node:path'
import { Command, type CommandContext } from './command.js'

export interface RepointOptions {
  elevate: boolean
  message?: string
}

/**
 * Link target as stored in the profile: relative when the generation sits
 * next to the profile, as the nix tools write it
 */
export function profileLinkTarget(profilePath: string, generationPath: string): string {
  return path.dirname(generationPath) === path.dirname(profilePath)
    ? path.basename(generationPath)
    : generationPath
}

function stagingPath(profilePath: string): string {
  return `${profilePath}.flakeshift-${process.pid}`
}

/**
 * Point `profilePath` at `generationPath`
 */
export async function repointProfile(
  profilePath: string,
  generationPath: string,
  options: RepointOptions,
  ctx: CommandContext
): Promise<void> {
  const target = profileLinkTarget(profilePath, generationPath)
  const staging = stagingPath(profilePath)

  if (options.message) {
    ctx.reporter.info(options.message)
  }

  if (!options.elevate) {
    ctx.reporter.debug(`${profilePath} -> ${target}`)
    fs.rmSync(staging, { force: true })
    fs.symlinkSync(target, staging)
    fs.renameSync(staging, profilePath)
    return
  }

  await new Command('ln')
    .args(['-sfn', target, staging])
    .elevate(true)
    .run(ctx)

  // -T (GNU) and -h (BSD) rename the link itself instead of moving into the
  // directory it points at
  const noFollow = ctx.env.platform === 'darwin' ? '-fh' : '-fT'
  await new Command('mv')
    .args([noFollow, staging, profilePath])
    .elevate(true)
    .run(ctx)
}

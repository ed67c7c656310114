/**
 * Privilege elevation strategies
 *
 * Linux:   sudo [--preserve-env=A,B] [-A] [env K=V ...] program args
 * Darwin:  sudo --set-home [--preserve-env=A,B env] [-A] [K=V ...] program args
 *
 * Darwin's sudo may lack --preserve-env; that is probed once at startup.
 */

import type { Spawner } from './spawner.js'

export type EnvAction =
  | { type: 'set'; value: string }
  | { type: 'preserve' }
  | { type: 'unset' }

export interface ElevationRequest {
  program: string
  args: readonly string[]
  envActions: ReadonlyMap<string, EnvAction>
  askpass: string | null
}

export interface ElevatedInvocation {
  program: string
  args: string[]
  /** Variables added to the elevation program's own environment */
  extraEnv: Record<string, string>
}

export interface ElevationStrategy {
  readonly name: string
  wrap(request: ElevationRequest): ElevatedInvocation
}

interface EnvSplit {
  preserve: string[]
  explicit: Array<[string, string]>
}

function splitEnvActions(actions: ReadonlyMap<string, EnvAction>): EnvSplit {
  const preserve: string[] = []
  const explicit: Array<[string, string]> = []

  for (const [key, action] of actions) {
    if (action.type === 'preserve') {
      preserve.push(key)
    } else if (action.type === 'set') {
      explicit.push([key, action.value])
    }
    // 'unset' is simply never forwarded
  }

  return { preserve, explicit }
}

function finish(
  program: string,
  flags: string[],
  envStarted: boolean,
  split: EnvSplit,
  request: ElevationRequest
): ElevatedInvocation {
  const args = [...flags]
  const extraEnv: Record<string, string> = {}

  if (request.askpass !== null) {
    extraEnv.SUDO_ASKPASS = request.askpass
    args.push('-A')
  }

  if (envStarted || split.explicit.length > 0) {
    args.push('env')
    for (const [key, value] of split.explicit) {
      args.push(`${key}=${value}`)
    }
  }

  args.push(request.program, ...request.args)
  return { program, args, extraEnv }
}

export class LinuxElevation implements ElevationStrategy {
  readonly name = 'linux'

  constructor(private readonly program: string = 'sudo') {}

  wrap(request: ElevationRequest): ElevatedInvocation {
    const split = splitEnvActions(request.envActions)
    const flags = split.preserve.length > 0
      ? [`--preserve-env=${split.preserve.join(',')}`]
      : []
    return finish(this.program, flags, false, split, request)
  }
}

export class DarwinElevation implements ElevationStrategy {
  readonly name = 'darwin'

  constructor(
    private readonly program: string = 'sudo',
    private readonly supportsPreserveEnv: boolean = false
  ) {}

  wrap(request: ElevationRequest): ElevatedInvocation {
    const split = splitEnvActions(request.envActions)

    if (this.supportsPreserveEnv && split.preserve.length > 0) {
      const flags = ['--set-home', `--preserve-env=${split.preserve.join(',')}`]
      return finish(this.program, flags, true, split, request)
    }

    return finish(this.program, ['--set-home'], false, split, request)
  }
}

/**
 * Pick the strategy for the host, probing `sudo --help` on Darwin
 */
export async function detectElevation(
  platform: NodeJS.Platform,
  spawner: Spawner,
  ambient: Readonly<Record<string, string>>,
  program: string = 'sudo'
): Promise<ElevationStrategy> {
  if (platform !== 'darwin') {
    return new LinuxElevation(program)
  }

  let supportsPreserveEnv = false
  try {
    const result = await spawner.spawn({
      program,
      args: ['--help'],
      env: { ...ambient },
      stdout: 'capture'
    })
    supportsPreserveEnv = result.stdout.includes('--preserve-env')
  } catch {
    // No usable sudo: fall back to the minimal flag set
    supportsPreserveEnv = false
  }

  return new DarwinElevation(program, supportsPreserveEnv)
}

/**
 * Command runner
 *
 * Builds and runs external commands with an explicit environment policy,
 * optional elevation and optional remote execution:
 *
 * @example
 * ```ts
 * await new Command('ln')
 *   .args(['-sfn', 'system-41-link', '/nix/var/nix/profiles/system'])
 *   .elevate(true)
 *   .message('Setting system profile')
 *   .run(ctx)
 * ```
 *
 * Remote execution runs `ssh -T host` and writes the whole command line to
 * its stdin.
 */

import type { EnvContext, Reporter } from '../types.js'
import type { ElevationStrategy, EnvAction } from './elevation.js'
import type { Spawner, SpawnRequest } from './spawner.js'
import { NIX_PRESERVED_VARS } from './env-context.js'
import { ExitError } from './errors.js'
import { renderCommandLine } from './shell.js'

export interface CommandContext {
  spawner: Spawner
  env: EnvContext
  elevation: ElevationStrategy
  reporter: Reporter
}

export interface Invocation {
  program: string
  args: string[]
  env: Record<string, string>
  input?: string
}

export class Command {
  private readonly argv: string[] = []
  private readonly envActions = new Map<string, EnvAction>()
  private elevated = false
  private dryRun = false
  private sshHost: string | null = null
  private description: string | null = null

  constructor(private readonly program: string) {}

  elevate(elevate: boolean = true): this {
    this.elevated = elevate
    return this
  }

  dry(dry: boolean = true): this {
    this.dryRun = dry
    return this
  }

  ssh(host: string | null | undefined): this {
    this.sshHost = host ?? null
    return this
  }

  arg(arg: string): this {
    this.argv.push(arg)
    return this
  }

  args(args: readonly string[]): this {
    this.argv.push(...args)
    return this
  }

  message(message: string): this {
    this.description = message
    return this
  }

  setEnv(key: string, value: string): this {
    this.envActions.set(key, { type: 'set', value })
    return this
  }

  preserveEnv(keys: readonly string[]): this {
    for (const key of keys) {
      this.envActions.set(key, { type: 'preserve' })
    }
    return this
  }

  unsetEnv(key: string): this {
    this.envActions.set(key, { type: 'unset' })
    return this
  }

  /**
   * Keep the caller's HOME and USER and the Nix configuration variables
   */
  withNixEnv(env: EnvContext): this {
    if (env.home !== null) this.setEnv('HOME', env.home)
    if (env.user !== null) this.setEnv('USER', env.user)
    return this.preserveEnv(NIX_PRESERVED_VARS)
  }

  /**
   * Forward every FLAKESHIFT_* variable
   */
  withToolEnv(env: EnvContext): this {
    for (const [key, value] of Object.entries(env.toolVars)) {
      this.setEnv(key, value)
    }
    return this
  }

  withRequiredEnv(env: EnvContext): this {
    return this.withNixEnv(env).withToolEnv(env)
  }

  /**
   * Resolve the final program, arguments, environment and stdin
   */
  invocation(ctx: Pick<CommandContext, 'env' | 'elevation'>): Invocation {
    const ambient = ctx.env.ambient
    let local: Invocation

    if (this.elevated) {
      const wrapped = ctx.elevation.wrap({
        program: this.program,
        args: this.argv,
        envActions: this.envActions,
        askpass: ctx.env.askpass
      })
      local = {
        program: wrapped.program,
        args: wrapped.args,
        env: { ...ambient, ...wrapped.extraEnv }
      }
    } else {
      local = {
        program: this.program,
        args: [...this.argv],
        env: applyEnvActions(ambient, this.envActions)
      }
    }

    if (this.sshHost === null) {
      return local
    }

    return {
      program: 'ssh',
      args: ['-T', this.sshHost],
      env: { ...ambient },
      input: renderCommandLine(local.program, local.args)
    }
  }

  /**
   * Command line as it would be typed, including any ssh wrapper
   */
  commandLine(ctx: Pick<CommandContext, 'env' | 'elevation'>): string {
    const invocation = this.invocation(ctx)
    const line = renderCommandLine(invocation.program, invocation.args)
    return invocation.input !== undefined ? `${line} <<< ${invocation.input}` : line
  }

  /**
   * Run with inherited stdio. Throws ExitError on a non-zero exit.
   */
  async run(ctx: CommandContext): Promise<void> {
    await this.execute(ctx, 'inherit')
  }

  /**
   * Run and return stdout, or null in dry mode
   */
  async runCapture(ctx: CommandContext): Promise<string | null> {
    return this.execute(ctx, 'capture')
  }

  /**
   * Run `this | tail`. Fails when either side exits unsuccessfully,
   * tail first.
   */
  async pipeInto(tail: Command, ctx: CommandContext): Promise<void> {
    const head = this.request(ctx, 'inherit')
    const tailRequest = tail.request(ctx, 'inherit')
    const line = `${this.commandLine(ctx)} | ${tail.commandLine(ctx)}`

    this.announce(ctx, line)
    if (this.dryRun) return

    const result = await ctx.spawner.pipe(head, tailRequest)
    if (result.tail.status !== 0) {
      throw new ExitError(line, result.tail.status, result.tail.signal, this.description ?? undefined)
    }
    if (result.head.status !== 0) {
      throw new ExitError(line, result.head.status, result.head.signal, this.description ?? undefined)
    }
  }

  private request(ctx: CommandContext, stdout: SpawnRequest['stdout']): SpawnRequest {
    return { ...this.invocation(ctx), stdout }
  }

  private announce(ctx: CommandContext, line: string): void {
    if (this.description !== null) {
      ctx.reporter.info(this.description)
    }
    ctx.reporter.debug(this.dryRun ? `(dry) ${line}` : line)
  }

  private async execute(ctx: CommandContext, stdout: SpawnRequest['stdout']): Promise<string | null> {
    const request = this.request(ctx, stdout)
    const line = this.commandLine(ctx)

    this.announce(ctx, line)
    if (this.dryRun) return null

    const result = await ctx.spawner.spawn(request)
    if (result.status !== 0) {
      throw new ExitError(line, result.status, result.signal, this.description ?? undefined)
    }
    return result.stdout
  }
}

function applyEnvActions(
  ambient: Readonly<Record<string, string>>,
  actions: ReadonlyMap<string, EnvAction>
): Record<string, string> {
  const env: Record<string, string> = { ...ambient }
  for (const [key, action] of actions) {
    if (action.type === 'set') {
      env[key] = action.value
    } else if (action.type === 'unset') {
      delete env[key]
    }
    // 'preserve' keeps whatever the ambient environment has
  }
  return env
}

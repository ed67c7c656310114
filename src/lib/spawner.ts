/**
 * Process spawning
 *
 * The only place that starts child processes. Everything above talks to the
 * Spawner interface so that tests can substitute an in-process fake.
 */

import { spawn, type ChildProcess, type StdioOptions } from 'node:child_process'
import { SpawnError } from './errors.js'
import { renderCommandLine } from './shell.js'

export interface SpawnRequest {
  program: string
  args: string[]
  /** Complete environment of the child */
  env: Record<string, string>
  /** Text written to stdin; stdin is inherited when absent */
  input?: string
  /** 'capture' collects stdout as text, stderr stays attached to the terminal */
  stdout: 'inherit' | 'capture'
}

export interface SpawnResult {
  /** Exit code, null when the process was killed by a signal */
  status: number | null
  signal: string | null
  /** Captured stdout ('' unless stdout was 'capture') */
  stdout: string
}

export interface PipeResult {
  head: SpawnResult
  tail: SpawnResult
}

export interface Spawner {
  spawn(request: SpawnRequest): Promise<SpawnResult>
  /**
   * Run `head | tail`. Both stdout and stderr of head feed tail's stdin.
   */
  pipe(head: SpawnRequest, tail: SpawnRequest): Promise<PipeResult>
}

function waitForExit(child: ChildProcess, request: SpawnRequest): Promise<SpawnResult> {
  return new Promise((resolve, reject) => {
    let stdout = ''
    child.stdout?.setEncoding('utf-8')
    if (request.stdout === 'capture') {
      child.stdout?.on('data', (chunk: string) => {
        stdout += chunk
      })
    }

    child.on('error', (err) => {
      reject(new SpawnError(renderCommandLine(request.program, request.args), err))
    })

    child.on('close', (code, signal) => {
      resolve({ status: code, signal, stdout })
    })
  })
}

function stdioFor(request: SpawnRequest): StdioOptions {
  return [
    request.input !== undefined ? 'pipe' : 'inherit',
    request.stdout === 'capture' ? 'pipe' : 'inherit',
    'inherit'
  ]
}

/**
 * Spawner backed by node:child_process
 */
export class NodeSpawner implements Spawner {
  async spawn(request: SpawnRequest): Promise<SpawnResult> {
    const child = spawn(request.program, request.args, {
      env: request.env,
      stdio: stdioFor(request)
    })

    const exit = waitForExit(child, request)
    if (request.input !== undefined) {
      child.stdin?.end(request.input)
    }
    return exit
  }

  async pipe(head: SpawnRequest, tail: SpawnRequest): Promise<PipeResult> {
    const tailChild = spawn(tail.program, tail.args, {
      env: tail.env,
      stdio: ['pipe', tail.stdout === 'capture' ? 'pipe' : 'inherit', 'inherit']
    })
    const headChild = spawn(head.program, head.args, {
      env: head.env,
      stdio: ['inherit', 'pipe', 'pipe']
    })

    const tailExit = waitForExit(tailChild, tail)
    const headExit = waitForExit(headChild, { ...head, stdout: 'inherit' })

    if (tailChild.stdin) {
      // tail went away (crashed or never started): nobody reads head's output
      tailChild.stdin.on('error', () => {
        headChild.kill()
      })
      headChild.stdout?.pipe(tailChild.stdin, { end: false })
      headChild.stderr?.pipe(tailChild.stdin, { end: false })
    }

    const [headResult, tailResult] = await Promise.all([
      headExit.finally(() => {
        tailChild.stdin?.end()
      }),
      tailExit
    ])

    return { head: headResult, tail: tailResult }
  }
}

/**
 * Interactive confirmation
 */

import * as readline from 'node:readline'
import type { Reporter } from '../types.js'
import { UserRejectedError } from './errors.js'

export interface Prompter {
  /** Ask a yes/no question; anything but yes is no */
  confirm(question: string): Promise<boolean>
}

export interface ReadlinePrompterOptions {
  input?: NodeJS.ReadableStream
  output?: NodeJS.WritableStream
}

/**
 * Prompter reading from stdin, writing the question to stderr.
 * Input that ends before an answer counts as no.
 */
export function createReadlinePrompter(options: ReadlinePrompterOptions = {}): Prompter {
  const input = options.input ?? process.stdin
  const output = options.output ?? process.stderr

  return {
    confirm(question: string): Promise<boolean> {
      return new Promise((resolve) => {
        const rl = readline.createInterface({ input, output })
        let answered = false

        rl.on('close', () => {
          if (!answered) resolve(false)
        })

        rl.question(`${question} [y/N] `, (answer) => {
          answered = true
          rl.close()
          resolve(isYes(answer))
        })
      })
    }
  }
}

export function isYes(answer: string): boolean {
  const normalized = answer.trim().toLowerCase()
  return normalized === 'y' || normalized === 'yes'
}

/**
 * Block on the prompt when `ask` is set; a negative answer aborts
 */
export async function confirmAction(ask: boolean, prompter: Prompter, reporter: Reporter): Promise<void> {
  if (!ask) return

  reporter.debug('Waiting for confirmation')
  const confirmed = await prompter.confirm('Apply the config?')
  if (!confirmed) {
    throw new UserRejectedError()
  }
}

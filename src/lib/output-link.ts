/**
 * Build output links
 *
 * The builder writes a symlink to its result. Either the caller names the
 * link, or it lives in a private temporary directory that must outlive every
 * step that reads the built path. `withOutputLink` scopes that lifetime.
 */

import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'

export interface OutputLink {
  /** Materialized link path; throws once the link has been released */
  readonly path: string
  readonly temporary: boolean
  release(): void
}

class PersistentOutputLink implements OutputLink {
  readonly temporary = false

  constructor(readonly path: string) {}

  release(): void {
    // The caller owns a named out-link
  }
}

class TemporaryOutputLink implements OutputLink {
  readonly temporary = true
  private released = false

  constructor(private readonly dir: string) {}

  get path(): string {
    if (this.released) {
      throw new Error(`Output link in ${this.dir} was used after release`)
    }
    return path.join(this.dir, 'result')
  }

  release(): void {
    if (this.released) return
    this.released = true
    fs.rmSync(this.dir, { recursive: true, force: true })
  }
}

/**
 * Use `outLink` when given, otherwise a fresh temporary directory
 */
export function createOutputLink(outLink: string | undefined, prefix: string): OutputLink {
  if (outLink !== undefined && outLink !== '') {
    return new PersistentOutputLink(path.resolve(outLink))
  }
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), `${prefix}-`))
  return new TemporaryOutputLink(dir)
}

/**
 * Run `fn` with an output link that is released when `fn` settles
 */
export async function withOutputLink<T>(
  outLink: string | undefined,
  prefix: string,
  fn: (link: OutputLink) => Promise<T>
): Promise<T> {
  const link = createOutputLink(outLink, prefix)
  try {
    return await fn(link)
  } finally {
    link.release()
  }
}

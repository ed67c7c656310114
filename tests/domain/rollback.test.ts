/**
 * Tests for rollback.ts
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import fs from 'node:fs'
import path from 'node:path'
import os from 'node:os'
import type { SpawnRequest } from '../../src/lib/spawner.js'
import { rollback, type RollbackDeps } from '../../src/domain/rollback.js'
import {
  ExitError,
  GenerationNotFoundError,
  ProfileNotFoundError,
  ProfileRevertError,
  RunningAsRootError,
  UserRejectedError
} from '../../src/lib/errors.js'
import {
  FakeSpawner,
  createTestContext,
  createTestEnv,
  isLinkCommand,
  lineOf,
  makeOutput,
  performsLinks,
  type TestContext
} from '../support/fake-spawner.js'

function isActivation(request: SpawnRequest): boolean {
  return lineOf(request).endsWith('switch-to-configuration switch')
}

describe('rollback', () => {
  let tempDir: string
  let profilesDir: string
  let systemProfile: string
  let currentSystem: string
  let marker: string

  function programOf(generation: number, ...special: string[]): string {
    return fs.realpathSync(path.join(profilesDir, `system-${generation}-link`, ...special, 'bin', 'switch-to-configuration'))
  }

  function context(env = createTestEnv()): TestContext {
    return createTestContext(new FakeSpawner().on(isLinkCommand, performsLinks()), env)
  }

  function deps(ctx: TestContext, answer: boolean = true): RollbackDeps {
    return {
      ctx,
      prompter: { confirm: vi.fn(async () => answer) },
      paths: { systemProfile, currentProfile: currentSystem, specialisationMarker: marker }
    }
  }

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'flakeshift-rollback-'))
    profilesDir = path.join(tempDir, 'profiles')
    fs.mkdirSync(profilesDir)
    for (const n of [1, 2, 3]) {
      const output = makeOutput(tempDir, `store-${n}`, {
        'bin/switch-to-configuration': '',
        'specialisation/gaming/bin/switch-to-configuration': ''
      })
      fs.symlinkSync(output, path.join(profilesDir, `system-${n}-link`))
    }
    systemProfile = path.join(profilesDir, 'system')
    fs.symlinkSync('system-3-link', systemProfile)
    currentSystem = path.join(tempDir, 'current-system')
    fs.symlinkSync(path.join(tempDir, 'store-3'), currentSystem)
    marker = path.join(tempDir, 'specialisation')
  })

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  it('should switch to the previous generation', async () => {
    const ctx = context()
    const result = await rollback({}, deps(ctx))

    expect(result.states).toEqual(['select-target', 'diff', 'confirm', 'repoint-profile', 'activate', 'done'])
    expect(result.target.number).toBe(2)
    expect(result.previous).toBe(3)
    expect(result.activated).toBe(true)
    expect(fs.readlinkSync(systemProfile)).toBe('system-2-link')

    const staging = `${systemProfile}.flakeshift-${process.pid}`
    expect(ctx.spawner.lines()).toEqual([
      `nvd diff ${currentSystem} ${path.join(profilesDir, 'system-2-link')}`,
      `sudo ln -sfn system-2-link ${staging}`,
      `sudo mv -fT ${staging} ${systemProfile}`,
      `sudo ${programOf(2)} switch`
    ])
    expect(ctx.reporter.infos[0]).toBe('Rolling back to generation 2')
    expect(ctx.reporter.infos.at(-1)).toBe('Successfully rolled back to generation 2')
  })

  it('should switch to an explicit generation', async () => {
    const ctx = context()
    const result = await rollback({ to: 1 }, deps(ctx))

    expect(result.target.number).toBe(1)
    expect(fs.readlinkSync(systemProfile)).toBe('system-1-link')
  })

  it('should fail for an unknown generation', async () => {
    const ctx = context()
    await expect(rollback({ to: 9 }, deps(ctx))).rejects.toThrow(GenerationNotFoundError)
    expect(ctx.spawner.calls).toHaveLength(0)
  })

  it('should require the system profile', async () => {
    fs.rmSync(systemProfile)
    await expect(rollback({}, deps(context()))).rejects.toThrow(ProfileNotFoundError)
  })

  it('should activate the specialisation from the marker', async () => {
    fs.writeFileSync(marker, 'gaming\n')
    const ctx = context()
    await rollback({}, deps(ctx))

    expect(ctx.spawner.lines().at(-1)).toBe(`sudo ${programOf(2, 'specialisation', 'gaming')} switch`)
  })

  it('should not touch the profile on a dry run', async () => {
    const ctx = context()
    const result = await rollback({ dry: true, ask: true }, deps(ctx))

    expect(result.states).toEqual(['select-target', 'diff', 'done'])
    expect(result.activated).toBe(false)
    expect(result.previous).toBeNull()
    expect(fs.readlinkSync(systemProfile)).toBe('system-3-link')
    expect(ctx.reporter.warnings).toEqual(['--ask has no effect as dry run was requested'])
    expect(ctx.reporter.infos).toContain('Dry run: would roll back to generation 2')
  })

  it('should stop when the comparison fails', async () => {
    const ctx = context()
    ctx.spawner.on('nvd', { status: 1 })
    await expect(rollback({}, deps(ctx))).rejects.toThrow(ExitError)
    expect(fs.readlinkSync(systemProfile)).toBe('system-3-link')
  })

  it('should abort when the user declines', async () => {
    const ctx = context()
    await expect(rollback({ ask: true }, deps(ctx, false))).rejects.toThrow(UserRejectedError)
    expect(fs.readlinkSync(systemProfile)).toBe('system-3-link')
  })

  it('should restore the profile and rethrow when activation fails', async () => {
    const ctx = context()
    ctx.spawner.on(isActivation, { status: 1 })
    const states: string[] = []

    const error = await rollback({}, { ...deps(ctx), onState: state => { states.push(state) } })
      .catch((err: unknown) => err)

    expect(error).toBeInstanceOf(ExitError)
    expect(error).toMatchObject({ message: 'Activating configuration failed: command exited with status 1' })
    expect(states).toEqual(['select-target', 'diff', 'confirm', 'repoint-profile', 'activate', 'revert-profile'])
    expect(fs.readlinkSync(systemProfile)).toBe('system-3-link')
    expect(ctx.reporter.infos).toContain('Rolling back system profile')
  })

  it('should report both errors when the restore also fails', async () => {
    let linkCommands = 0
    const links = performsLinks()
    const ctx = createTestContext(
      new FakeSpawner()
        .on(isLinkCommand, (request) => {
          linkCommands += 1
          return linkCommands <= 2 ? links(request) : { status: 1 }
        })
        .on(isActivation, { status: 1 })
    )

    const error = await rollback({}, deps(ctx)).catch((err: unknown) => err)

    expect(error).toBeInstanceOf(ProfileRevertError)
    if (!(error instanceof ProfileRevertError)) return
    expect(error.activationError).toBeInstanceOf(ExitError)
    expect(error.cause).toBeInstanceOf(ExitError)
    expect(fs.readlinkSync(systemProfile)).toBe('system-2-link')
  })

  it('should leave the profile alone when the current generation is unknown', async () => {
    fs.rmSync(systemProfile)
    fs.mkdirSync(path.join(tempDir, 'elsewhere'))
    fs.symlinkSync(path.join(tempDir, 'elsewhere'), systemProfile)
    const ctx = context()
    ctx.spawner.on(isActivation, { status: 1 })

    await expect(rollback({ to: 1 }, deps(ctx))).rejects.toThrow(ExitError)
    expect(ctx.reporter.warnings).toEqual([
      `Failed to get current generation number: Current generation not found for ${systemProfile}`,
      'Current generation unknown, leaving the system profile as it is'
    ])
    expect(fs.readlinkSync(systemProfile)).toBe('system-1-link')
  })

  it('should refuse root unless bypassed', async () => {
    await expect(rollback({}, deps(context(createTestEnv({}, { isRoot: true })))))
      .rejects.toThrow(RunningAsRootError)

    const ctx = context(createTestEnv({}, { isRoot: true }))
    await rollback({ bypassRootCheck: true }, deps(ctx))
    expect(ctx.spawner.lines().at(-1)).toBe(`${programOf(2)} switch`)
    expect(fs.readlinkSync(systemProfile)).toBe('system-2-link')
  })
})

/**
 * Tests for rebuild.ts
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import fs from 'node:fs'
import path from 'node:path'
import os from 'node:os'
import type { EnvContext } from '../../src/types.js'
import type { SpawnRequest } from '../../src/lib/spawner.js'
import { darwinPlatform, homePlatform, nixosPlatform } from '../../src/domain/platforms.js'
import { rebuild, resolveConfigName, shouldCompare, type RebuildOptions } from '../../src/domain/rebuild.js'
import { flakeInstallable } from '../../src/lib/installable.js'
import {
  ExitError,
  HostnameError,
  RunningAsRootError,
  UnsupportedVariantError,
  UserRejectedError
} from '../../src/lib/errors.js'
import {
  FakeSpawner,
  argvFrom,
  buildsTo,
  createTestContext,
  createTestEnv,
  lineOf,
  makeOutput,
  type TestContext
} from '../support/fake-spawner.js'

const TOPLEVEL = ['config', 'system', 'build', 'toplevel']

function isBuild(request: SpawnRequest): boolean {
  return argvFrom(request, 'nix')[1] === 'build'
}

describe('rebuild', () => {
  let tempDir: string
  let output: string
  let outLink: string
  let currentSystem: string
  let systemProfile: string
  let marker: string
  let program: string

  function context(env: EnvContext = createTestEnv()): TestContext {
    const spawner = new FakeSpawner().on(isBuild, buildsTo(output))
    return createTestContext(spawner, env)
  }

  function nixos() {
    return nixosPlatform({ currentProfile: currentSystem, systemProfile, specialisationMarker: marker })
  }

  function options(overrides: Partial<RebuildOptions> = {}): RebuildOptions {
    return {
      variant: 'switch',
      installable: flakeInstallable('/flake', ['nixosConfigurations', 'myhost', ...TOPLEVEL]),
      outLink,
      ...overrides
    }
  }

  const prompter = (answer: boolean) => ({ confirm: vi.fn(async () => answer) })

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'flakeshift-rebuild-'))
    output = makeOutput(tempDir, 'store-new', {
      'bin/switch-to-configuration': '',
      'specialisation/gaming/bin/switch-to-configuration': ''
    })
    program = fs.realpathSync(path.join(output, 'bin', 'switch-to-configuration'))
    outLink = path.join(tempDir, 'result')
    currentSystem = path.join(tempDir, 'current-system')
    systemProfile = path.join(tempDir, 'profiles', 'system')
    marker = path.join(tempDir, 'specialisation')
  })

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  describe('resolveConfigName', () => {
    it('should default NixOS to the hostname', () => {
      expect(resolveConfigName(nixosPlatform(), undefined, createTestEnv())).toEqual({ name: 'myhost', foreignHost: false })
    })

    it('should flag a different explicit NixOS host', () => {
      expect(resolveConfigName(nixosPlatform(), 'other', createTestEnv())).toEqual({ name: 'other', foreignHost: true })
      expect(resolveConfigName(nixosPlatform(), 'myhost', createTestEnv())).toEqual({ name: 'myhost', foreignHost: false })
      expect(resolveConfigName(darwinPlatform(), 'other', createTestEnv())).toEqual({ name: 'other', foreignHost: false })
    })

    it('should leave Home-Manager names to auto-detection', () => {
      expect(resolveConfigName(homePlatform(), undefined, createTestEnv())).toEqual({ name: undefined, foreignHost: false })
    })

    it('should require a hostname when none is given', () => {
      expect(() => resolveConfigName(nixosPlatform(), undefined, createTestEnv({}, { hostname: null })))
        .toThrow(HostnameError)
    })
  })

  describe('shouldCompare', () => {
    it('should honour the diff mode', () => {
      expect(shouldCompare('auto', '/run/current-system', false)).toBe(true)
      expect(shouldCompare('auto', '/run/current-system', true)).toBe(false)
      expect(shouldCompare('always', '/run/current-system', true)).toBe(true)
      expect(shouldCompare('never', '/run/current-system', false)).toBe(false)
      expect(shouldCompare('always', null, false)).toBe(false)
    })
  })

  describe('NixOS', () => {
    it('should build, activate and register the boot entry in order', async () => {
      const ctx = context()
      const result = await rebuild(nixos(), options(), { ctx, prompter: prompter(true) })

      expect(result.states).toEqual([
        'resolve-installable',
        'build',
        'resolve-specialisation',
        'diff',
        'confirm',
        'activate',
        'register-boot',
        'done'
      ])
      expect(result.activated).toBe(true)
      expect(result.outLink).toBe(outLink)
      expect(ctx.spawner.lines()).toEqual([
        `nix build /flake#nixosConfigurations.myhost.config.system.build.toplevel --out-link ${outLink}`,
        `sudo ${program} test`,
        `sudo nix build --no-link --profile ${systemProfile} ${fs.realpathSync(output)}`,
        `sudo ${program} boot`
      ])
    })

    it('should compare with the running system when it exists', async () => {
      fs.mkdirSync(currentSystem)
      const ctx = context()
      await rebuild(nixos(), options({ variant: 'test' }), { ctx, prompter: prompter(true) })

      expect(ctx.spawner.lines()[1]).toBe(`nvd diff ${currentSystem} ${outLink}`)
    })

    it('should propagate comparison failures', async () => {
      fs.mkdirSync(currentSystem)
      const ctx = context()
      ctx.spawner.on('nvd', { status: 1 })

      await expect(rebuild(nixos(), options(), { ctx, prompter: prompter(true) })).rejects.toThrow(ExitError)
      expect(ctx.spawner.lines().some(line => line.endsWith(' test'))).toBe(false)
    })

    it('should skip the comparison for another host unless forced', async () => {
      fs.mkdirSync(currentSystem)
      const installable = flakeInstallable('/flake')
      const probe = (ctx: TestContext) => ctx.spawner.on('nix eval', { stdout: 'true' })

      const auto = context()
      probe(auto)
      await rebuild(nixos(), options({ variant: 'build', installable, configName: 'other' }), { ctx: auto, prompter: prompter(true) })
      expect(auto.spawner.lines().filter(line => line.startsWith('nvd'))).toEqual([])

      const always = context()
      probe(always)
      await rebuild(nixos(), options({ variant: 'build', installable, configName: 'other', diff: 'always' }), { ctx: always, prompter: prompter(true) })
      expect(always.spawner.lines().filter(line => line.startsWith('nvd'))).toHaveLength(1)
    })

    it('should resolve the configuration from the hostname', async () => {
      const ctx = context()
      ctx.spawner.on('nix eval', { stdout: 'true\n' })
      const result = await rebuild(nixos(), options({ variant: 'build', installable: flakeInstallable('/flake') }), { ctx, prompter: prompter(true) })

      expect(result.installable).toEqual(flakeInstallable('/flake', ['nixosConfigurations', 'myhost', ...TOPLEVEL]))
      expect(ctx.spawner.calls[0].args).toContain('x: x ? "myhost"')
    })

    it('should prefer the environment override', async () => {
      const ctx = context(createTestEnv({ FLAKESHIFT_OS_FLAKE: '/etc/nixos#nixosConfigurations.box.config.system.build.toplevel' }))
      const result = await rebuild(nixos(), options({ variant: 'build' }), { ctx, prompter: prompter(true) })

      expect(result.installable).toEqual(flakeInstallable('/etc/nixos', ['nixosConfigurations', 'box', ...TOPLEVEL]))
    })

    it('should build but not activate on a dry run', async () => {
      const ctx = context()
      const ask = prompter(true)
      const result = await rebuild(nixos(), options({ dry: true, ask: true }), { ctx, prompter: ask })

      expect(result.states).toEqual(['resolve-installable', 'build', 'resolve-specialisation', 'diff', 'done'])
      expect(result.activated).toBe(false)
      expect(ctx.spawner.calls).toHaveLength(1)
      expect(ask.confirm).not.toHaveBeenCalled()
      expect(ctx.reporter.warnings).toEqual(['--ask has no effect as dry run was requested'])
    })

    it('should stop after the build for build variants', async () => {
      const ctx = context()
      const result = await rebuild(nixos(), options({ variant: 'build', ask: true }), { ctx, prompter: prompter(true) })

      expect(result.states.at(-1)).toBe('done')
      expect(result.activated).toBe(false)
      expect(ctx.reporter.warnings).toEqual(['--ask and --dry have no effect for build'])
    })

    it('should build the VM with a bootloader', async () => {
      const ctx = context()
      ctx.spawner.on('nix eval', { stdout: 'true' })
      const result = await rebuild(
        nixos(),
        options({ variant: 'build-vm', installable: flakeInstallable('/flake'), withBootloader: true }),
        { ctx, prompter: prompter(true) }
      )

      expect(result.installable).toEqual(flakeInstallable('/flake', [
        'nixosConfigurations', 'myhost', 'config', 'system', 'build', 'vmWithBootLoader'
      ]))
      expect(ctx.reporter.infos).toContain('Building NixOS VM image')
    })

    it('should abort when the user declines', async () => {
      const ctx = context()
      const states: string[] = []
      await expect(rebuild(nixos(), options({ ask: true }), {
        ctx,
        prompter: prompter(false),
        onState: state => { states.push(state) }
      })).rejects.toThrow(UserRejectedError)

      expect(states.at(-1)).toBe('confirm')
      expect(ctx.spawner.calls).toHaveLength(1)
    })

    it('should activate the selected specialisation but register the base build', async () => {
      fs.writeFileSync(marker, 'gaming\n')
      const special = fs.realpathSync(path.join(output, 'specialisation', 'gaming', 'bin', 'switch-to-configuration'))
      const ctx = context()
      const result = await rebuild(nixos(), options(), { ctx, prompter: prompter(true) })

      expect(result.specialisation).toBe('gaming')
      expect(ctx.spawner.lines()).toContain(`sudo ${special} test`)
      expect(ctx.spawner.lines().at(-1)).toBe(`sudo ${program} boot`)
    })

    it('should copy to and activate on the target host', async () => {
      const ctx = context()
      const result = await rebuild(nixos(), options({ variant: 'test', targetHost: 'remote1' }), { ctx, prompter: prompter(true) })

      expect(result.states).toEqual([
        'resolve-installable',
        'build',
        'resolve-specialisation',
        'diff',
        'confirm',
        'copy-remote',
        'activate',
        'done'
      ])
      expect(lineOf(ctx.spawner.calls[1])).toBe(`nix copy --to ssh://remote1 ${outLink}`)
      expect(ctx.spawner.calls[2]).toMatchObject({
        program: 'ssh',
        args: ['-T', 'remote1'],
        input: `sudo ${program} test`
      })
    })

    it('should pass the remote builder to nix build', async () => {
      const ctx = context()
      await rebuild(nixos(), options({ variant: 'build', buildHost: 'builder1' }), { ctx, prompter: prompter(true) })

      expect(ctx.spawner.calls[0].args).toEqual([
        'build',
        '/flake#nixosConfigurations.myhost.config.system.build.toplevel',
        '--builders',
        'ssh://builder1 - - - 100',
        '--out-link',
        outLink
      ])
    })

    it('should release a temporary out-link afterwards', async () => {
      const ctx = context()
      const result = await rebuild(nixos(), options({ variant: 'test', outLink: undefined }), { ctx, prompter: prompter(true) })

      const buildArgs = ctx.spawner.calls[0].args
      const link = buildArgs[buildArgs.indexOf('--out-link') + 1]
      expect(result.outLink).toBeNull()
      expect(fs.existsSync(path.dirname(link))).toBe(false)
    })

    it('should refuse to run as root', async () => {
      const ctx = context(createTestEnv({}, { isRoot: true }))
      await expect(rebuild(nixos(), options(), { ctx, prompter: prompter(true) })).rejects.toThrow(RunningAsRootError)
      expect(ctx.spawner.calls).toHaveLength(0)
    })

    it('should run unelevated when the root check is bypassed', async () => {
      const ctx = context(createTestEnv({}, { isRoot: true }))
      await rebuild(nixos(), options({ variant: 'test', bypassRootCheck: true }), { ctx, prompter: prompter(true) })
      expect(ctx.spawner.lines()[1]).toBe(`${program} test`)
    })
  })

  describe('Home-Manager', () => {
    let profile: string

    function home() {
      return homePlatform({ profiles: () => [profile], specialisationMarker: () => null })
    }

    beforeEach(() => {
      profile = path.join(tempDir, 'home-manager')
      output = makeOutput(tempDir, 'store-home', { activate: '' })
    })

    it('should reject variants it does not have', async () => {
      const ctx = context()
      await expect(rebuild(home(), options({ variant: 'boot' }), { ctx, prompter: prompter(true) }))
        .rejects.toThrow('Home-Manager does not support "boot"')
      await expect(rebuild(home(), options({ variant: 'boot' }), { ctx, prompter: prompter(true) }))
        .rejects.toThrow(UnsupportedVariantError)
    })

    it('should skip the comparison on a fresh install', async () => {
      const ctx = context()
      ctx.spawner.on('nix eval', { stdout: 'true' })
      const result = await rebuild(home(), options({ installable: flakeInstallable('/flake') }), { ctx, prompter: prompter(true) })

      expect(result.installable).toEqual(flakeInstallable('/flake', [
        'homeConfigurations', 'alice@myhost', 'config', 'home', 'activationPackage'
      ]))
      expect(result.states).not.toContain('register-boot')
      expect(ctx.spawner.lines().filter(line => line.startsWith('nvd'))).toEqual([])
      expect(ctx.spawner.calls.at(-1)?.program).toBe(fs.realpathSync(path.join(output, 'activate')))
    })

    it('should keep going when the comparison fails', async () => {
      fs.mkdirSync(profile)
      const ctx = context()
      ctx.spawner.on('nvd', { status: 2 })
      const result = await rebuild(
        home(),
        options({ installable: flakeInstallable('/flake', ['homeConfigurations', 'alice']) }),
        { ctx, prompter: prompter(true) }
      )

      expect(result.activated).toBe(true)
      expect(ctx.reporter.warnings).toEqual([
        'Comparing configurations failed: Comparing changes failed: command exited with status 2'
      ])
    })

    it('should run as root without elevating', async () => {
      const ctx = context(createTestEnv({}, { isRoot: true }))
      const result = await rebuild(
        home(),
        options({ installable: flakeInstallable('/flake', ['homeConfigurations', 'alice']) }),
        { ctx, prompter: prompter(true) }
      )
      expect(result.activated).toBe(true)
      expect(ctx.spawner.lines().some(line => line.startsWith('sudo'))).toBe(false)
    })
  })

  describe('nix-darwin', () => {
    it('should activate through darwin-rebuild', async () => {
      output = makeOutput(tempDir, 'store-darwin', { 'sw/bin/darwin-rebuild': '' })
      const darwinRebuild = fs.realpathSync(path.join(output, 'sw', 'bin', 'darwin-rebuild'))
      const ctx = context(createTestEnv({}, { platform: 'darwin' }))
      const result = await rebuild(
        darwinPlatform({ systemProfile, currentProfile: currentSystem }),
        options({ installable: flakeInstallable('/flake', ['darwinConfigurations', 'mac', 'toplevel']) }),
        { ctx, prompter: prompter(true) }
      )

      expect(result.states).toEqual([
        'resolve-installable',
        'build',
        'resolve-specialisation',
        'diff',
        'confirm',
        'activate',
        'done'
      ])
      expect(result.specialisation).toBeNull()
      expect(ctx.spawner.lines().slice(1)).toEqual([
        `sudo nix build --no-link --profile ${systemProfile} ${outLink}`,
        `sudo ${darwinRebuild} activate`
      ])
    })
  })
})

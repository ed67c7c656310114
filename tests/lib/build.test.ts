/**
 * Tests for build.ts
 */

import { describe, it, expect } from 'vitest'
import { buildArgs, builderSpec, runBuild } from '../../src/lib/build.js'
import { flakeInstallable } from '../../src/lib/installable.js'
import { FakeSpawner, createTestContext } from '../support/fake-spawner.js'

describe('build', () => {
  const installable = flakeInstallable('.', ['nixosConfigurations', 'myhost'])

  it('should describe a remote builder', () => {
    expect(builderSpec('builder1')).toBe('ssh://builder1 - - - 100')
  })

  it('should place the out-link after the installable', () => {
    expect(buildArgs(installable, { outLink: '/tmp/result' }))
      .toEqual(['build', '.#nixosConfigurations.myhost', '--out-link', '/tmp/result'])
  })

  it('should order builders, out-link, extra args and log format', () => {
    expect(buildArgs(installable, {
      outLink: '/tmp/result',
      buildHost: 'builder1',
      extraArgs: ['--impure'],
      nom: true
    })).toEqual([
      'build',
      '.#nixosConfigurations.myhost',
      '--builders',
      'ssh://builder1 - - - 100',
      '--out-link',
      '/tmp/result',
      '--impure',
      '--log-format',
      'internal-json',
      '--verbose'
    ])
  })

  it('should run the builder with the build message', async () => {
    const ctx = createTestContext()
    await runBuild(installable, { outLink: '/tmp/result', message: 'Building NixOS configuration' }, ctx)

    expect(ctx.spawner.lines()).toEqual(['nix build .#nixosConfigurations.myhost --out-link /tmp/result'])
    expect(ctx.reporter.infos).toEqual(['Building NixOS configuration'])
  })

  it('should pipe through nom --json', async () => {
    const ctx = createTestContext()
    await runBuild(installable, { outLink: '/tmp/result', nom: true }, ctx)

    expect(ctx.spawner.pipes).toHaveLength(1)
    expect(ctx.spawner.pipes[0].tail).toMatchObject({ program: 'nom', args: ['--json'] })
    expect(ctx.reporter.infos).toEqual(['Building configuration'])
  })

  it('should fail when the builder fails', async () => {
    const ctx = createTestContext(new FakeSpawner().on('nix build', { status: 1 }))
    await expect(runBuild(installable, { outLink: '/tmp/result' }, ctx))
      .rejects.toThrow('Building configuration failed: command exited with status 1')
  })
})

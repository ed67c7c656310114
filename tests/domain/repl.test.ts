/**
 * Tests for repl.ts
 */

import { describe, it, expect } from 'vitest'
import { openRepl } from '../../src/domain/repl.js'
import { homePlatform, nixosPlatform } from '../../src/domain/platforms.js'
import { flakeInstallable } from '../../src/lib/installable.js'
import { StoreInstallableError } from '../../src/lib/errors.js'
import { FakeSpawner, createTestContext, createTestEnv } from '../support/fake-spawner.js'

describe('openRepl', () => {
  it('should open the configuration, not its build output', async () => {
    const ctx = createTestContext(new FakeSpawner().on('nix eval', { stdout: 'true\n' }))
    const installable = await openRepl(nixosPlatform(), { installable: flakeInstallable('/flake') }, ctx)

    expect(installable).toEqual(flakeInstallable('/flake', ['nixosConfigurations', 'myhost']))
    expect(ctx.spawner.lines().at(-1)).toBe('nix repl /flake#nixosConfigurations.myhost')
  })

  it('should append extra arguments', async () => {
    const ctx = createTestContext()
    await openRepl(
      homePlatform(),
      { installable: flakeInstallable('.', ['homeConfigurations', 'alice']), extraArgs: ['--impure'] },
      ctx
    )
    expect(ctx.spawner.lines()).toEqual(['nix repl .#homeConfigurations.alice --impure'])
  })

  it('should use the environment override', async () => {
    const env = createTestEnv({ FLAKESHIFT_OS_FLAKE: '/etc/nixos#nixosConfigurations.box' })
    const ctx = createTestContext(new FakeSpawner(), env)
    await openRepl(nixosPlatform(), { installable: flakeInstallable('.') }, ctx)

    expect(ctx.spawner.lines()).toEqual(['nix repl /etc/nixos#nixosConfigurations.box'])
  })

  it('should reject store paths', async () => {
    const ctx = createTestContext()
    await expect(openRepl(nixosPlatform(), { installable: { kind: 'store', path: '/nix/store/abc-system' } }, ctx))
      .rejects.toThrow(StoreInstallableError)
    expect(ctx.spawner.calls).toHaveLength(0)
  })
})

#!/usr/bin/env node
/**
 * Flakeshift CLI
 *
 * Build, compare and activate NixOS, Home-Manager and nix-darwin configurations
 */

import fs from 'node:fs'
import path from 'node:path'
import { fileURLToPath } from 'node:url'
import { createCLI, type CLISchema } from 'cli-args-parser'
import { isFlakeshiftError, formatErrorForCli } from '../lib/errors.js'
import { c, print, flakeshiftFormatter } from './lib/colors.js'
import { ParsedOptions } from './lib/options.js'
import { createRuntime } from './lib/runtime.js'
import * as ui from './ui.js'
import { runOsGroup } from './commands/os.js'
import { runHomeGroup } from './commands/home.js'
import { runDarwinGroup } from './commands/darwin.js'

const VERSION = process.env.FLAKESHIFT_VERSION || getPackageVersion() || '0.0.0'

function getPackageVersion(): string | undefined {
  try {
    // Walk up from dist/src/cli or src/cli to the package root
    let dir = path.dirname(fileURLToPath(import.meta.url))
    for (let i = 0; i < 5; i++) {
      const pkgPath = path.join(dir, 'package.json')
      if (fs.existsSync(pkgPath)) {
        const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'))
        if (pkg !== null && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
          return pkg.version
        }
        return undefined
      }
      dir = path.dirname(dir)
    }
    return undefined
  } catch {
    return undefined
  }
}

// ============================================================================
// Schema
// ============================================================================

type OptionMap = NonNullable<CLISchema['options']>

const installableOptions: OptionMap = {
  file: {
    short: 'f',
    type: 'string',
    description: 'Evaluate a Nix file; the positional argument becomes the attribute path'
  },
  expr: {
    short: 'E',
    type: 'string',
    description: 'Evaluate a Nix expression; the positional argument becomes the attribute path'
  }
}

const installablePositional = [
  { name: 'installable', required: false, description: 'Flake reference with optional #attribute (default: .)' }
]

const rebuildOptions: OptionMap = {
  ...installableOptions,
  dry: {
    short: 'n',
    type: 'boolean',
    default: false,
    description: 'Build and compare, but do not activate'
  },
  ask: {
    short: 'a',
    type: 'boolean',
    default: false,
    description: 'Ask for confirmation before activating'
  },
  diff: {
    type: 'string',
    description: 'Compare with the running configuration: auto, always, never'
  },
  nom: {
    type: 'boolean',
    default: false,
    description: 'Render the build log with nix-output-monitor'
  },
  'no-nom': {
    type: 'boolean',
    default: false,
    description: 'Do not use nix-output-monitor even if enabled in the config'
  },
  'out-link': {
    short: 'o',
    type: 'string',
    description: 'Keep the build result at this path'
  },
  update: {
    short: 'u',
    type: 'boolean',
    default: false,
    description: 'Update the flake lock file before building'
  },
  'update-input': {
    type: 'string',
    description: 'Update a single flake input before building'
  }
}

const specialisationOptions: OptionMap = {
  specialisation: {
    short: 's',
    type: 'string',
    description: 'Activate this specialisation instead of the current one'
  },
  'no-specialisation': {
    short: 'S',
    type: 'boolean',
    default: false,
    description: 'Ignore specialisations'
  }
}

const hostOptions: OptionMap = {
  hostname: {
    short: 'H',
    type: 'string',
    description: 'Configuration name (default: this machine\'s hostname)'
  },
  'bypass-root-check': {
    short: 'R',
    type: 'boolean',
    default: false,
    description: 'Run as root without elevating'
  }
}

const osRebuildOptions: OptionMap = {
  ...rebuildOptions,
  ...specialisationOptions,
  ...hostOptions,
  'build-host': {
    type: 'string',
    description: 'Build on this host over ssh'
  },
  'target-host': {
    type: 'string',
    description: 'Deploy to this host over ssh'
  }
}

const homeRebuildOptions: OptionMap = {
  ...rebuildOptions,
  ...specialisationOptions,
  configuration: {
    short: 'c',
    type: 'string',
    description: 'Configuration name (default: user@hostname, then user)'
  },
  'backup-extension': {
    short: 'b',
    type: 'string',
    description: 'Move clobbered files aside with this extension'
  }
}

const darwinRebuildOptions: OptionMap = {
  ...rebuildOptions,
  ...hostOptions,
  'build-host': {
    type: 'string',
    description: 'Build on this host over ssh'
  }
}

const cliSchema: CLISchema = {
  name: 'flakeshift',
  version: VERSION,
  description: 'Build, compare and activate Nix system configurations',
  autoShort: false,
  strict: true,
  formatter: flakeshiftFormatter,
  help: {
    includeGlobalOptionsInCommands: true
  },

  options: {
    help: {
      short: 'h',
      type: 'boolean',
      default: false,
      description: 'Show help'
    },
    version: {
      type: 'boolean',
      default: false,
      description: 'Show version'
    },
    verbose: {
      short: 'v',
      type: 'boolean',
      default: false,
      description: 'Print every command before it runs'
    },
    quiet: {
      short: 'q',
      type: 'boolean',
      default: false,
      description: 'Suppress progress messages (errors still shown)'
    }
  },

  commands: {
    os: {
      description: 'NixOS configurations',
      commands: {
        switch: {
          description: 'Build, activate and make the boot default',
          positional: installablePositional,
          options: osRebuildOptions
        },
        boot: {
          description: 'Build and make the boot default',
          positional: installablePositional,
          options: osRebuildOptions
        },
        test: {
          description: 'Build and activate without touching the boot default',
          positional: installablePositional,
          options: osRebuildOptions
        },
        build: {
          description: 'Build only',
          positional: installablePositional,
          options: osRebuildOptions
        },
        'build-vm': {
          description: 'Build a virtual machine running the configuration',
          positional: installablePositional,
          options: {
            ...osRebuildOptions,
            'with-bootloader': {
              short: 'B',
              type: 'boolean',
              default: false,
              description: 'Include a bootloader in the VM'
            }
          }
        },
        repl: {
          description: 'Open nix repl on the configuration',
          positional: installablePositional,
          options: {
            ...installableOptions,
            hostname: hostOptions.hostname
          }
        },
        rollback: {
          description: 'Switch back to an earlier generation',
          options: {
            ...specialisationOptions,
            to: {
              short: 't',
              type: 'string',
              description: 'Generation number (default: the previous one)'
            },
            dry: rebuildOptions.dry,
            ask: rebuildOptions.ask,
            'bypass-root-check': hostOptions['bypass-root-check']
          }
        },
        info: {
          description: 'List the generations of a profile',
          options: {
            profile: {
              short: 'p',
              type: 'string',
              description: 'Profile to inspect (default: /nix/var/nix/profiles/system)'
            }
          }
        }
      }
    },

    home: {
      description: 'Home-Manager configurations',
      commands: {
        switch: {
          description: 'Build and activate',
          positional: installablePositional,
          options: homeRebuildOptions
        },
        build: {
          description: 'Build only',
          positional: installablePositional,
          options: homeRebuildOptions
        },
        repl: {
          description: 'Open nix repl on the configuration',
          positional: installablePositional,
          options: {
            ...installableOptions,
            configuration: homeRebuildOptions.configuration
          }
        }
      }
    },

    darwin: {
      description: 'nix-darwin configurations',
      commands: {
        switch: {
          description: 'Build and activate',
          positional: installablePositional,
          options: darwinRebuildOptions
        },
        build: {
          description: 'Build only',
          positional: installablePositional,
          options: darwinRebuildOptions
        },
        repl: {
          description: 'Open nix repl on the configuration',
          positional: installablePositional,
          options: {
            ...installableOptions,
            hostname: hostOptions.hostname
          }
        }
      }
    }
  }
}

// Create CLI instance
const cli = createCLI(cliSchema)

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const opts = new ParsedOptions(cli.parse(process.argv.slice(2)))

  // Handle help first (before error check, so `os switch --help` works)
  if (opts.bool('help') || opts.command.length < 2) {
    ui.output(cli.help(opts.command))
    return
  }

  if (opts.bool('version')) {
    ui.output(`flakeshift v${VERSION}`)
    return
  }

  if (opts.errors.length > 0) {
    for (const message of opts.errors) {
      print.error(message)
    }
    process.exitCode = 1
    return
  }

  ui.setQuiet(opts.bool('quiet'))
  const verbose = opts.bool('verbose')

  try {
    const runtime = await createRuntime(opts)

    switch (opts.command[0]) {
      case 'os':
        await runOsGroup(runtime)
        break

      case 'home':
        await runHomeGroup(runtime)
        break

      case 'darwin':
        await runDarwinGroup(runtime)
        break

      default:
        print.error(`Unknown command: ${c.command(opts.command[0] ?? '')}`)
        ui.log(`Run "${c.command('flakeshift --help')}" for usage information`)
        process.exitCode = 1
    }
  } catch (err) {
    if (isFlakeshiftError(err)) {
      print.error(err.message)
      if (err.suggestion) {
        ui.log(`  ${c.muted('Suggestion:')} ${err.suggestion}`)
      }
      if (verbose && err.context) {
        ui.log(`  ${c.muted('Context:')} ${JSON.stringify(err.context)}`)
      }
      if (verbose && err.cause !== undefined) {
        ui.log(`  ${c.muted('Cause:')} ${String(err.cause)}`)
      }
    } else if (verbose) {
      ui.log(String(err))
    } else {
      print.error(err instanceof Error ? err.message : String(err))
    }
    process.exitCode = 1
  }
}

// Run
main().catch((err: unknown) => {
  print.error(isFlakeshiftError(err) ? formatErrorForCli(err) : `Fatal error: ${String(err)}`)
  process.exitCode = 1
})

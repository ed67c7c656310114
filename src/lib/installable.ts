/**
 * Installable references
 *
 * An installable says where a configuration expression lives and renders as
 * the arguments the nix CLI takes to address it:
 *
 *   flake       → ["github:me/dots#nixosConfigurations.myhost"]
 *   file        → ["--file", "./default.nix", "attr.path"]
 *   expression  → ["--expr", "import ./x.nix {}", "attr.path"]
 *   store       → ["/nix/store/...-system"]
 *   system      → ["/run/current-system"]
 */

import type {
  AttributePath,
  Installable,
  FlakeInstallable,
  TreeInstallable
} from '../types.js'
import { parseAttribute, joinAttribute } from './attribute-path.js'
import { StoreInstallableError } from './errors.js'

// ============================================================================
// Construction
// ============================================================================

export function flakeInstallable(reference: string, attribute: AttributePath = []): FlakeInstallable {
  return { kind: 'flake', reference, attribute: [...attribute] }
}

/**
 * Parse "reference#attribute" into a flake installable.
 * Everything after the first '#' is the attribute path.
 */
export function parseFlakeInstallable(value: string, options: { strict?: boolean } = {}): FlakeInstallable {
  const hashIndex = value.indexOf('#')
  if (hashIndex === -1) {
    return flakeInstallable(value)
  }
  return flakeInstallable(
    value.slice(0, hashIndex),
    parseAttribute(value.slice(hashIndex + 1), options)
  )
}

/**
 * An environment override (e.g. FLAKESHIFT_OS_FLAKE) wins over the installable
 * given on the command line.
 */
export function resolveEnvInstallable(override: string | undefined, fallback: Installable): Installable {
  if (override === undefined || override === '') {
    return fallback
  }
  return parseFlakeInstallable(override, { strict: true })
}

/**
 * Default installable when nothing was given: the flake in the working directory
 */
export function defaultInstallable(): FlakeInstallable {
  return flakeInstallable('.')
}

// ============================================================================
// Inspection
// ============================================================================

export function isTreeInstallable(installable: Installable): installable is TreeInstallable {
  return installable.kind === 'flake' || installable.kind === 'file' || installable.kind === 'expression'
}

/**
 * Return a copy with `segments` appended to the attribute path.
 * Store and system installables carry no attribute and are returned unchanged.
 */
export function appendAttribute(installable: Installable, segments: readonly string[]): Installable {
  switch (installable.kind) {
    case 'flake':
    case 'file':
    case 'expression':
      return { ...installable, attribute: [...installable.attribute, ...segments] }
    case 'store':
    case 'system':
      return installable
  }
}

/**
 * Reject store installables for operations that need an evaluation tree
 */
export function assertEvaluable(installable: Installable, operation: string): asserts installable is Exclude<Installable, { kind: 'store' }> {
  if (installable.kind === 'store') {
    throw new StoreInstallableError(operation, installable.path)
  }
}

// ============================================================================
// Rendering
// ============================================================================

/**
 * Render as nix CLI arguments. Argument count and order are part of the
 * contract with the builder.
 */
export function toBuildArgs(installable: Installable): string[] {
  switch (installable.kind) {
    case 'flake':
      return [`${installable.reference}#${joinAttribute(installable.attribute)}`]
    case 'file':
      return withAttribute(['--file', installable.path], installable.attribute)
    case 'expression':
      return withAttribute(['--expr', installable.expression], installable.attribute)
    case 'store':
      return [installable.path]
    case 'system':
      return [installable.system]
  }
}

function withAttribute(args: string[], attribute: AttributePath): string[] {
  return attribute.length > 0 ? [...args, joinAttribute(attribute)] : args
}

/**
 * Human-readable form used in messages
 */
export function describeInstallable(installable: Installable): string {
  return toBuildArgs(installable).join(' ')
}

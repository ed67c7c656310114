/**
 * Generation registry
 *
 * A profile is a symlink (e.g. /nix/var/nix/profiles/system) pointing at one
 * of its generation links, which sit next to it:
 *
 *   system -> system-42-link
 *   system-41-link -> /nix/store/...-nixos-system-host-24.05
 *   system-42-link -> /nix/store/...-nixos-system-host-24.11
 *
 * This module only reads that directory; generations are created by the
 * builder and removed by garbage collection.
 */

import fs from 'node:fs'
import path from 'node:path'
import type { GenerationInfo } from '../types.js'
import {
  CurrentGenerationNotFoundError,
  GenerationNotFoundError,
  NoGenerationsError,
  NoOlderGenerationError,
  ProfileNotFoundError
} from './errors.js'

// ============================================================================
// Naming
// ============================================================================

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

function linkPattern(profileName: string): RegExp {
  return new RegExp(`^${escapeRegExp(profileName)}-(\\d+)-link$`)
}

export function generationLinkName(profileName: string, number: number): string {
  return `${profileName}-${number}-link`
}

/**
 * Path of generation `number` of the profile at `profilePath`
 */
export function generationLinkPath(profilePath: string, number: number): string {
  return path.join(path.dirname(profilePath), generationLinkName(path.basename(profilePath), number))
}

/**
 * Extract the generation number from a link name, or null when the name
 * does not follow `{profile}-{number}-link`
 */
export function parseGenerationNumber(profileName: string, linkName: string): number | null {
  const match = linkPattern(profileName).exec(linkName)
  if (!match) return null
  const number = Number(match[1])
  return Number.isSafeInteger(number) ? number : null
}

// ============================================================================
// Metadata
// ============================================================================

function readTrimmed(file: string): string | null {
  try {
    const content = fs.readFileSync(file, 'utf-8').trim()
    return content === '' ? null : content
  } catch {
    return null
  }
}

function listDir(dir: string): string[] {
  try {
    return fs.readdirSync(dir).sort()
  } catch {
    return []
  }
}

function realpathOrNull(target: string): string | null {
  try {
    return fs.realpathSync(target)
  } catch {
    return null
  }
}

/**
 * Describe one generation link. Returns null for links that do not resolve.
 */
export function describeGeneration(linkPath: string, number: number): GenerationInfo | null {
  let createdAt: Date | null = null
  try {
    createdAt = fs.lstatSync(linkPath).mtime
  } catch {
    return null
  }

  if (realpathOrNull(linkPath) === null) {
    return null
  }

  return {
    number,
    path: linkPath,
    current: false,
    createdAt,
    nixosVersion: readTrimmed(path.join(linkPath, 'nixos-version')),
    kernelVersion: listDir(path.join(linkPath, 'kernel-modules', 'lib', 'modules'))[0] ?? null,
    specialisations: listDir(path.join(linkPath, 'specialisation'))
  }
}

// ============================================================================
// Registry
// ============================================================================

/**
 * Where the profile symlink points, as an absolute path
 */
function profileTarget(profilePath: string): string | null {
  try {
    return path.resolve(path.dirname(profilePath), fs.readlinkSync(profilePath))
  } catch {
    return null
  }
}

/**
 * List the generations of a profile in directory order.
 *
 * The current generation is the link the profile points at. When the profile
 * points somewhere else (e.g. straight into the store), the newest generation
 * resolving to the same path is current.
 */
export function listGenerations(profilePath: string): GenerationInfo[] {
  const dir = path.dirname(profilePath)
  const profileName = path.basename(profilePath)

  let entries: string[]
  try {
    entries = fs.readdirSync(dir)
  } catch {
    return []
  }

  const generations: GenerationInfo[] = []
  for (const entry of entries) {
    const number = parseGenerationNumber(profileName, entry)
    if (number === null) continue
    const info = describeGeneration(path.join(dir, entry), number)
    if (info) generations.push(info)
  }

  const target = profileTarget(profilePath)
  const direct = generations.find(g => g.path === target)
  if (direct) {
    direct.current = true
    return generations
  }

  const resolved = realpathOrNull(profilePath)
  if (resolved !== null) {
    const matches = generations.filter(g => realpathOrNull(g.path) === resolved)
    const newest = sortGenerations(matches).at(-1)
    if (newest) newest.current = true
  }

  return generations
}

/**
 * Sorted copy, oldest first
 */
export function sortGenerations(generations: readonly GenerationInfo[]): GenerationInfo[] {
  return [...generations].sort((a, b) => a.number - b.number)
}

/**
 * The generation right before the current one
 */
export function findPreviousGeneration(profilePath: string): GenerationInfo {
  const generations = sortGenerations(listGenerations(profilePath))
  if (generations.length === 0) {
    throw new NoGenerationsError(profilePath)
  }

  const currentIndex = generations.findIndex(g => g.current)
  if (currentIndex === -1) {
    throw new CurrentGenerationNotFoundError(profilePath)
  }
  if (currentIndex === 0) {
    throw new NoOlderGenerationError(generations[0].number)
  }

  return generations[currentIndex - 1]
}

export function findGenerationByNumber(profilePath: string, number: number): GenerationInfo {
  const generation = listGenerations(profilePath).find(g => g.number === number)
  if (!generation) {
    throw new GenerationNotFoundError(number)
  }
  return generation
}

export function currentGenerationNumber(profilePath: string): number {
  const current = listGenerations(profilePath).find(g => g.current)
  if (!current) {
    throw new CurrentGenerationNotFoundError(profilePath)
  }
  return current.number
}

/**
 * Require the profile symlink to exist
 */
export function assertProfile(profilePath: string): void {
  try {
    if (fs.lstatSync(profilePath).isSymbolicLink()) return
  } catch {
    throw new ProfileNotFoundError(profilePath)
  }
  throw new ProfileNotFoundError(profilePath)
}

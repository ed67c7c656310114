/**
 * Specialisation selection
 *
 * A specialisation is a named variant inside a built configuration, found at
 * `{build}/specialisation/{name}`.
 */

import fs from 'node:fs'
import path from 'node:path'

export interface SpecialisationOptions {
  noSpecialisation?: boolean
  /** Explicit --specialisation value */
  specialisation?: string
  /** File holding the name of the active specialisation, if the platform has one */
  markerPath?: string | null
}

function readMarker(markerPath: string): string | null {
  try {
    const name = fs.readFileSync(markerPath, 'utf-8').trim()
    return name === '' ? null : name
  } catch {
    // Fresh installs have no marker
    return null
  }
}

/**
 * Explicit value first, then the marker file; null when disabled or unset
 */
export function resolveSpecialisation(options: SpecialisationOptions): string | null {
  if (options.noSpecialisation) return null
  if (options.specialisation !== undefined && options.specialisation !== '') {
    return options.specialisation
  }
  return options.markerPath ? readMarker(options.markerPath) : null
}

export function targetProfilePath(buildPath: string, specialisation: string | null): string {
  return specialisation === null
    ? buildPath
    : path.join(buildPath, 'specialisation', specialisation)
}

/**
 * Generation listing for `os info`
 */

import type { GenerationInfo } from '../types.js'
import { assertProfile, listGenerations, sortGenerations } from '../lib/generations.js'
import { SYSTEM_PROFILE } from './platforms.js'

export interface GenerationRow {
  generation: string
  date: string
  version: string
  kernel: string
  specialisations: string
  current: string
}

/**
 * Generations of a profile, oldest first
 */
export function profileGenerations(profilePath: string = SYSTEM_PROFILE): GenerationInfo[] {
  assertProfile(profilePath)
  return sortGenerations(listGenerations(profilePath))
}

function formatDate(date: Date | null): string {
  if (date === null) return 'Unknown'
  const pad = (n: number): string => String(n).padStart(2, '0')
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} `
    + `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
}

export function toGenerationRow(generation: GenerationInfo): GenerationRow {
  return {
    generation: String(generation.number),
    date: formatDate(generation.createdAt),
    version: generation.nixosVersion ?? 'Unknown',
    kernel: generation.kernelVersion ?? 'Unknown',
    specialisations: generation.specialisations.length > 0 ? generation.specialisations.join(', ') : '-',
    current: generation.current ? '*' : ''
  }
}

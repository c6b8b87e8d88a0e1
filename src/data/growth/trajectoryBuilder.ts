import type { AgeGridPolicy } from '@/config/appConfig'
import type { CovariateGrid, GrowthQuery } from './types'

export const ADAPTIVE_GRID_STEP = 100

export interface GridPolicy {
  policy: AgeGridPolicy
  fixedMaxAge: number
}

/** Last age (weeks) the grid covers for a dog of the given age. */
export function resolveGridUpperBound(currentAgeWeeks: number, { policy, fixedMaxAge }: GridPolicy): number {
  if (policy === 'fixed') return fixedMaxAge
  return Math.ceil(currentAgeWeeks / ADAPTIVE_GRID_STEP) * ADAPTIVE_GRID_STEP
}

export function buildCovariateGrid(query: GrowthQuery, gridPolicy: GridPolicy): CovariateGrid {
  const upper = resolveGridUpperBound(query.currentAgeWeeks, gridPolicy)
  return Array.from({ length: upper + 1 }, (_, ageWeeks) => ({
    ageWeeks,
    breed: query.breed,
    sex: query.sex,
  }))
}

/**
 * Scaling & clipping stage.
 *
 * Rescales the population curve so it passes through the dog's reported
 * weight at its reported age, then drops every row that is not physically
 * meaningful. Filtering is the only clipping policy: the returned curve can be
 * shorter than the grid and its ages can have gaps.
 */
import { DegenerateScalingError, InvalidQueryError, OracleFailureError } from './errors'
import type {
  AdjustedCurve,
  AdjustedPoint,
  CovariateGrid,
  GrowthQuery,
  PredictionTriple,
  RawPrediction,
} from './types'

/** Completed weeks; the reference row is the one at this age, never interpolated. */
export function referenceAge(currentAgeWeeks: number): number {
  return Math.floor(currentAgeWeeks)
}

export function findReferenceIndex(grid: CovariateGrid, ageWeeks: number): number {
  // Grids start at 0 and step by 1, so the age is normally its own index
  if (grid[ageWeeks]?.ageWeeks === ageWeeks) return ageWeeks
  return grid.findIndex((row) => row.ageWeeks === ageWeeks)
}

export function computeScalingFactor(currentWeightLbs: number, reference: PredictionTriple, referenceAgeWeeks: number): number {
  const { estimate } = reference
  if (!Number.isFinite(estimate) || estimate <= 0) {
    throw new DegenerateScalingError(referenceAgeWeeks, estimate)
  }
  const factor = currentWeightLbs / estimate
  if (!Number.isFinite(factor)) {
    throw new DegenerateScalingError(referenceAgeWeeks, estimate)
  }
  return factor
}

export function scaleTriple(triple: PredictionTriple, factor: number): PredictionTriple {
  return {
    estimate: triple.estimate * factor,
    low: triple.low * factor,
    high: triple.high * factor,
  }
}

export function isPhysical(point: PredictionTriple): boolean {
  return point.estimate > 0 && point.low > 0 && point.high > 0
}

export function scaleAndClip(grid: CovariateGrid, raw: RawPrediction, query: GrowthQuery): AdjustedCurve {
  if (raw.length !== grid.length) {
    throw new OracleFailureError(
      `Oracle returned ${raw.length} predictions for a grid of ${grid.length} ages`
    )
  }

  const refAge = referenceAge(query.currentAgeWeeks)
  const refIndex = findReferenceIndex(grid, refAge)
  const reference = raw[refIndex]
  if (refIndex < 0 || reference === undefined) {
    throw new InvalidQueryError([
      { field: 'currentAgeWeeks', message: `week ${refAge} is outside the predicted age range` },
    ])
  }

  const scalingFactor = computeScalingFactor(query.currentWeightLbs, reference, refAge)

  const points: AdjustedPoint[] = []
  grid.forEach((row, i) => {
    const scaled = scaleTriple(raw[i], scalingFactor)
    if (isPhysical(scaled)) {
      points.push({ ageWeeks: row.ageWeeks, ...scaled })
    }
  })

  return {
    points,
    scalingFactor,
    referenceAgeWeeks: refAge,
    referenceEstimate: reference.estimate,
  }
}

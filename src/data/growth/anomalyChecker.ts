// ============================================================================
// ANOMALY CHECKER: advisory warnings over an adjusted growth curve
// ============================================================================

import type { AdjustedCurve, AdjustedPoint, AnomalyThresholds, GrowthWarning, WarningKind } from './types'

export const DEFAULT_THRESHOLDS: AnomalyThresholds = {
  minScalingFactor: 0.5,
  maxScalingFactor: 1.5,
  minGrowthRate: -1,
  maxGrowthRate: 10,
}

export const WARNING_MESSAGES: Record<WarningKind, string> = {
  NegativeTrend: 'Negative trend detected in predicted weights.',
  WeightDiscrepancy: 'Significant discrepancy detected between current and typical weight.',
  UnrealisticRate: 'Unrealistic growth rates detected.',
}

// ============================================================================
// STATISTICS
// ============================================================================

/** Ordinary least-squares slope of estimate on age; null when it is undefined. */
export function leastSquaresSlope(points: readonly AdjustedPoint[]): number | null {
  const n = points.length
  if (n < 2) return null

  const meanX = points.reduce((s, p) => s + p.ageWeeks, 0) / n
  const meanY = points.reduce((s, p) => s + p.estimate, 0) / n

  let sxy = 0
  let sxx = 0
  for (const p of points) {
    const dx = p.ageWeeks - meanX
    sxy += dx * (p.estimate - meanY)
    sxx += dx * dx
  }

  return sxx === 0 ? null : sxy / sxx
}

/** Local growth rate (lbs/week) between each consecutive pair of points. */
export function growthRates(points: readonly AdjustedPoint[]): number[] {
  const rates: number[] = []
  for (let i = 1; i < points.length; i++) {
    const prev = points[i - 1]
    const curr = points[i]
    rates.push((curr.estimate - prev.estimate) / (curr.ageWeeks - prev.ageWeeks))
  }
  return rates
}

// ============================================================================
// CHECKS
// ============================================================================

export function hasNegativeTrend(curve: AdjustedCurve): boolean {
  const slope = leastSquaresSlope(curve.points)
  return slope !== null && slope < 0
}

export function hasWeightDiscrepancy(curve: AdjustedCurve, thresholds: AnomalyThresholds = DEFAULT_THRESHOLDS): boolean {
  return curve.scalingFactor > thresholds.maxScalingFactor || curve.scalingFactor < thresholds.minScalingFactor
}

export function hasUnrealisticRate(curve: AdjustedCurve, thresholds: AnomalyThresholds = DEFAULT_THRESHOLDS): boolean {
  return growthRates(curve.points).some(
    (rate) => rate < thresholds.minGrowthRate || rate > thresholds.maxGrowthRate
  )
}

export function checkAnomalies(curve: AdjustedCurve, thresholds: AnomalyThresholds = DEFAULT_THRESHOLDS): GrowthWarning[] {
  const kinds: WarningKind[] = []

  if (hasNegativeTrend(curve)) kinds.push('NegativeTrend')
  if (hasWeightDiscrepancy(curve, thresholds)) kinds.push('WeightDiscrepancy')
  if (hasUnrealisticRate(curve, thresholds)) kinds.push('UnrealisticRate')

  return kinds.map((kind) => ({ kind, message: WARNING_MESSAGES[kind] }))
}

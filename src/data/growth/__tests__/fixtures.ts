import type { GrowthOracle } from '../growthOracle'
import type { AdjustedCurve, AdjustedPoint, CovariateGrid, GrowthQuery, RawPrediction } from '../types'

export const labQuery = (overrides: Partial<GrowthQuery> = {}): GrowthQuery => ({
  breed: 'Labrador Retriever',
  sex: 'Male',
  currentAgeWeeks: 60,
  currentWeightLbs: 85,
  ...overrides,
})

export function gridTo(upper: number): CovariateGrid {
  return Array.from({ length: upper + 1 }, (_, ageWeeks) => ({
    ageWeeks,
    breed: 'Labrador Retriever',
    sex: 'Male' as const,
  }))
}

/** estimate = 20 + age, band ±10; (80, 70, 90) at week 60 */
export function risingPrediction(grid: CovariateGrid): RawPrediction {
  return grid.map(({ ageWeeks }) => ({ estimate: 20 + ageWeeks, low: 10 + ageWeeks, high: 30 + ageWeeks }))
}

/** estimate = 200 - age, band ±10 */
export function fallingPrediction(grid: CovariateGrid): RawPrediction {
  return grid.map(({ ageWeeks }) => ({ estimate: 200 - ageWeeks, low: 190 - ageWeeks, high: 210 - ageWeeks }))
}

export function stubOracle(
  predict: (grid: CovariateGrid) => RawPrediction | Promise<RawPrediction>,
  breeds: readonly string[] = ['Labrador Retriever']
): GrowthOracle {
  return {
    knownBreeds: () => breeds,
    predict: async (grid) => predict(grid),
  }
}

export function curveOf(points: [number, number][], scalingFactor = 1): AdjustedCurve {
  const adjusted: AdjustedPoint[] = points.map(([ageWeeks, estimate]) => ({
    ageWeeks,
    estimate,
    low: estimate * 0.9,
    high: estimate * 1.1,
  }))
  return { points: adjusted, scalingFactor, referenceAgeWeeks: points[0]?.[0] ?? 0, referenceEstimate: 1 }
}

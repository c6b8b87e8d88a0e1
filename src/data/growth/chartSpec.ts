import type { AdjustedCurve, ChartPoint, GrowthChartSpec, GrowthQuery, TooltipContext } from './types'

const Y_HEADROOM_LBS = 20

export function roundTo(value: number, digits: number): number {
  const scale = 10 ** digits
  return Math.round(value * scale) / scale
}

/** Nearest multiple of ten, used for the weight axis ceiling. */
export function roundToTens(value: number): number {
  return Math.round(value / 10) * 10
}

export function buildChartSpec(curve: AdjustedCurve, query: GrowthQuery): GrowthChartSpec {
  const series: ChartPoint[] = curve.points.map((p) => ({
    ageWeeks: p.ageWeeks,
    estimate: p.estimate,
    low: p.low,
    high: p.high,
    band: [p.low, p.high],
  }))

  const maxAge = series.length > 0 ? Math.max(...series.map((p) => p.ageWeeks)) : query.currentAgeWeeks
  const maxWeight = series.length > 0 ? Math.max(...series.map((p) => p.estimate)) : query.currentWeightLbs

  return {
    series,
    marker: { ageWeeks: query.currentAgeWeeks, weightLbs: query.currentWeightLbs },
    referenceLines: { x: query.currentAgeWeeks, y: query.currentWeightLbs },
    xDomain: [0, maxAge],
    yDomain: [0, roundToTens(maxWeight + Y_HEADROOM_LBS)],
    axisLabels: { x: 'Age (weeks)', y: 'Weight (lbs)' },
    tooltip: {
      breed: query.breed,
      sex: query.sex,
      currentAgeWeeks: query.currentAgeWeeks,
      currentWeightLbs: query.currentWeightLbs,
      typicalWeightLbs: curve.referenceEstimate,
    },
  }
}

/** Hover text for one point of the curve, one entry per line ('' is a spacer). */
export function formatTooltipLines(point: ChartPoint, context: TooltipContext): string[] {
  return [
    `Age: ${point.ageWeeks.toFixed(0)} weeks`,
    `Predicted weight: ${point.estimate.toFixed(2)} lbs`,
    '',
    '95% Prediction interval:',
    `Lower: ${point.low.toFixed(2)} lbs`,
    `Upper: ${point.high.toFixed(2)} lbs`,
    '',
    'Prediction for:',
    `Breed: ${context.breed} (${context.sex})`,
    `Current age: ${roundTo(context.currentAgeWeeks, 1)} weeks`,
    `Current weight: ${roundTo(context.currentWeightLbs, 2)} lbs`,
    `Typical weight at current age: ${roundTo(context.typicalWeightLbs, 2)} lbs`,
  ]
}

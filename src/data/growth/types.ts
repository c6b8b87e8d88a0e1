// ============================================================================
// GROWTH PREDICTION TYPES
// ============================================================================

export const SEXES = ['Male', 'Female'] as const
export type Sex = (typeof SEXES)[number]

export type AgeInputMode = 'slider' | 'birthdate'

/** Raw form state; nothing here is trusted until it passes validateQuery. */
export interface GrowthQueryDraft {
  breed: string | null
  sex: string | null
  ageInputMode: AgeInputMode
  ageWeeks: number | null
  birthdate: string | null // yyyy-MM-dd
  weightLbs: number | null
}

export interface GrowthQuery {
  readonly breed: string
  readonly sex: Sex
  readonly currentAgeWeeks: number
  readonly currentWeightLbs: number
}

// ─── Oracle I/O ──────────────────────────────────────────────────

export interface CovariateRow {
  readonly ageWeeks: number
  readonly breed: string
  readonly sex: Sex
}

export type CovariateGrid = readonly CovariateRow[]

export interface PredictionTriple {
  readonly estimate: number
  readonly low: number // 2.5% quantile
  readonly high: number // 97.5% quantile
}

export type RawPrediction = readonly PredictionTriple[]

// ─── Post-processing ─────────────────────────────────────────────

export interface AdjustedPoint extends PredictionTriple {
  readonly ageWeeks: number
}

export interface AdjustedCurve {
  readonly points: readonly AdjustedPoint[]
  readonly scalingFactor: number
  readonly referenceAgeWeeks: number
  /** Unscaled population estimate at the reference age ("typical weight") */
  readonly referenceEstimate: number
}

export type WarningKind = 'NegativeTrend' | 'WeightDiscrepancy' | 'UnrealisticRate'

export interface GrowthWarning {
  readonly kind: WarningKind
  readonly message: string
}

export interface AnomalyThresholds {
  readonly minScalingFactor: number
  readonly maxScalingFactor: number
  readonly minGrowthRate: number // lbs/week
  readonly maxGrowthRate: number // lbs/week
}

// ─── Presentation ────────────────────────────────────────────────

export interface ChartPoint {
  readonly ageWeeks: number
  readonly estimate: number
  readonly low: number
  readonly high: number
  readonly band: readonly [number, number]
}

export interface TooltipContext {
  readonly breed: string
  readonly sex: Sex
  readonly currentAgeWeeks: number
  readonly currentWeightLbs: number
  readonly typicalWeightLbs: number
}

export interface GrowthChartSpec {
  readonly series: readonly ChartPoint[]
  readonly marker: { readonly ageWeeks: number; readonly weightLbs: number }
  readonly referenceLines: { readonly x: number; readonly y: number }
  readonly xDomain: readonly [number, number]
  readonly yDomain: readonly [number, number]
  readonly axisLabels: { readonly x: string; readonly y: string }
  readonly tooltip: TooltipContext
}

export interface GrowthPrediction {
  readonly query: GrowthQuery
  readonly adjustedCurve: AdjustedCurve
  readonly warnings: readonly GrowthWarning[]
  readonly chartSpec: GrowthChartSpec
}

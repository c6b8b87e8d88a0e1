import { describe, it, expect } from 'vitest'
import { DEFAULT_THRESHOLDS, WARNING_MESSAGES } from '../anomalyChecker'
import { DegenerateScalingError, OracleFailureError } from '../errors'
import { defaultGrowthOracle } from '../growthOracle'
import { runGrowthPipeline, type PipelineOptions } from '../growthPipeline'
import type { GrowthOracle } from '../growthOracle'
import { fallingPrediction, labQuery, risingPrediction, stubOracle } from './fixtures'

const options: PipelineOptions = {
  gridPolicy: { policy: 'adaptive', fixedMaxAge: 100 },
  oracleTimeoutMs: 1_000,
  thresholds: DEFAULT_THRESHOLDS,
}

const rising = stubOracle(risingPrediction)

describe('runGrowthPipeline', () => {
  it('scales a plausible curve without warnings', async () => {
    const result = await runGrowthPipeline(labQuery(), rising, options)

    expect(result.adjustedCurve.scalingFactor).toBeCloseTo(1.0625, 10)
    expect(result.adjustedCurve.points).toHaveLength(101)
    const atSixty = result.adjustedCurve.points[60]
    expect(atSixty.ageWeeks).toBe(60)
    expect(atSixty.estimate).toBeCloseTo(85, 10)
    expect(atSixty.low).toBeCloseTo(74.375, 10)
    expect(atSixty.high).toBeCloseTo(95.625, 10)
    expect(result.warnings).toEqual([])
    expect(result.chartSpec.tooltip.typicalWeightLbs).toBe(80)
    expect(result.chartSpec.xDomain).toEqual([0, 100])
  })

  it('warns about a weight far from the typical weight', async () => {
    const result = await runGrowthPipeline(labQuery({ currentWeightLbs: 200 }), rising, options)
    expect(result.adjustedCurve.scalingFactor).toBe(2.5)
    expect(result.warnings).toEqual([{ kind: 'WeightDiscrepancy', message: WARNING_MESSAGES.WeightDiscrepancy }])
  })

  it('warns about a falling curve', async () => {
    const result = await runGrowthPipeline(
      labQuery({ currentWeightLbs: 140 }),
      stubOracle(fallingPrediction),
      options
    )
    expect(result.warnings.map((w) => w.kind)).toEqual(['NegativeTrend'])
  })

  it('fails with DegenerateScaling when the reference estimate is zero', async () => {
    const zeroAtSixty = stubOracle((grid) =>
      risingPrediction(grid).map((t, i) => (i === 60 ? { ...t, estimate: 0 } : t))
    )
    await expect(runGrowthPipeline(labQuery(), zeroAtSixty, options)).rejects.toBeInstanceOf(DegenerateScalingError)
  })

  it('returns identical output for identical input', async () => {
    const first = await runGrowthPipeline(labQuery(), rising, options)
    const second = await runGrowthPipeline(labQuery(), rising, options)
    expect(second).toEqual(first)
  })

  it('wraps oracle errors as OracleFailure', async () => {
    const cause = new Error('model file corrupt')
    const broken = stubOracle(() => {
      throw cause
    })

    const error = await runGrowthPipeline(labQuery(), broken, options).catch((e: unknown) => e)
    expect(error).toBeInstanceOf(OracleFailureError)
    if (!(error instanceof OracleFailureError)) return
    expect(error.kind).toBe('OracleFailure')
    expect(error.message).toBe('Growth model failed: model file corrupt')
    expect(error.cause).toBe(cause)
  })

  it('times out a stalled oracle', async () => {
    const stalled: GrowthOracle = {
      knownBreeds: () => ['Labrador Retriever'],
      predict: () => new Promise(() => {}),
    }
    await expect(
      runGrowthPipeline(labQuery(), stalled, { ...options, oracleTimeoutMs: 20 })
    ).rejects.toThrow('Growth model did not respond within 20 ms')
  })

  it('rejects a prediction that does not match the grid', async () => {
    await expect(runGrowthPipeline(labQuery(), stubOracle(() => []), options)).rejects.toBeInstanceOf(
      OracleFailureError
    )
  })

  it('follows the configured grid policy', async () => {
    const fixed = await runGrowthPipeline(labQuery({ currentAgeWeeks: 30, currentWeightLbs: 50 }), rising, {
      ...options,
      gridPolicy: { policy: 'fixed', fixedMaxAge: 52 },
    })
    expect(fixed.chartSpec.xDomain).toEqual([0, 52])

    const adaptive = await runGrowthPipeline(labQuery({ currentAgeWeeks: 150, currentWeightLbs: 170 }), rising, options)
    expect(adaptive.chartSpec.xDomain).toEqual([0, 200])
  })

  it('produces a positive curve from the fitted model', async () => {
    const result = await runGrowthPipeline(labQuery(), defaultGrowthOracle, options)
    expect(result.adjustedCurve.points.length).toBeGreaterThan(0)
    expect(result.adjustedCurve.points.every((p) => p.estimate > 0 && p.low > 0 && p.high > 0)).toBe(true)
    expect(result.warnings).toEqual([])
  })
})

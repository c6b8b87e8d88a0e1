/**
 * Growth oracle backed by a fitted von Bertalanffy mixed-effects model.
 *
 *   weight = Linf * (1 - exp(-K * (age - t0)))
 *
 * Linf, K and t0 each get a population value plus breed and breed:sex
 * offsets. The model file is the posterior summary of that fit; intervals are
 * the delta-method propagation of parameter variance plus residual variance.
 * Breeds or breed:sex levels missing from the fit get a zero offset with the
 * group-level sd as its variance, so their intervals are much wider.
 */
import { z } from 'zod'
import growthModelJson from './growthModel.json'
import type { CovariateGrid, PredictionTriple, RawPrediction, Sex } from './types'

export interface GrowthOracle {
  knownBreeds(): readonly string[]
  predict(grid: CovariateGrid): Promise<RawPrediction>
}

// ─── Model file ──────────────────────────────────────────────────

const estimateSchema = z.object({ mean: z.number(), se: z.number().nonnegative() })

const parameterSetSchema = z.object({
  Linf: estimateSchema,
  K: estimateSchema,
  t0: estimateSchema,
})

const groupSdSchema = z.object({
  Linf: z.number().nonnegative(),
  K: z.number().nonnegative(),
  t0: z.number().nonnegative(),
})

const growthModelSchema = z.object({
  formula: z.string(),
  family: z.literal('gaussian'),
  intervalZ: z.number().positive(),
  sigma: z.number().nonnegative(),
  population: parameterSetSchema,
  groupSd: z.object({ breed: groupSdSchema, breedSex: groupSdSchema }),
  breeds: z.record(z.string(), parameterSetSchema),
  breedSex: z.record(z.string(), parameterSetSchema),
})

export type GrowthModel = z.infer<typeof growthModelSchema>
type ParameterSet = z.infer<typeof parameterSetSchema>
type GroupSd = z.infer<typeof groupSdSchema>

export function parseGrowthModel(json: unknown): GrowthModel {
  return growthModelSchema.parse(json)
}

// ─── Parameters ──────────────────────────────────────────────────

const PARAMS = ['Linf', 'K', 't0'] as const
type ParamName = (typeof PARAMS)[number]

export interface ParameterDraw {
  mean: number
  variance: number
}

export type ResolvedParameters = Record<ParamName, ParameterDraw>

export function breedSexKey(breed: string, sex: Sex): string {
  return `${breed}:${sex}`
}

function ownLevel(levels: Record<string, ParameterSet>, key: string): ParameterSet | undefined {
  return Object.hasOwn(levels, key) ? levels[key] : undefined
}

function addLevel(
  acc: ResolvedParameters,
  level: ParameterSet | undefined,
  groupSd: GroupSd
): ResolvedParameters {
  const next = { ...acc }
  for (const name of PARAMS) {
    next[name] = level
      ? { mean: acc[name].mean + level[name].mean, variance: acc[name].variance + level[name].se ** 2 }
      : { mean: acc[name].mean, variance: acc[name].variance + groupSd[name] ** 2 }
  }
  return next
}

export function vonBertalanffy(ageWeeks: number, Linf: number, K: number, t0: number): number {
  return Linf * (1 - Math.exp(-K * (ageWeeks - t0)))
}

// ============================================================================
// ORACLE
// ============================================================================

export class FittedGrowthOracle implements GrowthOracle {
  private readonly breeds: readonly string[]

  constructor(private readonly model: GrowthModel) {
    this.breeds = Object.keys(model.breeds).sort((a, b) => a.localeCompare(b))
  }

  knownBreeds(): readonly string[] {
    return this.breeds
  }

  isKnownBreed(breed: string): boolean {
    return Object.hasOwn(this.model.breeds, breed)
  }

  resolveParameters(breed: string, sex: Sex): ResolvedParameters {
    const { population, groupSd, breeds, breedSex } = this.model
    const base: ResolvedParameters = {
      Linf: { mean: population.Linf.mean, variance: population.Linf.se ** 2 },
      K: { mean: population.K.mean, variance: population.K.se ** 2 },
      t0: { mean: population.t0.mean, variance: population.t0.se ** 2 },
    }
    const withBreed = addLevel(base, ownLevel(breeds, breed), groupSd.breed)
    return addLevel(withBreed, ownLevel(breedSex, breedSexKey(breed, sex)), groupSd.breedSex)
  }

  predictAt(ageWeeks: number, params: ResolvedParameters): PredictionTriple {
    const Linf = params.Linf.mean
    const K = params.K.mean
    const t0 = params.t0.mean
    const decay = Math.exp(-K * (ageWeeks - t0))
    const estimate = vonBertalanffy(ageWeeks, Linf, K, t0)

    // Partial derivatives of the curve with respect to each parameter
    const dLinf = 1 - decay
    const dK = Linf * (ageWeeks - t0) * decay
    const dT0 = -Linf * K * decay

    const variance =
      dLinf ** 2 * params.Linf.variance +
      dK ** 2 * params.K.variance +
      dT0 ** 2 * params.t0.variance +
      this.model.sigma ** 2
    const halfWidth = this.model.intervalZ * Math.sqrt(variance)

    return { estimate, low: estimate - halfWidth, high: estimate + halfWidth }
  }

  async predict(grid: CovariateGrid): Promise<RawPrediction> {
    const cache = new Map<string, ResolvedParameters>()
    return grid.map((row) => {
      const key = breedSexKey(row.breed, row.sex)
      let params = cache.get(key)
      if (!params) {
        params = this.resolveParameters(row.breed, row.sex)
        cache.set(key, params)
      }
      return this.predictAt(row.ageWeeks, params)
    })
  }
}

export const growthModel: GrowthModel = parseGrowthModel(growthModelJson)

export const defaultGrowthOracle = new FittedGrowthOracle(growthModel)

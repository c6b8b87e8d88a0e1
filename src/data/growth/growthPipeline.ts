/**
 * Growth prediction pipeline.
 * Query → covariate grid → oracle → scaling & clipping → anomaly checks → chart spec.
 * Every step after the oracle call is synchronous and pure.
 */
import { appConfig } from '@/config/appConfig'
import { createLogger } from '@/utils/logger'
import { DEFAULT_THRESHOLDS, checkAnomalies } from './anomalyChecker'
import { buildChartSpec } from './chartSpec'
import { OracleFailureError, isGrowthPipelineError } from './errors'
import type { GrowthOracle } from './growthOracle'
import { scaleAndClip } from './scalingEngine'
import { buildCovariateGrid, type GridPolicy } from './trajectoryBuilder'
import type { AnomalyThresholds, CovariateGrid, GrowthPrediction, GrowthQuery, RawPrediction } from './types'

const log = createLogger('growth-pipeline')

export interface PipelineOptions {
  gridPolicy: GridPolicy
  oracleTimeoutMs: number
  thresholds: AnomalyThresholds
}

export function defaultPipelineOptions(): PipelineOptions {
  return {
    gridPolicy: { policy: appConfig.ageGridPolicy, fixedMaxAge: appConfig.fixedGridMaxAge },
    oracleTimeoutMs: appConfig.oracleTimeoutMs,
    thresholds: DEFAULT_THRESHOLDS,
  }
}

export async function callOracle(
  oracle: GrowthOracle,
  grid: CovariateGrid,
  timeoutMs: number
): Promise<RawPrediction> {
  let timer: ReturnType<typeof setTimeout> | undefined
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new OracleFailureError(`Growth model did not respond within ${timeoutMs} ms`)),
      timeoutMs
    )
  })

  try {
    return await Promise.race([oracle.predict(grid), timeout])
  } catch (error) {
    if (isGrowthPipelineError(error)) throw error
    const reason = error instanceof Error ? error.message : String(error)
    throw new OracleFailureError(`Growth model failed: ${reason}`, { cause: error })
  } finally {
    clearTimeout(timer)
  }
}

export async function runGrowthPipeline(
  query: GrowthQuery,
  oracle: GrowthOracle,
  options: PipelineOptions = defaultPipelineOptions()
): Promise<GrowthPrediction> {
  const grid = buildCovariateGrid(query, options.gridPolicy)
  log.debug('querying growth model', { breed: query.breed, sex: query.sex, ages: grid.length })

  const raw = await callOracle(oracle, grid, options.oracleTimeoutMs)
  const adjustedCurve = scaleAndClip(grid, raw, query)
  const warnings = checkAnomalies(adjustedCurve, options.thresholds)
  const chartSpec = buildChartSpec(adjustedCurve, query)

  if (warnings.length > 0) {
    log.warn('prediction raised warnings', { kinds: warnings.map((w) => w.kind) })
  }
  log.info('prediction complete', {
    breed: query.breed,
    points: adjustedCurve.points.length,
    scalingFactor: adjustedCurve.scalingFactor,
  })

  return { query, adjustedCurve, warnings, chartSpec }
}

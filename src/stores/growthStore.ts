import { create } from 'zustand'
import { appConfig } from '@/config/appConfig'
import { toUserMessage, type GrowthErrorKind, isGrowthPipelineError } from '@/data/growth/errors'
import { defaultGrowthOracle, type GrowthOracle } from '@/data/growth/growthOracle'
import { defaultPipelineOptions, runGrowthPipeline, type PipelineOptions } from '@/data/growth/growthPipeline'
import { AGE_SLIDER, WEIGHT_SLIDER, validateQuery, type ValidationResult } from '@/data/growth/queryValidation'
import type { AgeInputMode, GrowthPrediction, GrowthQueryDraft } from '@/data/growth/types'
import { createLogger } from '@/utils/logger'

const log = createLogger('growth-store')

export type PredictionStatus = 'idle' | 'loading' | 'success' | 'error'

export interface PredictionFailure {
  kind: GrowthErrorKind | 'Unknown'
  message: string
}

export interface GrowthState {
  // Form
  draft: GrowthQueryDraft

  // Last request
  status: PredictionStatus
  prediction: GrowthPrediction | null
  failure: PredictionFailure | null
  requestId: number

  // Actions
  setBreed: (breed: string | null) => void
  setSex: (sex: string | null) => void
  setAgeInputMode: (mode: AgeInputMode) => void
  setAgeWeeks: (weeks: number | null) => void
  setBirthdate: (birthdate: string | null) => void
  setWeightLbs: (lbs: number | null) => void
  calculate: () => Promise<void>
  reset: () => void

  // Computed
  validate: () => ValidationResult
  knownBreeds: () => readonly string[]
}

export interface GrowthStoreDeps {
  oracle: GrowthOracle
  allowUnseenBreeds: boolean
  pipelineOptions: () => PipelineOptions
  now: () => Date
}

export const initialDraft: GrowthQueryDraft = {
  breed: null,
  sex: null,
  ageInputMode: 'slider',
  ageWeeks: AGE_SLIDER.initial,
  birthdate: null,
  weightLbs: WEIGHT_SLIDER.initial,
}

const defaultDeps: GrowthStoreDeps = {
  oracle: defaultGrowthOracle,
  allowUnseenBreeds: appConfig.allowUnseenBreeds,
  pipelineOptions: defaultPipelineOptions,
  now: () => new Date(),
}

export function createGrowthStore(deps: Partial<GrowthStoreDeps> = {}) {
  const { oracle, allowUnseenBreeds, pipelineOptions, now } = { ...defaultDeps, ...deps }

  return create<GrowthState>((set, get) => {
    const updateDraft = (updates: Partial<GrowthQueryDraft>) =>
      set((s) => ({ draft: { ...s.draft, ...updates } }))

    return {
      draft: initialDraft,
      status: 'idle',
      prediction: null,
      failure: null,
      requestId: 0,

      setBreed: (breed) => updateDraft({ breed }),
      setSex: (sex) => updateDraft({ sex }),
      setAgeInputMode: (ageInputMode) => updateDraft({ ageInputMode }),
      setAgeWeeks: (ageWeeks) => updateDraft({ ageWeeks }),
      setBirthdate: (birthdate) => updateDraft({ birthdate }),
      setWeightLbs: (weightLbs) => updateDraft({ weightLbs }),

      calculate: async () => {
        const validation = get().validate()
        if (!validation.ok) {
          log.debug('calculate ignored, draft is invalid', { issues: validation.error.issues })
          return
        }

        const requestId = get().requestId + 1
        // Previous curve and warnings never outlive a new request
        set({ status: 'loading', prediction: null, failure: null, requestId })

        try {
          const prediction = await runGrowthPipeline(validation.query, oracle, pipelineOptions())
          if (get().requestId !== requestId) return
          set({ status: 'success', prediction })
        } catch (error) {
          if (get().requestId !== requestId) return
          log.error('prediction failed', {
            kind: isGrowthPipelineError(error) ? error.kind : 'Unknown',
            error: error instanceof Error ? error.message : String(error),
          })
          set({
            status: 'error',
            failure: {
              kind: isGrowthPipelineError(error) ? error.kind : 'Unknown',
              message: toUserMessage(error),
            },
          })
        }
      },

      reset: () =>
        set((s) => ({
          draft: initialDraft,
          status: 'idle',
          prediction: null,
          failure: null,
          requestId: s.requestId + 1,
        })),

      validate: () => {
        return validateQuery(get().draft, {
          knownBreeds: oracle.knownBreeds(),
          allowUnseenBreeds,
          gridPolicy: pipelineOptions().gridPolicy,
          now: now(),
        })
      },

      knownBreeds: () => oracle.knownBreeds(),
    }
  })
}

export const useGrowthStore = createGrowthStore()

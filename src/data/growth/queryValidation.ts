// ============================================================================
// QUERY VALIDATION: turns raw form state into an immutable GrowthQuery
// ============================================================================

import { differenceInCalendarDays, isValid, parseISO } from 'date-fns'
import { z } from 'zod'
import { InvalidQueryError, type QueryIssue } from './errors'
import { resolveGridUpperBound, type GridPolicy } from './trajectoryBuilder'
import { SEXES, type GrowthQuery, type GrowthQueryDraft } from './types'

export const AGE_SLIDER = { min: 1, max: 200, step: 1, initial: 1 } as const
export const WEIGHT_SLIDER = { min: 1, max: 200, step: 1, initial: 100 } as const

export interface ValidationRules {
  knownBreeds: readonly string[]
  allowUnseenBreeds: boolean
  gridPolicy: GridPolicy
  now?: Date
}

export type ValidationResult =
  | { ok: true; query: GrowthQuery }
  | { ok: false; error: InvalidQueryError }

const required = { required_error: 'is required', invalid_type_error: 'is required' }

const querySchema = z.object({
  breed: z.string(required).trim().min(1, 'is required'),
  sex: z.enum(SEXES, { errorMap: () => ({ message: 'must be Male or Female' }) }),
  currentAgeWeeks: z.number(required).finite('is required').min(1, 'must be at least 1 week'),
  currentWeightLbs: z.number(required).finite('is required').positive('must be greater than 0'),
})

// ─── Age input ───────────────────────────────────────────────────

/** Elapsed calendar days between birth and `now`, in (fractional) weeks. */
export function ageWeeksFromBirthdate(birthdate: Date, now: Date = new Date()): number {
  return differenceInCalendarDays(now, birthdate) / 7
}

export function parseBirthdate(value: string | null): Date | null {
  if (!value) return null
  const parsed = parseISO(value)
  return isValid(parsed) ? parsed : null
}

/** Current age in weeks for whichever age input mode is active, or null if it cannot be derived. */
export function resolveCurrentAge(draft: GrowthQueryDraft, now: Date = new Date()): number | null {
  if (draft.ageInputMode === 'birthdate') {
    const birthdate = parseBirthdate(draft.birthdate)
    return birthdate ? ageWeeksFromBirthdate(birthdate, now) : null
  }
  return draft.ageWeeks
}

// ─── Validation ──────────────────────────────────────────────────

export function validateQuery(draft: GrowthQueryDraft, rules: ValidationRules): ValidationResult {
  const issues: QueryIssue[] = []

  if (draft.ageInputMode === 'birthdate' && parseBirthdate(draft.birthdate) === null) {
    issues.push({ field: 'birthdate', message: draft.birthdate ? 'is not a valid date' : 'is required' })
  }

  const parsed = querySchema.safeParse({
    breed: draft.breed,
    sex: draft.sex,
    currentAgeWeeks: resolveCurrentAge(draft, rules.now),
    currentWeightLbs: draft.weightLbs,
  })

  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      const field = issue.path.join('.')
      // A missing birth date is already reported against its own field
      if (field === 'currentAgeWeeks' && issues.some((i) => i.field === 'birthdate')) continue
      issues.push({ field, message: issue.message })
    }
    return { ok: false, error: new InvalidQueryError(issues) }
  }

  const query = parsed.data

  if (!rules.allowUnseenBreeds && !rules.knownBreeds.includes(query.breed)) {
    issues.push({ field: 'breed', message: `"${query.breed}" is not a supported breed` })
  }

  const upper = resolveGridUpperBound(query.currentAgeWeeks, rules.gridPolicy)
  if (Math.floor(query.currentAgeWeeks) > upper) {
    issues.push({ field: 'currentAgeWeeks', message: `must be at most ${upper} weeks` })
  }

  if (issues.length > 0) return { ok: false, error: new InvalidQueryError(issues) }

  return { ok: true, query: Object.freeze(query) }
}

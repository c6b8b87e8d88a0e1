import { describe, it, expect } from 'vitest'
import { InvalidQueryError } from '../errors'
import { ageWeeksFromBirthdate, resolveCurrentAge, validateQuery, type ValidationRules } from '../queryValidation'
import type { GrowthQueryDraft } from '../types'

const now = new Date(2024, 5, 15, 9, 30)

const rules: ValidationRules = {
  knownBreeds: ['Beagle', 'Labrador Retriever'],
  allowUnseenBreeds: true,
  gridPolicy: { policy: 'adaptive', fixedMaxAge: 100 },
  now,
}

const draft = (overrides: Partial<GrowthQueryDraft> = {}): GrowthQueryDraft => ({
  breed: 'Labrador Retriever',
  sex: 'Male',
  ageInputMode: 'slider',
  ageWeeks: 60,
  birthdate: null,
  weightLbs: 85,
  ...overrides,
})

function issuesOf(d: GrowthQueryDraft, r: ValidationRules = rules) {
  const result = validateQuery(d, r)
  if (result.ok) throw new Error('expected validation to fail')
  return result.error.issues
}

describe('validateQuery', () => {
  it('accepts a complete slider draft', () => {
    const result = validateQuery(draft(), rules)
    expect(result).toEqual({
      ok: true,
      query: { breed: 'Labrador Retriever', sex: 'Male', currentAgeWeeks: 60, currentWeightLbs: 85 },
    })
    if (result.ok) expect(Object.isFrozen(result.query)).toBe(true)
  })

  it('requires a breed', () => {
    expect(issuesOf(draft({ breed: null }))).toEqual([{ field: 'breed', message: 'is required' }])
    expect(issuesOf(draft({ breed: '   ' }))).toEqual([{ field: 'breed', message: 'is required' }])
  })

  it('rejects an unrecognised sex', () => {
    expect(issuesOf(draft({ sex: 'Unknown' }))).toEqual([{ field: 'sex', message: 'must be Male or Female' }])
  })

  it('rejects a non-positive weight', () => {
    expect(issuesOf(draft({ weightLbs: 0 }))).toEqual([
      { field: 'currentWeightLbs', message: 'must be greater than 0' },
    ])
  })

  it('rejects ages below one week', () => {
    expect(issuesOf(draft({ ageWeeks: 0.5 }))).toEqual([
      { field: 'currentAgeWeeks', message: 'must be at least 1 week' },
    ])
  })

  it('reports every invalid field at once', () => {
    const result = validateQuery(draft({ breed: null, sex: null, weightLbs: null }), rules)
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(InvalidQueryError)
      expect(result.error.kind).toBe('InvalidQuery')
      expect(result.error.issues.map((i) => i.field)).toEqual(['breed', 'sex', 'currentWeightLbs'])
    }
  })

  it('derives the age from a birth date', () => {
    const result = validateQuery(draft({ ageInputMode: 'birthdate', ageWeeks: 3, birthdate: '2024-04-06' }), rules)
    expect(result.ok && result.query.currentAgeWeeks).toBe(10)
  })

  it('requires a birth date in birthdate mode', () => {
    expect(issuesOf(draft({ ageInputMode: 'birthdate', birthdate: null }))).toEqual([
      { field: 'birthdate', message: 'is required' },
    ])
    expect(issuesOf(draft({ ageInputMode: 'birthdate', birthdate: 'not-a-date' }))).toEqual([
      { field: 'birthdate', message: 'is not a valid date' },
    ])
  })

  it('rejects a birth date in the future', () => {
    expect(issuesOf(draft({ ageInputMode: 'birthdate', birthdate: '2024-06-20' }))).toEqual([
      { field: 'currentAgeWeeks', message: 'must be at least 1 week' },
    ])
  })

  it('accepts an unseen breed only when unseen levels are allowed', () => {
    expect(validateQuery(draft({ breed: 'Poodle Mix' }), rules).ok).toBe(true)
    expect(issuesOf(draft({ breed: 'Poodle Mix' }), { ...rules, allowUnseenBreeds: false })).toEqual([
      { field: 'breed', message: '"Poodle Mix" is not a supported breed' },
    ])
  })

  it('keeps the age inside a fixed grid', () => {
    const fixedRules: ValidationRules = { ...rules, gridPolicy: { policy: 'fixed', fixedMaxAge: 100 } }
    expect(validateQuery(draft({ ageWeeks: 100 }), fixedRules).ok).toBe(true)
    expect(issuesOf(draft({ ageWeeks: 150 }), fixedRules)).toEqual([
      { field: 'currentAgeWeeks', message: 'must be at most 100 weeks' },
    ])
  })
})

describe('age input', () => {
  it('counts calendar days since birth in weeks', () => {
    expect(ageWeeksFromBirthdate(new Date(2024, 0, 1), new Date(2024, 0, 15))).toBe(2)
    expect(ageWeeksFromBirthdate(new Date(2024, 0, 1), new Date(2024, 0, 4))).toBeCloseTo(3 / 7, 10)
  })

  it('reads the slider value in slider mode and the birth date otherwise', () => {
    expect(resolveCurrentAge(draft({ ageWeeks: 42, birthdate: '2024-04-06' }), now)).toBe(42)
    expect(resolveCurrentAge(draft({ ageInputMode: 'birthdate', ageWeeks: 42, birthdate: '2024-04-06' }), now)).toBe(10)
    expect(resolveCurrentAge(draft({ ageInputMode: 'birthdate', birthdate: null }), now)).toBeNull()
  })
})

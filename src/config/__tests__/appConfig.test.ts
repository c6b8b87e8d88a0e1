import { describe, it, expect } from 'vitest'
import { parseAppConfig } from '../appConfig'

describe('parseAppConfig', () => {
  it('applies defaults when nothing is set', () => {
    expect(parseAppConfig({})).toEqual({
      ageGridPolicy: 'adaptive',
      fixedGridMaxAge: 100,
      oracleTimeoutMs: 10_000,
      allowUnseenBreeds: true,
      logLevel: 'info',
    })
  })

  it('reads every setting from the environment', () => {
    expect(
      parseAppConfig({
        VITE_AGE_GRID_POLICY: 'fixed',
        VITE_FIXED_GRID_MAX_AGE: '52',
        VITE_ORACLE_TIMEOUT_MS: '2500',
        VITE_ALLOW_UNSEEN_BREEDS: 'false',
        VITE_LOG_LEVEL: 'debug',
      })
    ).toEqual({
      ageGridPolicy: 'fixed',
      fixedGridMaxAge: 52,
      oracleTimeoutMs: 2500,
      allowUnseenBreeds: false,
      logLevel: 'debug',
    })
  })

  it('treats blank values as unset', () => {
    const config = parseAppConfig({ VITE_AGE_GRID_POLICY: '  ', VITE_FIXED_GRID_MAX_AGE: '' })
    expect(config.ageGridPolicy).toBe('adaptive')
    expect(config.fixedGridMaxAge).toBe(100)
  })

  it('names the offending setting', () => {
    expect(() => parseAppConfig({ VITE_AGE_GRID_POLICY: 'sometimes' })).toThrow(
      /^Invalid app configuration \(ageGridPolicy: /
    )
    expect(() => parseAppConfig({ VITE_FIXED_GRID_MAX_AGE: '-4' })).toThrow(/fixedGridMaxAge/)
  })

  it('returns a frozen object', () => {
    expect(Object.isFrozen(parseAppConfig({}))).toBe(true)
  })
})

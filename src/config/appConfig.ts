// ============================================================================
// APP CONFIG: deployment settings read from Vite env vars
// ============================================================================

import { z } from 'zod'

const booleanString = z
  .enum(['true', 'false'])
  .default('true')
  .transform((v) => v === 'true')

const configSchema = z.object({
  ageGridPolicy: z.enum(['fixed', 'adaptive']).default('adaptive'),
  fixedGridMaxAge: z.coerce.number().int().positive().default(100),
  oracleTimeoutMs: z.coerce.number().int().positive().default(10_000),
  allowUnseenBreeds: booleanString,
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
})

export type AppConfig = Readonly<z.infer<typeof configSchema>>
export type AgeGridPolicy = AppConfig['ageGridPolicy']
export type LogLevel = AppConfig['logLevel']

export interface EnvSource {
  readonly VITE_AGE_GRID_POLICY?: string
  readonly VITE_FIXED_GRID_MAX_AGE?: string
  readonly VITE_ORACLE_TIMEOUT_MS?: string
  readonly VITE_ALLOW_UNSEEN_BREEDS?: string
  readonly VITE_LOG_LEVEL?: string
}

// Empty strings behave like unset vars so `VITE_X=` in a .env file falls back to the default
function blankToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value.trim()
}

export function parseAppConfig(env: EnvSource): AppConfig {
  const result = configSchema.safeParse({
    ageGridPolicy: blankToUndefined(env.VITE_AGE_GRID_POLICY),
    fixedGridMaxAge: blankToUndefined(env.VITE_FIXED_GRID_MAX_AGE),
    oracleTimeoutMs: blankToUndefined(env.VITE_ORACLE_TIMEOUT_MS),
    allowUnseenBreeds: blankToUndefined(env.VITE_ALLOW_UNSEEN_BREEDS),
    logLevel: blankToUndefined(env.VITE_LOG_LEVEL),
  })

  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new Error(`Invalid app configuration (${details})`)
  }

  return Object.freeze(result.data)
}

export const appConfig: AppConfig = parseAppConfig(import.meta.env)

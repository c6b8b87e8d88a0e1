export type GrowthErrorKind = 'InvalidQuery' | 'DegenerateScaling' | 'OracleFailure'

export interface QueryIssue {
  field: string
  message: string
}

export abstract class GrowthPipelineError extends Error {
  abstract readonly kind: GrowthErrorKind

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

export class InvalidQueryError extends GrowthPipelineError {
  readonly kind = 'InvalidQuery' as const

  constructor(readonly issues: readonly QueryIssue[]) {
    super(
      issues.length > 0
        ? `Invalid query: ${issues.map((i) => `${i.field} ${i.message}`).join('; ')}`
        : 'Invalid query'
    )
  }
}

export class DegenerateScalingError extends GrowthPipelineError {
  readonly kind = 'DegenerateScaling' as const

  constructor(readonly referenceAgeWeeks: number, readonly referenceEstimate: number) {
    super(
      referenceEstimate === 0
        ? 'cannot scale: zero reference prediction'
        : `cannot scale: reference prediction at week ${referenceAgeWeeks} is ${referenceEstimate}`
    )
  }
}

export class OracleFailureError extends GrowthPipelineError {
  readonly kind = 'OracleFailure' as const

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
  }
}

const USER_MESSAGES: Record<GrowthErrorKind, string> = {
  InvalidQuery: 'Please complete all dog details before calculating.',
  DegenerateScaling:
    'The model predicts zero weight at this age, so the curve cannot be matched to your dog. Try a different age.',
  OracleFailure: 'The growth model could not produce a prediction. Please try again later.',
}

export function isGrowthPipelineError(error: unknown): error is GrowthPipelineError {
  return error instanceof GrowthPipelineError
}

export function toUserMessage(error: unknown): string {
  if (isGrowthPipelineError(error)) return USER_MESSAGES[error.kind]
  return 'Something went wrong while predicting growth.'
}

import { useMemo } from 'react'
import { useGrowthStore } from '@/stores/growthStore'

export function useGrowthPrediction() {
  const draft = useGrowthStore((s) => s.draft)
  const status = useGrowthStore((s) => s.status)
  const prediction = useGrowthStore((s) => s.prediction)
  const failure = useGrowthStore((s) => s.failure)
  const validate = useGrowthStore((s) => s.validate)
  const knownBreeds = useGrowthStore((s) => s.knownBreeds)

  // validate() reads the draft from the store; re-run whenever it changes
  const validation = useMemo(() => validate(), [validate, draft])
  const breeds = useMemo(() => knownBreeds(), [knownBreeds])

  return {
    draft,
    status,
    prediction,
    failure,
    validation,
    breeds,
    canCalculate: validation.ok && status !== 'loading',
  }
}

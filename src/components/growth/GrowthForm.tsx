import { Calculator, Loader2 } from 'lucide-react'
import { AGE_SLIDER, WEIGHT_SLIDER } from '@/data/growth/queryValidation'
import { SEXES, type AgeInputMode, type GrowthQueryDraft } from '@/data/growth/types'
import { cn } from '@/utils/classNames'

const AGE_MODES: { id: AgeInputMode; label: string }[] = [
  { id: 'slider', label: 'Slider' },
  { id: 'birthdate', label: 'Birth date' },
]

interface GrowthFormProps {
  draft: GrowthQueryDraft
  breeds: readonly string[]
  canCalculate: boolean
  isCalculating: boolean
  today: string // yyyy-MM-dd, upper bound for the birth date picker
  onBreedChange: (breed: string | null) => void
  onSexChange: (sex: string | null) => void
  onAgeInputModeChange: (mode: AgeInputMode) => void
  onAgeWeeksChange: (weeks: number) => void
  onBirthdateChange: (birthdate: string | null) => void
  onWeightChange: (lbs: number) => void
  onCalculate: () => void
}

const selectClass =
  'w-full rounded-lg border border-slate-200 bg-white px-3 py-2 text-sm text-slate-700 focus:border-primary-500 focus:outline-none'
const labelClass = 'block text-xs font-medium text-slate-600 mb-1'

export function GrowthForm({
  draft,
  breeds,
  canCalculate,
  isCalculating,
  today,
  onBreedChange,
  onSexChange,
  onAgeInputModeChange,
  onAgeWeeksChange,
  onBirthdateChange,
  onWeightChange,
  onCalculate,
}: GrowthFormProps) {
  const sliderMode = draft.ageInputMode === 'slider'

  return (
    <form
      className="space-y-4"
      onSubmit={(e) => {
        e.preventDefault()
        if (canCalculate) onCalculate()
      }}
    >
      <p className="text-sm text-slate-500">
        To predict growth, enter your dog&apos;s details and click &lsquo;Calculate&rsquo;.
      </p>

      {/* Breed */}
      <div>
        <label htmlFor="breed" className={labelClass}>Breed</label>
        <select
          id="breed"
          className={selectClass}
          value={draft.breed ?? ''}
          onChange={(e) => onBreedChange(e.target.value || null)}
        >
          <option value="">Select breed</option>
          {breeds.map((breed) => (
            <option key={breed} value={breed}>{breed}</option>
          ))}
        </select>
      </div>

      {/* Sex */}
      <div>
        <label htmlFor="sex" className={labelClass}>Sex</label>
        <select
          id="sex"
          className={selectClass}
          value={draft.sex ?? ''}
          onChange={(e) => onSexChange(e.target.value || null)}
        >
          <option value="">Select sex</option>
          {SEXES.map((sex) => (
            <option key={sex} value={sex}>{sex}</option>
          ))}
        </select>
      </div>

      {/* Age input mode */}
      <fieldset>
        <legend className={labelClass}>Age by slider or birthdate?</legend>
        <div className="flex gap-4">
          {AGE_MODES.map((mode) => (
            <label key={mode.id} className="inline-flex items-center gap-1.5 text-sm text-slate-700">
              <input
                type="radio"
                name="age-input-mode"
                value={mode.id}
                checked={draft.ageInputMode === mode.id}
                onChange={() => onAgeInputModeChange(mode.id)}
              />
              {mode.label}
            </label>
          ))}
        </div>
      </fieldset>

      <div className={cn(!sliderMode && 'opacity-50')}>
        <label htmlFor="current-age" className={labelClass}>
          Current age (weeks): <span className="font-mono text-slate-800">{draft.ageWeeks ?? '—'}</span>
        </label>
        <input
          id="current-age"
          type="range"
          className="w-full accent-primary-500"
          min={AGE_SLIDER.min}
          max={AGE_SLIDER.max}
          step={AGE_SLIDER.step}
          value={draft.ageWeeks ?? AGE_SLIDER.initial}
          disabled={!sliderMode}
          onChange={(e) => onAgeWeeksChange(Number(e.target.value))}
        />
      </div>

      <div className={cn(sliderMode && 'opacity-50')}>
        <label htmlFor="birthdate" className={labelClass}>Date of birth</label>
        <input
          id="birthdate"
          type="date"
          className={selectClass}
          max={today}
          value={draft.birthdate ?? ''}
          disabled={sliderMode}
          onChange={(e) => onBirthdateChange(e.target.value || null)}
        />
      </div>

      <div>
        <label htmlFor="current-weight" className={labelClass}>
          Current weight (lbs): <span className="font-mono text-slate-800">{draft.weightLbs ?? '—'}</span>
        </label>
        <input
          id="current-weight"
          type="range"
          className="w-full accent-primary-500"
          min={WEIGHT_SLIDER.min}
          max={WEIGHT_SLIDER.max}
          step={WEIGHT_SLIDER.step}
          value={draft.weightLbs ?? WEIGHT_SLIDER.initial}
          onChange={(e) => onWeightChange(Number(e.target.value))}
        />
      </div>

      <button
        type="submit"
        disabled={!canCalculate}
        className={cn(
          'w-full inline-flex items-center justify-center gap-2 rounded-lg px-4 py-2.5 text-sm font-semibold text-white transition-colors',
          canCalculate ? 'bg-primary-500 hover:bg-primary-600' : 'bg-slate-300 cursor-not-allowed'
        )}
      >
        {isCalculating ? <Loader2 className="w-4 h-4 animate-spin" /> : <Calculator className="w-4 h-4" />}
        Calculate
      </button>
    </form>
  )
}

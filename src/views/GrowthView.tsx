import { useState } from 'react'
import { motion, AnimatePresence } from 'framer-motion'
import { format } from 'date-fns'
import { AlertCircle, Loader2, PawPrint } from 'lucide-react'
import { Card, Tabs, type TabDef } from '@/components/common'
import { GrowthForm, GrowthTrajectoryChart, ModelInfoPanel, WarningBanners } from '@/components/growth'
import { useGrowthPrediction } from '@/hooks/useGrowthPrediction'
import { useGrowthStore } from '@/stores/growthStore'

// ============================================================================
// SIDEBAR
// ============================================================================

type SidebarTab = 'prediction' | 'disclaimer' | 'about'

const SIDEBAR_TABS: TabDef<SidebarTab>[] = [
  { id: 'prediction', label: 'Prediction' },
  { id: 'disclaimer', label: 'Disclaimer' },
  { id: 'about', label: 'About' },
]

function Sidebar() {
  const [tab, setTab] = useState<SidebarTab>('prediction')
  const { draft, breeds, canCalculate, status } = useGrowthPrediction()
  const actions = useGrowthStore.getState()

  return (
    <aside className="w-full lg:w-[400px] flex-shrink-0 space-y-4">
      <div className="flex items-center gap-2 px-1">
        <PawPrint className="w-5 h-5 text-primary-500" />
        <h1 className="text-base font-semibold text-slate-800">Predict dog growth</h1>
      </div>

      <Card padding="md">
        <Tabs tabs={SIDEBAR_TABS} active={tab} onChange={setTab} className="mb-4" />

        <AnimatePresence mode="wait">
          <motion.div
            key={tab}
            initial={{ opacity: 0, y: 6 }}
            animate={{ opacity: 1, y: 0 }}
            exit={{ opacity: 0, y: -6 }}
            transition={{ duration: 0.12 }}
          >
            {tab === 'prediction' && (
              <GrowthForm
                draft={draft}
                breeds={breeds}
                canCalculate={canCalculate}
                isCalculating={status === 'loading'}
                today={format(new Date(), 'yyyy-MM-dd')}
                onBreedChange={actions.setBreed}
                onSexChange={actions.setSex}
                onAgeInputModeChange={actions.setAgeInputMode}
                onAgeWeeksChange={actions.setAgeWeeks}
                onBirthdateChange={actions.setBirthdate}
                onWeightChange={actions.setWeightLbs}
                onCalculate={() => void actions.calculate()}
              />
            )}
            {tab === 'disclaimer' && <ModelInfoPanel topic="disclaimer" />}
            {tab === 'about' && <ModelInfoPanel topic="about" />}
          </motion.div>
        </AnimatePresence>
      </Card>
    </aside>
  )
}

// ============================================================================
// MAIN PANEL
// ============================================================================

function PredictionPanel() {
  const { status, prediction, failure } = useGrowthPrediction()
  const requestId = useGrowthStore((s) => s.requestId)

  return (
    <Card padding="md" className="flex-1 flex flex-col gap-3 min-h-[70vh]">
      {prediction && <WarningBanners key={requestId} warnings={prediction.warnings} />}

      <div className="relative flex-1 min-h-[60vh]">
        {status === 'idle' && (
          <div className="absolute inset-0 flex items-center justify-center text-sm text-slate-400">
            Enter your dog&apos;s details and click &lsquo;Calculate&rsquo; to see its predicted growth curve.
          </div>
        )}

        {status === 'loading' && (
          <div className="absolute inset-0 flex items-center justify-center gap-2 text-sm text-slate-500">
            <Loader2 className="w-4 h-4 animate-spin" />
            Calculating growth curve…
          </div>
        )}

        {status === 'error' && failure && (
          <div role="alert" className="absolute inset-0 flex items-center justify-center">
            <div className="flex items-center gap-2 rounded-lg bg-rose-50 px-4 py-3 text-sm text-rose-700">
              <AlertCircle className="w-4 h-4 flex-shrink-0" />
              {failure.message}
            </div>
          </div>
        )}

        {status === 'success' && prediction && (
          prediction.chartSpec.series.length > 0 ? (
            <GrowthTrajectoryChart spec={prediction.chartSpec} />
          ) : (
            <div className="absolute inset-0 flex items-center justify-center text-sm text-slate-500">
              The model could not produce a positive growth curve for these details.
            </div>
          )
        )}
      </div>
    </Card>
  )
}

export function GrowthView() {
  return (
    <div className="min-h-screen bg-slate-50">
      <div className="mx-auto max-w-7xl p-4 lg:p-6 flex flex-col lg:flex-row gap-4">
        <Sidebar />
        <PredictionPanel />
      </div>
    </div>
  )
}

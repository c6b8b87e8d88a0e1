import { useState, type ElementType } from 'react'
import { motion } from 'framer-motion'
import { AlertTriangle, TrendingDown, Scale, X } from 'lucide-react'
import type { GrowthWarning, WarningKind } from '@/data/growth/types'

const WARNING_ICONS: Record<WarningKind, ElementType> = {
  NegativeTrend: TrendingDown,
  WeightDiscrepancy: Scale,
  UnrealisticRate: AlertTriangle,
}

interface WarningBannersProps {
  warnings: readonly GrowthWarning[]
  onDismiss?: (kind: WarningKind) => void
}

/**
 * One banner per warning kind. Mount with a key per prediction request so
 * dismissals never carry over to the next result.
 */
export function WarningBanners({ warnings, onDismiss }: WarningBannersProps) {
  const [dismissed, setDismissed] = useState<WarningKind[]>([])
  const visible = warnings.filter((w) => !dismissed.includes(w.kind))

  if (visible.length === 0) return null

  return (
    <div className="space-y-2">
      {visible.map((warning) => {
        const Icon = WARNING_ICONS[warning.kind]
        return (
          <motion.div
            key={warning.kind}
            role="alert"
            data-kind={warning.kind}
            initial={{ opacity: 0, y: -6 }}
            animate={{ opacity: 1, y: 0 }}
            transition={{ duration: 0.15 }}
            className="flex items-start gap-2.5 rounded-lg border border-amber-200 bg-amber-50 px-3 py-2.5"
          >
            <Icon className="w-4 h-4 text-amber-600 flex-shrink-0 mt-0.5" />
            <p className="flex-1 text-xs text-amber-800">
              <span className="font-semibold">Warning:</span> {warning.message}
            </p>
            <button
              type="button"
              aria-label={`Dismiss ${warning.kind} warning`}
              className="text-amber-500 hover:text-amber-700"
              onClick={() => {
                setDismissed((prev) => [...prev, warning.kind])
                onDismiss?.(warning.kind)
              }}
            >
              <X className="w-3.5 h-3.5" />
            </button>
          </motion.div>
        )
      })}
    </div>
  )
}

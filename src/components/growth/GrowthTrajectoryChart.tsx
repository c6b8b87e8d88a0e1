import {
  ComposedChart,
  Area,
  Line,
  XAxis,
  YAxis,
  CartesianGrid,
  Tooltip,
  ReferenceLine,
  ReferenceDot,
  ResponsiveContainer,
} from 'recharts'
import { formatTooltipLines } from '@/data/growth/chartSpec'
import type { ChartPoint, GrowthChartSpec, TooltipContext } from '@/data/growth/types'

const CURVE_COLOR = '#2980b9'
const MARKER_COLOR = '#e74c3c'

interface GrowthTrajectoryChartProps {
  spec: GrowthChartSpec
  height?: number | string
}

function GrowthTooltip({ point, context }: { point: ChartPoint; context: TooltipContext }) {
  const lines = formatTooltipLines(point, context)
  return (
    <div className="rounded-lg border border-slate-200 bg-white px-3 py-2 text-[11px] text-slate-700 shadow-sm">
      {lines.map((line, i) =>
        line === '' ? <div key={i} className="h-1.5" /> : <div key={i}>{line}</div>
      )}
    </div>
  )
}

export function GrowthTrajectoryChart({ spec, height = '100%' }: GrowthTrajectoryChartProps) {
  if (spec.series.length === 0) return null

  const data = spec.series.map((point) => ({
    ageWeeks: point.ageWeeks,
    estimate: point.estimate,
    // Area with a [low, high] pair renders as a band
    band: [point.low, point.high],
  }))

  return (
    <div className="w-full" style={{ height }}>
      <ResponsiveContainer width="100%" height="100%">
        <ComposedChart data={data} margin={{ top: 10, right: 16, left: 0, bottom: 10 }}>
          <CartesianGrid strokeDasharray="3 3" stroke="#e2e8f0" />
          <XAxis
            dataKey="ageWeeks"
            type="number"
            domain={[spec.xDomain[0], spec.xDomain[1]]}
            allowDecimals={false}
            tick={{ fontSize: 11, fill: '#64748b' }}
            label={{ value: spec.axisLabels.x, position: 'insideBottom', offset: -4, fontSize: 11, fill: '#64748b' }}
          />
          <YAxis
            domain={[spec.yDomain[0], spec.yDomain[1]]}
            tick={{ fontSize: 11, fill: '#64748b' }}
            label={{ value: spec.axisLabels.y, angle: -90, position: 'insideLeft', offset: 10, fontSize: 11, fill: '#64748b' }}
          />
          <Tooltip
            content={({ active, label }) => {
              if (!active || typeof label !== 'number') return null
              const point = spec.series.find((p) => p.ageWeeks === label)
              return point ? <GrowthTooltip point={point} context={spec.tooltip} /> : null
            }}
          />

          {/* 95% prediction band */}
          <Area
            type="monotone"
            dataKey="band"
            stroke="none"
            fill={CURVE_COLOR}
            fillOpacity={0.25}
            isAnimationActive={false}
          />

          {/* Point estimate */}
          <Line
            type="monotone"
            dataKey="estimate"
            stroke={CURVE_COLOR}
            strokeWidth={2}
            dot={false}
            isAnimationActive={false}
          />

          {/* Current age / weight */}
          <ReferenceLine x={spec.referenceLines.x} stroke="#334155" strokeDasharray="5 4" />
          <ReferenceLine y={spec.referenceLines.y} stroke="#334155" strokeDasharray="5 4" />
          <ReferenceDot
            x={spec.marker.ageWeeks}
            y={spec.marker.weightLbs}
            r={8}
            fill="none"
            stroke={MARKER_COLOR}
            strokeWidth={1.5}
            ifOverflow="extendDomain"
          />
        </ComposedChart>
      </ResponsiveContainer>
    </div>
  )
}

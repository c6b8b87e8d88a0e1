import { ABOUT_PARAGRAPHS, DISCLAIMER_PARAGRAPHS, GROWTH_FUNCTION } from '@/data/growth/modelInfo'

interface ModelInfoPanelProps {
  topic: 'about' | 'disclaimer'
}

export function ModelInfoPanel({ topic }: ModelInfoPanelProps) {
  if (topic === 'disclaimer') {
    return (
      <div className="space-y-3 text-sm text-slate-600">
        {DISCLAIMER_PARAGRAPHS.map((text) => (
          <p key={text}>{text}</p>
        ))}
      </div>
    )
  }

  const [intro, model, ...rest] = ABOUT_PARAGRAPHS

  return (
    <div className="space-y-3 text-sm text-slate-600">
      <p>{intro}</p>
      <p>{model}</p>
      <p className="text-center font-mono text-slate-800 bg-slate-50 rounded-lg py-2">{GROWTH_FUNCTION}</p>
      {rest.map((text) => (
        <p key={text}>{text}</p>
      ))}
    </div>
  )
}

import type { HTMLAttributes, ReactNode } from 'react'
import { cn } from '@/utils/classNames'

type CardVariant = 'default' | 'outlined' | 'muted'
type CardPadding = 'none' | 'sm' | 'md' | 'lg'

interface CardProps extends HTMLAttributes<HTMLDivElement> {
  variant?: CardVariant
  padding?: CardPadding
  accent?: 'blue' | 'amber' | 'rose'
  children: ReactNode
}

const variantClasses: Record<CardVariant, string> = {
  default: 'bg-white border border-slate-200 shadow-sm',
  outlined: 'bg-white border border-slate-200',
  muted: 'bg-slate-50 border border-slate-100',
}

const paddingClasses: Record<CardPadding, string> = {
  none: 'p-0',
  sm: 'p-3',
  md: 'p-4',
  lg: 'p-6',
}

const accentClasses = {
  blue: 'border-l-4 border-l-primary-500',
  amber: 'border-l-4 border-l-amber-400',
  rose: 'border-l-4 border-l-rose-400',
}

export function Card({ variant = 'default', padding = 'md', accent, className, children, ...rest }: CardProps) {
  return (
    <div
      className={cn('rounded-xl', variantClasses[variant], paddingClasses[padding], accent && accentClasses[accent], className)}
      {...rest}
    >
      {children}
    </div>
  )
}

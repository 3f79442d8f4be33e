import type { ReactNode } from 'react'
import { Skeleton } from '@/components/ui/skeleton'
import { cn } from '@/lib/utils'

interface ChartCardProps {
  title: string
  description?: string
  isLoading?: boolean
  className?: string
  children: ReactNode
}

export function ChartCard({ title, description, isLoading = false, className, children }: ChartCardProps) {
  return (
    <section className={cn('rounded-lg border bg-card p-4', className)}>
      <h3 className="text-sm font-semibold">{title}</h3>
      {description && <p className="mt-0.5 text-xs text-muted-foreground">{description}</p>}
      <div className="mt-3 h-64">
        {isLoading ? <Skeleton className="h-full w-full" /> : children}
      </div>
    </section>
  )
}

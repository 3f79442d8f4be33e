'use client'

import { ChartCard } from '@/components/charts/ChartCard'
import { HourChart } from '@/components/charts/HourChart'
import { WeekdayChart } from '@/components/charts/WeekdayChart'
import { BoroughChart } from '@/components/charts/BoroughChart'
import { BoroughFactorChart } from '@/components/charts/BoroughFactorChart'
import { useCollisionViews } from '@/hooks/useCollisionViews'

// These tables always describe the whole dataset; the filters only narrow the map.
export function DatasetCharts() {
  const { data, previousData, loading } = useCollisionViews()
  const views = (data ?? previousData)?.collisionViews
  const isLoading = loading && !views

  return (
    <div className="grid gap-4 lg:grid-cols-2">
      <ChartCard
        title="Collisions by hour of day"
        description="Every collision in the dataset, whatever the filters."
        isLoading={isLoading}
      >
        <HourChart data={views?.byHour ?? []} />
      </ChartCard>
      <ChartCard
        title="Collisions by day of week"
        description="Every collision in the dataset, whatever the filters."
        isLoading={isLoading}
      >
        <WeekdayChart data={views?.byWeekday ?? []} />
      </ChartCard>
      <BoroughChart />
      <ChartCard
        title="Borough × contributing factor"
        description="How each borough's collisions split across the leading factors."
        isLoading={isLoading}
      >
        <BoroughFactorChart data={views?.byBoroughFactor ?? []} />
      </ChartCard>
    </div>
  )
}

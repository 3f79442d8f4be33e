'use client'

import { useQuery } from '@apollo/client/react'
import { Slider } from '@/components/ui/slider'
import { ChartCard } from '@/components/charts/ChartCard'
import { MinuteChart } from '@/components/charts/MinuteChart'
import { DailyChart } from '@/components/charts/DailyChart'
import { DateMinuteChart } from '@/components/charts/DateMinuteChart'
import { HourMap } from '@/components/map/HourMap'
import { ErrorBoundary } from '@/components/ErrorBoundary'
import { useFilterContext } from '@/context/FilterContext'
import { GET_HOUR_BREAKDOWN, type GetHourBreakdownQuery } from '@/lib/graphql/queries'

function hourRange(hour: number): string {
  const pad = (h: number) => String(h).padStart(2, '0')
  return `${pad(hour)}:00 – ${pad((hour + 1) % 24)}:00`
}

export function TimeOfDaySection() {
  const { filterState, dispatch } = useFilterContext()
  const { hour } = filterState

  const { data, previousData, error, loading } = useQuery<GetHourBreakdownQuery>(
    GET_HOUR_BREAKDOWN,
    { variables: { hour } }
  )

  if (error) console.error('TimeOfDaySection query error:', error)

  const breakdown = (data ?? previousData)?.hourBreakdown
  const isLoading = loading && !breakdown

  return (
    <section className="space-y-4">
      <div className="flex flex-wrap items-end justify-between gap-4">
        <div>
          <h2 className="text-lg font-semibold">Collisions between {hourRange(hour)}</h2>
          <p className="text-sm text-muted-foreground">
            {breakdown ? `${breakdown.totalCollisions.toLocaleString()} collisions` : '—'}
          </p>
        </div>
        <div className="w-full max-w-xs space-y-1">
          <label htmlFor="hour-slider" className="text-sm font-medium">
            Hour of day
          </label>
          <Slider
            id="hour-slider"
            min={0}
            max={23}
            step={1}
            value={[hour]}
            onValueChange={([next]) => dispatch({ type: 'SET_HOUR', payload: next })}
          />
        </div>
      </div>

      <div className="h-80 overflow-hidden rounded-lg border">
        <ErrorBoundary fallback={<p className="p-4 text-sm text-muted-foreground">Map failed to load.</p>}>
          <HourMap hour={hour} />
        </ErrorBoundary>
      </div>

      <div className="grid gap-4 lg:grid-cols-2">
        <ChartCard title="By minute" isLoading={isLoading}>
          <MinuteChart hour={hour} data={breakdown?.byMinute ?? []} />
        </ChartCard>
        <ChartCard title="Per day" isLoading={isLoading}>
          <DailyChart data={breakdown?.byDate ?? []} />
        </ChartCard>
      </div>

      <ChartCard
        title={`By date and minute, ${hourRange(hour)}`}
        description="Each dot is one day and minute; larger, darker dots had more collisions."
        isLoading={isLoading}
      >
        <DateMinuteChart hour={hour} data={breakdown?.byDateAndMinute ?? []} />
      </ChartCard>
    </section>
  )
}

'use client'

import { Bar, BarChart, CartesianGrid, ResponsiveContainer, Tooltip, XAxis, YAxis } from 'recharts'
import type { HourCount } from '@/lib/collisions/types'
import { CHART_COLORS } from '@/lib/collisionColors'

function hourLabel(hour: number): string {
  return `${String(hour).padStart(2, '0')}:00`
}

export function HourChart({ data }: { data: HourCount[] }) {
  return (
    <ResponsiveContainer width="100%" height="100%">
      <BarChart data={data} margin={{ top: 8, right: 8, left: 0, bottom: 0 }}>
        <CartesianGrid strokeDasharray="3 3" vertical={false} />
        <XAxis dataKey="hour" tickFormatter={hourLabel} interval={2} fontSize={11} />
        <YAxis allowDecimals={false} fontSize={11} width={40} />
        <Tooltip labelFormatter={(hour) => hourLabel(Number(hour))} />
        <Bar dataKey="count" name="Collisions" fill={CHART_COLORS[0]} radius={[2, 2, 0, 0]} />
      </BarChart>
    </ResponsiveContainer>
  )
}

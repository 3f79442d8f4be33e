'use client'

import { format, parseISO } from 'date-fns'
import { CartesianGrid, Line, LineChart, ResponsiveContainer, Tooltip, XAxis, YAxis } from 'recharts'
import type { DateCount } from '@/lib/collisions/types'
import { CHART_COLORS } from '@/lib/collisionColors'

export function DailyChart({ data }: { data: DateCount[] }) {
  return (
    <ResponsiveContainer width="100%" height="100%">
      <LineChart data={data} margin={{ top: 8, right: 16, left: 0, bottom: 0 }}>
        <CartesianGrid strokeDasharray="3 3" vertical={false} />
        <XAxis
          dataKey="date"
          tickFormatter={(date: string) => format(parseISO(date), 'MMM d')}
          fontSize={11}
          minTickGap={24}
        />
        <YAxis allowDecimals={false} fontSize={11} width={32} />
        <Tooltip />
        <Line type="monotone" dataKey="count" name="Collisions" stroke={CHART_COLORS[4]} dot={false} />
      </LineChart>
    </ResponsiveContainer>
  )
}

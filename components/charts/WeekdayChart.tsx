'use client'

import { CartesianGrid, Line, LineChart, ResponsiveContainer, Tooltip, XAxis, YAxis } from 'recharts'
import type { WeekdayCount } from '@/lib/collisions/types'
import { CHART_COLORS } from '@/lib/collisionColors'

export function WeekdayChart({ data }: { data: WeekdayCount[] }) {
  return (
    <ResponsiveContainer width="100%" height="100%">
      <LineChart data={data} margin={{ top: 8, right: 16, left: 0, bottom: 0 }}>
        <CartesianGrid strokeDasharray="3 3" vertical={false} />
        <XAxis dataKey="label" tickFormatter={(label: string) => label.slice(0, 3)} fontSize={11} />
        <YAxis allowDecimals={false} fontSize={11} width={40} />
        <Tooltip />
        <Line
          type="monotone"
          dataKey="count"
          name="Collisions"
          stroke={CHART_COLORS[1]}
          strokeWidth={2}
          dot={{ r: 3 }}
        />
      </LineChart>
    </ResponsiveContainer>
  )
}

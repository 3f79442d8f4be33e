'use client'

import { Bar, BarChart, CartesianGrid, ResponsiveContainer, Tooltip, XAxis, YAxis } from 'recharts'
import type { MinuteCount } from '@/lib/collisions/types'
import { CHART_COLORS } from '@/lib/collisionColors'

export function MinuteChart({ hour, data }: { hour: number; data: MinuteCount[] }) {
  const prefix = String(hour).padStart(2, '0')
  const label = (minute: number) => `${prefix}:${String(minute).padStart(2, '0')}`

  return (
    <ResponsiveContainer width="100%" height="100%">
      <BarChart data={data} margin={{ top: 8, right: 8, left: 0, bottom: 0 }}>
        <CartesianGrid strokeDasharray="3 3" vertical={false} />
        <XAxis dataKey="minute" tickFormatter={label} interval={9} fontSize={11} />
        <YAxis allowDecimals={false} fontSize={11} width={32} />
        <Tooltip labelFormatter={(minute) => label(Number(minute))} />
        <Bar dataKey="count" name="Collisions" fill={CHART_COLORS[3]} />
      </BarChart>
    </ResponsiveContainer>
  )
}

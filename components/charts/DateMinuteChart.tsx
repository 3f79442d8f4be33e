'use client'

import { format, parseISO } from 'date-fns'
import {
  CartesianGrid,
  Cell,
  ResponsiveContainer,
  Scatter,
  ScatterChart,
  Tooltip,
  XAxis,
  YAxis,
  ZAxis,
} from 'recharts'
import type { DateMinuteCount } from '@/lib/collisions/types'
import { CHART_COLORS } from '@/lib/collisionColors'

/** Day × minute density for one hour; busier cells are larger and darker. */
export function DateMinuteChart({ hour, data }: { hour: number; data: DateMinuteCount[] }) {
  const prefix = String(hour).padStart(2, '0')
  const label = (minute: number) => `${prefix}:${String(minute).padStart(2, '0')}`
  const maxCount = data.reduce((max, cell) => Math.max(max, cell.count), 1)

  return (
    <ResponsiveContainer width="100%" height="100%">
      <ScatterChart margin={{ top: 8, right: 16, left: 0, bottom: 0 }}>
        <CartesianGrid strokeDasharray="3 3" />
        <XAxis
          type="number"
          dataKey="minute"
          name="Time"
          domain={[0, 59]}
          ticks={[0, 10, 20, 30, 40, 50]}
          tickFormatter={label}
          fontSize={11}
        />
        <YAxis
          type="category"
          dataKey="date"
          name="Date"
          allowDuplicatedCategory={false}
          tickFormatter={(date: string) => format(parseISO(date), 'MMM d')}
          fontSize={11}
          width={48}
        />
        <ZAxis type="number" dataKey="count" name="Collisions" range={[24, 160]} />
        <Tooltip
          cursor={{ strokeDasharray: '3 3' }}
          formatter={(value, name) => (name === 'Time' ? label(Number(value)) : value)}
        />
        <Scatter data={data} name="Collisions">
          {data.map((cell) => (
            <Cell
              key={`${cell.date}-${cell.minute}`}
              fill={CHART_COLORS[2]}
              fillOpacity={0.3 + (0.7 * cell.count) / maxCount}
            />
          ))}
        </Scatter>
      </ScatterChart>
    </ResponsiveContainer>
  )
}

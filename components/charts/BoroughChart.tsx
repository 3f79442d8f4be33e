'use client'

import { useQuery } from '@apollo/client/react'
import { Bar, BarChart, CartesianGrid, ResponsiveContainer, Tooltip, XAxis, YAxis } from 'recharts'
import { GET_BOROUGH_COUNTS, type GetBoroughCountsQuery } from '@/lib/graphql/queries'
import { CHART_COLORS } from '@/lib/collisionColors'
import { ChartCard } from './ChartCard'

export function BoroughChart() {
  const { data, error, loading } = useQuery<GetBoroughCountsQuery>(GET_BOROUGH_COUNTS)

  if (error) console.error('BoroughChart query error:', error)

  return (
    <ChartCard
      title="Collisions by borough"
      description="All collisions with a recorded borough."
      isLoading={loading && !data}
    >
      <ResponsiveContainer width="100%" height="100%">
        <BarChart
          data={data?.boroughCounts ?? []}
          layout="vertical"
          margin={{ top: 8, right: 16, left: 8, bottom: 0 }}
        >
          <CartesianGrid strokeDasharray="3 3" horizontal={false} />
          <XAxis type="number" allowDecimals={false} fontSize={11} />
          <YAxis type="category" dataKey="borough" width={100} fontSize={11} />
          <Tooltip />
          <Bar dataKey="count" name="Collisions" fill={CHART_COLORS[2]} radius={[0, 2, 2, 0]} />
        </BarChart>
      </ResponsiveContainer>
    </ChartCard>
  )
}

'use client'

import { useMemo } from 'react'
import { ResponsiveContainer, Sankey, Tooltip } from 'recharts'
import type { BoroughFactorCount } from '@/lib/collisions/types'
import { toSankeyData } from '@/lib/chartData'

/** Parallel categories view: how each borough's collisions split across factors. */
export function BoroughFactorChart({ data }: { data: BoroughFactorCount[] }) {
  const sankey = useMemo(() => toSankeyData(data), [data])

  if (sankey.links.length === 0) {
    return (
      <div className="flex h-full items-center justify-center text-sm text-muted-foreground">
        No data
      </div>
    )
  }

  return (
    <ResponsiveContainer width="100%" height="100%">
      <Sankey
        data={sankey}
        nodePadding={12}
        nodeWidth={10}
        margin={{ top: 8, right: 160, bottom: 8, left: 8 }}
      >
        <Tooltip />
      </Sankey>
    </ResponsiveContainer>
  )
}

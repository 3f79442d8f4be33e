'use client'

import { useQuery } from '@apollo/client/react'
import { ToggleGroup, ToggleGroupItem } from '@/components/ui/toggle-group'
import { Skeleton } from '@/components/ui/skeleton'
import { useFilterContext, type PersonGroup } from '@/context/FilterContext'
import { PERSON_GROUPS } from '@/lib/collisions/types'
import { GET_DANGEROUS_STREETS, type GetDangerousStreetsQuery } from '@/lib/graphql/queries'

const GROUP_LABELS: Record<PersonGroup, string> = {
  pedestrians: 'Pedestrians',
  cyclists: 'Cyclists',
  motorists: 'Motorists',
}

export function DangerousStreets() {
  const { filterState, dispatch } = useFilterContext()
  const { personGroup } = filterState

  const { data, error, loading } = useQuery<GetDangerousStreetsQuery>(GET_DANGEROUS_STREETS, {
    variables: { group: personGroup, limit: 10 },
  })

  if (error) console.error('DangerousStreets query error:', error)

  function handleChange(value: string) {
    // Ignore deselection clicks (Radix fires "" when the active item is clicked again).
    const group = PERSON_GROUPS.find((g) => g === value)
    if (group) dispatch({ type: 'SET_PERSON_GROUP', payload: group })
  }

  const streets = data?.dangerousStreets ?? []

  return (
    <section className="space-y-3">
      <div className="flex flex-wrap items-center justify-between gap-3">
        <h2 className="text-lg font-semibold">Top 10 dangerous streets</h2>
        <ToggleGroup type="single" variant="outline" value={personGroup} onValueChange={handleChange}>
          {PERSON_GROUPS.map((group) => (
            <ToggleGroupItem key={group} value={group} aria-label={`${GROUP_LABELS[group]} affected`}>
              {GROUP_LABELS[group]}
            </ToggleGroupItem>
          ))}
        </ToggleGroup>
      </div>

      {loading && !data ? (
        <Skeleton className="h-64 w-full" />
      ) : streets.length === 0 ? (
        <p className="text-sm text-muted-foreground">
          No {GROUP_LABELS[personGroup].toLowerCase()} injured or killed in this dataset.
        </p>
      ) : (
        <table className="w-full text-sm">
          <thead>
            <tr className="border-b text-left text-muted-foreground">
              <th className="py-2 font-medium">Street</th>
              <th className="py-2 text-right font-medium">Injured</th>
              <th className="py-2 text-right font-medium">Killed</th>
              <th className="py-2 text-right font-medium">Total</th>
            </tr>
          </thead>
          <tbody className="tabular-nums">
            {streets.map((row) => (
              <tr key={row.street} className="border-b last:border-0">
                <td className="py-1.5">{row.street}</td>
                <td className="py-1.5 text-right">{row.injured}</td>
                <td className="py-1.5 text-right">{row.killed}</td>
                <td className="py-1.5 text-right font-medium">{row.affected}</td>
              </tr>
            ))}
          </tbody>
        </table>
      )}
    </section>
  )
}

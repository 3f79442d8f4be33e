'use client'

import { Checkbox } from '@/components/ui/checkbox'
import { Label } from '@/components/ui/label'
import { useFilterContext } from '@/context/FilterContext'
import { useCollisionViews, PREVIEW_ROWS } from '@/hooks/useCollisionViews'

export function RawDataTable() {
  const { filterState, dispatch } = useFilterContext()
  const { data, previousData } = useCollisionViews()
  const views = (data ?? previousData)?.collisionViews

  return (
    <section className="space-y-3">
      <div className="flex items-center gap-2">
        <Checkbox
          id="show-raw-data"
          checked={filterState.showRawData}
          onCheckedChange={(checked) =>
            dispatch({ type: 'SET_SHOW_RAW_DATA', payload: checked === true })
          }
        />
        <Label htmlFor="show-raw-data" className="cursor-pointer">
          Show raw data
        </Label>
      </div>

      {filterState.showRawData && views && (
        <div className="space-y-2">
          <p className="text-xs text-muted-foreground">
            Showing {Math.min(PREVIEW_ROWS, views.items.length).toLocaleString()} of{' '}
            {views.totalCount.toLocaleString()} matching collisions. Export CSV for the rest.
          </p>
          <div className="max-h-96 overflow-auto rounded-lg border">
            <table className="w-full text-xs">
              <thead className="sticky top-0 bg-muted">
                <tr className="text-left">
                  <th className="px-2 py-1.5 font-medium">ID</th>
                  <th className="px-2 py-1.5 font-medium">Date</th>
                  <th className="px-2 py-1.5 font-medium">Time</th>
                  <th className="px-2 py-1.5 font-medium">Borough</th>
                  <th className="px-2 py-1.5 font-medium">Street</th>
                  <th className="px-2 py-1.5 font-medium">Factor</th>
                  <th className="px-2 py-1.5 font-medium">Vehicle</th>
                  <th className="px-2 py-1.5 text-right font-medium">Injured</th>
                  <th className="px-2 py-1.5 text-right font-medium">Killed</th>
                </tr>
              </thead>
              <tbody className="tabular-nums">
                {views.items.map((c) => (
                  <tr key={c.id} className="border-t">
                    <td className="px-2 py-1">{c.id}</td>
                    <td className="px-2 py-1 whitespace-nowrap">{c.crashDate}</td>
                    <td className="px-2 py-1">{c.time}</td>
                    <td className="px-2 py-1">{c.borough ?? ''}</td>
                    <td className="px-2 py-1">{c.onStreetName ?? ''}</td>
                    <td className="px-2 py-1">{c.contributingFactor ?? ''}</td>
                    <td className="px-2 py-1">{c.vehicleType ?? ''}</td>
                    <td className="px-2 py-1 text-right">{c.injuredPersons}</td>
                    <td className="px-2 py-1 text-right">{c.killedPersons}</td>
                  </tr>
                ))}
              </tbody>
            </table>
          </div>
        </div>
      )}
    </section>
  )
}

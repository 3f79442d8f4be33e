'use client'

import { Download, Loader2 } from 'lucide-react'
import { useLazyQuery } from '@apollo/client/react'
import { toast } from 'sonner'
import { Button } from '@/components/ui/button'
import { useFilterContext, toCollisionFilter } from '@/context/FilterContext'
import type { FilterState } from '@/context/FilterContext'
import { GET_COLLISIONS_EXPORT, type GetCollisionsExportQuery } from '@/lib/graphql/queries'
import { generateCsv, downloadCsv } from '@/lib/csv-export'

// The server caps every page at this size.
const EXPORT_LIMIT = 5000

function buildFilename(filterState: FilterState): string {
  const parts: string[] = ['nyc-collisions']

  if (filterState.date) parts.push(filterState.date)
  if (filterState.casualty) parts.push(filterState.casualty)
  const street = filterState.street.trim().toLowerCase().replace(/[^a-z0-9]+/g, '-')
  if (street) parts.push(street)

  parts.push(new Date().toISOString().slice(0, 10))
  return parts.join('-') + '.csv'
}

interface ExportButtonProps {
  variant?: 'icon' | 'full'
}

export function ExportButton({ variant = 'icon' }: ExportButtonProps) {
  const { filterState } = useFilterContext()
  const [fetchCollisions, { loading }] =
    useLazyQuery<GetCollisionsExportQuery>(GET_COLLISIONS_EXPORT)

  async function handleExport() {
    try {
      const { data } = await fetchCollisions({
        variables: { filter: toCollisionFilter(filterState), limit: EXPORT_LIMIT },
      })
      if (!data) return

      const { items, totalCount } = data.collisions
      downloadCsv(generateCsv(items), buildFilename(filterState))
      if (totalCount > items.length) {
        toast.info(`Exported the first ${items.length.toLocaleString()} of ${totalCount.toLocaleString()} collisions`)
      }
    } catch (err) {
      console.error('CSV export failed:', err)
      toast.error('Export failed. Please try again.')
    }
  }

  if (variant === 'full') {
    return (
      <Button
        variant="outline"
        size="sm"
        onClick={handleExport}
        disabled={loading}
        className="w-full gap-2"
      >
        {loading ? <Loader2 className="size-4 animate-spin" /> : <Download className="size-4" />}
        {loading ? 'Exporting…' : 'Export CSV'}
      </Button>
    )
  }

  return (
    <Button
      variant="ghost"
      size="icon"
      onClick={handleExport}
      disabled={loading}
      aria-label="Export CSV"
      title="Export CSV"
    >
      {loading ? <Loader2 className="size-3 animate-spin" /> : <Download className="size-3" />}
    </Button>
  )
}

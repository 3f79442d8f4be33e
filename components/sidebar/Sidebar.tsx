'use client'

import { RotateCcw, X } from 'lucide-react'
import { Button } from '@/components/ui/button'
import { InjuredFilter } from '@/components/filters/InjuredFilter'
import { DateFilter } from '@/components/filters/DateFilter'
import { CasualtyToggle } from '@/components/filters/CasualtyToggle'
import { StreetFilter } from '@/components/filters/StreetFilter'
import { ExportButton } from '@/components/export/ExportButton'
import { useFilterContext, getActiveFilterLabels } from '@/context/FilterContext'

interface SidebarProps {
  onClose: () => void
}

export function FilterContent() {
  const { filterState, dispatch } = useFilterContext()
  const hasActiveFilters = getActiveFilterLabels(filterState).length > 0

  return (
    <div className="space-y-6 px-4 py-4">
      {filterState.totalCount !== null && (
        <p className="text-sm text-muted-foreground">
          {filterState.totalCount.toLocaleString()} collisions
        </p>
      )}
      <InjuredFilter />
      <DateFilter />
      <CasualtyToggle />
      <StreetFilter />
      <div className="space-y-2">
        {hasActiveFilters && (
          <Button
            variant="ghost"
            size="sm"
            className="w-full gap-2"
            onClick={() => dispatch({ type: 'RESET' })}
          >
            <RotateCcw className="size-4" />
            Reset filters
          </Button>
        )}
        <ExportButton variant="full" />
      </div>
    </div>
  )
}

export function Sidebar({ onClose }: SidebarProps) {
  return (
    <div className="hidden md:flex flex-col w-80 flex-shrink-0 border-l bg-background h-full overflow-hidden">
      <div className="flex items-center gap-1 border-b px-4 py-3">
        <h2 className="text-base font-semibold flex-1">Filters</h2>
        <Button variant="ghost" size="icon" onClick={onClose} aria-label="Close filters">
          <X className="size-4" />
        </Button>
      </div>
      <div className="flex-1 overflow-y-auto">
        <FilterContent />
      </div>
    </div>
  )
}

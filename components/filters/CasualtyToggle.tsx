'use client'

import { ToggleGroup, ToggleGroupItem } from '@/components/ui/toggle-group'
import { useFilterContext, type CasualtyFilter } from '@/context/FilterContext'

const OPTIONS: ReadonlyArray<{ value: CasualtyFilter | 'all'; label: string; aria: string }> = [
  { value: 'all', label: 'All', aria: 'All collisions' },
  { value: 'fatal', label: 'Fatal', aria: 'Collisions with at least one death' },
  { value: 'injured', label: 'Injured', aria: 'Collisions with at least one injury' },
]

export function CasualtyToggle() {
  const { filterState, dispatch } = useFilterContext()

  const value = filterState.casualty ?? 'all'

  function handleChange(newValue: string) {
    // Ignore deselection clicks (Radix fires "" when the active item is clicked again).
    const option = OPTIONS.find((o) => o.value === newValue)
    if (!option) return
    dispatch({ type: 'SET_CASUALTY', payload: option.value === 'all' ? null : option.value })
  }

  return (
    <div className="space-y-1">
      <p className="text-sm font-medium">Casualties</p>
      <ToggleGroup type="single" variant="outline" value={value} onValueChange={handleChange}>
        {OPTIONS.map((option) => (
          <ToggleGroupItem key={option.value} value={option.value} aria-label={option.aria}>
            {option.label}
          </ToggleGroupItem>
        ))}
      </ToggleGroup>
    </div>
  )
}

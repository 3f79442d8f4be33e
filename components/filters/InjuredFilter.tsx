'use client'

import { Slider } from '@/components/ui/slider'
import { useFilterContext } from '@/context/FilterContext'

export function InjuredFilter() {
  const { filterState, dispatch } = useFilterContext()
  const max = Math.max(filterState.maxInjured, filterState.minInjured, 1)

  return (
    <div className="space-y-2">
      <div className="flex items-baseline justify-between">
        <label htmlFor="injured-slider" className="text-sm font-medium">
          People injured
        </label>
        <span className="text-sm tabular-nums text-muted-foreground">
          {filterState.minInjured === 0 ? 'Any' : `≥ ${filterState.minInjured}`}
        </span>
      </div>
      <Slider
        id="injured-slider"
        min={0}
        max={max}
        step={1}
        value={[filterState.minInjured]}
        onValueChange={([next]) => dispatch({ type: 'SET_MIN_INJURED', payload: next })}
      />
    </div>
  )
}

'use client'

import { useEffect, useState } from 'react'
import { Search } from 'lucide-react'
import { Input } from '@/components/ui/input'
import { useFilterContext } from '@/context/FilterContext'

const DEBOUNCE_MS = 300

export function StreetFilter() {
  const { filterState, dispatch } = useFilterContext()
  const [text, setText] = useState(filterState.street)

  // Follow outside changes (URL init, reset).
  useEffect(() => {
    setText(filterState.street)
  }, [filterState.street])

  useEffect(() => {
    if (text === filterState.street) return
    const id = setTimeout(() => dispatch({ type: 'SET_STREET', payload: text }), DEBOUNCE_MS)
    return () => clearTimeout(id)
  }, [text, filterState.street, dispatch])

  return (
    <div className="space-y-1">
      <label htmlFor="street-filter" className="text-sm font-medium">
        Street
      </label>
      <div className="relative">
        <Search className="pointer-events-none absolute left-2.5 top-1/2 size-3.5 -translate-y-1/2 text-muted-foreground" />
        <Input
          id="street-filter"
          type="search"
          placeholder="e.g. Broadway"
          value={text}
          onChange={(e) => setText(e.target.value)}
          className="pl-8"
        />
      </div>
    </div>
  )
}

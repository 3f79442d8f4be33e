'use client'

import { useState } from 'react'
import { format, parseISO } from 'date-fns'
import { CalendarIcon } from 'lucide-react'
import { Button } from '@/components/ui/button'
import { Calendar } from '@/components/ui/calendar'
import { Popover, PopoverContent, PopoverTrigger } from '@/components/ui/popover'
import { useFilterContext } from '@/context/FilterContext'

const DATE_DISPLAY_FORMAT = 'MM/dd/yyyy'

export function DateFilter() {
  const { filterState, dispatch } = useFilterContext()
  const [open, setOpen] = useState(false)

  const { date, dataBounds } = filterState
  const selected = date ? parseISO(date) : undefined
  const [month, setMonth] = useState<Date>(() => selected ?? new Date())

  function handleSelect(day: Date | undefined) {
    dispatch({ type: 'SET_DATE', payload: day ? format(day, 'yyyy-MM-dd') : null })
    setOpen(false)
  }

  function handleOpenChange(next: boolean) {
    if (next) {
      const anchor = selected ?? (dataBounds ? parseISO(dataBounds.maxDate) : undefined)
      if (anchor) setMonth(anchor)
    }
    setOpen(next)
  }

  return (
    <div className="space-y-2">
      <p className="text-sm font-medium">Date</p>

      <Popover open={open} onOpenChange={handleOpenChange}>
        <PopoverTrigger asChild>
          <Button
            variant={selected ? 'default' : 'outline'}
            size="sm"
            className="w-full justify-start gap-2"
          >
            <CalendarIcon className="size-3.5 shrink-0" />
            {selected ? format(selected, DATE_DISPLAY_FORMAT) : 'Any day'}
          </Button>
        </PopoverTrigger>
        <PopoverContent className="w-auto p-0" align="start">
          <Calendar
            mode="single"
            selected={selected}
            onSelect={handleSelect}
            captionLayout="dropdown"
            month={month}
            onMonthChange={setMonth}
            startMonth={dataBounds ? parseISO(dataBounds.minDate) : undefined}
            endMonth={dataBounds ? parseISO(dataBounds.maxDate) : undefined}
            disabled={
              dataBounds
                ? [{ before: parseISO(dataBounds.minDate) }, { after: parseISO(dataBounds.maxDate) }]
                : undefined
            }
          />
          {selected && (
            <div className="border-t px-3 py-2">
              <Button variant="ghost" size="sm" className="w-full" onClick={() => handleSelect(undefined)}>
                Clear
              </Button>
            </div>
          )}
        </PopoverContent>
      </Popover>
    </div>
  )
}

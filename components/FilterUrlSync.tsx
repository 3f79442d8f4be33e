'use client'

import { useEffect, useRef } from 'react'
import { usePathname, useRouter, useSearchParams } from 'next/navigation'
import { useFilterContext } from '@/context/FilterContext'
import { decodeFilterParams, encodeFilterParams } from '@/lib/filterUrlState'

/**
 * Keeps the URL query string and FilterContext in step, so a filtered view can
 * be bookmarked or shared.
 *
 * On mount the URL wins: its params are decoded into INIT_FROM_URL. After that
 * the state wins: every change is encoded and written back with router.replace,
 * skipping the write when the query string would not change.
 *
 * Must be rendered inside <FilterProvider> and wrapped in <Suspense> at the
 * call site (required by useSearchParams in the Next.js App Router).
 */
export function FilterUrlSync() {
  const router = useRouter()
  const pathname = usePathname()
  const searchParams = useSearchParams()
  const { filterState, dispatch } = useFilterContext()

  // The first state → URL pass would run against initialFilterState, before
  // INIT_FROM_URL is reduced, and wipe the incoming params.
  const initializedRef = useRef(false)

  useEffect(() => {
    dispatch({ type: 'INIT_FROM_URL', payload: decodeFilterParams(searchParams) })
    // eslint-disable-next-line react-hooks/exhaustive-deps
  }, [])

  const search = encodeFilterParams(filterState).toString()

  useEffect(() => {
    if (!initializedRef.current) {
      initializedRef.current = true
      return
    }
    if (search === window.location.search.replace(/^\?/, '')) return
    router.replace(search ? `${pathname}?${search}` : pathname, { scroll: false })
  }, [search, pathname, router])

  return null
}

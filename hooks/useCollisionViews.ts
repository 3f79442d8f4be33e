'use client'

import { useQuery } from '@apollo/client/react'
import { GET_COLLISION_VIEWS, type GetCollisionViewsQuery } from '@/lib/graphql/queries'
import { useFilterContext, toCollisionFilter } from '@/context/FilterContext'

// Full rows are only read by the raw data preview; the map draws `points`,
// which always covers every match.
export const PREVIEW_ROWS = 100

/**
 * The filtered subset plus the dataset-wide tables. The map, the charts and
 * the raw data table all call this with the same variables, so Apollo serves
 * them from one request.
 */
export function useCollisionViews() {
  const { filterState } = useFilterContext()
  return useQuery<GetCollisionViewsQuery>(GET_COLLISION_VIEWS, {
    variables: { filter: toCollisionFilter(filterState), limit: PREVIEW_ROWS },
  })
}

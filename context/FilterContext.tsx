'use client'

import { createContext, useContext, useReducer, type ReactNode } from 'react'
import type { CasualtyFilter, CollisionFilterInput, PersonGroup } from '@/lib/collisions/types'

// ── Types ─────────────────────────────────────────────────────────────────────

export type { CasualtyFilter, PersonGroup }

export type DataBounds = { minDate: string; maxDate: string }

export interface FilterState {
  minInjured: number // keep collisions with at least this many people injured
  date: string | null // single day, YYYY-MM-DD
  casualty: CasualtyFilter | null
  street: string // free text, matched as a case-insensitive substring
  hour: number // time-of-day section; does not narrow the main views
  personGroup: PersonGroup // dangerous streets table
  showRawData: boolean
  totalCount: number | null // populated by CollisionLayer after query
  isLoading: boolean // true while a filter-triggered refetch is in flight
  dataBounds: DataBounds | null // min/max collision date in the dataset
  maxInjured: number // upper bound of the injured slider
}

// The URL-serializable subset of FilterState (no derived fields).
export type UrlFilterState = {
  minInjured: number
  date: string | null
  casualty: CasualtyFilter | null
  street: string
  hour: number
  personGroup: PersonGroup
}

export type FilterAction =
  | { type: 'SET_MIN_INJURED'; payload: number }
  | { type: 'SET_DATE'; payload: string | null }
  | { type: 'SET_CASUALTY'; payload: CasualtyFilter | null }
  | { type: 'SET_STREET'; payload: string }
  | { type: 'SET_HOUR'; payload: number }
  | { type: 'SET_PERSON_GROUP'; payload: PersonGroup }
  | { type: 'SET_SHOW_RAW_DATA'; payload: boolean }
  | { type: 'SET_TOTAL_COUNT'; payload: number | null }
  | { type: 'SET_LOADING'; payload: boolean }
  | { type: 'SET_FILTER_OPTIONS'; payload: { dataBounds: DataBounds | null; maxInjured: number } }
  | { type: 'RESET' }
  | { type: 'INIT_FROM_URL'; payload: UrlFilterState }

// ── Constants ─────────────────────────────────────────────────────────────────

export const DEFAULT_MAX_INJURED = 19

export const CASUALTY_LABELS: Record<CasualtyFilter, string> = {
  fatal: 'Fatal',
  injured: 'Injured',
}

export const initialFilterState: FilterState = {
  minInjured: 0,
  date: null,
  casualty: null,
  street: '',
  hour: 0,
  personGroup: 'pedestrians',
  showRawData: false,
  totalCount: null,
  isLoading: false,
  dataBounds: null,
  maxInjured: DEFAULT_MAX_INJURED,
}

// ── Reducer ───────────────────────────────────────────────────────────────────

export function filterReducer(filterState: FilterState, action: FilterAction): FilterState {
  switch (action.type) {
    case 'SET_MIN_INJURED':
      return { ...filterState, minInjured: action.payload }
    case 'SET_DATE':
      return { ...filterState, date: action.payload }
    case 'SET_CASUALTY':
      return { ...filterState, casualty: action.payload }
    case 'SET_STREET':
      return { ...filterState, street: action.payload }
    case 'SET_HOUR':
      return { ...filterState, hour: action.payload }
    case 'SET_PERSON_GROUP':
      return { ...filterState, personGroup: action.payload }
    case 'SET_SHOW_RAW_DATA':
      return { ...filterState, showRawData: action.payload }
    case 'SET_TOTAL_COUNT':
      return { ...filterState, totalCount: action.payload }
    case 'SET_LOADING':
      return { ...filterState, isLoading: action.payload }
    case 'SET_FILTER_OPTIONS':
      return {
        ...filterState,
        dataBounds: action.payload.dataBounds,
        maxInjured: action.payload.maxInjured,
      }
    // Filters go back to defaults; what the server told us about the dataset stays.
    case 'RESET':
      return {
        ...initialFilterState,
        dataBounds: filterState.dataBounds,
        maxInjured: filterState.maxInjured,
      }
    case 'INIT_FROM_URL':
      return { ...filterState, ...action.payload }
    default:
      return filterState
  }
}

// ── Context ───────────────────────────────────────────────────────────────────

type FilterContextValue = {
  filterState: FilterState
  dispatch: React.Dispatch<FilterAction>
}

const FilterContext = createContext<FilterContextValue | null>(null)

export function FilterProvider({ children }: { children: ReactNode }) {
  const [filterState, dispatch] = useReducer(filterReducer, initialFilterState)
  return (
    <FilterContext.Provider value={{ filterState, dispatch }}>{children}</FilterContext.Provider>
  )
}

export function useFilterContext(): FilterContextValue {
  const ctx = useContext(FilterContext)
  if (!ctx) throw new Error('useFilterContext must be used within FilterProvider')
  return ctx
}

// ── Helpers ───────────────────────────────────────────────────────────────────

/**
 * Convert FilterState to CollisionFilter GraphQL input variables.
 * Only active dimensions are sent; the hour slider is not part of the filter.
 */
export function toCollisionFilter(filterState: FilterState): CollisionFilterInput {
  const street = filterState.street.trim()
  return {
    ...(filterState.minInjured > 0 ? { minInjured: filterState.minInjured } : {}),
    ...(filterState.date ? { date: filterState.date } : {}),
    ...(filterState.casualty ? { casualty: filterState.casualty } : {}),
    ...(street ? { street } : {}),
  }
}

/**
 * Derive human-readable badge labels for all active (non-default) filters.
 * Used by SummaryBar to render active filter chips.
 */
export function getActiveFilterLabels(filterState: FilterState): string[] {
  const labels: string[] = []

  if (filterState.minInjured > 0) labels.push(`≥ ${filterState.minInjured} injured`)
  if (filterState.date) labels.push(filterState.date)
  if (filterState.casualty) labels.push(CASUALTY_LABELS[filterState.casualty])

  const street = filterState.street.trim()
  if (street) labels.push(`“${street}”`)

  return labels
}

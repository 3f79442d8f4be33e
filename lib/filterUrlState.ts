import type { CasualtyFilter, FilterState, PersonGroup, UrlFilterState } from '@/context/FilterContext'
import { PERSON_GROUPS } from '@/lib/collisions/types'

export type { UrlFilterState }

// ── Constants ─────────────────────────────────────────────────────────────────

const DEFAULT_GROUP: PersonGroup = 'pedestrians'
const CASUALTY_VALUES: ReadonlyArray<CasualtyFilter> = ['fatal', 'injured']
const ISO_DATE_RE = /^\d{4}-\d{2}-\d{2}$/
const INTEGER_RE = /^\d+$/

function parseWholeNumber(raw: string | null, max: number): number | null {
  if (raw === null || !INTEGER_RE.test(raw)) return null
  const value = parseInt(raw, 10)
  return value <= max ? value : null
}

// ── Encode ────────────────────────────────────────────────────────────────────

/**
 * Converts the URL-serializable portion of FilterState into URLSearchParams.
 * Default values are omitted — a clean URL (no params) means the default view.
 */
export function encodeFilterParams(filterState: FilterState): URLSearchParams {
  const params = new URLSearchParams()

  if (filterState.minInjured > 0) params.set('injured', String(filterState.minInjured))
  if (filterState.date !== null) params.set('date', filterState.date)
  if (filterState.casualty !== null) params.set('casualty', filterState.casualty)

  const street = filterState.street.trim()
  if (street) params.set('street', street)

  if (filterState.hour !== 0) params.set('hour', String(filterState.hour))
  if (filterState.personGroup !== DEFAULT_GROUP) params.set('group', filterState.personGroup)

  return params
}

// ── Decode ────────────────────────────────────────────────────────────────────

/**
 * Parses URLSearchParams back into a UrlFilterState.
 * Falls back to application defaults for absent or invalid params.
 */
export function decodeFilterParams(params: URLSearchParams): UrlFilterState {
  const rawDate = params.get('date')
  const rawCasualty = params.get('casualty')
  const rawGroup = params.get('group')

  return {
    minInjured: parseWholeNumber(params.get('injured'), 1000) ?? 0,
    date: rawDate !== null && ISO_DATE_RE.test(rawDate) ? rawDate : null,
    casualty: CASUALTY_VALUES.find((c) => c === rawCasualty) ?? null,
    street: (params.get('street') ?? '').trim(),
    hour: parseWholeNumber(params.get('hour'), 23) ?? 0,
    personGroup: PERSON_GROUPS.find((g) => g === rawGroup) ?? DEFAULT_GROUP,
  }
}

import { isValid, parseISO } from 'date-fns'
import type {
  CasualtyFilter,
  CollisionFilter,
  CollisionFilterInput,
  CollisionRecord,
  Severity,
} from './types'

export const NO_FILTER: CollisionFilter = {
  minInjured: 0,
  date: null,
  casualty: null,
  street: null,
  hour: null,
}

const ISO_DATE_RE = /^\d{4}-\d{2}-\d{2}$/
const CASUALTY_VALUES = new Set<string>(['fatal', 'injured'])

function isCasualtyFilter(value: string): value is CasualtyFilter {
  return CASUALTY_VALUES.has(value)
}

// ── Normalization ─────────────────────────────────────────────────────────────
// Widget values are never rejected: anything absent or malformed turns that
// dimension off.

export function normalizeCollisionFilter(input?: CollisionFilterInput | null): CollisionFilter {
  const { minInjured, date, casualty, street, hour } = input ?? {}

  const normalizedDate =
    typeof date === 'string' && ISO_DATE_RE.test(date) && isValid(parseISO(date)) ? date : null

  const trimmedStreet = typeof street === 'string' ? street.trim() : ''

  return {
    minInjured:
      typeof minInjured === 'number' && Number.isFinite(minInjured) && minInjured > 0
        ? Math.trunc(minInjured)
        : 0,
    date: normalizedDate,
    casualty: typeof casualty === 'string' && isCasualtyFilter(casualty) ? casualty : null,
    street: trimmedStreet || null,
    hour:
      typeof hour === 'number' && Number.isInteger(hour) && hour >= 0 && hour <= 23 ? hour : null,
  }
}

export function isEmptyFilter(filter: CollisionFilter): boolean {
  return (
    filter.minInjured === 0 &&
    filter.date === null &&
    filter.casualty === null &&
    filter.street === null &&
    filter.hour === null
  )
}

// ── Predicates ────────────────────────────────────────────────────────────────

export function matchesFilter(record: CollisionRecord, filter: CollisionFilter): boolean {
  if (record.injured.persons < filter.minInjured) return false
  if (filter.date !== null && record.crashDate !== filter.date) return false
  if (filter.casualty === 'fatal' && record.killed.persons <= 0) return false
  if (filter.casualty === 'injured' && record.injured.persons <= 0) return false
  if (filter.hour !== null && record.hour !== filter.hour) return false
  if (filter.street !== null) {
    if (!record.onStreetName) return false
    if (!record.onStreetName.toLowerCase().includes(filter.street.toLowerCase())) return false
  }
  return true
}

/**
 * Order-preserving AND of every active predicate. Without any active predicate
 * the input array is returned as-is.
 */
export function filterCollisions<T extends CollisionRecord>(
  records: ReadonlyArray<T>,
  filter: CollisionFilter
): ReadonlyArray<T> {
  if (isEmptyFilter(filter)) return records
  return records.filter((record) => matchesFilter(record, filter))
}

export function collisionSeverity(record: CollisionRecord): Severity {
  if (record.killed.persons > 0) return 'Fatal'
  if (record.injured.persons > 0) return 'Injury'
  return 'None'
}

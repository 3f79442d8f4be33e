import { filterCollisions, normalizeCollisionFilter } from './filter'
import type {
  BoroughCount,
  BoroughFactorCount,
  CollisionFilterInput,
  CollisionRecord,
  CollisionViews,
  DateCount,
  DateMinuteCount,
  HourCount,
  MinuteCount,
  PersonGroup,
  Position,
  StreetCasualties,
  WeekdayCount,
} from './types'

type Records = ReadonlyArray<CollisionRecord>

export const WEEKDAY_LABELS = [
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
  'Sunday',
]

export const UNKNOWN_BOROUGH = 'Unknown'
export const UNSPECIFIED_FACTOR = 'Unspecified'

function buckets(size: number, key: (record: CollisionRecord) => number, records: Records) {
  const counts = new Array<number>(size).fill(0)
  for (const record of records) {
    const i = key(record)
    if (i >= 0 && i < size) counts[i]++
  }
  return counts
}

// ── Dataset-wide tables ───────────────────────────────────────────────────────

export function countByHour(records: Records): HourCount[] {
  return buckets(24, (r) => r.hour, records).map((count, hour) => ({ hour, count }))
}

export function countByWeekday(records: Records): WeekdayCount[] {
  return buckets(7, (r) => r.weekday, records).map((count, weekday) => ({
    weekday,
    label: WEEKDAY_LABELS[weekday],
    count,
  }))
}

export function countByBoroughFactor(records: Records): BoroughFactorCount[] {
  // Keyed by a separator that cannot occur in a trimmed CSV cell.
  const totals = new Map<string, BoroughFactorCount>()
  for (const record of records) {
    const borough = record.borough ?? UNKNOWN_BOROUGH
    const factor = record.contributingFactor ?? UNSPECIFIED_FACTOR
    const key = `${borough}\n${factor}`
    const entry = totals.get(key)
    if (entry) entry.count++
    else totals.set(key, { borough, factor, count: 1 })
  }
  return Array.from(totals.values()).sort(
    (a, b) =>
      b.count - a.count || a.borough.localeCompare(b.borough) || a.factor.localeCompare(b.factor)
  )
}

/** Mirrors a value count: records without a borough are left out. */
export function countByBorough(records: Records): BoroughCount[] {
  const totals = new Map<string, number>()
  for (const record of records) {
    if (!record.borough) continue
    totals.set(record.borough, (totals.get(record.borough) ?? 0) + 1)
  }
  return Array.from(totals.entries())
    .map(([borough, count]) => ({ borough, count }))
    .sort((a, b) => b.count - a.count || a.borough.localeCompare(b.borough))
}

// ── Time-of-day breakdowns ────────────────────────────────────────────────────

export function countByMinute(records: Records, hour: number): MinuteCount[] {
  const inHour = records.filter((r) => r.hour === hour)
  return buckets(60, (r) => r.minute, inHour).map((count, minute) => ({ minute, count }))
}

export function countByDate(records: Records): DateCount[] {
  const totals = new Map<string, number>()
  for (const record of records) {
    totals.set(record.crashDate, (totals.get(record.crashDate) ?? 0) + 1)
  }
  return Array.from(totals.entries())
    .map(([date, count]) => ({ date, count }))
    .sort((a, b) => a.date.localeCompare(b.date))
}

/** Non-empty (day, minute) cells of one hour, by date then minute. */
export function countByDateAndMinute(records: Records, hour: number): DateMinuteCount[] {
  const totals = new Map<string, DateMinuteCount>()
  for (const record of records) {
    if (record.hour !== hour) continue
    const key = `${record.crashDate}T${record.minute}`
    const entry = totals.get(key)
    if (entry) entry.count++
    else totals.set(key, { date: record.crashDate, minute: record.minute, count: 1 })
  }
  return Array.from(totals.values()).sort(
    (a, b) => a.date.localeCompare(b.date) || a.minute - b.minute
  )
}

// ── Streets ───────────────────────────────────────────────────────────────────

export function topDangerousStreets(
  records: Records,
  group: PersonGroup,
  limit = 10
): StreetCasualties[] {
  const totals = new Map<string, StreetCasualties>()
  for (const record of records) {
    const injured = record.injured[group]
    const killed = record.killed[group]
    if (injured < 1 && killed < 1) continue
    if (!record.onStreetName) continue
    const entry = totals.get(record.onStreetName) ?? {
      street: record.onStreetName,
      injured: 0,
      killed: 0,
      affected: 0,
    }
    entry.injured += injured
    entry.killed += killed
    entry.affected += injured + killed
    totals.set(record.onStreetName, entry)
  }
  return Array.from(totals.values())
    .sort((a, b) => b.affected - a.affected || a.street.localeCompare(b.street))
    .slice(0, Math.max(0, limit))
}

// ── Dataset facts ─────────────────────────────────────────────────────────────

export function dateBounds(records: Records): { minDate: string; maxDate: string } | null {
  if (records.length === 0) return null
  let minDate = records[0].crashDate
  let maxDate = records[0].crashDate
  for (const { crashDate } of records) {
    if (crashDate < minDate) minDate = crashDate
    if (crashDate > maxDate) maxDate = crashDate
  }
  return { minDate, maxDate }
}

export function maxInjured(records: Records): number {
  let max = 0
  for (const record of records) max = Math.max(max, record.injured.persons)
  return max
}

export function meanPosition(points: ReadonlyArray<Position>): Position | null {
  if (points.length === 0) return null
  let latitude = 0
  let longitude = 0
  for (const point of points) {
    latitude += point.latitude
    longitude += point.longitude
  }
  return { latitude: latitude / points.length, longitude: longitude / points.length }
}

export function listBoroughs(records: Records): string[] {
  const boroughs = new Set<string>()
  for (const record of records) if (record.borough) boroughs.add(record.borough)
  return Array.from(boroughs).sort()
}

// ── Pipeline ──────────────────────────────────────────────────────────────────

/**
 * The filter/aggregate pipeline behind the main dashboard. The filtered subset
 * drives the point map and its centre; the hour, weekday and borough × factor
 * tables are always computed over the whole dataset, whatever the filter.
 */
export function buildCollisionViews(
  records: Records,
  filterInput?: CollisionFilterInput | null
): CollisionViews {
  const filtered = filterCollisions(records, normalizeCollisionFilter(filterInput))
  return {
    records: filtered,
    center: meanPosition(filtered),
    byHour: countByHour(records),
    byWeekday: countByWeekday(records),
    byBoroughFactor: countByBoroughFactor(records),
  }
}
